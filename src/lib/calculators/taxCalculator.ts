/**
 * Tax Calculator
 *
 * Deterministic progressive tax calculation over an illustrative bracket
 * schedule. Rates and thresholds are not tied to any jurisdiction.
 */

import type { BracketSlice, DeductionRule, TaxBracket } from '@/types/finance';
import { roundCurrency } from './budgetCalculator';

// ============================================================================
// Bracket & Deduction Definitions
// ============================================================================

/**
 * Illustrative single-filer schedule. Each bracket covers [lowerBound, upperBound).
 */
export const DEFAULT_TAX_BRACKETS: readonly TaxBracket[] = [
  { lowerBound: 0, upperBound: 9950, rate: 0.10 },
  { lowerBound: 9950, upperBound: 40525, rate: 0.12 },
  { lowerBound: 40525, upperBound: 86375, rate: 0.22 },
  { lowerBound: 86375, upperBound: 164925, rate: 0.24 },
  { lowerBound: 164925, upperBound: 209425, rate: 0.32 },
  { lowerBound: 209425, upperBound: 523600, rate: 0.35 },
  { lowerBound: 523600, upperBound: Infinity, rate: 0.37 },
];

export const STANDARD_DEDUCTION = 12550;
export const LOW_INCOME_THRESHOLD = 20000;
export const LOW_INCOME_ALLOWANCE = 2500;

/**
 * Deduction rules, applied in order against gross income.
 * A rule may only switch off as income rises, otherwise tax would stop
 * being monotonic in income.
 */
export const DEFAULT_DEDUCTION_RULES: readonly DeductionRule[] = [
  {
    description: 'Standard deduction',
    reduction: STANDARD_DEDUCTION,
    appliesTo: income => income > 0,
  },
  {
    description: 'Low-income allowance',
    reduction: LOW_INCOME_ALLOWANCE,
    appliesTo: income => income > 0 && income < LOW_INCOME_THRESHOLD,
  },
];

// ============================================================================
// Schedule Validation
// ============================================================================

/**
 * Check that brackets are sorted, contiguous from 0 and open-ended at the top
 */
export function validateBrackets(brackets: readonly TaxBracket[]): string[] {
  const problems: string[] = [];

  if (brackets.length === 0) {
    return ['schedule has no brackets'];
  }
  if (brackets[0].lowerBound !== 0) {
    problems.push('first bracket must start at 0');
  }

  brackets.forEach((bracket, index) => {
    if (!(bracket.rate >= 0 && bracket.rate <= 1)) {
      problems.push(`bracket ${index} rate ${bracket.rate} is outside [0, 1]`);
    }
    if (!(bracket.upperBound > bracket.lowerBound)) {
      problems.push(`bracket ${index} upper bound must exceed its lower bound`);
    }
    const next = brackets[index + 1];
    if (next && next.lowerBound !== bracket.upperBound) {
      problems.push(`gap or overlap between brackets ${index} and ${index + 1}`);
    }
  });

  if (brackets[brackets.length - 1].upperBound !== Infinity) {
    problems.push('last bracket must be unbounded');
  }

  return problems;
}

export function validateDeductionRules(rules: readonly DeductionRule[]): string[] {
  const problems: string[] = [];
  rules.forEach((rule, index) => {
    if (rule.description.trim() === '') {
      problems.push(`deduction ${index} has no description`);
    }
    if (!Number.isFinite(rule.reduction) || rule.reduction < 0) {
      problems.push(`deduction ${index} reduction ${rule.reduction} must be a non-negative amount`);
    }
  });
  return problems;
}

// ============================================================================
// Tax Calculation Functions
// ============================================================================

/**
 * Apply deduction rules in definition order. Taxable income never drops below 0.
 */
export function applyDeductions(
  grossIncome: number,
  rules: readonly DeductionRule[]
): { taxableIncome: number; deductionsApplied: string[] } {
  let taxableIncome = grossIncome;
  const deductionsApplied: string[] = [];

  for (const rule of rules) {
    if (!rule.appliesTo(grossIncome)) continue;
    taxableIncome = Math.max(0, taxableIncome - rule.reduction);
    deductionsApplied.push(rule.description);
  }

  return { taxableIncome: roundCurrency(taxableIncome), deductionsApplied };
}

/**
 * Calculate tax using progressive brackets
 */
export function calculateProgressiveTax(
  taxableIncome: number,
  brackets: readonly TaxBracket[]
): { totalTax: number; bracketBreakdown: BracketSlice[] } {
  let totalTax = 0;
  const bracketBreakdown: BracketSlice[] = [];

  for (const bracket of brackets) {
    if (taxableIncome <= bracket.lowerBound) break;

    const taxableAmount = Math.min(taxableIncome, bracket.upperBound) - bracket.lowerBound;
    const tax = taxableAmount * bracket.rate;
    totalTax += tax;
    bracketBreakdown.push({
      lowerBound: bracket.lowerBound,
      upperBound: bracket.upperBound,
      rate: bracket.rate,
      taxableAmount: roundCurrency(taxableAmount),
      tax: roundCurrency(tax),
    });
  }

  return { totalTax: roundCurrency(totalTax), bracketBreakdown };
}

// ============================================================================
// Deduction Hints
// ============================================================================

export const MEDICAL_EXPENSE_FLOOR = 0.075;

/**
 * Hints about deductions and credits the user may be able to claim,
 * keyed on expense categories
 */
export function buildTaxTips(income: number, expensesByCategory: Record<string, number>): string[] {
  const tips: string[] = [];
  const spentOn = (category: string) => expensesByCategory[category] ?? 0;

  if (spentOn('mortgage_interest') > 0) {
    tips.push('You may be eligible for the mortgage interest deduction.');
  }
  if (spentOn('charitable_contributions') > 0) {
    tips.push("Don't forget to claim your charitable contributions as deductions.");
  }
  if (spentOn('medical_expenses') > MEDICAL_EXPENSE_FLOOR * income) {
    tips.push('You may be eligible to deduct medical expenses exceeding 7.5% of your income.');
  }
  if (spentOn('child_care') > 0) {
    tips.push('Look into the Child and Dependent Care Credit.');
  }
  if (spentOn('education') > 0) {
    tips.push('You might be eligible for education-related tax credits.');
  }

  tips.push('Keep all receipts and documentation for your deductions and credits.');
  tips.push('The deadline for filing your tax return is April 15th. Mark your calendar!');

  return tips;
}
