/**
 * Tax Estimator
 *
 * Estimated liability for an income figure: deduction rules first, then the
 * progressive bracket schedule.
 */

import type { DeductionRule, TaxBracket, TaxEstimate, CategorySpending } from '@/types/finance';
import {
  DEFAULT_DEDUCTION_RULES,
  DEFAULT_TAX_BRACKETS,
  applyDeductions,
  buildTaxTips,
  calculateProgressiveTax,
  validateBrackets,
  validateDeductionRules,
} from './calculators';
import { ConfigError } from './errors';
import { assertValidAmount } from './ledger';

export interface TaxEstimatorOptions {
  brackets?: readonly TaxBracket[];
  deductionRules?: readonly DeductionRule[];
}

export class TaxEstimator {
  readonly brackets: readonly TaxBracket[];
  readonly deductionRules: readonly DeductionRule[];

  constructor(options: TaxEstimatorOptions = {}) {
    const brackets = options.brackets ?? DEFAULT_TAX_BRACKETS;
    const deductionRules = options.deductionRules ?? DEFAULT_DEDUCTION_RULES;
    const problems = [...validateBrackets(brackets), ...validateDeductionRules(deductionRules)];
    if (problems.length > 0) {
      throw new ConfigError(`Invalid tax schedule: ${problems.join('; ')}`);
    }
    this.brackets = brackets;
    this.deductionRules = deductionRules;
  }

  estimate(taxableIncome: number): TaxEstimate {
    assertValidAmount(taxableIncome);

    const { taxableIncome: afterDeductions, deductionsApplied } = applyDeductions(
      taxableIncome,
      this.deductionRules
    );
    const { totalTax, bracketBreakdown } = calculateProgressiveTax(afterDeductions, this.brackets);

    const marginalRate = bracketBreakdown.length > 0
      ? bracketBreakdown[bracketBreakdown.length - 1].rate
      : 0;

    return {
      grossIncome: taxableIncome,
      taxableIncome: afterDeductions,
      taxAmount: totalTax,
      deductionsApplied,
      effectiveRate: taxableIncome > 0 ? totalTax / taxableIncome : 0,
      marginalRate,
      bracketBreakdown,
    };
  }

  /**
   * Deduction and credit hints drawn from the period's expense categories
   */
  taxTips(income: number, spending: readonly Pick<CategorySpending, 'category' | 'total' | 'count'>[]): string[] {
    assertValidAmount(income);
    const expensesByCategory: Record<string, number> = {};
    for (const { category, total } of spending) {
      expensesByCategory[category] = total;
    }
    return buildTaxTips(income, expensesByCategory);
  }
}
