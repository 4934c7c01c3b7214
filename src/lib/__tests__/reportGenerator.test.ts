/**
 * Tests for monthly report generation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BudgetTracker } from '../budgetTracker';
import { DEFAULT_RECOMMENDATION_TABLE, InvestmentAdvisor } from '../investmentAdvisor';
import { Ledger } from '../ledger';
import { ReportGenerator } from '../reportGenerator';
import { TaxEstimator } from '../taxEstimator';
import type { InvestmentProfile } from '@/types/finance';
import { captureError, createTransaction } from '@/test/fixtures';

describe('ReportGenerator', () => {
  const generator = new ReportGenerator();
  const taxEstimator = new TaxEstimator();
  const advisor = new InvestmentAdvisor();
  const profile: InvestmentProfile = { riskTolerance: 'medium', goals: 'retirement' };

  let ledger: Ledger;
  let budgets: BudgetTracker;

  beforeEach(() => {
    ledger = new Ledger();
    budgets = new BudgetTracker();
  });

  it('composes totals, budget status, tax estimate and recommendations', () => {
    ledger.addTransaction(createTransaction({ amount: 5000, category: 'Income', description: 'Salary', type: 'income' }));
    ledger.addTransaction(createTransaction({ amount: 2000, category: 'rent', description: 'Rent' }));
    ledger.addTransaction(createTransaction({ amount: 1000, category: 'rent', description: 'Rent top-up' }));
    budgets.setBudget('rent', 2500);

    const report = generator.generate(ledger, budgets, taxEstimator, advisor, profile, 2024, 3);

    expect(report.period).toBe('2024-03');
    expect(report.totalIncome).toBe(5000);
    expect(report.totalExpenses).toBe(3000);
    expect(report.net).toBe(2000);
    expect(report.budgetStatuses).toEqual([
      { category: 'rent', limit: 2500, spent: 3000, remaining: -500, overBudget: true, percentUsed: 1.2 },
    ]);
    expect(report.spendingByCategory).toEqual([
      {
        category: 'rent',
        total: 3000,
        count: 2,
        budget: 2500,
        transactions: [
          { date: '2024-03-15', amount: 2000, description: 'Rent' },
          { date: '2024-03-15', amount: 1000, description: 'Rent top-up' },
        ],
      },
    ]);
    expect(report.budgetAdvice).toEqual([]);
    expect(report.taxEstimate).toEqual(taxEstimator.estimate(5000));
    expect(report.savingsRatio).toBe(0.4);
    expect(report.savingsBucket).toBe('high');
    expect(report.recommendations).toEqual(DEFAULT_RECOMMENDATION_TABLE.medium.high);
    expect(report.goalGuidance).toEqual([
      'For retirement, consider tax-advantaged accounts like 401(k)s or IRAs.',
    ]);
    expect(report.taxTips).toEqual([
      'Keep all receipts and documentation for your deductions and credits.',
      'The deadline for filing your tax return is April 15th. Mark your calendar!',
    ]);
  });

  it('returns the low-risk deficit recommendations when spending exceeds income', () => {
    ledger.addTransaction(createTransaction({ amount: 1000, category: 'Income', type: 'income' }));
    ledger.addTransaction(createTransaction({ amount: 1050, category: 'Food' }));

    const report = generator.generate(
      ledger,
      budgets,
      taxEstimator,
      advisor,
      { riskTolerance: 'low', goals: 'retirement' },
      2024,
      3
    );

    expect(report.net).toBe(-50);
    expect(report.savingsBucket).toBe('deficit');
    expect(report.recommendations).toEqual(DEFAULT_RECOMMENDATION_TABLE.low.deficit);
    expect(report.budgetAdvice).toEqual(['Consider increasing your savings rate to at least 20% of income.']);
  });

  it('flags a low savings rate and housing above 30% of income', () => {
    ledger.addTransaction(createTransaction({ amount: 4000, category: 'Income', type: 'income' }));
    ledger.addTransaction(createTransaction({ amount: 1500, category: 'Housing', description: 'Rent' }));
    ledger.addTransaction(createTransaction({ amount: 1800, category: 'Food' }));

    const report = generator.generate(ledger, budgets, taxEstimator, advisor, profile, 2024, 3);

    expect(report.savingsRatio).toBe(0.175);
    expect(report.budgetAdvice).toEqual([
      'Consider increasing your savings rate to at least 20% of income.',
      'Housing costs exceed 30% of income. Consider ways to reduce housing expenses.',
    ]);
  });

  it('leaves housing at exactly 30% of income unflagged', () => {
    ledger.addTransaction(createTransaction({ amount: 5000, category: 'Income', type: 'income' }));
    ledger.addTransaction(createTransaction({ amount: 1500, category: 'Housing', description: 'Rent' }));

    const report = generator.generate(ledger, budgets, taxEstimator, advisor, profile, 2024, 3);

    expect(report.budgetAdvice).toEqual([]);
  });

  it('applies custom budget advice rules', () => {
    const custom = new ReportGenerator([
      { advice: 'Spending is above 1000.', appliesTo: ({ totalExpenses }) => totalExpenses > 1000 },
    ]);
    ledger.addTransaction(createTransaction({ amount: 1200 }));

    expect(custom.generate(ledger, budgets, taxEstimator, advisor, profile, 2024, 3).budgetAdvice).toEqual([
      'Spending is above 1000.',
    ]);
  });

  it('reports zero totals for an empty period', () => {
    const report = generator.generate(ledger, budgets, taxEstimator, advisor, profile, 2030, 12);

    expect(report.totalIncome).toBe(0);
    expect(report.totalExpenses).toBe(0);
    expect(report.net).toBe(0);
    expect(report.taxEstimate.taxAmount).toBe(0);
    expect(report.taxEstimate.deductionsApplied).toEqual([]);
    expect(report.recommendations).toEqual(DEFAULT_RECOMMENDATION_TABLE.medium.low);
    expect(report.budgetAdvice).toEqual(['Consider increasing your savings rate to at least 20% of income.']);
  });

  it('fails with NoProfileSet when no profile is active', () => {
    ledger.addTransaction(createTransaction({ amount: 5000, type: 'income' }));

    expect(
      captureError(() => generator.generate(ledger, budgets, taxEstimator, advisor, null, 2024, 3))
    ).toHaveProperty('code', 'NoProfileSet');
  });

  it('fails on an invalid period before touching any component', () => {
    expect(
      captureError(() => generator.generate(ledger, budgets, taxEstimator, advisor, null, 2024, 13))
    ).toHaveProperty('code', 'InvalidPeriod');
  });

  it('does not change the ledger or budgets', () => {
    ledger.addTransaction(createTransaction({ amount: 100 }));
    budgets.setBudget('Food', 50);

    generator.generate(ledger, budgets, taxEstimator, advisor, profile, 2024, 3);

    expect(ledger.size).toBe(1);
    expect(budgets.entries()).toEqual([{ category: 'Food', limit: 50 }]);
  });
});
