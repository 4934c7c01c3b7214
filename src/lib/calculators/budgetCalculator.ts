/**
 * Budget Calculator
 *
 * Deterministic arithmetic shared by the ledger, budget tracker and advisor.
 * Amounts are dollars as plain numbers, rounded to cents at every boundary.
 */

import type {
  BudgetAdviceContext,
  BudgetAdviceRule,
  CategorySpending,
  SavingsBucket,
  Transaction,
} from '@/types/finance';

// ============================================================================
// Rounding & Totals
// ============================================================================

/**
 * Round a dollar amount to whole cents
 */
export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Sum transaction amounts, rounded to cents
 */
export function sumAmounts(transactions: readonly Transaction[]): number {
  return roundCurrency(transactions.reduce((sum, t) => sum + t.amount, 0));
}

/**
 * Group expense transactions by category, sorted by category name. Each
 * group carries its budget limit (looked up through `budgetFor`) and its
 * transactions in ledger order.
 */
export function summarizeByCategory(
  transactions: readonly Transaction[],
  budgetFor: (category: string) => number | undefined = () => undefined
): CategorySpending[] {
  const groups = new Map<string, Transaction[]>();

  for (const transaction of transactions) {
    if (transaction.type !== 'expense') continue;
    const group = groups.get(transaction.category) ?? [];
    group.push(transaction);
    groups.set(transaction.category, group);
  }

  return [...groups.entries()]
    .map(([category, group]) => ({
      category,
      total: sumAmounts(group),
      count: group.length,
      budget: budgetFor(category) ?? null,
      transactions: group.map(({ date, amount, description }) => ({ date, amount, description })),
    }))
    .sort((a, b) => compareCategories(a.category, b.category));
}

/**
 * Stable category ordering (plain code-unit comparison, locale independent)
 */
export function compareCategories(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ============================================================================
// Budget Status
// ============================================================================

/**
 * Remaining budget (negative when overspent)
 */
export function calculateRemaining(limit: number, spent: number): number {
  return roundCurrency(limit - spent);
}

/**
 * Share of the limit already spent (0 when no limit is set)
 */
export function calculatePercentUsed(limit: number, spent: number): number {
  if (limit === 0) return 0;
  return spent / limit;
}

// ============================================================================
// Surplus & Savings Ratio
// ============================================================================

/**
 * Calculate the savings ratio: (income - expenses) / income
 * A period without income has a ratio of 0.
 */
export function calculateSavingsRatio(totalIncome: number, totalExpenses: number): number {
  if (totalIncome === 0) return 0;
  return (totalIncome - totalExpenses) / totalIncome;
}

export function classifySavingsBucket(savingsRatio: number): SavingsBucket {
  if (savingsRatio < 0) return 'deficit';
  if (savingsRatio < 0.1) return 'low';
  if (savingsRatio < 0.3) return 'moderate';
  return 'high';
}

// ============================================================================
// Budget Advice
// ============================================================================

export const TARGET_SAVINGS_RATIO = 0.2;
export const HOUSING_CATEGORY = 'Housing';
export const MAX_HOUSING_SHARE = 0.3;

export const DEFAULT_BUDGET_ADVICE_RULES: readonly BudgetAdviceRule[] = [
  {
    advice: 'Consider increasing your savings rate to at least 20% of income.',
    appliesTo: ({ savingsRatio }) => savingsRatio < TARGET_SAVINGS_RATIO,
  },
  {
    advice: 'Housing costs exceed 30% of income. Consider ways to reduce housing expenses.',
    appliesTo: ({ totalIncome, spendingByCategory }) => {
      const housing = spendingByCategory.find(entry => entry.category === HOUSING_CATEGORY);
      return housing !== undefined && housing.total > totalIncome * MAX_HOUSING_SHARE;
    },
  },
];

/**
 * Advice from every rule that holds for the period, in rule order
 */
export function buildBudgetAdvice(
  context: BudgetAdviceContext,
  rules: readonly BudgetAdviceRule[] = DEFAULT_BUDGET_ADVICE_RULES
): string[] {
  return rules.filter(rule => rule.appliesTo(context)).map(rule => rule.advice);
}
