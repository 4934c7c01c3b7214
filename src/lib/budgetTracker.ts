/**
 * Budget Tracker
 *
 * Per-category monthly spending limits and their status against the ledger.
 */

import type { BudgetEntry, BudgetStatus } from '@/types/finance';
import {
  calculatePercentUsed,
  calculateRemaining,
  compareCategories,
} from './calculators';
import { assertValidPeriod } from './dates';
import { assertValidAmount, assertValidCategory, type Ledger } from './ledger';

export class BudgetTracker {
  private readonly limits = new Map<string, number>();

  /**
   * Insert or overwrite the limit for a category. No history is kept.
   */
  setBudget(category: string, amount: number): BudgetEntry {
    assertValidAmount(amount);
    assertValidCategory(category);

    const entry: BudgetEntry = { category, limit: amount };
    this.limits.set(entry.category, entry.limit);
    return { ...entry };
  }

  getBudget(category: string): number | undefined {
    return this.limits.get(category);
  }

  entries(): BudgetEntry[] {
    return [...this.limits.entries()]
      .map(([category, limit]) => ({ category, limit }))
      .sort((a, b) => compareCategories(a.category, b.category));
  }

  /**
   * Spending against every budgeted category for the period, sorted by
   * category. Categories without a budget are left out.
   */
  status(ledger: Ledger, year: number, month: number): BudgetStatus[] {
    assertValidPeriod(year, month);

    return this.entries().map(({ category, limit }) => {
      const spent = ledger.spentInCategory(category, year, month);
      return {
        category,
        limit,
        spent,
        remaining: calculateRemaining(limit, spent),
        overBudget: spent > limit,
        percentUsed: calculatePercentUsed(limit, spent),
      };
    });
  }

  get size(): number {
    return this.limits.size;
  }
}
