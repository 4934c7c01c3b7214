/**
 * Ledger
 *
 * Append-only store of income and expense transactions, queryable by
 * calendar month. The single source of transactional truth: every other
 * component reads from it and none mutates it.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CategorySpending, NewTransaction, Transaction, TransactionType } from '@/types/finance';
import { sumAmounts, summarizeByCategory } from './calculators';
import { assertValidPeriod, isInPeriod, toCalendarDate } from './dates';
import {
  InvalidAmountError,
  InvalidCategoryError,
  InvalidTransactionTypeError,
} from './errors';

const TRANSACTION_TYPES: ReadonlySet<string> = new Set<TransactionType>(['income', 'expense']);

export function assertValidAmount(amount: unknown): asserts amount is number {
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount < 0) {
    throw new InvalidAmountError(amount);
  }
}

export function assertValidCategory(category: unknown): asserts category is string {
  if (typeof category !== 'string' || category.trim() === '') {
    throw new InvalidCategoryError();
  }
}

export function isTransactionType(value: unknown): value is TransactionType {
  return typeof value === 'string' && TRANSACTION_TYPES.has(value);
}

export class Ledger {
  private readonly transactions: Transaction[] = [];

  /**
   * Record a transaction. All fields are validated before anything is stored.
   */
  addTransaction(input: NewTransaction & { id?: string }): Transaction {
    const { amount, category, description, type = 'expense' } = input;

    assertValidAmount(amount);
    assertValidCategory(category);
    if (!isTransactionType(type)) {
      throw new InvalidTransactionTypeError(type);
    }
    const date = toCalendarDate(input.date);

    const transaction: Transaction = Object.freeze({
      id: input.id ?? uuidv4(),
      amount,
      category,
      description,
      type,
      date,
    });

    this.transactions.push(transaction);
    return transaction;
  }

  transactionsInPeriod(year: number, month: number): Transaction[] {
    assertValidPeriod(year, month);
    return this.transactions.filter(t => isInPeriod(t.date, year, month));
  }

  totalIncome(year: number, month: number): number {
    return sumAmounts(this.transactionsInPeriod(year, month).filter(t => t.type === 'income'));
  }

  totalExpenses(year: number, month: number): number {
    return sumAmounts(this.transactionsInPeriod(year, month).filter(t => t.type === 'expense'));
  }

  /**
   * Total expense spending in one category for the period
   */
  spentInCategory(category: string, year: number, month: number): number {
    return sumAmounts(
      this.transactionsInPeriod(year, month).filter(
        t => t.type === 'expense' && t.category === category
      )
    );
  }

  /**
   * Expense groups for the period; `budgetFor` supplies each category's limit
   */
  expensesByCategory(
    year: number,
    month: number,
    budgetFor?: (category: string) => number | undefined
  ): CategorySpending[] {
    return summarizeByCategory(this.transactionsInPeriod(year, month), budgetFor);
  }

  all(): readonly Transaction[] {
    return [...this.transactions];
  }

  get size(): number {
    return this.transactions.length;
  }
}
