import { afterEach, beforeEach } from 'vitest';
import type { NewTransaction } from '@/types/finance';

const SETTINGS_ENV_KEYS = [
  'FINANCE_DATA_FILE',
  'DATABASE_URL',
  'POSTGRES_URL',
  'FINANCE_WORKSPACE_ID',
  'FINANCE_LOCALE',
  'FINANCE_CURRENCY',
] as const;

/**
 * Sample transaction input for tests
 */
export function createTransaction(overrides: Partial<NewTransaction> = {}): NewTransaction {
  return {
    amount: 100,
    category: 'Food',
    description: 'Groceries',
    type: 'expense',
    date: '2024-03-15',
    ...overrides,
  };
}

/**
 * Run a function that is expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Unset the settings variables for each test in the enclosing suite and put
 * them back afterwards. Returns a setter for per-test values.
 */
export function isolateSettingsEnv(): (vars: Record<string, string>) => void {
  let saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    saved = {};
    for (const key of SETTINGS_ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of SETTINGS_ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  return vars => {
    Object.assign(process.env, vars);
  };
}
