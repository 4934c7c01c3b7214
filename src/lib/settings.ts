/**
 * Runtime settings, read from environment variables.
 *
 * FINANCE_DATA_FILE       JSON file used by the file store
 * DATABASE_URL            Postgres connection string (POSTGRES_URL also accepted);
 *                         when set, workspaces are kept in Postgres instead
 * FINANCE_WORKSPACE_ID    row key for the Postgres store
 * FINANCE_LOCALE          locale for report formatting
 * FINANCE_CURRENCY        ISO 4217 currency code for report formatting
 */

import { ConfigError } from './errors';

export const DEFAULT_DATA_FILE = 'financial_data/financial_data.json';
export const DEFAULT_WORKSPACE_ID = 'default';
export const DEFAULT_LOCALE = 'en-US';
export const DEFAULT_CURRENCY = 'USD';

export type StoreKind = 'file' | 'postgres';

export interface FinanceSettings {
  store: StoreKind;
  dataFile: string;
  databaseUrl?: string;
  workspaceId: string;
  locale: string;
  currency: string;
}

/**
 * Check if a Postgres connection is configured
 */
export function hasPostgres(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!(env.DATABASE_URL?.trim() || env.POSTGRES_URL?.trim());
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): FinanceSettings {
  const databaseUrl = (env.DATABASE_URL || env.POSTGRES_URL || '').trim() || undefined;
  const dataFile = (env.FINANCE_DATA_FILE || '').trim() || DEFAULT_DATA_FILE;
  const workspaceId = (env.FINANCE_WORKSPACE_ID || '').trim() || DEFAULT_WORKSPACE_ID;
  const locale = (env.FINANCE_LOCALE || '').trim() || DEFAULT_LOCALE;
  const currency = (env.FINANCE_CURRENCY || '').trim().toUpperCase() || DEFAULT_CURRENCY;

  if (!/^[A-Z]{3}$/.test(currency)) {
    throw new ConfigError(`FINANCE_CURRENCY must be a 3-letter currency code (received '${currency}')`);
  }
  if (!isSupportedLocale(locale)) {
    throw new ConfigError(`FINANCE_LOCALE is not a supported locale (received '${locale}')`);
  }
  if (workspaceId.length > 64) {
    throw new ConfigError('FINANCE_WORKSPACE_ID must be at most 64 characters');
  }

  return {
    store: hasPostgres(env) ? 'postgres' : 'file',
    dataFile,
    databaseUrl,
    workspaceId,
    locale,
    currency,
  };
}

function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.NumberFormat.supportedLocalesOf([locale]).length > 0;
  } catch {
    return false;
  }
}
