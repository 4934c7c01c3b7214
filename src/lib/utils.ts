export interface NumberFormatSettings {
  locale: string;
  currency: string;
}

const DEFAULT_FORMAT: NumberFormatSettings = { locale: 'en-US', currency: 'USD' };

/**
 * Format a number as currency
 */
export function formatCurrency(
  value: number,
  settings: NumberFormatSettings = DEFAULT_FORMAT,
  options?: Intl.NumberFormatOptions
): string {
  return new Intl.NumberFormat(settings.locale, {
    style: 'currency',
    currency: settings.currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
    ...options,
  }).format(value);
}

/**
 * Format a ratio (0.25) as percentage (25.0%)
 */
export function formatPercentage(
  value: number,
  settings: NumberFormatSettings = DEFAULT_FORMAT,
  options?: Intl.NumberFormatOptions
): string {
  return new Intl.NumberFormat(settings.locale, {
    style: 'percent',
    minimumFractionDigits: 1,
    maximumFractionDigits: 1,
    ...options,
  }).format(value);
}
