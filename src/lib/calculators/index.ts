/**
 * Financial Calculators
 *
 * Deterministic calculation engines behind the ledger, budget tracker,
 * tax estimator and investment advisor.
 */

export * from './budgetCalculator';
export * from './taxCalculator';
