/**
 * Personal finance engine: ledger, budgets, tax estimates, rule-based
 * investment advice and monthly reports.
 */

export * from './types/finance';
export * from './lib/errors';
export * from './lib/calculators';
export { Ledger } from './lib/ledger';
export { BudgetTracker } from './lib/budgetTracker';
export { TaxEstimator, type TaxEstimatorOptions } from './lib/taxEstimator';
export {
  InvestmentAdvisor,
  DEFAULT_RECOMMENDATION_TABLE,
  type RecommendationTable,
} from './lib/investmentAdvisor';
export { ProfileContext, RISK_TOLERANCES } from './lib/profileContext';
export { ReportGenerator } from './lib/reportGenerator';
export {
  FinanceWorkspace,
  emptySnapshot,
  type WorkspaceOptions,
  type WorkspaceSnapshot,
} from './lib/workspace';
export { loadSettings, type FinanceSettings } from './lib/settings';
export { createStore, JsonFileStore, PostgresStore, type FinanceStore } from './lib/stores';
