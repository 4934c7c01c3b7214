export type TransactionType = 'income' | 'expense';

export type RiskTolerance = 'low' | 'medium' | 'high';

export type SavingsBucket = 'deficit' | 'low' | 'moderate' | 'high';

/**
 * Calendar date in `YYYY-MM-DD` form.
 */
export type CalendarDate = string;

export type Transaction = {
  readonly id: string;
  readonly amount: number;
  readonly category: string;
  readonly description: string;
  readonly type: TransactionType;
  readonly date: CalendarDate;
};

export type NewTransaction = {
  amount: number;
  category: string;
  description: string;
  type?: TransactionType;
  date?: CalendarDate | Date;
};

export type BudgetEntry = {
  category: string;
  limit: number;
};

export type InvestmentProfile = {
  riskTolerance: RiskTolerance;
  goals: string;
};

export type TaxBracket = {
  lowerBound: number;
  upperBound: number; // Infinity for the top bracket
  rate: number;
};

export type DeductionRule = {
  description: string;
  reduction: number;
  appliesTo: (income: number) => boolean;
};

export type BracketSlice = {
  lowerBound: number;
  upperBound: number;
  rate: number;
  taxableAmount: number;
  tax: number;
};

export type TaxEstimate = {
  grossIncome: number;
  taxableIncome: number;
  taxAmount: number;
  deductionsApplied: string[];
  effectiveRate: number;
  marginalRate: number;
  bracketBreakdown: BracketSlice[];
};

export type BudgetStatus = {
  category: string;
  limit: number;
  spent: number;
  remaining: number;
  overBudget: boolean;
  percentUsed: number;
};

export type CategoryTransaction = {
  date: CalendarDate;
  amount: number;
  description: string;
};

export type CategorySpending = {
  category: string;
  total: number;
  count: number;
  budget: number | null; // null when the category has no budget
  transactions: CategoryTransaction[];
};

export type BudgetAdviceContext = {
  totalIncome: number;
  totalExpenses: number;
  savingsRatio: number;
  spendingByCategory: readonly CategorySpending[];
};

export type BudgetAdviceRule = {
  advice: string;
  appliesTo: (context: BudgetAdviceContext) => boolean;
};

export type FinancialReport = {
  period: string;
  totalIncome: number;
  totalExpenses: number;
  net: number;
  savingsRatio: number;
  savingsBucket: SavingsBucket;
  budgetStatuses: BudgetStatus[];
  spendingByCategory: CategorySpending[];
  taxEstimate: TaxEstimate;
  taxTips: string[];
  budgetAdvice: string[];
  recommendations: string[];
  goalGuidance: string[];
};
