/**
 * Report Generator
 *
 * Composes ledger totals, budget status, the tax estimate, budget advice
 * and investment recommendations into one report for a calendar month. Fail-fast: the first
 * component to throw aborts the report.
 */

import type { BudgetAdviceRule, FinancialReport, InvestmentProfile } from '@/types/finance';
import { DEFAULT_BUDGET_ADVICE_RULES, buildBudgetAdvice, roundCurrency } from './calculators';
import { assertValidPeriod, formatPeriod } from './dates';
import type { BudgetTracker } from './budgetTracker';
import type { InvestmentAdvisor } from './investmentAdvisor';
import type { Ledger } from './ledger';
import type { TaxEstimator } from './taxEstimator';

export class ReportGenerator {
  private readonly budgetAdviceRules: readonly BudgetAdviceRule[];

  constructor(budgetAdviceRules: readonly BudgetAdviceRule[] = DEFAULT_BUDGET_ADVICE_RULES) {
    this.budgetAdviceRules = budgetAdviceRules;
  }

  generate(
    ledger: Ledger,
    budgetTracker: BudgetTracker,
    taxEstimator: TaxEstimator,
    advisor: InvestmentAdvisor,
    profile: InvestmentProfile | null | undefined,
    year: number,
    month: number
  ): FinancialReport {
    assertValidPeriod(year, month);

    const totalIncome = ledger.totalIncome(year, month);
    const totalExpenses = ledger.totalExpenses(year, month);
    const budgetStatuses = budgetTracker.status(ledger, year, month);
    const taxEstimate = taxEstimator.estimate(totalIncome);
    const recommendations = advisor.recommend(profile, totalIncome, totalExpenses);

    const spendingByCategory = ledger.expensesByCategory(year, month, category =>
      budgetTracker.getBudget(category)
    );
    const savingsRatio = advisor.savingsRatio(totalIncome, totalExpenses);
    const budgetAdvice = buildBudgetAdvice(
      { totalIncome, totalExpenses, savingsRatio, spendingByCategory },
      this.budgetAdviceRules
    );

    return {
      period: formatPeriod(year, month),
      totalIncome,
      totalExpenses,
      net: roundCurrency(totalIncome - totalExpenses),
      savingsRatio,
      savingsBucket: advisor.savingsBucket(savingsRatio),
      budgetStatuses,
      spendingByCategory,
      taxEstimate,
      taxTips: taxEstimator.taxTips(totalIncome, spendingByCategory),
      budgetAdvice,
      recommendations,
      goalGuidance: advisor.goalGuidance(profile),
    };
  }
}
