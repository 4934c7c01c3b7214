import type { FinancialReport } from '@/types/finance';
import { formatCurrency, formatPercentage, type NumberFormatSettings } from '@/lib/utils';

const RULE = '-'.repeat(50);

function bulletList(items: string[]): string[] {
  return items.length > 0 ? items.map(item => `- ${item}`) : ['- (none)'];
}

/**
 * Render a report as plain text lines for the terminal
 */
export function formatReport(report: FinancialReport, settings: NumberFormatSettings): string[] {
  const money = (value: number) => formatCurrency(value, settings);
  const percent = (value: number) => formatPercentage(value, settings);
  const { taxEstimate } = report;

  const lines: string[] = [
    'Financial Report',
    RULE,
    `Period: ${report.period}`,
    '',
    'Income Summary:',
    `Total Income: ${money(report.totalIncome)}`,
    `Total Expenses: ${money(report.totalExpenses)}`,
    `Net Income: ${money(report.net)}`,
    `Savings Rate: ${percent(report.savingsRatio)} (${report.savingsBucket})`,
    '',
    'Budget Status:',
  ];

  if (report.budgetStatuses.length === 0) {
    lines.push('  No budgets set.');
  }
  for (const status of report.budgetStatuses) {
    lines.push(
      `${status.category}:${status.overBudget ? ' OVER BUDGET' : ''}`,
      `  Budget: ${money(status.limit)}`,
      `  Spent: ${money(status.spent)}`,
      `  Remaining: ${money(status.remaining)}`,
      `  Used: ${percent(status.percentUsed)}`
    );
  }

  lines.push('', 'Spending by Category:');
  if (report.spendingByCategory.length === 0) {
    lines.push('  No expenses recorded.');
  }
  for (const entry of report.spendingByCategory) {
    const noun = entry.count === 1 ? 'transaction' : 'transactions';
    const budget = entry.budget === null ? '' : `, budget ${money(entry.budget)}`;
    lines.push(`  ${entry.category}: ${money(entry.total)} (${entry.count} ${noun}${budget})`);
    for (const transaction of entry.transactions) {
      lines.push(`    ${transaction.date} ${money(transaction.amount)} ${transaction.description}`);
    }
  }

  lines.push(
    '',
    'Tax Estimate:',
    `  Taxable Income: ${money(taxEstimate.taxableIncome)}`,
    `  Estimated Tax: ${money(taxEstimate.taxAmount)}`,
    `  Effective Rate: ${percent(taxEstimate.effectiveRate)}`,
    `  Marginal Rate: ${percent(taxEstimate.marginalRate)}`,
    `  Deductions: ${taxEstimate.deductionsApplied.join(', ') || 'none'}`
  );

  if (report.budgetAdvice.length > 0) {
    lines.push('', 'Budget Advice:', ...bulletList(report.budgetAdvice));
  }

  lines.push('', 'Recommendations:', ...bulletList(report.recommendations));

  if (report.goalGuidance.length > 0) {
    lines.push('', 'Goal Guidance:', ...bulletList(report.goalGuidance));
  }

  lines.push('', 'Tax Tips:', ...bulletList(report.taxTips));
  return lines;
}
