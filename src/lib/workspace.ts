/**
 * Finance workspace: one ledger, one set of budgets and the active profile,
 * plus conversion to and from the plain snapshot record the stores persist.
 */

import { z } from 'zod';
import type { BudgetAdviceRule, FinancialReport } from '@/types/finance';
import { BudgetTracker } from './budgetTracker';
import { FinanceError, InvalidSnapshotError } from './errors';
import { InvestmentAdvisor } from './investmentAdvisor';
import { Ledger } from './ledger';
import { ProfileContext } from './profileContext';
import { ReportGenerator } from './reportGenerator';
import { TaxEstimator } from './taxEstimator';

export const SNAPSHOT_VERSION = 1;

const transactionRecordSchema = z.object({
  id: z.string().min(1),
  amount: z.number(),
  category: z.string(),
  description: z.string(),
  type: z.enum(['income', 'expense']),
  date: z.string(),
});

const budgetRecordSchema = z.object({
  category: z.string(),
  limit: z.number(),
});

const profileRecordSchema = z.object({
  riskTolerance: z.string(),
  goals: z.string(),
});

export const workspaceSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  transactions: z.array(transactionRecordSchema),
  budgets: z.array(budgetRecordSchema),
  profile: profileRecordSchema.nullable(),
});

export type WorkspaceSnapshot = z.infer<typeof workspaceSnapshotSchema>;

export function emptySnapshot(): WorkspaceSnapshot {
  return { version: SNAPSHOT_VERSION, transactions: [], budgets: [], profile: null };
}

export interface WorkspaceOptions {
  taxEstimator?: TaxEstimator;
  advisor?: InvestmentAdvisor;
  budgetAdviceRules?: readonly BudgetAdviceRule[];
}

export class FinanceWorkspace {
  readonly ledger = new Ledger();
  readonly budgets = new BudgetTracker();
  readonly profiles = new ProfileContext();
  readonly taxEstimator: TaxEstimator;
  readonly advisor: InvestmentAdvisor;
  private readonly reportGenerator: ReportGenerator;

  constructor(options: WorkspaceOptions = {}) {
    this.taxEstimator = options.taxEstimator ?? new TaxEstimator();
    this.advisor = options.advisor ?? new InvestmentAdvisor();
    this.reportGenerator = new ReportGenerator(options.budgetAdviceRules);
  }

  report(year: number, month: number): FinancialReport {
    return this.reportGenerator.generate(
      this.ledger,
      this.budgets,
      this.taxEstimator,
      this.advisor,
      this.profiles.getProfile(),
      year,
      month
    );
  }

  toSnapshot(): WorkspaceSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      transactions: this.ledger.all().map(t => ({ ...t })),
      budgets: this.budgets.entries(),
      profile: this.profiles.getProfile(),
    };
  }

  /**
   * Rebuild a workspace from a stored record. Every record is replayed
   * through the public operations so restored data meets the same rules
   * as freshly entered data.
   */
  static fromSnapshot(raw: unknown, options: WorkspaceOptions = {}): FinanceWorkspace {
    const parsed = workspaceSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new InvalidSnapshotError(issues.join('; '));
    }

    const workspace = new FinanceWorkspace(options);
    const snapshot = parsed.data;

    try {
      for (const record of snapshot.transactions) {
        workspace.ledger.addTransaction(record);
      }
      for (const entry of snapshot.budgets) {
        workspace.budgets.setBudget(entry.category, entry.limit);
      }
      if (snapshot.profile) {
        workspace.profiles.setProfile(snapshot.profile.riskTolerance, snapshot.profile.goals);
      }
    } catch (error) {
      if (error instanceof FinanceError) {
        throw new InvalidSnapshotError(error.message);
      }
      throw error;
    }

    return workspace;
  }
}
