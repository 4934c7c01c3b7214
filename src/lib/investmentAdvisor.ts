/**
 * Investment Advisor
 *
 * Rule-based recommendations from the active risk profile and the period's
 * savings ratio. The (risk tolerance x savings bucket) decision table is
 * data, loaded from `src/data/recommendations.json` and validated on load.
 */

import { z } from 'zod';
import type { InvestmentProfile, RiskTolerance, SavingsBucket } from '@/types/finance';
import recommendationData from '@/data/recommendations.json';
import { calculateSavingsRatio, classifySavingsBucket } from './calculators';
import { NoProfileSetError } from './errors';
import { assertValidAmount } from './ledger';

const adviceListSchema = z.array(z.string().min(1)).min(1);

const bucketTableSchema = z.object({
  deficit: adviceListSchema,
  low: adviceListSchema,
  moderate: adviceListSchema,
  high: adviceListSchema,
});

export const recommendationTableSchema = z.object({
  low: bucketTableSchema,
  medium: bucketTableSchema,
  high: bucketTableSchema,
});

export type RecommendationTable = z.infer<typeof recommendationTableSchema>;

export const DEFAULT_RECOMMENDATION_TABLE: RecommendationTable =
  recommendationTableSchema.parse(recommendationData);

// Goal keywords are matched as whole words (optionally plural), case-insensitively
const GOAL_GUIDANCE: { keywords: string[]; guidance: string }[] = [
  {
    keywords: ['retire', 'retirement', 'pension'],
    guidance: 'For retirement, consider tax-advantaged accounts like 401(k)s or IRAs.',
  },
  {
    keywords: ['short_term', 'short-term', 'short term', 'vacation', 'car'],
    guidance: 'For short-term goals, focus on liquid and low-risk investments.',
  },
  {
    keywords: ['house', 'home', 'down payment', 'mortgage'],
    guidance: 'For a home purchase, keep the down payment in savings or short-term bonds.',
  },
  {
    keywords: ['education', 'college', 'tuition', 'school'],
    guidance: 'For education costs, look into dedicated education savings plans.',
  },
  {
    keywords: ['emergency'],
    guidance: 'Aim to hold three to six months of expenses in an emergency fund.',
  },
];

const GOAL_PATTERNS = GOAL_GUIDANCE.map(({ keywords, guidance }) => ({
  patterns: keywords.map(keyword => new RegExp(`\\b${keyword}s?\\b`, 'i')),
  guidance,
}));

export class InvestmentAdvisor {
  private readonly table: RecommendationTable;

  constructor(table: RecommendationTable = DEFAULT_RECOMMENDATION_TABLE) {
    this.table = recommendationTableSchema.parse(table);
  }

  savingsRatio(totalIncome: number, totalExpenses: number): number {
    return calculateSavingsRatio(totalIncome, totalExpenses);
  }

  savingsBucket(savingsRatio: number): SavingsBucket {
    return classifySavingsBucket(savingsRatio);
  }

  /**
   * Fixed, ordered recommendations for the profile's risk tolerance and the
   * period's savings bucket
   */
  recommend(
    profile: InvestmentProfile | null | undefined,
    totalIncome: number,
    totalExpenses: number
  ): string[] {
    if (!profile) {
      throw new NoProfileSetError();
    }
    assertValidAmount(totalIncome);
    assertValidAmount(totalExpenses);

    const bucket = this.savingsBucket(this.savingsRatio(totalIncome, totalExpenses));
    return this.lookup(profile.riskTolerance, bucket);
  }

  lookup(riskTolerance: RiskTolerance, bucket: SavingsBucket): string[] {
    return [...this.table[riskTolerance][bucket]];
  }

  /**
   * Hints matched from the free-form goals text, in a fixed order
   */
  goalGuidance(profile: InvestmentProfile | null | undefined): string[] {
    if (!profile) return [];
    const { goals } = profile;
    return GOAL_PATTERNS
      .filter(entry => entry.patterns.some(pattern => pattern.test(goals)))
      .map(entry => entry.guidance);
  }
}
