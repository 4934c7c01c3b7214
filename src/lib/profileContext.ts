/**
 * Holds the single active investment profile. Passed explicitly to the
 * advisor and report generator instead of living in module state.
 */

import type { InvestmentProfile, RiskTolerance } from '@/types/finance';
import { InvalidRiskToleranceError } from './errors';

export const RISK_TOLERANCES: readonly RiskTolerance[] = ['low', 'medium', 'high'];

export function isRiskTolerance(value: unknown): value is RiskTolerance {
  return typeof value === 'string' && (RISK_TOLERANCES as readonly string[]).includes(value);
}

export class ProfileContext {
  private profile: InvestmentProfile | null = null;

  /**
   * Replace the active profile entirely
   */
  setProfile(riskTolerance: string, goals: string): InvestmentProfile {
    const normalized = riskTolerance.trim().toLowerCase();
    if (!isRiskTolerance(normalized)) {
      throw new InvalidRiskToleranceError(riskTolerance);
    }
    this.profile = { riskTolerance: normalized, goals };
    return { ...this.profile };
  }

  getProfile(): InvestmentProfile | null {
    return this.profile ? { ...this.profile } : null;
  }

  clear(): void {
    this.profile = null;
  }
}
