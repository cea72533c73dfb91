import { EligibilityReason, type DispatchConfig, type Driver, type Ride } from '../models/types';
import { DEFAULT_DISPATCH_CONFIG } from '../config/config';
import type { BaseRule, RuleContext } from './BaseRule';
import { createRules } from './rules';

export interface EligibilityVerdict {
  eligible: boolean;
  reason: EligibilityReason;
}

/**
 * Per-reason rejection counts for one batch of candidates.
 */
export type ExclusionStats = Record<Exclude<EligibilityReason, EligibilityReason.ELIGIBLE>, number>;

export function emptyExclusionStats(): ExclusionStats {
  return {
    [EligibilityReason.DRIVER_NOT_IDLE]: 0,
    [EligibilityReason.RECENT_RIDE_WITH_RIDER]: 0,
    [EligibilityReason.RECENT_CANCELLATIONS]: 0
  };
}

/**
 * Runs the rule chain for a ride/driver pair. The first failing rule (by
 * priority) names the reason; all rules must pass for a driver to be
 * eligible.
 */
export class EligibilityFilter {
  private readonly rules: BaseRule[];
  private readonly config: DispatchConfig;

  constructor(config: DispatchConfig = DEFAULT_DISPATCH_CONFIG, rules: BaseRule[] = createRules()) {
    this.config = config;
    this.rules = [...rules].sort((a, b) => a.priority - b.priority);
  }

  evaluate(ride: Ride, driver: Driver, now: Date): EligibilityVerdict {
    const context: RuleContext = { now, config: this.config };

    for (const rule of this.rules) {
      if (!rule.passes(ride, driver, context)) {
        return { eligible: false, reason: rule.failureReason };
      }
    }
    return { eligible: true, reason: EligibilityReason.ELIGIBLE };
  }

  /**
   * Split candidates into the eligible ones (order preserved) and the
   * rejection counts per reason.
   */
  partition<T extends { driver: Driver }>(
    ride: Ride,
    candidates: T[],
    now: Date
  ): { eligible: T[]; excluded: ExclusionStats } {
    const eligible: T[] = [];
    const excluded = emptyExclusionStats();

    for (const candidate of candidates) {
      const verdict = this.evaluate(ride, candidate.driver, now);
      if (verdict.reason === EligibilityReason.ELIGIBLE) {
        eligible.push(candidate);
      } else {
        excluded[verdict.reason] += 1;
      }
    }

    return { eligible, excluded };
  }
}
