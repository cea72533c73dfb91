/**
 * BaseRule - Foundation for all eligibility rules
 *
 * Each rule answers ONE question about a ride/driver pair:
 * - IdleDriverRule: Is the driver free right now?
 * - SameRiderCooldownRule: Did this driver just drop off this rider?
 * - RecentCancellationRule: Has the driver cancelled their last rides?
 *
 * A rule either passes or fails with its own reason code. Rules are
 * evaluated in priority order and the first failure decides the reason
 * reported for the driver.
 */

import type { DispatchConfig, Driver, EligibilityReason, Ride } from '../models/types';

// =============================================================================
// RULE CONTEXT
// =============================================================================

/**
 * Shared context passed to every rule during one eligibility check.
 */
export interface RuleContext {
  /** The instant the check is made (wall clock or simulated clock) */
  now: Date;

  /** Dispatch tunables (cooldown window, cancellation limit, ...) */
  config: DispatchConfig;
}

// =============================================================================
// RULE INTERFACE
// =============================================================================

export interface IEligibilityRule {
  /** Priority level (lower = runs first) */
  readonly priority: number;

  /** Reason reported when this rule rejects a driver */
  readonly failureReason: EligibilityReason;

  /**
   * @returns true if the driver may serve the ride as far as this rule cares
   */
  passes(ride: Ride, driver: Driver, context: RuleContext): boolean;
}

// =============================================================================
// ABSTRACT BASE CLASS
// =============================================================================

export abstract class BaseRule implements IEligibilityRule {
  abstract readonly priority: number;
  abstract readonly failureReason: EligibilityReason;

  abstract passes(ride: Ride, driver: Driver, context: RuleContext): boolean;

  // ===========================================================================
  // UTILITY METHODS
  // ===========================================================================

  /**
   * Minutes elapsed from `since` to the context's `now`.
   * Negative when `since` lies in the future.
   */
  protected minutesSince(since: Date, context: RuleContext): number {
    return (context.now.getTime() - since.getTime()) / 60000;
  }
}
