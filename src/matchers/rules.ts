/**
 * Eligibility Rule Implementations
 *
 * Every rule here is a HARD constraint: a driver failing any of them is
 * skipped for the ride, whatever the distance.
 */

import { BaseRule, type RuleContext } from './BaseRule';
import {
  DriverStatus,
  EligibilityReason,
  RideOutcome,
  type Driver,
  type Ride
} from '../models/types';
import { lastCompletionWith, latestOutcomes } from '../store/driverHistory';

// =============================================================================
// IDLE DRIVER RULE
// =============================================================================
/**
 * A driver already bound to a ride (assigned or on a trip) cannot take
 * another one.
 */
export class IdleDriverRule extends BaseRule {
  readonly priority = 0;
  readonly failureReason = EligibilityReason.DRIVER_NOT_IDLE;

  passes(_ride: Ride, driver: Driver, _context: RuleContext): boolean {
    return driver.status === DriverStatus.IDLE && driver.activeRideId === null;
  }
}

// =============================================================================
// SAME RIDER COOLDOWN RULE
// =============================================================================
/**
 * A driver who completed a ride with this rider less than
 * `sameRiderCooldownMinutes` ago is not offered the rider again.
 *
 * With a completion at T the driver is blocked for now in (T, T + window)
 * and eligible again from T + window on.
 */
export class SameRiderCooldownRule extends BaseRule {
  readonly priority = 1;
  readonly failureReason = EligibilityReason.RECENT_RIDE_WITH_RIDER;

  passes(ride: Ride, driver: Driver, context: RuleContext): boolean {
    const completedAt = lastCompletionWith(driver.history, ride.riderId);
    if (!completedAt) return true;

    const elapsed = this.minutesSince(completedAt, context);
    return elapsed <= 0 || elapsed >= context.config.sameRiderCooldownMinutes;
  }
}

// =============================================================================
// RECENT CANCELLATION RULE
// =============================================================================
/**
 * A driver whose most recent outcomes are all driver cancellations is
 * skipped. One completed ride among them restores eligibility.
 */
export class RecentCancellationRule extends BaseRule {
  readonly priority = 2;
  readonly failureReason = EligibilityReason.RECENT_CANCELLATIONS;

  passes(_ride: Ride, driver: Driver, context: RuleContext): boolean {
    const window = context.config.maxConsecutiveCancellations;
    const latest = latestOutcomes(driver.history, window);

    if (latest.length < window) return true;
    return !latest.every(outcome => outcome === RideOutcome.CANCELLED);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create the default rule set, sorted by priority.
 */
export function createRules(): BaseRule[] {
  return [
    new IdleDriverRule(),
    new SameRiderCooldownRule(),
    new RecentCancellationRule()
  ].sort((a, b) => a.priority - b.priority);
}
