/**
 * Driver History
 *
 * Two bounded structures answer the eligibility questions without scanning
 * past rides:
 * - a ring of the driver's last N outcomes (newest last)
 * - an index of the last completion per rider, pruned to the cooldown window
 *
 * All helpers are pure: they return a new history and never touch the input.
 */

import { RideOutcome, type DriverHistory, type RideOutcomeRecord } from '../models/types';

export function emptyHistory(): DriverHistory {
  return {
    recentOutcomes: [],
    lastCompletionByRider: riderIndex(),
    completedRides: 0,
    cancelledRides: 0
  };
}

export interface HistoryLimits {
  capacity: number;
  cooldownMinutes: number;
}

/**
 * Append an outcome, dropping the oldest entries beyond `capacity` and any
 * rider completions that can no longer block a match.
 */
export function recordOutcome(
  history: DriverHistory,
  record: RideOutcomeRecord,
  limits: HistoryLimits
): DriverHistory {
  const recentOutcomes = [...history.recentOutcomes, { ...record }];
  while (recentOutcomes.length > limits.capacity) {
    recentOutcomes.shift();
  }

  const lastCompletionByRider = riderIndex();
  const horizon = record.at.getTime() - limits.cooldownMinutes * 60000;
  for (const [riderId, completedAt] of Object.entries(history.lastCompletionByRider)) {
    if (completedAt.getTime() > horizon) {
      lastCompletionByRider[riderId] = completedAt;
    }
  }

  const completed = record.outcome === RideOutcome.COMPLETED;
  if (completed) {
    lastCompletionByRider[record.riderId] = record.at;
  }

  return {
    recentOutcomes,
    lastCompletionByRider,
    completedRides: history.completedRides + (completed ? 1 : 0),
    cancelledRides: history.cancelledRides + (completed ? 0 : 1)
  };
}

/**
 * The `count` most recent outcomes, newest first.
 */
export function latestOutcomes(history: DriverHistory, count: number): RideOutcome[] {
  return history.recentOutcomes
    .slice(-count)
    .reverse()
    .map(r => r.outcome);
}

export function lastCompletionWith(history: DriverHistory, riderId: string): Date | null {
  // Snapshots are plain objects again, so inherited keys must be skipped
  if (!Object.hasOwn(history.lastCompletionByRider, riderId)) return null;
  return history.lastCompletionByRider[riderId];
}

/**
 * Rider ids are client-supplied; a prototype-less object keeps ids such as
 * `constructor` or `__proto__` as ordinary keys.
 */
function riderIndex(): Record<string, Date> {
  return Object.create(null);
}
