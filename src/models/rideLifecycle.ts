import { RideStatus, type CancellationSource, type FareBreakdown } from './types';

// =============================================================================
// TRANSITION TABLE
// =============================================================================

export const VALID_TRANSITIONS: Record<RideStatus, readonly RideStatus[]> = {
  [RideStatus.CREATE_RIDE]: [RideStatus.ASSIGNED, RideStatus.CANCELLED],
  [RideStatus.ASSIGNED]: [RideStatus.DRIVER_ARRIVED, RideStatus.CANCELLED],
  [RideStatus.DRIVER_ARRIVED]: [RideStatus.STARTED, RideStatus.CANCELLED],
  [RideStatus.STARTED]: [RideStatus.COMPLETED],
  [RideStatus.COMPLETED]: [],
  [RideStatus.CANCELLED]: []
};

/**
 * Externally triggered lifecycle transitions. Assignment is not listed here:
 * it goes through `tryAssign` because it binds a driver as well.
 */
export type RideTransition =
  | { type: 'arrive'; at: Date }
  | { type: 'start'; at: Date }
  | { type: 'complete'; at: Date; expectedVersion: number; fare: FareBreakdown }
  | { type: 'cancel'; at: Date; cancelledBy: CancellationSource };

export type RideTransitionType = RideTransition['type'];

const TARGET_STATUS: Record<RideTransitionType, RideStatus> = {
  arrive: RideStatus.DRIVER_ARRIVED,
  start: RideStatus.STARTED,
  complete: RideStatus.COMPLETED,
  cancel: RideStatus.CANCELLED
};

/**
 * Statuses from which the given transition may be applied.
 */
export function allowedFromStatuses(type: RideTransitionType): RideStatus[] {
  const target = TARGET_STATUS[type];
  return Object.values(RideStatus).filter(from => canTransition(from, target));
}

export function canTransition(from: RideStatus, to: RideStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
