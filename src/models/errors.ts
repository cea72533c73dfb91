/**
 * Error types surfaced to callers of the ride service and the HTTP API.
 *
 * Every error carries a stable `code` that ends up in the `error.code`
 * field of a failed API response.
 */

import type { ZodIssue } from 'zod';
import type { RideStatus } from './types';

export abstract class DispatchServiceError extends Error {
  abstract readonly code: string;

  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A lifecycle command was issued against a ride whose current status
 * forbids it (e.g. cancelling a started ride).
 */
export class InvalidTransitionError extends DispatchServiceError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly rideId: string,
    readonly action: string,
    readonly currentStatus: RideStatus,
    readonly allowedFrom: readonly RideStatus[]
  ) {
    super(
      `Cannot ${action} ride ${rideId}: status is ${currentStatus}, expected one of ${allowedFrom.join(', ')}`,
      { currentStatus, allowedFrom }
    );
  }
}

/**
 * A guarded write lost against a concurrent writer.
 */
export class ConflictError extends DispatchServiceError {
  readonly code = 'CONFLICT';
}

/**
 * No pricing config exists for the key used at completion time.
 * The ride is left in `started`.
 */
export class ConfigurationMissingError extends DispatchServiceError {
  readonly code = 'CONFIGURATION_MISSING';

  constructor(readonly pricingKey: string) {
    super(`No pricing configuration found for key "${pricingKey}"`);
  }
}

export class NotFoundError extends DispatchServiceError {
  readonly code = 'NOT_FOUND';

  constructor(readonly entity: 'rider' | 'driver' | 'ride' | 'pricing', readonly id: string) {
    super(`${entity[0].toUpperCase()}${entity.slice(1)} ${id} not found`);
  }
}

export class ValidationError extends DispatchServiceError {
  readonly code = 'VALIDATION_ERROR';

  static fromIssues(issues: ZodIssue[]): ValidationError {
    const message = issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    return new ValidationError(message, issues);
  }
}
