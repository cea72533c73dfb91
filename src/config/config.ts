/// <reference types="node" />
import { z } from 'zod';
import type { DispatchConfig, PricingRates } from '../models/types';
import { ValidationError } from '../models/errors';

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  // Expanding-radius search: 1 km, 2 km, ... up to 20 km
  initialRadiusKm: 1,
  radiusIncrementKm: 1,
  maxRadiusKm: 20,

  // Scheduler wakes every 10 seconds
  dispatchIntervalMs: 10_000,

  // Eligibility rules
  sameRiderCooldownMinutes: 30,
  maxConsecutiveCancellations: 2,
  historyCapacity: 10,

  pricingConfigKey: 'default'
};

/**
 * Rates seeded under the default pricing key when none exist yet.
 */
export const DEFAULT_PRICING: PricingRates = {
  baseFare: 20,
  perKmRate: 10,
  perMinuteRate: 2,
  perWaitMinuteRate: 1
};

// =============================================================================
// VALIDATION
// =============================================================================

export const DispatchConfigSchema = z.object({
  initialRadiusKm: z.number().positive(),
  radiusIncrementKm: z.number().positive(),
  maxRadiusKm: z.number().positive(),
  dispatchIntervalMs: z.number().int().positive(),
  sameRiderCooldownMinutes: z.number().min(0),
  maxConsecutiveCancellations: z.number().int().min(1),
  historyCapacity: z.number().int().min(1),
  pricingConfigKey: z.string().min(1)
})
  .refine(c => c.maxRadiusKm >= c.initialRadiusKm, {
    message: 'maxRadiusKm must be at least initialRadiusKm',
    path: ['maxRadiusKm']
  })
  .refine(c => c.historyCapacity >= c.maxConsecutiveCancellations, {
    message: 'historyCapacity must hold at least maxConsecutiveCancellations outcomes',
    path: ['historyCapacity']
  });

/**
 * Merge one-off overrides into the defaults and validate the result.
 * Undefined override values leave the default in place.
 */
export function resolveDispatchConfig(
  overrides: Partial<DispatchConfig> = {},
  base: DispatchConfig = DEFAULT_DISPATCH_CONFIG
): DispatchConfig {
  const merged: DispatchConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  const parsed = DispatchConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw ValidationError.fromIssues(parsed.error.issues);
  }
  return parsed.data;
}

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

export interface EnvironmentConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  allowedOrigins: string[];
  dispatch: DispatchConfig;
  pricing: PricingRates;
  features: {
    backgroundDispatch: boolean;
  };
}

const NodeEnvSchema = z.enum(['development', 'production', 'test']).catch('development');

export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    port: parseInt(env.PORT || '3001', 10),
    nodeEnv: NodeEnvSchema.parse(env.NODE_ENV),
    allowedOrigins: (env.ALLOWED_ORIGINS || 'http://localhost:5173').split(','),
    dispatch: resolveDispatchConfig({
      dispatchIntervalMs: readNumber(env.DISPATCH_INTERVAL_MS),
      initialRadiusKm: readNumber(env.INITIAL_RADIUS_KM),
      radiusIncrementKm: readNumber(env.RADIUS_INCREMENT_KM),
      maxRadiusKm: readNumber(env.MAX_RADIUS_KM),
      sameRiderCooldownMinutes: readNumber(env.SAME_RIDER_COOLDOWN_MINUTES),
      pricingConfigKey: env.PRICING_CONFIG_KEY || undefined
    }),
    pricing: {
      baseFare: readNumber(env.PRICING_BASE_FARE) ?? DEFAULT_PRICING.baseFare,
      perKmRate: readNumber(env.PRICING_PER_KM) ?? DEFAULT_PRICING.perKmRate,
      perMinuteRate: readNumber(env.PRICING_PER_MINUTE) ?? DEFAULT_PRICING.perMinuteRate,
      perWaitMinuteRate: readNumber(env.PRICING_PER_WAIT_MINUTE) ?? DEFAULT_PRICING.perWaitMinuteRate
    },
    features: {
      backgroundDispatch: env.ENABLE_BACKGROUND_DISPATCH !== 'false'
    }
  };
}

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
