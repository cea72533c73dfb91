import { describe, it, expect } from 'vitest';
import {
  DEFAULT_DISPATCH_CONFIG,
  DEFAULT_PRICING,
  loadEnvironmentConfig,
  resolveDispatchConfig
} from '../src/config/config';
import { ValidationError } from '../src/models/errors';

describe('Configuration', () => {
  describe('resolveDispatchConfig', () => {
    it('should return the defaults when nothing is overridden', () => {
      expect(resolveDispatchConfig()).toEqual(DEFAULT_DISPATCH_CONFIG);
    });

    it('should apply defined overrides and ignore undefined ones', () => {
      const config = resolveDispatchConfig({ maxRadiusKm: 10, initialRadiusKm: undefined });
      expect(config.maxRadiusKm).toBe(10);
      expect(config.initialRadiusKm).toBe(1);
    });

    it('should reject a ceiling below the initial radius', () => {
      expect(() => resolveDispatchConfig({ initialRadiusKm: 5, maxRadiusKm: 2 }))
        .toThrow(ValidationError);
    });

    it('should reject a non-positive radius step', () => {
      expect(() => resolveDispatchConfig({ radiusIncrementKm: 0 })).toThrow(ValidationError);
    });

    it('should reject a history too short for the cancellation window', () => {
      expect(() => resolveDispatchConfig({ historyCapacity: 1, maxConsecutiveCancellations: 2 }))
        .toThrow(/historyCapacity/);
    });
  });

  describe('loadEnvironmentConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
      const config = loadEnvironmentConfig({});

      expect(config.port).toBe(3001);
      expect(config.nodeEnv).toBe('development');
      expect(config.dispatch).toEqual(DEFAULT_DISPATCH_CONFIG);
      expect(config.pricing).toEqual(DEFAULT_PRICING);
      expect(config.features.backgroundDispatch).toBe(true);
    });

    it('should read dispatch and pricing overrides', () => {
      const config = loadEnvironmentConfig({
        PORT: '8080',
        NODE_ENV: 'production',
        ALLOWED_ORIGINS: 'https://a.example,https://b.example',
        DISPATCH_INTERVAL_MS: '5000',
        MAX_RADIUS_KM: '15',
        PRICING_BASE_FARE: '50',
        PRICING_PER_KM: 'not-a-number',
        ENABLE_BACKGROUND_DISPATCH: 'false'
      });

      expect(config.port).toBe(8080);
      expect(config.nodeEnv).toBe('production');
      expect(config.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
      expect(config.dispatch.dispatchIntervalMs).toBe(5000);
      expect(config.dispatch.maxRadiusKm).toBe(15);
      expect(config.pricing.baseFare).toBe(50);
      expect(config.pricing.perKmRate).toBe(DEFAULT_PRICING.perKmRate);
      expect(config.features.backgroundDispatch).toBe(false);
    });

    it('should treat an unknown NODE_ENV as development', () => {
      expect(loadEnvironmentConfig({ NODE_ENV: 'staging' }).nodeEnv).toBe('development');
    });
  });
});
