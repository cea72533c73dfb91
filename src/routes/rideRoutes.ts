/**
 * API Routes for Ride Dispatch
 *
 * GET  /api/health                  - Health check
 * GET  /api/riders                  - List riders
 * POST /api/riders                  - Register a rider
 * GET  /api/drivers                 - List drivers
 * POST /api/drivers                 - Register a driver
 * GET  /api/drivers/:driverId       - Get one driver (with history)
 * GET  /api/rides?status=           - List rides, optionally by status
 * GET  /api/rides/pending           - Rides awaiting a driver
 * GET  /api/rides/:rideId           - Get one ride
 * POST /api/rides                   - Request a ride
 * POST /api/rides/:rideId/arrive    - Driver arrived at pickup
 * POST /api/rides/:rideId/start     - Ride started
 * POST /api/rides/:rideId/end       - Ride completed, fare computed
 * POST /api/rides/:rideId/cancel    - Cancel a ride that has not started
 * GET  /api/metrics                 - Aggregates and dispatch stats
 * GET  /api/pricing                - List pricing configs
 * GET  /api/pricing/:key            - Get a pricing config
 * PUT  /api/pricing/:key            - Create or replace a pricing config
 * POST /api/dispatch/run            - Run one dispatch pass now
 */

import { Router, type Request, type Response } from 'express';
import type { ZodTypeAny, output } from 'zod';
import {
  CancelRideSchema,
  NewDriverSchema,
  NewRideSchema,
  NewRiderSchema,
  PricingRatesSchema,
  RideStatusQuerySchema,
  type ApiErrorResponse
} from '../models/types';
import { DispatchServiceError, NotFoundError, ValidationError } from '../models/errors';
import type { EntityStore } from '../store/EntityStore';
import type { RideService } from '../services/RideService';
import type { MetricsService } from '../services/MetricsService';
import type { DispatchScheduler } from '../scheduler/DispatchScheduler';

export interface RideRouteDependencies {
  store: EntityStore;
  rides: RideService;
  metrics: MetricsService;
  scheduler: DispatchScheduler;
  /** Send the message of unexpected errors to the client (development) */
  exposeInternalErrors?: boolean;
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  CONFLICT: 409,
  CONFIGURATION_MISSING: 422
};

/**
 * HTTP status and body for an error thrown while handling a request.
 */
export function toErrorResponse(
  error: unknown,
  exposeInternalErrors = false
): { status: number; body: ApiErrorResponse } {
  if (error instanceof DispatchServiceError) {
    return {
      status: STATUS_BY_CODE[error.code] ?? 500,
      body: {
        success: false,
        error: { code: error.code, message: error.message, details: error.details }
      }
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    status: 500,
    body: {
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: exposeInternalErrors ? message : 'Internal server error'
      }
    }
  };
}

function parseWith<S extends ZodTypeAny>(schema: S, input: unknown): output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromIssues(parsed.error.issues);
  }
  return parsed.data;
}

// =============================================================================
// ROUTER
// =============================================================================

export function createRideRoutes(deps: RideRouteDependencies): Router {
  const { store, rides, metrics, scheduler } = deps;
  const router = Router();

  const route = (handler: (req: Request, res: Response) => Promise<void>) =>
    (req: Request, res: Response): void => {
      handler(req, res).catch((error: unknown) => {
        const { status, body } = toErrorResponse(error, deps.exposeInternalErrors);
        if (status === 500) {
          console.error(`[API] ${req.method} ${req.path} failed:`, error);
        }
        res.status(status).json(body);
      });
    };

  // ---------------------------------------------------------------------------
  // HEALTH
  // ---------------------------------------------------------------------------

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: '1.0.0',
      dispatcher: scheduler.isRunning() ? 'running' : 'stopped',
      timestamp: new Date().toISOString()
    });
  });

  // ---------------------------------------------------------------------------
  // RIDERS & DRIVERS
  // ---------------------------------------------------------------------------

  router.get('/riders', route(async (req, res) => {
    res.json({ success: true, riders: await store.listRiders() });
  }));

  router.post('/riders', route(async (req, res) => {
    const input = parseWith(NewRiderSchema, req.body);
    res.status(201).json({ success: true, rider: await rides.registerRider(input) });
  }));

  router.get('/drivers', route(async (req, res) => {
    res.json({ success: true, drivers: await store.listDrivers() });
  }));

  router.post('/drivers', route(async (req, res) => {
    const input = parseWith(NewDriverSchema, req.body);
    res.status(201).json({ success: true, driver: await rides.registerDriver(input) });
  }));

  router.get('/drivers/:driverId', route(async (req, res) => {
    const driver = await store.getDriver(req.params.driverId);
    if (!driver) throw new NotFoundError('driver', req.params.driverId);
    res.json({ success: true, driver });
  }));

  // ---------------------------------------------------------------------------
  // RIDES
  // ---------------------------------------------------------------------------

  router.get('/rides', route(async (req, res) => {
    const { status } = parseWith(RideStatusQuerySchema, req.query);
    res.json({ success: true, rides: await store.listRides({ status }) });
  }));

  // Registered before /rides/:rideId so "pending" is not taken for an id
  router.get('/rides/pending', route(async (req, res) => {
    res.json({ success: true, rides: await store.listPendingRides() });
  }));

  router.get('/rides/:rideId', route(async (req, res) => {
    const ride = await store.getRide(req.params.rideId);
    if (!ride) throw new NotFoundError('ride', req.params.rideId);
    res.json({ success: true, ride });
  }));

  router.post('/rides', route(async (req, res) => {
    const input = parseWith(NewRideSchema, req.body);
    res.status(201).json({ success: true, ride: await rides.requestRide(input) });
  }));

  router.post('/rides/:rideId/arrive', route(async (req, res) => {
    res.json({ success: true, ride: await rides.arrive(req.params.rideId) });
  }));

  router.post('/rides/:rideId/start', route(async (req, res) => {
    res.json({ success: true, ride: await rides.start(req.params.rideId) });
  }));

  router.post('/rides/:rideId/end', route(async (req, res) => {
    res.json({ success: true, ride: await rides.end(req.params.rideId) });
  }));

  router.post('/rides/:rideId/cancel', route(async (req, res) => {
    const { cancelledBy } = parseWith(CancelRideSchema, req.body ?? {});
    res.json({ success: true, ride: await rides.cancel(req.params.rideId, cancelledBy) });
  }));

  // ---------------------------------------------------------------------------
  // METRICS, PRICING, DISPATCH
  // ---------------------------------------------------------------------------

  router.get('/metrics', route(async (req, res) => {
    res.json({ success: true, metrics: await metrics.summarize() });
  }));

  router.get('/pricing', route(async (req, res) => {
    res.json({ success: true, pricing: await store.listPricingConfigs() });
  }));

  router.get('/pricing/:key', route(async (req, res) => {
    res.json({ success: true, pricing: await rides.getPricing(req.params.key) });
  }));

  router.put('/pricing/:key', route(async (req, res) => {
    const rates = parseWith(PricingRatesSchema, req.body);
    res.json({ success: true, pricing: await rides.savePricing(req.params.key, rates) });
  }));

  router.post('/dispatch/run', route(async (req, res) => {
    const summary = await scheduler.runPass();
    if (!summary) {
      res.status(409).json({
        success: false,
        error: { code: 'CONFLICT', message: 'A dispatch pass is already running or the pass failed' }
      });
      return;
    }
    res.json({ success: true, summary });
  }));

  return router;
}
