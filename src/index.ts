import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { createRideRoutes } from './routes/rideRoutes';
import { loadEnvironmentConfig, type EnvironmentConfig } from './config/config';
import { InMemoryEntityStore } from './store/InMemoryEntityStore';
import { AllocationDispatcher } from './matchers/AllocationDispatcher';
import { DispatchScheduler } from './scheduler/DispatchScheduler';
import { RideService } from './services/RideService';
import { MetricsService } from './services/MetricsService';

export interface DispatchService {
  app: express.Express;
  rides: RideService;
  scheduler: DispatchScheduler;
}

/**
 * Wire the store, dispatcher, scheduler and HTTP layer together.
 * Nothing is started; see `main`.
 */
export function createDispatchService(envConfig: EnvironmentConfig): DispatchService {
  const store = new InMemoryEntityStore({ config: envConfig.dispatch });
  const dispatcher = new AllocationDispatcher(store, { config: envConfig.dispatch });
  const scheduler = new DispatchScheduler(dispatcher, envConfig.dispatch);
  const rides = new RideService(store, { config: envConfig.dispatch });
  const metrics = new MetricsService(store, scheduler);

  const app = express();

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(cors({
    origin: envConfig.allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true
  }));

  app.use(express.json({ limit: '1mb' }));

  // Request logging (development)
  if (envConfig.nodeEnv === 'development') {
    app.use((req, res, next) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/api', createRideRoutes({
    store,
    rides,
    metrics,
    scheduler,
    exposeInternalErrors: envConfig.nodeEnv === 'development'
  }));

  app.get('/', (req, res) => {
    res.json({
      name: 'Ride Dispatch Service',
      version: '1.0.0',
      description: 'Expanding-radius driver allocation with guarded ride lifecycle',
      endpoints: {
        health: 'GET /api/health',
        riders: 'GET|POST /api/riders',
        drivers: 'GET|POST /api/drivers',
        rides: 'GET|POST /api/rides',
        pending: 'GET /api/rides/pending',
        lifecycle: 'POST /api/rides/:rideId/(arrive|start|end|cancel)',
        metrics: 'GET /api/metrics',
        pricing: 'GET|PUT /api/pricing/:key',
        dispatch: 'POST /api/dispatch/run'
      }
    });
  });

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`
      }
    });
  });

  // Malformed JSON bodies and anything else thrown outside a route handler
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' }
      });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: envConfig.nodeEnv === 'development' ? err.message : 'Internal server error'
      }
    });
  });

  return { app, rides, scheduler };
}

// =============================================================================
// START SERVER
// =============================================================================

async function main(): Promise<void> {
  dotenv.config();
  const envConfig = loadEnvironmentConfig();
  const { app, rides, scheduler } = createDispatchService(envConfig);

  await rides.seedPricing(envConfig.pricing);

  if (envConfig.features.backgroundDispatch) {
    scheduler.start();
  } else {
    console.warn('Background dispatch disabled; use POST /api/dispatch/run');
  }

  const PORT = envConfig.port;
  const server = app.listen(PORT, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════════╗
║                    RIDE DISPATCH SERVICE                      ║
╠═══════════════════════════════════════════════════════════════╣
║  Status:      Running                                         ║
║  Port:        ${PORT.toString().padEnd(47)}║
║  Environment: ${envConfig.nodeEnv.padEnd(47)}║
║  Interval:    ${`${envConfig.dispatch.dispatchIntervalMs} ms`.padEnd(47)}║
╚═══════════════════════════════════════════════════════════════╝
    `);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    scheduler.stop()
      .then(() => server.close())
      .catch((error: unknown) => console.error('Shutdown failed:', error));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch(error => {
    console.error('Failed to start ride dispatch service:', error);
    process.exit(1);
  });
}
