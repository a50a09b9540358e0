/**
 * Express server configuration.
 *
 * Assembles the HTTP surface over one CompatContext: graph validation,
 * live component instances with hot swap, and the telemetry audit trail.
 */

import express from 'express';
import { CompatContext, createCompatContext } from './context';
import { errorHandler } from './api/middleware';
import { createValidationRoutes } from './api/validation';
import { createComponentRoutes } from './api/components';
import { createTelemetryRoutes } from './api/telemetry';
import { TELEMETRY_SCHEMA_VERSION } from './domain/telemetry';

export const SERVICE_VERSION = '0.1.0';

const startTime = Date.now();

/** Routes shared by the versioned and unversioned prefixes. */
function createApiRouter(ctx: CompatContext): express.Router {
  const router = express.Router();
  router.use('/', createValidationRoutes(ctx.validator));
  router.use('/', createComponentRoutes(ctx.engine, ctx.activate));
  router.use('/', createTelemetryRoutes(ctx));
  return router;
}

/** Create and configure the Express application. */
export function createApp(context?: CompatContext): express.Application {
  const ctx = context ?? createCompatContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVICE_VERSION,
      telemetrySchemaVersion: TELEMETRY_SCHEMA_VERSION,
      uptimeMs: Date.now() - startTime,
      swapsInFlight: ctx.engine.swapsInFlight().length,
    });
  });

  app.use('/api/v1', createApiRouter(ctx));
  app.use('/api', createApiRouter(ctx));

  app.use(errorHandler);

  return app;
}
