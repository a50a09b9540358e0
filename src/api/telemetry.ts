/**
 * Telemetry routes.
 *
 * GET /telemetry — Query delivered events
 * GET /telemetry/stats — Emitter counters and core status
 * GET /telemetry/export — JSON export document of every delivered event
 *
 * Each handler flushes the emitter first so a read after a write sees it.
 */

import { Router } from 'express';
import { TELEMETRY_EVENT_KINDS, TelemetryEventKind } from '../domain/telemetry';
import { CompatContext } from '../context';
import { exportEventsJson } from '../telemetry/export';
import { queryInt, queryString, sendError } from './middleware';

const MAX_PAGE_SIZE = 1000;

function parseKinds(value: string | undefined): TelemetryEventKind[] | undefined {
  if (!value) return undefined;
  const kinds: TelemetryEventKind[] = [];
  for (const part of value.split(',')) {
    const kind = TELEMETRY_EVENT_KINDS.find((k) => k === part.trim());
    if (kind) kinds.push(kind);
  }
  return kinds;
}

export function createTelemetryRoutes(ctx: CompatContext): Router {
  const router = Router();

  /**
   * GET /telemetry?traceId=&componentId=&kinds=a,b&limit=&offset=
   */
  router.get('/telemetry', async (req, res) => {
    try {
      await ctx.emitter.flush();
      const filter = {
        traceId: queryString(req.query.traceId),
        componentId: queryString(req.query.componentId),
        kinds: parseKinds(queryString(req.query.kinds)),
      };
      const total = ctx.auditSink.query(filter).length;
      const events = ctx.auditSink.query({
        ...filter,
        limit: queryInt(req.query.limit, 100, MAX_PAGE_SIZE),
        offset: queryInt(req.query.offset, 0, Number.MAX_SAFE_INTEGER),
      });
      res.json({ events, total });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/telemetry/stats', async (_req, res) => {
    try {
      await ctx.emitter.flush();
      res.json(ctx.getStatus());
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/telemetry/export', async (_req, res) => {
    try {
      await ctx.emitter.flush();
      res.type('application/json').send(exportEventsJson(ctx.auditSink.all()));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
