/**
 * Component instance routes.
 *
 * POST /components — Register a live instance
 * GET /components — List slots
 * GET /components/:componentId — Get one slot with its history
 * POST /components/:componentId/swap — Hot-swap the serving instance
 * POST /components/:componentId/retire — Retire the component
 */

import { Router } from 'express';
import { CompatError, apiError, swapNotFoundError } from '../domain/errors';
import { ActivationHook } from '../domain/swap';
import { HotSwapEngine } from '../engine/hot-swap-engine';
import { decodeComponent, decodeOptionalNonNegativeInt, requireRecord } from './decode';
import { getHttpStatus, sendError } from './middleware';

export function createComponentRoutes(engine: HotSwapEngine, activate: ActivationHook): Router {
  const router = Router();

  router.post('/components', (req, res) => {
    try {
      const body = requireRecord(req.body);
      const slot = engine.register(decodeComponent(body.component));
      res.status(201).json(slot);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/components', (_req, res) => {
    res.json({ components: engine.listSlots() });
  });

  router.get('/components/:componentId', (req, res) => {
    const slot = engine.getSlot(req.params.componentId);
    if (!slot) {
      sendError(res, new CompatError(swapNotFoundError(req.params.componentId)));
      return;
    }
    res.json(slot);
  });

  /**
   * POST /components/:componentId/swap
   * Body: { candidate: Component, drainTimeoutMs?: number }
   * A refused or rolled-back swap still answers with the full outcome,
   * under the status of its error code.
   */
  router.post('/components/:componentId/swap', async (req, res) => {
    try {
      const body = requireRecord(req.body);
      const candidate = decodeComponent(body.candidate, 'candidate');
      const drainTimeoutMs = decodeOptionalNonNegativeInt(body, 'drainTimeoutMs');
      const outcome = await engine.requestSwap(req.params.componentId, candidate, activate, {
        drainTimeoutMs,
      });
      res.status(outcome.error ? getHttpStatus(outcome.error) : 200).json(outcome);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/components/:componentId/retire', (req, res) => {
    const outcome = engine.retire(req.params.componentId);
    if (outcome.error) {
      res.status(getHttpStatus(outcome.error)).json({ ...apiError(outcome.error), outcome });
      return;
    }
    res.json(outcome);
  });

  return router;
}
