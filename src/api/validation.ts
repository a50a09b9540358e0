/**
 * Graph validation route.
 *
 * POST /validate — Validate a component set and its dependency edges
 */

import { Router } from 'express';
import { isLinkable } from '../domain/verdict';
import { newTraceId } from '../telemetry/trace';
import { GraphValidator } from '../validator/graph-validator';
import { decodeGraphRequest } from './decode';
import { sendError } from './middleware';

export function createValidationRoutes(validator: GraphValidator): Router {
  const router = Router();

  /**
   * POST /validate
   * Body: { components: Component[], edges: DependencyEdge[] } with
   * versions as text. Responds with the graph verdict and its trace id.
   */
  router.post('/validate', (req, res) => {
    try {
      const { components, edges } = decodeGraphRequest(req.body);
      const traceId = newTraceId();
      const verdict = validator.validate(components, edges, { traceId });
      res.json({ traceId, linkable: isLinkable(verdict), verdict });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
