/**
 * Artifact API routes.
 *
 * GET /runs/:runId/artifacts: List artifacts uploaded by a run's entries
 */

import { Router } from 'express';
import { apiError, runNotFoundError } from '../domain/errors';
import { Store } from '../storage/store';

export function createArtifactRoutes(store: Store): Router {
  const router = Router();

  router.get('/runs/:runId/artifacts', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }

      const artifacts = await store.artifacts.getAll(run.id);
      res.json({ artifacts });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
