/**
 * Run API routes.
 *
 * POST /runs: Trigger a run for a ref
 * GET /runs: List runs, most recent first
 * GET /runs/:runId: Get run state and entry results
 * POST /runs/:runId/cancel: Cancel an in-flight run
 */

import { Request, Router } from 'express';
import { apiError, validationError, runNotFoundError } from '../domain/errors';
import { PipelineRun, PipelineState } from '../domain/run';
import { TriggerEvent, parseEventType } from '../domain/trigger';
import { OrchestratorError, PipelineOrchestrator } from '../engine/orchestrator';
import { logger } from '../logger';
import { Store, toListResult } from '../storage/store';
import { bodyString, getHttpStatus, queryInt } from './middleware';

const log = logger.child({ module: 'api.runs' });

/**
 * Create a run and execute it in the background. Resolves with the run
 * as recorded once it is triggered or skipped.
 */
export async function startRun(orchestrator: PipelineOrchestrator, trigger: TriggerEvent): Promise<PipelineRun> {
  const run = await orchestrator.createRun(trigger);
  if (run.state === PipelineState.Triggered) {
    // Execute asynchronously (non-blocking); the outcome is recorded on the run
    orchestrator.executeRun(run.id).catch((err) => {
      log.error('Background run failed', { runId: run.id, error: err instanceof Error ? err.message : String(err) });
    });
  }
  return run;
}

function identityOf(req: Request): string {
  const header = req.headers['x-identity-id'];
  return typeof header === 'string' && header.length > 0 ? header : 'api';
}

export function createRunRoutes(store: Store, orchestrator: PipelineOrchestrator): Router {
  const router = Router();

  /**
   * POST /runs
   * Body: { ref, event: "push" | "tag" }.
   */
  router.post('/runs', async (req, res, next) => {
    try {
      const ref = bodyString(req.body, 'ref');
      const event = bodyString(req.body, 'event') ?? 'push';
      if (!ref || ref.trim() === '') {
        res.status(400).json(apiError(validationError('"ref" is required')));
        return;
      }
      const eventType = parseEventType(event);
      if (!eventType) {
        res.status(400).json(
          apiError(validationError(`Unknown event "${event}"`, { allowed: ['push', 'tag'] })),
        );
        return;
      }

      const run = await startRun(orchestrator, { eventType, ref });
      res.status(201).json({ run });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs
   * List runs with pagination.
   */
  router.get('/runs', async (req, res, next) => {
    try {
      const limit = Math.max(1, queryInt(req.query.limit, 20, 100));
      const offset = queryInt(req.query.offset, 0);
      const [runs, total] = await Promise.all([store.runs.list({ limit, offset }), store.runs.count()]);
      res.json(toListResult(runs, total, { limit, offset }));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs/:runId
   */
  router.get('/runs/:runId', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Body: { reason? }.
   */
  router.post('/runs/:runId/cancel', async (req, res, next) => {
    try {
      const run = await orchestrator.cancelRun(req.params.runId, identityOf(req), bodyString(req.body, 'reason'));
      res.json({ run });
    } catch (err) {
      if (err instanceof OrchestratorError) {
        res.status(getHttpStatus(err.typedError)).json(apiError(err.typedError));
        return;
      }
      next(err);
    }
  });

  return router;
}
