/**
 * Event stream API routes.
 *
 * GET /runs/:runId/events: List events for a run, optionally filtered by type
 */

import { Router } from 'express';
import { apiError, runNotFoundError } from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { DataPlanePublisher } from '../data-plane/publisher';
import { Store, toListResult } from '../storage/store';
import { queryInt } from './middleware';

const EVENT_TYPES: readonly PipelineEventType[] = [
  'run.triggered', 'run.skipped', 'run.build_started', 'run.build_succeeded', 'run.build_failed',
  'run.release_started', 'run.release_succeeded', 'run.release_failed', 'run.done', 'run.canceled',
  'entry.started', 'entry.succeeded', 'entry.failed', 'entry.canceled',
  'artifact.uploaded',
];

function parseEventTypes(value: unknown): PipelineEventType[] | undefined {
  if (typeof value !== 'string' || value === '') return undefined;
  const requested = value.split(',').map((t) => t.trim());
  return EVENT_TYPES.filter((t) => requested.includes(t));
}

export function createEventRoutes(store: Store, publisher: DataPlanePublisher): Router {
  const router = Router();

  /**
   * GET /runs/:runId/events?types=a,b&limit=&offset=
   */
  router.get('/runs/:runId/events', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }

      const limit = Math.max(1, queryInt(req.query.limit, 100, 1000));
      const offset = queryInt(req.query.offset, 0);
      const events = await publisher.getEventsByRun(run.id, parseEventTypes(req.query.types));
      res.json(toListResult(events.slice(offset, offset + limit), events.length, { limit, offset }));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
