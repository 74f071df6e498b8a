/**
 * Express server configuration.
 *
 * Assembles the trigger receiver and run inspection API with middleware,
 * routes, and dependency injection.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { DataPlanePublisher } from './data-plane/publisher';
import { OrchestratorOptions, PipelineOrchestrator } from './engine/orchestrator';
import { errorHandler, requestLogger } from './api/middleware';
import { createRunRoutes } from './api/runs';
import { createEventRoutes } from './api/events';
import { createArtifactRoutes } from './api/artifacts';
import { createHookRoutes } from './api/hooks';
import { CURRENT_PIPELINE_SPEC_VERSION } from './dsl/version';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  publisher: DataPlanePublisher;
  orchestrator: PipelineOrchestrator;
  webhookSecret?: string;
}

/** Create the application context with all services. */
export function createAppContext(
  options: OrchestratorOptions,
  extra: { store?: Store; webhookSecret?: string } = {},
): AppContext {
  const store = extra.store ?? createMemoryStore();
  const publisher = new DataPlanePublisher(store);
  const orchestrator = new PipelineOrchestrator(store, publisher, options);

  return {
    store,
    publisher,
    orchestrator,
    webhookSecret: extra.webhookSecret,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(requestLogger());

  // Health check: includes uptime and in-flight runs
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      specVersion: CURRENT_PIPELINE_SPEC_VERSION,
      uptimeMs: Date.now() - startTime,
      inFlightRuns: ctx.orchestrator.inFlightRunIds().length,
    });
  });

  // Versioned API routes: /api/v1 prefix. Hooks read the raw body, so they
  // are mounted before the JSON parser.
  const v1 = express.Router();
  v1.use('/', createHookRoutes(ctx.orchestrator, { webhookSecret: ctx.webhookSecret }));
  v1.use(express.json({ limit: '1mb' }));
  v1.use('/', createRunRoutes(ctx.store, ctx.orchestrator));
  v1.use('/', createEventRoutes(ctx.store, ctx.publisher));
  v1.use('/', createArtifactRoutes(ctx.store));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}
