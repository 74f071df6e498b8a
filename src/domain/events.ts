/**
 * Pipeline event domain model.
 *
 * Events are emitted as stable, versioned records for every run state
 * change, entry lifecycle change and release outcome.
 */

/** Event types emitted by the publisher. */
export type PipelineEventType =
  | 'run.triggered'
  | 'run.skipped'
  | 'run.build_started'
  | 'run.build_succeeded'
  | 'run.build_failed'
  | 'run.release_started'
  | 'run.release_succeeded'
  | 'run.release_failed'
  | 'run.done'
  | 'run.canceled'
  | 'entry.started'
  | 'entry.succeeded'
  | 'entry.failed'
  | 'entry.canceled'
  | 'artifact.uploaded';

/** A pipeline event with stable schema. */
export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  platformId?: string;
  artifactName?: string;
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events for this run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}
