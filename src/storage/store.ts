/**
 * Storage layer interfaces.
 *
 * Defines the contract for run, artifact and event persistence with
 * pluggable backends.
 */

import { Artifact } from '../domain/artifact';
import { PipelineEvent } from '../domain/events';
import { PipelineRun } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for pipeline runs. */
export interface RunStore {
  create(run: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, run: Partial<PipelineRun>): Promise<PipelineRun | null>;
  /** Most recent first. */
  list(options?: ListOptions): Promise<PipelineRun[]>;
  count(): Promise<number>;
  delete(id: string): Promise<boolean>;
}

/** Input for storing one entry's artifact. */
export interface PutArtifactInput {
  runId: string;
  platformId: string;
  /** Key unique within the run. */
  name: string;
  /** File to store. */
  sourcePath: string;
}

/**
 * Artifact store keyed by (run id, artifact name).
 * Writes for distinct names never contend; reads are aggregation only.
 */
export interface ArtifactStore {
  put(input: PutArtifactInput): Promise<Artifact>;
  getAll(runId: string): Promise<Artifact[]>;
  get(runId: string, name: string): Promise<Artifact | null>;
  /** Read an artifact's contents. */
  read(artifact: Artifact): Promise<Buffer>;
}

/** Store interface for pipeline events. */
export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: string[] }): Promise<PipelineEvent[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  runs: RunStore;
  artifacts: ArtifactStore;
  events: EventStore;
}
