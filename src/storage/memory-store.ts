/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every read and
 * write goes through structuredClone so callers never alias the store's
 * internal records.
 */

import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { v4 as uuid } from 'uuid';
import { Artifact } from '../domain/artifact';
import { PipelineStepError } from '../domain/errors';
import { PipelineEvent } from '../domain/events';
import { PipelineRun } from '../domain/run';
import { ArtifactStore, EventStore, ListOptions, PutArtifactInput, RunStore, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Storage key for an artifact. */
export function artifactKey(runId: string, name: string): string {
  return `${runId}/${name}`;
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, PipelineRun>();

  async create(run: PipelineRun): Promise<PipelineRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<PipelineRun>): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<PipelineRun[]> {
    const items = [...this.data.values()].reverse();
    return applyListOptions(items.map(deepCopy), options);
  }

  async count(): Promise<number> {
    return this.data.size;
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

/** Holds artifact contents in memory; reads the source file once on put. */
export class MemoryArtifactStore implements ArtifactStore {
  private records = new Map<string, Artifact>();
  private contents = new Map<string, Buffer>();

  async put(input: PutArtifactInput): Promise<Artifact> {
    const key = artifactKey(input.runId, input.name);
    if (this.records.has(key)) {
      throw new PipelineStepError('upload', `Artifact "${input.name}" already exists for run ${input.runId}`, {
        reason: 'Conflict',
      });
    }

    let data: Buffer;
    try {
      data = await readFile(input.sourcePath);
    } catch (err) {
      throw new PipelineStepError(
        'upload',
        `Cannot read artifact source ${input.sourcePath}: ${err instanceof Error ? err.message : String(err)}`,
        { reason: 'SourceMissing' },
      );
    }

    const artifact: Artifact = {
      id: `art_${uuid()}`,
      runId: input.runId,
      platformId: input.platformId,
      name: input.name,
      pointer: { kind: 'memory', uri: `memory://${key}` },
      sizeBytes: data.length,
      contentHash: createHash('sha256').update(data).digest('hex'),
      createdAt: new Date().toISOString(),
    };
    this.records.set(key, deepCopy(artifact));
    this.contents.set(key, Buffer.from(data));
    return deepCopy(artifact);
  }

  async getAll(runId: string): Promise<Artifact[]> {
    return [...this.records.values()].filter((a) => a.runId === runId).map(deepCopy);
  }

  async get(runId: string, name: string): Promise<Artifact | null> {
    const artifact = this.records.get(artifactKey(runId, name));
    return artifact ? deepCopy(artifact) : null;
  }

  async read(artifact: Artifact): Promise<Buffer> {
    const data = this.contents.get(artifactKey(artifact.runId, artifact.name));
    if (!data) {
      throw new PipelineStepError('aggregation', `Artifact "${artifact.name}" has no stored contents`, {
        reason: 'NotFound',
      });
    }
    return Buffer.from(data);
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];
  private runIdIndex = new Map<string, number[]>();

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    const idx = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.runIdIndex.get(event.runId) ?? [];
    indices.push(idx);
    this.runIdIndex.set(event.runId, indices);
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions & { eventTypes?: string[] }): Promise<PipelineEvent[]> {
    const indices = this.runIdIndex.get(runId);
    if (!indices) return [];
    const eventTypes = options?.eventTypes ?? [];
    const items = indices
      .map((i) => this.data[i])
      .filter((e) => eventTypes.length === 0 || eventTypes.includes(e.type));
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(artifacts: ArtifactStore = new MemoryArtifactStore()): Store {
  return {
    runs: new MemoryRunStore(),
    artifacts,
    events: new MemoryEventStore(),
  };
}
