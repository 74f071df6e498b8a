/**
 * Filesystem artifact store.
 *
 * Layout: `<root>/<runId>/<name>` holds the binary and
 * `<root>/<runId>/<name>.artifact.json` its metadata. Each entry writes
 * its own pair of files, so concurrent puts for distinct names never
 * touch the same path.
 */

import { createHash } from 'crypto';
import { constants } from 'fs';
import { copyFile, mkdir, readFile, readdir, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { Artifact } from '../domain/artifact';
import { PipelineStepError } from '../domain/errors';
import { ArtifactStore, PutArtifactInput } from './store';

const METADATA_SUFFIX = '.artifact.json';

function isArtifact(value: unknown): value is Artifact {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === 'string' &&
    typeof record.runId === 'string' &&
    typeof record.name === 'string' &&
    typeof record.platformId === 'string' &&
    typeof record.sizeBytes === 'number'
  );
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export class FileSystemArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  private runDir(runId: string): string {
    return path.join(this.root, runId);
  }

  async put(input: PutArtifactInput): Promise<Artifact> {
    if (input.name.includes('/') || input.name.includes('\\')) {
      throw new PipelineStepError('upload', `Artifact name "${input.name}" must not contain path separators`);
    }

    const dir = this.runDir(input.runId);
    const target = path.join(dir, input.name);
    let data: Buffer;
    try {
      await mkdir(dir, { recursive: true });
      // EXCL: a second put under the same key is a conflict, never an overwrite
      await copyFile(input.sourcePath, target, constants.COPYFILE_EXCL);
      data = await readFile(target);
    } catch (err) {
      throw new PipelineStepError(
        'upload',
        `Failed to store artifact "${input.name}": ${err instanceof Error ? err.message : String(err)}`,
        { reason: hasCode(err, 'EEXIST') ? 'Conflict' : hasCode(err, 'ENOENT') ? 'SourceMissing' : 'WriteFailed' },
      );
    }

    const artifact: Artifact = {
      id: `art_${uuid()}`,
      runId: input.runId,
      platformId: input.platformId,
      name: input.name,
      pointer: { kind: 'file', uri: target },
      sizeBytes: data.length,
      contentHash: createHash('sha256').update(data).digest('hex'),
      createdAt: new Date().toISOString(),
    };
    await writeFile(`${target}${METADATA_SUFFIX}`, JSON.stringify(artifact, null, 2));
    return artifact;
  }

  async getAll(runId: string): Promise<Artifact[]> {
    let names: string[];
    try {
      names = await readdir(this.runDir(runId));
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return [];
      throw err;
    }

    const artifacts: Artifact[] = [];
    for (const file of names.filter((n) => n.endsWith(METADATA_SUFFIX)).sort()) {
      const parsed: unknown = JSON.parse(await readFile(path.join(this.runDir(runId), file), 'utf8'));
      if (isArtifact(parsed)) {
        artifacts.push(parsed);
      }
    }
    return artifacts;
  }

  async get(runId: string, name: string): Promise<Artifact | null> {
    const all = await this.getAll(runId);
    return all.find((a) => a.name === name) ?? null;
  }

  async read(artifact: Artifact): Promise<Buffer> {
    try {
      return await readFile(path.join(this.runDir(artifact.runId), artifact.name));
    } catch (err) {
      throw new PipelineStepError(
        'aggregation',
        `Cannot read artifact "${artifact.name}": ${err instanceof Error ? err.message : String(err)}`,
        { reason: 'NotFound' },
      );
    }
  }
}
