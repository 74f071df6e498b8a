/**
 * Pipeline definition loader.
 *
 * Reads a JSON definition document, fills every omitted field from the
 * defaults, and validates the result. Structural errors (wrong JSON types)
 * and semantic errors (validator) are collected together and reported in
 * one DefinitionError.
 */

import { readFile } from 'fs/promises';
import { TypedError, createTypedError } from '../domain/errors';
import { MatrixEntry, PipelineDefinition, buildDefaultMatrix, defaultArtifactName } from '../domain/pipeline';
import { createDefaultDefinition } from './schema';
import { validatePipelineDefinition } from './validator';

/** Thrown when a definition document cannot be used. */
export class DefinitionError extends Error {
  constructor(public readonly errors: TypedError[]) {
    super(
      errors.length === 1
        ? `Invalid pipeline definition: ${errors[0].message}`
        : `Invalid pipeline definition (${errors.length} errors): ${errors.map((e) => e.message).join('; ')}`,
    );
    this.name = 'DefinitionError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeError(path: string, expected: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_TYPE',
    message: `Field "${path}" must be ${expected}`,
    retryable: false,
    details: { field: path, expected },
  });
}

/** Field readers: return the fallback when absent, record an error when mistyped. */
class FieldReader {
  readonly errors: TypedError[] = [];

  object(source: JsonObject, key: string, path: string): JsonObject {
    const value = source[key];
    if (value === undefined) return {};
    if (!isObject(value)) {
      this.errors.push(typeError(path, 'an object'));
      return {};
    }
    return value;
  }

  string(source: JsonObject, key: string, path: string, fallback: string): string {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') {
      this.errors.push(typeError(path, 'a string'));
      return fallback;
    }
    return value;
  }

  number(source: JsonObject, key: string, path: string, fallback: number): number {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.errors.push(typeError(path, 'a number'));
      return fallback;
    }
    return value;
  }

  boolean(source: JsonObject, key: string, path: string, fallback: boolean): boolean {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.errors.push(typeError(path, 'a boolean'));
      return fallback;
    }
    return value;
  }

  stringArray(source: JsonObject, key: string, path: string, fallback: string[]): string[] {
    const value = source[key];
    if (value === undefined) return [...fallback];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      this.errors.push(typeError(path, 'an array of strings'));
      return [...fallback];
    }
    return [...value];
  }
}

function readMatrix(
  reader: FieldReader,
  source: JsonObject,
  binaryName: string,
  fallback: MatrixEntry[],
): MatrixEntry[] {
  const value = source.matrix;
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    reader.errors.push(typeError('matrix', 'an array'));
    return fallback;
  }

  const entries: MatrixEntry[] = [];
  value.forEach((item: unknown, index) => {
    const path = `matrix[${index}]`;
    if (!isObject(item)) {
      reader.errors.push(typeError(path, 'an object'));
      return;
    }
    const platformId = reader.string(item, 'platformId', `${path}.platformId`, '');
    if (platformId.length === 0) {
      reader.errors.push(
        createTypedError({
          code: 'VALIDATION.REQUIRED_FIELD',
          message: `Missing required field: ${path}.platformId`,
          retryable: false,
          details: { field: `${path}.platformId` },
        }),
      );
      return;
    }
    const executable = reader.string(
      item,
      'executable',
      `${path}.executable`,
      platformId === 'windows' ? `${binaryName}.exe` : binaryName,
    );
    entries.push({
      platformId,
      runner: reader.string(item, 'runner', `${path}.runner`, platformId),
      executable,
      artifactName: reader.string(item, 'artifactName', `${path}.artifactName`, defaultArtifactName(executable, platformId)),
    });
  });
  return entries;
}

/**
 * Resolve a parsed definition document against the defaults.
 * Throws DefinitionError when the document is mistyped or fails validation.
 */
export function parsePipelineDefinition(document: unknown): PipelineDefinition {
  if (!isObject(document)) {
    throw new DefinitionError([typeError('(root)', 'an object')]);
  }

  const reader = new FieldReader();
  const name = reader.string(document, 'name', 'name', '');
  const defaults = createDefaultDefinition(name || undefined);

  const triggers = reader.object(document, 'triggers', 'triggers');
  const runtime = reader.object(document, 'runtime', 'runtime');
  const dependencies = reader.object(document, 'dependencies', 'dependencies');
  const packaging = reader.object(document, 'packaging', 'packaging');
  const release = reader.object(document, 'release', 'release');
  const policy = reader.object(document, 'policy', 'policy');
  const concurrency = reader.object(document, 'concurrency', 'concurrency');

  const binaryName = reader.string(packaging, 'binaryName', 'packaging.binaryName', defaults.packaging.binaryName);
  const matrix = readMatrix(reader, document, binaryName, buildDefaultMatrix(binaryName));
  const definition: PipelineDefinition = {
    specVersion: reader.string(document, 'specVersion', 'specVersion', defaults.specVersion),
    name: name || defaults.name,
    triggers: {
      branches: reader.stringArray(triggers, 'branches', 'triggers.branches', defaults.triggers.branches),
      tags: reader.stringArray(triggers, 'tags', 'triggers.tags', defaults.triggers.tags),
    },
    runtime: {
      name: reader.string(runtime, 'name', 'runtime.name', defaults.runtime.name),
      version: reader.string(runtime, 'version', 'runtime.version', defaults.runtime.version),
    },
    dependencies: {
      manifest: reader.string(dependencies, 'manifest', 'dependencies.manifest', defaults.dependencies.manifest),
      preinstall: reader.stringArray(dependencies, 'preinstall', 'dependencies.preinstall', defaults.dependencies.preinstall),
      upgradeInstaller: reader.boolean(
        dependencies,
        'upgradeInstaller',
        'dependencies.upgradeInstaller',
        defaults.dependencies.upgradeInstaller,
      ),
    },
    packaging: {
      entryPoint: reader.string(packaging, 'entryPoint', 'packaging.entryPoint', defaults.packaging.entryPoint),
      binaryName,
      distDir: reader.string(packaging, 'distDir', 'packaging.distDir', defaults.packaging.distDir),
    },
    matrix,
    release: {
      tagPatterns: reader.stringArray(release, 'tagPatterns', 'release.tagPatterns', defaults.release.tagPatterns),
      requireAllArtifacts: reader.boolean(
        release,
        'requireAllArtifacts',
        'release.requireAllArtifacts',
        defaults.release.requireAllArtifacts,
      ),
    },
    policy: {
      maxAttempts: reader.number(policy, 'maxAttempts', 'policy.maxAttempts', defaults.policy.maxAttempts),
      backoffBaseMs: reader.number(policy, 'backoffBaseMs', 'policy.backoffBaseMs', defaults.policy.backoffBaseMs),
      stepTimeoutMs: reader.number(policy, 'stepTimeoutMs', 'policy.stepTimeoutMs', defaults.policy.stepTimeoutMs),
    },
    concurrency: {
      cancelInProgress: reader.boolean(
        concurrency,
        'cancelInProgress',
        'concurrency.cancelInProgress',
        defaults.concurrency.cancelInProgress,
      ),
    },
  };

  if (reader.errors.length > 0) {
    throw new DefinitionError(reader.errors);
  }

  const validation = validatePipelineDefinition(definition);
  if (!validation.valid) {
    throw new DefinitionError(validation.errors);
  }
  return definition;
}

/** Read and resolve a definition file. */
export async function loadPipelineDefinition(path: string): Promise<PipelineDefinition> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new DefinitionError([
      createTypedError({
        code: 'VALIDATION.NOT_FOUND',
        message: `Cannot read pipeline definition ${path}: ${err instanceof Error ? err.message : String(err)}`,
        retryable: false,
        details: { path },
      }),
    ]);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new DefinitionError([
      createTypedError({
        code: 'VALIDATION.INVALID_JSON',
        message: `Pipeline definition ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        retryable: false,
        details: { path },
      }),
    ]);
  }
  return parsePipelineDefinition(document);
}
