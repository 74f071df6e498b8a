/**
 * Pipeline definition schema constants and defaults.
 *
 * The defaults reproduce the hosted workflow this tool replaces: pushes
 * to main build, `v*` tags build and release, python 3.9 with pybind11
 * pre-installed, packaged by PyInstaller into a `junior` executable on
 * linux, windows and macos.
 */

import { PipelineDefinition, buildDefaultMatrix } from '../domain/pipeline';
import { DEFAULT_TAG_PATTERNS, DEFAULT_TRIGGER_FILTERS } from '../domain/trigger';
import { CURRENT_PIPELINE_SPEC_VERSION } from './version';

/** Runtimes the bundled provisioner knows how to locate. */
export const SUPPORTED_RUNTIMES = ['python'] as const;

/** Schema constraints. */
export const SCHEMA_CONSTRAINTS = {
  maxNameLength: 100,
  maxMatrixEntries: 16,
  maxAttempts: 10,
  maxBackoffBaseMs: 60_000,
  platformIdPattern: /^[a-z0-9][a-z0-9_-]*$/,
} as const;

export const DEFAULT_BINARY_NAME = 'junior';

/** Build the default pipeline definition for a project name. */
export function createDefaultDefinition(name: string = DEFAULT_BINARY_NAME): PipelineDefinition {
  return {
    specVersion: CURRENT_PIPELINE_SPEC_VERSION,
    name,
    triggers: { branches: [...DEFAULT_TRIGGER_FILTERS.branches], tags: [...DEFAULT_TRIGGER_FILTERS.tags] },
    runtime: { name: 'python', version: '3.9' },
    dependencies: {
      manifest: 'requirements.txt',
      preinstall: ['pybind11'],
      upgradeInstaller: true,
    },
    packaging: {
      entryPoint: 'junior/cli.py',
      binaryName: DEFAULT_BINARY_NAME,
      distDir: 'dist',
    },
    matrix: buildDefaultMatrix(DEFAULT_BINARY_NAME),
    release: { tagPatterns: [...DEFAULT_TAG_PATTERNS], requireAllArtifacts: true },
    policy: { maxAttempts: 2, backoffBaseMs: 1000, stepTimeoutMs: 0 },
    concurrency: { cancelInProgress: true },
  };
}
