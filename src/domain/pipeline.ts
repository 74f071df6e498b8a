/**
 * Pipeline definition domain model.
 *
 * The declarative document a pipeline run executes: trigger filters, the
 * runtime and dependency set, packaging settings, the build matrix and
 * release policy.
 */

import { TriggerFilters } from './trigger';

/** One target platform of the build matrix. */
export interface MatrixEntry {
  /** Stable platform identifier, e.g. "linux". */
  platformId: string;
  /** Runner label the entry was scheduled on in hosted CI, e.g. "ubuntu-latest". */
  runner: string;
  /** File the packaging tool writes into the dist directory. */
  executable: string;
  /** Unique artifact key and release asset name for this entry. */
  artifactName: string;
}

/** Language runtime the build provisions. */
export interface RuntimeSpec {
  name: string;
  version: string;
}

/** Dependency set installed before packaging. */
export interface DependencySpec {
  /** Manifest file relative to the checkout root. */
  manifest: string;
  /** Packages installed ahead of the manifest (build-time requirements). */
  preinstall: string[];
  /** Upgrade the package installer itself before installing. */
  upgradeInstaller: boolean;
}

export interface PackagingSpec {
  /** Entry point file relative to the checkout root. */
  entryPoint: string;
  /** Base name of the produced executable. */
  binaryName: string;
  /** Directory, relative to the checkout root, the packager writes into. */
  distDir: string;
}

export interface ReleasePolicy {
  /** Tag globs that publish a release. */
  tagPatterns: string[];
  /**
   * Abort the release when an expected artifact is missing. When false,
   * the release is published with whatever files were retrieved.
   */
  requireAllArtifacts: boolean;
}

/** Retry and timeout policy applied to every build step. */
export interface StepPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  /** Per-step timeout; 0 leaves timeouts to the host. */
  stepTimeoutMs: number;
}

export interface ConcurrencyPolicy {
  /** A new run for the same ref cancels in-flight runs for it. */
  cancelInProgress: boolean;
}

/** The pipeline definition document. */
export interface PipelineDefinition {
  /** Definition format version. */
  specVersion: string;
  name: string;
  triggers: TriggerFilters;
  runtime: RuntimeSpec;
  dependencies: DependencySpec;
  packaging: PackagingSpec;
  matrix: MatrixEntry[];
  release: ReleasePolicy;
  policy: StepPolicy;
  concurrency: ConcurrencyPolicy;
}

/** Platforms the default matrix builds on, with their runner labels. */
export const DEFAULT_PLATFORMS: ReadonlyArray<{ platformId: string; runner: string; executableSuffix: string }> = [
  { platformId: 'linux', runner: 'ubuntu-latest', executableSuffix: '' },
  { platformId: 'windows', runner: 'windows-latest', executableSuffix: '.exe' },
  { platformId: 'macos', runner: 'macos-latest', executableSuffix: '' },
];

/**
 * Derive the artifact name for a platform by inserting the platform id
 * before the executable's extension: `junior.exe` on windows becomes
 * `junior-windows.exe`.
 */
export function defaultArtifactName(executable: string, platformId: string): string {
  const dot = executable.lastIndexOf('.');
  if (dot > 0) {
    return `${executable.slice(0, dot)}-${platformId}${executable.slice(dot)}`;
  }
  return `${executable}-${platformId}`;
}

/** Build the three-platform matrix for a binary name. */
export function buildDefaultMatrix(binaryName: string): MatrixEntry[] {
  return DEFAULT_PLATFORMS.map(({ platformId, runner, executableSuffix }) => {
    const executable = `${binaryName}${executableSuffix}`;
    return {
      platformId,
      runner,
      executable,
      artifactName: defaultArtifactName(executable, platformId),
    };
  });
}
