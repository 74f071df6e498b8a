/**
 * Toolchain collaborator contracts.
 *
 * Every build step delegates to one of these collaborators. Implementations
 * signal failure by throwing PipelineStepError with the step's error kind;
 * anything else they throw is recorded under the step's default kind.
 *
 * Bundled implementations live in ./adapters:
 *   git checkout (simple-git), python runtime lookup, pip installer,
 *   PyInstaller packager, GitHub Releases host.
 */

import { Logger } from '../logger';
import { DependencySpec, MatrixEntry, PackagingSpec, RuntimeSpec } from '../domain/pipeline';
import { Release, ReleaseCredentials } from '../domain/release';

/** Per-entry execution context handed to every collaborator call. */
export interface WorkspaceContext {
  runId: string;
  platformId: string;
  /** The entry's isolated checkout directory. */
  dir: string;
  /** Aborted when the run is canceled. */
  signal: AbortSignal;
  logger: Logger;
}

/** A runtime made available for the rest of an entry's steps. */
export interface ProvisionedRuntime {
  name: string;
  version: string;
  /** Interpreter executable later steps invoke. */
  command: string;
  /** Arguments that precede every invocation (`-3.9` for the windows launcher). */
  args: string[];
}

export interface CheckoutResult {
  /** Commit the ref resolved to, when the host reports it. */
  commit?: string;
}

/** Provides checkout-by-ref. Fails with reason NotFound. */
export interface SourceControlHost {
  checkout(ref: string, ctx: WorkspaceContext): Promise<CheckoutResult>;
}

/** Makes a runtime version available. Fails with reason VersionUnavailable. */
export interface RuntimeProvisioner {
  provision(runtime: RuntimeSpec, ctx: WorkspaceContext): Promise<ProvisionedRuntime>;
}

/** Installs a dependency manifest. Fails with reason ResolutionError or NetworkError. */
export interface DependencyInstaller {
  install(dependencies: DependencySpec, runtime: ProvisionedRuntime, ctx: WorkspaceContext): Promise<void>;
}

/**
 * Produces one self-contained executable for a matrix entry and returns
 * its path. Fails with reason BuildError.
 */
export interface Packager {
  package(
    packaging: PackagingSpec,
    entry: MatrixEntry,
    runtime: ProvisionedRuntime,
    ctx: WorkspaceContext,
  ): Promise<string>;
}

/** One file to attach to a release. */
export interface ReleaseAsset {
  name: string;
  data: Buffer;
  contentHash: string;
}

export interface CreateReleaseInput {
  tag: string;
  name: string;
  assets: ReleaseAsset[];
  /** Aborting before the release is published leaves nothing behind. */
  signal?: AbortSignal;
}

/**
 * Creates a publicly retrievable release. Fails with kind tag_conflict
 * when the tag already has a release, auth on bad credentials.
 */
export interface ReleaseHost {
  createRelease(input: CreateReleaseInput, credentials: ReleaseCredentials): Promise<Release>;
}

/** Collaborators used by the build stage. */
export interface Toolchain {
  source: SourceControlHost;
  runtime: RuntimeProvisioner;
  installer: DependencyInstaller;
  packager: Packager;
}

export * from './command-runner';
