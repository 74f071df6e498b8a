/**
 * Build stage: fans a run out over the build matrix.
 *
 * Every entry runs checkout → provision → install → package → upload in
 * its own workspace. A failing entry stops at the failing step and
 * records the error; it never cancels its siblings. The stage returns
 * once every entry is terminal. Workspaces are removed when their entry
 * finishes: a successful entry's executable lives on in the artifact store.
 */

import { rm } from 'fs/promises';
import path from 'path';
import { BuildErrorKind, createTypedError } from '../domain/errors';
import { MatrixEntry, PipelineDefinition } from '../domain/pipeline';
import { BuildJobResult, BuildStepId, EntryStatus } from '../domain/run';
import { Logger } from '../logger';
import { ArtifactStore } from '../storage/store';
import { ProvisionedRuntime, Toolchain, WorkspaceContext } from '../toolchain';
import { isTerminalEntryStatus, transitionEntryStatus } from './state-machine';
import { runStep } from './step-runner';

/** Resolves the collaborators an entry builds with. */
export type ToolchainResolver = (entry: MatrixEntry) => Toolchain;

export interface BuildStageContext {
  runId: string;
  /** Fully qualified ref every entry checks out. */
  ref: string;
  definition: PipelineDefinition;
  toolchain: Toolchain | ToolchainResolver;
  artifacts: ArtifactStore;
  /** Root under which each entry gets `<runId>/<platformId>`. */
  workDir: string;
  signal: AbortSignal;
  logger: Logger;
  /** Called after each entry state change. */
  onEntryChange?: (result: BuildJobResult) => Promise<void>;
}

/** Workspace directory of one entry. */
export function entryWorkspace(workDir: string, runId: string, platformId: string): string {
  return path.join(workDir, runId, platformId);
}

function resolveToolchain(toolchain: Toolchain | ToolchainResolver, entry: MatrixEntry): Toolchain {
  return typeof toolchain === 'function' ? toolchain(entry) : toolchain;
}

function setStatus(result: BuildJobResult, target: EntryStatus): void {
  const transition = transitionEntryStatus(result.status, target);
  if (!transition.success) {
    throw new Error(transition.error?.message ?? `Invalid entry transition to ${target}`);
  }
  result.status = target;
}

/** A fresh pending result for a matrix entry. */
export function pendingResult(entry: MatrixEntry): BuildJobResult {
  return {
    platformId: entry.platformId,
    artifactName: entry.artifactName,
    status: EntryStatus.Pending,
    steps: [],
  };
}

/** Run one matrix entry to a terminal status. Never throws. */
export async function runBuildEntry(entry: MatrixEntry, ctx: BuildStageContext): Promise<BuildJobResult> {
  const result = pendingResult(entry);
  const log = ctx.logger.child({ platformId: entry.platformId });
  const notify = async () => {
    if (!ctx.onEntryChange) return;
    try {
      await ctx.onEntryChange(structuredClone(result));
    } catch (err) {
      log.warn('Entry change listener failed', { error: err instanceof Error ? err.message : String(err) });
    }
  };

  if (ctx.signal.aborted) {
    setStatus(result, EntryStatus.Canceled);
    result.completedAt = new Date().toISOString();
    await notify();
    return result;
  }

  const startedAt = Date.now();
  result.startedAt = new Date(startedAt).toISOString();
  setStatus(result, EntryStatus.Running);
  await notify();
  log.info('Entry started', { runner: entry.runner, artifactName: entry.artifactName });

  const { definition } = ctx;
  const toolchain = resolveToolchain(ctx.toolchain, entry);
  const workspace: WorkspaceContext = {
    runId: ctx.runId,
    platformId: entry.platformId,
    dir: entryWorkspace(ctx.workDir, ctx.runId, entry.platformId),
    signal: ctx.signal,
    logger: log,
  };

  const step = async <T>(
    stepId: BuildStepId,
    kind: BuildErrorKind,
    execute: (ws: WorkspaceContext) => Promise<T>,
  ): Promise<{ ok: true; value: T } | { ok: false }> => {
    log.debug('Step started', { stepId });
    const outcome = await runStep({
      stepId,
      kind,
      runId: ctx.runId,
      platformId: entry.platformId,
      policy: definition.policy,
      signal: ctx.signal,
      execute: (signal) => execute({ ...workspace, signal }),
    });
    result.steps.push(outcome.result);

    if (outcome.ok) {
      return { ok: true, value: outcome.value };
    }
    if (outcome.result.status === EntryStatus.Canceled) {
      setStatus(result, EntryStatus.Canceled);
      log.warn('Entry canceled', { stepId });
    } else {
      setStatus(result, EntryStatus.Failed);
      result.error = outcome.result.error;
      log.error('Entry failed', { stepId, code: result.error?.code, error: result.error?.message });
    }
    return { ok: false };
  };

  try {
    const checkout = await step('checkout', 'checkout', (ws) => toolchain.source.checkout(ctx.ref, ws));
    if (!checkout.ok) return result;
    if (checkout.value.commit) log.info('Checked out', { ref: ctx.ref, commit: checkout.value.commit });

    const provisioned = await step<ProvisionedRuntime>('provision', 'provisioning', (ws) =>
      toolchain.runtime.provision(definition.runtime, ws),
    );
    if (!provisioned.ok) return result;
    const runtime = provisioned.value;

    const installed = await step('install', 'dependency', (ws) =>
      toolchain.installer.install(definition.dependencies, runtime, ws),
    );
    if (!installed.ok) return result;

    const packaged = await step('package', 'packaging', (ws) =>
      toolchain.packager.package(definition.packaging, entry, runtime, ws),
    );
    if (!packaged.ok) return result;

    const uploaded = await step('upload', 'upload', () =>
      ctx.artifacts.put({
        runId: ctx.runId,
        platformId: entry.platformId,
        name: entry.artifactName,
        sourcePath: packaged.value,
      }),
    );
    if (!uploaded.ok) return result;
    result.artifactPath = uploaded.value.pointer.uri;

    setStatus(result, EntryStatus.Succeeded);
    log.info('Entry succeeded', { artifactName: entry.artifactName, contentHash: uploaded.value.contentHash });
    return result;
  } finally {
    await removeWorkspace(workspace.dir, log);
    result.completedAt = new Date().toISOString();
    result.durationMs = Date.now() - startedAt;
    await notify();
  }
}

async function removeWorkspace(dir: string, log: Logger): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (err) {
    log.warn('Failed to remove workspace', { dir, error: err instanceof Error ? err.message : String(err) });
  }
}

/**
 * Run every matrix entry concurrently and wait for all of them. The
 * returned results follow matrix order.
 */
export async function runBuildStage(ctx: BuildStageContext): Promise<BuildJobResult[]> {
  const entries = ctx.definition.matrix;
  const settled = await Promise.allSettled(entries.map((entry) => runBuildEntry(entry, ctx)));
  await removeWorkspace(path.join(ctx.workDir, ctx.runId), ctx.logger);

  return settled.map((outcome, index) => {
    if (outcome.status === 'fulfilled') return outcome.value;
    const entry = entries[index];
    const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
    ctx.logger.error('Entry crashed', { platformId: entry.platformId, error: message });
    return {
      ...pendingResult(entry),
      status: EntryStatus.Failed,
      completedAt: new Date().toISOString(),
      error: createTypedError({
        code: 'BUILD.INTERNAL',
        message,
        platformId: entry.platformId,
        runId: ctx.runId,
      }),
    };
  });
}

/** Whether every entry finished and succeeded. */
export function allEntriesSucceeded(results: BuildJobResult[]): boolean {
  return results.length > 0 && results.every((r) => r.status === EntryStatus.Succeeded);
}

/** Whether every entry is terminal. */
export function allEntriesTerminal(results: BuildJobResult[]): boolean {
  return results.every((r) => isTerminalEntryStatus(r.status));
}
