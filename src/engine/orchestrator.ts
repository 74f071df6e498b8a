/**
 * Pipeline Orchestrator: the core orchestration engine.
 *
 * Takes a trigger event through the pipeline state machine: filters the
 * event, fans the build stage out over the matrix, joins on the barrier,
 * and runs the release stage only for a release trigger whose entries all
 * succeeded. Every state change is persisted and published as an event.
 */

import { v4 as uuid } from 'uuid';
import {
  PipelineStepError,
  TypedError,
  createTypedError,
  runCanceledError,
  runInvalidStateTransition,
  runNotFoundError,
  toTypedError,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { PipelineDefinition } from '../domain/pipeline';
import { ReleaseCredentials } from '../domain/release';
import { BuildJobResult, EntryStatus, PipelineRun, PipelineState } from '../domain/run';
import {
  TriggerEvent,
  isReleaseTrigger,
  matchesTriggerFilters,
  normalizeTrigger,
  tagFromRef,
} from '../domain/trigger';
import { DataPlanePublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { ReleaseHost, Toolchain } from '../toolchain';
import { ToolchainResolver, allEntriesSucceeded, pendingResult, runBuildStage } from './build-stage';
import { ReleaseStage } from './release-stage';
import { exitCodeForState, isTerminalPipelineState, transitionPipelineState } from './state-machine';

/** Orchestrator configuration. */
export interface OrchestratorOptions {
  definition: PipelineDefinition;
  toolchain: Toolchain | ToolchainResolver;
  /** Root of the per-entry workspaces. */
  workDir: string;
  /** Release host and the credentials handed to it. Without it, release triggers fail with RELEASE.AUTH. */
  release?: {
    host: ReleaseHost;
    credentials: ReleaseCredentials;
  };
  logger?: Logger;
}

export interface ExecuteRunOptions {
  /** Aborting it cancels the run. */
  signal?: AbortSignal;
}

/** A run between trigger and terminal state. */
interface InFlightRun {
  ref: string;
  controller?: AbortController;
  canceledBy?: string;
  cancelReason?: string;
  /** Set while a run that never started executing is moved to canceled. */
  canceling?: Promise<PipelineRun>;
}

const RUN_EVENT_FOR_STATE: Partial<Record<PipelineState, PipelineEventType>> = {
  [PipelineState.Triggered]: 'run.triggered',
  [PipelineState.Skipped]: 'run.skipped',
  [PipelineState.BuildRunning]: 'run.build_started',
  [PipelineState.BuildSucceeded]: 'run.build_succeeded',
  [PipelineState.BuildFailed]: 'run.build_failed',
  [PipelineState.ReleaseRunning]: 'run.release_started',
  [PipelineState.ReleaseSucceeded]: 'run.release_succeeded',
  [PipelineState.ReleaseFailed]: 'run.release_failed',
  [PipelineState.Done]: 'run.done',
  [PipelineState.Canceled]: 'run.canceled',
};

const ENTRY_EVENT_FOR_STATUS: Partial<Record<EntryStatus, PipelineEventType>> = {
  [EntryStatus.Running]: 'entry.started',
  [EntryStatus.Succeeded]: 'entry.succeeded',
  [EntryStatus.Failed]: 'entry.failed',
  [EntryStatus.Canceled]: 'entry.canceled',
};

/** The pipeline orchestrator. */
export class PipelineOrchestrator {
  private readonly definition: PipelineDefinition;
  private readonly releaseStage?: ReleaseStage;
  private readonly log: Logger;
  private inFlight = new Map<string, InFlightRun>();
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Set<string>();

  constructor(
    private store: Store,
    private publisher: DataPlanePublisher,
    private options: OrchestratorOptions,
  ) {
    this.definition = options.definition;
    this.log = (options.logger ?? rootLogger).child({ module: 'orchestrator', pipeline: options.definition.name });
    if (options.release) {
      this.releaseStage = new ReleaseStage({
        releaseHost: options.release.host,
        artifacts: store.artifacts,
        credentials: options.release.credentials,
        requireAllArtifacts: options.definition.release.requireAllArtifacts,
        logger: this.log,
      });
    }
  }

  /**
   * Record a run for a trigger event. Events outside the definition's
   * trigger filters produce a skipped run; others a triggered run.
   */
  async createRun(event: TriggerEvent): Promise<PipelineRun> {
    const trigger = normalizeTrigger(event);
    const now = new Date().toISOString();
    let run: PipelineRun = {
      id: `run_${uuid()}`,
      trigger,
      definitionName: this.definition.name,
      state: PipelineState.Idle,
      releaseEligible:
        trigger.eventType === 'push-to-tag' && isReleaseTrigger(trigger.ref, this.definition.release.tagPatterns),
      entries: {},
      createdAt: now,
      updatedAt: now,
    };
    for (const entry of this.definition.matrix) {
      run.entries[entry.platformId] = pendingResult(entry);
    }
    await this.store.runs.create(run);

    if (!matchesTriggerFilters(trigger, this.definition.triggers)) {
      run.completedAt = new Date().toISOString();
      run = await this.transitionRun(run, PipelineState.Skipped);
      this.log.info('Trigger does not match pipeline filters; skipping', { runId: run.id, ref: trigger.ref });
      return run;
    }

    if (this.definition.concurrency.cancelInProgress) {
      await this.supersedeRunsFor(trigger.ref, run.id);
    }

    this.inFlight.set(run.id, { ref: trigger.ref });
    run = await this.transitionRun(run, PipelineState.Triggered);
    this.log.info('Run triggered', {
      runId: run.id,
      ref: trigger.ref,
      eventType: trigger.eventType,
      releaseEligible: run.releaseEligible,
    });
    return run;
  }

  /** Execute a triggered run to a terminal state. */
  async executeRun(runId: string, options: ExecuteRunOptions = {}): Promise<PipelineRun> {
    // Prevent concurrent execution of the same run
    if (this.runningRuns.has(runId)) {
      throw new OrchestratorError(
        createTypedError({
          code: 'RUN.ALREADY_RUNNING',
          message: `Run "${runId}" is already being executed`,
          runId,
        }),
      );
    }
    this.runningRuns.add(runId);

    try {
      return await this.executeRunInternal(runId, options);
    } finally {
      this.runningRuns.delete(runId);
      this.inFlight.delete(runId);
    }
  }

  /** Create a run for the event and execute it unless it was skipped. */
  async runPipeline(event: TriggerEvent, options: ExecuteRunOptions = {}): Promise<PipelineRun> {
    const run = await this.createRun(event);
    if (run.state === PipelineState.Skipped) return run;
    return this.executeRun(run.id, options);
  }

  /**
   * Cancel a run. A run that is executing is aborted and reaches the
   * canceled state once its in-flight entries have stopped; the run is
   * returned as recorded when the cancel was requested.
   */
  async cancelRun(runId: string, canceledBy: string, reason?: string): Promise<PipelineRun> {
    // An executing run is only ever moved to canceled by its executor.
    if (this.runningRuns.has(runId)) {
      this.requestAbort(runId, canceledBy, reason);
      const current = await this.store.runs.getById(runId);
      if (!current) {
        throw new OrchestratorError(runNotFoundError(runId));
      }
      return current;
    }

    const run = await this.store.runs.getById(runId);
    if (!run) {
      throw new OrchestratorError(runNotFoundError(runId));
    }
    if (isTerminalPipelineState(run.state)) {
      throw new OrchestratorError(runInvalidStateTransition(runId, run.state, PipelineState.Canceled));
    }
    if (this.runningRuns.has(runId)) {
      this.requestAbort(runId, canceledBy, reason);
      return run;
    }

    const flight = this.inFlight.get(runId) ?? { ref: run.trigger.ref };
    if (flight.canceling) return flight.canceling;
    flight.canceledBy = canceledBy;
    flight.cancelReason = reason;
    this.inFlight.set(runId, flight);
    flight.canceling = this.cancelRunInternal(run);
    return flight.canceling;
  }

  /** Run ids currently between trigger and a terminal state. */
  inFlightRunIds(): string[] {
    return [...this.inFlight.keys()];
  }

  private async executeRunInternal(runId: string, options: ExecuteRunOptions): Promise<PipelineRun> {
    let run = await this.store.runs.getById(runId);
    if (!run) {
      throw new OrchestratorError(runNotFoundError(runId));
    }
    if (run.state === PipelineState.Skipped || run.state === PipelineState.Canceled) {
      return run;
    }
    if (run.state !== PipelineState.Triggered) {
      throw new OrchestratorError(runInvalidStateTransition(runId, run.state, PipelineState.BuildRunning));
    }

    const flight = this.inFlight.get(runId) ?? { ref: run.trigger.ref };
    flight.ref = run.trigger.ref;
    if (flight.canceling) {
      return flight.canceling;
    }
    const controller = new AbortController();
    flight.controller = controller;
    this.inFlight.set(runId, flight);
    if (flight.canceledBy) {
      controller.abort(new Error(flight.cancelReason ?? 'Run canceled'));
    }

    const onExternalAbort = () => {
      if (!flight.canceledBy) {
        flight.canceledBy = 'signal';
        flight.cancelReason = 'Abort signal received';
      }
      controller.abort(options.signal?.reason);
    };
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      return await this.runStages(run, controller.signal);
    } catch (err) {
      run = (await this.store.runs.getById(runId)) ?? run;
      if (isTerminalPipelineState(run.state)) throw err;
      this.log.error('Run aborted by an internal error', {
        runId,
        error: err instanceof Error ? err.message : String(err),
      });
      return this.finishFailed(run, toTypedError(err, 'host', { runId }));
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  /** Record a cancel request on an executing run and abort it once it has a controller. */
  private requestAbort(runId: string, canceledBy: string, reason?: string): void {
    const flight = this.inFlight.get(runId) ?? { ref: '' };
    this.inFlight.set(runId, flight);
    if (!flight.canceledBy) {
      flight.canceledBy = canceledBy;
      flight.cancelReason = reason;
    }
    if (flight.controller && !flight.controller.signal.aborted) {
      this.log.info('Canceling run', { runId, canceledBy, reason });
      flight.controller.abort(new Error(reason ?? 'Run canceled'));
    }
  }

  private async runStages(initial: PipelineRun, signal: AbortSignal): Promise<PipelineRun> {
    let run = initial;
    const log = this.log.child({ runId: run.id, ref: run.trigger.ref });

    if (signal.aborted) return this.cancelRunInternal(run);

    run.startedAt = new Date().toISOString();
    run = await this.transitionRun(run, PipelineState.BuildRunning);
    log.info('Build stage started', { entries: this.definition.matrix.map((e) => e.platformId) });

    const current = run;
    const results = await runBuildStage({
      runId: run.id,
      ref: run.trigger.ref,
      definition: this.definition,
      toolchain: this.options.toolchain,
      artifacts: this.store.artifacts,
      workDir: this.options.workDir,
      signal,
      logger: log,
      onEntryChange: (result) => this.recordEntry(current, result),
    });
    for (const result of results) {
      run.entries[result.platformId] = result;
    }

    if (signal.aborted) return this.cancelRunInternal(run);

    if (!allEntriesSucceeded(results)) {
      run.error = buildFailureError(run.id, results);
      log.error('Build stage failed', { code: run.error.code, error: run.error.message });
      return this.finish(run, PipelineState.BuildFailed);
    }

    run = await this.transitionRun(run, PipelineState.BuildSucceeded);
    log.info('Build stage succeeded');

    if (!run.releaseEligible) {
      return this.finish(run, PipelineState.Done);
    }

    run = await this.transitionRun(run, PipelineState.ReleaseRunning);
    const tag = tagFromRef(run.trigger.ref);
    try {
      if (!this.releaseStage) {
        throw new PipelineStepError('auth', 'No release credentials configured', { reason: 'AuthError' });
      }
      run.release = await this.releaseStage.publish({
        runId: run.id,
        tag,
        matrix: this.definition.matrix,
        signal,
      });
    } catch (err) {
      if (signal.aborted) return this.cancelRunInternal(run);
      run.error = toTypedError(err, 'host', { runId: run.id });
      log.error('Release stage failed', { tag, code: run.error.code, error: run.error.message });
      return this.finish(run, PipelineState.ReleaseFailed);
    }

    return this.finish(run, PipelineState.ReleaseSucceeded);
  }

  private async recordEntry(run: PipelineRun, result: BuildJobResult): Promise<void> {
    run.entries[result.platformId] = result;
    await this.store.runs.update(run.id, { entries: run.entries });

    const eventType = ENTRY_EVENT_FOR_STATUS[result.status];
    if (eventType) {
      await this.safePublishEntryEvent(run, result.platformId, eventType);
    }
    if (result.status === EntryStatus.Succeeded) {
      await this.safePublishEntryEvent(run, result.platformId, 'artifact.uploaded');
    }
  }

  /** Cancel in-flight runs for the same ref. */
  private async supersedeRunsFor(ref: string, newRunId: string): Promise<void> {
    for (const [runId, flight] of [...this.inFlight.entries()]) {
      if (flight.ref !== ref || runId === newRunId) continue;
      try {
        await this.cancelRun(runId, 'system', `Superseded by run ${newRunId}`);
      } catch (err) {
        this.log.warn('Failed to cancel superseded run', {
          runId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  // Publishing is observational: failures are logged and never change a run's outcome.
  private async safePublishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishRunEvent(run, eventType);
    } catch (err) {
      this.log.warn('Failed to publish run event', {
        runId: run.id,
        eventType,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async safePublishEntryEvent(run: PipelineRun, platformId: string, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishEntryEvent(run, platformId, eventType);
    } catch (err) {
      this.log.warn('Failed to publish entry event', {
        runId: run.id,
        platformId,
        eventType,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async transitionRun(run: PipelineRun, target: PipelineState): Promise<PipelineRun> {
    const result = transitionPipelineState(run.state, target);
    if (!result.success) {
      throw new OrchestratorError(result.error ?? runInvalidStateTransition(run.id, run.state, target));
    }
    run.state = target;
    run.updatedAt = new Date().toISOString();
    if (isTerminalPipelineState(target)) {
      run.exitCode = exitCodeForState(target);
    }
    await this.store.runs.update(run.id, run);

    const eventType = RUN_EVENT_FOR_STATE[target];
    if (eventType) {
      await this.safePublishRunEvent(run, eventType);
    }
    return run;
  }

  private async finish(run: PipelineRun, target: PipelineState): Promise<PipelineRun> {
    run.completedAt = new Date().toISOString();
    const finished = await this.transitionRun(run, target);
    this.log.info('Run finished', { runId: run.id, state: finished.state, exitCode: finished.exitCode });
    return finished;
  }

  /** Fail a run from whichever stage it was in. */
  private async finishFailed(run: PipelineRun, error: TypedError): Promise<PipelineRun> {
    run.error = error;
    if (run.state === PipelineState.Triggered) {
      run = await this.transitionRun(run, PipelineState.BuildRunning);
    }
    if (run.state === PipelineState.BuildSucceeded) {
      run = await this.transitionRun(run, PipelineState.ReleaseRunning);
    }
    return this.finish(
      run,
      run.state === PipelineState.ReleaseRunning ? PipelineState.ReleaseFailed : PipelineState.BuildFailed,
    );
  }

  private async cancelRunInternal(run: PipelineRun): Promise<PipelineRun> {
    const flight = this.inFlight.get(run.id);
    const now = new Date().toISOString();
    run.canceledBy = flight?.canceledBy ?? 'system';
    run.cancelReason = flight?.cancelReason;
    run.canceledAt = now;
    run.completedAt = now;
    run.error = runCanceledError(run.id, flight?.cancelReason);

    // Cancel all pending/running entries
    for (const [platformId, result] of Object.entries(run.entries)) {
      if (result.status === EntryStatus.Pending || result.status === EntryStatus.Running) {
        run.entries[platformId] = { ...result, status: EntryStatus.Canceled, completedAt: now };
      }
    }

    try {
      const canceled = await this.transitionRun(run, PipelineState.Canceled);
      this.log.info('Run canceled', { runId: run.id, canceledBy: run.canceledBy, reason: run.cancelReason });
      return canceled;
    } finally {
      this.inFlight.delete(run.id);
    }
  }
}

/** Orchestrator-specific error wrapper. */
export class OrchestratorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}

/** Run-level error naming every failed entry, led by the first failure. */
function buildFailureError(runId: string, results: BuildJobResult[]): TypedError {
  const failed = results.filter((r) => r.status !== EntryStatus.Succeeded);
  const first = failed[0];
  const failedEntries = failed.map((r) => ({
    platformId: r.platformId,
    status: r.status,
    code: r.error?.code,
    stepId: r.error?.stepId,
  }));
  return createTypedError({
    code: first?.error?.code ?? 'BUILD.FAILED',
    message: `Build failed for ${failed.map((r) => r.platformId).join(', ')}: ${first?.error?.message ?? 'entry did not succeed'}`,
    platformId: first?.platformId,
    stepId: first?.error?.stepId,
    runId,
    retryable: false,
    details: { failedEntries },
  });
}
