/**
 * Pipeline run domain model.
 *
 * A single execution of a pipeline definition for one Trigger Event,
 * holding one Build Job Result per matrix entry and the Release it
 * produced, if any.
 */

import { TypedError } from './errors';
import { Release } from './release';
import { TriggerEvent } from './trigger';

/** Pipeline run lifecycle states. */
export enum PipelineState {
  Idle = 'idle',
  Triggered = 'triggered',
  /** The event did not pass the definition's trigger filters. */
  Skipped = 'skipped',
  BuildRunning = 'build_running',
  BuildSucceeded = 'build_succeeded',
  BuildFailed = 'build_failed',
  ReleaseRunning = 'release_running',
  ReleaseSucceeded = 'release_succeeded',
  ReleaseFailed = 'release_failed',
  Done = 'done',
  Canceled = 'canceled',
}

/** Build Job Result states. */
export enum EntryStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Valid state transitions for pipeline runs. */
export const VALID_PIPELINE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  [PipelineState.Idle]: [PipelineState.Triggered, PipelineState.Skipped],
  [PipelineState.Triggered]: [PipelineState.BuildRunning, PipelineState.Canceled],
  [PipelineState.Skipped]: [],
  [PipelineState.BuildRunning]: [
    PipelineState.BuildSucceeded,
    PipelineState.BuildFailed,
    PipelineState.Canceled,
  ],
  [PipelineState.BuildSucceeded]: [PipelineState.ReleaseRunning, PipelineState.Done, PipelineState.Canceled],
  [PipelineState.BuildFailed]: [],
  [PipelineState.ReleaseRunning]: [
    PipelineState.ReleaseSucceeded,
    PipelineState.ReleaseFailed,
    PipelineState.Canceled,
  ],
  [PipelineState.ReleaseSucceeded]: [],
  [PipelineState.ReleaseFailed]: [],
  [PipelineState.Done]: [],
  [PipelineState.Canceled]: [],
};

/** Valid state transitions for Build Job Results. */
export const VALID_ENTRY_TRANSITIONS: Record<EntryStatus, EntryStatus[]> = {
  [EntryStatus.Pending]: [EntryStatus.Running, EntryStatus.Canceled],
  [EntryStatus.Running]: [EntryStatus.Succeeded, EntryStatus.Failed, EntryStatus.Canceled],
  [EntryStatus.Succeeded]: [],
  [EntryStatus.Failed]: [],
  [EntryStatus.Canceled]: [],
};

/** Named steps of a build entry, in execution order. */
export type BuildStepId = 'checkout' | 'provision' | 'install' | 'package' | 'upload';

export interface BuildStepResult {
  stepId: BuildStepId;
  status: EntryStatus;
  attempts: number;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

/** Outcome of one build matrix entry. */
export interface BuildJobResult {
  platformId: string;
  artifactName: string;
  status: EntryStatus;
  /** Artifact store location of the entry's executable, once uploaded. */
  artifactPath?: string;
  steps: BuildStepResult[];
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

/** A single execution of a pipeline definition. */
export interface PipelineRun {
  id: string;
  /** Normalized trigger event. */
  trigger: TriggerEvent;
  definitionName: string;
  state: PipelineState;
  /** Whether the trigger's ref unlocks the release stage. */
  releaseEligible: boolean;
  /** Build Job Results indexed by platform id. */
  entries: Record<string, BuildJobResult>;
  release?: Release;
  /** Run-level error for build, release or cancellation failures. */
  error?: TypedError;
  exitCode?: number;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  canceledBy?: string;
  canceledAt?: string;
  cancelReason?: string;
}
