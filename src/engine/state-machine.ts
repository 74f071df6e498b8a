/**
 * Pipeline and entry state machines.
 *
 * Enforces valid state transitions for runs and build entries,
 * producing typed errors on invalid transitions.
 */

import {
  EntryStatus,
  PipelineState,
  VALID_ENTRY_TRANSITIONS,
  VALID_PIPELINE_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Process exit codes reported for a finished run. */
export const EXIT_CODES = {
  success: 0,
  buildFailed: 1,
  releaseFailed: 2,
  canceled: 3,
  usage: 64,
} as const;

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a pipeline state transition. */
export function transitionPipelineState(
  current: PipelineState,
  target: PipelineState,
): TransitionResult<PipelineState> {
  const validTargets = VALID_PIPELINE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid pipeline state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt an entry state transition. */
export function transitionEntryStatus(
  current: EntryStatus,
  target: EntryStatus,
): TransitionResult<EntryStatus> {
  const validTargets = VALID_ENTRY_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'ENTRY.INVALID_TRANSITION',
        message: `Invalid entry state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a pipeline state is terminal. */
export function isTerminalPipelineState(state: PipelineState): boolean {
  return VALID_PIPELINE_TRANSITIONS[state].length === 0;
}

/** Check if an entry status is terminal. */
export function isTerminalEntryStatus(status: EntryStatus): boolean {
  return (
    status === EntryStatus.Succeeded ||
    status === EntryStatus.Failed ||
    status === EntryStatus.Canceled
  );
}

/** Map a terminal pipeline state to the process exit code. */
export function exitCodeForState(state: PipelineState): number {
  switch (state) {
    case PipelineState.Done:
    case PipelineState.ReleaseSucceeded:
    case PipelineState.Skipped:
      return EXIT_CODES.success;
    case PipelineState.BuildFailed:
      return EXIT_CODES.buildFailed;
    case PipelineState.ReleaseFailed:
      return EXIT_CODES.releaseFailed;
    case PipelineState.Canceled:
      return EXIT_CODES.canceled;
    default:
      throw new Error(`No exit code for non-terminal state "${state}"`);
  }
}
