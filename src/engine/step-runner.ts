/**
 * Step runner: executes one build step of a matrix entry.
 *
 * Step execution is policy-driven: retries, timeouts, and backoff are
 * applied according to the definition's step policy. Only failures the
 * collaborator marks retryable (and timeouts) are attempted again.
 */

import { EntryStatus, BuildStepId, BuildStepResult } from '../domain/run';
import { BuildErrorKind, TypedError, stepTimeoutError, toTypedError } from '../domain/errors';
import { StepPolicy } from '../domain/pipeline';

/** One step invocation. */
export interface StepInvocation<T> {
  stepId: BuildStepId;
  /** Error kind recorded when the step fails. */
  kind: BuildErrorKind;
  runId: string;
  platformId: string;
  policy: StepPolicy;
  /** Run cancellation signal. */
  signal: AbortSignal;
  /** The step body. Receives a signal that also fires on timeout. */
  execute: (signal: AbortSignal) => Promise<T>;
}

/** A step's recorded result, carrying the step's return value when it succeeded. */
export type StepOutcome<T> =
  | { ok: true; result: BuildStepResult; value: T }
  | { ok: false; result: BuildStepResult; value?: undefined };

/** Execute a single step with retry and timeout policy. */
export async function runStep<T>(invocation: StepInvocation<T>): Promise<StepOutcome<T>> {
  const { stepId, kind, runId, platformId, policy, signal } = invocation;
  const startedAt = new Date().toISOString();
  const maxAttempts = Math.max(1, policy.maxAttempts);

  const finish = (status: EntryStatus, attempts: number, error?: TypedError): BuildStepResult => {
    const completedAt = new Date().toISOString();
    return {
      stepId,
      status,
      attempts,
      startedAt,
      completedAt,
      durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
      error,
    };
  };

  let lastError: TypedError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal.aborted) {
      return { ok: false, result: finish(EntryStatus.Canceled, attempt - 1) };
    }

    try {
      const value = await executeWithTimeout(invocation.execute, policy.stepTimeoutMs, signal);
      return { ok: true, result: finish(EntryStatus.Succeeded, attempt), value };
    } catch (err) {
      if (signal.aborted) {
        return { ok: false, result: finish(EntryStatus.Canceled, attempt) };
      }

      lastError =
        err instanceof TimeoutError
          ? { ...stepTimeoutError(stepId, policy.stepTimeoutMs, attempt, platformId), runId }
          : toTypedError(err, kind, { platformId, stepId, runId });
      lastError.details = { ...lastError.details, attempt, maxAttempts };

      if (!lastError.retryable) {
        return { ok: false, result: finish(EntryStatus.Failed, attempt, lastError) };
      }

      // Apply backoff before retry (except on last attempt)
      if (attempt < maxAttempts) {
        await sleep(computeBackoff(policy.backoffBaseMs, attempt), signal);
      }
    }
  }

  return { ok: false, result: finish(EntryStatus.Failed, maxAttempts, lastError) };
}

/**
 * Execute a function with a timeout. The function's signal fires when
 * the timeout elapses or the parent signal aborts. A timeout of 0 means
 * no timeout.
 */
async function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new TimeoutError(timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
    parent.removeEventListener('abort', onAbort);
  }
}

export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Step execution timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Exponential backoff: base, 2×base, 4×base, ... */
export function computeBackoff(baseMs: number, attempt: number): number {
  return baseMs * Math.pow(2, attempt - 1);
}

/** Sleep that resolves early when the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
