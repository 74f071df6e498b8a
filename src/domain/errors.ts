/**
 * Typed error model for machine-actionable error handling.
 *
 * Failures are recorded on runs and entries as typed records rather than
 * thrown exceptions, so a run report can name the failing entry and the
 * kind of failure without parsing messages.
 */

/** Failure kinds scoped to a single build matrix entry. */
export type BuildErrorKind = 'checkout' | 'provisioning' | 'dependency' | 'packaging' | 'upload';

/** Failure kinds scoped to the release stage (fatal to the whole run). */
export type ReleaseErrorKind = 'aggregation' | 'tag_conflict' | 'auth' | 'host';

export type PipelineErrorKind = BuildErrorKind | ReleaseErrorKind;

/** Error code per failure kind. */
export const ERROR_CODES: Record<PipelineErrorKind, string> = {
  checkout: 'BUILD.CHECKOUT',
  provisioning: 'BUILD.PROVISIONING',
  dependency: 'BUILD.DEPENDENCY',
  packaging: 'BUILD.PACKAGING',
  upload: 'BUILD.UPLOAD',
  aggregation: 'RELEASE.AGGREGATION',
  tag_conflict: 'RELEASE.TAG_CONFLICT',
  auth: 'RELEASE.AUTH',
  host: 'RELEASE.HOST',
};

/** Typed suggested fix. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded on runs, entries and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILD.PACKAGING"). */
  code: string;
  message: string;
  /** Matrix entry the failure belongs to, if entry-scoped. */
  platformId?: string;
  /** Step within the entry that failed. */
  stepId?: string;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  platformId?: string;
  stepId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    platformId: params.platformId,
    stepId: params.stepId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/**
 * Error thrown by external collaborators (git, runtime, installer,
 * packager, artifact store, release host). The step runner converts it
 * into a TypedError carrying the kind's code.
 */
export class PipelineStepError extends Error {
  public readonly kind: PipelineErrorKind;
  public readonly retryable: boolean;
  /** Collaborator-specific reason, e.g. "NotFound" or "NetworkError". */
  public readonly reason?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    kind: PipelineErrorKind,
    message: string,
    options: { retryable?: boolean; reason?: string; details?: Record<string, unknown> } = {},
  ) {
    super(message);
    this.name = 'PipelineStepError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    this.reason = options.reason;
    this.details = options.details;
  }

  get code(): string {
    return ERROR_CODES[this.kind];
  }
}

/** Convert any thrown value into a TypedError for the given failure kind. */
export function toTypedError(
  err: unknown,
  fallbackKind: PipelineErrorKind,
  context: { platformId?: string; stepId?: string; runId?: string } = {},
): TypedError {
  if (err instanceof PipelineStepError) {
    return createTypedError({
      code: err.code,
      message: err.message,
      ...context,
      retryable: err.retryable,
      details: { ...(err.reason ? { reason: err.reason } : {}), ...err.details },
      suggestedFixes: suggestedFixesFor(err.kind),
    });
  }
  return createTypedError({
    code: ERROR_CODES[fallbackKind],
    message: err instanceof Error ? err.message : String(err),
    ...context,
    retryable: false,
    suggestedFixes: suggestedFixesFor(fallbackKind),
  });
}

function suggestedFixesFor(kind: PipelineErrorKind): SuggestedFix[] {
  switch (kind) {
    case 'checkout':
      return [{ type: 'CHECK_REF', params: {}, description: 'Verify the ref exists on the source control host' }];
    case 'provisioning':
      return [{ type: 'CHECK_RUNTIME_VERSION', params: {}, description: 'Install the runtime version declared in the pipeline definition' }];
    case 'tag_conflict':
      return [{ type: 'DELETE_EXISTING_RELEASE', params: {}, description: 'Remove the existing release or push a new tag' }];
    case 'auth':
      return [{ type: 'CHECK_TOKEN', params: {}, description: 'Provide a release token with write access to releases' }];
    default:
      return [];
  }
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function stepTimeoutError(stepId: string, timeoutMs: number, attempt: number, platformId?: string): TypedError {
  return createTypedError({
    code: 'BUILD.TIMEOUT',
    message: `Step "${stepId}" timed out after ${timeoutMs}ms`,
    platformId,
    stepId,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function runInvalidStateTransition(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_STATE_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    retryable: false,
    details: { from, to },
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of the given secrets in a message with masked values. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
