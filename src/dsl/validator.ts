/**
 * Pipeline definition validator.
 *
 * Checks a resolved definition for the constraints the orchestrator relies
 * on: a non-empty matrix with distinct platform ids and artifact keys,
 * sane retry policy, and at least one release tag pattern.
 */

import { SuggestedFix, TypedError, createTypedError } from '../domain/errors';
import { PipelineDefinition } from '../domain/pipeline';
import { SCHEMA_CONSTRAINTS, SUPPORTED_RUNTIMES } from './schema';
import { CURRENT_PIPELINE_SPEC_VERSION, isSupportedVersion } from './version';

/** A single path segment: no separators, no leading dot. */
const FILE_NAME_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

/** Validate a resolved pipeline definition. */
export function validatePipelineDefinition(definition: PipelineDefinition): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  validateHeader(definition, errors);
  validateTriggers(definition, errors, warnings);
  validateBuildSettings(definition, errors, warnings);
  validateMatrix(definition, errors);
  validatePolicy(definition, errors);

  return { valid: errors.length === 0, errors, warnings };
}

function invalid(code: string, message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: `VALIDATION.${code}`,
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

function validateHeader(definition: PipelineDefinition, errors: TypedError[]): void {
  if (!isSupportedVersion(definition.specVersion)) {
    errors.push(
      invalid('UNSUPPORTED_VERSION', `Unsupported pipeline spec version: ${definition.specVersion}`, undefined, [
        {
          type: 'USE_VERSION',
          params: { specVersion: CURRENT_PIPELINE_SPEC_VERSION },
          description: `Use supported version ${CURRENT_PIPELINE_SPEC_VERSION}`,
        },
      ]),
    );
  }

  if (definition.name.trim().length === 0) {
    errors.push(invalid('REQUIRED_FIELD', 'Pipeline name must not be empty', { field: 'name' }));
  } else if (definition.name.length > SCHEMA_CONSTRAINTS.maxNameLength) {
    errors.push(invalid('NAME_TOO_LONG', `Pipeline name exceeds ${SCHEMA_CONSTRAINTS.maxNameLength} characters`));
  }
}

function validateTriggers(definition: PipelineDefinition, errors: TypedError[], warnings: string[]): void {
  const { triggers, release } = definition;
  if (triggers.branches.length === 0 && triggers.tags.length === 0) {
    errors.push(invalid('NO_TRIGGERS', 'At least one branch or tag trigger filter is required'));
  }

  if (release.tagPatterns.length === 0) {
    errors.push(invalid('NO_RELEASE_TAGS', 'release.tagPatterns must contain at least one pattern'));
  }

  for (const pattern of [...triggers.branches, ...triggers.tags, ...release.tagPatterns]) {
    if (pattern.trim().length === 0) {
      errors.push(invalid('EMPTY_PATTERN', 'Trigger and tag patterns must not be empty'));
      break;
    }
  }

  if (triggers.tags.length === 0) {
    warnings.push('No tag triggers are configured; releases can only be started through the CLI');
  }
}

function validateBuildSettings(definition: PipelineDefinition, errors: TypedError[], warnings: string[]): void {
  const { runtime, dependencies, packaging } = definition;

  if (runtime.version.trim().length === 0) {
    errors.push(invalid('REQUIRED_FIELD', 'runtime.version must not be empty', { field: 'runtime.version' }));
  }
  if (!SUPPORTED_RUNTIMES.some((name) => name === runtime.name)) {
    warnings.push(`Runtime "${runtime.name}" has no bundled provisioner; supply a custom one`);
  }
  if (dependencies.manifest.trim().length === 0) {
    errors.push(invalid('REQUIRED_FIELD', 'dependencies.manifest must not be empty', { field: 'dependencies.manifest' }));
  }
  if (packaging.entryPoint.trim().length === 0) {
    errors.push(invalid('REQUIRED_FIELD', 'packaging.entryPoint must not be empty', { field: 'packaging.entryPoint' }));
  }
  if (!FILE_NAME_PATTERN.test(packaging.binaryName)) {
    errors.push(
      invalid('INVALID_BINARY_NAME', `Binary name "${packaging.binaryName}" must be a plain file name`, {
        binaryName: packaging.binaryName,
      }),
    );
  }
}

function validateMatrix(definition: PipelineDefinition, errors: TypedError[]): void {
  const { matrix } = definition;

  if (matrix.length === 0) {
    errors.push(invalid('EMPTY_MATRIX', 'The build matrix must have at least one entry'));
    return;
  }
  if (matrix.length > SCHEMA_CONSTRAINTS.maxMatrixEntries) {
    errors.push(invalid('MATRIX_TOO_LARGE', `The build matrix exceeds ${SCHEMA_CONSTRAINTS.maxMatrixEntries} entries`));
  }

  const platformIds = new Set<string>();
  const artifactNames = new Set<string>();
  for (const entry of matrix) {
    if (!SCHEMA_CONSTRAINTS.platformIdPattern.test(entry.platformId)) {
      errors.push(
        invalid('INVALID_PLATFORM_ID', `Invalid platform id "${entry.platformId}"`, { platformId: entry.platformId }),
      );
    }
    if (platformIds.has(entry.platformId)) {
      errors.push(
        invalid('DUPLICATE_PLATFORM', `Duplicate platform id: ${entry.platformId}`, { platformId: entry.platformId }),
      );
    }
    platformIds.add(entry.platformId);

    // Artifact names key both the artifact store and the release assets.
    if (artifactNames.has(entry.artifactName)) {
      errors.push(
        invalid(
          'DUPLICATE_ARTIFACT_NAME',
          `Artifact name "${entry.artifactName}" is used by more than one matrix entry`,
          { artifactName: entry.artifactName, platformId: entry.platformId },
          [{ type: 'RENAME_ARTIFACT', params: { platformId: entry.platformId }, description: 'Give every entry a distinct artifactName' }],
        ),
      );
    }
    artifactNames.add(entry.artifactName);

    if (entry.executable.trim().length === 0 || entry.artifactName.trim().length === 0) {
      errors.push(
        invalid('REQUIRED_FIELD', `Matrix entry "${entry.platformId}" needs an executable and an artifactName`, {
          platformId: entry.platformId,
        }),
      );
    } else if (!FILE_NAME_PATTERN.test(entry.artifactName) || !FILE_NAME_PATTERN.test(entry.executable)) {
      errors.push(
        invalid('INVALID_FILE_NAME', `Matrix entry "${entry.platformId}" names must be plain file names`, {
          platformId: entry.platformId,
          executable: entry.executable,
          artifactName: entry.artifactName,
        }),
      );
    }
  }
}

function validatePolicy(definition: PipelineDefinition, errors: TypedError[]): void {
  const { policy } = definition;
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1 || policy.maxAttempts > SCHEMA_CONSTRAINTS.maxAttempts) {
    errors.push(
      invalid('INVALID_POLICY', `policy.maxAttempts must be an integer between 1 and ${SCHEMA_CONSTRAINTS.maxAttempts}`, {
        maxAttempts: policy.maxAttempts,
      }),
    );
  }
  if (policy.backoffBaseMs < 0 || policy.backoffBaseMs > SCHEMA_CONSTRAINTS.maxBackoffBaseMs) {
    errors.push(
      invalid('INVALID_POLICY', `policy.backoffBaseMs must be between 0 and ${SCHEMA_CONSTRAINTS.maxBackoffBaseMs}`, {
        backoffBaseMs: policy.backoffBaseMs,
      }),
    );
  }
  if (policy.stepTimeoutMs < 0) {
    errors.push(invalid('INVALID_POLICY', 'policy.stepTimeoutMs must not be negative', { stepTimeoutMs: policy.stepTimeoutMs }));
  }
}
