/**
 * Pipeline definition format versioning.
 *
 * Definition documents declare the format version they were written for.
 */

/** Supported definition format versions. */
export const PIPELINE_SPEC_VERSIONS = ['1.0.0'] as const;
export type PipelineSpecVersion = (typeof PIPELINE_SPEC_VERSIONS)[number];

/** The current default definition format version. */
export const CURRENT_PIPELINE_SPEC_VERSION: PipelineSpecVersion = '1.0.0';

/** Check if a version string is a supported definition format version. */
export function isSupportedVersion(version: string): version is PipelineSpecVersion {
  return PIPELINE_SPEC_VERSIONS.some((v) => v === version);
}
