/**
 * Artifact domain model.
 *
 * Artifacts are the binaries a build entry produces, stored under a key
 * unique to (run, artifact name) and referenced by storage pointers rather
 * than embedded payloads.
 */

/** Artifact storage pointer kinds. */
export type ArtifactPointerKind = 'file' | 'memory';

/** Storage pointer for artifact location. */
export interface ArtifactPointer {
  kind: ArtifactPointerKind;
  uri: string;
}

/** A stored build artifact. */
export interface Artifact {
  id: string;
  runId: string;
  /** Matrix entry that produced it. */
  platformId: string;
  /** Unique key within the run; also the release asset name. */
  name: string;
  pointer: ArtifactPointer;
  sizeBytes: number;
  /** sha256 of the file contents. */
  contentHash: string;
  createdAt: string;
}
