/**
 * Release domain model.
 *
 * The pipeline's only durable output: a tagged, publicly retrievable
 * bundle of the artifacts every matrix entry produced.
 */

/** One file attached to a release. */
export interface ReleaseFile {
  /** Asset name on the release host. */
  name: string;
  sizeBytes: number;
  /** sha256 of the uploaded contents. */
  contentHash: string;
  /** Download location on the release host, when reported. */
  url?: string;
}

export interface Release {
  tag: string;
  name: string;
  files: ReleaseFile[];
  /** Release page on the host. */
  url?: string;
  /** Host-side release identifier. */
  hostId?: string;
  createdAt: string;
}

/** Credentials handed explicitly to the release stage. */
export interface ReleaseCredentials {
  token: string;
}
