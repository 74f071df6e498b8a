/**
 * Release stage: aggregates a run's artifacts into one release.
 *
 * Runs at most once per run, after the build barrier, and only for a
 * release trigger whose entries all succeeded. Credentials are handed to
 * the stage when it is constructed; nothing here reads the environment.
 */

import { PipelineStepError } from '../domain/errors';
import { MatrixEntry } from '../domain/pipeline';
import { Release, ReleaseCredentials } from '../domain/release';
import { Logger, logger as rootLogger } from '../logger';
import { ArtifactStore } from '../storage/store';
import { ReleaseAsset, ReleaseHost } from '../toolchain';

export interface ReleaseStageOptions {
  releaseHost: ReleaseHost;
  artifacts: ArtifactStore;
  credentials: ReleaseCredentials;
  /**
   * Abort when an expected artifact is missing. When false, publish
   * whatever was retrieved and log a warning per missing file.
   */
  requireAllArtifacts?: boolean;
  logger?: Logger;
}

export interface ReleaseRequest {
  runId: string;
  /** Tag name (without `refs/tags/`). */
  tag: string;
  /** Entries whose artifacts the release must carry. */
  matrix: MatrixEntry[];
  signal?: AbortSignal;
}

export class ReleaseStage {
  private readonly requireAllArtifacts: boolean;
  private readonly log: Logger;

  constructor(private readonly options: ReleaseStageOptions) {
    this.requireAllArtifacts = options.requireAllArtifacts ?? true;
    this.log = (options.logger ?? rootLogger).child({ module: 'release-stage' });
  }

  /** Collect the run's artifacts and publish them under the tag. */
  async publish(request: ReleaseRequest): Promise<Release> {
    const { runId, tag, signal } = request;
    const assets = await this.collectAssets(request);

    this.log.info('Publishing release', { runId, tag, files: assets.map((a) => a.name) });
    const release = await this.options.releaseHost.createRelease(
      { tag, name: tag, assets, signal },
      this.options.credentials,
    );
    this.log.info('Release published', { runId, tag, url: release.url });
    return release;
  }

  private async collectAssets(request: ReleaseRequest): Promise<ReleaseAsset[]> {
    const stored = await this.options.artifacts.getAll(request.runId);
    const byName = new Map(stored.map((artifact) => [artifact.name, artifact]));

    const missing = request.matrix
      .map((entry) => entry.artifactName)
      .filter((name) => !byName.has(name));

    if (missing.length > 0) {
      if (this.requireAllArtifacts) {
        throw new PipelineStepError('aggregation', `Missing artifacts for release ${request.tag}: ${missing.join(', ')}`, {
          reason: 'MissingArtifact',
          details: { missing },
        });
      }
      for (const name of missing) {
        this.log.warn('Artifact missing; releasing without it', { runId: request.runId, artifactName: name });
      }
    }

    const assets: ReleaseAsset[] = [];
    for (const entry of request.matrix) {
      const artifact = byName.get(entry.artifactName);
      if (!artifact) continue;
      assets.push({
        name: artifact.name,
        data: await this.options.artifacts.read(artifact),
        contentHash: artifact.contentHash,
      });
    }

    if (assets.length === 0) {
      throw new PipelineStepError('aggregation', `No artifacts to release for ${request.tag}`, {
        reason: 'MissingArtifact',
      });
    }
    return assets;
  }
}
