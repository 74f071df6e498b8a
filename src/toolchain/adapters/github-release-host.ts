/**
 * GitHub Releases host.
 *
 * Publishing is made atomic from the outside: the release is created as
 * a draft, every asset is uploaded to it, and only then is it published.
 * If anything fails after the draft exists, the draft is deleted, so a
 * failed or canceled release never leaves a public, partially populated
 * release.
 *
 * Usage:
 *   const host = new GitHubReleaseHost({ repository: 'owner/name' });
 *   await host.createRelease({ tag: 'v1.0.0', name: 'v1.0.0', assets }, { token });
 */

import { PipelineStepError, maskSecretsInMessage } from '../../domain/errors';
import { Release, ReleaseCredentials, ReleaseFile } from '../../domain/release';
import { logger } from '../../logger';
import { CreateReleaseInput, ReleaseAsset, ReleaseHost } from '../index';

export const GITHUB_API_URL = 'https://api.github.com';
export const GITHUB_UPLOAD_URL = 'https://uploads.github.com';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface GitHubReleaseHostOptions {
  /** `owner/name`. */
  repository: string;
  apiUrl?: string;
  uploadUrl?: string;
  /** Injectable for tests. */
  fetchFn?: FetchFn;
}

interface DraftRelease {
  id: number;
  htmlUrl?: string;
}

const log = logger.child({ module: 'github-release-host' });

function readField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  const record: Record<string, unknown> = { ...body };
  return record[key];
}

function readString(body: unknown, key: string): string | undefined {
  const value = readField(body, key);
  return typeof value === 'string' ? value : undefined;
}

/** Whether a 422 response reports that the release already exists. */
function isAlreadyExists(body: unknown): boolean {
  const errors = readField(body, 'errors');
  return Array.isArray(errors) && errors.some((e: unknown) => readString(e, 'code') === 'already_exists');
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class GitHubReleaseHost implements ReleaseHost {
  private readonly apiUrl: string;
  private readonly uploadUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: GitHubReleaseHostOptions) {
    this.apiUrl = (options.apiUrl ?? GITHUB_API_URL).replace(/\/+$/, '');
    this.uploadUrl = (options.uploadUrl ?? GITHUB_UPLOAD_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  async createRelease(input: CreateReleaseInput, credentials: ReleaseCredentials): Promise<Release> {
    if (!credentials.token) {
      throw new PipelineStepError('auth', 'No release token provided', { reason: 'AuthError' });
    }

    await this.assertTagFree(input.tag, credentials, input.signal);
    const draft = await this.createDraft(input, credentials);

    try {
      const files: ReleaseFile[] = [];
      for (const asset of input.assets) {
        files.push(await this.uploadAsset(draft.id, asset, credentials, input.signal));
      }
      if (input.signal?.aborted) {
        throw new PipelineStepError('host', `Release ${input.tag} canceled before publishing`, { reason: 'Canceled' });
      }
      const published = await this.request(
        'PATCH',
        `${this.repoUrl()}/releases/${draft.id}`,
        credentials,
        { json: { draft: false } },
      );
      this.assertOk(published.status, published.body, 'publish release', credentials);
      return {
        tag: input.tag,
        name: input.name,
        files,
        url: readString(published.body, 'html_url') ?? draft.htmlUrl,
        hostId: String(draft.id),
        createdAt: new Date().toISOString(),
      };
    } catch (err) {
      await this.deleteDraft(draft.id, credentials);
      throw err;
    }
  }

  private repoUrl(): string {
    return `${this.apiUrl}/repos/${this.options.repository}`;
  }

  private async assertTagFree(tag: string, credentials: ReleaseCredentials, signal?: AbortSignal): Promise<void> {
    const existing = await this.request(
      'GET',
      `${this.repoUrl()}/releases/tags/${encodeURIComponent(tag)}`,
      credentials,
      undefined,
      signal,
    );
    if (existing.status === 404) return;
    if (existing.status === 200) {
      throw new PipelineStepError('tag_conflict', `A release for tag ${tag} already exists`, {
        reason: 'TagConflict',
        details: { tag, url: readString(existing.body, 'html_url') },
      });
    }
    this.assertOk(existing.status, existing.body, 'look up existing release', credentials);
  }

  private async createDraft(input: CreateReleaseInput, credentials: ReleaseCredentials): Promise<DraftRelease> {
    const created = await this.request(
      'POST',
      `${this.repoUrl()}/releases`,
      credentials,
      { json: { tag_name: input.tag, name: input.name, draft: true } },
      input.signal,
    );
    if (created.status === 422 && isAlreadyExists(created.body)) {
      throw new PipelineStepError('tag_conflict', `A release for tag ${input.tag} already exists`, {
        reason: 'TagConflict',
        details: { tag: input.tag },
      });
    }
    this.assertOk(created.status, created.body, 'create release', credentials);

    const id = readField(created.body, 'id');
    if (typeof id !== 'number') {
      throw new PipelineStepError('host', 'Release host response did not include a release id', { reason: 'HostError' });
    }
    return { id, htmlUrl: readString(created.body, 'html_url') };
  }

  private async uploadAsset(
    releaseId: number,
    asset: ReleaseAsset,
    credentials: ReleaseCredentials,
    signal?: AbortSignal,
  ): Promise<ReleaseFile> {
    const url = `${this.uploadUrl}/repos/${this.options.repository}/releases/${releaseId}/assets?name=${encodeURIComponent(asset.name)}`;
    const uploaded = await this.request('POST', url, credentials, { binary: asset.data }, signal);
    this.assertOk(uploaded.status, uploaded.body, `upload ${asset.name}`, credentials);
    return {
      name: asset.name,
      sizeBytes: asset.data.length,
      contentHash: asset.contentHash,
      url: readString(uploaded.body, 'browser_download_url'),
    };
  }

  private async deleteDraft(releaseId: number, credentials: ReleaseCredentials): Promise<void> {
    try {
      const deleted = await this.request('DELETE', `${this.repoUrl()}/releases/${releaseId}`, credentials);
      if (deleted.status >= 300 && deleted.status !== 404) {
        log.error('Failed to delete draft release; manual cleanup required', { releaseId, status: deleted.status });
      }
    } catch (err) {
      log.error('Failed to delete draft release; manual cleanup required', {
        releaseId,
        error: maskSecretsInMessage(err instanceof Error ? err.message : String(err), [credentials.token]),
      });
    }
  }

  private assertOk(status: number, body: unknown, action: string, credentials: ReleaseCredentials): void {
    if (status >= 200 && status < 300) return;
    const detail = maskSecretsInMessage(readString(body, 'message') ?? (typeof body === 'string' ? body : ''), [
      credentials.token,
    ]);
    const message = `Failed to ${action}: HTTP ${status}${detail ? ` ${detail}` : ''}`;
    if (status === 401 || status === 403) {
      throw new PipelineStepError('auth', message, { reason: 'AuthError', details: { status } });
    }
    throw new PipelineStepError('host', message, {
      reason: 'HostError',
      retryable: status === 429 || status >= 500,
      details: { status },
    });
  }

  private async request(
    method: string,
    url: string,
    credentials: ReleaseCredentials,
    body?: { json: unknown } | { binary: Buffer },
    signal?: AbortSignal,
  ): Promise<{ status: number; body: unknown }> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${credentials.token}`,
      'User-Agent': 'relay-ci',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    const init: RequestInit = { method, headers, signal };
    if (body && 'json' in body) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body.json);
    } else if (body) {
      headers['Content-Type'] = 'application/octet-stream';
      init.body = body.binary;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (err) {
      if (signal?.aborted) {
        throw new PipelineStepError('host', `Release request canceled: ${method} ${url}`, { reason: 'Canceled' });
      }
      throw new PipelineStepError(
        'host',
        `Release host unreachable: ${maskSecretsInMessage(err instanceof Error ? err.message : String(err), [credentials.token])}`,
        { reason: 'NetworkError', retryable: true },
      );
    }
    return { status: response.status, body: await readJson(response) };
  }
}
