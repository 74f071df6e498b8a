/**
 * Git source control host.
 *
 * Checks out the exact tree at a ref into the entry's workspace: an empty
 * repository is initialised, the single ref is fetched shallowly from the
 * configured remote and FETCH_HEAD is checked out detached. This works the
 * same for branch and tag refs, and for remote URLs and local paths.
 */

import { mkdir } from 'fs/promises';
import simpleGit, { SimpleGit, SimpleGitOptions } from 'simple-git';
import { PipelineStepError } from '../../domain/errors';
import { CheckoutResult, SourceControlHost, WorkspaceContext } from '../index';

export interface GitSourceOptions {
  /** Remote URL or local path to fetch from. */
  repoUrl: string;
  /** Fetch depth; 0 fetches full history. */
  depth?: number;
}

const MISSING_REF_PATTERNS = [/couldn't find remote ref/i, /not our ref/i, /unknown revision/i, /no such ref/i];

export class GitSourceControlHost implements SourceControlHost {
  private readonly depth: number;

  constructor(private readonly options: GitSourceOptions) {
    this.depth = options.depth ?? 1;
  }

  private getGit(dir: string, signal: AbortSignal): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: dir,
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: true,
      abort: signal,
    };
    return simpleGit(options);
  }

  async checkout(ref: string, ctx: WorkspaceContext): Promise<CheckoutResult> {
    await mkdir(ctx.dir, { recursive: true });
    const git = this.getGit(ctx.dir, ctx.signal);

    try {
      await git.init();
      const fetchArgs = ['fetch', '--no-tags'];
      if (this.depth > 0) fetchArgs.push('--depth', String(this.depth));
      fetchArgs.push(this.options.repoUrl, ref);
      await git.raw(fetchArgs);
      await git.raw(['checkout', '--detach', '--force', 'FETCH_HEAD']);
      const commit = await git.revparse(['HEAD']);
      ctx.logger.info('Checked out ref', { ref, commit });
      return { commit };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const notFound = MISSING_REF_PATTERNS.some((pattern) => pattern.test(message));
      throw new PipelineStepError('checkout', `Checkout of ${ref} failed: ${message}`, {
        reason: notFound ? 'NotFound' : 'GitError',
        details: { ref },
      });
    }
  }
}
