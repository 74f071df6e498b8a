/**
 * pip dependency installer.
 *
 * Mirrors the install sequence of the hosted workflow: bootstrap and
 * upgrade pip, install the build-time packages, then the manifest.
 * Failures are classified from pip's output so that network errors are
 * retryable and resolution errors are not.
 */

import { access } from 'fs/promises';
import path from 'path';
import { PipelineStepError } from '../../domain/errors';
import { DependencySpec } from '../../domain/pipeline';
import { CommandRunner, CommandResult, outputTail, spawnCommand } from '../command-runner';
import { DependencyInstaller, ProvisionedRuntime, WorkspaceContext } from '../index';

const NETWORK_ERROR_PATTERNS = [
  /Could not fetch URL/i,
  /Connection (?:refused|reset|aborted)/i,
  /Max retries exceeded/i,
  /Temporary failure in name resolution/i,
  /NewConnectionError/i,
  /ReadTimeoutError/i,
  /Network is unreachable/i,
];

/** Classify a failed pip invocation. */
export function classifyPipFailure(result: CommandResult): 'NetworkError' | 'ResolutionError' {
  const output = `${result.stdout}\n${result.stderr}`;
  return NETWORK_ERROR_PATTERNS.some((pattern) => pattern.test(output)) ? 'NetworkError' : 'ResolutionError';
}

export class PipDependencyInstaller implements DependencyInstaller {
  constructor(private readonly run: CommandRunner = spawnCommand) {}

  async install(dependencies: DependencySpec, runtime: ProvisionedRuntime, ctx: WorkspaceContext): Promise<void> {
    const manifestPath = path.join(ctx.dir, dependencies.manifest);
    try {
      await access(manifestPath);
    } catch {
      throw new PipelineStepError('dependency', `Dependency manifest not found: ${dependencies.manifest}`, {
        reason: 'ResolutionError',
        details: { manifest: dependencies.manifest },
      });
    }

    if (dependencies.upgradeInstaller) {
      await this.python(runtime, ['-m', 'ensurepip'], ctx, 'bootstrap pip');
      await this.python(runtime, ['-m', 'pip', 'install', '--upgrade', 'pip'], ctx, 'upgrade pip');
    }
    if (dependencies.preinstall.length > 0) {
      await this.python(runtime, ['-m', 'pip', 'install', ...dependencies.preinstall], ctx, 'install build requirements');
    }
    await this.python(runtime, ['-m', 'pip', 'install', '-r', dependencies.manifest], ctx, 'install manifest');
  }

  private async python(
    runtime: ProvisionedRuntime,
    args: string[],
    ctx: WorkspaceContext,
    action: string,
  ): Promise<void> {
    ctx.logger.debug('Running installer', { action, args });
    const result = await this.run(runtime.command, [...runtime.args, ...args], { cwd: ctx.dir, signal: ctx.signal });
    if (result.exitCode === 0) return;

    const reason = classifyPipFailure(result);
    throw new PipelineStepError('dependency', `Failed to ${action} (exit ${result.exitCode}): ${outputTail(result)}`, {
      reason,
      retryable: reason === 'NetworkError',
      details: { action, exitCode: result.exitCode },
    });
  }
}
