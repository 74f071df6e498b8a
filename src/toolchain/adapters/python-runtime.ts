/**
 * Python runtime provisioner.
 *
 * Locates an interpreter whose version matches the requested one by
 * probing candidate commands (`python3.9`, `python3`, `python`, and on
 * windows the `py -3.9` launcher). A version "3.9" matches any 3.9.x.
 *
 * Builds are host-native: an entry whose platform is not the host's
 * operating system fails here, before anything is installed or packaged.
 */

import { PipelineStepError } from '../../domain/errors';
import { RuntimeSpec } from '../../domain/pipeline';
import { CommandNotFoundError, CommandRunner, spawnCommand } from '../command-runner';
import { ProvisionedRuntime, RuntimeProvisioner, WorkspaceContext } from '../index';

interface Candidate {
  command: string;
  args: string[];
}

/** Candidate interpreter invocations for a version, most specific first. */
export function pythonCandidates(version: string, platform: NodeJS.Platform = process.platform): Candidate[] {
  const candidates: Candidate[] = [];
  if (platform === 'win32') {
    candidates.push({ command: 'py', args: [`-${version}`] });
  }
  candidates.push({ command: `python${version}`, args: [] });
  candidates.push({ command: 'python3', args: [] });
  candidates.push({ command: 'python', args: [] });
  return candidates;
}

/** Operating system a matrix platform id targets (`macos` is `darwin`). */
export function hostPlatformFor(platformId: string): NodeJS.Platform | undefined {
  const id = platformId.toLowerCase();
  if (id.startsWith('linux') || id.startsWith('ubuntu')) return 'linux';
  if (id.startsWith('win')) return 'win32';
  if (id.startsWith('mac') || id.startsWith('darwin') || id.startsWith('osx')) return 'darwin';
  return undefined;
}

/** Parse `Python 3.9.18` into `3.9.18`. */
export function parsePythonVersion(output: string): string | null {
  const match = output.match(/Python\s+(\d+(?:\.\d+)*)/i);
  return match ? match[1] : null;
}

/** Whether an installed version satisfies a requested version prefix. */
export function versionMatches(installed: string, requested: string): boolean {
  const have = installed.split('.');
  const want = requested.split('.');
  return want.every((part, i) => have[i] === part);
}

export class PythonRuntimeProvisioner implements RuntimeProvisioner {
  constructor(
    private readonly run: CommandRunner = spawnCommand,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  async provision(runtime: RuntimeSpec, ctx: WorkspaceContext): Promise<ProvisionedRuntime> {
    const target = hostPlatformFor(ctx.platformId);
    if (target !== this.platform) {
      throw new PipelineStepError(
        'provisioning',
        target
          ? `Platform "${ctx.platformId}" targets ${target}; this host is ${this.platform}`
          : `Platform "${ctx.platformId}" does not name an operating system`,
        { reason: 'PlatformUnavailable', details: { platformId: ctx.platformId, target, host: this.platform } },
      );
    }

    if (runtime.name !== 'python') {
      throw new PipelineStepError('provisioning', `No provisioner for runtime "${runtime.name}"`, {
        reason: 'VersionUnavailable',
      });
    }

    const seen: string[] = [];
    for (const candidate of pythonCandidates(runtime.version, this.platform)) {
      let output: string;
      try {
        const result = await this.run(candidate.command, [...candidate.args, '--version'], {
          cwd: ctx.dir,
          signal: ctx.signal,
        });
        if (result.exitCode !== 0) continue;
        output = `${result.stdout}\n${result.stderr}`;
      } catch (err) {
        if (err instanceof CommandNotFoundError) continue;
        throw err;
      }

      const installed = parsePythonVersion(output);
      if (!installed) continue;
      seen.push(`${candidate.command}=${installed}`);
      if (versionMatches(installed, runtime.version)) {
        ctx.logger.info('Runtime provisioned', { runtime: runtime.name, version: installed, command: candidate.command });
        return { name: runtime.name, version: installed, command: candidate.command, args: candidate.args };
      }
    }

    throw new PipelineStepError('provisioning', `Python ${runtime.version} is not available`, {
      reason: 'VersionUnavailable',
      details: { requested: runtime.version, found: seen },
    });
  }
}
