/**
 * PyInstaller packager.
 *
 * Runs `pyinstaller --onefile --name <binary> <entryPoint>` in the
 * workspace and returns the path of the expected executable. A zero exit
 * code without the expected file in the dist directory is still a
 * packaging failure.
 */

import { stat } from 'fs/promises';
import path from 'path';
import { PipelineStepError } from '../../domain/errors';
import { MatrixEntry, PackagingSpec } from '../../domain/pipeline';
import { CommandRunner, outputTail, spawnCommand } from '../command-runner';
import { Packager, ProvisionedRuntime, WorkspaceContext } from '../index';

/** Arguments passed to PyInstaller for a packaging spec. */
export function pyinstallerArgs(packaging: PackagingSpec): string[] {
  return [
    '-m',
    'PyInstaller',
    '--onefile',
    '--noconfirm',
    '--name',
    packaging.binaryName,
    '--distpath',
    packaging.distDir,
    packaging.entryPoint,
  ];
}

export class PyInstallerPackager implements Packager {
  constructor(private readonly run: CommandRunner = spawnCommand) {}

  async package(
    packaging: PackagingSpec,
    entry: MatrixEntry,
    runtime: ProvisionedRuntime,
    ctx: WorkspaceContext,
  ): Promise<string> {
    const result = await this.run(runtime.command, [...runtime.args, ...pyinstallerArgs(packaging)], {
      cwd: ctx.dir,
      signal: ctx.signal,
    });
    if (result.exitCode !== 0) {
      throw new PipelineStepError('packaging', `PyInstaller failed (exit ${result.exitCode}): ${outputTail(result)}`, {
        reason: 'BuildError',
        details: { exitCode: result.exitCode },
      });
    }

    const output = path.join(ctx.dir, packaging.distDir, entry.executable);
    const produced = await stat(output).then(
      (info) => info.isFile(),
      () => false,
    );
    if (!produced) {
      throw new PipelineStepError('packaging', `Expected executable ${path.join(packaging.distDir, entry.executable)} was not produced`, {
        reason: 'BuildError',
        details: { expected: entry.executable },
      });
    }
    ctx.logger.info('Executable packaged', { executable: entry.executable });
    return output;
  }
}
