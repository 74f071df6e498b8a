/**
 * Bundled toolchain adapters.
 *
 * Quick start:
 *   const toolchain = createDefaultToolchain({ repoUrl: process.cwd() });
 */

import { CommandRunner, spawnCommand } from '../command-runner';
import { Toolchain } from '../index';
import { GitSourceControlHost } from './git-source';
import { PipDependencyInstaller } from './pip-installer';
import { PyInstallerPackager } from './pyinstaller-packager';
import { PythonRuntimeProvisioner } from './python-runtime';

export { GitSourceControlHost } from './git-source';
export type { GitSourceOptions } from './git-source';
export { PipDependencyInstaller, classifyPipFailure } from './pip-installer';
export { PyInstallerPackager, pyinstallerArgs } from './pyinstaller-packager';
export {
  PythonRuntimeProvisioner,
  hostPlatformFor,
  parsePythonVersion,
  pythonCandidates,
  versionMatches,
} from './python-runtime';
export { GitHubReleaseHost, GITHUB_API_URL, GITHUB_UPLOAD_URL } from './github-release-host';
export type { FetchFn, GitHubReleaseHostOptions } from './github-release-host';

/** Build the git + python + pip + PyInstaller toolchain. */
export function createDefaultToolchain(options: { repoUrl: string; run?: CommandRunner }): Toolchain {
  const run = options.run ?? spawnCommand;
  return {
    source: new GitSourceControlHost({ repoUrl: options.repoUrl }),
    runtime: new PythonRuntimeProvisioner(run),
    installer: new PipDependencyInstaller(run),
    packager: new PyInstallerPackager(run),
  };
}
