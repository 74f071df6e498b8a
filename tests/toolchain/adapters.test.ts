import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { PipelineStepError } from '../../src/domain/errors';
import { createDefaultDefinition } from '../../src/dsl/schema';
import { logger, resetLogging, setLogHandler } from '../../src/logger';
import {
  CommandNotFoundError,
  CommandOptions,
  CommandResult,
  CommandRunner,
  ProvisionedRuntime,
  WorkspaceContext,
  appendTail,
  outputTail,
} from '../../src/toolchain';
import {
  PipDependencyInstaller,
  PyInstallerPackager,
  PythonRuntimeProvisioner,
  classifyPipFailure,
  hostPlatformFor,
  parsePythonVersion,
  pyinstallerArgs,
  pythonCandidates,
  versionMatches,
} from '../../src/toolchain/adapters';
import { makeTempDir, removeDir } from '../helpers/fakes';

type Script = (command: string, args: string[], options: CommandOptions) => CommandResult | Promise<CommandResult>;

function scriptedRunner(script: Script): CommandRunner & { invocations: string[] } {
  const invocations: string[] = [];
  const runner = async (command: string, args: string[], options: CommandOptions) => {
    invocations.push([command, ...args].join(' '));
    return script(command, args, options);
  };
  return Object.assign(runner, { invocations });
}

function ok(stdout = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '' };
}

function failed(stderr: string): CommandResult {
  return { exitCode: 1, stdout: '', stderr };
}

describe('toolchain adapters', () => {
  let dir: string;
  let ctx: WorkspaceContext;
  const python: ProvisionedRuntime = { name: 'python', version: '3.9.18', command: 'py', args: ['-3.9'] };

  beforeAll(() => {
    setLogHandler(() => undefined);
  });

  afterAll(() => {
    resetLogging();
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    ctx = { runId: 'run_1', platformId: 'linux', dir, signal: new AbortController().signal, logger };
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('PythonRuntimeProvisioner', () => {
    test('pythonCandidates adds the windows launcher first', () => {
      expect(pythonCandidates('3.9', 'win32').map((c) => [c.command, ...c.args].join(' '))).toEqual([
        'py -3.9',
        'python3.9',
        'python3',
        'python',
      ]);
      expect(pythonCandidates('3.9', 'linux').map((c) => c.command)).toEqual(['python3.9', 'python3', 'python']);
    });

    test('parses interpreter versions', () => {
      expect(parsePythonVersion('Python 3.9.18\n')).toBe('3.9.18');
      expect(parsePythonVersion('command not found')).toBeNull();
    });

    test('matches versions by prefix component', () => {
      expect(versionMatches('3.9.18', '3.9')).toBe(true);
      expect(versionMatches('3.10.1', '3.1')).toBe(false);
      expect(versionMatches('3.9', '3.9.1')).toBe(false);
    });

    test('uses the first candidate with a matching version', async () => {
      const run = scriptedRunner((command) => {
        if (command === 'python3.9') throw new CommandNotFoundError(command);
        if (command === 'python3') return ok('Python 3.11.2');
        return ok('Python 3.9.1');
      });
      const provisioner = new PythonRuntimeProvisioner(run, 'linux');

      await expect(provisioner.provision({ name: 'python', version: '3.9' }, ctx)).resolves.toEqual({
        name: 'python',
        version: '3.9.1',
        command: 'python',
        args: [],
      });
      expect(run.invocations).toEqual(['python3.9 --version', 'python3 --version', 'python --version']);
    });

    test('reads the version from stderr for older interpreters', async () => {
      const run = scriptedRunner(() => ({ exitCode: 0, stdout: '', stderr: 'Python 3.9.0' }));
      const runtime = await new PythonRuntimeProvisioner(run, 'win32').provision(
        { name: 'python', version: '3.9' },
        { ...ctx, platformId: 'windows' },
      );
      expect(runtime.command).toBe('py');
      expect(runtime.args).toEqual(['-3.9']);
    });

    test('fails with VersionUnavailable when nothing matches', async () => {
      const run = scriptedRunner((command) => (command === 'python3' ? ok('Python 3.11.2') : failed('')));
      const provisioner = new PythonRuntimeProvisioner(run, 'linux');

      await expect(provisioner.provision({ name: 'python', version: '3.9' }, ctx)).rejects.toMatchObject({
        code: 'BUILD.PROVISIONING',
        reason: 'VersionUnavailable',
        message: 'Python 3.9 is not available',
        details: { requested: '3.9', found: ['python3=3.11.2'] },
      });
    });

    test('maps platform ids to host operating systems', () => {
      expect(hostPlatformFor('linux')).toBe('linux');
      expect(hostPlatformFor('windows')).toBe('win32');
      expect(hostPlatformFor('macos')).toBe('darwin');
      expect(hostPlatformFor('freebsd')).toBeUndefined();
    });

    test('refuses entries that target another operating system', async () => {
      const run = scriptedRunner(() => ok('Python 3.9.18'));
      const provisioner = new PythonRuntimeProvisioner(run, 'linux');

      await expect(
        provisioner.provision({ name: 'python', version: '3.9' }, { ...ctx, platformId: 'macos' }),
      ).rejects.toMatchObject({
        code: 'BUILD.PROVISIONING',
        reason: 'PlatformUnavailable',
        message: 'Platform "macos" targets darwin; this host is linux',
      });
      await expect(
        provisioner.provision({ name: 'python', version: '3.9' }, { ...ctx, platformId: 'windows' }),
      ).rejects.toThrow('Platform "windows" targets win32; this host is linux');
      expect(run.invocations).toEqual([]);
    });

    test('refuses platform ids that name no operating system', async () => {
      const provisioner = new PythonRuntimeProvisioner(scriptedRunner(() => ok('Python 3.9.18')), 'linux');
      await expect(
        provisioner.provision({ name: 'python', version: '3.9' }, { ...ctx, platformId: 'freebsd' }),
      ).rejects.toMatchObject({ reason: 'PlatformUnavailable', message: 'Platform "freebsd" does not name an operating system' });
    });

    test('rejects runtimes it cannot provision', async () => {
      const provisioner = new PythonRuntimeProvisioner(scriptedRunner(() => ok()), 'linux');
      await expect(provisioner.provision({ name: 'node', version: '20' }, ctx)).rejects.toThrow(
        'No provisioner for runtime "node"',
      );
    });
  });

  describe('PipDependencyInstaller', () => {
    const dependencies = createDefaultDefinition().dependencies;

    test('fails before running pip when the manifest is missing', async () => {
      const run = scriptedRunner(() => ok());
      await expect(new PipDependencyInstaller(run).install(dependencies, python, ctx)).rejects.toMatchObject({
        code: 'BUILD.DEPENDENCY',
        reason: 'ResolutionError',
        message: 'Dependency manifest not found: requirements.txt',
      });
      expect(run.invocations).toEqual([]);
    });

    test('upgrades pip, installs build requirements, then the manifest', async () => {
      await writeFile(path.join(dir, 'requirements.txt'), 'click\n');
      const run = scriptedRunner(() => ok());
      await new PipDependencyInstaller(run).install(dependencies, python, ctx);

      expect(run.invocations).toEqual([
        'py -3.9 -m ensurepip',
        'py -3.9 -m pip install --upgrade pip',
        'py -3.9 -m pip install pybind11',
        'py -3.9 -m pip install -r requirements.txt',
      ]);
    });

    test('skips optional phases', async () => {
      await writeFile(path.join(dir, 'requirements.txt'), 'click\n');
      const run = scriptedRunner(() => ok());
      await new PipDependencyInstaller(run).install(
        { manifest: 'requirements.txt', preinstall: [], upgradeInstaller: false },
        python,
        ctx,
      );
      expect(run.invocations).toEqual(['py -3.9 -m pip install -r requirements.txt']);
    });

    test('resolution failures are not retryable', async () => {
      await writeFile(path.join(dir, 'requirements.txt'), 'foo==9\n');
      const run = scriptedRunner((_command, args) =>
        args.includes('-r') ? failed('ERROR: No matching distribution found for foo==9') : ok(),
      );

      await expect(new PipDependencyInstaller(run).install(dependencies, python, ctx)).rejects.toMatchObject({
        reason: 'ResolutionError',
        retryable: false,
        message: 'Failed to install manifest (exit 1): ERROR: No matching distribution found for foo==9',
      });
    });

    test('network failures are retryable', async () => {
      await writeFile(path.join(dir, 'requirements.txt'), 'click\n');
      const run = scriptedRunner(() => failed('WARNING: Retrying... Could not fetch URL https://pypi.test/simple/pip/'));

      const error = await new PipDependencyInstaller(run).install(dependencies, python, ctx).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(PipelineStepError);
      expect(error).toMatchObject({ reason: 'NetworkError', retryable: true, details: { action: 'bootstrap pip', exitCode: 1 } });
    });

    test('classifyPipFailure inspects stdout and stderr', () => {
      expect(classifyPipFailure({ exitCode: 1, stdout: 'Max retries exceeded with url', stderr: '' })).toBe('NetworkError');
      expect(classifyPipFailure(failed('Invalid requirement'))).toBe('ResolutionError');
    });
  });

  describe('PyInstallerPackager', () => {
    const { packaging, matrix } = createDefaultDefinition();

    test('builds a one-file executable into the dist directory', () => {
      expect(pyinstallerArgs(packaging)).toEqual([
        '-m',
        'PyInstaller',
        '--onefile',
        '--noconfirm',
        '--name',
        'junior',
        '--distpath',
        'dist',
        'junior/cli.py',
      ]);
    });

    test('returns the produced executable', async () => {
      const run = scriptedRunner(async (_command, _args, options) => {
        await mkdir(path.join(options.cwd, 'dist'), { recursive: true });
        await writeFile(path.join(options.cwd, 'dist', 'junior.exe'), 'MZ');
        return ok();
      });
      const output = await new PyInstallerPackager(run).package(packaging, matrix[1], python, ctx);

      expect(output).toBe(path.join(dir, 'dist', 'junior.exe'));
      expect(run.invocations[0]).toBe('py -3.9 -m PyInstaller --onefile --noconfirm --name junior --distpath dist junior/cli.py');
    });

    test('fails on a non-zero exit', async () => {
      const run = scriptedRunner(() => failed('line 1\nModuleNotFoundError: No module named junior'));
      await expect(new PyInstallerPackager(run).package(packaging, matrix[0], python, ctx)).rejects.toMatchObject({
        code: 'BUILD.PACKAGING',
        reason: 'BuildError',
        message: 'PyInstaller failed (exit 1): line 1\nModuleNotFoundError: No module named junior',
      });
    });

    test('fails when the expected executable is missing', async () => {
      const run = scriptedRunner(() => ok());
      await expect(new PyInstallerPackager(run).package(packaging, matrix[0], python, ctx)).rejects.toThrow(
        `Expected executable ${path.join('dist', 'junior')} was not produced`,
      );
    });
  });

  describe('appendTail', () => {
    test('keeps only the trailing characters past the limit', () => {
      expect(appendTail('abc', 'def', 4)).toBe('cdef');
      expect(appendTail('', 'abcdefgh', 3)).toBe('fgh');
      expect(appendTail('ab', 'c', 10)).toBe('abc');
    });
  });

  describe('outputTail', () => {
    test('prefers stderr and keeps the last lines', () => {
      expect(outputTail({ exitCode: 1, stdout: 'out', stderr: 'a\nb\nc\n' }, 2)).toBe('b\nc');
      expect(outputTail({ exitCode: 1, stdout: 'only stdout\n', stderr: '  ' })).toBe('only stdout');
    });
  });
});
