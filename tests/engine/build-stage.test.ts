import { access, mkdir } from 'fs/promises';
import path from 'path';
import { PipelineStepError } from '../../src/domain/errors';
import { createDefaultDefinition } from '../../src/dsl/schema';
import { BuildJobResult, EntryStatus } from '../../src/domain/run';
import {
  BuildStageContext,
  allEntriesSucceeded,
  allEntriesTerminal,
  entryWorkspace,
  pendingResult,
  runBuildEntry,
  runBuildStage,
} from '../../src/engine/build-stage';
import { logger, resetLogging, setLogHandler } from '../../src/logger';
import { MemoryArtifactStore } from '../../src/storage/memory-store';
import { FakeToolchain, createFakeToolchain, makeTempDir, removeDir } from '../helpers/fakes';

describe('build stage', () => {
  let workDir: string;

  function context(toolchain: FakeToolchain, overrides: Partial<BuildStageContext> = {}): BuildStageContext {
    return {
      runId: 'run_1',
      ref: 'refs/tags/v1.0.0',
      definition: { ...createDefaultDefinition(), policy: { maxAttempts: 1, backoffBaseMs: 0, stepTimeoutMs: 0 } },
      toolchain,
      artifacts: new MemoryArtifactStore(),
      workDir,
      signal: new AbortController().signal,
      logger,
      ...overrides,
    };
  }

  beforeAll(() => {
    setLogHandler(() => undefined);
  });

  afterAll(() => {
    resetLogging();
  });

  beforeEach(async () => {
    workDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  test('entryWorkspace nests run and platform under the work dir', () => {
    expect(entryWorkspace('/work', 'run_1', 'linux')).toBe(path.join('/work', 'run_1', 'linux'));
  });

  test('runBuildEntry packages and uploads the entry artifact', async () => {
    const ctx = context(createFakeToolchain());
    const entry = ctx.definition.matrix[1];
    const result = await runBuildEntry(entry, ctx);

    expect(result.status).toBe(EntryStatus.Succeeded);
    expect(result.artifactName).toBe('junior-windows.exe');
    expect(result.artifactPath).toBe('memory://run_1/junior-windows.exe');
    expect(result.steps.every((s) => s.status === EntryStatus.Succeeded)).toBe(true);

    const artifact = await ctx.artifacts.get('run_1', 'junior-windows.exe');
    expect(artifact?.platformId).toBe('windows');
    expect(artifact?.sizeBytes).toBe('binary:windows'.length);
  });

  test('removes the entry workspace once the artifact is uploaded', async () => {
    const ctx = context(createFakeToolchain());
    const result = await runBuildEntry(ctx.definition.matrix[0], ctx);

    expect(result.status).toBe(EntryStatus.Succeeded);
    await expect(access(entryWorkspace(workDir, 'run_1', 'linux'))).rejects.toMatchObject({ code: 'ENOENT' });
    expect((await ctx.artifacts.get('run_1', 'junior-linux'))?.sizeBytes).toBe('binary:linux'.length);
  });

  test('removes the entry workspace when a step fails', async () => {
    const toolchain = createFakeToolchain({
      failures: { macos: { step: 'install', error: new PipelineStepError('dependency', 'pip failed') } },
    });
    const ctx = context(toolchain);
    const result = await runBuildEntry(ctx.definition.matrix[2], ctx);

    expect(result.status).toBe(EntryStatus.Failed);
    expect(toolchain.calls.map((c) => c.step)).toEqual(['checkout', 'provision', 'install']);
    await expect(access(entryWorkspace(workDir, 'run_1', 'macos'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('runBuildStage removes the run directory and keeps the work dir', async () => {
    await mkdir(path.join(workDir, 'run_other'));
    await runBuildStage(context(createFakeToolchain()));

    await expect(access(path.join(workDir, 'run_1'))).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(access(path.join(workDir, 'run_other'))).resolves.toBeUndefined();
  });

  test('runBuildEntry reports running then the terminal status', async () => {
    const seen: EntryStatus[] = [];
    const ctx = context(createFakeToolchain(), {
      onEntryChange: async (result) => {
        seen.push(result.status);
      },
    });
    await runBuildEntry(ctx.definition.matrix[0], ctx);
    expect(seen).toEqual([EntryStatus.Running, EntryStatus.Succeeded]);
  });

  test('a throwing listener does not fail the entry', async () => {
    const ctx = context(createFakeToolchain(), {
      onEntryChange: async () => {
        throw new Error('listener down');
      },
    });
    const result = await runBuildEntry(ctx.definition.matrix[0], ctx);
    expect(result.status).toBe(EntryStatus.Succeeded);
  });

  test('runBuildEntry does not start once the run is canceled', async () => {
    const controller = new AbortController();
    controller.abort();
    const toolchain = createFakeToolchain();
    const result = await runBuildEntry(createDefaultDefinition().matrix[0], context(toolchain, { signal: controller.signal }));

    expect(result.status).toBe(EntryStatus.Canceled);
    expect(result.steps).toEqual([]);
    expect(toolchain.calls).toHaveLength(0);
  });

  test('an upload conflict fails the entry at the upload step', async () => {
    const ctx = context(createFakeToolchain());
    const entry = ctx.definition.matrix[0];
    await runBuildEntry(entry, ctx);
    const second = await runBuildEntry(entry, ctx);

    expect(second.status).toBe(EntryStatus.Failed);
    expect(second.error?.code).toBe('BUILD.UPLOAD');
    expect(second.error?.stepId).toBe('upload');
  });

  test('runBuildStage returns results in matrix order', async () => {
    const results = await runBuildStage(context(createFakeToolchain({ stepDelayMs: 1 })));
    expect(results.map((r) => r.platformId)).toEqual(['linux', 'windows', 'macos']);
    expect(allEntriesSucceeded(results)).toBe(true);
    expect(allEntriesTerminal(results)).toBe(true);
  });

  test('allEntriesSucceeded requires at least one entry', () => {
    expect(allEntriesSucceeded([])).toBe(false);
  });

  test('pending entries are not terminal', () => {
    const results: BuildJobResult[] = createDefaultDefinition().matrix.map(pendingResult);
    expect(allEntriesTerminal(results)).toBe(false);
    expect(results[2]).toEqual({ platformId: 'macos', artifactName: 'junior-macos', status: EntryStatus.Pending, steps: [] });
  });
});
