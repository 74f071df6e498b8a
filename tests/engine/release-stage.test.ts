import { writeFile } from 'fs/promises';
import path from 'path';
import { createDefaultDefinition } from '../../src/dsl/schema';
import { ReleaseStage } from '../../src/engine/release-stage';
import { resetLogging, setLogHandler } from '../../src/logger';
import { MemoryArtifactStore } from '../../src/storage/memory-store';
import { createFakeReleaseHost, makeTempDir, removeDir } from '../helpers/fakes';

describe('ReleaseStage', () => {
  const matrix = createDefaultDefinition().matrix;
  let dir: string;
  let artifacts: MemoryArtifactStore;

  async function storeArtifact(platformId: string, name: string, contents: string): Promise<void> {
    const source = path.join(dir, name);
    await writeFile(source, contents);
    await artifacts.put({ runId: 'run_1', platformId, name, sourcePath: source });
  }

  beforeAll(() => {
    setLogHandler(() => undefined);
  });

  afterAll(() => {
    resetLogging();
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    artifacts = new MemoryArtifactStore();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('publishes every artifact in matrix order', async () => {
    await storeArtifact('macos', 'junior-macos', 'mac');
    await storeArtifact('linux', 'junior-linux', 'lin');
    await storeArtifact('windows', 'junior-windows.exe', 'win');
    const host = createFakeReleaseHost();
    const stage = new ReleaseStage({ releaseHost: host, artifacts, credentials: { token: 'test-secret' } });

    const release = await stage.publish({ runId: 'run_1', tag: 'v1.0.0', matrix });

    expect(release.files.map((f) => f.name)).toEqual(['junior-linux', 'junior-windows.exe', 'junior-macos']);
    expect(host.calls[0].input.assets.map((a) => a.data.toString())).toEqual(['lin', 'win', 'mac']);
    expect(host.calls[0].credentials.token).toBe('test-secret');
  });

  test('refuses to publish when an artifact is missing', async () => {
    await storeArtifact('linux', 'junior-linux', 'lin');
    const host = createFakeReleaseHost();
    const stage = new ReleaseStage({ releaseHost: host, artifacts, credentials: { token: 'test-secret' } });

    await expect(stage.publish({ runId: 'run_1', tag: 'v1.0.0', matrix })).rejects.toMatchObject({
      code: 'RELEASE.AGGREGATION',
      message: 'Missing artifacts for release v1.0.0: junior-windows.exe, junior-macos',
      reason: 'MissingArtifact',
    });
    expect(host.calls).toHaveLength(0);
  });

  test('publishes a partial release when all artifacts are not required', async () => {
    await storeArtifact('linux', 'junior-linux', 'lin');
    const host = createFakeReleaseHost();
    const stage = new ReleaseStage({
      releaseHost: host,
      artifacts,
      credentials: { token: 'test-secret' },
      requireAllArtifacts: false,
    });

    const release = await stage.publish({ runId: 'run_1', tag: 'v1.0.0', matrix });
    expect(release.files.map((f) => f.name)).toEqual(['junior-linux']);
  });

  test('never publishes an empty release', async () => {
    const host = createFakeReleaseHost();
    const stage = new ReleaseStage({
      releaseHost: host,
      artifacts,
      credentials: { token: 'test-secret' },
      requireAllArtifacts: false,
    });

    await expect(stage.publish({ runId: 'run_1', tag: 'v1.0.0', matrix })).rejects.toThrow(
      'No artifacts to release for v1.0.0',
    );
    expect(host.calls).toHaveLength(0);
  });

  test('passes the cancellation signal to the host', async () => {
    await storeArtifact('linux', 'junior-linux', 'lin');
    await storeArtifact('windows', 'junior-windows.exe', 'win');
    await storeArtifact('macos', 'junior-macos', 'mac');
    const host = createFakeReleaseHost();
    const controller = new AbortController();
    const stage = new ReleaseStage({ releaseHost: host, artifacts, credentials: { token: 'test-secret' } });

    await stage.publish({ runId: 'run_1', tag: 'v1.0.0', matrix, signal: controller.signal });
    expect(host.calls[0].input.signal).toBe(controller.signal);
  });
});
