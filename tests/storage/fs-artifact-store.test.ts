import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { FileSystemArtifactStore } from '../../src/storage/fs-artifact-store';
import { makeTempDir, removeDir } from '../helpers/fakes';

describe('FileSystemArtifactStore', () => {
  let dir: string;
  let root: string;

  async function source(name: string, contents: string): Promise<string> {
    const file = path.join(dir, name);
    await writeFile(file, contents);
    return file;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    root = path.join(dir, 'artifacts');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('copies the artifact under <root>/<runId>/<name>', async () => {
    const store = new FileSystemArtifactStore(root);
    const artifact = await store.put({
      runId: 'run_1',
      platformId: 'windows',
      name: 'junior-windows.exe',
      sourcePath: await source('junior.exe', 'hello'),
    });

    const target = path.join(root, 'run_1', 'junior-windows.exe');
    expect(artifact.pointer).toEqual({ kind: 'file', uri: target });
    expect(await readFile(target, 'utf8')).toBe('hello');
    expect(artifact.sizeBytes).toBe(5);
    expect(artifact.contentHash).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('lists a run artifacts from their metadata', async () => {
    const store = new FileSystemArtifactStore(root);
    await store.put({ runId: 'run_1', platformId: 'macos', name: 'junior-macos', sourcePath: await source('a', 'm') });
    await store.put({ runId: 'run_1', platformId: 'linux', name: 'junior-linux', sourcePath: await source('b', 'l') });

    const all = await store.getAll('run_1');
    expect(all.map((a) => a.name)).toEqual(['junior-linux', 'junior-macos']);
    const macos = await store.get('run_1', 'junior-macos');
    expect(macos?.platformId).toBe('macos');
    expect(macos && (await store.read(macos)).toString()).toBe('m');
  });

  it('returns nothing for an unknown run', async () => {
    const store = new FileSystemArtifactStore(root);
    expect(await store.getAll('run_missing')).toEqual([]);
    expect(await store.get('run_missing', 'junior-linux')).toBeNull();
  });

  it('never overwrites an existing artifact', async () => {
    const store = new FileSystemArtifactStore(root);
    const file = await source('junior', 'first');
    await store.put({ runId: 'run_1', platformId: 'linux', name: 'junior-linux', sourcePath: file });

    await expect(
      store.put({ runId: 'run_1', platformId: 'linux', name: 'junior-linux', sourcePath: await source('c', 'second') }),
    ).rejects.toMatchObject({ code: 'BUILD.UPLOAD', reason: 'Conflict' });
    expect(await readFile(path.join(root, 'run_1', 'junior-linux'), 'utf8')).toBe('first');
  });

  it('reports a missing source file', async () => {
    const store = new FileSystemArtifactStore(root);
    await expect(
      store.put({ runId: 'run_1', platformId: 'linux', name: 'junior-linux', sourcePath: path.join(dir, 'absent') }),
    ).rejects.toMatchObject({ code: 'BUILD.UPLOAD', reason: 'SourceMissing' });
  });

  it('rejects names with path separators', async () => {
    const store = new FileSystemArtifactStore(root);
    await expect(
      store.put({ runId: 'run_1', platformId: 'linux', name: '../escape', sourcePath: await source('d', 'x') }),
    ).rejects.toThrow('Artifact name "../escape" must not contain path separators');
  });
});
