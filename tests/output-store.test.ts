import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidArgumentError, NotFoundError, OutputError } from '../src/lib/errors.js';
import { OutputStore } from '../src/store/output-store.js';
import { makeTempDir } from './helpers.js';

describe('OutputStore', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let store: OutputStore;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    store = new OutputStore(join(dir, 'out'));
    await store.init();
  });

  afterEach(async () => {
    await cleanup();
  });

  it('writes a file and leaves no temporary behind', async () => {
    const path = await store.write('tower-gen_abc.schem', Buffer.from([1, 2, 3]));

    expect(path).toBe(join(dir, 'out', 'tower-gen_abc.schem'));
    expect([...(await readFile(path))]).toEqual([1, 2, 3]);
    expect(await readdir(join(dir, 'out'))).toEqual(['tower-gen_abc.schem']);
    expect([...(await store.read('tower-gen_abc.schem'))]).toEqual([1, 2, 3]);
  });

  it('replaces an existing file', async () => {
    await store.write('hut.mcfunction', Buffer.from('old'));
    await store.write('hut.mcfunction', Buffer.from('new'));

    expect((await store.read('hut.mcfunction')).toString('utf8')).toBe('new');
  });

  it('refuses names outside the directory or with other extensions', () => {
    expect(() => store.pathFor('../evil.schem')).toThrow(InvalidArgumentError);
    expect(() => store.pathFor('sub/a.schem')).toThrow(InvalidArgumentError);
    expect(() => store.pathFor('notes.txt')).toThrow(InvalidArgumentError);
  });

  it('reports a missing file as not found', async () => {
    await expect(store.read('missing.schem')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('cleans up the temporary file when the rename fails', async () => {
    const blocker = join(dir, 'out', 'block.schem');
    await mkdir(blocker);
    await writeFile(join(blocker, 'keep'), 'x');

    const write = store.write('block.schem', Buffer.from([1]));

    await expect(write).rejects.toBeInstanceOf(OutputError);
    await expect(write).rejects.toThrow(/^Could not write block\.schem: /);
    expect(await readdir(join(dir, 'out'))).toEqual(['block.schem']);
  });
});
