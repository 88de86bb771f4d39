import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { NotFoundError, OutputError, InvalidArgumentError } from '../lib/errors.js';
import { makeId } from '../lib/ids.js';

const FILE_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*\.(schem|mcfunction)$/i;

/** Generated files live flat in one directory. */
export class OutputStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  pathFor(fileName: string): string {
    if (!FILE_NAME_PATTERN.test(fileName) || basename(fileName) !== fileName) {
      throw new InvalidArgumentError(`Invalid output file name: ${fileName}`);
    }
    return join(this.dir, fileName);
  }

  /**
   * Writes next to the target and renames into place, so a failed write
   * never leaves a partial file under the final name.
   */
  async write(fileName: string, data: Buffer): Promise<string> {
    const target = this.pathFor(fileName);
    const tmp = `${target}.${makeId('tmp')}.tmp`;
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmp, data, { flag: 'wx' });
      await rename(tmp, target);
      return target;
    } catch (err) {
      await rm(tmp, { force: true });
      const message = err instanceof Error ? err.message : String(err);
      throw new OutputError(`Could not write ${fileName}: ${message}`, err);
    }
  }

  async read(fileName: string): Promise<Buffer> {
    const path = this.pathFor(fileName);
    try {
      return await readFile(path);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(`No generated file named ${fileName}`);
      }
      throw err;
    }
  }
}
