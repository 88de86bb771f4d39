import { mkdir, appendFile, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { EventEnvelope } from './event-types.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonlEventStore<TEvent extends EventEnvelope> {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly path: string) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
  }

  /** Appends in publish order. */
  append(event: TEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    const write = this.writeChain.then(() => appendFile(this.path, line, { encoding: 'utf8' }));
    // A failed append is reported to its caller only; later appends still run.
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  /** Resolves once every pending append has settled. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private async readAll(): Promise<TEvent[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const events: TEvent[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      events.push(JSON.parse(line) as TEvent);
    }
    return events;
  }

  async lastSeq(): Promise<number> {
    const events = await this.readAll();
    return events.reduce((max, event) => Math.max(max, event.seq), 0);
  }

  async readSince(seq: number, limit = 500, types?: string[]): Promise<TEvent[]> {
    const typeSet = types ? new Set(types) : null;
    const events: TEvent[] = [];
    for (const event of await this.readAll()) {
      if (event.seq <= seq) continue;
      if (typeSet && !typeSet.has(event.type)) continue;
      events.push(event);
      if (events.length >= limit) break;
    }
    return events;
  }
}
