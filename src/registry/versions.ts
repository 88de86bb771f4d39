import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { MinecraftVersion } from '../types/structure.js';

const versionFileSchema = z.object({
  default: z.string().min(1),
  versions: z
    .array(
      z.object({
        id: z.string().regex(/^\d+(\.\d+)+$/),
        dataVersion: z.number().int().positive(),
      }),
    )
    .min(1),
});

const TAG_PATTERN = /^JE_(\d+(?:_\d+)+)$/i;

export function versionTag(id: string): string {
  return `JE_${id.replace(/\./g, '_')}`;
}

/** Numeric comparison of dotted ids; missing parts count as 0 (1.20 == 1.20.0). */
export function compareVersionIds(a: string, b: string): number {
  const pa = a.split('.').map(Number);
  const pb = b.split('.').map(Number);
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i += 1) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function formatVersionForPrompt(version: MinecraftVersion): string {
  return `Java Edition ${version.id}`;
}

export class VersionRegistry {
  private readonly byId: Map<string, MinecraftVersion>;

  constructor(
    private readonly versions: readonly MinecraftVersion[],
    readonly defaultId: string,
  ) {
    this.byId = new Map(versions.map(v => [v.id, v]));
    if (!this.byId.has(defaultId)) {
      throw new Error(`Default version ${defaultId} is not a known version`);
    }
  }

  list(): readonly MinecraftVersion[] {
    return this.versions;
  }

  getDefault(): MinecraftVersion {
    const found = this.byId.get(this.defaultId);
    if (!found) throw new Error(`Default version ${this.defaultId} is not a known version`);
    return found;
  }

  /** Accepts `1.20.1` or the schematic tag form `JE_1_20_1`. */
  resolve(input: string): MinecraftVersion | null {
    const trimmed = input.trim();
    const tag = TAG_PATTERN.exec(trimmed);
    const id = tag?.[1] ? tag[1].replace(/_/g, '.') : trimmed;
    return this.byId.get(id) ?? null;
  }

  withDefault(defaultId: string | undefined): VersionRegistry {
    if (!defaultId) return this;
    const resolved = this.resolve(defaultId);
    if (!resolved) throw new Error(`DEFAULT_MC_VERSION ${defaultId} is not a known version`);
    return new VersionRegistry(this.versions, resolved.id);
  }
}

export async function loadVersionRegistry(dataDir: string): Promise<VersionRegistry> {
  const raw = await readFile(join(dataDir, 'versions.json'), 'utf8');
  const parsed = versionFileSchema.parse(JSON.parse(raw));
  const versions = parsed.versions
    .map(v => ({ id: v.id, tag: versionTag(v.id), dataVersion: v.dataVersion }))
    .sort((a, b) => compareVersionIds(a.id, b.id));
  return new VersionRegistry(versions, parsed.default);
}
