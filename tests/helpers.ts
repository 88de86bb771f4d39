import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AppConfig, loadConfig } from '../src/config.js';
import { CompletionProvider, PromptRequest } from '../src/generator/completion-provider.js';
import { BlockCatalog } from '../src/registry/block-catalog.js';
import { MinecraftVersion, SizeLimits } from '../src/types/structure.js';

export const V1_20_1: MinecraftVersion = { id: '1.20.1', tag: 'JE_1_20_1', dataVersion: 3465 };
export const V1_16_5: MinecraftVersion = { id: '1.16.5', tag: 'JE_1_16_5', dataVersion: 2586 };

export const LIMITS: SizeLimits = { maxWidth: 256, maxHeight: 384, maxLength: 256, maxBlocks: 1_000_000 };

export function smallCatalog(): BlockCatalog {
  return BlockCatalog.fromSinceMap({
    '1.13': ['minecraft:air', 'minecraft:stone', 'minecraft:oak_planks', 'minecraft:glass', 'minecraft:oak_stairs'],
    '1.17': ['minecraft:deepslate'],
    '1.20': ['minecraft:cherry_planks'],
  });
}

export function testConfig(dir: string, env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    OUTPUT_DIR: join(dir, 'generated'),
    EVENTS_JSONL_PATH: join(dir, 'events.jsonl'),
    AI_GATEWAY_API_KEY: 'test-key',
    GENERATE_NAMES: 'false',
    LOG_LEVEL: 'silent',
    ...env,
  });
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'structure-forge-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/** Replies from a queue; records every request. */
export class StubProvider implements CompletionProvider {
  readonly label = 'stub:test';
  readonly requests: PromptRequest[] = [];

  constructor(private readonly replies: (string | Error)[]) {}

  async submitPrompt(request: PromptRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('StubProvider has no reply queued');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function cubeLines(size: number, block = 'minecraft:stone'): string {
  const lines: string[] = [];
  for (let x = 0; x < size; x += 1) {
    for (let y = 0; y < size; y += 1) {
      for (let z = 0; z < size; z += 1) {
        lines.push(`setblock ${x} ${y} ${z} ${block}`);
      }
    }
  }
  return lines.join('\n');
}
