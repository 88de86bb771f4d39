import { describe, expect, it } from 'vitest';
import { sizeLimits, unknownBlockPolicy } from '../src/app-context.js';
import { loadConfig } from '../src/config.js';
import { smallCatalog } from './helpers.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(8080);
    expect(config.OUTPUT_DIR).toBe('generated');
    expect(config.AI_PROVIDER).toBe('gateway');
    expect(config.GENERATE_NAMES).toBe(true);
    expect(config.UNKNOWN_BLOCK_POLICY).toBe('fallback');
    expect(config.FALLBACK_BLOCK).toBe('minecraft:air');
    expect(config.MCFUNCTION_RELATIVE).toBe(false);
    expect(sizeLimits(config)).toEqual({ maxWidth: 256, maxHeight: 384, maxLength: 256, maxBlocks: 1_000_000 });
  });

  it('coerces numbers and booleans from strings', () => {
    const config = loadConfig({
      PORT: '9000',
      MAX_WIDTH: '32',
      MAX_BLOCKS: '5000',
      GENERATE_NAMES: 'false',
      MCFUNCTION_RELATIVE: 'true',
    });

    expect(config.PORT).toBe(9000);
    expect(config.MAX_WIDTH).toBe(32);
    expect(sizeLimits(config).maxBlocks).toBe(5000);
    expect(config.GENERATE_NAMES).toBe(false);
    expect(config.MCFUNCTION_RELATIVE).toBe(true);
  });

  it('lists every invalid variable', () => {
    const run = () => loadConfig({ PORT: 'abc', GENERATE_NAMES: 'yes' });
    expect(run).toThrow(/^Invalid environment:\n/);
    expect(run).toThrow(/^PORT: /m);
    expect(run).toThrow(/^GENERATE_NAMES: /m);
  });
});

describe('unknownBlockPolicy', () => {
  const catalog = smallCatalog();

  it('builds the fallback block from config', () => {
    const config = loadConfig({ FALLBACK_BLOCK: 'stone' });
    expect(unknownBlockPolicy(config, catalog)).toEqual({
      kind: 'fallback',
      block: { name: 'minecraft:stone', properties: {} },
    });
  });

  it('refuses a fallback block the catalog does not know', () => {
    const config = loadConfig({ FALLBACK_BLOCK: 'minecraft:nope' });
    expect(() => unknownBlockPolicy(config, catalog)).toThrow('FALLBACK_BLOCK minecraft:nope is not a known block');
  });

  it('ignores the fallback block when rejecting', () => {
    const config = loadConfig({ UNKNOWN_BLOCK_POLICY: 'reject', FALLBACK_BLOCK: 'minecraft:nope' });
    expect(unknownBlockPolicy(config, catalog)).toEqual({ kind: 'reject' });
  });
});
