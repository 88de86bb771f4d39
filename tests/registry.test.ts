import { describe, expect, it } from 'vitest';
import { DATA_DIR } from '../src/lib/paths.js';
import { BlockCatalog, loadBlockCatalog } from '../src/registry/block-catalog.js';
import { compareVersionIds, loadVersionRegistry, versionTag } from '../src/registry/versions.js';
import { V1_16_5, V1_20_1, smallCatalog } from './helpers.js';

describe('versions', () => {
  it('compares dotted ids numerically', () => {
    expect(compareVersionIds('1.20', '1.20.0')).toBe(0);
    expect(compareVersionIds('1.9', '1.13')).toBeLessThan(0);
    expect(compareVersionIds('1.21.4', '1.21')).toBeGreaterThan(0);
    expect(versionTag('1.20.1')).toBe('JE_1_20_1');
  });

  it('loads the bundled version table', async () => {
    const registry = await loadVersionRegistry(DATA_DIR);
    const ids = registry.list().map(v => v.id);

    expect(registry.getDefault()).toEqual({ id: '1.20.1', tag: 'JE_1_20_1', dataVersion: 3465 });
    expect(ids[0]).toBe('1.13.2');
    expect(ids[ids.length - 1]).toBe('1.21.4');
  });

  it('resolves plain ids and schematic tags', async () => {
    const registry = await loadVersionRegistry(DATA_DIR);

    expect(registry.resolve('1.19.4')?.dataVersion).toBe(3337);
    expect(registry.resolve('JE_1_19_4')?.id).toBe('1.19.4');
    expect(registry.resolve(' 1.16.5 ')?.id).toBe('1.16.5');
    expect(registry.resolve('1.99')).toBeNull();
  });

  it('overrides the default', async () => {
    const registry = await loadVersionRegistry(DATA_DIR);

    expect(registry.withDefault('JE_1_16_5').getDefault().id).toBe('1.16.5');
    expect(registry.withDefault(undefined)).toBe(registry);
    expect(() => registry.withDefault('9.9')).toThrow('DEFAULT_MC_VERSION 9.9 is not a known version');
  });
});

describe('BlockCatalog', () => {
  it('lists blocks available in a version in declaration order', () => {
    const catalog = smallCatalog();

    expect(catalog.promptList(V1_16_5)).toBe(
      'minecraft:air, minecraft:stone, minecraft:oak_planks, minecraft:glass, minecraft:oak_stairs',
    );
    expect(catalog.listForVersion(V1_20_1)).toHaveLength(7);
  });

  it('groups blocks into categories', () => {
    expect(smallCatalog().getCategories(V1_20_1)).toEqual([
      { category: 'building', count: 2 },
      { category: 'planks', count: 2 },
      { category: 'glass', count: 1 },
      { category: 'misc', count: 1 },
      { category: 'stairs', count: 1 },
    ]);
  });

  it('keeps the earliest version of a block listed twice', () => {
    const catalog = BlockCatalog.fromSinceMap({
      '1.16': ['minecraft:stone'],
      '1.13': ['minecraft:stone'],
    });
    expect(catalog.get('minecraft:stone')?.since).toBe('1.13');
  });

  it('knows when bundled blocks were added', async () => {
    const catalog = await loadBlockCatalog(DATA_DIR);
    const v1_19_4 = { id: '1.19.4', tag: 'JE_1_19_4', dataVersion: 3337 };

    expect(catalog.isAvailable('minecraft:cherry_planks', v1_19_4)).toBe(false);
    expect(catalog.isAvailable('minecraft:cherry_planks', V1_20_1)).toBe(true);
    expect(catalog.get('minecraft:tuff_bricks')?.since).toBe('1.21');
    expect(catalog.get('minecraft:oak_stairs')?.category).toBe('stairs');
    expect(catalog.get('minecraft:stone_bricks')?.category).toBe('building');
    expect(catalog.exists('minecraft:made_up')).toBe(false);
  });
});
