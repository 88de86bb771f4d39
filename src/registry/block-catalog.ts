import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { MinecraftVersion } from '../types/structure.js';
import { compareVersionIds } from './versions.js';

export type BlockInfo = Readonly<{
  name: string;
  since: string;
  category: string;
}>;

const blockFileSchema = z.object({
  since: z.record(z.string().regex(/^\d+(\.\d+)+$/), z.array(z.string().regex(/^[a-z0-9_.-]+:[a-z0-9_./-]+$/))),
});

const CATEGORY_PATTERNS: [RegExp, string][] = [
  [/_stairs$/, 'stairs'],
  [/_slab$/, 'slabs'],
  [/_door$/, 'doors'],
  [/_fence$|_fence_gate$/, 'fences'],
  [/_wall$/, 'walls'],
  [/_sign$/, 'signs'],
  [/glass$|_glass_pane$/, 'glass'],
  [/_log$|_wood$|_stem$/, 'logs'],
  [/_planks$|bamboo_mosaic$/, 'planks'],
  [/_wool$/, 'wool'],
  [/_carpet$/, 'carpet'],
  [/_concrete$|_concrete_powder$/, 'concrete'],
  [/terracotta$/, 'terracotta'],
  [/_ore$/, 'ores'],
  [/_button$/, 'buttons'],
  [/_pressure_plate$/, 'pressure_plates'],
  [/_trapdoor$/, 'trapdoors'],
  [/_banner$/, 'banners'],
  [/_bed$/, 'beds'],
  [/candle$/, 'candles'],
  [/torch$|lantern$|glowstone|shroomlight|froglight|redstone_lamp|copper_bulb/, 'light'],
  [/repeater|comparator|observer|piston|hopper|dropper|dispenser|redstone|lever|note_block|target|crafter/, 'redstone'],
  [/leaves$|sapling$|dandelion|poppy|orchid|allium|daisy|lilac|peony|sunflower|rose_bush|azalea|cornflower|lily_of_the_valley|torchflower|pitcher_plant|pink_petals/, 'nature'],
  [/grass$|fern$|vine|moss|dead_bush|cactus|sugar_cane|bamboo$|glow_lichen|spore_blossom|melon|pumpkin/, 'nature'],
  [/sand$|gravel|dirt|mud$|clay|soul_soil|mycelium|podzol|farmland|nylium/, 'terrain'],
  [/water|lava/, 'fluid'],
  [/rail$/, 'rails'],
];

function categorize(name: string): string {
  const id = name.slice(name.indexOf(':') + 1);
  for (const [pattern, category] of CATEGORY_PATTERNS) {
    if (pattern.test(id)) return category;
  }
  if (id.includes('brick')) return 'building';
  if (id.includes('stone') || id.includes('deepslate') || id.includes('basalt') || id.includes('tuff')) return 'building';
  if (id.includes('copper') || id.endsWith('_block')) return 'building';
  if (id.includes('prismarine') || id.includes('purpur') || id.includes('quartz')) return 'building';
  if (id.includes('chest') || id.includes('barrel')) return 'storage';
  if (['anvil', 'crafting_table', 'furnace', 'smoker', 'blast_furnace', 'brewing_stand', 'enchanting_table', 'grindstone', 'cartography_table', 'fletching_table', 'smithing_table', 'stonecutter', 'lectern', 'loom'].includes(id)) return 'workstations';
  return 'misc';
}

export class BlockCatalog {
  private readonly byName: Map<string, BlockInfo>;

  constructor(private readonly blocks: readonly BlockInfo[]) {
    this.byName = new Map(blocks.map(b => [b.name, b]));
  }

  static fromSinceMap(since: Readonly<Record<string, readonly string[]>>): BlockCatalog {
    const blocks: BlockInfo[] = [];
    const seen = new Set<string>();
    const versions = Object.keys(since).sort(compareVersionIds);
    for (const version of versions) {
      for (const name of since[version] ?? []) {
        if (seen.has(name)) continue;
        seen.add(name);
        blocks.push({ name, since: version, category: categorize(name) });
      }
    }
    return new BlockCatalog(blocks);
  }

  exists(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): BlockInfo | undefined {
    return this.byName.get(name);
  }

  isAvailable(name: string, version: MinecraftVersion): boolean {
    const info = this.byName.get(name);
    return info !== undefined && compareVersionIds(info.since, version.id) <= 0;
  }

  listForVersion(version: MinecraftVersion): BlockInfo[] {
    return this.blocks.filter(b => compareVersionIds(b.since, version.id) <= 0);
  }

  getCategories(version: MinecraftVersion): { category: string; count: number }[] {
    const counts = new Map<string, number>();
    for (const block of this.listForVersion(version)) {
      counts.set(block.category, (counts.get(block.category) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([category, count]) => ({ category, count }))
      .sort((a, b) => b.count - a.count || a.category.localeCompare(b.category));
  }

  /** Comma separated ids for the generation prompt. */
  promptList(version: MinecraftVersion): string {
    return this.listForVersion(version).map(b => b.name).join(', ');
  }
}

export async function loadBlockCatalog(dataDir: string): Promise<BlockCatalog> {
  const raw = await readFile(join(dataDir, 'blocks.json'), 'utf8');
  const parsed = blockFileSchema.parse(JSON.parse(raw));
  return BlockCatalog.fromSinceMap(parsed.since);
}
