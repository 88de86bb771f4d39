export type BlockProperties = Readonly<Record<string, string>>;

export type BlockState = Readonly<{
  name: string;
  properties: BlockProperties;
}>;

export const AIR: BlockState = { name: 'minecraft:air', properties: {} };

const BLOCK_STATE_PATTERN = /^([a-z0-9_.-]+:)?([a-z0-9_./-]+)(?:\[([^\]]*)\])?$/;
const PROPERTY_PATTERN = /^([a-z0-9_]+)=([a-z0-9_]+)$/;

/**
 * Parses `namespace:id[key=value,...]`. Returns null when the text is not a
 * block state; the namespace defaults to `minecraft`.
 */
export function parseBlockState(text: string): BlockState | null {
  const match = BLOCK_STATE_PATTERN.exec(text.trim().toLowerCase());
  if (!match) return null;
  const [, namespace, id, rawProps] = match;
  if (!id) return null;
  const properties: Record<string, string> = {};
  if (rawProps !== undefined && rawProps.trim().length > 0) {
    for (const part of rawProps.split(',')) {
      const prop = PROPERTY_PATTERN.exec(part.trim());
      if (!prop?.[1] || !prop[2]) return null;
      properties[prop[1]] = prop[2];
    }
  }
  return { name: `${namespace ?? 'minecraft:'}${id}`, properties };
}

export function formatBlockState(block: BlockState): string {
  const keys = Object.keys(block.properties).sort();
  if (keys.length === 0) return block.name;
  const props = keys.map(key => `${key}=${block.properties[key]}`).join(',');
  return `${block.name}[${props}]`;
}

export function isAir(block: BlockState): boolean {
  return block.name === 'minecraft:air' || block.name === 'minecraft:cave_air' || block.name === 'minecraft:void_air';
}
