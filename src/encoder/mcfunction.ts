import { formatBlockState } from '../types/blocks.js';
import { StructureDocument } from '../types/structure.js';

export type McfunctionOptions = Readonly<{
  /** Write `~x ~y ~z` so the function builds around whoever runs it. */
  relative?: boolean;
}>;

function coord(value: number, relative: boolean): string {
  if (!relative) return String(value);
  return value === 0 ? '~' : `~${value}`;
}

export function encodeMcfunction(doc: StructureDocument, options: McfunctionOptions = {}): Buffer {
  const relative = options.relative ?? false;
  const lines = doc.placements.map(({ pos, block }) =>
    `setblock ${coord(pos.x, relative)} ${coord(pos.y, relative)} ${coord(pos.z, relative)} ${formatBlockState(block)}`,
  );
  return Buffer.from(lines.map(line => `${line}\n`).join(''), 'utf8');
}
