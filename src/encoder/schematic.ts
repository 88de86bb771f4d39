import { formatBlockState } from '../types/blocks.js';
import { Size3, Vec3i } from '../types/geometry.js';
import { StructureDocument } from '../types/structure.js';
import { EncodingError } from '../lib/errors.js';
import { NbtCompound, NbtTag, nbt, readNbtAuto, writeNbtGzip } from './nbt.js';

export const SPONGE_SCHEMATIC_VERSION = 2;
const AIR_STATE = 'minecraft:air';

export type SchematicOptions = Readonly<{
  name?: string;
  generator?: string;
}>;

export type BlockGrid = Readonly<{
  palette: string[];
  /** One palette index per cell, ordered x fastest, then z, then y. */
  indices: Uint32Array;
}>;

export type DecodedSchematic = Readonly<{
  version: number;
  dataVersion: number | null;
  size: Size3;
  offset: Vec3i;
  palette: string[];
  indices: number[];
  metadata: Record<string, string | number>;
}>;

export type SchematicSummary = Readonly<{
  size: Size3;
  dataVersion: number | null;
  paletteSize: number;
  solidBlocks: number;
  blockCounts: Record<string, number>;
}>;

/**
 * Lays the placements out on the dense grid. Palette ids follow first
 * encounter; air is added last and only when some cell has no placement.
 */
export function buildBlockGrid(doc: StructureDocument): BlockGrid {
  const { width, height, length } = doc.size;
  const min = doc.bbox.min;
  const volume = width * height * length;
  const palette: string[] = [];
  const paletteIds = new Map<string, number>();
  const indices = new Uint32Array(volume);
  const filled = new Uint8Array(volume);
  let filledCount = 0;

  for (const { pos, block } of doc.placements) {
    const x = pos.x - min.x;
    const y = pos.y - min.y;
    const z = pos.z - min.z;
    if (x < 0 || x >= width || y < 0 || y >= height || z < 0 || z >= length) {
      throw new EncodingError(`Placement ${pos.x},${pos.y},${pos.z} lies outside the structure bounds`);
    }
    const key = formatBlockState(block);
    let id = paletteIds.get(key);
    if (id === undefined) {
      id = palette.length;
      palette.push(key);
      paletteIds.set(key, id);
    }
    const cell = x + z * width + y * width * length;
    if (filled[cell] === 0) filledCount += 1;
    filled[cell] = 1;
    indices[cell] = id;
  }

  if (filledCount < volume) {
    let airId = paletteIds.get(AIR_STATE);
    if (airId === undefined) {
      airId = palette.length;
      palette.push(AIR_STATE);
    }
    for (let cell = 0; cell < volume; cell += 1) {
      if (filled[cell] === 0) indices[cell] = airId;
    }
  }

  return { palette, indices };
}

export function encodeVarints(values: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(values.length * 5);
  let offset = 0;
  for (let i = 0; i < values.length; i += 1) {
    let value = values[i] ?? 0;
    while ((value & ~0x7f) !== 0) {
      out[offset++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    out[offset++] = value;
  }
  return out.subarray(0, offset);
}

export function decodeVarints(bytes: Uint8Array, count: number): number[] {
  const values: number[] = [];
  let offset = 0;
  while (values.length < count) {
    let value = 0;
    let shift = 0;
    for (;;) {
      const byte = bytes[offset];
      if (byte === undefined) throw new Error('BlockData ended early');
      offset += 1;
      value |= (byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) break;
      shift += 7;
      if (shift > 28) throw new Error('BlockData varint too long');
    }
    values.push(value);
  }
  return values;
}

/** Sponge schematic v2, gzip-compressed. */
export function encodeSchematic(doc: StructureDocument, options: SchematicOptions = {}): Buffer {
  const { width, height, length } = doc.size;
  const min = doc.bbox.min;
  const grid = buildBlockGrid(doc);

  const palette: NbtCompound = {};
  grid.palette.forEach((state, id) => {
    palette[state] = nbt.int(id);
  });

  const metadata: NbtCompound = {
    WEOffsetX: nbt.int(min.x),
    WEOffsetY: nbt.int(min.y),
    WEOffsetZ: nbt.int(min.z),
  };
  if (options.name) metadata.Name = nbt.string(options.name);
  if (options.generator) metadata.Generator = nbt.string(options.generator);

  const root: NbtCompound = {
    Version: nbt.int(SPONGE_SCHEMATIC_VERSION),
    DataVersion: nbt.int(doc.version.dataVersion),
    Metadata: nbt.compound(metadata),
    Width: nbt.short(width),
    Height: nbt.short(height),
    Length: nbt.short(length),
    Offset: nbt.intArray([min.x, min.y, min.z]),
    PaletteMax: nbt.int(grid.palette.length),
    Palette: nbt.compound(palette),
    BlockData: nbt.byteArray(encodeVarints(grid.indices)),
    BlockEntities: nbt.list('compound', []),
  };

  return writeNbtGzip({ name: 'Schematic', value: root });
}

function numberTag(tag: NbtTag | undefined, field: string): number {
  if (!tag || (tag.type !== 'int' && tag.type !== 'short' && tag.type !== 'byte')) {
    throw new Error(`Schematic field ${field} is missing`);
  }
  return tag.type === 'short' ? tag.value & 0xffff : tag.value;
}

function compoundTag(tag: NbtTag | undefined, field: string): NbtCompound {
  if (!tag || tag.type !== 'compound') throw new Error(`Schematic field ${field} is missing`);
  return tag.value;
}

function readPalette(compound: NbtCompound): string[] {
  const palette: string[] = [];
  for (const [state, tag] of Object.entries(compound)) {
    const id = numberTag(tag, `Palette.${state}`);
    if (palette[id] !== undefined) throw new Error(`Palette id ${id} is used twice`);
    palette[id] = state;
  }
  for (let i = 0; i < palette.length; i += 1) {
    if (palette[i] === undefined) throw new Error(`Palette id ${i} is unassigned`);
  }
  return palette;
}

function readMetadata(tag: NbtTag | undefined): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  if (!tag || tag.type !== 'compound') return out;
  for (const [key, value] of Object.entries(tag.value)) {
    if (value.type === 'string' || value.type === 'int' || value.type === 'short' || value.type === 'byte') {
      out[key] = value.value;
    } else if (value.type === 'long') {
      out[key] = Number(value.value);
    }
  }
  return out;
}

/** Reads Sponge schematic v1, v2 and v3 files. */
export function decodeSchematic(data: Buffer): DecodedSchematic {
  const root = readNbtAuto(data);
  // v3 nests everything under a Schematic compound inside an unnamed root.
  const nested = root.value.Schematic;
  const body = nested && nested.type === 'compound' ? nested.value : root.value;

  const version = numberTag(body.Version, 'Version');
  const size: Size3 = {
    width: numberTag(body.Width, 'Width'),
    height: numberTag(body.Height, 'Height'),
    length: numberTag(body.Length, 'Length'),
  };
  const offsetTag = body.Offset;
  const offsetValues = offsetTag && offsetTag.type === 'intArray' ? offsetTag.value : [0, 0, 0];
  const offset: Vec3i = { x: offsetValues[0] ?? 0, y: offsetValues[1] ?? 0, z: offsetValues[2] ?? 0 };
  const dataVersion = body.DataVersion ? numberTag(body.DataVersion, 'DataVersion') : null;

  let paletteCompound: NbtCompound;
  let dataTag: NbtTag | undefined;
  if (version >= 3) {
    const blocks = compoundTag(body.Blocks, 'Blocks');
    paletteCompound = compoundTag(blocks.Palette, 'Blocks.Palette');
    dataTag = blocks.Data;
  } else {
    paletteCompound = compoundTag(body.Palette, 'Palette');
    dataTag = body.BlockData;
  }
  if (!dataTag || dataTag.type !== 'byteArray') throw new Error('Schematic block data is missing');

  const palette = readPalette(paletteCompound);
  const volume = size.width * size.height * size.length;
  const indices = decodeVarints(dataTag.value, volume);
  const outOfRange = indices.find(id => id >= palette.length);
  if (outOfRange !== undefined) throw new Error(`Block data references palette id ${outOfRange}`);

  return {
    version,
    dataVersion,
    size,
    offset,
    palette,
    indices,
    metadata: readMetadata(body.Metadata),
  };
}

export function summarizeSchematic(schematic: DecodedSchematic): SchematicSummary {
  const counts = new Map<string, number>();
  for (const id of schematic.indices) {
    const state = schematic.palette[id];
    if (state === undefined) continue;
    counts.set(state, (counts.get(state) ?? 0) + 1);
  }
  let solidBlocks = 0;
  const blockCounts: Record<string, number> = {};
  for (const [state, count] of [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))) {
    blockCounts[state] = count;
    if (!state.startsWith(AIR_STATE)) solidBlocks += count;
  }
  return {
    size: schematic.size,
    dataVersion: schematic.dataVersion,
    paletteSize: schematic.palette.length,
    solidBlocks,
    blockCounts,
  };
}
