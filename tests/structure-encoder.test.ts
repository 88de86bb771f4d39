import { describe, expect, it } from 'vitest';
import { decodeSchematic } from '../src/encoder/schematic.js';
import { StructureEncoder } from '../src/encoder/structure-encoder.js';
import { EncodingError, ParseFailure } from '../src/lib/errors.js';
import { AIR } from '../src/types/blocks.js';
import { LIMITS, V1_20_1, smallCatalog } from './helpers.js';

const encoder = new StructureEncoder({
  catalog: smallCatalog(),
  policy: { kind: 'fallback', block: AIR },
  limits: LIMITS,
  mcfunctionRelative: true,
  generator: 'test-gen',
});

const text = 'setblock 1 0 0 stone\nsetblock 1 0 0 glass\nhello';

describe('StructureEncoder', () => {
  it('collects warnings from every stage in order', () => {
    const encoded = encoder.encode(text, V1_20_1, 'mcfunction');

    expect(encoded.format).toBe('mcfunction');
    expect(encoded.data.toString('utf8')).toBe('setblock ~1 ~ ~ minecraft:glass\n');
    expect(encoded.warnings).toEqual([
      { line: 3, text: 'hello', reason: 'not a placement' },
      { line: 2, text: '', reason: '1 placements overwrote an earlier block at the same position' },
    ]);
  });

  it('stamps the name and generator into schematics', () => {
    const encoded = encoder.encode(text, V1_20_1, 'schem', 'hut');
    const decoded = decodeSchematic(encoded.data);

    expect(decoded.metadata.Name).toBe('hut');
    expect(decoded.metadata.Generator).toBe('test-gen');
    expect(decoded.palette).toEqual(['minecraft:glass']);
    expect(decoded.offset).toEqual({ x: 1, y: 0, z: 0 });
  });

  it('rejects a fill holding more blocks than the budget before expanding it', () => {
    const run = () => encoder.encode('fill 0 0 0 255 383 255 stone', V1_20_1, 'schem');

    expect(run).toThrow(EncodingError);
    expect(run).toThrow('Line 1 brings the structure to 25165824 blocks, over the 1000000 block limit');
  });

  it('fails to parse a schematic whose only block is outside the world', () => {
    const run = () => encoder.encode('setblock 3000000000 0 0 stone', V1_20_1, 'schem');

    expect(run).toThrow(ParseFailure);
    expect(run).toThrow('No valid block placements found (1 lines skipped)');
  });
});
