import { z } from 'zod';
import { AIR, BlockState, parseBlockState } from '../types/blocks.js';
import { BBox, bboxIterate, bboxSize, isOnShell, normalizeBBox, Vec3i } from '../types/geometry.js';
import { BlockPlacement, ParseWarning, SizeLimits } from '../types/structure.js';
import { EncodingError, ParseFailure } from '../lib/errors.js';

export type SourcedPlacement = BlockPlacement & Readonly<{ line: number }>;

export type ParseResult = Readonly<{
  placements: SourcedPlacement[];
  warnings: ParseWarning[];
  source: 'lines' | 'json';
}>;

export type ParseOptions = Readonly<{
  limits: SizeLimits;
}>;

type FillMode = 'replace' | 'hollow' | 'outline' | 'keep' | 'destroy';

/** Placements collected so far, checked against the block budget before each expansion. */
type Sink = {
  readonly limits: SizeLimits;
  readonly out: SourcedPlacement[];
  total: number;
};

const WORLD_HORIZONTAL_LIMIT = 30_000_000;
const WORLD_MIN_Y = -2048;
const WORLD_MAX_Y = 2047;

const COORD = '(~-?\\d*|-?\\d+)';
const BLOCK = '([a-z0-9_.:/-]+(?:\\[[^\\]]*\\])?)';

const SETBLOCK_LINE = new RegExp(`^setblock\\s+${COORD}\\s+${COORD}\\s+${COORD}\\s+${BLOCK}(?:\\s+(replace|keep|destroy))?$`, 'i');
const FILL_LINE = new RegExp(
  `^fill\\s+${COORD}\\s+${COORD}\\s+${COORD}\\s+${COORD}\\s+${COORD}\\s+${COORD}\\s+${BLOCK}(?:\\s+(replace|hollow|outline|keep|destroy))?$`,
  'i',
);
const BARE_LINE = new RegExp(`^${COORD}\\s+${COORD}\\s+${COORD}\\s+${BLOCK}$`, 'i');

const IGNORED_LINE = /^(?:```.*|#.*|\/\/.*)$/;
const LIST_MARKER = /^(?:[-*]|\d+[.)])\s+/;

const jsonEntrySchema = z.object({
  type: z.string().default('block'),
  x: z.number().int(),
  y: z.number().int(),
  z: z.number().int(),
  toX: z.number().int().optional(),
  toY: z.number().int().optional(),
  toZ: z.number().int().optional(),
  block: z.string().min(1),
});

const jsonDocumentSchema = z.object({
  structures: z.array(z.unknown()),
});

const FILL_MODES: Readonly<Record<string, FillMode>> = {
  replace: 'replace',
  hollow: 'hollow',
  outline: 'outline',
  keep: 'keep',
  destroy: 'destroy',
};

/** `~` prefixes are read as offsets from the origin. */
function parseCoord(token: string): number | null {
  if (token === '~') return 0;
  const value = Number.parseInt(token.startsWith('~') ? token.slice(1) : token, 10);
  return Number.isSafeInteger(value) ? value : null;
}

function parseCoords(tokens: readonly string[]): number[] | null {
  const values: number[] = [];
  for (const token of tokens) {
    const value = parseCoord(token);
    if (value === null) return null;
    values.push(value);
  }
  return values;
}

function inWorld(pos: Vec3i): boolean {
  return (
    Math.abs(pos.x) <= WORLD_HORIZONTAL_LIMIT &&
    Math.abs(pos.z) <= WORLD_HORIZONTAL_LIMIT &&
    pos.y >= WORLD_MIN_Y &&
    pos.y <= WORLD_MAX_Y
  );
}

function reserve(sink: Sink, count: number, line: number): void {
  const total = sink.total + count;
  if (total > sink.limits.maxBlocks) {
    throw new EncodingError(
      `Line ${line} brings the structure to ${total} blocks, over the ${sink.limits.maxBlocks} block limit`,
    );
  }
  sink.total = total;
}

function place(sink: Sink, placement: SourcedPlacement): void {
  reserve(sink, 1, placement.line);
  sink.out.push(placement);
}

function fillCells(box: BBox, block: BlockState, mode: FillMode, line: number, sink: Sink): void {
  const { limits, out } = sink;
  const size = bboxSize(box);
  if (size.width > limits.maxWidth || size.height > limits.maxHeight || size.length > limits.maxLength) {
    throw new EncodingError(
      `fill on line ${line} spans ${size.width}x${size.height}x${size.length}, over the ${limits.maxWidth}x${limits.maxHeight}x${limits.maxLength} limit`,
    );
  }
  const volume = size.width * size.height * size.length;
  const interior =
    Math.max(0, size.width - 2) * Math.max(0, size.height - 2) * Math.max(0, size.length - 2);
  reserve(sink, mode === 'outline' ? volume - interior : volume, line);
  bboxIterate(box, pos => {
    const shell = isOnShell(box, pos);
    if (shell) {
      out.push({ pos, block, line });
    } else if (mode === 'hollow') {
      out.push({ pos, block: AIR, line });
    } else if (mode !== 'outline') {
      out.push({ pos, block, line });
    }
  });
}

function parseLine(raw: string, line: number, sink: Sink): string | null {
  const text = raw.trim().replace(LIST_MARKER, '').replace(/^\//, '');

  const set = SETBLOCK_LINE.exec(text) ?? BARE_LINE.exec(text);
  if (set) {
    const [, x, y, z, blockText] = set;
    if (!x || !y || !z || !blockText) return 'malformed placement';
    const coords = parseCoords([x, y, z]);
    if (!coords) return 'invalid coordinate';
    const [px = 0, py = 0, pz = 0] = coords;
    const pos: Vec3i = { x: px, y: py, z: pz };
    if (!inWorld(pos)) return 'coordinate outside the world';
    const block = parseBlockState(blockText);
    if (!block) return `invalid block state "${blockText}"`;
    place(sink, { pos, block, line });
    return null;
  }

  const fill = FILL_LINE.exec(text);
  if (fill) {
    const [, x1, y1, z1, x2, y2, z2, blockText, mode] = fill;
    if (!x1 || !y1 || !z1 || !x2 || !y2 || !z2 || !blockText) return 'malformed fill';
    const coords = parseCoords([x1, y1, z1, x2, y2, z2]);
    if (!coords) return 'invalid coordinate';
    const [ax = 0, ay = 0, az = 0, bx = 0, by = 0, bz = 0] = coords;
    const from: Vec3i = { x: ax, y: ay, z: az };
    const to: Vec3i = { x: bx, y: by, z: bz };
    if (!inWorld(from) || !inWorld(to)) return 'coordinate outside the world';
    const block = parseBlockState(blockText);
    if (!block) return `invalid block state "${blockText}"`;
    const fillMode: FillMode = mode ? FILL_MODES[mode.toLowerCase()] ?? 'replace' : 'replace';
    fillCells(normalizeBBox({ min: from, max: to }), block, fillMode, line, sink);
    return null;
  }

  return 'not a placement';
}

function extractJsonDocument(text: string): z.infer<typeof jsonDocumentSchema> | null {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    const parsed = jsonDocumentSchema.safeParse(JSON.parse(match[0]));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Entries of any `type` other than `fill` place a single block. */
function parseJsonDocument(doc: z.infer<typeof jsonDocumentSchema>, limits: SizeLimits): ParseResult {
  const placements: SourcedPlacement[] = [];
  const warnings: ParseWarning[] = [];
  const sink: Sink = { limits, out: placements, total: 0 };
  doc.structures.forEach((raw, index) => {
    const entryNo = index + 1;
    const entry = jsonEntrySchema.safeParse(raw);
    if (!entry.success) {
      warnings.push({ line: entryNo, text: JSON.stringify(raw), reason: 'not a placement' });
      return;
    }
    const e = entry.data;
    const block = parseBlockState(e.block);
    if (!block) {
      warnings.push({ line: entryNo, text: JSON.stringify(raw), reason: `invalid block state "${e.block}"` });
      return;
    }
    const from: Vec3i = { x: e.x, y: e.y, z: e.z };
    const to: Vec3i = e.type === 'fill' ? { x: e.toX ?? e.x, y: e.toY ?? e.y, z: e.toZ ?? e.z } : from;
    if (!inWorld(from) || !inWorld(to)) {
      warnings.push({ line: entryNo, text: JSON.stringify(raw), reason: 'coordinate outside the world' });
      return;
    }
    if (e.type === 'fill') {
      fillCells(normalizeBBox({ min: from, max: to }), block, 'replace', entryNo, sink);
    } else {
      place(sink, { pos: from, block, line: entryNo });
    }
  });
  return { placements, warnings, source: 'json' };
}

/**
 * Reads model output into placements. Accepts `setblock`, `fill` and bare
 * `X Y Z block` lines, or a JSON document with a `structures` array. Lines
 * that match neither are skipped and reported as warnings; output without a
 * single placement is a ParseFailure.
 */
export function parseStructureText(text: string, options: ParseOptions): ParseResult {
  const json = text.includes('"structures"') ? extractJsonDocument(text) : null;
  const result = json ? parseJsonDocument(json, options.limits) : parseLines(text, options.limits);
  if (result.placements.length === 0) {
    throw new ParseFailure(
      result.warnings.length > 0
        ? `No valid block placements found (${result.warnings.length} lines skipped)`
        : 'The model returned no block placements',
      result.warnings,
    );
  }
  return result;
}

function parseLines(text: string, limits: SizeLimits): ParseResult {
  const placements: SourcedPlacement[] = [];
  const warnings: ParseWarning[] = [];
  const sink: Sink = { limits, out: placements, total: 0 };
  const lines = text.split(/\r?\n/);
  lines.forEach((raw, index) => {
    const trimmed = raw.trim();
    if (trimmed.length === 0 || IGNORED_LINE.test(trimmed)) return;
    const reason = parseLine(trimmed, index + 1, sink);
    if (reason) warnings.push({ line: index + 1, text: trimmed, reason });
  });
  return { placements, warnings, source: 'lines' };
}
