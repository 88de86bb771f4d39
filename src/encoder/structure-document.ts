import { bboxOfPoints, bboxSize, posKey } from '../types/geometry.js';
import { BlockPlacement, MinecraftVersion, ParseWarning, SizeLimits, StructureDocument } from '../types/structure.js';
import { EncodingError, ParseFailure } from '../lib/errors.js';
import { SourcedPlacement } from './text-parser.js';

export type DocumentBuild = Readonly<{
  document: StructureDocument;
  warnings: ParseWarning[];
}>;

/**
 * Collapses placements to one per coordinate and derives the bounding box.
 * A later placement at a coordinate replaces the earlier one and moves to the
 * later position in the order. Structures larger than `limits` are rejected.
 */
export function buildStructureDocument(
  placements: readonly SourcedPlacement[],
  version: MinecraftVersion,
  limits: SizeLimits,
): DocumentBuild {
  const byPos = new Map<string, BlockPlacement>();
  let overwritten = 0;
  let firstOverwriteLine = 0;

  for (const { pos, block, line } of placements) {
    const key = posKey(pos);
    if (byPos.delete(key)) {
      overwritten += 1;
      if (firstOverwriteLine === 0) firstOverwriteLine = line;
    }
    byPos.set(key, { pos, block });
  }

  const ordered = [...byPos.values()];
  const bbox = bboxOfPoints(ordered.map(p => p.pos));
  if (!bbox) {
    throw new ParseFailure('No valid block placements found', []);
  }

  const size = bboxSize(bbox);
  if (size.width > limits.maxWidth || size.height > limits.maxHeight || size.length > limits.maxLength) {
    throw new EncodingError(
      `Structure spans ${size.width}x${size.height}x${size.length}, over the ${limits.maxWidth}x${limits.maxHeight}x${limits.maxLength} limit`,
    );
  }

  const warnings: ParseWarning[] = overwritten > 0
    ? [{ line: firstOverwriteLine, text: '', reason: `${overwritten} placements overwrote an earlier block at the same position` }]
    : [];

  return {
    document: { version, placements: ordered, bbox, size },
    warnings,
  };
}
