import { BlockCatalog } from '../registry/block-catalog.js';
import { BlockState, formatBlockState, isAir } from '../types/blocks.js';
import { MinecraftVersion, ParseWarning } from '../types/structure.js';
import { EncodingError } from '../lib/errors.js';
import { SourcedPlacement } from './text-parser.js';

export type UnknownBlockPolicy =
  | Readonly<{ kind: 'fallback'; block: BlockState }>
  | Readonly<{ kind: 'reject' }>;

export type ResolveResult = Readonly<{
  placements: SourcedPlacement[];
  warnings: ParseWarning[];
}>;

function unsupportedReason(catalog: BlockCatalog, name: string, version: MinecraftVersion): string {
  const info = catalog.get(name);
  return info
    ? `${name} needs Minecraft ${info.since} or newer (target ${version.id})`
    : `${name} is not a known block`;
}

/**
 * Checks every placement against the block catalog for the target version.
 * With the `fallback` policy unsupported blocks become the fallback block and
 * each distinct block id is reported once; with `reject` the first one aborts
 * the generation.
 */
export function resolveBlocks(
  placements: readonly SourcedPlacement[],
  catalog: BlockCatalog,
  version: MinecraftVersion,
  policy: UnknownBlockPolicy,
): ResolveResult {
  const warnings: ParseWarning[] = [];
  const reported = new Set<string>();
  const resolved: SourcedPlacement[] = [];

  for (const placement of placements) {
    const { block } = placement;
    if (isAir(block) || catalog.isAvailable(block.name, version)) {
      resolved.push(placement);
      continue;
    }
    const reason = unsupportedReason(catalog, block.name, version);
    if (policy.kind === 'reject') {
      throw new EncodingError(`Line ${placement.line}: ${reason}`);
    }
    if (!reported.has(block.name)) {
      reported.add(block.name);
      warnings.push({
        line: placement.line,
        text: formatBlockState(block),
        reason: `${reason}; replaced with ${formatBlockState(policy.block)}`,
      });
    }
    resolved.push({ ...placement, block: policy.block });
  }

  return { placements: resolved, warnings };
}
