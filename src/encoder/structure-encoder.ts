import { BlockCatalog } from '../registry/block-catalog.js';
import { ExportFormat, MinecraftVersion, ParseWarning, SizeLimits, StructureDocument } from '../types/structure.js';
import { UnknownBlockPolicy, resolveBlocks } from './block-resolver.js';
import { encodeMcfunction } from './mcfunction.js';
import { encodeSchematic } from './schematic.js';
import { buildStructureDocument } from './structure-document.js';
import { parseStructureText } from './text-parser.js';

export type StructureEncoderOptions = Readonly<{
  catalog: BlockCatalog;
  policy: UnknownBlockPolicy;
  limits: SizeLimits;
  mcfunctionRelative?: boolean;
  generator?: string;
}>;

export type EncodedStructure = Readonly<{
  format: ExportFormat;
  data: Buffer;
  document: StructureDocument;
  warnings: ParseWarning[];
}>;

export class StructureEncoder {
  constructor(private readonly options: StructureEncoderOptions) {}

  /** Parse, check blocks against the version and build the document. */
  toDocument(text: string, version: MinecraftVersion): { document: StructureDocument; warnings: ParseWarning[] } {
    const parsed = parseStructureText(text, { limits: this.options.limits });
    const resolved = resolveBlocks(parsed.placements, this.options.catalog, version, this.options.policy);
    const built = buildStructureDocument(resolved.placements, version, this.options.limits);
    return {
      document: built.document,
      warnings: [...parsed.warnings, ...resolved.warnings, ...built.warnings],
    };
  }

  serialize(document: StructureDocument, format: ExportFormat, name?: string): Buffer {
    switch (format) {
      case 'mcfunction':
        return encodeMcfunction(document, { relative: this.options.mcfunctionRelative });
      case 'schem':
        return encodeSchematic(document, { name, generator: this.options.generator });
    }
  }

  encode(text: string, version: MinecraftVersion, format: ExportFormat, name?: string): EncodedStructure {
    const { document, warnings } = this.toDocument(text, version);
    return { format, data: this.serialize(document, format, name), document, warnings };
  }
}
