import { BlockState } from './blocks.js';
import { BBox, Size3, Vec3i } from './geometry.js';

export type ExportFormat = 'schem' | 'mcfunction';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['schem', 'mcfunction'];

export const FILE_EXTENSIONS: Readonly<Record<ExportFormat, string>> = {
  schem: '.schem',
  mcfunction: '.mcfunction',
};

export type MinecraftVersion = Readonly<{
  id: string;
  tag: string;
  dataVersion: number;
}>;

export type BlockPlacement = Readonly<{
  pos: Vec3i;
  block: BlockState;
}>;

export type ParseWarning = Readonly<{
  /** 1-based line of the model output, 0 for document-level warnings. */
  line: number;
  text: string;
  reason: string;
}>;

export type StructureDocument = Readonly<{
  version: MinecraftVersion;
  placements: readonly BlockPlacement[];
  bbox: BBox;
  size: Size3;
}>;

export type SizeLimits = Readonly<{
  maxWidth: number;
  maxHeight: number;
  maxLength: number;
  /** Cells a single reply may place, counted before fills are expanded. */
  maxBlocks: number;
}>;
