export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createAppContext, GENERATOR_NAME } from './app-context.js';
export type { AppContext, AppContextOptions } from './app-context.js';
export { buildServer } from './api/server.js';
export { structurePlugin } from './api/plugin.js';

export { StructureEncoder } from './encoder/structure-encoder.js';
export type { EncodedStructure, StructureEncoderOptions } from './encoder/structure-encoder.js';
export { parseStructureText } from './encoder/text-parser.js';
export { resolveBlocks } from './encoder/block-resolver.js';
export type { UnknownBlockPolicy } from './encoder/block-resolver.js';
export { buildStructureDocument } from './encoder/structure-document.js';
export { encodeMcfunction } from './encoder/mcfunction.js';
export { decodeSchematic, encodeSchematic, summarizeSchematic } from './encoder/schematic.js';
export type { DecodedSchematic, SchematicSummary } from './encoder/schematic.js';

export { GenerationService } from './generator/generation-service.js';
export type { GenerateInput, GenerationResult } from './generator/generation-service.js';
export { createCompletionProvider } from './generator/completion-provider.js';
export type { CompletionProvider, PromptImage, PromptRequest } from './generator/completion-provider.js';
export { PromptOrchestrator, slugify } from './generator/prompt-orchestrator.js';

export { BlockCatalog, loadBlockCatalog } from './registry/block-catalog.js';
export { VersionRegistry, loadVersionRegistry } from './registry/versions.js';
export { OutputStore } from './store/output-store.js';

export * from './lib/errors.js';
export type {
  BlockPlacement,
  ExportFormat,
  MinecraftVersion,
  ParseWarning,
  SizeLimits,
  StructureDocument,
} from './types/structure.js';
export { EXPORT_FORMATS, FILE_EXTENSIONS } from './types/structure.js';
export type { BlockState } from './types/blocks.js';
export { formatBlockState, parseBlockState } from './types/blocks.js';
