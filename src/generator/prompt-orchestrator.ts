import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BlockCatalog } from '../registry/block-catalog.js';
import { formatVersionForPrompt } from '../registry/versions.js';
import { ExportFormat, MinecraftVersion } from '../types/structure.js';
import { CompletionProvider, PromptImage, PromptRequest } from './completion-provider.js';

export type PromptTemplates = Readonly<{
  generateSystem: string;
  nameSystem: string;
}>;

export type StructureRequest = Readonly<{
  description: string;
  version: MinecraftVersion;
  format: ExportFormat;
  image?: PromptImage;
}>;

const FORMAT_LABELS: Record<ExportFormat, string> = {
  schem: 'WorldEdit schematic (.schem)',
  mcfunction: 'function (.mcfunction) of setblock commands',
};

export async function loadPromptTemplates(dir: string): Promise<PromptTemplates> {
  const [generateSystem, nameSystem] = await Promise.all([
    readFile(join(dir, 'generate-system.txt'), 'utf8'),
    readFile(join(dir, 'name-system.txt'), 'utf8'),
  ]);
  return { generateSystem: generateSystem.trim(), nameSystem: nameSystem.trim() };
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  let out = template;
  for (const [key, value] of Object.entries(values)) {
    out = out.split(`%${key}%`).join(value);
  }
  return out;
}

export function slugify(name: string, fallback = 'structure'): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 48)
    .replace(/-+$/g, '');
  return slug.length > 0 ? slug : fallback;
}

export class PromptOrchestrator {
  constructor(
    private readonly templates: PromptTemplates,
    private readonly catalog: BlockCatalog,
  ) {}

  buildPrompt(request: StructureRequest): PromptRequest {
    const system = fillTemplate(this.templates.generateSystem, {
      MINECRAFT_VERSION: formatVersionForPrompt(request.version),
      EXPORT_FORMAT: FORMAT_LABELS[request.format],
      BLOCK_TYPES_LIST: this.catalog.promptList(request.version),
    });
    return { system, prompt: request.description.trim(), image: request.image };
  }

  /** One model call; an empty completion is returned as-is. */
  async generateStructureText(
    provider: CompletionProvider,
    request: StructureRequest,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    return provider.submitPrompt({ ...this.buildPrompt(request), abortSignal });
  }

  async generateStructureName(
    provider: CompletionProvider,
    description: string,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    const raw = await provider.submitPrompt({
      system: this.templates.nameSystem,
      prompt: description.trim(),
      abortSignal,
    });
    return slugify(raw.split(/\r?\n/)[0] ?? '');
  }
}
