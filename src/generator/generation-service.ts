import { AppConfig } from '../config.js';
import { EventBus } from '../events/event-bus.js';
import { AppEvents } from '../events/event-types.js';
import { StructureEncoder } from '../encoder/structure-encoder.js';
import { AbortError, GenerationError, InvalidArgumentError, errorMessage, throwIfAborted } from '../lib/errors.js';
import { makeId } from '../lib/ids.js';
import { VersionRegistry } from '../registry/versions.js';
import { OutputStore } from '../store/output-store.js';
import { Size3 } from '../types/geometry.js';
import { ExportFormat, FILE_EXTENSIONS, ParseWarning } from '../types/structure.js';
import { CompletionProvider, PromptImage, createCompletionProvider } from './completion-provider.js';
import { PromptOrchestrator } from './prompt-orchestrator.js';

export type GenerateInput = Readonly<{
  description: string;
  version?: string;
  format: ExportFormat;
  image?: PromptImage;
  abortSignal?: AbortSignal;
}>;

export type GenerationResult = Readonly<{
  generationId: string;
  fileName: string;
  path: string;
  format: ExportFormat;
  version: string;
  placements: number;
  size: Size3;
  bytes: number;
  warnings: ParseWarning[];
}>;

export type GenerationServiceDeps = Readonly<{
  config: AppConfig;
  events: EventBus<AppEvents>;
  versions: VersionRegistry;
  orchestrator: PromptOrchestrator;
  encoder: StructureEncoder;
  output: OutputStore;
  /** Called once per request. */
  providerFactory?: (config: AppConfig) => CompletionProvider;
}>;

const DEFAULT_NAME = 'structure';

function failureCode(err: unknown): string {
  if (err instanceof GenerationError) return err.code;
  if (err instanceof AbortError) return 'ABORTED';
  return 'INTERNAL';
}

export class GenerationService {
  private readonly providerFactory: (config: AppConfig) => CompletionProvider;

  constructor(private readonly deps: GenerationServiceDeps) {
    this.providerFactory = deps.providerFactory ?? createCompletionProvider;
  }

  async generate(input: GenerateInput): Promise<GenerationResult> {
    const { config, events, versions, orchestrator, encoder, output } = this.deps;

    const description = input.description.trim();
    if (description.length === 0) {
      throw new InvalidArgumentError('description is required');
    }
    const version = input.version ? versions.resolve(input.version) : versions.getDefault();
    if (!version) {
      throw new InvalidArgumentError(`Unknown Minecraft version ${input.version}`);
    }

    const generationId = makeId('gen');
    const signal = input.abortSignal;

    try {
      const provider = this.providerFactory(config);
      events.publish('generation.start', {
        generationId,
        version: version.id,
        format: input.format,
        provider: provider.label,
        descriptionLength: description.length,
      });

      const text = await orchestrator.generateStructureText(
        provider,
        { description, version, format: input.format, image: input.image },
        signal,
      );
      events.publish('generation.completion', { generationId, characters: text.length });

      const { document, warnings } = encoder.toDocument(text, version);
      events.publish('generation.parsed', {
        generationId,
        placements: document.placements.length,
        warnings: warnings.length,
        size: document.size,
      });

      const name = config.GENERATE_NAMES
        ? await orchestrator.generateStructureName(provider, description, signal)
        : DEFAULT_NAME;
      throwIfAborted(signal);

      const data = encoder.serialize(document, input.format, name);
      const fileName = `${name}-${generationId}${FILE_EXTENSIONS[input.format]}`;
      const path = await output.write(fileName, data);
      events.publish('generation.written', { generationId, path, bytes: data.length });

      return {
        generationId,
        fileName,
        path,
        format: input.format,
        version: version.id,
        placements: document.placements.length,
        size: document.size,
        bytes: data.length,
        warnings,
      };
    } catch (err) {
      events.publish('generation.failed', { generationId, code: failureCode(err), message: errorMessage(err) });
      throw err;
    }
  }
}
