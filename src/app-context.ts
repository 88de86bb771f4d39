import { AppConfig } from './config.js';
import { StructureEncoder } from './encoder/structure-encoder.js';
import { UnknownBlockPolicy } from './encoder/block-resolver.js';
import { EventBus } from './events/event-bus.js';
import { AppEvents } from './events/event-types.js';
import { JsonlEventStore } from './events/jsonl-event-store.js';
import { CompletionProvider } from './generator/completion-provider.js';
import { GenerationService } from './generator/generation-service.js';
import { PromptOrchestrator, loadPromptTemplates } from './generator/prompt-orchestrator.js';
import { DATA_DIR, PROMPTS_DIR } from './lib/paths.js';
import { BlockCatalog, loadBlockCatalog } from './registry/block-catalog.js';
import { VersionRegistry, loadVersionRegistry } from './registry/versions.js';
import { OutputStore } from './store/output-store.js';
import { parseBlockState } from './types/blocks.js';
import { SizeLimits } from './types/structure.js';

export type AppContext = {
  config: AppConfig;
  events: EventBus<AppEvents>;
  eventStore: JsonlEventStore<AppEvents>;
  versions: VersionRegistry;
  catalog: BlockCatalog;
  output: OutputStore;
  generator: GenerationService;
};

export type AppContextOptions = Readonly<{
  dataDir?: string;
  promptsDir?: string;
  providerFactory?: (config: AppConfig) => CompletionProvider;
}>;

export const GENERATOR_NAME = 'structure-forge';

export function sizeLimits(config: AppConfig): SizeLimits {
  return {
    maxWidth: config.MAX_WIDTH,
    maxHeight: config.MAX_HEIGHT,
    maxLength: config.MAX_LENGTH,
    maxBlocks: config.MAX_BLOCKS,
  };
}

export function unknownBlockPolicy(config: AppConfig, catalog: BlockCatalog): UnknownBlockPolicy {
  if (config.UNKNOWN_BLOCK_POLICY === 'reject') return { kind: 'reject' };
  const block = parseBlockState(config.FALLBACK_BLOCK);
  if (!block || !catalog.exists(block.name)) {
    throw new Error(`FALLBACK_BLOCK ${config.FALLBACK_BLOCK} is not a known block`);
  }
  return { kind: 'fallback', block };
}

/** Loads data files, wires the event log to the bus and builds the generator. */
export async function createAppContext(config: AppConfig, options: AppContextOptions = {}): Promise<AppContext> {
  const dataDir = options.dataDir ?? DATA_DIR;
  const [baseVersions, catalog, templates] = await Promise.all([
    loadVersionRegistry(dataDir),
    loadBlockCatalog(dataDir),
    loadPromptTemplates(options.promptsDir ?? PROMPTS_DIR),
  ]);
  const versions = baseVersions.withDefault(config.DEFAULT_MC_VERSION);

  const events = new EventBus<AppEvents>();
  const eventStore = new JsonlEventStore<AppEvents>(config.EVENTS_JSONL_PATH);
  await eventStore.init();
  events.resumeFrom(await eventStore.lastSeq());
  events.onAny(event => {
    void eventStore.append(event).catch(err => {
      console.error('eventStore.append failed', err);
    });
  });

  const output = new OutputStore(config.OUTPUT_DIR);
  await output.init();

  const encoder = new StructureEncoder({
    catalog,
    policy: unknownBlockPolicy(config, catalog),
    limits: sizeLimits(config),
    mcfunctionRelative: config.MCFUNCTION_RELATIVE,
    generator: GENERATOR_NAME,
  });

  const generator = new GenerationService({
    config,
    events,
    versions,
    orchestrator: new PromptOrchestrator(templates, catalog),
    encoder,
    output,
    providerFactory: options.providerFactory,
  });

  return { config, events, eventStore, versions, catalog, output, generator };
}
