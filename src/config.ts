import { z } from 'zod';

const booleanFromString = z
  .union([z.literal('true'), z.literal('false')])
  .transform(v => v === 'true');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  OUTPUT_DIR: z.string().min(1).default('generated'),
  EVENTS_JSONL_PATH: z.string().min(1).default('.data/events.jsonl'),

  AI_PROVIDER: z.enum(['gateway', 'anthropic']).default('gateway'),
  AI_GATEWAY_API_KEY: z.string().optional(),
  AI_MODEL: z.string().min(1).default('openai/gpt-5.2'),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
  GENERATE_NAMES: booleanFromString.default(true),

  DEFAULT_MC_VERSION: z.string().min(1).optional(),
  UNKNOWN_BLOCK_POLICY: z.enum(['fallback', 'reject']).default('fallback'),
  FALLBACK_BLOCK: z.string().min(1).default('minecraft:air'),
  MAX_WIDTH: z.coerce.number().int().min(1).max(32767).default(256),
  MAX_HEIGHT: z.coerce.number().int().min(1).max(32767).default(384),
  MAX_LENGTH: z.coerce.number().int().min(1).max(32767).default(256),
  MAX_BLOCKS: z.coerce.number().int().min(1).default(1_000_000),
  MCFUNCTION_RELATIVE: booleanFromString.default(false),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid environment:\n${message}`);
  }
  return Object.freeze(parsed.data);
}
