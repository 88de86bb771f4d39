export type IsoTimestamp = string;

export type EventEnvelope<TType extends string = string, TData = unknown> = {
  seq: number;
  ts: IsoTimestamp;
  type: TType;
  data: TData;
};

export type AppEvents =
  | EventEnvelope<'app.start', { pid: number; outputDir: string }>
  | EventEnvelope<'app.error', { message: string; stack?: string }>
  | EventEnvelope<'generation.start', { generationId: string; version: string; format: string; provider: string; descriptionLength: number }>
  | EventEnvelope<'generation.completion', { generationId: string; characters: number }>
  | EventEnvelope<'generation.parsed', { generationId: string; placements: number; warnings: number; size: { width: number; height: number; length: number } }>
  | EventEnvelope<'generation.written', { generationId: string; path: string; bytes: number }>
  | EventEnvelope<'generation.failed', { generationId: string; code: string; message: string }>
  | EventEnvelope<'log.note', { text: string; tags?: string[] }>;
