import { generateText, type LanguageModel } from 'ai';
import { createGateway } from '@ai-sdk/gateway';
import { createAnthropic } from '@ai-sdk/anthropic';
import { AppConfig } from '../config.js';
import { AbortError, ProviderError } from '../lib/errors.js';

export type PromptImage = Readonly<{
  /** Base64 without the data: prefix. */
  data: string;
  mediaType: 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';
}>;

export type PromptRequest = Readonly<{
  system: string;
  prompt: string;
  image?: PromptImage;
  abortSignal?: AbortSignal;
}>;

/** The only thing the generator needs from a model provider. */
export interface CompletionProvider {
  readonly label: string;
  submitPrompt(request: PromptRequest): Promise<string>;
}

export type ProviderSelection =
  | Readonly<{ kind: 'gateway'; model: string; apiKey: string }>
  | Readonly<{ kind: 'anthropic'; model: string; apiKey: string }>;

/**
 * Anthropic direct when configured and keyed, otherwise the AI gateway.
 * Chosen once per request.
 */
export function selectProvider(config: AppConfig): ProviderSelection {
  if (config.AI_PROVIDER === 'anthropic' && config.ANTHROPIC_API_KEY) {
    return { kind: 'anthropic', model: config.ANTHROPIC_MODEL, apiKey: config.ANTHROPIC_API_KEY };
  }
  if (!config.AI_GATEWAY_API_KEY) {
    throw new ProviderError(
      config.AI_PROVIDER === 'anthropic'
        ? 'ANTHROPIC_API_KEY is not set and AI_GATEWAY_API_KEY is not set'
        : 'AI_GATEWAY_API_KEY is not set',
    );
  }
  return { kind: 'gateway', model: config.AI_MODEL, apiKey: config.AI_GATEWAY_API_KEY };
}

function languageModel(selection: ProviderSelection): LanguageModel {
  switch (selection.kind) {
    case 'anthropic':
      return createAnthropic({ apiKey: selection.apiKey })(selection.model);
    case 'gateway':
      return createGateway({ apiKey: selection.apiKey })(selection.model);
  }
}

export class AiSdkCompletionProvider implements CompletionProvider {
  readonly label: string;
  private readonly model: LanguageModel;

  constructor(selection: ProviderSelection) {
    this.label = `${selection.kind}:${selection.model}`;
    this.model = languageModel(selection);
  }

  async submitPrompt(request: PromptRequest): Promise<string> {
    try {
      if (request.image) {
        const result = await generateText({
          model: this.model,
          abortSignal: request.abortSignal,
          system: request.system,
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: request.prompt },
                { type: 'image', image: `data:${request.image.mediaType};base64,${request.image.data}` },
              ],
            },
          ],
        });
        return result.text;
      }
      const result = await generateText({
        model: this.model,
        abortSignal: request.abortSignal,
        system: request.system,
        prompt: request.prompt,
      });
      return result.text;
    } catch (err) {
      if (request.abortSignal?.aborted) {
        throw new AbortError(request.abortSignal.reason ? String(request.abortSignal.reason) : 'Aborted');
      }
      throw new ProviderError(err);
    }
  }
}

export function createCompletionProvider(config: AppConfig): CompletionProvider {
  return new AiSdkCompletionProvider(selectProvider(config));
}
