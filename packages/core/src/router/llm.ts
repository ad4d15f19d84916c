import { generateText, type LanguageModel } from 'ai';
import type { ProviderRegistry } from './providers.js';

export interface CompletionOptions {
  stop?: readonly string[];
  abortSignal?: AbortSignal;
}

/**
 * The only thing the rest of the system knows about a language model:
 * a prompt goes in, text comes out, failures are thrown.
 */
export interface ModelBackend {
  readonly id: string;
  readonly locality: 'hosted' | 'local';
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface GenerationSettings {
  temperature?: number;
  maxOutputTokens?: number;
}

/** ModelBackend over an AI SDK LanguageModel. */
export class LanguageModelBackend implements ModelBackend {
  constructor(
    readonly id: string,
    readonly locality: 'hosted' | 'local',
    private readonly model: LanguageModel,
    private readonly settings: GenerationSettings = {},
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const result = await generateText({
      model: this.model,
      prompt,
      stopSequences: options.stop ? [...options.stop] : undefined,
      temperature: this.settings.temperature,
      maxOutputTokens: this.settings.maxOutputTokens,
      abortSignal: options.abortSignal,
      // Attempts are counted by ResilientModelClient, not by the SDK.
      maxRetries: 0,
    });
    return result.text;
  }
}

export function createHostedBackend(
  registry: ProviderRegistry,
  modelId: string,
  settings?: GenerationSettings,
): ModelBackend {
  return new LanguageModelBackend(modelId, 'hosted', registry.getModel(modelId), settings);
}

export function createLocalBackend(
  registry: ProviderRegistry,
  modelId: string,
  settings?: GenerationSettings,
): ModelBackend {
  return new LanguageModelBackend(`local:${modelId}`, 'local', registry.getLocalModel(modelId), settings);
}
