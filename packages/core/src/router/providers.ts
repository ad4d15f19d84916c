import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { EmbeddingModel, LanguageModel } from 'ai';

export type ProviderId = 'anthropic' | 'openai' | 'google';

export const DEFAULT_LOCAL_BASE_URL = 'http://localhost:11434/v1';

export interface ProviderConfig {
  providers: {
    anthropic?: { apiKey?: string };
    openai?: { apiKey?: string };
    google?: { apiKey?: string };
  };
  /** OpenAI-compatible endpoint of a locally hosted model server (Ollama). */
  local?: { baseUrl?: string };
}

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (
    modelId.startsWith('gpt-') ||
    modelId.startsWith('o1') ||
    modelId.startsWith('o3') ||
    modelId.startsWith('o4')
  ) {
    return 'openai';
  }
  if (modelId.startsWith('gemini-')) return 'google';
  throw new Error(`Cannot determine provider for model: ${modelId}`);
}

/** Embedding ids overlap between providers, so they get their own table. */
export function detectEmbeddingProvider(modelId: string): ProviderId {
  if (modelId.startsWith('gemini-embedding') || /^text-embedding-\d{3}$/.test(modelId)) {
    return 'google';
  }
  if (modelId.startsWith('text-embedding-')) return 'openai';
  throw new Error(`Cannot determine embedding provider for model: ${modelId}`);
}

const KEY_HINTS: Record<ProviderId, string> = {
  anthropic: 'Anthropic API key not configured. Set model.providers.anthropic.api_key in ~/.forecastr/config.yaml or export ANTHROPIC_API_KEY',
  openai: 'OpenAI API key not configured. Set model.providers.openai.api_key in ~/.forecastr/config.yaml or export OPENAI_API_KEY',
  google: 'Google API key not configured. Set model.providers.google.api_key in ~/.forecastr/config.yaml or export GEMINI_API_KEY',
};

/**
 * Registry that lazily initialises AI SDK providers and hands out
 * language and embedding models by model-id string.
 */
export class ProviderRegistry {
  private config: ProviderConfig;
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;
  private localProvider: ReturnType<typeof createOpenAI> | null = null;

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  /** Return a hosted LanguageModel for the given model-id, creating the provider lazily. */
  getModel(modelId: string): LanguageModel {
    switch (detectProvider(modelId)) {
      case 'anthropic':
        return this.anthropic()(modelId);
      case 'openai':
        return this.openai()(modelId);
      case 'google':
        return this.google()(modelId);
    }
  }

  /** Return a model served by the local OpenAI-compatible endpoint. */
  getLocalModel(modelId: string): LanguageModel {
    return this.local().chat(modelId);
  }

  getEmbeddingModel(modelId: string): EmbeddingModel<string> {
    switch (detectEmbeddingProvider(modelId)) {
      case 'openai':
        return this.openai().textEmbeddingModel(modelId);
      case 'google':
        return this.google().textEmbeddingModel(modelId);
      case 'anthropic':
        throw new Error('Anthropic does not offer embedding models');
    }
  }

  getLocalEmbeddingModel(modelId: string): EmbeddingModel<string> {
    return this.local().textEmbeddingModel(modelId);
  }

  private anthropic(): ReturnType<typeof createAnthropic> {
    if (!this.anthropicProvider) {
      this.anthropicProvider = createAnthropic({ apiKey: this.requireKey('anthropic') });
    }
    return this.anthropicProvider;
  }

  private openai(): ReturnType<typeof createOpenAI> {
    if (!this.openaiProvider) {
      this.openaiProvider = createOpenAI({ apiKey: this.requireKey('openai') });
    }
    return this.openaiProvider;
  }

  private google(): ReturnType<typeof createGoogleGenerativeAI> {
    if (!this.googleProvider) {
      this.googleProvider = createGoogleGenerativeAI({ apiKey: this.requireKey('google') });
    }
    return this.googleProvider;
  }

  private local(): ReturnType<typeof createOpenAI> {
    if (!this.localProvider) {
      // Ollama ignores the key but the client insists on one.
      this.localProvider = createOpenAI({
        apiKey: 'ollama',
        baseURL: this.config.local?.baseUrl ?? DEFAULT_LOCAL_BASE_URL,
      });
    }
    return this.localProvider;
  }

  private requireKey(provider: ProviderId): string {
    const apiKey = this.config.providers[provider]?.apiKey;
    if (!apiKey) throw new Error(KEY_HINTS[provider]);
    return apiKey;
  }
}
