import {
  FileForecastStore,
  ForecastCoordinator,
  ProviderRegistry,
  ResilientModelClient,
  createHostedBackend,
  createLocalBackend,
  type DocumentFetcher,
  type ForecastStore,
  type ModelBackend,
} from '@forecastr/core';
import {
  ManifestDocumentFetcher,
  ModelEmbedder,
  ModelOcrEngine,
  createToolHandles,
  type Embedder,
  type OcrEngine,
} from '@forecastr/tools';
import { expandTilde, type Config } from './config/index.js';

/** Collaborators a coordinator is assembled from. */
export interface RuntimeParts {
  backend: ModelBackend;
  fetcher: DocumentFetcher;
  store?: ForecastStore;
  ocr?: OcrEngine;
  embedder?: Embedder;
}

export function buildCoordinator(config: Config, parts: RuntimeParts): ForecastCoordinator {
  const client = new ResilientModelClient(parts.backend, {
    maxAttempts: config.run.max_attempts,
    baseDelayMs: config.run.base_delay_ms,
  });

  const tools = createToolHandles({
    ocr: parts.ocr,
    embedder: parts.embedder,
    settings: {
      maxWords: config.analysis.chunk_words,
      overlapSentences: config.analysis.overlap_sentences,
      similarityThreshold: config.analysis.similarity_threshold,
    },
  });

  return new ForecastCoordinator({
    tools,
    fetcher: parts.fetcher,
    client,
    defaultTicker: config.ticker,
    store: parts.store,
    runBudgetMs: config.run.budget_ms,
    concurrency: config.run.concurrency,
    synthesisAttempts: config.run.synthesis_attempts,
  });
}

export interface RuntimeOptions {
  /** Use the local model server regardless of `model.backend`. */
  local?: boolean;
  /** Keep run records in memory instead of under `output.dir`. */
  store?: ForecastStore;
}

export interface Runtime {
  coordinator: ForecastCoordinator;
  backendId: string;
  store: ForecastStore;
}

/** Wire the configured model backend, tools, manifest and store. */
export async function createRuntime(config: Config, options: RuntimeOptions = {}): Promise<Runtime> {
  const { model } = config;
  const local = options.local === true || model.backend === 'local';
  const registry = new ProviderRegistry({
    providers: {
      anthropic: { apiKey: model.providers.anthropic.api_key },
      openai: { apiKey: model.providers.openai.api_key },
      google: { apiKey: model.providers.google.api_key },
    },
    local: { baseUrl: model.local_base_url },
  });

  const settings = { temperature: model.temperature, maxOutputTokens: model.max_output_tokens };
  const backend = local
    ? createLocalBackend(registry, model.local_model, settings)
    : createHostedBackend(registry, model.model, settings);

  let embedder: Embedder | undefined;
  if (model.embedding_model) {
    const id = model.embedding_model;
    embedder = new ModelEmbedder(local ? registry.getLocalEmbeddingModel(id) : registry.getEmbeddingModel(id), id);
  }

  let ocr: OcrEngine | undefined;
  if (model.ocr_model) {
    const id = model.ocr_model;
    ocr = new ModelOcrEngine(local ? registry.getLocalModel(id) : registry.getModel(id), id, {
      maxAttempts: config.run.max_attempts,
      baseDelayMs: config.run.base_delay_ms,
    });
  }

  const fetcher = await ManifestDocumentFetcher.fromFile(expandTilde(config.documents.manifest), {
    cacheDir: expandTilde(config.documents.cache_dir),
  });
  const store = options.store ?? new FileForecastStore(expandTilde(config.output.dir));

  return {
    coordinator: buildCoordinator(config, { backend, fetcher, store, ocr, embedder }),
    backendId: backend.id,
    store,
  };
}
