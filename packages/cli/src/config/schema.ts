import { z } from 'zod';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const apiKeySchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const providerConfigSchema = z.object({
  api_key: apiKeySchema.optional(),
}).strict();

const providersSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const modelSchema = z.object({
  backend: z.enum(['hosted', 'local']).optional(),
  model: z.string().min(1).optional(),
  local_model: z.string().min(1).optional(),
  local_base_url: z.string().url().optional(),
  embedding_model: z.string().min(1).optional(),
  ocr_model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_output_tokens: z.number().int().positive().optional(),
  providers: providersSchema.optional(),
}).strict();

const runSchema = z.object({
  budget_ms: z.number().int().positive().optional(),
  max_attempts: z.number().int().min(1).max(10).optional(),
  base_delay_ms: z.number().int().min(0).optional(),
  synthesis_attempts: z.number().int().min(1).max(10).optional(),
  concurrency: z.number().int().min(1).max(32).optional(),
}).strict();

const analysisSchema = z.object({
  similarity_threshold: z.number().min(0).max(1).optional(),
  chunk_words: z.number().int().min(10).optional(),
  overlap_sentences: z.number().int().min(0).max(5).optional(),
}).strict();

const documentsSchema = z.object({
  manifest: z.string().min(1).optional(),
  cache_dir: z.string().min(1).optional(),
}).strict();

const outputSchema = z.object({
  dir: z.string().min(1).optional(),
}).strict();

const ConfigSchema = z.object({
  ticker: z.string().min(1).max(16).optional(),
  model: modelSchema.optional(),
  run: runSchema.optional(),
  analysis: analysisSchema.optional(),
  documents: documentsSchema.optional(),
  output: outputSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type ProviderId = 'anthropic' | 'openai' | 'google';
export type BackendKind = 'hosted' | 'local';

export interface ResolvedProviderConfig {
  api_key?: string;
}

export interface Config {
  ticker: string;
  model: {
    backend: BackendKind;
    model: string;
    local_model: string;
    local_base_url: string;
    /** Without one the local hashing embedder is used. */
    embedding_model?: string;
    /** Vision model for scanned documents. Without one they yield nothing. */
    ocr_model?: string;
    temperature: number;
    max_output_tokens: number;
    providers: Record<ProviderId, ResolvedProviderConfig>;
  };
  run: {
    budget_ms: number;
    max_attempts: number;
    base_delay_ms: number;
    synthesis_attempts: number;
    concurrency: number;
  };
  analysis: {
    similarity_threshold: number;
    chunk_words: number;
    overlap_sentences: number;
  };
  documents: {
    manifest: string;
    cache_dir: string;
  };
  output: {
    dir: string;
  };
}

export const ConfigDefaults: Config = {
  ticker: 'TCS',
  model: {
    backend: 'hosted',
    model: 'claude-sonnet-4-20250514',
    local_model: 'llama3.1',
    local_base_url: 'http://localhost:11434/v1',
    temperature: 0.2,
    max_output_tokens: 4096,
    providers: {
      anthropic: {},
      openai: {},
      google: {},
    },
  },
  run: {
    budget_ms: 300_000,
    max_attempts: 3,
    base_delay_ms: 5000,
    synthesis_attempts: 3,
    concurrency: 4,
  },
  analysis: {
    similarity_threshold: 0.35,
    chunk_words: 120,
    overlap_sentences: 1,
  },
  documents: {
    manifest: '~/.forecastr/documents.yaml',
    cache_dir: '~/.forecastr/cache',
  },
  output: {
    dir: '~/.forecastr/runs',
  },
};

export { ConfigSchema };
