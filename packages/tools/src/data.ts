import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Vocabularies shipped as JSON under `packages/tools/data/`.
 * Each file is read and validated once, on first use.
 */

const DATA_DIR = new URL('../data/', import.meta.url);

export const MetricKindSchema = z.enum(['amount', 'percent', 'per_share', 'ratio', 'count']);
export type MetricKind = z.infer<typeof MetricKindSchema>;

const MetricVocabularySchema = z.object({
  metrics: z.array(z.object({
    name: z.string().min(1),
    kind: MetricKindSchema,
    aliases: z.array(z.string().min(1)).min(1),
  })).min(1),
});

const LexiconSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
});

const StopwordsSchema = z.object({
  stopwords: z.array(z.string()),
});

const ThemesSchema = z.object({
  themes: z.array(z.object({
    theme: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
  })),
});

export type MetricVocabulary = z.infer<typeof MetricVocabularySchema>['metrics'];
export type ThemeVocabulary = z.infer<typeof ThemesSchema>['themes'];

export interface Lexicon {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
}

function readData<T>(file: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(new URL(file, DATA_DIR), 'utf-8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${file}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }
  return parsed.data;
}

function once<T>(load: () => T): () => T {
  let cached: { value: T } | undefined;
  return () => {
    cached ??= { value: load() };
    return cached.value;
  };
}

export const loadMetricVocabulary = once(() => readData('metrics.json', MetricVocabularySchema).metrics);

export const loadLexicon = once((): Lexicon => {
  const data = readData('lexicon.json', LexiconSchema);
  return { positive: new Set(data.positive), negative: new Set(data.negative) };
});

export const loadStopwords = once((): ReadonlySet<string> => new Set(readData('stopwords.json', StopwordsSchema).stopwords));

export const loadThemeVocabulary = once(() => readData('themes.json', ThemesSchema).themes);
