import { clamp01, clampUnit } from '@forecastr/core';
import { loadLexicon, loadThemeVocabulary, type Lexicon, type ThemeVocabulary } from '../data.js';
import type { TranscriptChunk } from './chunker.js';
import type { ChunkCluster } from './cluster.js';
import { cosine } from './embedder.js';
import { contentWords, tokenize } from './tokens.js';

export const MAX_QUOTE_LENGTH = 280;

export interface ClusterScore {
  theme: string;
  sentiment: number;
  supportingQuote: string;
  cohesion: number;
  confidence: number;
  chunkCount: number;
  /** Index of the earliest member chunk, for stable ordering. */
  firstChunk: number;
}

export interface ScoringResources {
  lexicon: Lexicon;
  themes: ThemeVocabulary;
}

export function defaultScoringResources(): ScoringResources {
  return { lexicon: loadLexicon(), themes: loadThemeVocabulary() };
}

/** `(pos − neg) / (pos + neg)` over lexicon hits; 0 with no hits. */
export function lexiconPolarity(text: string, lexicon: Lexicon): number {
  let positive = 0;
  let negative = 0;
  for (const token of tokenize(text)) {
    if (lexicon.positive.has(token)) positive++;
    else if (lexicon.negative.has(token)) negative++;
  }
  const total = positive + negative;
  return total === 0 ? 0 : (positive - negative) / total;
}

/** 1 − e^(−n/3): one chunk is weak support, a handful is strong. */
export function support(chunkCount: number): number {
  return 1 - Math.exp(-chunkCount / 3);
}

export function trimQuote(sentence: string, max = MAX_QUOTE_LENGTH): string {
  if (sentence.length <= max) return sentence;
  return `${sentence.slice(0, max - 1).trimEnd()}…`;
}

/**
 * Theme label and the words that earned it: the theme vocabulary entry
 * with the most hits, else the two most frequent content words.
 */
export function labelTheme(texts: readonly string[], themes: ThemeVocabulary): { theme: string; keywords: string[] } {
  const words = texts.flatMap(contentWords);

  let best: { theme: string; keywords: string[]; hits: number } | undefined;
  for (const entry of themes) {
    const keywords = new Set(entry.keywords);
    const hits = words.filter(w => keywords.has(w)).length;
    if (hits > 0 && (!best || hits > best.hits)) best = { theme: entry.theme, keywords: entry.keywords, hits };
  }
  if (best) return { theme: best.theme, keywords: best.keywords };

  const counts = new Map<string, number>();
  for (const word of words) counts.set(word, (counts.get(word) ?? 0) + 1);
  // Map iteration keeps first-appearance order, and sort is stable.
  const top = [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, 2).map(([word]) => word);
  if (top.length === 0) return { theme: 'General', keywords: [] };
  const label = top.join(' ');
  return { theme: label.charAt(0).toUpperCase() + label.slice(1), keywords: top };
}

function pickQuote(chunk: TranscriptChunk, keywords: readonly string[]): string {
  const wanted = new Set(keywords);
  let best = chunk.sentences[0] ?? chunk.text;
  let bestHits = -1;
  for (const sentence of chunk.sentences) {
    const hits = contentWords(sentence).filter(w => wanted.has(w)).length;
    if (hits > bestHits) {
      best = sentence;
      bestHits = hits;
    }
  }
  return trimQuote(best);
}

export function scoreCluster(
  cluster: ChunkCluster,
  chunks: readonly TranscriptChunk[],
  embeddings: readonly number[][],
  resources: ScoringResources = defaultScoringResources(),
): ClusterScore {
  const members = cluster.members.flatMap(i => {
    const chunk = chunks[i];
    return chunk ? [{ chunk, vector: embeddings[i] ?? [] }] : [];
  });
  if (members.length === 0) throw new Error('Cannot score an empty cluster');

  const similarities = members.map(m => cosine(m.vector, cluster.centroid));
  const cohesion = clamp01(similarities.reduce((a, b) => a + b, 0) / members.length);

  let closest = 0;
  similarities.forEach((s, i) => {
    if (s > (similarities[closest] ?? -Infinity)) closest = i;
  });

  const sentiment = clampUnit(
    members.reduce((sum, m) => sum + lexiconPolarity(m.chunk.text, resources.lexicon), 0) / members.length,
  );
  const { theme, keywords } = labelTheme(members.map(m => m.chunk.text), resources.themes);
  const representative = members[closest] ?? members[0];

  return {
    theme,
    sentiment,
    supportingQuote: representative ? pickQuote(representative.chunk, keywords) : '',
    cohesion,
    confidence: clamp01(cohesion * support(members.length)),
    chunkCount: members.length,
    firstChunk: Math.min(...cluster.members),
  };
}
