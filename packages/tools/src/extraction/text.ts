import { isMarkedAmount, scanNumbers, type NumberToken } from './numbers.js';
import { stripHtml, type MetricCandidate } from './tables.js';
import type { MetricKind } from '../data.js';
import { acceptsToken, normalizeValue, unitFor, type MetricVocabularyIndex } from './vocabulary.js';

export const TEXT_CEILING = 0.75;
/** How far past a label the value may appear, in characters. */
export const TEXT_WINDOW = 120;

/** One line of prose with table rules, markup and emphasis removed. */
export function linearize(text: string): string {
  return stripHtml(text)
    .replace(/^\s*#+\s*/gm, '')
    .replace(/[|*_`]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Value for a metric among the tokens of its window. Amounts and per-share
 * values prefer a token carrying a currency or scale.
 */
function pickToken(kind: MetricKind, tokens: readonly NumberToken[]): NumberToken | undefined {
  const accepted = tokens.filter(t => acceptsToken(kind, t, false));
  if (kind === 'amount' || kind === 'per_share') {
    return accepted.find(isMarkedAmount) ?? accepted[0];
  }
  return accepted[0];
}

/**
 * `<label> … <number>` matches over running text. The search window ends
 * at the next metric label so one value is never claimed by two labels.
 */
export function extractFromText(text: string, vocabulary: MetricVocabularyIndex): MetricCandidate[] {
  const linear = linearize(text);
  const hits = vocabulary.findAliases(linear);
  const candidates: MetricCandidate[] = [];

  hits.forEach((hit, i) => {
    const next = hits[i + 1];
    const windowEnd = Math.min(hit.end + TEXT_WINDOW, next?.start ?? linear.length, linear.length);
    const token = pickToken(hit.metric.kind, scanNumbers(linear.slice(hit.end, windowEnd)));
    if (!token) return;

    candidates.push({
      name: hit.metric.name,
      value: normalizeValue(hit.metric.kind, token),
      unit: unitFor(hit.metric.kind),
      label: linear.slice(hit.start, hit.end),
      confidence: TEXT_CEILING,
    });
  });

  return candidates;
}
