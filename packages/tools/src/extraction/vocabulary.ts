import { loadMetricVocabulary, type MetricKind, type MetricVocabulary } from '../data.js';
import { toCrore, type NumberToken } from './numbers.js';

export interface MetricDefinition {
  name: string;
  kind: MetricKind;
  /** Normalized aliases, longest first. */
  aliases: string[];
}

export interface AliasHit {
  metric: MetricDefinition;
  start: number;
  end: number;
}

const UNIT_BY_KIND: Record<MetricKind, string> = {
  amount: 'INR_Cr',
  percent: '%',
  per_share: 'INR',
  ratio: 'x',
  count: 'count',
};

/** Rows such as `Revenue growth (%)` describe a change, not the metric. */
const DERIVED_LABEL = /\b(growth|change|yoy|qoq|cagr|guidance)\b/;

/** Lower case, punctuation to spaces, parenthesised notes dropped. */
export function normalizeLabel(label: string): string {
  return label
    .toLowerCase()
    .replace(/\([^)]*\)/g, ' ')
    .replace(/[^a-z0-9%]+/g, ' ')
    .trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lookup over the metric vocabulary: exact label matching for table cells
 * and alias search over running text.
 */
export class MetricVocabularyIndex {
  readonly metrics: readonly MetricDefinition[];
  private readonly aliasPattern: RegExp;
  private readonly byAlias = new Map<string, MetricDefinition>();
  private readonly aliasesLongestFirst: [string, MetricDefinition][];

  constructor(vocabulary: MetricVocabulary = loadMetricVocabulary()) {
    this.metrics = vocabulary.map(entry => ({
      name: entry.name,
      kind: entry.kind,
      aliases: [...new Set(entry.aliases.map(normalizeLabel))].sort((a, b) => b.length - a.length),
    }));

    for (const metric of this.metrics) {
      for (const alias of metric.aliases) {
        if (!this.byAlias.has(alias)) this.byAlias.set(alias, metric);
      }
    }

    // Longest alias first so `net profit margin` wins over `net profit`.
    this.aliasesLongestFirst = [...this.byAlias].sort((a, b) => b[0].length - a[0].length);
    const alternatives = this.aliasesLongestFirst
      .map(([alias]) => alias.split(' ').map(escapeRegExp).join(String.raw`[\s\-/&]+`));
    this.aliasPattern = new RegExp(String.raw`\b(?:${alternatives.join('|')})\b`, 'gi');
  }

  /**
   * Metric a table label refers to: the longest alias the normalized label
   * equals or starts with.
   */
  matchLabel(label: string): MetricDefinition | undefined {
    const normalized = normalizeLabel(label);
    if (!normalized || DERIVED_LABEL.test(normalized)) return undefined;
    for (const [alias, metric] of this.aliasesLongestFirst) {
      if (normalized === alias || normalized.startsWith(`${alias} `)) return metric;
    }
    return undefined;
  }

  /** Non-overlapping alias occurrences in `text`, left to right. */
  findAliases(text: string): AliasHit[] {
    const hits: AliasHit[] = [];
    for (const match of text.matchAll(this.aliasPattern)) {
      const metric = this.byAlias.get(normalizeLabel(match[0]));
      if (!metric) continue;
      const start = match.index ?? 0;
      hits.push({ metric, start, end: start + match[0].length });
    }
    return hits;
  }
}

export function unitFor(kind: MetricKind): string {
  return UNIT_BY_KIND[kind];
}

/** Whether a token can stand for a metric of this kind. */
export function acceptsToken(kind: MetricKind, token: NumberToken, inTable: boolean): boolean {
  if (kind === 'percent') return token.percent || inTable;
  if (token.percent) return false;
  if (kind === 'count' || kind === 'ratio') return !token.currency;
  return true;
}

/** Value in the metric's canonical unit. */
export function normalizeValue(kind: MetricKind, token: NumberToken): number {
  if (kind === 'amount') return toCrore(token);
  if (kind === 'count' && token.scale === 'lakh') return Math.round(token.value * 100_000);
  return token.value;
}
