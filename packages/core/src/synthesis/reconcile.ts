import type { EvidenceGap } from '../run/context.js';
import {
  clamp01,
  comparePeriods,
  formatPeriod,
  type ExtractedMetric,
  type QualitativeInsight,
} from '../types.js';
import type { Evidence, ForecastResult, MetricEntry, SynthesisDraft } from './schema.js';
import { findAnomalies, type MetricAnomaly } from './validator.js';

export interface Reconciliation {
  /** Winning metric per name plus derived margins, in name order. */
  used: ExtractedMetric[];
  metrics: Record<string, MetricEntry>;
  /** Insights by confidence, highest first. */
  insights: QualitativeInsight[];
  anomalies: MetricAnomaly[];
  confidence_scores: { metrics: number; analysis: number };
  evidence: Evidence[];
}

function compareNames(a: ExtractedMetric, b: ExtractedMetric): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Pick one metric per name: the latest period wins, a tie goes to the higher
 * confidence, and a further tie to whichever came first.
 */
export function selectMetrics(metrics: readonly ExtractedMetric[]): ExtractedMetric[] {
  const best = new Map<string, ExtractedMetric>();
  for (const m of metrics) {
    const current = best.get(m.name);
    if (!current) {
      best.set(m.name, m);
      continue;
    }
    const byPeriod = comparePeriods(m.period, current.period);
    if (byPeriod > 0 || (byPeriod === 0 && m.confidence > current.confidence)) {
      best.set(m.name, m);
    }
  }
  return [...best.values()].sort(compareNames);
}

/** Mean confidence of the metrics actually used, 0 when none. */
export function metricsConfidence(used: readonly ExtractedMetric[]): number {
  if (used.length === 0) return 0;
  return clamp01(used.reduce((sum, m) => sum + m.confidence, 0) / used.length);
}

/** Cohesion-weighted mean insight confidence, 0 when total cohesion is 0. */
export function analysisConfidence(insights: readonly QualitativeInsight[]): number {
  let weighted = 0;
  let weights = 0;
  for (const i of insights) {
    weighted += i.confidence * i.cohesion;
    weights += i.cohesion;
  }
  if (weights === 0) return 0;
  return clamp01(weighted / weights);
}

export function rankInsights(insights: readonly QualitativeInsight[]): QualitativeInsight[] {
  return insights
    .map((insight, index) => ({ insight, index }))
    .sort((a, b) => b.insight.confidence - a.insight.confidence || a.index - b.index)
    .map(({ insight }) => insight);
}

const DERIVED_MARGINS: ReadonlyArray<{ name: string; numerator: string }> = [
  { name: 'ebitda_margin', numerator: 'ebitda' },
  { name: 'operating_margin', numerator: 'operating_profit' },
];

/** Derived values sit below the weaker of their inputs. */
const DERIVED_CONFIDENCE_FACTOR = 0.9;

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/**
 * Margins the documents did not state, computed as profit line ÷ revenue
 * when both come from the same period. Stated margins are never replaced.
 */
export function deriveMargins(used: readonly ExtractedMetric[]): ExtractedMetric[] {
  const named = new Map(used.map(m => [m.name, m]));
  const revenue = named.get('revenue');
  if (!revenue || revenue.value === 0) return [];

  const derived: ExtractedMetric[] = [];
  for (const { name, numerator } of DERIVED_MARGINS) {
    const profit = named.get(numerator);
    if (named.has(name) || !profit || comparePeriods(profit.period, revenue.period) !== 0) continue;

    derived.push({
      name,
      value: round((profit.value / revenue.value) * 100, 2),
      unit: '%',
      confidence: round(Math.min(profit.confidence, revenue.confidence) * DERIVED_CONFIDENCE_FACTOR, 4),
      strategy: 'derived',
      sourceDocumentId: profit.sourceDocumentId,
      period: profit.period,
      label: `${numerator} / revenue`,
      derivedFrom: [...new Set([profit.sourceDocumentId, revenue.sourceDocumentId])],
    });
  }
  return derived;
}

export function reconcile(
  metrics: readonly ExtractedMetric[],
  insights: readonly QualitativeInsight[],
  gaps: readonly EvidenceGap[] = [],
): Reconciliation {
  const selected = selectMetrics(metrics);
  const used = [...selected, ...deriveMargins(selected)].sort(compareNames);
  const ranked = rankInsights(insights);
  const anomalies = findAnomalies(used);

  const entries: Record<string, MetricEntry> = {};
  for (const m of used) {
    entries[m.name] = {
      value: m.value,
      unit: m.unit,
      confidence: clamp01(m.confidence),
      period: formatPeriod(m.period),
      strategy: m.strategy,
      sourceDocumentId: m.sourceDocumentId,
    };
  }

  const evidence: Evidence[] = [
    ...used.map((m): Evidence => ({
      kind: 'metric',
      ref: m.name,
      sourceDocumentId: m.sourceDocumentId,
      ...(m.derivedFrom ? { derivedFrom: m.derivedFrom } : {}),
      detail: `${m.label}: ${m.value} ${m.unit} (${formatPeriod(m.period)}, ${m.strategy})`,
    })),
    ...ranked.map((i): Evidence => ({
      kind: 'insight',
      ref: i.theme,
      sourceDocumentId: i.sourceDocumentId,
      detail: i.supportingQuote,
    })),
    ...gaps.map((g): Evidence => ({
      kind: 'gap',
      ref: g.documentId ?? g.kind ?? 'run',
      ...(g.documentId !== undefined ? { sourceDocumentId: g.documentId } : {}),
      detail: g.reason,
    })),
    ...anomalies.map((a): Evidence => ({
      kind: 'anomaly',
      ref: a.field,
      sourceDocumentId: a.sourceDocumentId,
      detail: a.detail,
    })),
  ];

  return {
    used,
    metrics: entries,
    insights: ranked,
    anomalies,
    confidence_scores: {
      metrics: metricsConfidence(used),
      analysis: analysisConfidence(insights),
    },
    evidence,
  };
}

export interface ResultMeta {
  runId: string;
  ticker: string;
  generatedAt: string;
  quartersAnalyzed: string[];
  degraded: boolean;
}

/** Combine the deterministic reconciliation with the model's qualitative draft. */
export function assembleResult(
  reconciliation: Reconciliation,
  draft: SynthesisDraft,
  meta: ResultMeta,
): ForecastResult {
  return {
    runId: meta.runId,
    ticker: meta.ticker,
    generatedAt: meta.generatedAt,
    quartersAnalyzed: meta.quartersAnalyzed,
    status: meta.degraded ? 'degraded' : 'complete',
    metrics: reconciliation.metrics,
    qualitative: {
      outlook: draft.outlook,
      sentiment: {
        score: draft.sentiment.score,
        label: sentimentLabel(draft.sentiment.label, draft.sentiment.score),
      },
      key_themes: draft.key_themes,
      projections: draft.projections,
      risks: draft.risks,
      opportunities: draft.opportunities,
    },
    confidence_scores: reconciliation.confidence_scores,
    evidence: reconciliation.evidence,
  };
}

const LABEL_THRESHOLD = 0.15;

/** Normalise the model's label; fall back to the score when it is not one we know. */
export function sentimentLabel(label: string, score: number): 'positive' | 'neutral' | 'negative' {
  const normalized = label.trim().toLowerCase();
  if (normalized === 'positive' || normalized === 'neutral' || normalized === 'negative') {
    return normalized;
  }
  if (score > LABEL_THRESHOLD) return 'positive';
  if (score < -LABEL_THRESHOLD) return 'negative';
  return 'neutral';
}
