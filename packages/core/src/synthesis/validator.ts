import { formatZodIssues } from '../errors.js';
import type { ExtractedMetric } from '../types.js';
import { ForecastResultSchema, type ForecastResult } from './schema.js';

// ---------------------------------------------------------------------------
// Sane bounds
// ---------------------------------------------------------------------------

export interface MetricAnomaly {
  field: string;
  value: number;
  sourceDocumentId: string;
  detail: string;
}

const NON_NEGATIVE = new Set(['revenue', 'headcount', 'debt_to_equity']);

/**
 * Flag values outside sane bounds. Flagged metrics stay in the result; the
 * anomaly becomes an evidence entry next to them.
 */
export function findAnomalies(metrics: readonly ExtractedMetric[]): MetricAnomaly[] {
  const anomalies: MetricAnomaly[] = [];
  for (const m of metrics) {
    if (m.unit === '%' && Math.abs(m.value) > 100) {
      anomalies.push({
        field: m.name,
        value: m.value,
        sourceDocumentId: m.sourceDocumentId,
        detail: `${m.name} = ${m.value}% is outside [-100%, 100%]`,
      });
    } else if (NON_NEGATIVE.has(m.name) && m.value < 0) {
      anomalies.push({
        field: m.name,
        value: m.value,
        sourceDocumentId: m.sourceDocumentId,
        detail: `${m.name} = ${m.value} ${m.unit} should not be negative`,
      });
    }
  }
  return anomalies;
}

// ---------------------------------------------------------------------------
// Result validation
// ---------------------------------------------------------------------------

export interface ValidationOptions {
  /** Every document id the run gathered. */
  knownDocumentIds: ReadonlySet<string>;
  /** Whether the run produced insights, in which case themes are required. */
  requireThemes: boolean;
}

export type ValidationOutcome =
  | { ok: true; result: ForecastResult }
  | { ok: false; issues: string[] };

/**
 * Check a candidate against the result schema and its citation integrity.
 * On success the returned result is deeply frozen.
 */
export function validateForecast(candidate: unknown, options: ValidationOptions): ValidationOutcome {
  const parsed = ForecastResultSchema.safeParse(candidate);
  if (!parsed.success) {
    return { ok: false, issues: formatZodIssues(parsed.error.issues) };
  }

  const result = parsed.data;
  const issues = citationIssues(result, options);
  if (issues.length > 0) return { ok: false, issues };

  return { ok: true, result: deepFreeze(result) };
}

function citationIssues(result: ForecastResult, options: ValidationOptions): string[] {
  const { knownDocumentIds: known } = options;
  const issues: string[] = [];

  const checkSources = (path: string, sources: readonly string[]) => {
    for (const id of sources) {
      if (!known.has(id)) issues.push(`${path}.sources: unknown document "${id}"`);
    }
  };

  const metricEvidence = new Set<string>();
  const citedByEvidence = new Set<string>();
  for (const [index, e] of result.evidence.entries()) {
    for (const id of e.derivedFrom ?? []) {
      if (!known.has(id)) issues.push(`evidence.${index}.derivedFrom: unknown document "${id}"`);
    }
    if (e.sourceDocumentId === undefined) continue;
    if (!known.has(e.sourceDocumentId)) {
      issues.push(`evidence.${index}.sourceDocumentId: unknown document "${e.sourceDocumentId}"`);
      continue;
    }
    if (e.kind === 'metric') metricEvidence.add(e.ref);
    if (e.kind === 'metric' || e.kind === 'insight') citedByEvidence.add(e.sourceDocumentId);
  }

  for (const [name, metric] of Object.entries(result.metrics)) {
    if (!known.has(metric.sourceDocumentId)) {
      issues.push(`metrics.${name}.sourceDocumentId: unknown document "${metric.sourceDocumentId}"`);
    }
    if (!metricEvidence.has(name)) {
      issues.push(`metrics.${name}: no evidence entry`);
    }
  }

  const q = result.qualitative;
  if (options.requireThemes && q.key_themes.length === 0) {
    issues.push('qualitative.key_themes: expected at least one theme');
  }
  q.key_themes.forEach((t, i) => {
    const path = `qualitative.key_themes.${i}`;
    checkSources(path, t.sources);
    if (!t.sources.some(id => citedByEvidence.has(id))) {
      issues.push(`${path}: no evidence entry for any cited document`);
    }
  });
  q.projections.forEach((p, i) => checkSources(`qualitative.projections.${i}`, p.sources));
  q.risks.forEach((r, i) => checkSources(`qualitative.risks.${i}`, r.sources));
  q.opportunities.forEach((o, i) => checkSources(`qualitative.opportunities.${i}`, o.sources));

  return issues;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
