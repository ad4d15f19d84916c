import { describe, it, expect, vi } from 'vitest';
import { ForecastCoordinator, quartersOf, type StateChangeEvent } from './coordinator.js';
import { ResilientModelClient } from '../router/model-client.js';
import type { CompletionOptions, ModelBackend } from '../router/llm.js';
import { MemoryForecastStore, type ForecastStore } from '../output/store.js';
import {
  InputInvalidError,
  RateLimitedError,
  SynthesisFailedError,
  TimeoutExceededError,
  ValidationFailedError,
} from '../errors.js';
import type {
  AnalysisTool,
  DocumentFetcher,
  DocumentKind,
  ExtractedMetric,
  ExtractionTool,
  FetchOutcome,
  FetchQuery,
  QualitativeInsight,
  SourceDocument,
} from '../types.js';

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

function doc(id: string, kind: DocumentKind, sourceId: string, quarter: 1 | 2 | 3 | 4, format: SourceDocument['format'] = 'text'): SourceDocument {
  return {
    id,
    kind,
    sourceId,
    period: { fiscalYear: 2025, quarter },
    format,
    content: format === 'image' ? { images: [new Uint8Array([1, 2, 3])] } : { text: `${id} body` },
  };
}

class MapFetcher implements DocumentFetcher {
  readonly queries: FetchQuery[] = [];

  constructor(private readonly docs: Record<string, SourceDocument>) {}

  async fetch(query: FetchQuery): Promise<FetchOutcome> {
    this.queries.push(query);
    const found = this.docs[`${query.sourceId}:${query.kind}:${query.quarterOffset}`];
    return found ? { status: 'ok', document: found } : { status: 'unavailable', reason: 'not published' };
  }
}

class ScriptedBackend implements ModelBackend {
  readonly id = 'scripted';
  readonly locality = 'hosted' as const;
  readonly prompts: string[] = [];

  constructor(private readonly script: Array<string | Error>, private readonly fallback?: string | Error) {}

  async complete(prompt: string, _options?: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    const next = this.script.shift() ?? this.fallback;
    if (next === undefined) throw new Error('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

function metric(name: string, value: number, unit: string, confidence: number, source: SourceDocument): ExtractedMetric {
  return {
    name,
    value,
    unit,
    confidence,
    strategy: 'table',
    sourceDocumentId: source.id,
    period: source.period,
    label: name.replace('_', ' '),
  };
}

function insight(theme: string, sentiment: number, confidence: number, cohesion: number, source: SourceDocument): QualitativeInsight {
  return {
    theme,
    sentiment,
    supportingQuote: `We see ${theme} improving.`,
    confidence,
    cohesion,
    chunkCount: 3,
    sourceDocumentId: source.id,
  };
}

function fakeExtractor(byDoc: Record<string, ExtractedMetric[]>): ExtractionTool & { calls: string[] } {
  const calls: string[] = [];
  return {
    kind: 'extract',
    name: 'fake-extractor',
    calls,
    async extract(document) {
      calls.push(document.id);
      return byDoc[document.id] ?? [];
    },
  };
}

function fakeAnalyzer(byDoc: Record<string, QualitativeInsight[]>): AnalysisTool {
  return {
    kind: 'analyze',
    name: 'fake-analyzer',
    async analyze(document) {
      return byDoc[document.id] ?? [];
    },
  };
}

function draftJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    outlook: 'Demand is steady with a healthy deal pipeline.',
    sentiment: { score: 0.3, label: 'positive' },
    key_themes: [{
      theme: 'Deal pipeline',
      summary: 'Large deal wins continue.',
      sentiment: 0.5,
      confidence: 0.6,
      sources: ['t-q4'],
    }],
    projections: [{ metric: 'revenue', direction: 'up', rationale: 'Order book growth.', sources: ['r-q4'] }],
    risks: [{ description: 'Attrition pressure', sources: ['t-q3'] }],
    opportunities: [],
    ...overrides,
  });
}

// Three reports from screener, two transcripts from company-ir, one of them image-only.
const R_Q4 = doc('r-q4', 'report', 'screener', 4);
const R_Q3 = doc('r-q3', 'report', 'screener', 3);
const R_Q2 = doc('r-q2', 'report', 'screener', 2);
const T_Q4 = doc('t-q4', 'transcript', 'company-ir', 4);
const T_Q3 = doc('t-q3', 'transcript', 'company-ir', 3, 'image');

const FULL_SET: Record<string, SourceDocument> = {
  'screener:report:0': R_Q4,
  'screener:report:1': R_Q3,
  'screener:report:2': R_Q2,
  'company-ir:transcript:0': T_Q4,
  'company-ir:transcript:1': T_Q3,
};

const METRICS: Record<string, ExtractedMetric[]> = {
  'r-q4': [metric('revenue', 64259, 'INR_Cr', 0.95, R_Q4)],
  'r-q3': [metric('revenue', 63973, 'INR_Cr', 0.95, R_Q3), metric('operating_margin', 24.5, '%', 0.75, R_Q3)],
  'r-q2': [metric('net_profit', 12040, 'INR_Cr', 0.85, R_Q2)],
};

const INSIGHTS: Record<string, QualitativeInsight[]> = {
  't-q4': [insight('deal pipeline', 0.5, 0.6, 0.8, T_Q4)],
  't-q3': [insight('attrition', -0.2, 0.4, 0.5, T_Q3)],
};

const REQUEST = { quarters: 3, sources: ['screener', 'company-ir'] };

interface Setup {
  backend: ScriptedBackend;
  docs?: Record<string, SourceDocument>;
  fetcher?: DocumentFetcher;
  metrics?: Record<string, ExtractedMetric[]>;
  insights?: Record<string, QualitativeInsight[]>;
  store?: ForecastStore;
  runBudgetMs?: number;
}

function setup(options: Setup) {
  const delays: number[] = [];
  const client = new ResilientModelClient(options.backend, {
    sleep: async (ms: number) => { delays.push(ms); },
  });
  const fetcher = options.fetcher ?? new MapFetcher(options.docs ?? FULL_SET);
  const extractor = fakeExtractor(options.metrics ?? METRICS);
  const store = options.store ?? new MemoryForecastStore();
  const coordinator = new ForecastCoordinator({
    tools: { extractor, analyzer: fakeAnalyzer(options.insights ?? INSIGHTS) },
    fetcher,
    client,
    store,
    defaultTicker: 'TCS',
    runBudgetMs: options.runBudgetMs,
  });

  const states: StateChangeEvent[] = [];
  coordinator.on('state:change', e => states.push(e));
  const synthesisOutcomes: string[] = [];
  coordinator.on('synthesis:attempt', e => synthesisOutcomes.push(e.outcome));

  return { coordinator, delays, extractor, fetcher, store, states, synthesisOutcomes };
}

function storedRecord(store: ForecastStore) {
  if (!(store instanceof MemoryForecastStore)) throw new Error('expected memory store');
  const [record] = [...store.runs.values()];
  if (!record) throw new Error('nothing stored');
  return record;
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

describe('ForecastCoordinator', () => {
  it('produces a complete forecast from reports and transcripts', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const { coordinator, states, store } = setup({ backend });

    const result = await coordinator.run(REQUEST);

    expect(states.map(s => s.to)).toEqual(['gathering', 'extracting', 'analyzing', 'synthesizing', 'validating', 'done']);
    expect(result.status).toBe('complete');
    expect(result.ticker).toBe('TCS');
    expect(result.quartersAnalyzed).toEqual(['FY2025-Q4', 'FY2025-Q3', 'FY2025-Q2']);
    expect(Object.keys(result.metrics)).toEqual(['net_profit', 'operating_margin', 'revenue']);
    expect(result.metrics['revenue']).toEqual({
      value: 64259,
      unit: 'INR_Cr',
      confidence: 0.95,
      period: 'FY2025-Q4',
      strategy: 'table',
      sourceDocumentId: 'r-q4',
    });
    expect(result.qualitative.key_themes).toHaveLength(1);
    expect(result.confidence_scores.metrics).toBeCloseTo((0.85 + 0.75 + 0.95) / 3, 10);
    expect(result.confidence_scores.analysis).toBeCloseTo((0.6 * 0.8 + 0.4 * 0.5) / 1.3, 10);
    expect(Object.isFrozen(result)).toBe(true);

    const stored = storedRecord(store);
    expect(stored.status).toBe('done');
    expect(stored.runId).toBe(result.runId);
  });

  it('cites every metric and theme in evidence', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const { coordinator } = setup({ backend });

    const result = await coordinator.run(REQUEST);

    for (const name of Object.keys(result.metrics)) {
      expect(result.evidence.some(e => e.kind === 'metric' && e.ref === name)).toBe(true);
    }
    for (const theme of result.qualitative.key_themes) {
      expect(theme.sources.length).toBeGreaterThan(0);
    }
    expect(result.evidence.map(e => e.kind)).toEqual(['metric', 'metric', 'metric', 'insight', 'insight']);
  });

  it('queries every source, kind and quarter offset', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const fetcher = new MapFetcher(FULL_SET);
    const { coordinator } = setup({ backend, fetcher });

    await coordinator.run(REQUEST);

    expect(fetcher.queries).toHaveLength(2 * 2 * 3);
    expect(fetcher.queries.every(q => q.ticker === 'TCS')).toBe(true);
  });

  it('fails with RateLimited after exactly three attempts', async () => {
    const backend = new ScriptedBackend([], new Error('429 Too Many Requests'));
    const { coordinator, delays, store } = setup({ backend });
    const retries: number[] = [];
    coordinator.on('model:retry', e => retries.push(e.delayMs));
    const errors: string[] = [];
    coordinator.on('run:error', e => errors.push(e.state));

    const err = await coordinator.run(REQUEST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({ kind: 'RateLimited', attempts: 3, state: 'synthesizing' });
    expect(backend.prompts).toHaveLength(3);
    expect(delays).toEqual([5000, 10000]);
    expect(retries).toEqual([5000, 10000]);
    expect(errors).toEqual(['synthesizing']);

    const stored = storedRecord(store);
    expect(stored.status).toBe('failed');
    expect(stored.trace.filter(e => e.type === 'model')).toHaveLength(3);
    expect(stored.trace.at(-1)).toMatchObject({ type: 'transition', from: 'synthesizing', to: 'failed' });
  });

  it('recovers from malformed synthesis output on the third attempt', async () => {
    const backend = new ScriptedBackend(['not json at all', '{"outlook": "missing fields"}', draftJson()]);
    const { coordinator, synthesisOutcomes, store } = setup({ backend });

    const result = await coordinator.run(REQUEST);

    expect(result.qualitative.outlook).toBe('Demand is steady with a healthy deal pipeline.');
    expect(synthesisOutcomes).toEqual(['malformed', 'malformed', 'parsed']);
    const synthesisEntries = storedRecord(store).trace.filter(e => e.type === 'synthesis');
    expect(synthesisEntries).toHaveLength(3);
    expect(backend.prompts[1]).toContain('Your previous response could not be used.');
    expect(backend.prompts[1]).toContain('not json at all');
  });

  it('fails with SynthesisFailed when output never parses', async () => {
    const backend = new ScriptedBackend([], '```\nstill not json\n```');
    const { coordinator } = setup({ backend });

    const err = await coordinator.run(REQUEST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SynthesisFailedError);
    expect(err).toMatchObject({ attempts: 3, state: 'synthesizing' });
    expect(backend.prompts).toHaveLength(3);
  });

  it('runs one corrective round after a validation failure', async () => {
    const uncited = draftJson({
      key_themes: [{ theme: 'Ghost', summary: 'Made up.', sentiment: 0, confidence: 0.5, sources: ['ghost'] }],
    });
    const backend = new ScriptedBackend([uncited, draftJson()]);
    const { coordinator, states } = setup({ backend });

    const result = await coordinator.run(REQUEST);

    expect(result.qualitative.key_themes[0]?.theme).toBe('Deal pipeline');
    expect(states.map(s => s.to).slice(-4)).toEqual(['validating', 'synthesizing', 'validating', 'done']);
    expect(backend.prompts[1]).toContain('failed validation');
    expect(backend.prompts[1]).toContain('qualitative.key_themes.0.sources: unknown document "ghost"');
  });

  it('fails with ValidationFailed after the corrective round also fails', async () => {
    const uncited = draftJson({ risks: [{ description: 'Uncited', sources: [] }] });
    const backend = new ScriptedBackend([], uncited);
    const { coordinator } = setup({ backend });

    const err = await coordinator.run(REQUEST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationFailedError);
    expect(err).toMatchObject({ attempts: 2, state: 'validating' });
    expect(err instanceof ValidationFailedError ? err.issues : []).toEqual([
      'qualitative.risks.0.sources: must cite at least one document',
    ]);
    expect(backend.prompts).toHaveLength(2);
  });

  it('continues in degraded mode when a document kind is missing', async () => {
    const backend = new ScriptedBackend([draftJson({ key_themes: [], risks: [] })]);
    const docs = { 'screener:report:0': R_Q4 };
    const gaps: string[] = [];
    const { coordinator, states } = setup({ backend, docs });
    coordinator.on('document:gap', e => gaps.push(e.gap.reason));

    const result = await coordinator.run(REQUEST);

    expect(result.status).toBe('degraded');
    expect(states.map(s => s.to)).toEqual(['gathering', 'degraded', 'extracting', 'analyzing', 'synthesizing', 'validating', 'done']);
    expect(gaps).toEqual(['no transcript documents available from screener, company-ir']);
    expect(result.evidence.find(e => e.kind === 'gap')).toEqual({
      kind: 'gap',
      ref: 'transcript',
      detail: 'no transcript documents available from screener, company-ir',
    });
  });

  it('records an extraction gap for a report that yields nothing', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const metrics = { 'r-q4': METRICS['r-q4'] ?? [], 'r-q3': METRICS['r-q3'] ?? [] };
    const { coordinator, states } = setup({ backend, metrics });

    const result = await coordinator.run(REQUEST);

    expect(result.status).toBe('degraded');
    expect(states.map(s => s.to)).toContain('degraded');
    expect(result.evidence.filter(e => e.kind === 'gap')).toEqual([{
      kind: 'gap',
      ref: 'r-q2',
      sourceDocumentId: 'r-q2',
      detail: 'no metrics extracted by any strategy',
    }]);
  });

  it('flags out-of-range metrics as anomalies and keeps them', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const metrics = { ...METRICS, 'r-q2': [metric('attrition_rate', 140, '%', 0.85, R_Q2)] };
    const { coordinator } = setup({ backend, metrics });

    const result = await coordinator.run(REQUEST);

    expect(result.metrics['attrition_rate']?.value).toBe(140);
    expect(result.evidence.at(-1)).toEqual({
      kind: 'anomaly',
      ref: 'attrition_rate',
      sourceDocumentId: 'r-q2',
      detail: 'attrition_rate = 140% is outside [-100%, 100%]',
    });
  });

  it('extracts a document returned by two sources only once', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const docs = { ...FULL_SET, 'company-ir:report:0': R_Q4 };
    const { coordinator, extractor } = setup({ backend, docs });

    await coordinator.run(REQUEST);

    expect(extractor.calls.filter(id => id === 'r-q4')).toHaveLength(1);
  });

  it('fails with TimeoutExceeded when the budget runs out', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const hangingFetcher: DocumentFetcher = {
      fetch: (query) => new Promise<FetchOutcome>((_resolve, reject) => {
        query.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
    };
    const { coordinator, store } = setup({ backend, fetcher: hangingFetcher, runBudgetMs: 20 });

    const err = await coordinator.run(REQUEST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutExceededError);
    expect(err).toMatchObject({ kind: 'TimeoutExceeded', state: 'gathering' });
    expect(storedRecord(store).status).toBe('failed');
    expect(backend.prompts).toEqual([]);
  });

  it('rejects a malformed request before any transition', async () => {
    const backend = new ScriptedBackend([]);
    const { coordinator, states, store } = setup({ backend });

    const err = await coordinator.run({ quarters: 0, sources: [] }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InputInvalidError);
    expect(states).toEqual([]);
    expect(store instanceof MemoryForecastStore ? store.runs.size : -1).toBe(0);
  });

  it('returns the result even when the store fails', async () => {
    const backend = new ScriptedBackend([draftJson()]);
    const store: ForecastStore = {
      save: vi.fn().mockRejectedValue(new Error('disk full')),
      saveFailure: vi.fn().mockResolvedValue(undefined),
      get: vi.fn().mockResolvedValue(undefined),
    };
    const { coordinator } = setup({ backend, store });
    const storeErrors: string[] = [];
    coordinator.on('store:error', e => storeErrors.push(e.error.message));

    const result = await coordinator.run(REQUEST);

    expect(result.status).toBe('complete');
    expect(storeErrors).toEqual(['disk full']);
  });

  it('keeps runs independent of each other', async () => {
    const backend = new ScriptedBackend([draftJson(), draftJson()]);
    const { coordinator } = setup({ backend });

    const [a, b] = await Promise.all([coordinator.run(REQUEST), coordinator.run(REQUEST)]);

    expect(a.runId).not.toBe(b.runId);
    expect(a.evidence).toEqual(b.evidence);
  });
});

describe('quartersOf', () => {
  it('lists distinct periods newest first', () => {
    expect(quartersOf([R_Q3, T_Q4, R_Q4, R_Q2])).toEqual(['FY2025-Q4', 'FY2025-Q3', 'FY2025-Q2']);
  });
});
