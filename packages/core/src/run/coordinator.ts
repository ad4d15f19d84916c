import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import { ForecastError, TimeoutExceededError, ValidationFailedError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { ResilientModelClient } from '../router/model-client.js';
import { AbortError, TimeoutError, withTimeout } from '../router/retry.js';
import type { ForecastStore } from '../output/store.js';
import { buildSynthesisPrompt, withValidationFeedback } from '../synthesis/prompts.js';
import { assembleResult, reconcile } from '../synthesis/reconcile.js';
import type { ForecastResult } from '../synthesis/schema.js';
import { DEFAULT_SYNTHESIS_ATTEMPTS, Synthesizer } from '../synthesis/synthesizer.js';
import { validateForecast } from '../synthesis/validator.js';
import {
  comparePeriods,
  DOCUMENT_KINDS,
  formatPeriod,
  type DocumentFetcher,
  type DocumentKind,
  type FetchOutcome,
  type FetchQuery,
  type SourceDocument,
  type ToolHandles,
} from '../types.js';
import { mapLimited } from './concurrency.js';
import { RunContext, type EvidenceGap, type TraceEntry } from './context.js';
import { parseRunRequest } from './request.js';
import { isTerminal, type RunState } from './states.js';

const log = getLogger('coordinator');

export const DEFAULT_RUN_BUDGET_MS = 300_000;
export const DEFAULT_CONCURRENCY = 4;
/** Validation failures get one corrective synthesis round. */
const MAX_SYNTHESIS_ROUNDS = 2;

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface StateChangeEvent {
  runId: string;
  from: RunState;
  to: RunState;
  trigger: string;
}

export interface DocumentGapEvent {
  runId: string;
  gap: EvidenceGap;
}

export interface ModelRetryEvent {
  runId: string;
  step: string;
  attempt: number;
  delayMs: number;
  category?: string;
}

export interface SynthesisAttemptEvent {
  runId: string;
  round: number;
  attempt: number;
  outcome: 'parsed' | 'malformed';
}

export interface RunCompleteEvent {
  runId: string;
  result: ForecastResult;
  durationMs: number;
}

export interface RunErrorEvent {
  runId: string;
  error: Error;
  state: RunState;
}

export interface StoreErrorEvent {
  runId: string;
  error: Error;
}

export interface CoordinatorEvents {
  'state:change': (event: StateChangeEvent) => void;
  'document:gap': (event: DocumentGapEvent) => void;
  'model:retry': (event: ModelRetryEvent) => void;
  'synthesis:attempt': (event: SynthesisAttemptEvent) => void;
  'run:complete': (event: RunCompleteEvent) => void;
  'run:error': (event: RunErrorEvent) => void;
  'store:error': (event: StoreErrorEvent) => void;
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export interface CoordinatorOptions {
  tools: ToolHandles;
  fetcher: DocumentFetcher;
  client: ResilientModelClient;
  /** Ticker used when a request does not name one. */
  defaultTicker: string;
  store?: ForecastStore;
  runBudgetMs?: number;
  concurrency?: number;
  synthesisAttempts?: number;
  /** Document kinds every run asks each source for. */
  kinds?: readonly DocumentKind[];
  now?: () => number;
}

/**
 * Drives one forecast run per `run()` call through
 * gathering, extracting, analyzing, synthesizing and validating.
 *
 * Each call owns a fresh RunContext; nothing is shared between runs except
 * the collaborators handed to the constructor.
 */
export class ForecastCoordinator extends EventEmitter<CoordinatorEvents> {
  private readonly synthesizer: Synthesizer;
  private readonly budgetMs: number;
  private readonly concurrency: number;
  private readonly kinds: readonly DocumentKind[];
  private readonly now: () => number;

  constructor(private readonly options: CoordinatorOptions) {
    super();
    this.synthesizer = new Synthesizer(options.client, options.synthesisAttempts ?? DEFAULT_SYNTHESIS_ATTEMPTS);
    this.budgetMs = options.runBudgetMs ?? DEFAULT_RUN_BUDGET_MS;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.kinds = options.kinds ?? DOCUMENT_KINDS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Validate `input` and execute a run.
   *
   * @throws InputInvalidError before any state transition for a malformed request
   * @throws ForecastError of the failing kind once the run reaches `failed`
   */
  async run(input: unknown): Promise<ForecastResult> {
    const request = parseRunRequest(input, this.options.defaultTicker);
    const runId = randomUUID();
    const ctx = new RunContext({
      runId,
      request,
      budgetMs: this.budgetMs,
      now: this.now,
      onRecord: entry => this.relay(runId, entry),
    });
    const controller = new AbortController();
    const runLog = log.child({ runId: ctx.runId, ticker: request.ticker });
    runLog.info({ quarters: request.quarters, sources: request.sources }, 'run started');

    const work = this.execute(ctx, controller.signal);
    let result: ForecastResult;
    try {
      result = await withTimeout(work, ctx.remainingMs());
    } catch (err) {
      const failedIn = ctx.state;
      if (err instanceof TimeoutError) {
        controller.abort();
        work.catch((late: unknown) => runLog.debug({ err: late }, 'in-flight work settled after abort'));
      }

      const error = this.toRunError(err, failedIn);
      if (!isTerminal(ctx.state)) ctx.transition('failed', error instanceof ForecastError ? error.kind : error.name);
      runLog.error({ err: error, state: failedIn }, 'run failed');

      if (error instanceof ForecastError) {
        await this.persist(ctx, () => this.options.store?.saveFailure({
          runId: ctx.runId,
          request,
          state: failedIn,
          error: error.toErrorBody().error,
          trace: ctx.trace,
        }));
      }
      this.emit('run:error', { runId: ctx.runId, error, state: failedIn });
      throw error;
    }

    runLog.info({ status: result.status, durationMs: ctx.elapsedMs() }, 'run complete');
    await this.persist(ctx, () => this.options.store?.save({ runId: ctx.runId, request, result, trace: ctx.trace }));
    this.emit('run:complete', { runId: ctx.runId, result, durationMs: ctx.elapsedMs() });
    return result;
  }

  private async execute(ctx: RunContext, signal: AbortSignal): Promise<ForecastResult> {
    ctx.transition('gathering', 'request accepted');
    await this.gather(ctx, signal);

    const missing = this.kinds.filter(kind => ctx.documentsOfKind(kind).length === 0);
    for (const kind of missing) {
      ctx.addGap({ kind, reason: `no ${kind} documents available from ${ctx.request.sources.join(', ')}` });
    }
    this.advance(ctx, 'extracting', `${ctx.documents.length} document(s) gathered`, missing.length > 0);

    const extractionGaps = await this.extract(ctx, signal);
    this.advance(ctx, 'analyzing', `${ctx.metrics.length} metric(s) extracted`, extractionGaps > 0);

    const analysisGaps = await this.analyze(ctx, signal);
    this.advance(ctx, 'synthesizing', `${ctx.insights.length} insight(s) found`, analysisGaps > 0);

    return this.synthesize(ctx, signal);
  }

  /** Move to `next`, passing through `degraded` when this step left gaps. */
  private advance(ctx: RunContext, next: RunState, trigger: string, hadGaps: boolean): void {
    if (hadGaps) ctx.transition('degraded', `gaps recorded while ${ctx.state}`);
    ctx.transition(next, trigger);
  }

  // -------------------------------------------------------------------------
  // Gathering
  // -------------------------------------------------------------------------

  private async gather(ctx: RunContext, signal: AbortSignal): Promise<void> {
    const { request } = ctx;
    const queries: FetchQuery[] = [];
    for (const sourceId of request.sources) {
      for (const kind of this.kinds) {
        for (let quarterOffset = 0; quarterOffset < request.quarters; quarterOffset++) {
          queries.push({ sourceId, kind, quarterOffset, ticker: request.ticker, abortSignal: signal });
        }
      }
    }

    const fetched = await mapLimited(queries, this.concurrency, async (query) => {
      const outcome = await this.fetchOne(query, signal);
      const { sourceId, kind, quarterOffset } = query;
      if (outcome.status === 'ok') {
        ctx.record({ type: 'fetch', sourceId, kind, quarterOffset, outcome: 'ok', documentId: outcome.document.id });
        return outcome.document;
      }
      ctx.record({ type: 'fetch', sourceId, kind, quarterOffset, outcome: 'unavailable', reason: outcome.reason });
      return undefined;
    }, signal);

    const seen = new Set<string>();
    for (const doc of fetched) {
      if (!doc || seen.has(doc.id)) continue;
      seen.add(doc.id);
      ctx.documents.push(doc);
    }
  }

  private async fetchOne(query: FetchQuery, signal: AbortSignal): Promise<FetchOutcome> {
    try {
      return await this.options.fetcher.fetch(query);
    } catch (err) {
      if (signal.aborted) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      return { status: 'unavailable', reason: `fetch failed: ${reason}` };
    }
  }

  // -------------------------------------------------------------------------
  // Extraction & analysis
  // -------------------------------------------------------------------------

  /** Returns the number of gaps recorded. */
  private async extract(ctx: RunContext, signal: AbortSignal): Promise<number> {
    const { extractor } = this.options.tools;
    const reports = ctx.documentsOfKind('report');
    let gaps = 0;

    const results = await mapLimited(reports, this.concurrency, doc =>
      this.invoke(ctx, extractor.name, doc, signal, () => extractor.extract(doc, signal)), signal);

    results.forEach((outcome, index) => {
      const doc = reports[index];
      if (!doc) return;
      if (outcome.error !== undefined || outcome.items.length === 0) {
        gaps++;
        ctx.addGap({
          documentId: doc.id,
          kind: doc.kind,
          reason: outcome.error ?? 'no metrics extracted by any strategy',
        });
        return;
      }
      ctx.metrics.push(...outcome.items);
    });
    return gaps;
  }

  private async analyze(ctx: RunContext, signal: AbortSignal): Promise<number> {
    const { analyzer } = this.options.tools;
    const transcripts = ctx.documentsOfKind('transcript');
    let gaps = 0;

    const results = await mapLimited(transcripts, this.concurrency, doc =>
      this.invoke(ctx, analyzer.name, doc, signal, () => analyzer.analyze(doc, signal)), signal);

    results.forEach((outcome, index) => {
      const doc = transcripts[index];
      if (!doc) return;
      if (outcome.error !== undefined || outcome.items.length === 0) {
        gaps++;
        ctx.addGap({
          documentId: doc.id,
          kind: doc.kind,
          reason: outcome.error ?? 'no themes found',
        });
        return;
      }
      ctx.insights.push(...outcome.items);
    });
    return gaps;
  }

  /**
   * Run one tool call and trace it. A tool that throws is a gap for that
   * document, not a failed run; aborts still propagate.
   */
  private async invoke<T>(
    ctx: RunContext,
    tool: string,
    doc: SourceDocument,
    signal: AbortSignal,
    call: () => Promise<T[]>,
  ): Promise<{ items: T[]; error?: string }> {
    const startedAt = this.now();
    try {
      const items = await call();
      ctx.record({ type: 'tool', tool, documentId: doc.id, produced: items.length, durationMs: this.now() - startedAt });
      return { items };
    } catch (err) {
      if (signal.aborted || err instanceof AbortError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      ctx.record({ type: 'tool', tool, documentId: doc.id, produced: 0, durationMs: this.now() - startedAt });
      return { items: [], error: `${tool} failed: ${message}` };
    }
  }

  // -------------------------------------------------------------------------
  // Synthesis & validation
  // -------------------------------------------------------------------------

  private async synthesize(ctx: RunContext, signal: AbortSignal): Promise<ForecastResult> {
    const reconciliation = reconcile(ctx.metrics, ctx.insights, ctx.gaps);
    const documentIds = ctx.documents.map(d => d.id);
    const basePrompt = buildSynthesisPrompt({
      ticker: ctx.request.ticker,
      quarters: ctx.request.quarters,
      reconciliation,
      gaps: ctx.gaps,
      documentIds,
    });
    const validation = {
      knownDocumentIds: new Set(documentIds),
      requireThemes: reconciliation.insights.length > 0,
    };

    let prompt = basePrompt;
    for (let round = 1; ; round++) {
      const draft = await this.synthesizer.draft({ prompt, round, trace: ctx, abortSignal: signal });
      ctx.transition('validating', `draft parsed in round ${round}`);

      const candidate = assembleResult(reconciliation, draft, {
        runId: ctx.runId,
        ticker: ctx.request.ticker,
        generatedAt: new Date(this.now()).toISOString(),
        quartersAnalyzed: quartersOf(ctx.documents),
        degraded: ctx.degraded,
      });
      const outcome = validateForecast(candidate, validation);

      if (outcome.ok) {
        ctx.record({ type: 'validation', outcome: 'passed', issues: [] });
        ctx.transition('done', 'validation passed');
        return outcome.result;
      }

      ctx.record({ type: 'validation', outcome: 'failed', issues: outcome.issues });
      if (round >= MAX_SYNTHESIS_ROUNDS) {
        throw new ValidationFailedError(outcome.issues, round);
      }
      ctx.transition('synthesizing', `validation failed with ${outcome.issues.length} issue(s)`);
      prompt = withValidationFeedback(basePrompt, outcome.issues);
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private toRunError(err: unknown, state: RunState): Error {
    if (err instanceof TimeoutError || err instanceof AbortError) {
      return new TimeoutExceededError(this.budgetMs, state);
    }
    if (err instanceof ForecastError) {
      if (err.state === undefined) err.state = state;
      return err;
    }
    return err instanceof Error ? err : new Error(String(err));
  }

  /** Store failures never change the run's outcome; they are logged and emitted. */
  private async persist(ctx: RunContext, save: () => Promise<void> | undefined): Promise<void> {
    try {
      await save();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.warn({ runId: ctx.runId, err: error }, 'failed to persist run record');
      this.emit('store:error', { runId: ctx.runId, error });
    }
  }

  /** Turn trace entries into coordinator events and log lines. */
  private relay(runId: string, entry: TraceEntry): void {
    switch (entry.type) {
      case 'transition':
        log.debug({ runId, from: entry.from, to: entry.to, trigger: entry.trigger }, 'state change');
        this.emit('state:change', { runId, from: entry.from, to: entry.to, trigger: entry.trigger });
        break;
      case 'gap': {
        const gap: EvidenceGap = { reason: entry.reason };
        if (entry.documentId !== undefined) gap.documentId = entry.documentId;
        if (entry.kind !== undefined) gap.kind = entry.kind;
        log.warn({ runId, ...gap }, 'evidence gap');
        this.emit('document:gap', { runId, gap });
        break;
      }
      case 'model':
        if (entry.outcome === 'error' && entry.delayMs !== undefined) {
          this.emit('model:retry', {
            runId,
            step: entry.step,
            attempt: entry.attempt,
            delayMs: entry.delayMs,
            category: entry.category,
          });
        }
        break;
      case 'synthesis':
        this.emit('synthesis:attempt', { runId, round: entry.round, attempt: entry.attempt, outcome: entry.outcome });
        break;
      default:
        break;
    }
  }
}

/** Distinct periods covered by the gathered documents, newest first. */
export function quartersOf(documents: readonly SourceDocument[]): string[] {
  const periods = [...documents.map(d => d.period)].sort((a, b) => comparePeriods(b, a));
  return [...new Set(periods.map(formatPeriod))];
}
