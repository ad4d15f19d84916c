import { randomUUID } from 'node:crypto';
import type { ErrorCategory } from '../router/retry.js';
import type {
  DocumentKind,
  ExtractedMetric,
  QualitativeInsight,
  SourceDocument,
} from '../types.js';
import type { RunRequest } from './request.js';
import { canTransition, IllegalTransitionError, type RunState } from './states.js';

// ---------------------------------------------------------------------------
// Conversation trace
// ---------------------------------------------------------------------------

export type TraceEvent =
  | { type: 'transition'; from: RunState; to: RunState; trigger: string }
  | {
      type: 'fetch';
      sourceId: string;
      kind: DocumentKind;
      quarterOffset: number;
      outcome: 'ok' | 'unavailable';
      documentId?: string;
      reason?: string;
    }
  | { type: 'tool'; tool: string; documentId: string; produced: number; durationMs: number }
  | {
      type: 'model';
      step: string;
      backend: string;
      attempt: number;
      outcome: 'ok' | 'error';
      durationMs: number;
      category?: ErrorCategory;
      error?: string;
      delayMs?: number;
    }
  | { type: 'synthesis'; round: number; attempt: number; outcome: 'parsed' | 'malformed'; issue?: string }
  | { type: 'validation'; outcome: 'passed' | 'failed'; issues: string[] }
  | { type: 'gap'; reason: string; documentId?: string; kind?: DocumentKind };

export type TraceEntry = TraceEvent & { seq: number; at: string };

/** What the model client needs from a run to audit its attempts. */
export interface TraceSink {
  record(event: TraceEvent): void;
  countRetry(step: string): number;
}

// ---------------------------------------------------------------------------
// Gaps
// ---------------------------------------------------------------------------

export interface EvidenceGap {
  /** Document the gap applies to, or absent for a missing document kind. */
  documentId?: string;
  kind?: DocumentKind;
  reason: string;
}

// ---------------------------------------------------------------------------
// Run context
// ---------------------------------------------------------------------------

export interface RunContextOptions {
  request: RunRequest;
  budgetMs: number;
  runId?: string;
  now?: () => number;
  /** Observer called after every trace entry is appended. */
  onRecord?: (entry: TraceEntry) => void;
}

/**
 * Mutable accumulator for exactly one run. Created by the coordinator when a
 * request is accepted and dropped once the run reaches a terminal state.
 */
export class RunContext implements TraceSink {
  readonly runId: string;
  readonly request: RunRequest;
  readonly startedAt: number;
  readonly deadline: number;
  readonly documents: SourceDocument[] = [];
  readonly metrics: ExtractedMetric[] = [];
  readonly insights: QualitativeInsight[] = [];
  readonly gaps: EvidenceGap[] = [];
  private readonly entries: TraceEntry[] = [];
  private readonly retryCounters = new Map<string, number>();
  private readonly now: () => number;
  private readonly onRecord?: (entry: TraceEntry) => void;
  private _state: RunState = 'idle';
  private _degraded = false;

  constructor(options: RunContextOptions) {
    this.now = options.now ?? Date.now;
    this.onRecord = options.onRecord;
    this.runId = options.runId ?? randomUUID();
    this.request = options.request;
    this.startedAt = this.now();
    this.deadline = this.startedAt + options.budgetMs;
  }

  get state(): RunState {
    return this._state;
  }

  /** True once any gap sent the run down the degraded path. */
  get degraded(): boolean {
    return this._degraded;
  }

  get trace(): readonly TraceEntry[] {
    return this.entries;
  }

  get retries(): ReadonlyMap<string, number> {
    return this.retryCounters;
  }

  transition(to: RunState, trigger: string): void {
    const from = this._state;
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(from, to);
    }
    this._state = to;
    if (to === 'degraded') this._degraded = true;
    this.record({ type: 'transition', from, to, trigger });
  }

  record(event: TraceEvent): void {
    const entry: TraceEntry = {
      ...event,
      seq: this.entries.length + 1,
      at: new Date(this.now()).toISOString(),
    };
    this.entries.push(entry);
    this.onRecord?.(entry);
  }

  countRetry(step: string): number {
    const next = (this.retryCounters.get(step) ?? 0) + 1;
    this.retryCounters.set(step, next);
    return next;
  }

  addGap(gap: EvidenceGap): void {
    this.gaps.push(gap);
    this.record({ type: 'gap', ...gap });
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.deadline - this.now());
  }

  documentsOfKind(kind: DocumentKind): SourceDocument[] {
    return this.documents.filter(d => d.kind === kind);
  }
}
