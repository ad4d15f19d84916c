import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { formatZodIssues, type ErrorBody } from '../errors.js';
import type { TraceEntry } from '../run/context.js';
import type { RunRequest } from '../run/request.js';
import type { RunState } from '../run/states.js';
import { ForecastResultSchema, type ForecastResult } from '../synthesis/schema.js';

export interface ForecastRecord {
  runId: string;
  request: RunRequest;
  result: ForecastResult;
  trace: readonly TraceEntry[];
}

export interface FailureRecord {
  runId: string;
  request: RunRequest;
  /** State the run was in when it failed. */
  state: RunState;
  error: ErrorBody['error'];
  trace: readonly TraceEntry[];
}

export type StoredRun =
  | ({ status: 'done'; savedAt: string } & ForecastRecord)
  | ({ status: 'failed'; savedAt: string } & FailureRecord);

// ---------------------------------------------------------------------------
// Stored record schema
// ---------------------------------------------------------------------------

const RunStateSchema = z.enum([
  'idle', 'gathering', 'extracting', 'analyzing', 'degraded', 'synthesizing', 'validating', 'done', 'failed',
]);
const DocumentKindSchema = z.enum(['report', 'transcript']);

const TraceEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('transition'), from: RunStateSchema, to: RunStateSchema, trigger: z.string() }),
  z.object({
    type: z.literal('fetch'),
    sourceId: z.string(),
    kind: DocumentKindSchema,
    quarterOffset: z.number().int(),
    outcome: z.enum(['ok', 'unavailable']),
    documentId: z.string().optional(),
    reason: z.string().optional(),
  }),
  z.object({ type: z.literal('tool'), tool: z.string(), documentId: z.string(), produced: z.number(), durationMs: z.number() }),
  z.object({
    type: z.literal('model'),
    step: z.string(),
    backend: z.string(),
    attempt: z.number().int(),
    outcome: z.enum(['ok', 'error']),
    durationMs: z.number(),
    category: z.enum([
      'rate_limit', 'server_error', 'timeout', 'network', 'auth_error', 'not_found', 'aborted', 'unknown',
    ]).optional(),
    error: z.string().optional(),
    delayMs: z.number().optional(),
  }),
  z.object({
    type: z.literal('synthesis'),
    round: z.number().int(),
    attempt: z.number().int(),
    outcome: z.enum(['parsed', 'malformed']),
    issue: z.string().optional(),
  }),
  z.object({ type: z.literal('validation'), outcome: z.enum(['passed', 'failed']), issues: z.array(z.string()) }),
  z.object({ type: z.literal('gap'), reason: z.string(), documentId: z.string().optional(), kind: DocumentKindSchema.optional() }),
]);

const TraceEntrySchema = TraceEventSchema.and(z.object({ seq: z.number().int(), at: z.string() }));

const StoredRequestSchema = z.object({
  quarters: z.number().int().min(1),
  sources: z.array(z.string().min(1)),
  ticker: z.string().min(1),
});

const StoredBase = {
  runId: z.string().min(1),
  savedAt: z.string().datetime(),
  request: StoredRequestSchema,
  trace: z.array(TraceEntrySchema),
};

export const StoredRunSchema: z.ZodType<StoredRun, z.ZodTypeDef, unknown> = z.discriminatedUnion('status', [
  z.object({ status: z.literal('done'), ...StoredBase, result: ForecastResultSchema }),
  z.object({
    status: z.literal('failed'),
    ...StoredBase,
    state: RunStateSchema,
    error: z.object({
      kind: z.enum([
        'RateLimited', 'ModelUnavailable', 'ExtractionGap', 'SynthesisFailed', 'ValidationFailed',
        'TimeoutExceeded', 'InputInvalid',
      ]),
      message: z.string(),
      state: RunStateSchema.optional(),
      attempts: z.number().int().optional(),
      details: z.record(z.string(), z.unknown()).optional(),
    }),
  }),
]);

export class CorruptRecordError extends Error {
  constructor(readonly path: string, readonly issues: string[]) {
    super(`Corrupt run record ${path}: ${issues.join(', ')}`);
    this.name = 'CorruptRecordError';
  }
}

// ---------------------------------------------------------------------------
// Stores
// ---------------------------------------------------------------------------

const SAFE_RUN_ID = /^[\w.-]+$/;

/** Audit storage for finished runs. Saving the same run twice overwrites it. */
export interface ForecastStore {
  save(record: ForecastRecord): Promise<void>;
  saveFailure(record: FailureRecord): Promise<void>;
  /** The stored run, or undefined when no run has that id. */
  get(runId: string): Promise<StoredRun | undefined>;
}

/**
 * Writes one `<runId>.json` per run. Each write lands in a temp file first and
 * is renamed into place, so readers never see a partial record.
 */
export class FileForecastStore implements ForecastStore {
  constructor(
    readonly directory: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  pathFor(runId: string): string {
    return join(this.directory, `${runId}.json`);
  }

  async save(record: ForecastRecord): Promise<void> {
    await this.write({ status: 'done', savedAt: this.now().toISOString(), ...record });
  }

  async saveFailure(record: FailureRecord): Promise<void> {
    await this.write({ status: 'failed', savedAt: this.now().toISOString(), ...record });
  }

  async get(runId: string): Promise<StoredRun | undefined> {
    if (!SAFE_RUN_ID.test(runId)) return undefined;
    const path = this.pathFor(runId);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptRecordError(path, [err instanceof Error ? err.message : String(err)]);
    }
    const parsed = StoredRunSchema.safeParse(json);
    if (!parsed.success) throw new CorruptRecordError(path, formatZodIssues(parsed.error.issues));
    return parsed.data;
  }

  private async write(run: StoredRun): Promise<void> {
    if (!SAFE_RUN_ID.test(run.runId)) {
      throw new Error(`Refusing to store run with unsafe id: ${run.runId}`);
    }
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(run.runId);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, JSON.stringify(run, null, 2) + '\n', 'utf-8');
    await rename(temp, target);
  }
}

/** Keeps records in memory; used by tests and by `serve --no-store`. */
export class MemoryForecastStore implements ForecastStore {
  readonly runs = new Map<string, StoredRun>();

  async save(record: ForecastRecord): Promise<void> {
    this.runs.set(record.runId, { status: 'done', savedAt: new Date().toISOString(), ...record });
  }

  async saveFailure(record: FailureRecord): Promise<void> {
    this.runs.set(record.runId, { status: 'failed', savedAt: new Date().toISOString(), ...record });
  }

  async get(runId: string): Promise<StoredRun | undefined> {
    return this.runs.get(runId);
  }
}
