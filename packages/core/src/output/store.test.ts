import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CorruptRecordError, FileForecastStore, MemoryForecastStore, type ForecastRecord } from './store.js';
import type { ForecastResult } from '../synthesis/schema.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'forecastr-store-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

const FIXED_NOW = () => new Date('2025-07-01T10:00:00.000Z');

function makeResult(runId: string): ForecastResult {
  return {
    runId,
    ticker: 'TCS',
    generatedAt: '2025-07-01T09:59:00.000Z',
    quartersAnalyzed: ['FY2025-Q4'],
    status: 'complete',
    metrics: {},
    qualitative: {
      outlook: 'Stable demand.',
      sentiment: { score: 0.2, label: 'positive' },
      key_themes: [],
      projections: [],
      risks: [],
      opportunities: [],
    },
    confidence_scores: { metrics: 0, analysis: 0 },
    evidence: [],
  };
}

function makeRecord(runId: string): ForecastRecord {
  return {
    runId,
    request: { quarters: 1, sources: ['screener'], ticker: 'TCS' },
    result: makeResult(runId),
    trace: [{ type: 'transition', from: 'idle', to: 'gathering', trigger: 'request accepted', seq: 1, at: '2025-07-01T09:58:00.000Z' }],
  };
}

describe('FileForecastStore', () => {
  it('writes one JSON file per run', async () => {
    const store = new FileForecastStore(join(tempDir, 'runs'), FIXED_NOW);
    await store.save(makeRecord('run-1'));

    const written = JSON.parse(readFileSync(join(tempDir, 'runs', 'run-1.json'), 'utf-8'));
    expect(written.status).toBe('done');
    expect(written.savedAt).toBe('2025-07-01T10:00:00.000Z');
    expect(written.result.ticker).toBe('TCS');
    expect(written.trace).toHaveLength(1);
  });

  it('leaves no temp files behind', async () => {
    const store = new FileForecastStore(tempDir, FIXED_NOW);
    await store.save(makeRecord('run-2'));
    expect(readdirSync(tempDir)).toEqual(['run-2.json']);
  });

  it('overwrites a run saved twice', async () => {
    const store = new FileForecastStore(tempDir, FIXED_NOW);
    await store.save(makeRecord('run-3'));
    await store.saveFailure({
      runId: 'run-3',
      request: { quarters: 1, sources: ['screener'], ticker: 'TCS' },
      state: 'synthesizing',
      error: { kind: 'SynthesisFailed', message: 'gave up', attempts: 3 },
      trace: [],
    });

    await expect(store.get('run-3')).resolves.toEqual({
      status: 'failed',
      savedAt: '2025-07-01T10:00:00.000Z',
      runId: 'run-3',
      request: { quarters: 1, sources: ['screener'], ticker: 'TCS' },
      state: 'synthesizing',
      error: { kind: 'SynthesisFailed', message: 'gave up', attempts: 3 },
      trace: [],
    });
  });

  it('reads back a saved forecast', async () => {
    const store = new FileForecastStore(tempDir, FIXED_NOW);
    await store.save(makeRecord('run-5'));
    await expect(store.get('run-5')).resolves.toEqual({
      status: 'done',
      savedAt: '2025-07-01T10:00:00.000Z',
      ...makeRecord('run-5'),
    });
  });

  it('returns undefined for unknown or unsafe ids', async () => {
    const store = new FileForecastStore(tempDir, FIXED_NOW);
    await expect(store.get('missing')).resolves.toBeUndefined();
    await expect(store.get('../etc/passwd')).resolves.toBeUndefined();
  });

  it('rejects records that do not match the schema', async () => {
    const store = new FileForecastStore(tempDir, FIXED_NOW);
    writeFileSync(join(tempDir, 'run-6.json'), JSON.stringify({ status: 'done', runId: 'run-6' }));
    const error = await store.get('run-6').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CorruptRecordError);
    expect(error).toMatchObject({ issues: expect.arrayContaining(['savedAt: Required', 'result: Required']) });
  });

  it('rejects run ids that would escape the directory', async () => {
    const store = new FileForecastStore(tempDir, FIXED_NOW);
    await expect(store.save(makeRecord('../escape'))).rejects.toThrow('unsafe id');
  });
});

describe('MemoryForecastStore', () => {
  it('keeps the latest record per run', async () => {
    const store = new MemoryForecastStore();
    await store.save(makeRecord('run-4'));
    expect(store.runs.get('run-4')?.status).toBe('done');
    await expect(store.get('run-4')).resolves.toMatchObject({ status: 'done', runId: 'run-4' });
    await expect(store.get('run-0')).resolves.toBeUndefined();
  });
});
