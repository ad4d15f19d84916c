import { describe, it, expect, afterEach } from 'vitest';
import http from 'node:http';
import {
  MemoryForecastStore,
  type CompletionOptions,
  type DocumentFetcher,
  type FetchOutcome,
  type FetchQuery,
  type ModelBackend,
  type SourceDocument,
} from '@forecastr/core';
import { ConfigDefaults } from '../config/index.js';
import { buildCoordinator } from '../runtime.js';
import { startForecastServer } from './serve.js';

const REPORT: SourceDocument = {
  id: 'infy-q1-results',
  kind: 'report',
  sourceId: 'screener',
  period: { fiscalYear: 2026, quarter: 1 },
  format: 'markdown',
  content: { text: '| Metric | Q1 |\n|---|---|\n| Revenue | 42,279 |' },
};

const TRANSCRIPT: SourceDocument = {
  id: 'infy-q1-call',
  kind: 'transcript',
  sourceId: 'screener',
  period: { fiscalYear: 2026, quarter: 1 },
  format: 'text',
  content: { text: 'Large deal wins were strong. Clients keep investing in cloud programs.' },
};

const fetcher: DocumentFetcher = {
  async fetch(query: FetchQuery): Promise<FetchOutcome> {
    if (query.quarterOffset > 0) return { status: 'unavailable', reason: 'not published' };
    return { status: 'ok', document: query.kind === 'report' ? REPORT : TRANSCRIPT };
  },
};

const DRAFT = JSON.stringify({
  outlook: 'Steady demand.',
  sentiment: { score: 0.2, label: 'positive' },
  key_themes: [{ theme: 'Demand', summary: 'Deal wins were strong.', sentiment: 0.5, confidence: 0.6, sources: ['infy-q1-call'] }],
});

function backend(reply: () => string): ModelBackend {
  return {
    id: 'scripted',
    locality: 'hosted',
    async complete(_prompt: string, _options?: CompletionOptions) {
      return reply();
    },
  };
}

let server: ReturnType<typeof startForecastServer> | null = null;
let store = new MemoryForecastStore();

async function start(model: ModelBackend): Promise<string> {
  const config = structuredClone(ConfigDefaults);
  config.ticker = 'INFY';
  config.run.base_delay_ms = 0;
  store = new MemoryForecastStore();
  const coordinator = buildCoordinator(config, { backend: model, fetcher, store });
  server = startForecastServer({ coordinator, store, version: '0.1.0', port: 0 });
  await server.ready;
  const address = server.server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
  return `http://127.0.0.1:${address.port}`;
}

function post(base: string, body: string): Promise<Response> {
  return fetch(`${base}/forecast`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });
}

afterEach(async () => {
  if (server) {
    await server.close();
    server = null;
  }
});

describe('forecast server', () => {
  it('starts the HTTP server', async () => {
    await start(backend(() => DRAFT));
    expect(server?.server).toBeInstanceOf(http.Server);
    expect(server?.server.listening).toBe(true);
  });

  it('serves the health endpoint', async () => {
    const base = await start(backend(() => DRAFT));
    const response = await fetch(`${base}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', version: '0.1.0' });
  });

  it('matches routes on the path alone', async () => {
    const base = await start(backend(() => DRAFT));
    expect((await fetch(`${base}/health?check=1`)).status).toBe(200);

    const response = await fetch(`${base}/forecast?trace=1`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ quarters: 1, sources: ['screener'] }),
    });
    expect(response.status).toBe(200);
  });

  it('returns a stored run by id', async () => {
    const base = await start(backend(() => DRAFT));
    const result = await (await post(base, JSON.stringify({ quarters: 1, sources: ['screener'] }))).json();

    const response = await fetch(`${base}/forecast/${result.runId}`);
    expect(response.status).toBe(200);
    const run = await response.json();
    expect(run).toMatchObject({
      status: 'done',
      runId: result.runId,
      request: { quarters: 1, sources: ['screener'], ticker: 'INFY' },
      result: { runId: result.runId, ticker: 'INFY', status: 'complete' },
    });
    expect(run.trace[0]).toMatchObject({ type: 'transition', from: 'idle', to: 'gathering' });
  });

  it('answers 404 for an unknown run id', async () => {
    const base = await start(backend(() => DRAFT));
    const response = await fetch(`${base}/forecast/no-such-run`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { kind: 'NotFound', message: 'No run with id no-such-run' } });

    const wrongMethod = await fetch(`${base}/forecast/no-such-run`, { method: 'POST' });
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.headers.get('allow')).toBe('GET');
  });

  it('answers POST /forecast with the result', async () => {
    const base = await start(backend(() => DRAFT));
    const response = await post(base, JSON.stringify({ quarters: 1, sources: ['screener'] }));
    expect(response.status).toBe(200);

    const result = await response.json();
    expect(result).toMatchObject({
      ticker: 'INFY',
      status: 'complete',
      quartersAnalyzed: ['FY2026-Q1'],
      metrics: { revenue: { value: 42279, unit: 'INR_Cr', sourceDocumentId: 'infy-q1-results' } },
    });
  });

  it('maps an invalid request to 400', async () => {
    const base = await start(backend(() => DRAFT));
    const response = await post(base, JSON.stringify({ quarters: 1, sources: ['screener'], extra: true }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        kind: 'InputInvalid',
        message: "Invalid run request: Unrecognized key(s) in object: 'extra'",
        state: 'idle',
        details: { issues: ["Unrecognized key(s) in object: 'extra'"] },
      },
    });
  });

  it('maps a body that is not JSON to 400', async () => {
    const base = await start(backend(() => DRAFT));
    const response = await post(base, '{quarters: 1');
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { kind: 'InputInvalid', details: { issues: ['body: must be a JSON object'] } } });
  });

  it('maps an exhausted rate limit to 502', async () => {
    const base = await start(backend(() => {
      throw new Error('429 Too Many Requests');
    }));
    const response = await post(base, JSON.stringify({ quarters: 1, sources: ['screener'] }));
    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: {
        kind: 'RateLimited',
        message: 'Model backend rate limited the request after 3 attempt(s)',
        state: 'synthesizing',
        attempts: 3,
      },
    });
  });

  it('rejects other methods and paths', async () => {
    const base = await start(backend(() => DRAFT));
    const get = await fetch(`${base}/forecast`);
    expect(get.status).toBe(405);
    expect(get.headers.get('allow')).toBe('POST');

    expect((await fetch(`${base}/unknown`)).status).toBe(404);
  });
});
