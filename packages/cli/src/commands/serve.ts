import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  InputInvalidError,
  MemoryForecastStore,
  getLogger,
  type ForecastCoordinator,
  type ForecastStore,
} from '@forecastr/core';
import { getConfig } from '../context.js';
import { toErrorResponse } from '../errors.js';
import { createRuntime } from '../runtime.js';
import { parsePositiveInt } from './forecast.js';

const log = getLogger('serve');

const MAX_BODY_BYTES = 1024 * 1024;

export interface ForecastServerOptions {
  coordinator: ForecastCoordinator;
  store: ForecastStore;
  version: string;
  port: number;
  host?: string;
}

class BodyTooLargeError extends Error {}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) throw new BodyTooLargeError();
    chunks.push(buffer);
  }

  try {
    return JSON.parse(Buffer.concat(chunks).toString('utf-8'));
  } catch {
    throw new InputInvalidError(['body: must be a JSON object']);
  }
}

const RUN_PATH = /^\/forecast\/([^/]+)$/;

function notFound(res: ServerResponse, message: string): void {
  sendJson(res, 404, { error: { kind: 'NotFound', message } });
}

/**
 * `POST /forecast` runs one forecast per request, `GET /forecast/:runId`
 * returns a stored run and `GET /health` answers liveness checks. Errors
 * come back as structured bodies.
 */
export function createForecastHandler(
  coordinator: ForecastCoordinator,
  store: ForecastStore,
  version: string,
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  return async (req, res) => {
    const method = req.method ?? 'GET';
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    if (method === 'GET' && pathname === '/health') {
      sendJson(res, 200, { status: 'ok', version });
      return;
    }

    const runPath = RUN_PATH.exec(pathname);
    if (runPath) {
      if (method !== 'GET') {
        res.setHeader('Allow', 'GET');
        sendJson(res, 405, { error: { kind: 'MethodNotAllowed', message: 'Use GET /forecast/:runId' } });
        return;
      }
      const runId = runPath[1] ?? '';
      try {
        const run = await store.get(decodeURIComponent(runId));
        if (run) sendJson(res, 200, run);
        else notFound(res, `No run with id ${runId}`);
      } catch (error) {
        log.error({ err: error, runId }, 'run lookup failed');
        const { status, body } = toErrorResponse(error);
        sendJson(res, status, body);
      }
      return;
    }

    if (pathname !== '/forecast') {
      notFound(res, `No route for ${method} ${pathname}`);
      return;
    }
    if (method !== 'POST') {
      res.setHeader('Allow', 'POST');
      sendJson(res, 405, { error: { kind: 'MethodNotAllowed', message: 'Use POST /forecast' } });
      return;
    }

    try {
      const input = await readJsonBody(req);
      const result = await coordinator.run(input);
      sendJson(res, 200, result);
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        sendJson(res, 413, { error: { kind: 'PayloadTooLarge', message: `Body exceeds ${MAX_BODY_BYTES} bytes` } });
        return;
      }
      const { status, body } = toErrorResponse(error);
      if (status >= 500) log.error({ err: error }, 'forecast request failed');
      sendJson(res, status, body);
    }
  };
}

export function startForecastServer(
  options: ForecastServerOptions,
): { server: HttpServer; close: () => Promise<void>; ready: Promise<void> } {
  const { coordinator, store, version, port, host = '127.0.0.1' } = options;
  const handle = createForecastHandler(coordinator, store, version);

  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      log.error({ err }, 'unhandled request error');
      if (!res.headersSent) sendJson(res, 500, { error: { kind: 'Internal', message: 'Internal server error' } });
      else res.end();
    });
  });

  const ready = new Promise<void>((resolve) => {
    server.listen(port, host, () => resolve());
  });

  const close = async (): Promise<void> => {
    return new Promise((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  };

  return { server, close, ready };
}

interface ServeOptions {
  port: number;
  host: string;
  local?: boolean;
  store: boolean;
}

export function registerServeCommand(program: Command, version: string): void {
  program
    .command('serve')
    .description('Serve forecasts over HTTP')
    .option('-p, --port <port>', 'Port to listen on', parsePositiveInt, 8787)
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .option('--local', 'Use the local model server')
    .option('--no-store', 'Keep run records in memory only')
    .action(async (options: ServeOptions) => {
      const config = getConfig();
      const { coordinator, backendId, store } = await createRuntime(config, {
        local: options.local,
        store: options.store ? undefined : new MemoryForecastStore(),
      });

      const { ready } = startForecastServer({
        coordinator,
        store,
        version,
        port: options.port,
        host: options.host,
      });
      await ready;
      console.error(chalk.green(`\n  forecastr listening on http://${options.host}:${options.port}`));
      console.error(chalk.dim(`  model: ${backendId}`));
      console.error(chalk.dim('  Press Ctrl+C to stop\n'));
    });
}
