import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import {
  getLogger,
  periodOrdinal,
  type DocumentFetcher,
  type DocumentFormat,
  type FetchOutcome,
  type FetchQuery,
  type FiscalPeriod,
  type SourceDocument,
} from '@forecastr/core';
import { fetchWithRetry, type FetchRetryConfig } from '../retry.js';
import { loadManifest, type Manifest, type ManifestEntry } from './manifest.js';

const log = getLogger('document-fetcher');

const CACHE_EXTENSIONS: Record<DocumentFormat, string> = {
  text: '.txt',
  markdown: '.md',
  html: '.html',
  image: '.img',
};

export interface ManifestFetcherOptions {
  /** Directory relative paths in the manifest resolve against. */
  baseDir?: string;
  /** Where downloaded documents are kept. Without it nothing is cached. */
  cacheDir?: string;
  retry?: FetchRetryConfig;
}

type Loaded = { ok: true; bytes: Uint8Array } | { ok: false; reason: string };

/**
 * Serves documents listed in a YAML manifest. Local paths are read
 * directly; URLs are downloaded with retry and cached, and the cached
 * copy stands in when a later download fails.
 */
export class ManifestDocumentFetcher implements DocumentFetcher {
  private readonly baseDir: string;

  constructor(
    private readonly manifest: Manifest,
    private readonly options: ManifestFetcherOptions = {},
  ) {
    this.baseDir = options.baseDir ?? process.cwd();
  }

  static async fromFile(
    manifestPath: string,
    options: Omit<ManifestFetcherOptions, 'baseDir'> = {},
  ): Promise<ManifestDocumentFetcher> {
    const manifest = await loadManifest(manifestPath);
    return new ManifestDocumentFetcher(manifest, { ...options, baseDir: dirname(resolve(manifestPath)) });
  }

  get sourceIds(): string[] {
    return Object.keys(this.manifest.sources);
  }

  async fetch(query: FetchQuery): Promise<FetchOutcome> {
    const entries = this.manifest.sources[query.sourceId];
    if (!entries) {
      const known = this.sourceIds.sort().join(', ') || 'none';
      return { status: 'unavailable', reason: `unknown source "${query.sourceId}" (manifest lists: ${known})` };
    }

    const ticker = query.ticker.toUpperCase();
    const matching = entries.filter(
      e => e.kind === query.kind && (e.ticker === undefined || e.ticker.toUpperCase() === ticker),
    );
    const ordinals = [...new Set(matching.map(e => periodOrdinal(toPeriod(e))))].sort((a, b) => b - a);
    const wanted = ordinals[query.quarterOffset];
    const entry = matching.find(e => periodOrdinal(toPeriod(e)) === wanted);
    if (wanted === undefined || !entry) {
      return {
        status: 'unavailable',
        reason: `no ${query.kind} for ${ticker} at quarter offset ${query.quarterOffset} in ${query.sourceId}`,
      };
    }

    const loaded = entry.url !== undefined
      ? await this.download(query.sourceId, entry, entry.url, query.abortSignal)
      : await this.readLocal(entry.path ?? '');
    if (!loaded.ok) return { status: 'unavailable', reason: loaded.reason };

    const document: SourceDocument = {
      id: entry.id,
      kind: entry.kind,
      sourceId: query.sourceId,
      period: toPeriod(entry),
      format: entry.format,
      content: entry.format === 'image'
        ? { images: [loaded.bytes] }
        : { text: new TextDecoder().decode(loaded.bytes) },
      origin: entry.url ?? entry.path,
    };
    return { status: 'ok', document };
  }

  private async readLocal(path: string): Promise<Loaded> {
    try {
      return { ok: true, bytes: await readFile(resolve(this.baseDir, path)) };
    } catch (err) {
      return { ok: false, reason: `cannot read ${path}: ${errorMessage(err)}` };
    }
  }

  private async download(
    sourceId: string,
    entry: ManifestEntry,
    url: string,
    abortSignal: AbortSignal | undefined,
  ): Promise<Loaded> {
    const cachePath = this.options.cacheDir
      ? join(this.options.cacheDir, sourceId, `${entry.id}${CACHE_EXTENSIONS[entry.format]}`)
      : undefined;

    let failure: string;
    try {
      const response = await fetchWithRetry(url, { signal: abortSignal }, this.options.retry);
      const bytes = new Uint8Array(await response.arrayBuffer());
      if (cachePath) await this.writeCache(cachePath, bytes);
      return { ok: true, bytes };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') throw err;
      failure = errorMessage(err);
    }

    if (cachePath) {
      try {
        const bytes = await readFile(cachePath);
        log.warn({ url, cachePath, reason: failure }, 'Download failed, using cached copy');
        return { ok: true, bytes };
      } catch (err) {
        log.debug({ cachePath, err }, 'No cached copy');
      }
    }
    return { ok: false, reason: `download failed for ${url}: ${failure}` };
  }

  private async writeCache(path: string, bytes: Uint8Array): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, bytes);
    } catch (err) {
      log.warn({ err, path }, 'Could not write document cache');
    }
  }
}

function toPeriod(entry: ManifestEntry): FiscalPeriod {
  return { fiscalYear: entry.fiscal_year, quarter: entry.quarter };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
