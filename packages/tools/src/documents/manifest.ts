import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { formatZodIssues } from '@forecastr/core';

const ManifestEntrySchema = z.object({
  id: z.string().regex(/^[\w.-]+$/, 'must contain only letters, digits, ".", "_" and "-"'),
  ticker: z.string().min(1).optional(),
  kind: z.enum(['report', 'transcript']),
  fiscal_year: z.number().int().min(1990).max(2100),
  quarter: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  format: z.enum(['text', 'markdown', 'html', 'image']).default('text'),
  path: z.string().min(1).optional(),
  url: z.string().url().optional(),
}).strict().refine(entry => (entry.path === undefined) !== (entry.url === undefined), {
  message: 'exactly one of path or url is required',
});

export const ManifestSchema = z.object({
  sources: z.record(z.string().min(1), z.array(ManifestEntrySchema)),
}).strict();

export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export class ManifestError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message);
    this.name = 'ManifestError';
  }
}

export function parseManifest(source: string, origin = 'manifest'): Manifest {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    throw new ManifestError(`Invalid YAML in ${origin}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = ManifestSchema.safeParse(raw ?? { sources: {} });
  if (!result.success) {
    throw new ManifestError(`Invalid document manifest ${origin}:`, formatZodIssues(result.error.issues));
  }
  return result.data;
}

export async function loadManifest(path: string): Promise<Manifest> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ManifestError(`Cannot read document manifest ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseManifest(source, path);
}
