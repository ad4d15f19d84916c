import { formatZodIssues } from '../errors.js';
import { SynthesisDraftSchema, type SynthesisDraft } from './schema.js';

export type DraftParse =
  | { ok: true; draft: SynthesisDraft }
  | { ok: false; issue: string };

/** Drop a surrounding markdown code fence, if any. */
export function stripFences(content: string): string {
  let text = content.trim();
  if (text.startsWith('```')) {
    text = text.replace(/^```(?:json)?\s*\n?/, '').replace(/\n?```\s*$/, '');
  }
  return text.trim();
}

/**
 * Turn raw model output into a draft. Tolerates code fences and prose around
 * a single JSON object; anything else is reported as an issue for the
 * correction prompt.
 */
export function parseDraft(content: string): DraftParse {
  const text = stripFences(content);
  if (!text) return { ok: false, issue: 'empty response' };

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return { ok: false, issue: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
    }
    try {
      raw = JSON.parse(text.slice(start, end + 1));
    } catch (innerErr) {
      return { ok: false, issue: `invalid JSON: ${innerErr instanceof Error ? innerErr.message : String(innerErr)}` };
    }
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, issue: 'expected a JSON object' };
  }

  const parsed = SynthesisDraftSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issue: formatZodIssues(parsed.error.issues).join('; ') };
  }
  return { ok: true, draft: parsed.data };
}
