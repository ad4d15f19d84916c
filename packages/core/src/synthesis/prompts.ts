import type { EvidenceGap } from '../run/context.js';
import type { Reconciliation } from './reconcile.js';

export interface SynthesisPromptInput {
  ticker: string;
  quarters: number;
  reconciliation: Reconciliation;
  gaps: readonly EvidenceGap[];
  documentIds: readonly string[];
}

const MAX_ECHO_CHARS = 4000;

const RESPONSE_SHAPE = `{
  "outlook": string,
  "sentiment": { "score": number in [-1, 1], "label": "positive" | "neutral" | "negative" },
  "key_themes": [{ "theme": string, "summary": string, "sentiment": number in [-1, 1], "confidence": number in [0, 1], "sources": [document id, ...] }],
  "projections": [{ "metric": string, "direction": "up" | "flat" | "down", "rationale": string, "sources": [document id, ...] }],
  "risks": [{ "description": string, "sources": [document id, ...] }],
  "opportunities": [{ "description": string, "sources": [document id, ...] }]
}`;

export function buildSynthesisPrompt(input: SynthesisPromptInput): string {
  const { ticker, quarters, reconciliation, gaps, documentIds } = input;

  const metricLines = reconciliation.used.length > 0
    ? reconciliation.used.map(m =>
        `- ${m.name}: ${m.value} ${m.unit} (period ${reconciliation.metrics[m.name]?.period ?? 'unknown'}, confidence ${m.confidence.toFixed(2)}, source ${m.sourceDocumentId})`)
    : ['- none extracted'];

  const insightLines = reconciliation.insights.length > 0
    ? reconciliation.insights.map(i =>
        `- [${i.sourceDocumentId}] ${i.theme} (sentiment ${i.sentiment.toFixed(2)}, confidence ${i.confidence.toFixed(2)}): "${i.supportingQuote}"`)
    : ['- none found'];

  const gapLines = gaps.map(g => `- ${g.documentId ?? g.kind ?? 'run'}: ${g.reason}`);

  return [
    `You are a financial analyst preparing a forward-looking view of ${ticker} from its last ${quarters} quarter(s) of reports and earnings-call transcripts.`,
    '',
    'Extracted metrics (latest period per metric):',
    ...metricLines,
    '',
    'Themes from earnings-call transcripts:',
    ...insightLines,
    ...(gapLines.length > 0 ? ['', 'Missing or unreadable inputs:', ...gapLines] : []),
    '',
    `Known document ids: ${documentIds.join(', ')}`,
    '',
    'Respond with a single JSON object of exactly this shape:',
    RESPONSE_SHAPE,
    '',
    'Rules:',
    '- Every theme, projection, risk and opportunity must cite at least one known document id in "sources".',
    '- Do not invent figures that are not listed above.',
    ...(reconciliation.insights.length > 0 ? ['- Include at least one key theme.'] : []),
    '- Respond ONLY with the JSON object, no markdown and no commentary.',
  ].join('\n');
}

/** Re-prompt after output that did not parse into a draft. */
export function buildCorrectionPrompt(basePrompt: string, malformed: string, issue: string): string {
  const echoed = malformed.length > MAX_ECHO_CHARS ? `${malformed.slice(0, MAX_ECHO_CHARS)}...` : malformed;
  return [
    basePrompt,
    '',
    'Your previous response could not be used.',
    `Problem: ${issue}`,
    'Previous response:',
    '<<<',
    echoed,
    '>>>',
    'Correct the formatting and respond again with ONLY the JSON object.',
  ].join('\n');
}

/** Base prompt for the corrective round after a failed validation. */
export function withValidationFeedback(basePrompt: string, issues: readonly string[]): string {
  return [
    basePrompt,
    '',
    'A previous forecast built from your answer failed validation:',
    ...issues.map(i => `- ${i}`),
    'Fix these problems in your new answer.',
  ].join('\n');
}
