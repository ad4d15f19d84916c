/**
 * Markdown rendering of a forecast: a short memo with the metric table,
 * themes, projections, risks and the evidence list as footnotes.
 */

import type { ForecastResult, Qualitative } from '../synthesis/schema.js';

const DIRECTION_ARROWS: Record<'up' | 'flat' | 'down', string> = {
  up: '▲',
  flat: '▶',
  down: '▼',
};

export function formatMarkdown(result: ForecastResult): string {
  const lines: string[] = [];

  lines.push(buildFrontmatter(result));
  lines.push(`# ${result.ticker} forecast`);
  lines.push('');
  lines.push(result.qualitative.outlook);
  lines.push('');
  lines.push(
    `**Sentiment:** ${result.qualitative.sentiment.label} (${formatSigned(result.qualitative.sentiment.score)})`,
  );

  if (result.status === 'degraded') {
    lines.push('');
    lines.push('> Built from partial data. See the gaps under Evidence.');
  }

  lines.push('');
  lines.push(buildMetricsTable(result));
  lines.push('');
  lines.push(buildThemes(result.qualitative));

  const projections = buildProjections(result.qualitative);
  if (projections) {
    lines.push('');
    lines.push(projections);
  }

  for (const [title, items] of [
    ['Risks', result.qualitative.risks],
    ['Opportunities', result.qualitative.opportunities],
  ] as const) {
    if (items.length === 0) continue;
    lines.push('');
    lines.push(`## ${title}`);
    lines.push('');
    for (const item of items) lines.push(`- ${item.description} ${cite(item.sources)}`);
  }

  lines.push('');
  lines.push(buildEvidence(result));

  return lines.join('\n') + '\n';
}

function buildFrontmatter(result: ForecastResult): string {
  return [
    '---',
    `ticker: ${result.ticker}`,
    `run_id: ${result.runId}`,
    `generated_at: ${result.generatedAt}`,
    `status: ${result.status}`,
    `quarters: [${result.quartersAnalyzed.join(', ')}]`,
    `confidence_metrics: ${result.confidence_scores.metrics.toFixed(2)}`,
    `confidence_analysis: ${result.confidence_scores.analysis.toFixed(2)}`,
    '---',
    '',
  ].join('\n');
}

function buildMetricsTable(result: ForecastResult): string {
  const entries = Object.entries(result.metrics);
  if (entries.length === 0) return '## Metrics\n\n_No metrics extracted._';

  const rows = entries.map(([name, m]) =>
    `| ${name} | ${formatValue(m.value)} | ${m.unit} | ${m.period} | ${m.confidence.toFixed(2)} | ${m.strategy} | ${m.sourceDocumentId} |`);
  return [
    '## Metrics',
    '',
    '| Metric | Value | Unit | Period | Confidence | Strategy | Source |',
    '|---|---:|---|---|---:|---|---|',
    ...rows,
  ].join('\n');
}

function buildThemes(q: Qualitative): string {
  if (q.key_themes.length === 0) return '## Key themes\n\n_No themes identified._';
  return [
    '## Key themes',
    '',
    ...q.key_themes.map(t =>
      `- **${t.theme}** (${formatSigned(t.sentiment)}, confidence ${t.confidence.toFixed(2)}): ${t.summary} ${cite(t.sources)}`),
  ].join('\n');
}

function buildProjections(q: Qualitative): string | undefined {
  if (q.projections.length === 0) return undefined;
  return [
    '## Projections',
    '',
    ...q.projections.map(p => `- ${DIRECTION_ARROWS[p.direction]} **${p.metric}**: ${p.rationale} ${cite(p.sources)}`),
  ].join('\n');
}

function buildEvidence(result: ForecastResult): string {
  if (result.evidence.length === 0) return '## Evidence\n\n_None._';
  return [
    '## Evidence',
    '',
    ...result.evidence.map((e, i) => {
      const source = e.sourceDocumentId ? ` [${e.sourceDocumentId}]` : '';
      return `${i + 1}. _${e.kind}_ **${e.ref}**${source}: ${e.detail}`;
    }),
  ].join('\n');
}

function cite(sources: readonly string[]): string {
  return sources.map(s => `[${s}]`).join('');
}

function formatSigned(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}`;
}

function formatValue(n: number): string {
  return Number.isInteger(n) ? n.toLocaleString('en-IN') : n.toLocaleString('en-IN', { maximumFractionDigits: 2 });
}
