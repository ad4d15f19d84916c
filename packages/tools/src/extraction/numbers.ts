/**
 * Number tokens as they appear in Indian financial filings:
 * `₹ 1,23,456.7 crore`, `Rs. 12.5`, `(2,340)`, `24.5%`, `$ 1.2 bn`.
 */

export type Scale = 'crore' | 'lakh' | 'million' | 'billion';

export interface NumberToken {
  /** Signed value as written, before any scale conversion. */
  value: number;
  currency: boolean;
  percent: boolean;
  scale?: Scale;
  /** Offsets of the whole token in the scanned text. */
  start: number;
  end: number;
}

/** Crore per one unit of each scale. */
const CRORE_PER_UNIT: Record<Scale, number> = {
  crore: 1,
  lakh: 0.01,
  million: 0.1,
  billion: 100,
};

const TOKEN_PATTERN = new RegExp(
  [
    String.raw`(?<![A-Za-z0-9_,.])`,
    String.raw`(\()?`,
    String.raw`(?:(₹|Rs\.?|INR|\$)\s*)?`,
    String.raw`([-−])?`,
    String.raw`(\d[\d,]*\d|\d)(\.\d+)?`,
    String.raw`(\))?`,
    String.raw`(?:\s*(%|per\s?cent\b|crores?\b|cr\b\.?|lakhs?\b|lacs?\b|mn\b|million\b|bn\b|billion\b))?`,
  ].join(''),
  'gi',
);

function scaleOf(unit: string): Scale | undefined {
  const u = unit.toLowerCase();
  if (u.startsWith('cr')) return 'crore';
  if (u.startsWith('la')) return 'lakh';
  if (u === 'mn' || u === 'million') return 'million';
  if (u === 'bn' || u === 'billion') return 'billion';
  return undefined;
}

function isYearLike(digits: string, token: NumberToken): boolean {
  return !token.currency && !token.percent && token.scale === undefined &&
    /^(19|20)\d{2}$/.test(digits);
}

export interface ScanOptions {
  /** Keep bare four-digit numbers that look like years (default: false). */
  keepYears?: boolean;
}

/**
 * All number tokens in `text`, left to right. Bare four-digit years are
 * skipped unless `keepYears` is set; a value wrapped in parentheses is negative.
 */
export function scanNumbers(text: string, options: ScanOptions = {}): NumberToken[] {
  const tokens: NumberToken[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const [whole, open, currency, sign, digits, fraction, close, unit] = match;
    if (digits === undefined) continue;

    const magnitude = Number(`${digits.replace(/,/g, '')}${fraction ?? ''}`);
    if (!Number.isFinite(magnitude)) continue;

    const negative = sign !== undefined || (open !== undefined && close !== undefined);
    const index = match.index ?? 0;
    const start = index + (open !== undefined && close === undefined ? 1 : 0);
    const token: NumberToken = {
      value: negative ? -magnitude : magnitude,
      currency: currency !== undefined,
      percent: unit !== undefined && (unit === '%' || /^per/i.test(unit)),
      start,
      end: index + whole.length,
    };
    const scale = unit !== undefined ? scaleOf(unit) : undefined;
    if (scale) token.scale = scale;

    if (!options.keepYears && fraction === undefined && isYearLike(digits, token)) continue;
    tokens.push(token);
  }
  return tokens;
}

/**
 * First number token in a value cell, if any. Years are kept: a value cell
 * reading `2045` is an amount, and period headers never reach this.
 */
export function parseCell(cell: string): NumberToken | undefined {
  return scanNumbers(cell, { keepYears: true })[0];
}

/** Whether the token names its currency or scale, as written amounts do. */
export function isMarkedAmount(token: NumberToken): boolean {
  return token.currency || token.scale !== undefined;
}

/** Amount in crore. Unscaled amounts are taken to be in crore already. */
export function toCrore(token: NumberToken): number {
  const factor = token.scale ? CRORE_PER_UNIT[token.scale] : 1;
  return roundTo(token.value * factor, 4);
}

function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
