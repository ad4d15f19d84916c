import { loadStopwords } from '../data.js';

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z][a-z0-9']*/g) ?? []).map(t => t.replace(/'s?$/, ''));
}

/** Tokens with stopwords and one- and two-letter words removed. */
export function contentWords(text: string): string[] {
  const stopwords = loadStopwords();
  return tokenize(text).filter(t => t.length > 2 && !stopwords.has(t));
}
