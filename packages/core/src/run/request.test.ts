import { describe, it, expect } from 'vitest';
import { parseRunRequest } from './request.js';
import { InputInvalidError } from '../errors.js';

function issuesOf(input: unknown): string[] {
  try {
    parseRunRequest(input, 'TCS');
  } catch (err) {
    if (err instanceof InputInvalidError) return err.issues;
    throw err;
  }
  return [];
}

describe('parseRunRequest', () => {
  it('accepts a valid request and applies the default ticker', () => {
    const request = parseRunRequest({ quarters: 3, sources: ['screener', 'company-ir'] }, 'tcs');
    expect(request).toEqual({ quarters: 3, sources: ['screener', 'company-ir'], ticker: 'TCS' });
  });

  it('freezes the accepted request', () => {
    const request = parseRunRequest({ quarters: 1, sources: ['screener'] }, 'TCS');
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.sources)).toBe(true);
  });

  it('trims sources and upper-cases an explicit ticker', () => {
    const request = parseRunRequest({ quarters: 1, sources: ['  screener '], ticker: 'infy' }, 'TCS');
    expect(request.sources).toEqual(['screener']);
    expect(request.ticker).toBe('INFY');
  });

  it('rejects a non-positive or fractional quarter count', () => {
    expect(issuesOf({ quarters: 0, sources: ['screener'] })).toEqual([
      'quarters: Number must be greater than or equal to 1',
    ]);
    expect(issuesOf({ quarters: 1.5, sources: ['screener'] })).toEqual([
      'quarters: Expected integer, received float',
    ]);
  });

  it('rejects more than twelve quarters', () => {
    expect(issuesOf({ quarters: 13, sources: ['screener'] })).toEqual([
      'quarters: Number must be less than or equal to 12',
    ]);
  });

  it('rejects empty and duplicate sources', () => {
    expect(issuesOf({ quarters: 1, sources: [] })).toEqual([
      'sources: Array must contain at least 1 element(s)',
    ]);
    expect(issuesOf({ quarters: 1, sources: ['screener', 'screener'] })).toEqual([
      'sources.1: duplicate source "screener"',
    ]);
  });

  it('rejects unknown keys', () => {
    expect(issuesOf({ quarters: 1, sources: ['screener'], extra: true })).toEqual([
      "Unrecognized key(s) in object: 'extra'",
    ]);
  });

  it('rejects a body that is not an object', () => {
    expect(issuesOf('forecast please')).toEqual(['Expected object, received string']);
  });
});
