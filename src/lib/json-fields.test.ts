import { describe, it, expect } from 'vitest';
import { isRecord, optionalNumber, optionalString, stringArray } from './json-fields';

describe('json field helpers', () => {
  it('recognizes plain objects only', () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('text')).toBe(false);
  });

  it('keeps values of the expected type', () => {
    expect(optionalString('x')).toBe('x');
    expect(optionalString(1)).toBeUndefined();
    expect(optionalNumber(215)).toBe(215);
    expect(optionalNumber(Number.NaN)).toBeUndefined();
    expect(optionalNumber('215')).toBeUndefined();
  });

  it('filters string arrays', () => {
    expect(stringArray(['music', 3, 'pop'])).toEqual(['music', 'pop']);
    expect(stringArray('music')).toBeUndefined();
  });
});
