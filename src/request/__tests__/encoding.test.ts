/**
 * Tests for query-string escaping
 */

import { describe, it, expect } from 'vitest';
import { formUrlEncode, toQueryString } from '../encoding.js';

describe('formUrlEncode', () => {
  it('keeps unreserved characters', () => {
    expect(formUrlEncode('AZaz09-_.')).toBe('AZaz09-_.');
  });

  it('encodes spaces as plus', () => {
    expect(formUrlEncode('short task')).toBe('short+task');
  });

  it('percent-encodes reserved characters in uppercase hex', () => {
    expect(formUrlEncode('2014-08-15T12:00:00Z')).toBe('2014-08-15T12%3A00%3A00Z');
    expect(formUrlEncode('a+b/c=')).toBe('a%2Bb%2Fc%3D');
    expect(formUrlEncode('~*\'()')).toBe('%7E%2A%27%28%29');
  });

  it('encodes multi-byte characters as UTF-8', () => {
    expect(formUrlEncode('Café & crème ✓')).toBe('Caf%C3%A9+%26+cr%C3%A8me+%E2%9C%93');
    expect(formUrlEncode('😀')).toBe('%F0%9F%98%80');
  });

  it('returns empty for empty input', () => {
    expect(formUrlEncode('')).toBe('');
  });
});

describe('toQueryString', () => {
  it('escapes values but not names', () => {
    expect(
      toQueryString([
        ['QualificationRequirement.1.Comparator', 'In'],
        ['Title', 'Tag 2 images'],
      ])
    ).toBe('QualificationRequirement.1.Comparator=In&Title=Tag+2+images');
  });
});
