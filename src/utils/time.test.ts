import { describe, expect, it } from 'vitest';
import { toUnixSeconds } from './time.js';

describe('toUnixSeconds', () => {
  it('floors numbers and numeric strings', () => {
    expect(toUnixSeconds(1614556869.9)).toBe(1614556869);
    expect(toUnixSeconds('1619654469')).toBe(1619654469);
  });

  it('parses ISO dates', () => {
    expect(toUnixSeconds('2021-03-01T00:00:00Z')).toBe(1614556800);
  });

  it('rejects unparseable input', () => {
    expect(() => toUnixSeconds('yesterday')).toThrow('Unable to parse time value: yesterday');
    expect(() => toUnixSeconds('')).toThrow('Unable to parse time value: ');
  });
});
