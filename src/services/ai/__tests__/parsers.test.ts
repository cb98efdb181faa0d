import { describe, expect, it } from 'vitest';

import { parseDate } from '../date.parser.js';
import { normalizeTime } from '../time.parser.js';

describe('normalizeTime', () => {
  it.each([
    ['9am', '9:00 AM'],
    ['at 9:30 AM please', '9:30 AM'],
    ['2 pm works', '2:00 PM'],
    ['12 pm', '12:00 PM'],
    ['12:15 am', '12:15 AM'],
    ['14:30', '2:30 PM'],
    ['00:05', '12:05 AM'],
    ['meet at 09:00', '9:00 AM'],
  ])('normalizes %s to %s', (input, expected) => {
    expect(normalizeTime(input)).toBe(expected);
  });

  it('returns undefined when there is no clock time', () => {
    expect(normalizeTime('sometime in the evening')).toBeUndefined();
    expect(normalizeTime('')).toBeUndefined();
  });

  it('rejects out-of-range hours and minutes', () => {
    expect(normalizeTime('13pm')).toBeUndefined();
    expect(normalizeTime('9:75 am')).toBeUndefined();
    expect(normalizeTime('24:00')).toBeUndefined();
  });
});

describe('parseDate', () => {
  const today = '2024-02-28';

  it('resolves relative words against the reference day', () => {
    expect(parseDate('today please', today)).toBe('2024-02-28');
    expect(parseDate('Tomorrow works', today)).toBe('2024-02-29');
  });

  it('prefers today over an explicit literal', () => {
    expect(parseDate('today or 2099-01-01', today)).toBe('2024-02-28');
  });

  it('parses day-first slash dates', () => {
    expect(parseDate('on 31/12/2099', today)).toBe('2099-12-31');
    expect(parseDate('on 5/3/25', today)).toBe('2025-03-05');
  });

  it('parses ISO dates', () => {
    expect(parseDate('on 2099-1-9 at noon', today)).toBe('2099-01-09');
  });

  it('treats malformed literals as no match', () => {
    expect(parseDate('31/02/2099', today)).toBeUndefined();
    expect(parseDate('1/2/123', today)).toBeUndefined();
    expect(parseDate('2099-13-01', today)).toBeUndefined();
    expect(parseDate('someday', today)).toBeUndefined();
  });

  it('matches relative words only at a word start', () => {
    expect(parseDate('nottoday', today)).toBeUndefined();
    expect(parseDate('todays slots', today)).toBe(today);
  });
});
