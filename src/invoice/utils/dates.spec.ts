import { addDays, parseIsoDate, toIsoDate } from './dates';

describe('dates', () => {
  it('formats the local calendar date', () => {
    expect(toIsoDate(new Date(2026, 0, 5, 23, 59))).toBe('2026-01-05');
  });

  it('adds days across a month boundary', () => {
    expect(toIsoDate(addDays(new Date(2026, 1, 25), 7))).toBe('2026-03-04');
  });

  it('accepts real calendar dates only', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
    expect(parseIsoDate('2026-02-29')).toBeUndefined();
    expect(parseIsoDate('2026-13-01')).toBeUndefined();
    expect(parseIsoDate('2026-3-01')).toBeUndefined();
  });
});
