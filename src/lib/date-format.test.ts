import { describe, it, expect } from 'vitest';
import { formatCompactTimestamp, formatIsoDate, formatLongDate } from './date-format.js';

describe('date-format', () => {
  const date = new Date('2026-03-07T09:05:02Z');

  it('should format a compact UTC timestamp', () => {
    expect(formatCompactTimestamp(date)).toBe('20260307090502');
  });

  it('should format an ISO calendar date', () => {
    expect(formatIsoDate(date)).toBe('2026-03-07');
  });

  it('should format a long date with a zero-padded day', () => {
    expect(formatLongDate(date)).toBe('March 07, 2026');
  });

  it('should use UTC fields near midnight', () => {
    const lateNight = new Date('2025-12-31T23:59:59Z');
    expect(formatCompactTimestamp(lateNight)).toBe('20251231235959');
    expect(formatLongDate(lateNight)).toBe('December 31, 2025');
  });
});
