import { describe, expect, it } from 'vitest';
import { formatDateTime, formatShortDate } from '../../src/utils/date.js';

describe('date formatting', () => {
  it('formats in UTC', () => {
    expect(formatShortDate('2024-12-31T23:59:00.000Z')).toBe('Dec 31');
    expect(formatDateTime('2024-03-07T04:05:00.000Z')).toBe('2024-03-07 04:05');
  });

  it('returns unparseable values unchanged', () => {
    expect(formatShortDate('someday')).toBe('someday');
    expect(formatDateTime('')).toBe('');
  });
});
