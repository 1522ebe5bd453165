/**
 * Local time formatting tests
 */

import { describe, it, expect } from 'vitest';
import { formatLocalDateTime, formatLocalTimestamp, formatUtcOffset } from '../../../src/shared/time.js';

describe('time formatting', () => {
  it('pads local date and time fields', () => {
    const instant = new Date(2026, 0, 5, 7, 3, 9).getTime();

    expect(formatLocalDateTime(instant)).toBe('2026-01-05 07:03');
    expect(formatLocalTimestamp(instant)).toBe('2026-01-05 07:03:09');
  });

  it('writes the offset as ±HH:MM', () => {
    const instant = Date.UTC(2026, 5, 1);
    const minutes = -new Date(instant).getTimezoneOffset();
    const offset = formatUtcOffset(instant);

    expect(offset).toMatch(/^[+-]\d{2}:\d{2}$/);
    const sign = offset.startsWith('-') ? -1 : 1;
    expect(sign * (Number(offset.slice(1, 3)) * 60 + Number(offset.slice(4, 6)))).toBe(minutes);
  });
});
