import { describe, it, expect } from 'vitest';
import {
  buildISODate,
  parseCompactDate,
  parseDutchDate,
  daysBetween,
} from '@rekening/types';

describe('parseCompactDate', () => {
  it('should convert YYYYMMDD to an ISO date', () => {
    expect(parseCompactDate('20231231')).toBe('2023-12-31');
    expect(parseCompactDate('20240229')).toBe('2024-02-29');
  });

  it('should reject dates that are not on the calendar', () => {
    expect(() => parseCompactDate('20230229')).toThrow('Invalid calendar date');
    expect(() => parseCompactDate('20231301')).toThrow('Invalid calendar date');
  });

  it('should reject other formats', () => {
    expect(() => parseCompactDate('2023-12-31')).toThrow('Invalid date format');
    expect(() => parseCompactDate('231231')).toThrow('Invalid date format');
  });
});

describe('parseDutchDate', () => {
  it('should convert DD-MM-YYYY', () => {
    expect(parseDutchDate('01-10-2023')).toBe('2023-10-01');
    expect(parseDutchDate('31-12-2023')).toBe('2023-12-31');
  });

  it('should return null for invalid dates', () => {
    expect(parseDutchDate('31-02-2023')).toBeNull();
    expect(parseDutchDate('2023-12-31')).toBeNull();
  });
});

describe('buildISODate', () => {
  it('should pad parts', () => {
    expect(buildISODate(2021, 1, 5)).toBe('2021-01-05');
  });

  it('should return null for impossible days', () => {
    expect(buildISODate(2021, 4, 31)).toBeNull();
    expect(buildISODate(2021, 0, 1)).toBeNull();
  });
});

describe('daysBetween', () => {
  it('should count whole days', () => {
    expect(daysBetween('2023-12-31', '2024-01-01')).toBe(1);
    expect(daysBetween('2024-03-01', '2024-02-28')).toBe(-2);
  });
});
