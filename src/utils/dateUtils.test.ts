import { describe, it, expect } from 'vitest';
import { DateUtils } from './dateUtils';

const utc = (year: number, month: number, day: number) => new Date(Date.UTC(year, month - 1, day));

describe('DateUtils.parseDate', () => {
  it('should parse ISO dates', () => {
    expect(DateUtils.parseDate('2024-01-15')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('2024/3/5')).toEqual(utc(2024, 3, 5));
  });

  it('should accept an ISO date with a time part', () => {
    expect(DateUtils.parseDate('2024-01-15T10:30:00')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('2024-01-15 08:00')).toEqual(utc(2024, 1, 15));
  });

  it('should reject an impossible time', () => {
    expect(DateUtils.parseDate('2024-01-15 25:00')).toBeNull();
  });

  it('should reject dates that do not exist', () => {
    expect(DateUtils.parseDate('2024-02-30')).toBeNull();
    expect(DateUtils.parseDate('2023-13-01')).toBeNull();
  });

  it('should accept leap days only in leap years', () => {
    expect(DateUtils.parseDate('2024-02-29')).toEqual(utc(2024, 2, 29));
    expect(DateUtils.parseDate('2023-02-29')).toBeNull();
  });

  it('should read a year-month as the first of the month', () => {
    expect(DateUtils.parseDate('2024-03')).toEqual(utc(2024, 3, 1));
  });

  it('should parse compact dates', () => {
    expect(DateUtils.parseDate('20240115')).toEqual(utc(2024, 1, 15));
  });

  it('should parse US dates month first', () => {
    expect(DateUtils.parseDate('01/02/2024')).toEqual(utc(2024, 1, 2));
    expect(DateUtils.parseDate('03/15/24')).toEqual(utc(2024, 3, 15));
  });

  it('should accept US and month-name dates with a time part', () => {
    expect(DateUtils.parseDate('01/15/2024 00:00')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('02/15/24 13:45:10')).toEqual(utc(2024, 2, 15));
    expect(DateUtils.parseDate('15-Jan-2024 08:30')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('Jan 15, 2024 08:30')).toEqual(utc(2024, 1, 15));
  });

  it('should reject a US date with an impossible time', () => {
    expect(DateUtils.parseDate('01/15/2024 24:00')).toBeNull();
    expect(DateUtils.parseDate('01/15/2024 10:75')).toBeNull();
  });

  it('should fall back to day first when the first part cannot be a month', () => {
    expect(DateUtils.parseDate('15/01/2024')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('13/13/2024')).toBeNull();
  });

  it('should parse month names', () => {
    expect(DateUtils.parseDate('15-Jan-2024')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('Jan 15, 2024')).toEqual(utc(2024, 1, 15));
    expect(DateUtils.parseDate('March 2024')).toEqual(utc(2024, 3, 1));
  });

  it('should reject unknown month names', () => {
    expect(DateUtils.parseDate('Foo 2024')).toBeNull();
  });

  it('should return null for text and blanks', () => {
    expect(DateUtils.parseDate('not a date')).toBeNull();
    expect(DateUtils.parseDate('')).toBeNull();
    expect(DateUtils.parseDate('   ')).toBeNull();
    expect(DateUtils.parseDate(null)).toBeNull();
  });
});

describe('DateUtils.monthSequence', () => {
  it('should list every month across a year boundary', () => {
    expect(DateUtils.monthSequence(utc(2023, 11, 15), utc(2024, 2, 1))).toEqual([
      '2023-11',
      '2023-12',
      '2024-01',
      '2024-02',
    ]);
  });

  it('should return a single month when both dates share it', () => {
    expect(DateUtils.monthSequence(utc(2024, 5, 1), utc(2024, 5, 31))).toEqual(['2024-05']);
  });
});

describe('DateUtils formatting', () => {
  it('should format month and date labels', () => {
    expect(DateUtils.formatMonth(utc(2024, 7, 9))).toBe('2024-07');
    expect(DateUtils.formatDate(utc(2024, 7, 9))).toBe('2024-07-09');
  });

  it('should build file stamps from local time', () => {
    expect(DateUtils.fileStamp(new Date(2024, 0, 5, 3, 4, 5))).toBe('20240105_030405');
  });
});
