import {
  dayOf,
  daysBetween,
  endOfDayExclusive,
  getDateRange,
  isIsoDay,
  parseTimestamp
} from '../dates';

describe('dates', () => {
  describe('isIsoDay', () => {
    it('should accept real calendar days only', () => {
      expect(isIsoDay('2024-02-29')).toBe(true);
      expect(isIsoDay('2023-02-29')).toBe(false);
      expect(isIsoDay('2024-1-05')).toBe(false);
    });
  });

  describe('parseTimestamp', () => {
    it('should read the formats upstream payloads use', () => {
      expect(parseTimestamp('2024-01-03')).toEqual(new Date('2024-01-03T00:00:00Z'));
      expect(parseTimestamp('2024-01-03 10:15:00')).toEqual(new Date('2024-01-03T10:15:00Z'));
      expect(parseTimestamp('Wed, 03 Jan 2024 10:00:00 GMT')).toEqual(new Date('2024-01-03T10:00:00Z'));
      expect(parseTimestamp(1704456000)).toEqual(new Date('2024-01-05T12:00:00Z'));
      expect(parseTimestamp(1704456000000)).toEqual(new Date('2024-01-05T12:00:00Z'));
    });

    it('should return undefined for missing or unparsable values', () => {
      expect(parseTimestamp(undefined)).toBeUndefined();
      expect(parseTimestamp('  ')).toBeUndefined();
      expect(parseTimestamp('yesterday-ish')).toBeUndefined();
      expect(parseTimestamp(new Date('nope'))).toBeUndefined();
    });
  });

  describe('getDateRange', () => {
    it('should return an inclusive window ending on the given day', () => {
      expect(getDateRange(1, new Date('2024-03-01T23:59:00Z'))).toEqual({
        fromDate: '2024-03-01',
        toDate: '2024-03-01'
      });
      expect(getDateRange(2, new Date('2024-03-01T00:00:00Z'))).toEqual({
        fromDate: '2024-02-29',
        toDate: '2024-03-01'
      });
    });
  });

  it('should compute day boundaries and distances in UTC', () => {
    expect(endOfDayExclusive('2024-01-07')).toEqual(new Date('2024-01-08T00:00:00Z'));
    expect(daysBetween(new Date('2024-01-08T00:00:00Z'), new Date('2024-01-06T12:00:00Z'))).toBe(1.5);
    expect(dayOf(new Date('2024-01-05T23:00:00Z'))).toBe('2024-01-05');
    expect(dayOf(undefined)).toBeUndefined();
  });
});
