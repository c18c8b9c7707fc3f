import { CalendarUtil } from './calendar.util';
import { roundCurrency, roundPercentage } from './money.util';

describe('CalendarUtil', () => {
  it('should count both endpoints of a range', () => {
    expect(CalendarUtil.inclusiveDayCount('2024-03-01', '2024-03-05')).toBe(5);
    expect(CalendarUtil.inclusiveDayCount('2024-03-01', '2024-03-01')).toBe(1);
  });

  it('should count across a leap day', () => {
    expect(CalendarUtil.inclusiveDayCount('2024-02-28', '2024-03-01')).toBe(3);
  });

  it('should compute years from the calendar year only', () => {
    expect(CalendarUtil.yearsSince('1990-12-31', new Date(2024, 0, 1))).toBe(34);
  });

  it('should compare calendar dates', () => {
    expect(CalendarUtil.isBefore('2024-03-01', '2024-03-02')).toBe(true);
    expect(CalendarUtil.isBefore('2024-03-02', '2024-03-02')).toBe(false);
  });

  it('should recognise only existing YYYY-MM-DD dates', () => {
    expect(CalendarUtil.isCalendarDate('2024-02-29')).toBe(true);
    expect(CalendarUtil.isCalendarDate('2023-02-29')).toBe(false);
    expect(CalendarUtil.isCalendarDate('2024-13-01')).toBe(false);
    expect(CalendarUtil.isCalendarDate('2024-3-1')).toBe(false);
    expect(CalendarUtil.isCalendarDate('not-a-date')).toBe(false);
  });
});

describe('money helpers', () => {
  it('should round to two decimal places', () => {
    expect(roundCurrency(1234.567)).toBe(1234.57);
    expect(roundPercentage(33.33333)).toBe(33.33);
  });
});
