const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Calendar helpers for `YYYY-MM-DD` date columns
 */
export class CalendarUtil {
  /**
   * Year component of a calendar date
   */
  static yearOf(date: string): number {
    return Number.parseInt(date.slice(0, 4), 10);
  }

  static currentYear(now: Date = new Date()): number {
    return now.getFullYear();
  }

  /**
   * Whole years between the year of `date` and the current year (month and day are ignored)
   */
  static yearsSince(date: string, now: Date = new Date()): number {
    return CalendarUtil.currentYear(now) - CalendarUtil.yearOf(date);
  }

  /**
   * Number of days covered by a range, counting both endpoints
   */
  static inclusiveDayCount(start: string, end: string): number {
    return Math.round((Date.parse(end) - Date.parse(start)) / MS_PER_DAY) + 1;
  }

  /**
   * True for an existing `YYYY-MM-DD` date; rejects impossible days such as 2024-02-30
   */
  static isCalendarDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
      return false;
    }
    const time = Date.parse(value);
    return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
  }

  static isBefore(date: string, other: string): boolean {
    return Date.parse(date) < Date.parse(other);
  }
}
