import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

/**
 * The first instant of a month and the first instant of the following month, in UTC
 * @param month - Month number, 1 to 12
 * @param year - Four digit year
 */
export function getMonthRange(month: number, year: number): { from: Date; to: Date } {
  const start = dayjs.utc(Date.UTC(year, month - 1, 1));
  return { from: start.toDate(), to: start.add(1, 'month').toDate() };
}

/**
 * Budget display name, e.g. "January 2025"
 */
export function getBudgetName(month: number, year: number): string {
  return dayjs.utc(Date.UTC(year, month - 1, 1)).format('MMMM YYYY');
}

export function getCurrentMonth(now: Date = new Date()): { month: number; year: number } {
  const today = dayjs.utc(now);
  return { month: today.month() + 1, year: today.year() };
}

export function isBefore(date1: Date, date2: Date): boolean {
  return dayjs(date1).isBefore(dayjs(date2));
}
