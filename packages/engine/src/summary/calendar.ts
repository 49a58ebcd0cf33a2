import { InvalidParameterError } from '../errors.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface YearMonthDay {
  year: number;
  month: number;
  day: number;
}

export function parseIsoDate(dateStr: string): YearMonthDay {
  const match = ISO_DATE.exec(dateStr);
  if (!match) {
    throw new InvalidParameterError('startDate', `Expected a YYYY-MM-DD date, got '${dateStr}'`);
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    throw new InvalidParameterError('startDate', `'${dateStr}' is not a valid calendar date`);
  }
  return { year, month, day };
}

/** Calendar month arithmetic: the day of month never moves the result. */
export function addMonths(dateStr: string, months: number): string {
  const { year, month } = parseIsoDate(dateStr);
  const index = year * 12 + (month - 1) + months;
  const nextYear = Math.floor(index / 12);
  const nextMonth = index - nextYear * 12 + 1;
  return `${nextYear}-${String(nextMonth).padStart(2, '0')}`;
}

export function lastDayOfNextMonth(today: Date = new Date()): string {
  // Day 0 of the month after next is the last day of next month
  const last = new Date(Date.UTC(today.getFullYear(), today.getMonth() + 2, 0));
  return last.toISOString().slice(0, 10);
}

export function formatMonthLabel(label: string, locale = 'en-US'): string {
  const [y, m] = label.split('-').map(Number);
  const monthName = new Intl.DateTimeFormat(locale, { month: 'long', timeZone: 'UTC' }).format(
    new Date(Date.UTC(y, m - 1, 1)),
  );
  return `${monthName}/${y}`;
}
