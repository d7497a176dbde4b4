const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar day written as YYYY-MM-DD (2025-02-30 is rejected).
 */
export function isCalendarDate(value: unknown): value is string {
  if (typeof value !== 'string') return false;

  const match = CALENDAR_DATE.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}
