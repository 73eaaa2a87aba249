const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function anniversary(year: number, month: number, day: number): number {
  // Feb 29 birthdays are celebrated on Feb 28 in common years.
  if (month === 2 && day === 29 && !isLeapYear(year)) {
    return Date.UTC(year, 1, 28);
  }
  return Date.UTC(year, month - 1, day);
}

/**
 * Whole days from `today` (UTC calendar date) until the next anniversary of
 * `birthDate`; 0 when the birthday is today. Null for a malformed date.
 */
export function daysUntilBirthday(birthDate: string, today: Date): number | null {
  const match = DATE_REGEX.exec(birthDate);
  if (!match) return null;
  const month = Number(match[2]);
  const day = Number(match[3]);

  const year = today.getUTCFullYear();
  const start = Date.UTC(year, today.getUTCMonth(), today.getUTCDate());

  let next = anniversary(year, month, day);
  if (next < start) {
    next = anniversary(year + 1, month, day);
  }
  return Math.round((next - start) / DAY_MS);
}

export function isBirthdayWithin(birthDate: string, today: Date, days: number): boolean {
  const until = daysUntilBirthday(birthDate, today);
  return until !== null && until <= days;
}
