const DAY_MS = 86_400_000;

/** Calendar day in UTC as "YYYY-MM-DD". */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function dayToDate(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/** Whole days from `from` to `to` (both "YYYY-MM-DD"). */
export function daysBetween(from: string, to: string): number {
  return Math.round((dayToDate(to).getTime() - dayToDate(from).getTime()) / DAY_MS);
}

export function addDays(day: string, days: number): string {
  return utcDay(new Date(dayToDate(day).getTime() + days * DAY_MS));
}

/** Monday of the ISO week containing `day`. */
export function weekMonday(day: string): string {
  const date = dayToDate(day);
  const offset = (date.getUTCDay() + 6) % 7;
  return addDays(day, -offset);
}

/** ISO-8601 week key, e.g. "2025-W40". Week 1 holds the year's first Thursday. */
export function isoWeek(day: string): string {
  const monday = weekMonday(day);
  const thursday = dayToDate(addDays(monday, 3));
  const year = thursday.getUTCFullYear();
  const week = 1 + Math.floor((thursday.getTime() - Date.UTC(year, 0, 1)) / DAY_MS / 7);
  return `${year}-W${String(week).padStart(2, "0")}`;
}

/** Monday date of an ISO week key. */
export function isoWeekStart(week: string): string {
  const match = /^(\d{4})-W(\d{2})$/.exec(week);
  if (!match) throw new Error(`Not an ISO week: ${week}`);
  const year = parseInt(match[1], 10);
  const n = parseInt(match[2], 10);
  // January 4th always falls in week 1.
  const weekOneMonday = weekMonday(utcDay(new Date(Date.UTC(year, 0, 4))));
  return addDays(weekOneMonday, (n - 1) * 7);
}

export function previousIsoWeek(week: string): string {
  return isoWeek(addDays(isoWeekStart(week), -7));
}
