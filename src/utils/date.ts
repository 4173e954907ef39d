const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Returns today's date as YYYY-MM-DD (UTC). */
export function todayDateString(now: Date = new Date()): string {
  return now.toISOString().split('T')[0]!;
}

/** Returns the day before `now` as YYYY-MM-DD (UTC). */
export function yesterdayDateString(now: Date = new Date()): string {
  const d = new Date(now.getTime());
  d.setUTCDate(d.getUTCDate() - 1);
  return todayDateString(d);
}

/** True for a real calendar date in YYYY-MM-DD form ('2025-02-30' is rejected). */
export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(value);
}

/** '2025-12-11' -> '20251211', the scoreboard's `dates` parameter. */
export function toCompactDate(value: string): string {
  return value.replace(/-/g, '');
}

/**
 * Resolves 'today', 'yesterday' or an explicit YYYY-MM-DD. No argument means yesterday,
 * the most recent slate with final scores. Returns null for anything else.
 */
export function resolveDateArg(arg: string | undefined, now: Date = new Date()): string | null {
  if (arg === undefined || arg === 'yesterday') return yesterdayDateString(now);
  if (arg === 'today') return todayDateString(now);
  return isCalendarDate(arg) ? arg : null;
}
