import { DateTime, IANAZone } from "luxon";

const DATE_KEY_FORMAT = "yyyy-MM-dd";

export function isValidTimezone(tz: string): boolean {
  return IANAZone.isValidZone(tz);
}

// returns "YYYY-MM-DD" for the calendar day `d` falls on in `tz`
export function dateKeyInTz(tz: string, d: Date = new Date()): string {
  const dt = DateTime.fromJSDate(d, { zone: tz });
  if (!dt.isValid) throw new Error(`Invalid timezone: ${tz}`);
  return dt.toFormat(DATE_KEY_FORMAT);
}

// given "YYYY-MM-DD", return the key `days` later (negative for earlier)
export function shiftDateKey(dateKey: string, days: number): string {
  const dt = DateTime.fromISO(dateKey, { zone: "utc" });
  if (!dt.isValid) throw new Error(`Invalid date key: ${dateKey}`);
  return dt.plus({ days }).toFormat(DATE_KEY_FORMAT);
}
