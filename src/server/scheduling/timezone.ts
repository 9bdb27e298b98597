/**
 * Wall-clock arithmetic in a named IANA zone, using only Intl.
 */

export type CalendarDate = {
  year: number;
  month: number; // 1-12
  day: number;
};

export type WallClock = CalendarDate & {
  hour: number;
  minute: number;
  second: number;
  /** 0 = Monday ... 6 = Sunday */
  weekday: number;
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let f = formatters.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, f);
  }
  return f;
}

/** Monday-based weekday of a calendar date. */
export function weekdayOf(date: CalendarDate): number {
  const sundayBased = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return (sundayBased + 6) % 7;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function isValidDate(date: CalendarDate): boolean {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day));
  return (
    d.getUTCFullYear() === date.year && d.getUTCMonth() + 1 === date.month && d.getUTCDate() === date.day
  );
}

export function zonedParts(instant: Date, timeZone: string): WallClock {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== "literal") values[part.type] = Number(part.value);
  }

  const date = { year: values.year, month: values.month, day: values.day };
  return {
    ...date,
    // some engines still print midnight as 24 under h23
    hour: values.hour === 24 ? 0 : values.hour,
    minute: values.minute,
    second: values.second,
    weekday: weekdayOf(date),
  };
}

function offsetMs(instant: Date, timeZone: string): number {
  const p = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const whole = instant.getTime() - instant.getUTCMilliseconds();
  return asUtc - whole;
}

/** Instant at which the zone's clock shows the given wall-clock time. */
export function zonedTimeToUtc(
  local: CalendarDate & { hour: number; minute?: number },
  timeZone: string
): Date {
  const guess = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute ?? 0);
  const first = offsetMs(new Date(guess), timeZone);
  let ts = guess - first;

  const second = offsetMs(new Date(ts), timeZone);
  if (second !== first) ts = guess - second;

  return new Date(ts);
}
