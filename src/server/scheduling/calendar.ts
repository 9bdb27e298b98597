import type { StoredRecord } from "@/lib/airtable";
import { logger } from "@/lib/logger";
import { readField } from "@/server/records/service-records";
import {
  addDays,
  isValidDate,
  weekdayOf,
  zonedParts,
  zonedTimeToUtc,
  type CalendarDate,
} from "./timezone";

/** A bookable one-hour visit, in service-zone wall-clock time. */
export type LocalSlot = CalendarDate & { hour: number };

export type PreferredTime = LocalSlot & { minute: number };

export const WORK_START_HOUR = 8;
export const WORK_END_HOUR = 17;
export const DAYS_AHEAD = 10;

const WEEKDAY_NAMES = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];

// English and Polish, with and without diacritics, incl. accusative forms ("w środę")
const WEEKDAY_ALIASES: Record<string, number> = {
  monday: 0,
  tuesday: 1,
  wednesday: 2,
  thursday: 3,
  friday: 4,
  saturday: 5,
  sunday: 6,
  "poniedziałek": 0,
  poniedzialek: 0,
  wtorek: 1,
  "środa": 2,
  "środę": 2,
  sroda: 2,
  srode: 2,
  czwartek: 3,
  "piątek": 4,
  piatek: 4,
  sobota: 5,
  "sobotę": 5,
  sobote: 5,
  niedziela: 6,
  "niedzielę": 6,
  niedziele: 6,
};

const pad2 = (n: number) => String(n).padStart(2, "0");

export function sameSlot(a: LocalSlot, b: LocalSlot): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day && a.hour === b.hour;
}

function isOccupied(slot: LocalSlot, occupied: LocalSlot[]): boolean {
  return occupied.some((o) => sameSlot(o, slot));
}

function isWorkingHour(hour: number): boolean {
  return hour >= WORK_START_HOUR && hour <= WORK_END_HOUR;
}

/**
 * Weekday slots 08:00-17:00 for the next ten calendar days, starting tomorrow
 * in the service zone.
 */
export function generateAvailableSlots(now: Date, occupied: LocalSlot[], timeZone: string): LocalSlot[] {
  const today = zonedParts(now, timeZone);
  const slots: LocalSlot[] = [];

  for (let offset = 1; offset <= DAYS_AHEAD; offset++) {
    const date = addDays(today, offset);
    if (weekdayOf(date) >= 5) continue;

    for (let hour = WORK_START_HOUR; hour <= WORK_END_HOUR; hour++) {
      const slot = { ...date, hour };
      if (!isOccupied(slot, occupied)) slots.push(slot);
    }
  }

  return slots;
}

// Airtable returns "2026-10-20T06:00:00.000Z"; hand-entered values may lack the zone.
function parseInstant(value: string): Date | null {
  let text = value.trim();
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(text);
  if (!hasZone && /\d{2}:\d{2}/.test(text)) {
    text = `${text.replace(" ", "T")}Z`;
  }
  const ts = Date.parse(text);
  return Number.isNaN(ts) ? null : new Date(ts);
}

export function occupiedSlotsFromRecords(records: StoredRecord[], timeZone: string): LocalSlot[] {
  const occupied: LocalSlot[] = [];

  for (const record of records) {
    const raw = readField(record.fields, "date_time");
    if (!raw) continue;

    const instant = parseInstant(raw);
    if (!instant) {
      logger.warn(`Error parsing date: ${raw}`, { recordId: record.id });
      continue;
    }

    const p = zonedParts(instant, timeZone);
    occupied.push({ year: p.year, month: p.month, day: p.day, hour: p.hour });
  }

  return occupied;
}

/** "Monday, 20.10.2026 08:00" */
export function formatSlot(slot: LocalSlot): string {
  const name = WEEKDAY_NAMES[weekdayOf(slot)];
  return `${name}, ${pad2(slot.day)}.${pad2(slot.month)}.${slot.year} ${pad2(slot.hour)}:00`;
}

export function toAirtableDateTime(slot: LocalSlot, timeZone: string): string {
  return zonedTimeToUtc(slot, timeZone).toISOString().replace(/\.\d{3}Z$/, "Z");
}

function validClock(hour: number, minute: number): boolean {
  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}

/**
 * "24.10 10:30" or "<weekday> 10:30". Weekdays resolve to their next
 * occurrence; today's weekday at a time already gone means next week.
 */
export function parsePreferredTime(text: string, now: Date, timeZone: string): PreferredTime | null {
  const input = text.trim().toLowerCase();
  const today = zonedParts(now, timeZone);

  const dated = input.match(/(\d{1,2})\.(\d{1,2})\.?\s+(\d{1,2}):(\d{2})/);
  if (dated) {
    const [, d, m, h, min] = dated;
    const date = { year: today.year, month: Number(m), day: Number(d) };
    const hour = Number(h);
    const minute = Number(min);
    if (!isValidDate(date) || !validClock(hour, minute)) return null;
    return { ...date, hour, minute };
  }

  // "Wednesday at 10:00", "w środę o 9:15": the first weekday word and the first clock time
  const weekday = (input.match(/\p{L}+/gu) ?? []).find((word) => Object.hasOwn(WEEKDAY_ALIASES, word));
  const clock = input.match(/(\d{1,2}):(\d{2})/);
  if (weekday !== undefined && clock) {
    const target = WEEKDAY_ALIASES[weekday];
    const hour = Number(clock[1]);
    const minute = Number(clock[2]);
    if (!validClock(hour, minute)) return null;

    // same weekday: today while the time is still ahead, otherwise next week
    let ahead = (target - today.weekday + 7) % 7;
    if (ahead === 0 && hour * 60 + minute <= today.hour * 60 + today.minute) ahead = 7;

    return { ...addDays(today, ahead), hour, minute };
  }

  return null;
}

/** Free whole-hour slots within `hoursRange` of the preferred time. */
export function slotsAround(
  preferred: PreferredTime,
  now: Date,
  occupied: LocalSlot[],
  timeZone: string,
  hoursRange = 2
): LocalSlot[] {
  if (weekdayOf(preferred) >= 5) return [];

  const slots: LocalSlot[] = [];
  for (let hour = preferred.hour - hoursRange; hour <= preferred.hour + hoursRange; hour++) {
    if (!isWorkingHour(hour)) continue;

    const slot: LocalSlot = { year: preferred.year, month: preferred.month, day: preferred.day, hour };
    if (zonedTimeToUtc(slot, timeZone).getTime() <= now.getTime()) continue;
    if (isOccupied(slot, occupied)) continue;
    slots.push(slot);
  }

  return slots;
}
