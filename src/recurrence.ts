import { DateTime } from "luxon";
import { MAX_LOOKAHEAD_DAYS } from "./constants.js";
import { isValidTimezone, parseTime } from "./validation.js";
import type { Reminder, User } from "./types.js";

export type Evaluation =
  | { due: true; occurrenceId: string; scheduledFor: Date }
  | { due: false; occurrenceId: string };

export interface EvaluateOptions {
  /** Minutes after the scheduled time during which the occurrence still counts as due. */
  windowMinutes?: number;
}

export function isoDate(date: DateTime): string {
  return date.toFormat("yyyy-MM-dd");
}

export function occurrenceIdFor(reminderId: number, localDate: DateTime): string {
  return `${reminderId}:${isoDate(localDate)}`;
}

function zoneOf(reminder: Reminder): string {
  return reminder.timezone && isValidTimezone(reminder.timezone) ? reminder.timezone : "UTC";
}

function atTime(date: DateTime, time: { hour: number; minute: number }, zone: string): DateTime {
  return DateTime.fromObject(
    { year: date.year, month: date.month, day: date.day, hour: time.hour, minute: time.minute },
    { zone },
  );
}

function clampToMonth(month: DateTime, day: number): DateTime {
  return month.set({ day: Math.min(day, month.endOf("month").day) });
}

/** Whether the reminder's schedule selects this local calendar date. */
export function occursOn(reminder: Reminder, localDate: DateTime): boolean {
  switch (reminder.frequency) {
    case "daily":
      return true;
    case "weekly":
      return localDate.weekday === reminder.day;
    case "monthly":
      // Months shorter than the anchor fire on their last day
      return localDate.day === Math.min(reminder.day, localDate.endOf("month").day);
    case "once":
      return isoDate(localDate) === reminder.day;
  }
}

interface OpenOccurrence {
  /** Local calendar date of the occurrence itself. */
  date: DateTime;
  scheduled: DateTime;
}

/**
 * Finds the occurrence whose send time, `leadDays` local days ahead of it,
 * opened within the last `windowMinutes`. A window wider than a minute can run
 * past midnight, so yesterday's send time is checked too.
 */
function openOccurrence(reminder: Reminder, now: Date, windowMinutes: number, leadDays: number): OpenOccurrence | null {
  const time = parseTime(reminder.time);
  if (!time) return null;

  const zone = zoneOf(reminder);
  const local = DateTime.fromJSDate(now, { zone });
  const today = local.startOf("day");
  const currentMinute = local.startOf("minute");

  for (const sendDate of [today, today.minus({ days: 1 })]) {
    const date = sendDate.plus({ days: leadDays });
    if (!occursOn(reminder, date)) continue;
    const scheduled = atTime(sendDate, time, zone);
    const elapsed = currentMinute.diff(scheduled, "minutes").minutes;
    if (elapsed >= 0 && elapsed < windowMinutes) return { date, scheduled };
  }
  return null;
}

/**
 * Decides whether `now` falls inside an occurrence of the reminder, in the
 * reminder's own timezone. The occurrence id is the reminder id plus the
 * local calendar date, so evaluating the same minute twice yields the same id.
 */
export function isDue(reminder: Reminder, now: Date, options: EvaluateOptions = {}): Evaluation {
  const open = openOccurrence(reminder, now, options.windowMinutes ?? 1, 0);
  if (!open) {
    return { due: false, occurrenceId: occurrenceIdFor(reminder.id, DateTime.fromJSDate(now, { zone: zoneOf(reminder) })) };
  }
  return { due: true, occurrenceId: occurrenceIdFor(reminder.id, open.date), scheduledFor: open.scheduled.toJSDate() };
}

export type LeadEvaluation =
  | { due: true; noticeId: string; dueDate: string; scheduledFor: Date }
  | { due: false };

/**
 * Advance notice `offsetDays` before a monthly or one-off bill, sent at the
 * reminder's own time of day. The notice id names the occurrence it announces
 * and the offset: `<id>:<YYYY-MM-DD>:d-<offset>`.
 */
export function isLeadNoticeDue(
  reminder: Reminder,
  now: Date,
  offsetDays: number,
  options: EvaluateOptions = {},
): LeadEvaluation {
  if (reminder.frequency !== "monthly" && reminder.frequency !== "once") return { due: false };
  if (!Number.isInteger(offsetDays) || offsetDays < 1) return { due: false };

  const open = openOccurrence(reminder, now, options.windowMinutes ?? 1, offsetDays);
  if (!open) return { due: false };
  return {
    due: true,
    noticeId: `${occurrenceIdFor(reminder.id, open.date)}:d-${offsetDays}`,
    dueDate: isoDate(open.date),
    scheduledFor: open.scheduled.toJSDate(),
  };
}

/** First scheduled instant at or after `now`, or null when there is none (a past one-off). */
export function nextOccurrence(reminder: Reminder, now: Date): Date | null {
  const time = parseTime(reminder.time);
  if (!time) return null;

  const zone = zoneOf(reminder);
  const local = DateTime.fromJSDate(now, { zone });
  const from = local.startOf("minute").toMillis();
  let date = local.startOf("day");

  for (let i = 0; i <= MAX_LOOKAHEAD_DAYS; i++) {
    if (occursOn(reminder, date)) {
      const scheduled = atTime(date, time, zone);
      if (scheduled.toMillis() >= from) return scheduled.toJSDate();
    }
    date = date.plus({ days: 1 });
  }
  return null;
}

/** A one-off reminder whose occurrence window has fully elapsed. */
export function isExpired(reminder: Reminder, now: Date, windowMinutes = 1): boolean {
  if (reminder.frequency !== "once") return false;
  const time = parseTime(reminder.time);
  if (!time) return false;

  const zone = zoneOf(reminder);
  const closesAt = atTime(DateTime.fromISO(reminder.day, { zone }), time, zone).plus({ minutes: windowMinutes });
  return now.getTime() >= closesAt.toMillis();
}

/**
 * Resolves a day-of-month for a one-off reminder to the first such date whose
 * scheduled time is still ahead of `now`: this month if possible, otherwise next.
 */
export function resolveOnceDay(day: number, time: { hour: number; minute: number }, now: Date, zone: string): string {
  const local = DateTime.fromJSDate(now, { zone });
  const thisMonth = clampToMonth(local.startOf("month"), day);
  if (atTime(thisMonth, time, zone).toMillis() > local.toMillis()) return isoDate(thisMonth);
  return isoDate(clampToMonth(local.startOf("month").plus({ months: 1 }), day));
}

/** Reminder zone, else the owner's zone, else the fallback; unknown zone names are skipped. */
export function resolveTimezone(reminder: Reminder, user: User | undefined, fallback: string): string {
  for (const zone of [reminder.timezone, user?.timezone, fallback]) {
    if (zone && isValidTimezone(zone)) return zone;
  }
  return "UTC";
}

export function localDateOf(now: Date, zone: string): DateTime {
  return DateTime.fromJSDate(now, { zone: isValidTimezone(zone) ? zone : "UTC" }).startOf("day");
}
