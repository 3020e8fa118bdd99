import { DateTime } from "luxon";
import { parseTime } from "./validation.js";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface WindowConfig {
  /** "HH:MM"; with `end`, bounds the daily period in which cycles may run. */
  start: string | null;
  end: string | null;
  timezone: string;
  alwaysOn: boolean;
}

export type WindowGate = (now: Date) => boolean;

/**
 * Coarse on/off switch for the scheduler. Without a configured window the
 * gate is always open. The window is [start, end) in local time and may
 * wrap past midnight (e.g. 22:00-06:00).
 */
export function createWindowGate(config: WindowConfig): WindowGate {
  const start = config.start ? parseTime(config.start) : null;
  const end = config.end ? parseTime(config.end) : null;
  if (config.alwaysOn || !start || !end) return () => true;

  const startMinute = start.hour * 60 + start.minute;
  const endMinute = end.hour * 60 + end.minute;

  return (now: Date) => {
    const local = DateTime.fromJSDate(now, { zone: config.timezone });
    const minute = local.hour * 60 + local.minute;
    if (startMinute === endMinute) return true;
    if (startMinute < endMinute) return minute >= startMinute && minute < endMinute;
    return minute >= startMinute || minute < endMinute;
  };
}
