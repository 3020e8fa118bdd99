import type { Frequency } from "./types.js";

export const FREQUENCIES: readonly Frequency[] = ["once", "daily", "weekly", "monthly"];

export const DEFAULT_TIMEZONE = "Asia/Ho_Chi_Minh";

// ISO weekday numbering, matching luxon's DateTime#weekday
export const WEEKDAYS: Record<string, number> = {
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
  sun: 7, sunday: 7,
};

export const WEEKDAY_LABELS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

// Collection and job names
export const COUNTER_REMINDERS = "reminders";
export const JOB_DAILY_STATUS = "daily_status";
export const JOB_LEAD_NOTICE = "lead_notice";

// Upper bound on how far ahead nextOccurrence searches (covers a leap-year cycle of monthly/weekly rules)
export const MAX_LOOKAHEAD_DAYS = 400;

// Days before a monthly or one-off due date on which an advance notice goes out
export const DEFAULT_LEAD_NOTICE_DAYS = [2, 1];

export const DAILY_STATUS_MESSAGE = "No bills due today. Enjoy your day!";
