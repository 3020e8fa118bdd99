import { DateTime, IANAZone } from "luxon";
import { z } from "zod";
import { WEEKDAYS } from "./constants.js";
import type { LogEntry, Reminder, User } from "./types.js";

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function parseTime(value: string): { hour: number; minute: number } | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

export function normalizeTime(value: string): string | null {
  const parsed = parseTime(value);
  if (!parsed) return null;
  return `${String(parsed.hour).padStart(2, "0")}:${String(parsed.minute).padStart(2, "0")}`;
}

export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

export function parseWeekday(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 1 && value <= 7 ? value : null;
  }
  if (typeof value !== "string") return null;
  const trimmed = value.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) return parseWeekday(Number(trimmed));
  return WEEKDAYS[trimmed] ?? null;
}

export function isCalendarDate(value: string): boolean {
  return DATE_PATTERN.test(value) && DateTime.fromISO(value).isValid;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join(".") || "value"}: ${issue.message}`);
}

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

export const timeSchema = z.string().transform((value, ctx) => {
  const normalized = normalizeTime(value);
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid HH:MM time` });
    return z.NEVER;
  }
  return normalized;
});

export const timezoneSchema = z.string().trim().refine(isValidTimezone, zone => ({
  message: `"${zone}" is not a known IANA timezone`,
}));

const frequencySchema = z.enum(["once", "daily", "weekly", "monthly"]);

// Rows imported from older spreadsheet exports carry "TRUE"/"FALSE" and "" for empty cells
const emptyToNull = (value: unknown) => (value === "" || value === undefined ? null : value);

const booleanCell = z.preprocess(
  value => (typeof value === "string" ? value.trim().toUpperCase() === "TRUE" : value),
  z.boolean(),
);

const optionalDate = z.preprocess(emptyToNull, z.coerce.date().nullable());

const weekdayDay = z.preprocess(value => parseWeekday(value) ?? value, z.number().int().min(1).max(7));
const monthDay = z.coerce.number().int().min(1).max(31);
const onceDay = z.string().refine(isCalendarDate, { message: "expected a YYYY-MM-DD date" });

const reminderBaseShape = {
  id: z.coerce.number().int().positive(),
  user_id: z.coerce.number().int(),
  text: z.string().min(1),
  time: timeSchema,
  timezone: z.preprocess(emptyToNull, z.string().nullable()),
  active: booleanCell,
  created_at: z.coerce.date(),
  last_sent: optionalDate,
  deactivated_reason: z.preprocess(
    emptyToNull,
    z.enum(["sent_once", "channel_permanent", "expired", "user_disabled"]).nullable(),
  ),
};

export const reminderRowSchema = z.discriminatedUnion("frequency", [
  z.object({ ...reminderBaseShape, frequency: z.literal("daily"), day: z.unknown().transform((): null => null) }),
  z.object({ ...reminderBaseShape, frequency: z.literal("weekly"), day: weekdayDay }),
  z.object({ ...reminderBaseShape, frequency: z.literal("monthly"), day: monthDay }),
  z.object({ ...reminderBaseShape, frequency: z.literal("once"), day: onceDay }),
]);

export const userRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.preprocess(value => value ?? "", z.string()),
  timezone: z.string().min(1),
  created_at: z.coerce.date(),
});

export const logEntryRowSchema = z.object({
  reminder_id: z.coerce.number().int().positive(),
  occurrence_id: z.string().min(1),
  user_id: z.coerce.number().int(),
  sent_at: z.coerce.date(),
});

export function parseReminderRow(row: unknown): Reminder | null {
  const result = reminderRowSchema.safeParse(row);
  return result.success ? result.data : null;
}

export function parseUserRow(row: unknown): User | null {
  const result = userRowSchema.safeParse(row);
  return result.success ? result.data : null;
}

export function parseLogEntryRow(row: unknown): LogEntry | null {
  const result = logEntryRowSchema.safeParse(row);
  return result.success ? result.data : null;
}

// ---------------------------------------------------------------------------
// Service input
// ---------------------------------------------------------------------------

export const reminderInputSchema = z
  .object({
    text: z.string().trim().min(1, "text is required").max(500),
    time: timeSchema,
    frequency: frequencySchema,
    day: z.union([z.number(), z.string(), z.null()]).optional(),
    timezone: timezoneSchema.optional(),
  })
  .superRefine((input, ctx) => {
    const day = input.day ?? null;
    switch (input.frequency) {
      case "daily":
        return;
      case "weekly":
        if (parseWeekday(day) === null) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["day"], message: "weekly reminders need a weekday (1-7 or mon..sun)" });
        }
        return;
      case "monthly":
        if (!isDayOfMonth(day)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["day"], message: "monthly reminders need a day of month 1-31" });
        }
        return;
      case "once":
        if (!isDayOfMonth(day) && !(typeof day === "string" && isCalendarDate(day))) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["day"], message: "once reminders need a YYYY-MM-DD date or a day of month 1-31" });
        }
        return;
    }
  });

export type ReminderInput = z.input<typeof reminderInputSchema>;

export function isDayOfMonth(value: unknown): boolean {
  const n = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value) : value;
  return typeof n === "number" && Number.isInteger(n) && n >= 1 && n <= 31;
}
