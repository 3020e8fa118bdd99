import cron from "node-cron";
import { z } from "zod";
import { DEFAULT_LEAD_NOTICE_DAYS, DEFAULT_TIMEZONE } from "./constants.js";
import { ConfigError } from "./errors.js";
import { formatIssues, normalizeTime, timezoneSchema } from "./validation.js";
import type { RetryPolicy } from "./cron/retry.js";
import type { WindowConfig } from "./window.js";

export interface AppConfig {
  telegramToken: string | null;
  mongoUri: string;
  cronSchedule: string;
  dueWindowMinutes: number;
  dispatchConcurrency: number;
  retry: RetryPolicy;
  defaultTimezone: string;
  window: WindowConfig;
  dailyStatusSchedule: string | null;
  /** Days ahead of a monthly or one-off due date to send a notice; empty disables notices. */
  leadNoticeDays: number[];
}

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const flag = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform(value => ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase())),
);

const cronExpression = z.string().refine(expr => cron.validate(expr), expr => ({
  message: `"${expr}" is not a valid cron expression`,
}));

const clockTime = z
  .string()
  .optional()
  .refine(value => value === undefined || normalizeTime(value) !== null, { message: "expected HH:MM" });

const leadNoticeDays = z.union([
  z.literal("off").transform((): number[] => []),
  z
    .string()
    .transform(value => value.split(",").map(part => part.trim()))
    .pipe(z.array(z.coerce.number().int().min(1).max(28))),
]);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .refine(token => token.includes(":"), { message: "does not look like a BotFather token" })
      .optional(),
  ),
  MONGO_URI: z.preprocess(blankToUndefined, z.string().default("mongodb://localhost:27017/bill_reminders")),
  CRON_SCHEDULE: z.preprocess(blankToUndefined, cronExpression.default("*/15 * * * * *")),
  DUE_WINDOW_MINUTES: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(720).default(1)),
  DISPATCH_CONCURRENCY: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(32).default(4)),
  RETRY_MAX_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(20).default(3)),
  RETRY_BASE_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(15_000)),
  RETRY_MAX_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(120_000)),
  DEFAULT_TIMEZONE: z.preprocess(blankToUndefined, timezoneSchema.default(DEFAULT_TIMEZONE)),
  WINDOW_START: z.preprocess(blankToUndefined, clockTime),
  WINDOW_END: z.preprocess(blankToUndefined, clockTime),
  WINDOW_TIMEZONE: z.preprocess(blankToUndefined, timezoneSchema.optional()),
  ALWAYS_ON: flag,
  DAILY_STATUS_SCHEDULE: z.preprocess(
    blankToUndefined,
    z.union([z.literal("off"), cronExpression]).default("35 7 * * *"),
  ),
  LEAD_NOTICE_DAYS: z.preprocess(blankToUndefined, leadNoticeDays.default(DEFAULT_LEAD_NOTICE_DAYS.join(","))),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) throw new ConfigError(formatIssues(result.error));
  const parsed = result.data;

  const issues: string[] = [];
  if ((parsed.WINDOW_START === undefined) !== (parsed.WINDOW_END === undefined)) {
    issues.push("WINDOW_START and WINDOW_END must be set together");
  }
  if (parsed.RETRY_MAX_DELAY_MS < parsed.RETRY_BASE_DELAY_MS) {
    issues.push("RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS");
  }
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    telegramToken: parsed.TELEGRAM_BOT_TOKEN ?? null,
    mongoUri: parsed.MONGO_URI,
    cronSchedule: parsed.CRON_SCHEDULE,
    dueWindowMinutes: parsed.DUE_WINDOW_MINUTES,
    dispatchConcurrency: parsed.DISPATCH_CONCURRENCY,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },
    defaultTimezone: parsed.DEFAULT_TIMEZONE,
    window: {
      start: parsed.WINDOW_START ?? null,
      end: parsed.WINDOW_END ?? null,
      timezone: parsed.WINDOW_TIMEZONE ?? parsed.DEFAULT_TIMEZONE,
      alwaysOn: parsed.ALWAYS_ON,
    },
    dailyStatusSchedule: parsed.DAILY_STATUS_SCHEDULE === "off" ? null : parsed.DAILY_STATUS_SCHEDULE,
    leadNoticeDays: [...new Set(parsed.LEAD_NOTICE_DAYS)].sort((a, b) => b - a),
  };
}
