#!/usr/bin/env node

/**
 * Bill Reminder admin CLI
 *
 * Usage:
 *   node dist/cli.js <command> [args]
 *
 * Commands:
 *   add-user <id> <name>                          Register a Telegram user
 *   set-timezone <userId> <zone>                  Set a user's IANA timezone
 *   add <userId> <frequency> <time> [day] -- <text>
 *                                                 Create a reminder
 *   list <userId>                                 List a user's reminders with next run
 *   remove <userId> <id>                          Delete a reminder
 *   toggle <userId> <id>                          Pause or resume a reminder
 *   history <userId> <id>                         Show a reminder's send log
 *   run-once                                      Run one cycle now, ignoring the active window
 *
 * Options:
 *   --help, -h                                    Show this help message
 */

import "dotenv/config";
import { loadConfig } from "./config.js";
import { closeDb, configureDb, ensureIndexes } from "./db.js";
import { TelegramChannel } from "./channel/telegram.js";
import { FREQUENCIES } from "./constants.js";
import { ReminderDispatcher } from "./cron/dispatch.js";
import { runReminderCycle } from "./cron/pipeline.js";
import { RetryTracker } from "./cron/retry.js";
import { ReminderValidationError } from "./errors.js";
import { describeSchedule } from "./messages.js";
import { ReminderService } from "./reminders.js";
import { MongoReminderStore } from "./store/mongoStore.js";
import type { AppConfig } from "./config.js";
import type { Frequency } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
Bill Reminder admin CLI

Usage:
  node dist/cli.js <command> [args]

Commands:
  add-user <id> <name>                          Register a Telegram user
  set-timezone <userId> <zone>                  Set a user's IANA timezone
  add <userId> <frequency> <time> [day] -- <text>
                                                Create a reminder (frequency: ${FREQUENCIES.join(", ")})
  list <userId>                                 List a user's reminders with next run
  remove <userId> <id>                          Delete a reminder
  toggle <userId> <id>                          Pause or resume a reminder
  history <userId> <id>                         Show a reminder's send log
  run-once                                      Run one cycle now, ignoring the active window

Options:
  --help, -h                                    Show this help message

Env vars:
  MONGO_URI                MongoDB connection string
  TELEGRAM_BOT_TOKEN       Bot token (run-once only)
  DEFAULT_TIMEZONE         Zone for new users (default: Asia/Ho_Chi_Minh)
  LEAD_NOTICE_DAYS         Advance notice days before due dates (default: 2,1; "off" disables)
  `.trim());
}

function fail(message: string, usage?: string): never {
  console.error(`[cli] Error: ${message}`);
  if (usage) console.error(`  Usage: node dist/cli.js ${usage}`);
  process.exit(1);
}

function intArg(value: string | undefined, name: string, usage: string): number {
  if (value === undefined || !/^-?\d+$/.test(value)) fail(`${name} must be an integer`, usage);
  return Number(value);
}

function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some(f => f === value);
}

function loadOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`[cli] ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function addReminder(service: ReminderService, args: string[]): Promise<void> {
  const usage = "add <userId> <frequency> <time> [day] -- <text>";
  const separator = args.indexOf("--");
  if (separator === -1) fail("reminder text must follow --", usage);

  const head = args.slice(0, separator);
  const text = args.slice(separator + 1).join(" ");
  const userId = intArg(head[0], "userId", usage);
  const frequency = head[1];
  if (!frequency || !isFrequency(frequency)) fail(`frequency must be one of ${FREQUENCIES.join(", ")}`, usage);
  const time = head[2];
  if (!time) fail("time is required", usage);

  const reminder = await service.createReminder(userId, { text, time, frequency, day: head[3] ?? null });
  console.log(`[cli] Created reminder ${reminder.id}: ${reminder.text} (${describeSchedule(reminder)})`);
}

async function runOnce(config: AppConfig, store: MongoReminderStore): Promise<void> {
  if (!config.telegramToken) fail("TELEGRAM_BOT_TOKEN not set");
  const channel = TelegramChannel.fromToken(config.telegramToken);
  const dispatcher = new ReminderDispatcher({
    store,
    channel,
    retry: new RetryTracker(config.retry),
    concurrency: config.dispatchConcurrency,
  });
  const leadNotices =
    config.leadNoticeDays.length > 0
      ? { store, channel, concurrency: config.dispatchConcurrency, offsets: config.leadNoticeDays }
      : undefined;
  const result = await runReminderCycle(
    {
      store,
      dispatcher,
      select: { windowMinutes: config.dueWindowMinutes, defaultTimezone: config.defaultTimezone },
      leadNotices,
    },
    { now: new Date(), windowOpen: true },
  );
  if (result.status !== "completed") return;

  console.log("\n--- Cycle Complete ---");
  console.log(`  Due:     ${result.due}`);
  console.log(`  Sent:    ${result.report.sent.length}`);
  console.log(`  Failed:  ${result.report.failed.length}`);
  for (const f of result.report.failed) {
    console.log(`    - ${f.occurrenceId}: ${f.reason} (${f.error})`);
  }
  console.log(`  Skipped: ${result.report.skipped.length}`);
  console.log(`  Notices: ${result.notices.sent.length}`);
  if (result.malformed > 0) console.log(`  Malformed rows ignored: ${result.malformed}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const separator = args.indexOf("--");
  const options = separator === -1 ? args : args.slice(0, separator);
  if (args.length === 0 || options.includes("--help") || options.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const [command, ...rest] = args;
  const config = loadOrExit();
  configureDb(config.mongoUri);
  await ensureIndexes();

  const store = new MongoReminderStore();
  const service = new ReminderService(store, { defaultTimezone: config.defaultTimezone });

  switch (command) {
    case "add-user": {
      const usage = "add-user <id> <name>";
      const id = intArg(rest[0], "id", usage);
      const name = rest.slice(1).join(" ");
      if (!name) fail("name is required", usage);
      const user = await service.registerUser(id, name);
      console.log(`[cli] User ${user.id} (${user.name}) registered, timezone ${user.timezone}`);
      break;
    }

    case "set-timezone": {
      const usage = "set-timezone <userId> <zone>";
      const userId = intArg(rest[0], "userId", usage);
      if (!rest[1]) fail("zone is required", usage);
      const updated = await service.setTimezone(userId, rest[1]);
      if (!updated) fail(`user ${userId} not found`);
      console.log(`[cli] User ${userId} timezone set to ${rest[1]}`);
      break;
    }

    case "add":
      await addReminder(service, rest);
      break;

    case "list": {
      const userId = intArg(rest[0], "userId", "list <userId>");
      const views = await service.listReminders(userId);
      if (views.length === 0) console.log(`[cli] User ${userId} has no reminders`);
      for (const { reminder, nextRun } of views) {
        const state = reminder.active ? `next ${nextRun ? nextRun.toISOString() : "never"}` : `off (${reminder.deactivated_reason ?? "inactive"})`;
        console.log(`  #${reminder.id}  ${reminder.text}  [${describeSchedule(reminder)}]  ${state}`);
      }
      break;
    }

    case "remove": {
      const usage = "remove <userId> <id>";
      const userId = intArg(rest[0], "userId", usage);
      const id = intArg(rest[1], "id", usage);
      if (!(await service.deleteReminder(userId, id))) fail(`reminder ${id} not found for user ${userId}`);
      console.log(`[cli] Reminder ${id} deleted`);
      break;
    }

    case "toggle": {
      const usage = "toggle <userId> <id>";
      const userId = intArg(rest[0], "userId", usage);
      const id = intArg(rest[1], "id", usage);
      const reminder = await service.toggleReminder(userId, id);
      if (!reminder) fail(`reminder ${id} not found for user ${userId}`);
      console.log(`[cli] Reminder ${id} is now ${reminder.active ? "active" : "paused"}`);
      break;
    }

    case "history": {
      const usage = "history <userId> <id>";
      const userId = intArg(rest[0], "userId", usage);
      const id = intArg(rest[1], "id", usage);
      const entries = await service.getHistory(userId, id);
      if (!entries) fail(`reminder ${id} not found for user ${userId}`);
      if (entries.length === 0) console.log(`[cli] Reminder ${id} has not been sent yet`);
      for (const entry of entries) {
        console.log(`  ${entry.occurrence_id}  sent ${entry.sent_at.toISOString()}`);
      }
      break;
    }

    case "run-once":
      await runOnce(config, store);
      break;

    default: {
      console.error(`[cli] Unknown command: ${command}`);
      printHelp();
      process.exit(1);
    }
  }

  await closeDb();
  console.log("\n[cli] Done.");
  process.exit(0);
}

main().catch(async (err) => {
  if (err instanceof ReminderValidationError) {
    for (const issue of err.issues) console.error(`[cli] ${issue}`);
  } else {
    console.error(`[cli] Fatal error: ${err instanceof Error ? err.message : err}`);
    if (err instanceof Error && err.stack) console.error(err.stack);
  }
  await closeDb();
  process.exit(1);
});
