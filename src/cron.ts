import "dotenv/config";
import cron from "node-cron";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { closeDb, configureDb, ensureIndexes } from "./db.js";
import { TelegramChannel, maskToken } from "./channel/telegram.js";
import { runDailyStatus } from "./cron/dailyStatus.js";
import { ReminderDispatcher } from "./cron/dispatch.js";
import { runReminderCycle } from "./cron/pipeline.js";
import { RetryTracker } from "./cron/retry.js";
import { createCycleRunner } from "./cron/runner.js";
import { MongoReminderStore } from "./store/mongoStore.js";
import { createWindowGate, systemClock } from "./window.js";

function loadOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`[cron] ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }
}

const config = loadOrExit();
const token = config.telegramToken;
if (!token) {
  console.error("[cron] TELEGRAM_BOT_TOKEN not set");
  process.exit(1);
}
console.log(`[cron] Bot token loaded: ${maskToken(token)}`);

configureDb(config.mongoUri);
await ensureIndexes();

const store = new MongoReminderStore();
const channel = TelegramChannel.fromToken(token);
const gate = createWindowGate(config.window);
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

const cycle = createCycleRunner(
  "cycle",
  context =>
    runReminderCycle(
      {
        store,
        dispatcher,
        select: { windowMinutes: config.dueWindowMinutes, defaultTimezone: config.defaultTimezone },
        leadNotices,
      },
      context,
    ),
  systemClock,
  gate,
);

const tasks = [cron.schedule(config.cronSchedule, cycle)];
console.log(`[cron] Reminder cycle scheduled at: ${config.cronSchedule}`);
if (leadNotices) console.log(`[cron] Advance notices ${config.leadNoticeDays.join(", ")} day(s) before due dates`);

if (config.dailyStatusSchedule) {
  const dailyStatus = createCycleRunner(
    "daily-status",
    context =>
      runDailyStatus(
        {
          store,
          channel,
          defaultTimezone: config.defaultTimezone,
          windowMinutes: config.dueWindowMinutes,
          leadNoticeDays: config.leadNoticeDays,
        },
        context,
      ),
    systemClock,
    gate,
  );
  tasks.push(cron.schedule(config.dailyStatusSchedule, dailyStatus, { timezone: config.defaultTimezone }));
  console.log(`[cron] Daily status scheduled at: ${config.dailyStatusSchedule} (${config.defaultTimezone})`);
}

if (config.window.alwaysOn) {
  console.log("[cron] ALWAYS_ON set: active window disabled");
} else if (config.window.start && config.window.end) {
  console.log(`[cron] Active window ${config.window.start}-${config.window.end} (${config.window.timezone})`);
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[cron] ${signal} received, shutting down...`);
  for (const task of tasks) task.stop();
  await closeDb();
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
