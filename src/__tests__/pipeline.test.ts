import { describe, it, expect, beforeEach, vi } from "vitest";
import { ReminderDispatcher } from "../cron/dispatch.js";
import { runReminderCycle } from "../cron/pipeline.js";
import { RetryTracker } from "../cron/retry.js";
import { ChannelError, StoreUnavailableError } from "../errors.js";
import { MemoryStore } from "./helpers/memoryStore.js";
import { FakeChannel } from "./helpers/fakeChannel.js";
import type { CycleDeps } from "../cron/pipeline.js";

const at = (iso: string) => new Date(iso);

describe("runReminderCycle", () => {
  let store: MemoryStore;
  let channel: FakeChannel;
  let deps: CycleDeps;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new MemoryStore();
    channel = new FakeChannel();
    store.seedUser(100, "Asia/Ho_Chi_Minh");
    deps = {
      store,
      dispatcher: new ReminderDispatcher({
        store,
        channel,
        retry: new RetryTracker({ maxAttempts: 3, baseDelayMs: 15_000, maxDelayMs: 120_000 }),
        concurrency: 4,
      }),
      select: { windowMinutes: 1, defaultTimezone: "Asia/Ho_Chi_Minh" },
    };
  });

  it("sends a reminder once when two cycles fall in the same minute", async () => {
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });

    const first = await runReminderCycle(deps, { now: at("2024-03-10T00:35:05Z"), windowOpen: true });
    const second = await runReminderCycle(deps, { now: at("2024-03-10T00:35:40Z"), windowOpen: true });

    expect(first.status === "completed" && first.report.sent.length).toBe(1);
    expect(second.status === "completed" && second.due).toBe(0);
    expect(channel.sent).toHaveLength(1);
    expect(store.logs).toHaveLength(1);
  });

  it("does not resend after a crash between the log append and the reminder update", async () => {
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });
    store.logs.push({ reminder_id: 1, occurrence_id: "1:2024-03-10", user_id: 100, sent_at: at("2024-03-10T00:35:02Z") });

    const result = await runReminderCycle(deps, { now: at("2024-03-10T00:35:30Z"), windowOpen: true });

    expect(result.status === "completed" && result.due).toBe(0);
    expect(channel.attempts).toEqual([]);
    expect(store.reminder(1).last_sent).toBeNull();
  });

  it("does nothing while the window is closed", async () => {
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });
    const now = at("2024-03-10T00:35:05Z");

    const result = await runReminderCycle(deps, { now, windowOpen: false });

    expect(result).toEqual({ status: "window_closed", now });
    expect(store.calls).toEqual([]);
    expect(channel.attempts).toEqual([]);
  });

  it("never selects a one-off reminder again after it was sent", async () => {
    store.seedReminder({ id: 2, user_id: 100, frequency: "once", day: "2024-03-10", time: "07:35" });

    await runReminderCycle(deps, { now: at("2024-03-10T00:35:00Z"), windowOpen: true });
    deps.select = { ...deps.select, windowMinutes: 10 };
    const again = await runReminderCycle(deps, { now: at("2024-03-10T00:39:00Z"), windowOpen: true });

    expect(again.status === "completed" && again.due).toBe(0);
    expect(store.reminder(2).active).toBe(false);
    expect(channel.sent).toHaveLength(1);
  });

  it("sends once across a window several minutes wide", async () => {
    deps.select = { ...deps.select, windowMinutes: 5 };
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });

    for (const iso of ["2024-03-10T00:35:00Z", "2024-03-10T00:37:00Z", "2024-03-10T00:39:59Z"]) {
      await runReminderCycle(deps, { now: at(iso), windowOpen: true });
    }

    expect(channel.sent).toHaveLength(1);
    expect(store.logs.map(l => l.occurrence_id)).toEqual(["1:2024-03-10"]);
  });

  it("sends nothing when selection cannot read the store", async () => {
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });
    store.failOn("scanReminders", 1);

    await expect(
      runReminderCycle(deps, { now: at("2024-03-10T00:35:00Z"), windowOpen: true }),
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(channel.attempts).toEqual([]);
  });

  it("retries a transient failure on the next cycle while the others are logged", async () => {
    store.seedUser(101, "Asia/Ho_Chi_Minh");
    store.seedUser(102, "Asia/Ho_Chi_Minh");
    store.seedUser(103, "Asia/Ho_Chi_Minh");
    store.seedReminder({ id: 1, user_id: 101, frequency: "daily", time: "07:35" });
    store.seedReminder({ id: 2, user_id: 102, frequency: "daily", time: "07:35" });
    store.seedReminder({ id: 3, user_id: 103, frequency: "daily", time: "07:35" });
    channel.failNext(102, new ChannelError("transient", "Telegram 502: Bad Gateway"));
    vi.spyOn(console, "warn").mockImplementation(() => {});

    await runReminderCycle(deps, { now: at("2024-03-10T00:35:00Z"), windowOpen: true });
    expect(store.logs.map(l => l.occurrence_id).sort()).toEqual(["1:2024-03-10", "3:2024-03-10"]);

    const next = await runReminderCycle(deps, { now: at("2024-03-10T00:35:15Z"), windowOpen: true });
    expect(next.status === "completed" && next.report.sent.map(s => s.reminderId)).toEqual([2]);
    expect(store.logs).toHaveLength(3);
    expect(channel.sentTo(102)).toHaveLength(1);
  });

  it("sends the next day's occurrence of a daily reminder", async () => {
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });

    await runReminderCycle(deps, { now: at("2024-03-10T00:35:00Z"), windowOpen: true });
    await runReminderCycle(deps, { now: at("2024-03-11T00:35:00Z"), windowOpen: true });

    expect(store.logs.map(l => l.occurrence_id)).toEqual(["1:2024-03-10", "1:2024-03-11"]);
    expect(store.reminder(1).last_sent).toEqual(at("2024-03-11T00:35:00Z"));
  });
});
