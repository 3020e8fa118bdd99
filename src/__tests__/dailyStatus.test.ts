import { describe, it, expect, beforeEach, vi } from "vitest";
import { DAILY_STATUS_MESSAGE } from "../constants.js";
import { runDailyStatus } from "../cron/dailyStatus.js";
import { ChannelError } from "../errors.js";
import { MemoryStore } from "./helpers/memoryStore.js";
import { FakeChannel } from "./helpers/fakeChannel.js";
import type { DailyStatusDeps } from "../cron/dailyStatus.js";

const now = new Date("2024-03-10T00:35:00Z");

describe("runDailyStatus", () => {
  let store: MemoryStore;
  let channel: FakeChannel;
  let deps: DailyStatusDeps;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new MemoryStore();
    channel = new FakeChannel();
    deps = { store, channel, defaultTimezone: "Asia/Ho_Chi_Minh", windowMinutes: 1 };
    store.seedUser(100, "Asia/Ho_Chi_Minh");
    store.seedUser(200, "UTC");
    store.seedReminder({ id: 1, user_id: 100, frequency: "daily", time: "07:35" });
    store.seedReminder({ id: 2, user_id: 200, frequency: "monthly", day: 15, time: "09:00" });
  });

  it("tells only users with nothing due today", async () => {
    const result = await runDailyStatus(deps, { now, windowOpen: true });

    expect(result).toEqual({ status: "completed", notified: [200], expired: [] });
    expect(channel.sent).toEqual([{ userId: 200, text: DAILY_STATUS_MESSAGE }]);
    expect(store.jobRuns).toEqual([{ job: "daily_status", key: "200", run_date: "2024-03-10" }]);
  });

  it("treats a day with an advance notice as a day with a bill", async () => {
    const twoDaysBefore = new Date("2024-03-13T02:00:00Z");
    deps = { ...deps, leadNoticeDays: [2, 1] };

    const result = await runDailyStatus(deps, { now: twoDaysBefore, windowOpen: true });

    expect(result.notified).toEqual([]);
    expect(channel.sent).toEqual([]);
  });

  it("sends the status on notice days when notices are off", async () => {
    const result = await runDailyStatus(deps, { now: new Date("2024-03-13T02:00:00Z"), windowOpen: true });

    expect(result.notified).toEqual([200]);
  });

  it("notifies each user at most once per local day", async () => {
    await runDailyStatus(deps, { now, windowOpen: true });
    const again = await runDailyStatus(deps, { now: new Date("2024-03-10T12:00:00Z"), windowOpen: true });

    expect(again.notified).toEqual([]);
    expect(channel.sent).toHaveLength(1);
  });

  it("retires one-off reminders whose date has passed", async () => {
    store.seedReminder({ id: 3, user_id: 200, frequency: "once", day: "2024-03-09", time: "09:00" });

    const result = await runDailyStatus(deps, { now, windowOpen: true });

    expect(result.expired).toEqual([3]);
    expect(store.reminder(3).active).toBe(false);
    expect(store.reminder(3).deactivated_reason).toBe("expired");
  });

  it("counts a one-off due today as something due", async () => {
    store.seedReminder({ id: 4, user_id: 200, frequency: "once", day: "2024-03-10", time: "18:00" });

    const result = await runDailyStatus(deps, { now, windowOpen: true });

    expect(result.notified).toEqual([]);
    expect(result.expired).toEqual([]);
  });

  it("does not retry a status message that failed to send", async () => {
    channel.failNext(200, new ChannelError("transient", "Telegram 502: Bad Gateway"));

    const first = await runDailyStatus(deps, { now, windowOpen: true });
    const second = await runDailyStatus(deps, { now, windowOpen: true });

    expect(first.notified).toEqual([]);
    expect(second.notified).toEqual([]);
    expect(channel.attempts).toHaveLength(1);
  });

  it("does nothing while the window is closed", async () => {
    const result = await runDailyStatus(deps, { now, windowOpen: false });

    expect(result).toEqual({ status: "window_closed", notified: [], expired: [] });
    expect(store.calls).toEqual([]);
  });
});
