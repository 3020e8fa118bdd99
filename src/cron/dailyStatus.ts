import type { DateTime } from "luxon";
import { DAILY_STATUS_MESSAGE, JOB_DAILY_STATUS } from "../constants.js";
import { errorMessage } from "../errors.js";
import { isExpired, isoDate, localDateOf, occursOn, resolveTimezone } from "../recurrence.js";
import { isValidTimezone } from "../validation.js";
import type { MessagingChannel } from "../channel/types.js";
import type { ReminderStore } from "../store/types.js";
import type { Reminder, User } from "../types.js";
import type { CycleContext } from "./pipeline.js";

export interface DailyStatusDeps {
  store: ReminderStore;
  channel: MessagingChannel;
  defaultTimezone: string;
  windowMinutes: number;
  /** Days before a monthly or one-off due date that also count as due. */
  leadNoticeDays?: readonly number[];
}

export interface DailyStatusResult {
  status: "window_closed" | "completed";
  notified: number[];
  expired: number[];
}

/** Falls due today, or has an advance notice going out today. */
function dueOrAnnounced(reminder: Reminder, today: DateTime, leadDays: readonly number[]): boolean {
  if (occursOn(reminder, today)) return true;
  if (reminder.frequency !== "monthly" && reminder.frequency !== "once") return false;
  return leadDays.some(days => occursOn(reminder, today.plus({ days })));
}

/**
 * Tells each user with nothing due today that there is nothing to pay, at
 * most once per user per local day, and retires one-off reminders whose
 * date has passed without a send.
 */
export async function runDailyStatus(deps: DailyStatusDeps, context: CycleContext): Promise<DailyStatusResult> {
  const { store, channel, defaultTimezone, windowMinutes } = deps;
  const leadDays = deps.leadNoticeDays ?? [];
  const { now } = context;
  if (!context.windowOpen) return { status: "window_closed", notified: [], expired: [] };

  const [reminders, users] = await Promise.all([store.listReminders({ activeOnly: true }), store.listUsers()]);
  const usersById = new Map<number, User>(users.map(user => [user.id, user]));

  const expired: number[] = [];
  const live: Reminder[] = [];
  for (const reminder of reminders) {
    const zoned: Reminder = {
      ...reminder,
      timezone: resolveTimezone(reminder, usersById.get(reminder.user_id), defaultTimezone),
    };
    if (!isExpired(zoned, now, windowMinutes)) {
      live.push(zoned);
      continue;
    }
    try {
      await store.updateReminder(reminder.id, { active: false, deactivated_reason: "expired" });
      expired.push(reminder.id);
      console.log(`[daily-status] Retired one-off reminder ${reminder.id} (${reminder.day} has passed)`);
    } catch (err) {
      console.error(`[daily-status] Could not retire reminder ${reminder.id}: ${errorMessage(err)}`);
    }
  }

  const userIds = [...new Set([...users.map(u => u.id), ...reminders.map(r => r.user_id)])].sort((a, b) => a - b);
  const notified: number[] = [];

  for (const userId of userIds) {
    const userZone = usersById.get(userId)?.timezone;
    const zone = userZone && isValidTimezone(userZone) ? userZone : defaultTimezone;

    const dueToday = live.some(
      reminder =>
        reminder.user_id === userId &&
        dueOrAnnounced(reminder, localDateOf(now, reminder.timezone ?? zone), leadDays),
    );
    if (dueToday) continue;

    // Recorded before sending; a failed send is not retried the same day
    const first = await store.recordJobRun(JOB_DAILY_STATUS, String(userId), isoDate(localDateOf(now, zone)));
    if (!first) continue;

    try {
      await channel.sendMessage(userId, DAILY_STATUS_MESSAGE);
      notified.push(userId);
    } catch (err) {
      console.warn(`[daily-status] Could not notify user ${userId}: ${errorMessage(err)}`);
    }
  }

  return { status: "completed", notified, expired };
}
