import { WEEKDAY_LABELS } from "./constants.js";
import type { Reminder } from "./types.js";

export function describeSchedule(reminder: Reminder): string {
  switch (reminder.frequency) {
    case "daily":
      return `daily at ${reminder.time}`;
    case "weekly":
      return `every ${WEEKDAY_LABELS[reminder.day - 1] ?? `weekday ${reminder.day}`} at ${reminder.time}`;
    case "monthly":
      return `monthly on day ${reminder.day} at ${reminder.time}`;
    case "once":
      return `once on ${reminder.day} at ${reminder.time}`;
  }
}

export function formatReminderMessage(reminder: Reminder): string {
  return (
    `*🔔 Bill payment due*\n\n` +
    `🧾 *Bill:* ${reminder.text}\n` +
    `⏰ *Schedule:* ${describeSchedule(reminder)}\n\n` +
    `Please pay on time!`
  );
}

export function formatLeadNotice(reminder: Reminder, offsetDays: number, dueDate: string): string {
  const when = offsetDays === 1 ? "tomorrow" : `in ${offsetDays} days`;
  return (
    `*⏳ Bill due ${when}*\n\n` +
    `🧾 *Bill:* ${reminder.text}\n` +
    `📅 *Due:* ${dueDate} at ${reminder.time}\n\n` +
    `Plan the payment ahead.`
  );
}
