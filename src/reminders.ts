import { ReminderValidationError } from "./errors.js";
import { isExpired, nextOccurrence, resolveOnceDay, resolveTimezone } from "./recurrence.js";
import { formatIssues, isCalendarDate, isValidTimezone, parseTime, parseWeekday, reminderInputSchema } from "./validation.js";
import type { ReminderInput } from "./validation.js";
import type { ReminderStore } from "./store/types.js";
import type { Frequency, LogEntry, NewReminder, Reminder, ReminderPatch, ReminderSchedule, User } from "./types.js";

/** Fields an edit may change. A `null` timezone falls back to the owner's zone. */
export type ReminderEdit = Partial<Pick<ReminderInput, "text" | "time" | "frequency" | "day">> & {
  timezone?: string | null;
};

export interface ReminderView {
  reminder: Reminder;
  nextRun: Date | null;
}

function toSchedule(frequency: Frequency, day: number | string | null | undefined, resolveOnce: (day: number) => string): ReminderSchedule {
  switch (frequency) {
    case "daily":
      return { frequency, day: null };
    case "weekly": {
      const weekday = parseWeekday(day);
      if (weekday === null) throw new ReminderValidationError(["day: weekly reminders need a weekday"]);
      return { frequency, day: weekday };
    }
    case "monthly":
      return { frequency, day: Number(day) };
    case "once":
      if (typeof day === "string" && isCalendarDate(day)) return { frequency, day };
      return { frequency, day: resolveOnce(Number(day)) };
  }
}

/**
 * User-facing reminder operations. Every mutation checks that the reminder
 * belongs to the calling user; a mismatch reads the same as "not found".
 */
export class ReminderService {
  private store: ReminderStore;
  private defaultTimezone: string;
  private clock: () => Date;

  constructor(store: ReminderStore, options: { defaultTimezone: string; clock?: () => Date }) {
    this.store = store;
    this.defaultTimezone = options.defaultTimezone;
    this.clock = options.clock ?? (() => new Date());
  }

  async registerUser(id: number, name: string): Promise<User> {
    return this.store.addUser({ id, name, timezone: this.defaultTimezone });
  }

  async setTimezone(userId: number, timezone: string): Promise<boolean> {
    if (!isValidTimezone(timezone)) throw new ReminderValidationError([`timezone: "${timezone}" is not a known IANA timezone`]);
    return this.store.setUserTimezone(userId, timezone);
  }

  async createReminder(userId: number, input: ReminderInput): Promise<Reminder> {
    const user = await this.store.getUser(userId);
    if (!user) throw new ReminderValidationError([`user ${userId} is not registered`]);

    const parsed = reminderInputSchema.safeParse(input);
    if (!parsed.success) throw new ReminderValidationError(formatIssues(parsed.error));
    const { text, time, frequency, day, timezone } = parsed.data;

    const zone = timezone ?? user.timezone;
    const schedule = toSchedule(frequency, day, dayOfMonth => this.resolveOnce(dayOfMonth, time, zone));
    this.assertUpcoming(schedule, time, zone);
    const reminder: NewReminder = { user_id: userId, text, time, timezone: timezone ?? null, ...schedule };
    const created = await this.store.createReminder(reminder);
    console.log(`[reminders] Created reminder ${created.id} for user ${userId} (${frequency})`);
    return created;
  }

  /**
   * Applies the edit over the current reminder and re-validates the whole
   * result. A one-off that has already been sent keeps its schedule.
   */
  async editReminder(userId: number, reminderId: number, changes: ReminderEdit): Promise<Reminder | null> {
    const current = await this.owned(userId, reminderId);
    if (!current) return null;

    const reschedules =
      changes.time !== undefined ||
      changes.frequency !== undefined ||
      changes.day !== undefined ||
      changes.timezone !== undefined;
    if (reschedules && (await this.sentOnce(current))) {
      throw new ReminderValidationError([`reminder ${reminderId} was already sent once and cannot be rescheduled`]);
    }

    const merged = {
      text: changes.text ?? current.text,
      time: changes.time ?? current.time,
      frequency: changes.frequency ?? current.frequency,
      day: changes.day !== undefined ? changes.day : current.day,
      timezone: (changes.timezone === undefined ? current.timezone : changes.timezone) ?? undefined,
    };
    const parsed = reminderInputSchema.safeParse(merged);
    if (!parsed.success) throw new ReminderValidationError(formatIssues(parsed.error));
    const { text, time, frequency, day, timezone } = parsed.data;

    const owner = await this.store.getUser(userId);
    const zone = timezone ?? resolveTimezone({ ...current, timezone: null }, owner ?? undefined, this.defaultTimezone);
    const schedule = toSchedule(frequency, day, dayOfMonth => this.resolveOnce(dayOfMonth, time, zone));
    if (reschedules) this.assertUpcoming(schedule, time, zone);
    const patch: ReminderPatch = { text, time, timezone: timezone ?? null, ...schedule };

    await this.store.updateReminder(reminderId, patch);
    return this.store.getReminder(reminderId);
  }

  async deleteReminder(userId: number, reminderId: number): Promise<boolean> {
    const current = await this.owned(userId, reminderId);
    if (!current) return false;
    return this.store.deleteReminder(reminderId);
  }

  /**
   * Flips `active`. Re-activating clears whatever deactivated the reminder,
   * except for a one-off that has already been sent.
   */
  async toggleReminder(userId: number, reminderId: number): Promise<Reminder | null> {
    const current = await this.owned(userId, reminderId);
    if (!current) return null;
    if (!current.active && (await this.sentOnce(current))) {
      throw new ReminderValidationError([`reminder ${reminderId} was already sent once and cannot be re-activated`]);
    }

    const patch: ReminderPatch = current.active
      ? { active: false, deactivated_reason: "user_disabled" }
      : { active: true, deactivated_reason: null };
    await this.store.updateReminder(reminderId, patch);
    return this.store.getReminder(reminderId);
  }

  async listReminders(userId: number): Promise<ReminderView[]> {
    const [reminders, owner] = await Promise.all([
      this.store.listReminders({ userId }),
      this.store.getUser(userId),
    ]);
    const now = this.clock();
    return reminders.map(reminder => {
      const zoned: Reminder = { ...reminder, timezone: resolveTimezone(reminder, owner ?? undefined, this.defaultTimezone) };
      return { reminder, nextRun: reminder.active ? nextOccurrence(zoned, now) : null };
    });
  }

  async getHistory(userId: number, reminderId: number): Promise<LogEntry[] | null> {
    const current = await this.owned(userId, reminderId);
    if (!current) return null;
    return this.store.listLogEntries(reminderId);
  }

  private async owned(userId: number, reminderId: number): Promise<Reminder | null> {
    const reminder = await this.store.getReminder(reminderId);
    if (!reminder || reminder.user_id !== userId) return null;
    return reminder;
  }

  /** A one-off counts as sent once it is marked so or has any entry in the send log. */
  private async sentOnce(reminder: Reminder): Promise<boolean> {
    if (reminder.frequency !== "once") return false;
    if (reminder.deactivated_reason === "sent_once") return true;
    return (await this.store.listOccurrenceIds(reminder.id)).size > 0;
  }

  private assertUpcoming(schedule: ReminderSchedule, time: string, zone: string): void {
    if (schedule.frequency !== "once") return;
    const now = this.clock();
    const draft: Reminder = {
      id: 0,
      user_id: 0,
      text: "",
      time,
      timezone: isValidTimezone(zone) ? zone : this.defaultTimezone,
      active: true,
      created_at: now,
      last_sent: null,
      deactivated_reason: null,
      ...schedule,
    };
    if (isExpired(draft, now)) {
      throw new ReminderValidationError([`day: ${schedule.day} at ${time} has already passed`]);
    }
  }

  private resolveOnce(dayOfMonth: number, time: string, zone: string): string {
    const parsedTime = parseTime(time);
    if (!parsedTime) throw new ReminderValidationError([`time: "${time}" is not a valid HH:MM time`]);
    return resolveOnceDay(dayOfMonth, parsedTime, this.clock(), isValidTimezone(zone) ? zone : this.defaultTimezone);
  }
}
