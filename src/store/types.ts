import type { LogEntry, NewReminder, Reminder, ReminderPatch, User } from "../types.js";

/** Parsed reminders plus the number of stored rows that failed validation. */
export interface ReminderScan {
  reminders: Reminder[];
  malformed: number;
}

export interface ListRemindersFilter {
  activeOnly?: boolean;
  userId?: number;
}

/**
 * Durable record store behind the scheduler. Implementations throw
 * StoreUnavailableError for I/O failures and DuplicateOccurrenceError from
 * appendLog when the (reminder, occurrence) pair is already logged.
 */
export interface ReminderStore {
  listUsers(): Promise<User[]>;
  getUser(id: number): Promise<User | null>;
  /** Inserts the user if absent; an existing user is returned unchanged. */
  addUser(user: { id: number; name: string; timezone: string }): Promise<User>;
  setUserTimezone(id: number, timezone: string): Promise<boolean>;

  /** Sorted by ascending reminder id. */
  listReminders(filter?: ListRemindersFilter): Promise<Reminder[]>;
  /** As listReminders, also counting rows that were skipped as malformed. */
  scanReminders(filter?: ListRemindersFilter): Promise<ReminderScan>;
  getReminder(id: number): Promise<Reminder | null>;
  createReminder(input: NewReminder): Promise<Reminder>;
  /** `last_sent` is applied as a maximum: it never moves backward. */
  updateReminder(id: number, patch: ReminderPatch): Promise<boolean>;
  deleteReminder(id: number): Promise<boolean>;

  listOccurrenceIds(reminderId: number): Promise<Set<string>>;
  listLogEntries(reminderId: number): Promise<LogEntry[]>;
  appendLog(entry: LogEntry): Promise<void>;

  /** Records a job run; false when the same (job, key, runDate) was already recorded. */
  recordJobRun(job: string, key: string, runDate: string): Promise<boolean>;
}
