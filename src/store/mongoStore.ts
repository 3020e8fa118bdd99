import { MongoServerError } from "mongodb";
import type { Filter, UpdateFilter } from "mongodb";
import { counters, jobRuns, reminderLogs, reminders, users } from "../db.js";
import type { ReminderDocument } from "../db.js";
import { COUNTER_REMINDERS } from "../constants.js";
import { DuplicateOccurrenceError, StoreUnavailableError } from "../errors.js";
import { parseLogEntryRow, parseReminderRow, parseUserRow } from "../validation.js";
import type { LogEntry, NewReminder, Reminder, ReminderPatch, User } from "../types.js";
import type { ListRemindersFilter, ReminderScan, ReminderStore } from "./types.js";

export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof MongoServerError && err.code === 11000;
}

async function withStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof DuplicateOccurrenceError || err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError(operation, { cause: err });
  }
}

export interface ParsedRows<T> {
  rows: T[];
  dropped: number;
}

/** Keeps rows that pass validation; malformed ones are counted and left out with a warning. */
export function parseRows<T>(rows: unknown[], parse: (row: unknown) => T | null, kind: string): ParsedRows<T> {
  const parsed: T[] = [];
  let dropped = 0;
  for (const row of rows) {
    const value = parse(row);
    if (value) {
      parsed.push(value);
    } else {
      dropped++;
      console.warn(`[store] Skipping malformed ${kind} row: ${JSON.stringify(row)}`);
    }
  }
  return { rows: parsed, dropped };
}

export class MongoReminderStore implements ReminderStore {
  async listUsers(): Promise<User[]> {
    return withStore("listUsers", async () => {
      const rows = await (await users()).find({}, { projection: { _id: 0 } }).sort({ id: 1 }).toArray();
      return parseRows(rows, parseUserRow, "user").rows;
    });
  }

  async getUser(id: number): Promise<User | null> {
    return withStore("getUser", async () => {
      const row = await (await users()).findOne({ id }, { projection: { _id: 0 } });
      return row ? parseUserRow(row) : null;
    });
  }

  async addUser(user: { id: number; name: string; timezone: string }): Promise<User> {
    return withStore("addUser", async () => {
      const col = await users();
      try {
        await col.updateOne(
          { id: user.id },
          { $setOnInsert: { id: user.id, name: user.name, timezone: user.timezone, created_at: new Date() } },
          { upsert: true },
        );
      } catch (err) {
        // Two concurrent upserts of a new user race on the unique index; the loser just reads
        if (!isDuplicateKeyError(err)) throw err;
      }
      const row = await col.findOne({ id: user.id }, { projection: { _id: 0 } });
      const parsed = row ? parseUserRow(row) : null;
      if (!parsed) throw new Error(`user ${user.id} could not be read back`);
      return parsed;
    });
  }

  async setUserTimezone(id: number, timezone: string): Promise<boolean> {
    return withStore("setUserTimezone", async () => {
      const result = await (await users()).updateOne({ id }, { $set: { timezone } });
      return result.matchedCount > 0;
    });
  }

  async listReminders(filter: ListRemindersFilter = {}): Promise<Reminder[]> {
    return (await this.scanReminders(filter)).reminders;
  }

  async scanReminders(filter: ListRemindersFilter = {}): Promise<ReminderScan> {
    return withStore("listReminders", async () => {
      const query: Filter<ReminderDocument> = {};
      if (filter.activeOnly) query.active = true;
      if (filter.userId !== undefined) query.user_id = filter.userId;
      const rows = await (await reminders()).find(query, { projection: { _id: 0 } }).sort({ id: 1 }).toArray();
      const { rows: parsed, dropped } = parseRows(rows, parseReminderRow, "reminder");
      return { reminders: parsed, malformed: dropped };
    });
  }

  async getReminder(id: number): Promise<Reminder | null> {
    return withStore("getReminder", async () => {
      const row = await (await reminders()).findOne({ id }, { projection: { _id: 0 } });
      return row ? parseReminderRow(row) : null;
    });
  }

  async createReminder(input: NewReminder): Promise<Reminder> {
    return withStore("createReminder", async () => {
      const counter = await (await counters()).findOneAndUpdate(
        { _id: COUNTER_REMINDERS },
        { $inc: { seq: 1 } },
        { upsert: true, returnDocument: "after" },
      );
      if (!counter) throw new Error("reminder id counter returned no document");

      const reminder: Reminder = {
        ...input,
        id: counter.seq,
        active: true,
        created_at: new Date(),
        last_sent: null,
        deactivated_reason: null,
      };
      // insertOne writes _id onto the document it is given
      await (await reminders()).insertOne({ ...reminder });
      return reminder;
    });
  }

  async updateReminder(id: number, patch: ReminderPatch): Promise<boolean> {
    return withStore("updateReminder", async () => {
      const { last_sent, ...fields } = patch;
      const update: UpdateFilter<ReminderDocument> = {};
      // The client is created with ignoreUndefined, so absent patch fields are left alone
      if (Object.values(fields).some(value => value !== undefined)) update.$set = fields;
      // $max keeps last_sent monotonic even if an older write lands late
      if (last_sent) update.$max = { last_sent };
      if (!update.$set && !update.$max) return (await this.getReminder(id)) !== null;

      const result = await (await reminders()).updateOne({ id }, update);
      return result.matchedCount > 0;
    });
  }

  async deleteReminder(id: number): Promise<boolean> {
    return withStore("deleteReminder", async () => {
      const result = await (await reminders()).deleteOne({ id });
      return result.deletedCount > 0;
    });
  }

  async listOccurrenceIds(reminderId: number): Promise<Set<string>> {
    return withStore("listOccurrenceIds", async () => {
      const rows = await (await reminderLogs())
        .find({ reminder_id: reminderId }, { projection: { _id: 0, occurrence_id: 1 } })
        .toArray();
      return new Set(rows.map(row => row.occurrence_id));
    });
  }

  async listLogEntries(reminderId: number): Promise<LogEntry[]> {
    return withStore("listLogEntries", async () => {
      const rows = await (await reminderLogs())
        .find({ reminder_id: reminderId }, { projection: { _id: 0 } })
        .sort({ sent_at: 1 })
        .toArray();
      return parseRows(rows, parseLogEntryRow, "log").rows;
    });
  }

  async appendLog(entry: LogEntry): Promise<void> {
    return withStore("appendLog", async () => {
      try {
        await (await reminderLogs()).insertOne({ ...entry });
      } catch (err) {
        if (isDuplicateKeyError(err)) throw new DuplicateOccurrenceError(entry.reminder_id, entry.occurrence_id);
        throw err;
      }
    });
  }

  async recordJobRun(job: string, key: string, runDate: string): Promise<boolean> {
    return withStore("recordJobRun", async () => {
      try {
        await (await jobRuns()).insertOne({ job, key, run_date: runDate, created_at: new Date() });
        return true;
      } catch (err) {
        if (isDuplicateKeyError(err)) return false;
        throw err;
      }
    });
  }
}
