import { MongoClient, Db, Collection } from "mongodb";
import type { ObjectId } from "mongodb";
import type { JobRun } from "./types.js";

// Stored shapes are loose; rows are validated with zod when read.

export interface UserDocument {
  _id?: ObjectId;
  id: number;
  name: string;
  timezone: string;
  created_at: Date;
}

export interface ReminderDocument {
  _id?: ObjectId;
  id: number;
  user_id: number;
  text: string;
  day: number | string | null;
  time: string;
  frequency: string;
  timezone: string | null;
  active: boolean;
  created_at: Date;
  last_sent: Date | null;
  deactivated_reason: string | null;
}

export interface ReminderLogDocument {
  _id?: ObjectId;
  reminder_id: number;
  occurrence_id: string;
  user_id: number;
  sent_at: Date;
}

export interface JobRunDocument extends JobRun {
  _id?: ObjectId;
}

export interface CounterDocument {
  _id: string;
  seq: number;
}

let client: MongoClient | null = null;
let db: Db | null = null;
let mongoUri = process.env.MONGO_URI || "mongodb://localhost:27017/bill_reminders";

/** Overrides the connection string; takes effect on the next connect. */
export function configureDb(uri: string): void {
  mongoUri = uri;
}

export async function getDb(): Promise<Db> {
  if (db) return db;
  const uri = mongoUri;
  client = new MongoClient(uri, { serverSelectionTimeoutMS: 5000, ignoreUndefined: true });
  await client.connect();
  db = client.db();
  return db;
}

export async function closeDb(): Promise<void> {
  if (client) await client.close();
  client = null;
  db = null;
}

export async function users(): Promise<Collection<UserDocument>> {
  return (await getDb()).collection("users");
}
export async function reminders(): Promise<Collection<ReminderDocument>> {
  return (await getDb()).collection("reminders");
}
export async function reminderLogs(): Promise<Collection<ReminderLogDocument>> {
  return (await getDb()).collection("reminder_logs");
}
export async function jobRuns(): Promise<Collection<JobRunDocument>> {
  return (await getDb()).collection("job_runs");
}
export async function counters(): Promise<Collection<CounterDocument>> {
  return (await getDb()).collection("counters");
}

/** The unique log index is what makes concurrent appends for one occurrence conditional. */
export async function ensureIndexes(): Promise<void> {
  await (await users()).createIndex({ id: 1 }, { unique: true });
  await (await reminders()).createIndex({ id: 1 }, { unique: true });
  await (await reminders()).createIndex({ active: 1, id: 1 });
  await (await reminderLogs()).createIndex({ reminder_id: 1, occurrence_id: 1 }, { unique: true });
  await (await jobRuns()).createIndex({ job: 1, key: 1, run_date: 1 }, { unique: true });
}
