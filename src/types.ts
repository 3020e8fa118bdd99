// --- Users ---

export interface User {
  id: number;
  name: string;
  timezone: string;
  created_at: Date;
}

// --- Reminders ---

export type Frequency = "once" | "daily" | "weekly" | "monthly";

export type DeactivationReason =
  | "sent_once"
  | "channel_permanent"
  | "expired"
  | "user_disabled";

interface ReminderBase {
  id: number;
  user_id: number;
  text: string;
  time: string; // "HH:MM", local to the reminder's timezone
  timezone: string | null; // null inherits the owner's timezone
  active: boolean;
  created_at: Date;
  last_sent: Date | null;
  deactivated_reason: DeactivationReason | null;
}

/**
 * How `day` reads depends on the frequency:
 * - daily: unused
 * - weekly: ISO weekday, 1 = Monday .. 7 = Sunday
 * - monthly: day of month 1..31, clamped to the month's last day
 * - once: calendar date "YYYY-MM-DD"
 */
export type ReminderSchedule =
  | { frequency: "daily"; day: null }
  | { frequency: "weekly"; day: number }
  | { frequency: "monthly"; day: number }
  | { frequency: "once"; day: string };

export type Reminder = ReminderBase & ReminderSchedule;

export type NewReminder = Omit<ReminderBase, "id" | "created_at" | "last_sent" | "deactivated_reason" | "active"> &
  ReminderSchedule;

export interface ReminderPatch {
  text?: string;
  time?: string;
  timezone?: string | null;
  frequency?: Frequency;
  day?: number | string | null;
  active?: boolean;
  last_sent?: Date;
  deactivated_reason?: DeactivationReason | null;
}

// --- Send log ---

export interface LogEntry {
  reminder_id: number;
  occurrence_id: string;
  user_id: number;
  sent_at: Date;
}

// --- Scheduled job bookkeeping ---

export interface JobRun {
  job: string;
  key: string;
  run_date: string;
  created_at: Date;
}

// --- Cycle ---

export interface DueCandidate {
  reminder: Reminder;
  occurrenceId: string;
  scheduledFor: Date;
}

export interface SentRecord {
  reminderId: number;
  userId: number;
  occurrenceId: string;
  sentAt: Date;
}

export type FailureReason = "channel_transient" | "channel_permanent" | "store_unavailable";

export interface FailedRecord {
  reminderId: number;
  userId: number;
  occurrenceId: string;
  reason: FailureReason;
  error: string;
}

export type SkipReason = "duplicate_occurrence" | "deferred" | "retries_exhausted";

export interface SkippedRecord {
  reminderId: number;
  occurrenceId: string;
  reason: SkipReason;
}

export interface DispatchReport {
  sent: SentRecord[];
  failed: FailedRecord[];
  skipped: SkippedRecord[];
}

// --- Lead-time notices ---

export interface LeadNotice {
  reminder: Reminder;
  /** `<reminderId>:<dueDate>:d-<offsetDays>` */
  noticeId: string;
  offsetDays: number;
  dueDate: string;
  scheduledFor: Date;
}

export interface NoticeReport {
  sent: string[];
  failed: { noticeId: string; error: string }[];
  /** Already recorded by an earlier cycle. */
  skipped: string[];
}
