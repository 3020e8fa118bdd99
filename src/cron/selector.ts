import { StoreUnavailableError } from "../errors.js";
import { isDue, isLeadNoticeDue, resolveTimezone } from "../recurrence.js";
import type { ReminderStore } from "../store/types.js";
import type { DueCandidate, LeadNotice, Reminder, User } from "../types.js";

export interface SelectOptions {
  windowMinutes: number;
  defaultTimezone: string;
}

export interface Selection {
  candidates: DueCandidate[];
  /** Stored reminder rows that failed validation and were left out. */
  malformed: number;
}

async function read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError(operation, { cause: err });
  }
}

/** Active reminders with their effective timezone filled in. */
async function loadActive(
  store: ReminderStore,
  defaultTimezone: string,
): Promise<{ reminders: Reminder[]; malformed: number }> {
  const [scan, users] = await Promise.all([
    read("listReminders", () => store.scanReminders({ activeOnly: true })),
    read("listUsers", () => store.listUsers()),
  ]);
  const usersById = new Map<number, User>(users.map(user => [user.id, user]));

  const reminders: Reminder[] = [];
  for (const reminder of scan.reminders) {
    if (!reminder.active) continue;

    const owner = usersById.get(reminder.user_id);
    if (!owner) console.warn(`[cycle] Reminder ${reminder.id} belongs to unknown user ${reminder.user_id}`);
    reminders.push({ ...reminder, timezone: resolveTimezone(reminder, owner, defaultTimezone) });
  }
  return { reminders, malformed: scan.malformed };
}

/**
 * Active reminders whose occurrence is open at `now` and not yet in the send
 * log, ordered by ascending reminder id, plus the count of stored rows that
 * could not be evaluated. The log, not `last_sent`, decides "already sent",
 * so a crash between the log append and the reminder update cannot cause a
 * resend. Any store failure aborts the whole selection.
 */
export async function selectDueWithScan(store: ReminderStore, now: Date, options: SelectOptions): Promise<Selection> {
  const { reminders, malformed } = await loadActive(store, options.defaultTimezone);

  const open: DueCandidate[] = [];
  for (const reminder of reminders) {
    const evaluation = isDue(reminder, now, { windowMinutes: options.windowMinutes });
    if (evaluation.due) {
      open.push({ reminder, occurrenceId: evaluation.occurrenceId, scheduledFor: evaluation.scheduledFor });
    }
  }

  const logged = await Promise.all(
    open.map(candidate => read("listOccurrenceIds", () => store.listOccurrenceIds(candidate.reminder.id))),
  );

  const candidates = open
    .filter((candidate, i) => !logged[i].has(candidate.occurrenceId))
    .sort((a, b) => a.reminder.id - b.reminder.id);
  return { candidates, malformed };
}

export async function selectDue(store: ReminderStore, now: Date, options: SelectOptions): Promise<DueCandidate[]> {
  return (await selectDueWithScan(store, now, options)).candidates;
}

/**
 * Advance notices open at `now` for each offset, ordered by reminder id and
 * then by offset, largest first. Whether a notice already went out is decided
 * when it is sent, through the job-run record.
 */
export async function selectLeadNotices(
  store: ReminderStore,
  now: Date,
  options: SelectOptions & { offsets: readonly number[] },
): Promise<LeadNotice[]> {
  if (options.offsets.length === 0) return [];
  const { reminders } = await loadActive(store, options.defaultTimezone);

  const notices: LeadNotice[] = [];
  for (const reminder of reminders) {
    for (const offsetDays of [...options.offsets].sort((a, b) => b - a)) {
      const evaluation = isLeadNoticeDue(reminder, now, offsetDays, { windowMinutes: options.windowMinutes });
      if (!evaluation.due) continue;
      notices.push({
        reminder,
        noticeId: evaluation.noticeId,
        offsetDays,
        dueDate: evaluation.dueDate,
        scheduledFor: evaluation.scheduledFor,
      });
    }
  }
  return notices.sort((a, b) => a.reminder.id - b.reminder.id || b.offsetDays - a.offsetDays);
}
