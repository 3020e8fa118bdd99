import { ChannelError, DuplicateOccurrenceError, errorMessage } from "../errors.js";
import { formatReminderMessage } from "../messages.js";
import type { MessagingChannel } from "../channel/types.js";
import type { ReminderStore } from "../store/types.js";
import type {
  DispatchReport,
  DueCandidate,
  FailedRecord,
  LogEntry,
  Reminder,
  ReminderPatch,
  SentRecord,
  SkippedRecord,
} from "../types.js";
import { KeyedMutex, runWithConcurrency } from "./concurrency.js";
import type { RetryTracker } from "./retry.js";

export interface DispatcherDeps {
  store: ReminderStore;
  channel: MessagingChannel;
  retry: RetryTracker;
  concurrency: number;
  formatMessage?: (reminder: Reminder) => string;
}

type Outcome =
  | { type: "sent"; record: SentRecord }
  | { type: "failed"; record: FailedRecord }
  | { type: "skipped"; record: SkippedRecord };

function skipped(candidate: DueCandidate, reason: SkippedRecord["reason"]): Outcome {
  return { type: "skipped", record: { reminderId: candidate.reminder.id, occurrenceId: candidate.occurrenceId, reason } };
}

function failed(candidate: DueCandidate, reason: FailedRecord["reason"], error: string): Outcome {
  return {
    type: "failed",
    record: {
      reminderId: candidate.reminder.id,
      userId: candidate.reminder.user_id,
      occurrenceId: candidate.occurrenceId,
      reason,
      error,
    },
  };
}

/**
 * Sends due occurrences and records them. Each candidate is handled on its
 * own: a failure is reported and never stops the others. Work for one
 * occurrence id is serialized, and the log append is the commit point: an
 * occurrence counts as sent once its entry is in the log. Every append has
 * settled by the time dispatch() resolves.
 */
export class ReminderDispatcher {
  private store: ReminderStore;
  private channel: MessagingChannel;
  private retry: RetryTracker;
  private concurrency: number;
  private formatMessage: (reminder: Reminder) => string;
  private guard = new KeyedMutex();
  // Logged by this dispatcher while still open; a caller that waited on the guard sees these
  private committed: Set<string> = new Set();
  // Delivered but not yet logged. These only ever retry the append, never the send.
  private unlogged: Map<string, { entry: LogEntry; reminder: Reminder }> = new Map();

  constructor(deps: DispatcherDeps) {
    this.store = deps.store;
    this.channel = deps.channel;
    this.retry = deps.retry;
    this.concurrency = deps.concurrency;
    this.formatMessage = deps.formatMessage ?? formatReminderMessage;
  }

  async dispatch(candidates: DueCandidate[], now: Date): Promise<DispatchReport> {
    const open = new Set(candidates.map(c => c.occurrenceId));
    this.retry.retain(open);
    for (const id of this.committed) {
      if (!open.has(id)) this.committed.delete(id);
    }
    await this.flushUnlogged(open);

    const outcomes = await runWithConcurrency(candidates, this.concurrency, candidate =>
      this.guard.run(candidate.occurrenceId, () => this.dispatchOne(candidate, now)),
    );

    const report: DispatchReport = { sent: [], failed: [], skipped: [] };
    for (const outcome of outcomes) {
      if (outcome.type === "sent") report.sent.push(outcome.record);
      else if (outcome.type === "failed") report.failed.push(outcome.record);
      else report.skipped.push(outcome.record);
    }
    return report;
  }

  /** Occurrences delivered earlier whose log append is still outstanding. */
  get pendingLogCount(): number {
    return this.unlogged.size;
  }

  private async dispatchOne(candidate: DueCandidate, now: Date): Promise<Outcome> {
    const { reminder, occurrenceId } = candidate;

    if (this.committed.has(occurrenceId)) return skipped(candidate, "duplicate_occurrence");
    const pending = this.unlogged.get(occurrenceId);
    if (pending) return this.commit(candidate, pending.entry);

    const decision = this.retry.check(occurrenceId, now);
    if (decision === "deferred") return skipped(candidate, "deferred");
    if (decision === "exhausted") return skipped(candidate, "retries_exhausted");

    try {
      await this.channel.sendMessage(reminder.user_id, this.formatMessage(reminder));
    } catch (err) {
      return this.handleSendFailure(candidate, err, now);
    }
    this.retry.clear(occurrenceId);

    return this.commit(candidate, {
      reminder_id: reminder.id,
      occurrence_id: occurrenceId,
      user_id: reminder.user_id,
      sent_at: now,
    });
  }

  private async commit(candidate: DueCandidate, entry: LogEntry): Promise<Outcome> {
    const { reminder } = candidate;
    try {
      await this.store.appendLog(entry);
    } catch (err) {
      if (err instanceof DuplicateOccurrenceError) {
        // Another cycle or instance logged this occurrence first
        this.unlogged.delete(entry.occurrence_id);
        this.committed.add(entry.occurrence_id);
        console.log(`[dispatch] Occurrence ${entry.occurrence_id} already logged, skipping`);
        return skipped(candidate, "duplicate_occurrence");
      }
      this.unlogged.set(entry.occurrence_id, { entry, reminder });
      console.error(`[dispatch] Sent ${entry.occurrence_id} but could not log it: ${errorMessage(err)}`);
      return failed(candidate, "store_unavailable", errorMessage(err));
    }

    this.unlogged.delete(entry.occurrence_id);
    this.committed.add(entry.occurrence_id);
    await this.markSent(reminder, entry.sent_at);
    return {
      type: "sent",
      record: {
        reminderId: reminder.id,
        userId: reminder.user_id,
        occurrenceId: entry.occurrence_id,
        sentAt: entry.sent_at,
      },
    };
  }

  // The log entry is authoritative, so a failed field update is only reported
  private async markSent(reminder: Reminder, sentAt: Date): Promise<void> {
    const patch: ReminderPatch =
      reminder.frequency === "once"
        ? { last_sent: sentAt, active: false, deactivated_reason: "sent_once" }
        : { last_sent: sentAt };
    try {
      await this.store.updateReminder(reminder.id, patch);
    } catch (err) {
      console.error(`[dispatch] Logged reminder ${reminder.id} but could not update it: ${errorMessage(err)}`);
    }
  }

  private async handleSendFailure(candidate: DueCandidate, err: unknown, now: Date): Promise<Outcome> {
    const { reminder, occurrenceId } = candidate;
    const error = err instanceof ChannelError ? err : new ChannelError("transient", errorMessage(err), { cause: err });

    if (error.kind === "permanent") {
      console.warn(`[dispatch] Deactivating reminder ${reminder.id}, user ${reminder.user_id} unreachable: ${error.message}`);
      try {
        await this.store.updateReminder(reminder.id, { active: false, deactivated_reason: "channel_permanent" });
      } catch (updateErr) {
        console.error(`[dispatch] Could not deactivate reminder ${reminder.id}: ${errorMessage(updateErr)}`);
      }
      return failed(candidate, "channel_permanent", error.message);
    }

    const attempts = this.retry.recordFailure(occurrenceId, now, error.retryAfterMs);
    console.warn(`[dispatch] Send failed for ${occurrenceId} (attempt ${attempts}): ${error.message}`);
    return failed(candidate, "channel_transient", error.message);
  }

  // Pending appends for occurrences that are no longer open
  private async flushUnlogged(open: ReadonlySet<string>): Promise<void> {
    for (const [occurrenceId, { entry, reminder }] of [...this.unlogged]) {
      if (open.has(occurrenceId)) continue;
      await this.guard.run(occurrenceId, async () => {
        const candidate: DueCandidate = { reminder, occurrenceId, scheduledFor: entry.sent_at };
        await this.commit(candidate, entry);
      });
    }
  }
}
