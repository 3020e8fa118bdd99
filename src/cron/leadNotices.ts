import { JOB_LEAD_NOTICE } from "../constants.js";
import { errorMessage } from "../errors.js";
import { formatLeadNotice } from "../messages.js";
import type { MessagingChannel } from "../channel/types.js";
import type { ReminderStore } from "../store/types.js";
import type { LeadNotice, NoticeReport, Reminder } from "../types.js";
import { runWithConcurrency } from "./concurrency.js";

export interface LeadNoticeDeps {
  store: ReminderStore;
  channel: MessagingChannel;
  concurrency: number;
  /** Days ahead of the due date; largest first. */
  offsets: readonly number[];
  formatMessage?: (reminder: Reminder, offsetDays: number, dueDate: string) => string;
}

type NoticeOutcome =
  | { type: "sent"; noticeId: string }
  | { type: "failed"; noticeId: string; error: string }
  | { type: "skipped"; noticeId: string };

export function emptyNoticeReport(): NoticeReport {
  return { sent: [], failed: [], skipped: [] };
}

/**
 * Sends advance notices, each at most once. The notice id is recorded as a
 * job run before sending; the occurrence log is left to the due-date send.
 */
export async function sendLeadNotices(deps: LeadNoticeDeps, notices: LeadNotice[]): Promise<NoticeReport> {
  const format = deps.formatMessage ?? formatLeadNotice;

  const outcomes = await runWithConcurrency(notices, deps.concurrency, async (notice): Promise<NoticeOutcome> => {
    const { noticeId, reminder } = notice;
    try {
      const first = await deps.store.recordJobRun(JOB_LEAD_NOTICE, noticeId, notice.dueDate);
      if (!first) return { type: "skipped", noticeId };
    } catch (err) {
      console.error(`[dispatch] Could not record notice ${noticeId}: ${errorMessage(err)}`);
      return { type: "failed", noticeId, error: errorMessage(err) };
    }

    try {
      await deps.channel.sendMessage(reminder.user_id, format(reminder, notice.offsetDays, notice.dueDate));
      console.log(`[dispatch] Notice ${noticeId} sent to user ${reminder.user_id}`);
      return { type: "sent", noticeId };
    } catch (err) {
      // Not retried: the job run is already recorded
      console.warn(`[dispatch] Notice ${noticeId} to user ${reminder.user_id} failed: ${errorMessage(err)}`);
      return { type: "failed", noticeId, error: errorMessage(err) };
    }
  });

  const report = emptyNoticeReport();
  for (const outcome of outcomes) {
    if (outcome.type === "sent") report.sent.push(outcome.noticeId);
    else if (outcome.type === "skipped") report.skipped.push(outcome.noticeId);
    else report.failed.push({ noticeId: outcome.noticeId, error: outcome.error });
  }
  return report;
}
