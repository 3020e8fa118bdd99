import type { ReminderStore } from "../store/types.js";
import type { DispatchReport, NoticeReport } from "../types.js";
import type { ReminderDispatcher } from "./dispatch.js";
import { emptyNoticeReport, sendLeadNotices } from "./leadNotices.js";
import type { LeadNoticeDeps } from "./leadNotices.js";
import { selectDueWithScan, selectLeadNotices } from "./selector.js";
import type { SelectOptions } from "./selector.js";

export interface CycleContext {
  now: Date;
  windowOpen: boolean;
}

export interface CycleDeps {
  store: ReminderStore;
  dispatcher: ReminderDispatcher;
  select: SelectOptions;
  /** Advance notices before monthly and one-off due dates; off when absent. */
  leadNotices?: LeadNoticeDeps;
}

export type CycleResult =
  | { status: "window_closed"; now: Date }
  | {
      status: "completed";
      now: Date;
      due: number;
      report: DispatchReport;
      notices: NoticeReport;
      malformed: number;
    };

/**
 * One scheduler cycle: select what is due at `context.now`, dispatch it, then
 * send any advance notices. Time and window state come in through the context.
 * Selection failures (StoreUnavailableError) propagate and nothing is dispatched.
 */
export async function runReminderCycle(deps: CycleDeps, context: CycleContext): Promise<CycleResult> {
  const { now } = context;
  if (!context.windowOpen) return { status: "window_closed", now };

  const { candidates, malformed } = await selectDueWithScan(deps.store, now, deps.select);
  const report = await deps.dispatcher.dispatch(candidates, now);

  let notices = emptyNoticeReport();
  if (deps.leadNotices) {
    const open = await selectLeadNotices(deps.store, now, { ...deps.select, offsets: deps.leadNotices.offsets });
    notices = await sendLeadNotices(deps.leadNotices, open);
  }

  const noticeCount = notices.sent.length + notices.failed.length;
  if (candidates.length > 0 || noticeCount > 0 || malformed > 0) {
    console.log(
      `[cycle] ${now.toISOString()}: ${candidates.length} due, ${report.sent.length} sent, ` +
        `${report.failed.length} failed, ${report.skipped.length} skipped, ` +
        `${notices.sent.length} notices, ${malformed} malformed`,
    );
  }
  return { status: "completed", now, due: candidates.length, report, notices, malformed };
}
