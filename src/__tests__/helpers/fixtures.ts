import type { DueCandidate, Reminder, ReminderSchedule } from "../../types.js";

type ReminderFields = Partial<Omit<Reminder, "frequency" | "day">>;

export function makeReminder(schedule: ReminderSchedule, fields: ReminderFields = {}): Reminder {
  return {
    id: 1,
    user_id: 100,
    text: "Electricity",
    time: "07:35",
    timezone: "Asia/Ho_Chi_Minh",
    active: true,
    created_at: new Date("2024-01-01T00:00:00Z"),
    last_sent: null,
    deactivated_reason: null,
    ...fields,
    ...schedule,
  };
}

export function daily(fields: ReminderFields = {}): Reminder {
  return makeReminder({ frequency: "daily", day: null }, fields);
}

export function candidate(reminder: Reminder, localDate: string, scheduledFor = new Date()): DueCandidate {
  return { reminder, occurrenceId: `${reminder.id}:${localDate}`, scheduledFor };
}
