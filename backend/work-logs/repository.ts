import { newId } from "../shared/credentials";
import { type Clock, isWithinDateRange, nextTimestamp, systemClock } from "../shared/date-utils";
import type { NewWorkLog, WorkLog, WorkLogAttachment, WorkLogChanges } from "../shared/types";
import { TASK_STATUSES } from "../shared/types";
import { validateCalendarDate, validateHours } from "../shared/validation";
import { numeric, objectList, oneOf, optionalText, text } from "../store/fields";
import type { RecordStore, StoredRecord } from "../store/record-store";

const COLLECTION = "work_logs";

export interface WorkLogFilter {
  startDate?: string | null;
  endDate?: string | null;
}

export function decodeWorkLog(row: StoredRecord): WorkLog {
  const attachments: WorkLogAttachment[] = objectList(row, "attachments").map((item) => ({
    filename: text(item, "filename"),
    url: text(item, "url"),
    uploadedAt: text(item, "uploaded_at"),
  }));

  return {
    id: text(row, "id"),
    employeeId: text(row, "employee_id"),
    date: text(row, "date"),
    taskDescription: text(row, "task_description"),
    timeSpent: numeric(row, "time_spent"),
    status: oneOf(row, "status", TASK_STATUSES, "in_progress"),
    project: optionalText(row, "project"),
    category: optionalText(row, "category"),
    attachments,
    notes: optionalText(row, "notes"),
    managerFeedback: optionalText(row, "manager_feedback"),
    createdAt: text(row, "created_at"),
    updatedAt: text(row, "updated_at"),
  };
}

export function encodeWorkLog(log: WorkLog): StoredRecord {
  return {
    id: log.id,
    employee_id: log.employeeId,
    date: log.date,
    task_description: log.taskDescription,
    time_spent: log.timeSpent,
    status: log.status,
    project: log.project,
    category: log.category,
    attachments: log.attachments.map((attachment) => ({
      filename: attachment.filename,
      url: attachment.url,
      uploaded_at: attachment.uploadedAt,
    })),
    notes: log.notes,
    manager_feedback: log.managerFeedback,
    created_at: log.createdAt,
    updated_at: log.updatedAt,
  };
}

function applyChanges(log: WorkLog, changes: WorkLogChanges): WorkLog {
  const next = { ...log };
  if (changes.taskDescription !== undefined) next.taskDescription = changes.taskDescription;
  if (changes.timeSpent !== undefined) next.timeSpent = changes.timeSpent;
  if (changes.status !== undefined) next.status = changes.status;
  if (changes.project !== undefined) next.project = changes.project;
  if (changes.category !== undefined) next.category = changes.category;
  if (changes.notes !== undefined) next.notes = changes.notes;
  if (changes.managerFeedback !== undefined) next.managerFeedback = changes.managerFeedback;
  return next;
}

export class WorkLogRepository {
  constructor(
    private readonly store: RecordStore,
    private readonly clock: Clock = systemClock
  ) {}

  async create(employeeId: string, input: NewWorkLog): Promise<WorkLog> {
    validateCalendarDate(input.date, "date");
    validateHours(input.timeSpent, "timeSpent");

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const now = this.clock().toISOString();
      const log: WorkLog = {
        id: newId(),
        employeeId,
        date: input.date,
        taskDescription: input.taskDescription,
        timeSpent: input.timeSpent,
        status: input.status,
        project: input.project ?? null,
        category: input.category ?? null,
        attachments: [],
        notes: input.notes ?? null,
        managerFeedback: null,
        createdAt: now,
        updatedAt: now,
      };

      rows.push(encodeWorkLog(log));
      await section.write(rows);
      return log;
    });
  }

  async getById(id: string): Promise<WorkLog | null> {
    const rows = await this.store.read(COLLECTION);
    const row = rows.find((candidate) => text(candidate, "id") === id);
    return row ? decodeWorkLog(row) : null;
  }

  /** Logs of one employee, newest calendar date first. */
  async listByEmployee(employeeId: string, filter: WorkLogFilter = {}): Promise<WorkLog[]> {
    const logs = (await this.store.read(COLLECTION))
      .map(decodeWorkLog)
      .filter(
        (log) =>
          log.employeeId === employeeId &&
          isWithinDateRange(log.date, filter.startDate, filter.endDate)
      );
    return logs.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  }

  async listAll(): Promise<WorkLog[]> {
    return (await this.store.read(COLLECTION)).map(decodeWorkLog);
  }

  async update(id: string, changes: WorkLogChanges): Promise<WorkLog | null> {
    if (changes.timeSpent !== undefined) {
      validateHours(changes.timeSpent, "timeSpent");
    }

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const index = rows.findIndex((row) => text(row, "id") === id);
      if (index === -1) {
        return null;
      }

      const current = decodeWorkLog(rows[index]);
      const updated = applyChanges(current, changes);
      updated.updatedAt = nextTimestamp(this.clock(), current.updatedAt);

      rows[index] = { ...rows[index], ...encodeWorkLog(updated) };
      await section.write(rows);
      return updated;
    });
  }

  async setManagerFeedback(id: string, feedback: string): Promise<WorkLog | null> {
    return this.update(id, { managerFeedback: feedback });
  }
}
