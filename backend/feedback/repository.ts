import { newId } from "../shared/credentials";
import { type Clock, systemClock } from "../shared/date-utils";
import type { Feedback, NewFeedback } from "../shared/types";
import { validateRating } from "../shared/validation";
import { optionalNumeric, text } from "../store/fields";
import type { RecordStore, StoredRecord } from "../store/record-store";
import type { WorkLogRepository } from "../work-logs/repository";

const COLLECTION = "feedback";

export function decodeFeedback(row: StoredRecord): Feedback {
  return {
    id: text(row, "id"),
    workLogId: text(row, "work_log_id"),
    employeeId: text(row, "employee_id"),
    managerId: text(row, "manager_id"),
    feedbackText: text(row, "feedback_text"),
    rating: optionalNumeric(row, "rating"),
    createdAt: text(row, "created_at"),
    updatedAt: text(row, "updated_at"),
  };
}

export function encodeFeedback(feedback: Feedback): StoredRecord {
  return {
    id: feedback.id,
    work_log_id: feedback.workLogId,
    employee_id: feedback.employeeId,
    manager_id: feedback.managerId,
    feedback_text: feedback.feedbackText,
    rating: feedback.rating,
    created_at: feedback.createdAt,
    updated_at: feedback.updatedAt,
  };
}

const newestFirst = (a: Feedback, b: Feedback) =>
  a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0;

export class FeedbackRepository {
  constructor(
    private readonly store: RecordStore,
    private readonly workLogs: WorkLogRepository,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Records feedback on a work log, or returns null when the log does not
   * exist. The log is read before the feedback collection is locked; the two
   * collections are not updated atomically together.
   */
  async create(managerId: string, input: NewFeedback): Promise<Feedback | null> {
    validateRating(input.rating);

    const workLog = await this.workLogs.getById(input.workLogId);
    if (!workLog) {
      return null;
    }

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const now = this.clock().toISOString();
      const feedback: Feedback = {
        id: newId(),
        workLogId: workLog.id,
        employeeId: workLog.employeeId,
        managerId,
        feedbackText: input.feedbackText,
        rating: input.rating ?? null,
        createdAt: now,
        updatedAt: now,
      };

      rows.push(encodeFeedback(feedback));
      await section.write(rows);
      return feedback;
    });
  }

  async listByEmployee(employeeId: string): Promise<Feedback[]> {
    return this.listWhere((feedback) => feedback.employeeId === employeeId);
  }

  async listByWorkLog(workLogId: string): Promise<Feedback[]> {
    return this.listWhere((feedback) => feedback.workLogId === workLogId);
  }

  async listByManager(managerId: string): Promise<Feedback[]> {
    return this.listWhere((feedback) => feedback.managerId === managerId);
  }

  private async listWhere(predicate: (feedback: Feedback) => boolean): Promise<Feedback[]> {
    const rows = await this.store.read(COLLECTION);
    return rows.map(decodeFeedback).filter(predicate).sort(newestFirst);
  }
}
