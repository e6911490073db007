import type { EmployeeRepository } from "../employees/repository";
import { newId } from "../shared/credentials";
import { type Clock, nextTimestamp, systemClock } from "../shared/date-utils";
import { InvalidStateError } from "../shared/errors";
import type {
  LeaveDecision,
  LeaveRequest,
  LeaveRequestChanges,
  LeaveStatus,
  NewLeaveRequest,
} from "../shared/types";
import { LEAVE_STATUSES } from "../shared/types";
import { validateDateRange } from "../shared/validation";
import { oneOf, optionalText, text } from "../store/fields";
import type { RecordStore, StoredRecord } from "../store/record-store";

const COLLECTION = "leave_requests";

export const CANCELLED_COMMENT = "Cancelled by employee";

export function decodeLeaveRequest(row: StoredRecord): LeaveRequest {
  return {
    id: text(row, "id"),
    employeeId: text(row, "employee_id"),
    startDate: text(row, "start_date"),
    endDate: text(row, "end_date"),
    leaveType: text(row, "leave_type"),
    reason: text(row, "reason"),
    status: oneOf(row, "status", LEAVE_STATUSES, "pending"),
    managerId: optionalText(row, "manager_id"),
    managerComments: optionalText(row, "manager_comments"),
    approvedBy: optionalText(row, "approved_by"),
    approvedAt: optionalText(row, "approved_at"),
    createdAt: text(row, "created_at"),
    updatedAt: text(row, "updated_at"),
  };
}

export function encodeLeaveRequest(request: LeaveRequest): StoredRecord {
  return {
    id: request.id,
    employee_id: request.employeeId,
    start_date: request.startDate,
    end_date: request.endDate,
    leave_type: request.leaveType,
    reason: request.reason,
    status: request.status,
    manager_id: request.managerId,
    manager_comments: request.managerComments,
    approved_by: request.approvedBy,
    approved_at: request.approvedAt,
    created_at: request.createdAt,
    updated_at: request.updatedAt,
  };
}

const byCreatedAt = (a: LeaveRequest, b: LeaveRequest) =>
  a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0;

export class LeaveRequestRepository {
  constructor(
    private readonly store: RecordStore,
    private readonly employees: EmployeeRepository,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Files a pending request. The employee's current manager is copied onto
   * the request and decides who may approve it, even if the employee is
   * reassigned later.
   */
  async create(employeeId: string, input: NewLeaveRequest): Promise<LeaveRequest> {
    validateDateRange(input.startDate, input.endDate);

    const employee = await this.employees.getById(employeeId);

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const now = this.clock().toISOString();
      const request: LeaveRequest = {
        id: newId(),
        employeeId,
        startDate: input.startDate,
        endDate: input.endDate,
        leaveType: input.leaveType,
        reason: input.reason,
        status: "pending",
        managerId: employee?.managerId ?? null,
        managerComments: null,
        approvedBy: null,
        approvedAt: null,
        createdAt: now,
        updatedAt: now,
      };

      rows.push(encodeLeaveRequest(request));
      await section.write(rows);
      return request;
    });
  }

  async getById(id: string): Promise<LeaveRequest | null> {
    const rows = await this.store.read(COLLECTION);
    const row = rows.find((candidate) => text(candidate, "id") === id);
    return row ? decodeLeaveRequest(row) : null;
  }

  /** Requests filed by one employee, newest first. */
  async listByEmployee(employeeId: string, status?: LeaveStatus): Promise<LeaveRequest[]> {
    const requests = await this.listAll();
    return requests
      .filter((request) => request.employeeId === employeeId)
      .filter((request) => !status || request.status === status)
      .sort((a, b) => byCreatedAt(b, a));
  }

  async listByManager(managerId: string): Promise<LeaveRequest[]> {
    const requests = await this.listAll();
    return requests.filter((request) => request.managerId === managerId);
  }

  /** Pending requests, oldest first; limited to one approver when given. */
  async listPending(managerId?: string): Promise<LeaveRequest[]> {
    const requests = managerId ? await this.listByManager(managerId) : await this.listAll();
    return requests.filter((request) => request.status === "pending").sort(byCreatedAt);
  }

  async listAll(): Promise<LeaveRequest[]> {
    return (await this.store.read(COLLECTION)).map(decodeLeaveRequest);
  }

  async update(id: string, changes: LeaveRequestChanges): Promise<LeaveRequest | null> {
    return this.mutatePending(id, (current) => {
      const next = { ...current };
      if (changes.startDate !== undefined) next.startDate = changes.startDate;
      if (changes.endDate !== undefined) next.endDate = changes.endDate;
      if (changes.leaveType !== undefined) next.leaveType = changes.leaveType;
      if (changes.reason !== undefined) next.reason = changes.reason;

      if (changes.startDate !== undefined || changes.endDate !== undefined) {
        validateDateRange(next.startDate, next.endDate);
      }
      return next;
    });
  }

  async decide(id: string, approverId: string, decision: LeaveDecision): Promise<LeaveRequest | null> {
    return this.mutatePending(id, (current) => ({
      ...current,
      status: decision.status,
      managerComments: decision.managerComments ?? null,
      approvedBy: approverId,
      approvedAt: this.clock().toISOString(),
    }));
  }

  /** Withdrawal by the employee; recorded as a rejection. */
  async cancel(id: string, actorId: string): Promise<LeaveRequest | null> {
    return this.decide(id, actorId, { status: "rejected", managerComments: CANCELLED_COMMENT });
  }

  private async mutatePending(
    id: string,
    mutate: (current: LeaveRequest) => LeaveRequest
  ): Promise<LeaveRequest | null> {
    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const index = rows.findIndex((row) => text(row, "id") === id);
      if (index === -1) {
        return null;
      }

      const current = decodeLeaveRequest(rows[index]);
      if (current.status !== "pending") {
        throw new InvalidStateError(`Leave request has already been ${current.status}`);
      }

      const updated = mutate(current);
      updated.updatedAt = nextTimestamp(this.clock(), current.updatedAt);

      rows[index] = { ...rows[index], ...encodeLeaveRequest(updated) };
      await section.write(rows);
      return updated;
    });
  }
}
