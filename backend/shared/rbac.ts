import { MS_PER_HOUR, millisecondsSince } from "./date-utils";
import { HttpError } from "./http-error";
import type { Employee, LeaveRequest, Role, SystemSettings, WorkLog, WorkLogView } from "./types";

type Actor = Pick<Employee, "id" | "role">;

export interface EmployeeLookup {
  getById(id: string): Promise<Employee | null>;
}

export function isAdmin(role: Role | undefined): boolean {
  return role === "admin";
}

export function isManager(role: Role | undefined): boolean {
  return role === "manager";
}

export function isManagerOrAdmin(role: Role | undefined): boolean {
  return role === "manager" || role === "admin";
}

export function requireAuth(actor?: Employee | null): Employee {
  if (!actor) {
    throw new HttpError(401, "Could not validate credentials");
  }
  return actor;
}

export function requireManager(role: Role | undefined): void {
  if (!isManagerOrAdmin(role)) {
    throw new HttpError(403, "This action requires manager role");
  }
}

export function requireAdmin(role: Role | undefined): void {
  if (!isAdmin(role)) {
    throw new HttpError(403, "This action requires admin role");
  }
}

/** Whether `manager` is the direct manager of `report`. One hop only. */
export function isDirectManagerOf(manager: Actor, report: Pick<Employee, "managerId">): boolean {
  return isManager(manager.role) && report.managerId === manager.id;
}

export async function canAccessEmployeeData(
  actor: Actor,
  targetId: string,
  employees: EmployeeLookup
): Promise<boolean> {
  if (isAdmin(actor.role) || actor.id === targetId) {
    return true;
  }
  if (!isManager(actor.role)) {
    return false;
  }
  const target = await employees.getById(targetId);
  return target !== null && isDirectManagerOf(actor, target);
}

// Uses the manager copied onto the request when it was filed, not the
// employee's current manager.
export function canApproveLeave(actor: Actor, request: Pick<LeaveRequest, "managerId">): boolean {
  if (isAdmin(actor.role)) {
    return true;
  }
  return isManager(actor.role) && request.managerId === actor.id;
}

export function canEditWorkLog(
  log: Pick<WorkLog, "employeeId" | "createdAt">,
  actor: Actor,
  settings: Pick<SystemSettings, "logEditTimeLimitHours">,
  now: Date
): boolean {
  if (isAdmin(actor.role)) {
    return true;
  }
  if (log.employeeId !== actor.id) {
    return false;
  }
  const age = millisecondsSince(log.createdAt, now);
  return age <= settings.logEditTimeLimitHours * MS_PER_HOUR;
}

export function canGiveFeedback(actor: Actor, logOwner: Pick<Employee, "managerId">): boolean {
  return isAdmin(actor.role) || isDirectManagerOf(actor, logOwner);
}

export function withEditFlag(
  log: WorkLog,
  actor: Actor,
  settings: Pick<SystemSettings, "logEditTimeLimitHours">,
  now: Date
): WorkLogView {
  return { ...log, canEdit: canEditWorkLog(log, actor, settings, now) };
}
