import { MS_PER_HOUR } from "../shared/date-utils";
import type { Employee, LeaveRequest, WorkLog } from "../shared/types";
import { summarizeWorkLogs, type WorkLogSummary } from "../work-logs/summary";

const RECENT_WINDOW_MS = 7 * 24 * MS_PER_HOUR;

export interface DashboardStats {
  totalEmployees: number;
  activeEmployees: number;
  pendingLeaveRequests: number;
  recentWorkLogs: number;
  completionRate: number;
}

export function buildDashboardStats(input: {
  employees: Employee[];
  leaveRequests: LeaveRequest[];
  workLogs: WorkLog[];
  now: Date;
}): DashboardStats {
  const since = input.now.getTime() - RECENT_WINDOW_MS;
  return {
    totalEmployees: input.employees.length,
    activeEmployees: input.employees.filter((employee) => employee.isActive).length,
    pendingLeaveRequests: input.leaveRequests.filter((request) => request.status === "pending").length,
    recentWorkLogs: input.workLogs.filter((log) => Date.parse(log.createdAt) > since).length,
    completionRate: summarizeWorkLogs(input.workLogs).completionRate,
  };
}

export interface ProductivityRow extends WorkLogSummary {
  employeeId: string;
  employeeName: string;
  department: string | null;
}

export interface ProductivityReport {
  employees: ProductivityRow[];
  summary: {
    totalEmployees: number;
    totalHours: number;
    averageCompletionRate: number;
  };
}

/** One row per active employee, optionally limited to a department. */
export function buildProductivityReport(
  employees: Employee[],
  logsByEmployee: Map<string, WorkLog[]>,
  department?: string
): ProductivityReport {
  const rows = employees
    .filter((employee) => employee.isActive)
    .filter((employee) => !department || employee.department === department)
    .map((employee): ProductivityRow => ({
      employeeId: employee.id,
      employeeName: `${employee.firstName} ${employee.lastName}`,
      department: employee.department,
      ...summarizeWorkLogs(logsByEmployee.get(employee.id) ?? []),
    }));

  return {
    employees: rows,
    summary: {
      totalEmployees: rows.length,
      totalHours: rows.reduce((sum, row) => sum + row.totalHours, 0),
      averageCompletionRate:
        rows.length > 0 ? rows.reduce((sum, row) => sum + row.completionRate, 0) / rows.length : 0,
    },
  };
}
