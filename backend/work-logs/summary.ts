import type { WorkLog } from "../shared/types";

export interface WorkLogSummary {
  totalHours: number;
  totalLogs: number;
  completedTasks: number;
  inProgressTasks: number;
  blockedTasks: number;
  completionRate: number;
}

export function summarizeWorkLogs(logs: WorkLog[]): WorkLogSummary {
  const count = (status: WorkLog["status"]) => logs.filter((log) => log.status === status).length;
  const completedTasks = count("completed");

  return {
    totalHours: logs.reduce((sum, log) => sum + log.timeSpent, 0),
    totalLogs: logs.length,
    completedTasks,
    inProgressTasks: count("in_progress"),
    blockedTasks: count("blocked"),
    completionRate: logs.length > 0 ? completedTasks / logs.length : 0,
  };
}
