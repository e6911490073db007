import { AuditTrailRepository } from "./audit/repository";
import { EmployeeRepository } from "./employees/repository";
import { FeedbackRepository } from "./feedback/repository";
import { LeaveRequestRepository } from "./leave-requests/repository";
import { SettingsRepository } from "./settings/repository";
import { AuditRecorder } from "./shared/audit";
import { type Clock, systemClock } from "./shared/date-utils";
import { RecordStore } from "./store/record-store";
import { WorkLogRepository } from "./work-logs/repository";

export interface Services {
  clock: Clock;
  store: RecordStore;
  employees: EmployeeRepository;
  workLogs: WorkLogRepository;
  leaveRequests: LeaveRequestRepository;
  feedback: FeedbackRepository;
  auditTrails: AuditTrailRepository;
  settings: SettingsRepository;
  audit: AuditRecorder;
}

export interface ServiceOptions {
  dataDir: string;
  clock?: Clock;
}

// Built once per process and handed to whatever needs storage.
export async function createServices(options: ServiceOptions): Promise<Services> {
  const clock = options.clock ?? systemClock;
  const store = await RecordStore.open(options.dataDir);

  const employees = new EmployeeRepository(store, clock);
  const workLogs = new WorkLogRepository(store, clock);
  const auditTrails = new AuditTrailRepository(store, clock);

  return {
    clock,
    store,
    employees,
    workLogs,
    leaveRequests: new LeaveRequestRepository(store, employees, clock),
    feedback: new FeedbackRepository(store, workLogs, clock),
    auditTrails,
    settings: new SettingsRepository(store, clock),
    audit: new AuditRecorder(auditTrails),
  };
}
