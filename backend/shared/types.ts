export type Role = "employee" | "manager" | "admin";

export type TaskStatus = "in_progress" | "completed" | "blocked";

export type LeaveStatus = "pending" | "approved" | "rejected";

export type AuditAction =
  | "create"
  | "update"
  | "delete"
  | "login"
  | "logout"
  | "approve"
  | "reject";

export const ROLES: readonly Role[] = ["employee", "manager", "admin"];
export const TASK_STATUSES: readonly TaskStatus[] = ["in_progress", "completed", "blocked"];
export const LEAVE_STATUSES: readonly LeaveStatus[] = ["pending", "approved", "rejected"];
export const AUDIT_ACTIONS: readonly AuditAction[] = [
  "create",
  "update",
  "delete",
  "login",
  "logout",
  "approve",
  "reject",
];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface Employee {
  id: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: Role;
  managerId: string | null;
  department: string | null;
  position: string | null;
  hireDate: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

/** Employee as handed out to callers: never carries the password hash. */
export type PublicEmployee = Omit<Employee, "passwordHash">;

export interface NewEmployee {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  role?: Role;
  managerId?: string | null;
  department?: string | null;
  position?: string | null;
  hireDate: string;
}

export interface EmployeeChanges {
  email?: string;
  firstName?: string;
  lastName?: string;
  role?: Role;
  managerId?: string | null;
  department?: string | null;
  position?: string | null;
  isActive?: boolean;
}

export interface WorkLogAttachment {
  filename: string;
  url: string;
  uploadedAt: string;
}

export interface WorkLog {
  id: string;
  employeeId: string;
  date: string;
  taskDescription: string;
  timeSpent: number;
  status: TaskStatus;
  project: string | null;
  category: string | null;
  attachments: WorkLogAttachment[];
  notes: string | null;
  managerFeedback: string | null;
  createdAt: string;
  updatedAt: string;
}

export type WorkLogView = WorkLog & { canEdit: boolean };

export interface NewWorkLog {
  date: string;
  taskDescription: string;
  timeSpent: number;
  status: TaskStatus;
  project?: string | null;
  category?: string | null;
  notes?: string | null;
}

export interface WorkLogChanges {
  taskDescription?: string;
  timeSpent?: number;
  status?: TaskStatus;
  project?: string | null;
  category?: string | null;
  notes?: string | null;
  managerFeedback?: string | null;
}

export interface LeaveRequest {
  id: string;
  employeeId: string;
  startDate: string;
  endDate: string;
  leaveType: string;
  reason: string;
  status: LeaveStatus;
  managerId: string | null;
  managerComments: string | null;
  approvedBy: string | null;
  approvedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewLeaveRequest {
  startDate: string;
  endDate: string;
  leaveType: string;
  reason: string;
}

export interface LeaveRequestChanges {
  startDate?: string;
  endDate?: string;
  leaveType?: string;
  reason?: string;
}

export interface LeaveDecision {
  status: Exclude<LeaveStatus, "pending">;
  managerComments?: string | null;
}

export interface Feedback {
  id: string;
  workLogId: string;
  employeeId: string;
  managerId: string;
  feedbackText: string;
  rating: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewFeedback {
  workLogId: string;
  feedbackText: string;
  rating?: number | null;
}

export interface AuditTrail {
  id: string;
  userId: string;
  action: AuditAction;
  resourceType: string;
  resourceId: string;
  details: JsonObject;
  ipAddress: string | null;
  userAgent: string | null;
  timestamp: string;
}

export interface SystemSettings {
  id: string;
  logEditTimeLimitHours: number;
  defaultLeaveTypes: string[];
  defaultTaskCategories: string[];
  notificationSettings: JsonObject;
  createdAt: string;
  updatedAt: string;
}

export interface SettingsChanges {
  logEditTimeLimitHours?: number;
  defaultLeaveTypes?: string[];
  defaultTaskCategories?: string[];
  notificationSettings?: JsonObject;
}
