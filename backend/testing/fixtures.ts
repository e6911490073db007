import type { Employee, WorkLog } from "../shared/types";

const STAMP = "2024-01-01T00:00:00.000Z";

export function buildEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    id: "emp-1",
    email: "alex@example.com",
    passwordHash: "",
    firstName: "Alex",
    lastName: "Doe",
    role: "employee",
    managerId: null,
    department: null,
    position: null,
    hireDate: "2023-06-01",
    isActive: true,
    createdAt: STAMP,
    updatedAt: STAMP,
    ...overrides,
  };
}

export function buildWorkLog(overrides: Partial<WorkLog> = {}): WorkLog {
  return {
    id: "log-1",
    employeeId: "emp-1",
    date: "2024-03-01",
    taskDescription: "Review pull requests",
    timeSpent: 1,
    status: "in_progress",
    project: null,
    category: null,
    attachments: [],
    notes: null,
    managerFeedback: null,
    createdAt: STAMP,
    updatedAt: STAMP,
    ...overrides,
  };
}
