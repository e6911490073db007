import { hashPassword, newId, verifyPassword } from "../shared/credentials";
import { type Clock, nextTimestamp, systemClock } from "../shared/date-utils";
import { ConflictError } from "../shared/errors";
import type { Employee, EmployeeChanges, NewEmployee, PublicEmployee } from "../shared/types";
import { ROLES } from "../shared/types";
import { validateCalendarDate, validateEmail } from "../shared/validation";
import { flag, oneOf, optionalText, text } from "../store/fields";
import type { RecordStore, StoredRecord } from "../store/record-store";

const COLLECTION = "employees";

export function decodeEmployee(row: StoredRecord): Employee {
  return {
    id: text(row, "id"),
    email: text(row, "email"),
    passwordHash: text(row, "password_hash"),
    firstName: text(row, "first_name"),
    lastName: text(row, "last_name"),
    role: oneOf(row, "role", ROLES, "employee"),
    managerId: optionalText(row, "manager_id"),
    department: optionalText(row, "department"),
    position: optionalText(row, "position"),
    hireDate: text(row, "hire_date"),
    isActive: flag(row, "is_active", true),
    createdAt: text(row, "created_at"),
    updatedAt: text(row, "updated_at"),
  };
}

export function encodeEmployee(employee: Employee): StoredRecord {
  return {
    id: employee.id,
    email: employee.email,
    password_hash: employee.passwordHash,
    first_name: employee.firstName,
    last_name: employee.lastName,
    role: employee.role,
    manager_id: employee.managerId,
    department: employee.department,
    position: employee.position,
    hire_date: employee.hireDate,
    is_active: employee.isActive,
    created_at: employee.createdAt,
    updated_at: employee.updatedAt,
  };
}

export function toPublicEmployee(employee: Employee): PublicEmployee {
  const { passwordHash: _passwordHash, ...rest } = employee;
  return rest;
}

function applyChanges(employee: Employee, changes: EmployeeChanges): Employee {
  const next = { ...employee };
  if (changes.email !== undefined) next.email = changes.email;
  if (changes.firstName !== undefined) next.firstName = changes.firstName;
  if (changes.lastName !== undefined) next.lastName = changes.lastName;
  if (changes.role !== undefined) next.role = changes.role;
  if (changes.managerId !== undefined) next.managerId = changes.managerId;
  if (changes.department !== undefined) next.department = changes.department;
  if (changes.position !== undefined) next.position = changes.position;
  if (changes.isActive !== undefined) next.isActive = changes.isActive;
  return next;
}

export class EmployeeRepository {
  constructor(
    private readonly store: RecordStore,
    private readonly clock: Clock = systemClock
  ) {}

  async create(input: NewEmployee): Promise<Employee> {
    validateEmail(input.email);
    validateCalendarDate(input.hireDate, "hireDate");

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      if (rows.some((row) => text(row, "email") === input.email)) {
        throw new ConflictError("Employee with this email already exists");
      }

      const now = this.clock().toISOString();
      const employee: Employee = {
        id: newId(),
        email: input.email,
        passwordHash: hashPassword(input.password),
        firstName: input.firstName,
        lastName: input.lastName,
        role: input.role ?? "employee",
        managerId: input.managerId ?? null,
        department: input.department ?? null,
        position: input.position ?? null,
        hireDate: input.hireDate,
        isActive: true,
        createdAt: now,
        updatedAt: now,
      };

      rows.push(encodeEmployee(employee));
      await section.write(rows);
      return employee;
    });
  }

  async getById(id: string): Promise<Employee | null> {
    const rows = await this.store.read(COLLECTION);
    const row = rows.find((candidate) => text(candidate, "id") === id);
    return row ? decodeEmployee(row) : null;
  }

  async getByEmail(email: string): Promise<Employee | null> {
    const rows = await this.store.read(COLLECTION);
    const row = rows.find((candidate) => text(candidate, "email") === email);
    return row ? decodeEmployee(row) : null;
  }

  async list(options: { activeOnly?: boolean } = {}): Promise<Employee[]> {
    const employees = (await this.store.read(COLLECTION)).map(decodeEmployee);
    return options.activeOnly ? employees.filter((employee) => employee.isActive) : employees;
  }

  async listDirectReports(managerId: string): Promise<Employee[]> {
    const employees = await this.list({ activeOnly: true });
    return employees.filter((employee) => employee.managerId === managerId);
  }

  async update(id: string, changes: EmployeeChanges): Promise<Employee | null> {
    if (changes.email !== undefined) {
      validateEmail(changes.email);
    }

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const index = rows.findIndex((row) => text(row, "id") === id);
      if (index === -1) {
        return null;
      }

      const current = decodeEmployee(rows[index]);
      if (
        changes.email !== undefined &&
        changes.email !== current.email &&
        rows.some((row) => text(row, "email") === changes.email)
      ) {
        throw new ConflictError("Employee with this email already exists");
      }

      const updated = applyChanges(current, changes);
      updated.updatedAt = nextTimestamp(this.clock(), current.updatedAt);

      rows[index] = { ...rows[index], ...encodeEmployee(updated) };
      await section.write(rows);
      return updated;
    });
  }

  async deactivate(id: string): Promise<Employee | null> {
    return this.update(id, { isActive: false });
  }

  async authenticate(email: string, password: string): Promise<Employee | null> {
    const employee = await this.getByEmail(email);
    if (employee && verifyPassword(password, employee.passwordHash)) {
      return employee;
    }
    return null;
  }
}
