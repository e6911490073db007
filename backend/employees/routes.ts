import { Router } from "express";
import { auditContext } from "../auth/middleware";
import type { Services } from "../services";
import {
  asyncHandler,
  compact,
  nullableString,
  optionalBoolean,
  optionalEnum,
  optionalString,
  readBody,
  requiredString,
  type Body,
} from "../shared/http";
import { HttpError } from "../shared/http-error";
import { canAccessEmployeeData, isAdmin, isDirectManagerOf, requireAdmin, requireAuth } from "../shared/rbac";
import type { EmployeeChanges, NewEmployee } from "../shared/types";
import { ROLES } from "../shared/types";
import { toPublicEmployee } from "./repository";

export function parseNewEmployee(body: Body): NewEmployee {
  return {
    email: requiredString(body, "email"),
    password: requiredString(body, "password"),
    firstName: requiredString(body, "firstName"),
    lastName: requiredString(body, "lastName"),
    role: optionalEnum(body, "role", ROLES),
    managerId: nullableString(body, "managerId"),
    department: nullableString(body, "department"),
    position: nullableString(body, "position"),
    hireDate: requiredString(body, "hireDate"),
  };
}

function parseEmployeeChanges(body: Body): EmployeeChanges {
  return {
    email: optionalString(body, "email"),
    firstName: optionalString(body, "firstName"),
    lastName: optionalString(body, "lastName"),
    role: optionalEnum(body, "role", ROLES),
    managerId: nullableString(body, "managerId"),
    department: nullableString(body, "department"),
    position: nullableString(body, "position"),
    isActive: optionalBoolean(body, "isActive"),
  };
}

export function createEmployeesRouter(services: Services): Router {
  const router = Router();
  const { employees, audit } = services;

  router.post("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    requireAdmin(actor.role);

    const employee = await employees.create(parseNewEmployee(readBody(req.body)));
    await audit.record(
      actor.id,
      "create",
      "employee",
      employee.id,
      { email: employee.email, role: employee.role },
      auditContext(req)
    );

    res.status(201).json(toPublicEmployee(employee));
  }));

  router.get("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    requireAdmin(actor.role);

    const activeOnly = req.query.activeOnly !== "false";
    const list = await employees.list({ activeOnly });
    res.json(list.map(toPublicEmployee));
  }));

  router.get("/me", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    res.json(toPublicEmployee(actor));
  }));

  router.get("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;

    if (!(await canAccessEmployeeData(actor, id, employees))) {
      throw new HttpError(403, "Not authorized to access this employee's data");
    }

    const employee = await employees.getById(id);
    if (!employee) {
      throw new HttpError(404, "Employee not found");
    }
    res.json(toPublicEmployee(employee));
  }));

  router.put("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;
    const changes = parseEmployeeChanges(readBody(req.body));

    const target = await employees.getById(id);
    if (!target) {
      throw new HttpError(404, "Employee not found");
    }

    if (changes.role !== undefined && !isAdmin(actor.role)) {
      throw new HttpError(403, "Only administrators can change roles");
    }
    if (changes.isActive !== undefined && !isAdmin(actor.role)) {
      throw new HttpError(403, "Only administrators can change account status");
    }
    if (!(actor.id === id || isAdmin(actor.role) || isDirectManagerOf(actor, target))) {
      throw new HttpError(403, "Not authorized to update this employee");
    }

    const updated = await employees.update(id, changes);
    if (!updated) {
      throw new HttpError(404, "Employee not found");
    }

    await audit.record(
      actor.id,
      "update",
      "employee",
      id,
      compact({
        email: changes.email,
        first_name: changes.firstName,
        last_name: changes.lastName,
        role: changes.role,
        manager_id: changes.managerId,
        department: changes.department,
        position: changes.position,
        is_active: changes.isActive,
      }),
      auditContext(req)
    );

    res.json(toPublicEmployee(updated));
  }));

  router.delete("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    requireAdmin(actor.role);
    const { id } = req.params;

    const deactivated = await employees.deactivate(id);
    if (!deactivated) {
      throw new HttpError(404, "Employee not found");
    }

    await audit.record(actor.id, "delete", "employee", id, { action: "soft_delete" }, auditContext(req));
    res.json({ message: "Employee deactivated successfully" });
  }));

  router.get("/:id/direct-reports", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;

    if (!isAdmin(actor.role) && actor.id !== id) {
      throw new HttpError(403, "Not authorized to view these direct reports");
    }

    const reports = await employees.listDirectReports(id);
    res.json(reports.map(toPublicEmployee));
  }));

  return router;
}
