import { Router } from "express";
import { auditContext } from "../auth/middleware";
import { parseNewEmployee } from "../employees/routes";
import type { Services } from "../services";
import { ConflictError, ValidationError } from "../shared/errors";
import {
  asyncHandler,
  compact,
  optionalEnum,
  optionalJsonObject,
  optionalNumber,
  optionalStringList,
  queryParam,
  readBody,
} from "../shared/http";
import { HttpError } from "../shared/http-error";
import { requireAdmin, requireAuth } from "../shared/rbac";
import type { SettingsChanges, WorkLog } from "../shared/types";
import { AUDIT_ACTIONS } from "../shared/types";
import { validateCalendarDate } from "../shared/validation";
import { MAX_AUDIT_LIMIT } from "../audit/repository";
import { buildDashboardStats, buildProductivityReport } from "./reports";

interface BulkRowError {
  row: number;
  email: string;
  error: string;
}

export function createAdminRouter(services: Services): Router {
  const router = Router();
  const { employees, workLogs, leaveRequests, auditTrails, settings, audit, clock } = services;

  router.use((req, _res, next) => {
    const actor = requireAuth(req.actor);
    requireAdmin(actor.role);
    next();
  });

  router.get("/dashboard", asyncHandler(async (_req, res) => {
    const [allEmployees, allRequests, allLogs] = await Promise.all([
      employees.list(),
      leaveRequests.listAll(),
      workLogs.listAll(),
    ]);
    res.json(
      buildDashboardStats({
        employees: allEmployees,
        leaveRequests: allRequests,
        workLogs: allLogs,
        now: clock(),
      })
    );
  }));

  router.get("/audit-trails", asyncHandler(async (req, res) => {
    const rawLimit = queryParam(req.query.limit);
    const limit = rawLimit === undefined ? undefined : Number(rawLimit);
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > MAX_AUDIT_LIMIT)) {
      throw new HttpError(400, `limit must be an integer between 1 and ${MAX_AUDIT_LIMIT}`);
    }

    const entries = await auditTrails.list({
      limit,
      userId: queryParam(req.query.userId),
      action: optionalEnum({ action: req.query.action }, "action", AUDIT_ACTIONS),
      resourceType: queryParam(req.query.resourceType),
    });
    res.json(entries);
  }));

  router.get("/settings", asyncHandler(async (_req, res) => {
    res.json(await settings.get());
  }));

  router.put("/settings", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const body = readBody(req.body);
    const changes: SettingsChanges = {
      logEditTimeLimitHours: optionalNumber(body, "logEditTimeLimitHours"),
      defaultLeaveTypes: optionalStringList(body, "defaultLeaveTypes"),
      defaultTaskCategories: optionalStringList(body, "defaultTaskCategories"),
      notificationSettings: optionalJsonObject(body, "notificationSettings"),
    };

    const updated = await settings.update(changes);
    await audit.record(
      actor.id,
      "update",
      "system_settings",
      updated.id,
      compact({
        log_edit_time_limit_hours: changes.logEditTimeLimitHours,
        default_leave_types: changes.defaultLeaveTypes,
        default_task_categories: changes.defaultTaskCategories,
        notification_settings: changes.notificationSettings,
      }),
      auditContext(req)
    );

    res.json(updated);
  }));

  router.post("/bulk-create-employees", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    if (!Array.isArray(req.body)) {
      throw new HttpError(400, "Request body must be a list of employees");
    }
    const rows: unknown[] = req.body;

    const createdIds: string[] = [];
    const errors: BulkRowError[] = [];

    for (const [index, raw] of rows.entries()) {
      try {
        const body = readBody(raw);
        const employee = await employees.create(parseNewEmployee(body));
        createdIds.push(employee.id);
      } catch (error) {
        if (
          !(error instanceof HttpError || error instanceof ValidationError || error instanceof ConflictError)
        ) {
          throw error;
        }
        const email =
          typeof raw === "object" && raw !== null && "email" in raw && typeof raw.email === "string"
            ? raw.email
            : "unknown";
        errors.push({ row: index + 1, email, error: error.message });
      }
    }

    await audit.record(
      actor.id,
      "create",
      "bulk_employees",
      "bulk_operation",
      { total_processed: rows.length, successful: createdIds.length, errors: errors.length },
      auditContext(req)
    );

    res.json({
      message: "Bulk operation completed",
      successful: createdIds.length,
      errors: errors.length,
      createdEmployeeIds: createdIds,
      errorDetails: errors,
    });
  }));

  router.get("/reports/productivity", asyncHandler(async (req, res) => {
    const startDate = queryParam(req.query.startDate);
    const endDate = queryParam(req.query.endDate);
    const department = queryParam(req.query.department);
    if (startDate) validateCalendarDate(startDate, "startDate");
    if (endDate) validateCalendarDate(endDate, "endDate");

    const all = await employees.list({ activeOnly: true });
    const logsByEmployee = new Map<string, WorkLog[]>();
    for (const employee of all) {
      logsByEmployee.set(employee.id, await workLogs.listByEmployee(employee.id, { startDate, endDate }));
    }

    res.json({
      reportPeriod: { startDate: startDate ?? null, endDate: endDate ?? null },
      filters: { department: department ?? null },
      ...buildProductivityReport(all, logsByEmployee, department),
    });
  }));

  return router;
}
