import { Router, type Request } from "express";
import { auditContext } from "../auth/middleware";
import type { Services } from "../services";
import {
  asyncHandler,
  compact,
  nullableNumber,
  nullableString,
  optionalEnum,
  optionalNumber,
  optionalString,
  queryParam,
  readBody,
  requiredNumber,
  requiredString,
  type Body,
} from "../shared/http";
import { HttpError } from "../shared/http-error";
import {
  canAccessEmployeeData,
  canEditWorkLog,
  canGiveFeedback,
  requireAuth,
  withEditFlag,
} from "../shared/rbac";
import type { NewWorkLog, WorkLogChanges } from "../shared/types";
import { TASK_STATUSES } from "../shared/types";
import { validateCalendarDate, validateRating } from "../shared/validation";
import { summarizeWorkLogs } from "./summary";

function parseNewWorkLog(body: Body): NewWorkLog {
  const status = optionalEnum(body, "status", TASK_STATUSES);
  if (!status) {
    throw new HttpError(400, "status is required");
  }
  return {
    date: requiredString(body, "date"),
    taskDescription: requiredString(body, "taskDescription"),
    timeSpent: requiredNumber(body, "timeSpent"),
    status,
    project: nullableString(body, "project"),
    category: nullableString(body, "category"),
    notes: nullableString(body, "notes"),
  };
}

function parseWorkLogChanges(body: Body): WorkLogChanges {
  return {
    taskDescription: optionalString(body, "taskDescription"),
    timeSpent: optionalNumber(body, "timeSpent"),
    status: optionalEnum(body, "status", TASK_STATUSES),
    project: nullableString(body, "project"),
    category: nullableString(body, "category"),
    notes: nullableString(body, "notes"),
  };
}

function dateRangeQuery(req: Request): { startDate?: string; endDate?: string } {
  const startDate = queryParam(req.query.startDate);
  const endDate = queryParam(req.query.endDate);
  if (startDate) validateCalendarDate(startDate, "startDate");
  if (endDate) validateCalendarDate(endDate, "endDate");
  return { startDate, endDate };
}

export function createWorkLogsRouter(services: Services): Router {
  const router = Router();
  const { workLogs, employees, settings, audit, clock } = services;

  router.post("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const log = await workLogs.create(actor.id, parseNewWorkLog(readBody(req.body)));

    await audit.record(
      actor.id,
      "create",
      "work_log",
      log.id,
      { date: log.date, task_description: log.taskDescription, time_spent: log.timeSpent },
      auditContext(req)
    );

    res.status(201).json(withEditFlag(log, actor, await settings.get(), clock()));
  }));

  router.get("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const targetId = queryParam(req.query.employeeId) ?? actor.id;

    if (!(await canAccessEmployeeData(actor, targetId, employees))) {
      throw new HttpError(403, "Not authorized to access these work logs");
    }

    const logs = await workLogs.listByEmployee(targetId, dateRangeQuery(req));
    const current = await settings.get();
    const now = clock();
    res.json(logs.map((log) => withEditFlag(log, actor, current, now)));
  }));

  router.get("/reports/summary", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const targetId = queryParam(req.query.employeeId) ?? actor.id;

    if (!(await canAccessEmployeeData(actor, targetId, employees))) {
      throw new HttpError(403, "Not authorized to access this employee's data");
    }

    const range = dateRangeQuery(req);
    const logs = await workLogs.listByEmployee(targetId, range);
    res.json({
      employeeId: targetId,
      ...summarizeWorkLogs(logs),
      periodStart: range.startDate ?? null,
      periodEnd: range.endDate ?? null,
    });
  }));

  router.get("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const log = await workLogs.getById(req.params.id);
    if (!log) {
      throw new HttpError(404, "Work log not found");
    }
    if (!(await canAccessEmployeeData(actor, log.employeeId, employees))) {
      throw new HttpError(403, "Not authorized to access this work log");
    }
    res.json(withEditFlag(log, actor, await settings.get(), clock()));
  }));

  router.put("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;
    const changes = parseWorkLogChanges(readBody(req.body));

    const log = await workLogs.getById(id);
    if (!log) {
      throw new HttpError(404, "Work log not found");
    }

    const current = await settings.get();
    if (!canEditWorkLog(log, actor, current, clock())) {
      throw new HttpError(
        403,
        "Cannot edit this work log (time limit exceeded or insufficient permissions)"
      );
    }

    const updated = await workLogs.update(id, changes);
    if (!updated) {
      throw new HttpError(404, "Work log not found");
    }

    await audit.record(
      actor.id,
      "update",
      "work_log",
      id,
      compact({
        task_description: changes.taskDescription,
        time_spent: changes.timeSpent,
        status: changes.status,
        project: changes.project,
        category: changes.category,
        notes: changes.notes,
      }),
      auditContext(req)
    );

    res.json(withEditFlag(updated, actor, current, clock()));
  }));

  router.post("/:id/feedback", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;
    const body = readBody(req.body);
    const feedbackText = requiredString(body, "feedbackText");
    const rating = nullableNumber(body, "rating");
    validateRating(rating);

    const log = await workLogs.getById(id);
    if (!log) {
      throw new HttpError(404, "Work log not found");
    }
    const owner = await employees.getById(log.employeeId);
    if (!owner) {
      throw new HttpError(404, "Employee not found");
    }
    if (!canGiveFeedback(actor, owner)) {
      throw new HttpError(403, "Not authorized to provide feedback on this work log");
    }

    const updated = await workLogs.setManagerFeedback(id, feedbackText);
    if (!updated) {
      throw new HttpError(404, "Work log not found");
    }

    await audit.record(
      actor.id,
      "update",
      "work_log",
      id,
      compact({ action: "add_feedback", feedback: feedbackText, rating }),
      auditContext(req)
    );

    res.json({ message: "Feedback added successfully" });
  }));

  return router;
}
