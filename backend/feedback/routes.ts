import { Router } from "express";
import { auditContext } from "../auth/middleware";
import type { Services } from "../services";
import { asyncHandler, nullableNumber, readBody, requiredString } from "../shared/http";
import { HttpError } from "../shared/http-error";
import { canAccessEmployeeData, canGiveFeedback, requireAuth, requireManager } from "../shared/rbac";

export function createFeedbackRouter(services: Services): Router {
  const router = Router();
  const { feedback, workLogs, employees, audit } = services;

  router.post("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    requireManager(actor.role);

    const body = readBody(req.body);
    const input = {
      workLogId: requiredString(body, "workLogId"),
      feedbackText: requiredString(body, "feedbackText"),
      rating: nullableNumber(body, "rating"),
    };

    const log = await workLogs.getById(input.workLogId);
    if (!log) {
      throw new HttpError(404, "Work log not found");
    }
    const owner = await employees.getById(log.employeeId);
    if (!owner) {
      throw new HttpError(404, "Employee not found");
    }
    if (!canGiveFeedback(actor, owner)) {
      throw new HttpError(403, "Can only provide feedback for your direct reports");
    }

    const created = await feedback.create(actor.id, input);
    if (!created) {
      throw new HttpError(404, "Work log not found");
    }

    await audit.record(
      actor.id,
      "create",
      "feedback",
      created.id,
      { work_log_id: created.workLogId, employee_id: created.employeeId, rating: created.rating },
      auditContext(req)
    );

    res.status(201).json(created);
  }));

  router.get("/my-feedback", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    res.json(await feedback.listByEmployee(actor.id));
  }));

  router.get("/given-feedback", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    requireManager(actor.role);
    res.json(await feedback.listByManager(actor.id));
  }));

  router.get("/employee/:employeeId", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { employeeId } = req.params;

    const target = await employees.getById(employeeId);
    if (!target) {
      throw new HttpError(404, "Employee not found");
    }
    if (!(await canAccessEmployeeData(actor, employeeId, employees))) {
      throw new HttpError(403, "Not authorized to view this employee's feedback");
    }
    res.json(await feedback.listByEmployee(employeeId));
  }));

  router.get("/work-log/:workLogId", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { workLogId } = req.params;

    const log = await workLogs.getById(workLogId);
    if (!log) {
      throw new HttpError(404, "Work log not found");
    }
    if (!(await canAccessEmployeeData(actor, log.employeeId, employees))) {
      throw new HttpError(403, "Not authorized to view feedback for this work log");
    }
    res.json(await feedback.listByWorkLog(workLogId));
  }));

  return router;
}
