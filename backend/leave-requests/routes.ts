import { Router } from "express";
import { auditContext } from "../auth/middleware";
import type { Services } from "../services";
import {
  asyncHandler,
  compact,
  nullableString,
  optionalEnum,
  optionalString,
  readBody,
  requiredString,
} from "../shared/http";
import { HttpError } from "../shared/http-error";
import { canApproveLeave, isAdmin, requireAuth, requireManager } from "../shared/rbac";
import type { LeaveStatus } from "../shared/types";
import { LEAVE_STATUSES } from "../shared/types";

const DECISIONS: readonly Exclude<LeaveStatus, "pending">[] = ["approved", "rejected"];

export function createLeaveRequestsRouter(services: Services): Router {
  const router = Router();
  const { leaveRequests, audit } = services;

  router.post("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const body = readBody(req.body);

    const request = await leaveRequests.create(actor.id, {
      startDate: requiredString(body, "startDate"),
      endDate: requiredString(body, "endDate"),
      leaveType: requiredString(body, "leaveType"),
      reason: requiredString(body, "reason"),
    });

    await audit.record(
      actor.id,
      "create",
      "leave_request",
      request.id,
      { start_date: request.startDate, end_date: request.endDate, leave_type: request.leaveType },
      auditContext(req)
    );

    res.status(201).json(request);
  }));

  router.get("/", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const status = optionalEnum({ status: req.query.status }, "status", LEAVE_STATUSES);
    res.json(await leaveRequests.listByEmployee(actor.id, status));
  }));

  router.get("/pending-approvals", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    requireManager(actor.role);

    const pending = isAdmin(actor.role)
      ? await leaveRequests.listPending()
      : await leaveRequests.listPending(actor.id);
    res.json(pending);
  }));

  router.get("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const request = await leaveRequests.getById(req.params.id);
    if (!request) {
      throw new HttpError(404, "Leave request not found");
    }

    if (
      request.employeeId !== actor.id &&
      request.managerId !== actor.id &&
      !isAdmin(actor.role)
    ) {
      throw new HttpError(403, "Not authorized to access this leave request");
    }
    res.json(request);
  }));

  router.put("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;
    const body = readBody(req.body);
    const changes = {
      startDate: optionalString(body, "startDate"),
      endDate: optionalString(body, "endDate"),
      leaveType: optionalString(body, "leaveType"),
      reason: optionalString(body, "reason"),
    };

    const request = await leaveRequests.getById(id);
    if (!request) {
      throw new HttpError(404, "Leave request not found");
    }
    if (request.employeeId !== actor.id) {
      throw new HttpError(403, "Can only update your own leave requests");
    }

    const updated = await leaveRequests.update(id, changes);
    if (!updated) {
      throw new HttpError(404, "Leave request not found");
    }

    await audit.record(
      actor.id,
      "update",
      "leave_request",
      id,
      compact({
        start_date: changes.startDate,
        end_date: changes.endDate,
        leave_type: changes.leaveType,
        reason: changes.reason,
      }),
      auditContext(req)
    );

    res.json(updated);
  }));

  router.post("/:id/approve", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;
    const body = readBody(req.body);
    const status = optionalEnum(body, "status", DECISIONS);
    if (!status) {
      throw new HttpError(400, "status is required");
    }
    const managerComments = nullableString(body, "managerComments") ?? null;

    const request = await leaveRequests.getById(id);
    if (!request) {
      throw new HttpError(404, "Leave request not found");
    }
    if (!canApproveLeave(actor, request)) {
      throw new HttpError(403, "Not authorized to approve this leave request");
    }

    const updated = await leaveRequests.decide(id, actor.id, { status, managerComments });
    if (!updated) {
      throw new HttpError(404, "Leave request not found");
    }

    await audit.record(
      actor.id,
      status === "approved" ? "approve" : "reject",
      "leave_request",
      id,
      { status, comments: managerComments },
      auditContext(req)
    );

    res.json(updated);
  }));

  router.delete("/:id", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    const { id } = req.params;

    const request = await leaveRequests.getById(id);
    if (!request) {
      throw new HttpError(404, "Leave request not found");
    }
    if (request.employeeId !== actor.id) {
      throw new HttpError(403, "Can only cancel your own leave requests");
    }

    const cancelled = await leaveRequests.cancel(id, actor.id);
    if (!cancelled) {
      throw new HttpError(404, "Leave request not found");
    }

    await audit.record(actor.id, "delete", "leave_request", id, { action: "cancelled" }, auditContext(req));
    res.json({ message: "Leave request cancelled successfully" });
  }));

  return router;
}
