import type { NextFunction, Request, Response } from "express";
import type { AuditContext } from "../shared/audit";
import type { EmployeeLookup } from "../shared/rbac";
import type { Employee } from "../shared/types";
import { verifyAuthToken } from "./jwt";

declare module "express-serve-static-core" {
  interface Request {
    actor?: Employee | null;
  }
}

/**
 * Resolves the bearer token to the acting employee. Requests without a
 * valid token, or whose employee is gone or deactivated, carry a null actor.
 */
export function resolveActor(employees: EmployeeLookup, secret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith("Bearer ")) {
      req.actor = null;
      return next();
    }

    const subject = verifyAuthToken(header.slice("Bearer ".length), secret);
    if (!subject) {
      req.actor = null;
      return next();
    }

    employees
      .getById(subject)
      .then((employee) => {
        req.actor = employee && employee.isActive ? employee : null;
        next();
      })
      .catch(next);
  };
}

export function auditContext(req: Request): AuditContext {
  return {
    ipAddress: req.ip ?? null,
    userAgent: req.get("user-agent") ?? null,
  };
}
