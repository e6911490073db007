import { Router } from "express";
import { toPublicEmployee } from "../employees/repository";
import type { Services } from "../services";
import { asyncHandler, readBody, requiredString } from "../shared/http";
import { HttpError } from "../shared/http-error";
import { requireAuth } from "../shared/rbac";
import { signAuthToken, type TokenOptions } from "./jwt";
import { auditContext } from "./middleware";

export function createAuthRouter(services: Services, tokens: TokenOptions): Router {
  const router = Router();

  router.post("/login", asyncHandler(async (req, res) => {
    const body = readBody(req.body);
    const email = requiredString(body, "email");
    const password = requiredString(body, "password");

    const employee = await services.employees.authenticate(email, password);
    if (!employee) {
      throw new HttpError(401, "Incorrect email or password");
    }
    if (!employee.isActive) {
      throw new HttpError(403, "Account is deactivated");
    }

    const token = signAuthToken(employee.id, tokens);
    await services.audit.record(
      employee.id,
      "login",
      "user",
      employee.id,
      { email: employee.email },
      auditContext(req)
    );

    res.json({ token, tokenType: "bearer", user: toPublicEmployee(employee) });
  }));

  router.post("/logout", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    await services.audit.record(
      actor.id,
      "logout",
      "user",
      actor.id,
      { email: actor.email },
      auditContext(req)
    );
    res.json({ message: "Successfully logged out" });
  }));

  router.get("/me", asyncHandler(async (req, res) => {
    const actor = requireAuth(req.actor);
    res.json(toPublicEmployee(actor));
  }));

  return router;
}
