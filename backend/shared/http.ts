import type { NextFunction, Request, Response } from "express";
import { ConflictError, InvalidStateError, StorageWriteError, ValidationError } from "./errors";
import { HttpError } from "./http-error";
import { createLogger } from "./logger";
import type { JsonObject, JsonValue } from "./types";

const log = createLogger("http");

export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res, next).catch(next);
  };

export function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof ValidationError) return 400;
  if (err instanceof ConflictError) return 409;
  if (err instanceof InvalidStateError) return 409;
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status >= 500) {
    log.error("Request failed", {
      method: req.method,
      path: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
      collection: err instanceof StorageWriteError ? err.collection : undefined,
    });
  }

  if (err instanceof Error) {
    res.status(status).json({ message: err.message });
    return;
  }
  res.status(500).json({ message: "Unknown error" });
}

export type Body = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export function readBody(value: unknown): Body {
  if (!isPlainObject(value)) {
    throw new HttpError(400, "Request body must be a JSON object");
  }
  return value;
}

export function requiredString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new HttpError(400, `${field} is required`);
  }
  return value;
}

export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new HttpError(400, `${field} must be a string`);
  }
  return value;
}

export function nullableString(body: Body, field: string): string | null | undefined {
  return body[field] === null ? null : optionalString(body, field);
}

export function requiredNumber(body: Body, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) {
    throw new HttpError(400, `${field} is required`);
  }
  return value;
}

export function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new HttpError(400, `${field} must be a number`);
  }
  return value;
}

export function nullableNumber(body: Body, field: string): number | null | undefined {
  return body[field] === null ? null : optionalNumber(body, field);
}

export function optionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new HttpError(400, `${field} must be a boolean`);
  }
  return value;
}

export function optionalEnum<T extends string>(
  body: Body,
  field: string,
  allowed: readonly T[]
): T | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new HttpError(400, `${field} must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

export function optionalStringList(body: Body, field: string): string[] | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new HttpError(400, `${field} must be a list of strings`);
  }
  return value;
}

export function optionalJsonObject(body: Body, field: string): JsonObject | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (!isPlainObject(value) || !isJsonValue(value)) {
    throw new HttpError(400, `${field} must be an object`);
  }
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (isJsonValue(item)) {
      result[key] = item;
    }
  }
  return result;
}

export function queryParam(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

/** Drops undefined entries so the result can be stored as audit details. */
export function compact(values: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
