import type { JsonObject, JsonValue } from "../shared/types";
import type { StoredRecord } from "./record-store";

// Lenient readers for stored rows. Files may have been edited by hand or
// written by older versions, so a missing field falls back instead of throwing.

export function text(row: StoredRecord, field: string, fallback = ""): string {
  const value = row[field];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return fallback;
}

export function optionalText(row: StoredRecord, field: string): string | null {
  const value = row[field];
  if (value === undefined || value === null) {
    return null;
  }
  return text(row, field);
}

export function numeric(row: StoredRecord, field: string, fallback = 0): number {
  const value = row[field];
  const parsed = typeof value === "string" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : fallback;
}

export function optionalNumeric(row: StoredRecord, field: string): number | null {
  const value = row[field];
  if (value === undefined || value === null) {
    return null;
  }
  return numeric(row, field);
}

export function flag(row: StoredRecord, field: string, fallback: boolean): boolean {
  const value = row[field];
  return typeof value === "boolean" ? value : fallback;
}

export function textList(row: StoredRecord, field: string, fallback: string[] = []): string[] {
  const value = row[field];
  if (!Array.isArray(value)) {
    return [...fallback];
  }
  return value.filter((item): item is string => typeof item === "string");
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function object(row: StoredRecord, field: string): JsonObject {
  const value = row[field];
  return isJsonObject(value) ? value : {};
}

export function objectList(row: StoredRecord, field: string): JsonObject[] {
  const value = row[field];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isJsonObject);
}

export function oneOf<T extends string>(
  row: StoredRecord,
  field: string,
  allowed: readonly T[],
  fallback: T
): T {
  const value = row[field];
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}
