import { createHash, randomUUID } from "crypto";

export function newId(): string {
  return randomUUID();
}

// Unsalted SHA-256. Stored hashes from existing data files stay verifiable.
export function hashPassword(password: string): string {
  return createHash("sha256").update(password, "utf8").digest("hex");
}

export function verifyPassword(password: string, digest: string): boolean {
  return hashPassword(password) === digest;
}
