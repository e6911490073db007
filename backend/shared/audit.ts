import type { AuditTrailRepository } from "../audit/repository";
import { createLogger } from "./logger";
import type { AuditAction, JsonObject } from "./types";

export interface AuditContext {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export type AuditSink = Pick<AuditTrailRepository, "append">;

const log = createLogger("audit");

/**
 * Writes audit entries on behalf of the request layer. A failed write is
 * logged and swallowed: the business change it describes has already been
 * committed and stays committed.
 */
export class AuditRecorder {
  constructor(private readonly trails: AuditSink) {}

  async record(
    actorId: string,
    action: AuditAction,
    resourceType: string,
    resourceId: string,
    details: JsonObject = {},
    context: AuditContext = {}
  ): Promise<void> {
    try {
      await this.trails.append({
        userId: actorId,
        action,
        resourceType,
        resourceId,
        details,
        ipAddress: context.ipAddress ?? null,
        userAgent: context.userAgent ?? null,
      });
    } catch (error) {
      log.error("Failed to write audit entry", {
        actorId,
        action,
        resourceType,
        resourceId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
