import { newId } from "../shared/credentials";
import { type Clock, systemClock } from "../shared/date-utils";
import type { AuditAction, AuditTrail, JsonObject } from "../shared/types";
import { AUDIT_ACTIONS } from "../shared/types";
import { object, oneOf, optionalText, text } from "../store/fields";
import type { RecordStore, StoredRecord } from "../store/record-store";

const COLLECTION = "audit_trails";

export const DEFAULT_AUDIT_LIMIT = 100;
export const MAX_AUDIT_LIMIT = 1000;

export interface NewAuditEntry {
  userId: string;
  action: AuditAction;
  resourceType: string;
  resourceId: string;
  details: JsonObject;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuditTrailFilter {
  userId?: string;
  action?: AuditAction;
  resourceType?: string;
  limit?: number;
}

export function decodeAuditTrail(row: StoredRecord): AuditTrail {
  return {
    id: text(row, "id"),
    userId: text(row, "user_id"),
    action: oneOf(row, "action", AUDIT_ACTIONS, "update"),
    resourceType: text(row, "resource_type"),
    resourceId: text(row, "resource_id"),
    details: object(row, "details"),
    ipAddress: optionalText(row, "ip_address"),
    userAgent: optionalText(row, "user_agent"),
    timestamp: text(row, "timestamp"),
  };
}

export function encodeAuditTrail(entry: AuditTrail): StoredRecord {
  return {
    id: entry.id,
    user_id: entry.userId,
    action: entry.action,
    resource_type: entry.resourceType,
    resource_id: entry.resourceId,
    details: entry.details,
    ip_address: entry.ipAddress,
    user_agent: entry.userAgent,
    timestamp: entry.timestamp,
  };
}

// Append-only: there is deliberately no update or delete.
export class AuditTrailRepository {
  constructor(
    private readonly store: RecordStore,
    private readonly clock: Clock = systemClock
  ) {}

  async append(input: NewAuditEntry): Promise<AuditTrail> {
    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const entry: AuditTrail = {
        id: newId(),
        userId: input.userId,
        action: input.action,
        resourceType: input.resourceType,
        resourceId: input.resourceId,
        details: input.details,
        ipAddress: input.ipAddress ?? null,
        userAgent: input.userAgent ?? null,
        timestamp: this.clock().toISOString(),
      };

      rows.push(encodeAuditTrail(entry));
      await section.write(rows);
      return entry;
    });
  }

  /** Matching entries, newest first. */
  async list(filter: AuditTrailFilter = {}): Promise<AuditTrail[]> {
    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_AUDIT_LIMIT, 0), MAX_AUDIT_LIMIT);
    const entries = (await this.store.read(COLLECTION))
      .map(decodeAuditTrail)
      .filter((entry) => !filter.userId || entry.userId === filter.userId)
      .filter((entry) => !filter.action || entry.action === filter.action)
      .filter((entry) => !filter.resourceType || entry.resourceType === filter.resourceType);

    return entries
      .sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0))
      .slice(0, limit);
  }
}
