import assert from "node:assert/strict";
import test from "node:test";
import type { NewAuditEntry } from "../audit/repository";
import type { AuditTrail } from "./types";
import { AuditRecorder, type AuditSink } from "./audit";

function recordingSink(): { sink: AuditSink; entries: NewAuditEntry[] } {
  const entries: NewAuditEntry[] = [];
  return {
    entries,
    sink: {
      append: async (input): Promise<AuditTrail> => {
        entries.push(input);
        return {
          id: `audit-${entries.length}`,
          userId: input.userId,
          action: input.action,
          resourceType: input.resourceType,
          resourceId: input.resourceId,
          details: input.details,
          ipAddress: input.ipAddress ?? null,
          userAgent: input.userAgent ?? null,
          timestamp: "2024-03-01T00:00:00.000Z",
        };
      },
    },
  };
}

test("forwards entries with request context to the trail", async () => {
  const { sink, entries } = recordingSink();
  const recorder = new AuditRecorder(sink);

  await recorder.record("emp-1", "create", "leave_request", "lr-1", { leave_type: "Vacation" }, {
    ipAddress: "127.0.0.1",
    userAgent: "node-test",
  });
  await recorder.record("emp-1", "logout", "user", "emp-1");

  assert.deepEqual(entries, [
    {
      userId: "emp-1",
      action: "create",
      resourceType: "leave_request",
      resourceId: "lr-1",
      details: { leave_type: "Vacation" },
      ipAddress: "127.0.0.1",
      userAgent: "node-test",
    },
    {
      userId: "emp-1",
      action: "logout",
      resourceType: "user",
      resourceId: "emp-1",
      details: {},
      ipAddress: null,
      userAgent: null,
    },
  ]);
});

test("does not propagate a failed audit write", async () => {
  let attempts = 0;
  const recorder = new AuditRecorder({
    append: async () => {
      attempts += 1;
      throw new Error("disk full");
    },
  });

  await assert.doesNotReject(recorder.record("emp-1", "update", "work_log", "log-1"));
  assert.equal(attempts, 1);
});
