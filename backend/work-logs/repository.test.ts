import assert from "node:assert/strict";
import test from "node:test";
import { ValidationError } from "../shared/errors";
import { RecordStore } from "../store/record-store";
import { makeDataDir, manualClock } from "../testing/helpers";
import { WorkLogRepository } from "./repository";

async function setup() {
  const { dir, cleanup } = await makeDataDir();
  const time = manualClock("2024-03-04T12:00:00.000Z");
  const store = await RecordStore.open(dir);
  return { cleanup, time, store, workLogs: new WorkLogRepository(store, time.clock) };
}

const entry = (date: string, timeSpent = 2) => ({
  date,
  taskDescription: `Work on ${date}`,
  timeSpent,
  status: "in_progress" as const,
});

test("creates a log with empty attachments and no feedback", async () => {
  const { cleanup, store, workLogs } = await setup();
  try {
    const log = await workLogs.create("emp-1", { ...entry("2024-03-04"), project: "Payroll" });

    assert.equal(log.employeeId, "emp-1");
    assert.deepEqual(log.attachments, []);
    assert.equal(log.managerFeedback, null);
    assert.equal(log.project, "Payroll");
    assert.equal(log.createdAt, "2024-03-04T12:00:00.000Z");

    const [row] = await store.read("work_logs");
    assert.equal(row.employee_id, "emp-1");
    assert.equal(row.time_spent, 2);
    assert.deepEqual(await workLogs.getById(log.id), log);
  } finally {
    await cleanup();
  }
});

test("rejects negative hours and malformed dates", async () => {
  const { cleanup, workLogs } = await setup();
  try {
    await assert.rejects(workLogs.create("emp-1", entry("2024-03-04", -1)), ValidationError);
    await assert.rejects(workLogs.create("emp-1", entry("March 4")), ValidationError);
    await assert.rejects(workLogs.create("emp-1", entry("2024-03-04", Number.NaN)), ValidationError);
    assert.deepEqual(await workLogs.listAll(), []);
  } finally {
    await cleanup();
  }
});

test("lists an employee's logs newest date first within an inclusive range", async () => {
  const { cleanup, workLogs } = await setup();
  try {
    await workLogs.create("emp-1", entry("2024-03-01"));
    await workLogs.create("emp-1", entry("2024-03-05"));
    await workLogs.create("emp-1", entry("2024-03-03"));
    await workLogs.create("emp-2", entry("2024-03-04"));

    const all = await workLogs.listByEmployee("emp-1");
    assert.deepEqual(all.map((log) => log.date), ["2024-03-05", "2024-03-03", "2024-03-01"]);

    const ranged = await workLogs.listByEmployee("emp-1", {
      startDate: "2024-03-03",
      endDate: "2024-03-05",
    });
    assert.deepEqual(ranged.map((log) => log.date), ["2024-03-05", "2024-03-03"]);

    assert.equal((await workLogs.listAll()).length, 4);
  } finally {
    await cleanup();
  }
});

test("updates fields and records manager feedback", async () => {
  const { cleanup, time, workLogs } = await setup();
  try {
    const log = await workLogs.create("emp-1", entry("2024-03-04"));
    time.advance(30 * 60 * 1000);

    const updated = await workLogs.update(log.id, { status: "completed", timeSpent: 3.5 });
    assert.ok(updated);
    assert.equal(updated.status, "completed");
    assert.equal(updated.timeSpent, 3.5);
    assert.equal(updated.taskDescription, "Work on 2024-03-04");
    assert.equal(updated.updatedAt, "2024-03-04T12:30:00.000Z");
    assert.equal(updated.createdAt, log.createdAt);

    const reviewed = await workLogs.setManagerFeedback(log.id, "Nice work");
    assert.equal(reviewed?.managerFeedback, "Nice work");
    assert.equal((await workLogs.getById(log.id))?.managerFeedback, "Nice work");

    await assert.rejects(workLogs.update(log.id, { timeSpent: -2 }), ValidationError);
    assert.equal(await workLogs.update("missing", { notes: "x" }), null);
  } finally {
    await cleanup();
  }
});
