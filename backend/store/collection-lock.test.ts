import assert from "node:assert/strict";
import test from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import { CollectionLock } from "./collection-lock";

test("runs sections for the same key one after another in arrival order", async () => {
  const lock = new CollectionLock();
  const events: string[] = [];

  const section = (name: string, wait: number) => async () => {
    events.push(`${name}:start`);
    await delay(wait);
    events.push(`${name}:end`);
    return name;
  };

  const results = await Promise.all([
    lock.run("employees", section("a", 20)),
    lock.run("employees", section("b", 5)),
    lock.run("employees", section("c", 0)),
  ]);

  assert.deepEqual(results, ["a", "b", "c"]);
  assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
});

test("does not make different keys wait on each other", async () => {
  const lock = new CollectionLock();
  const events: string[] = [];

  let releaseSlow: () => void = () => undefined;
  const slowGate = new Promise<void>((resolve) => {
    releaseSlow = resolve;
  });

  const slow = lock.run("employees", async () => {
    events.push("employees:start");
    await slowGate;
    events.push("employees:end");
  });
  const fast = lock.run("work_logs", async () => {
    events.push("work_logs:done");
  });

  await fast;
  assert.deepEqual(events, ["employees:start", "work_logs:done"]);

  releaseSlow();
  await slow;
  assert.deepEqual(events, ["employees:start", "work_logs:done", "employees:end"]);
});

test("releases the key when a section throws", async () => {
  const lock = new CollectionLock();

  await assert.rejects(
    lock.run("settings", async () => {
      throw new Error("boom");
    }),
    /boom/
  );

  assert.equal(await lock.run("settings", async () => "after"), "after");
});
