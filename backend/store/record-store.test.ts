import assert from "node:assert/strict";
import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import test from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import { StorageWriteError } from "../shared/errors";
import { makeDataDir } from "../testing/helpers";
import { COLLECTIONS, RecordStore } from "./record-store";

test("open creates an empty file for every collection", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(path.join(dir, "nested"));
    for (const collection of COLLECTIONS) {
      assert.equal(await readFile(store.pathFor(collection), "utf8"), "[]");
    }
  } finally {
    await cleanup();
  }
});

test("open leaves existing collection files untouched", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    await writeFile(path.join(dir, "employees.json"), '[{"id":"e1"}]');
    const store = await RecordStore.open(dir);
    assert.deepEqual(await store.read("employees"), [{ id: "e1" }]);
  } finally {
    await cleanup();
  }
});

test("write replaces the collection and leaves no temporary files", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await store.write("work_logs", [{ id: "w1", time_spent: 2.5 }]);
    await store.write("work_logs", [{ id: "w2", time_spent: 1 }]);

    assert.deepEqual(await store.read("work_logs"), [{ id: "w2", time_spent: 1 }]);
    const leftovers = (await readdir(dir)).filter((name) => name.endsWith(".tmp"));
    assert.deepEqual(leftovers, []);
  } finally {
    await cleanup();
  }
});

test("quarantines a file that is not valid JSON and reads it as empty", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await writeFile(store.pathFor("employees"), '[{"id": "e1",');

    assert.deepEqual(await store.read("employees"), []);

    const backups = (await readdir(dir)).filter((name) => name.startsWith("employees.json.backup-"));
    assert.equal(backups.length, 1);
    assert.equal(await readFile(path.join(dir, backups[0]), "utf8"), '[{"id": "e1",');
    assert.equal((await readdir(dir)).includes("employees.json"), false);

    await store.write("employees", [{ id: "e2" }]);
    assert.deepEqual(await store.read("employees"), [{ id: "e2" }]);
  } finally {
    await cleanup();
  }
});

test("quarantines JSON that is not a list of records", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await writeFile(store.pathFor("feedback"), '{"id": "f1"}');
    await writeFile(store.pathFor("settings"), "[1, 2]");

    assert.deepEqual(await store.read("feedback"), []);
    assert.deepEqual(await store.read("settings"), []);

    const names = await readdir(dir);
    assert.equal(names.filter((name) => name.startsWith("feedback.json.backup-")).length, 1);
    assert.equal(names.filter((name) => name.startsWith("settings.json.backup-")).length, 1);
  } finally {
    await cleanup();
  }
});

test("reads missing and blank files as empty without quarantining", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await rm(store.pathFor("audit_trails"));
    await writeFile(store.pathFor("leave_requests"), "  \n");

    assert.deepEqual(await store.read("audit_trails"), []);
    assert.deepEqual(await store.read("leave_requests"), []);
    assert.deepEqual(
      (await readdir(dir)).filter((name) => name.includes(".backup-")),
      []
    );
  } finally {
    await cleanup();
  }
});

test("a failed write keeps the previous state and cleans up", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    const live = store.pathFor("work_logs");
    await rm(live);
    await mkdir(live);
    await writeFile(path.join(live, "keep.txt"), "occupied");

    await assert.rejects(store.write("work_logs", [{ id: "w1" }]), (error: unknown) => {
      assert.ok(error instanceof StorageWriteError);
      assert.equal(error.collection, "work_logs");
      return true;
    });

    const leftovers = (await readdir(dir)).filter((name) => name.endsWith(".tmp"));
    assert.deepEqual(leftovers, []);
    assert.equal(await readFile(path.join(live, "keep.txt"), "utf8"), "occupied");
  } finally {
    await cleanup();
  }
});

test("exclusive sections do not lose concurrent updates", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await store.write("settings", [{ id: "counter", value: 0 }]);

    const increment = () =>
      store.scopedExclusive("settings", async (section) => {
        const [row] = await section.read();
        const value = typeof row.value === "number" ? row.value : 0;
        await section.write([{ id: "counter", value: value + 1 }]);
      });

    await Promise.all(Array.from({ length: 25 }, increment));

    assert.deepEqual(await store.read("settings"), [{ id: "counter", value: 25 }]);
  } finally {
    await cleanup();
  }
});

test("an unlocked reader never moves aside a file a writer has just committed", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await writeFile(store.pathFor("employees"), "{ broken");

    let reader: Promise<unknown> = Promise.resolve();
    await store.scopedExclusive("employees", async (section) => {
      reader = store.read("employees");
      // Let the unlocked read see the corrupt file before the section repairs it.
      await delay(20);
      assert.deepEqual(await section.read(), []);
      await section.write([{ id: "e1" }]);
    });

    assert.deepEqual(await reader, [{ id: "e1" }]);
    assert.deepEqual(await store.read("employees"), [{ id: "e1" }]);
    const backups = (await readdir(dir)).filter((name) => name.startsWith("employees.json.backup-"));
    assert.equal(backups.length, 1);
    assert.equal(await readFile(path.join(dir, backups[0]), "utf8"), "{ broken");
  } finally {
    await cleanup();
  }
});

test("section reads quarantine a corrupt file before the section writes", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const store = await RecordStore.open(dir);
    await writeFile(store.pathFor("work_logs"), "[1]");

    await store.scopedExclusive("work_logs", async (section) => {
      assert.deepEqual(await section.read(), []);
      await section.write([{ id: "w1" }]);
    });

    const names = await readdir(dir);
    assert.equal(names.filter((name) => name.startsWith("work_logs.json.backup-")).length, 1);
    assert.deepEqual(await store.read("work_logs"), [{ id: "w1" }]);
  } finally {
    await cleanup();
  }
});
