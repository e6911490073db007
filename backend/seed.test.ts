import assert from "node:assert/strict";
import test from "node:test";
import { ensureDefaultAdmin } from "./seed";
import { createServices } from "./services";
import { makeDataDir, manualClock } from "./testing/helpers";

test("creates the administrator once and reuses it afterwards", async () => {
  const { dir, cleanup } = await makeDataDir();
  try {
    const time = manualClock("2024-05-06T12:00:00.000Z");
    const services = await createServices({ dataDir: dir, clock: time.clock });
    const seed = { email: "admin@example.com", password: "test-password" };

    const first = await ensureDefaultAdmin(services, seed);
    assert.equal(first.created, true);
    assert.equal(first.admin.role, "admin");
    assert.equal(first.admin.department, "IT");
    assert.equal(first.admin.position, "System Administrator");

    const second = await ensureDefaultAdmin(services, { ...seed, password: "ignored" });
    assert.equal(second.created, false);
    assert.equal(second.admin.id, first.admin.id);

    assert.equal((await services.employees.list()).length, 1);
    assert.equal((await services.settings.get()).logEditTimeLimitHours, 24);
    assert.equal((await services.employees.authenticate(seed.email, seed.password))?.id, first.admin.id);
  } finally {
    await cleanup();
  }
});
