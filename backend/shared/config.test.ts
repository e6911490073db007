import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "./config";

test("fills defaults around the required secret", () => {
  assert.deepEqual(loadConfig({ JWT_SECRET: "test-secret" }), {
    dataDir: "data",
    port: 4000,
    jwtSecret: "test-secret",
    tokenTtlSeconds: 1800,
    corsOrigin: true,
  });
});

test("reads overrides from the environment", () => {
  const config = loadConfig({
    JWT_SECRET: "test-secret",
    DATA_DIR: "/var/lib/hr",
    PORT: "8080",
    TOKEN_TTL_MINUTES: "5",
    CORS_ORIGIN: "http://localhost:5173",
  });
  assert.equal(config.dataDir, "/var/lib/hr");
  assert.equal(config.port, 8080);
  assert.equal(config.tokenTtlSeconds, 300);
  assert.equal(config.corsOrigin, "http://localhost:5173");
});

test("refuses to start without a secret or with a bad number", () => {
  assert.throws(() => loadConfig({}), /JWT_SECRET is required/);
  assert.throws(() => loadConfig({ JWT_SECRET: "test-secret", PORT: "abc" }), /PORT must be a positive number/);
});
