import assert from "node:assert/strict";
import test from "node:test";
import { signAuthToken, verifyAuthToken } from "./jwt";

const options = { secret: "test-secret", ttlSeconds: 60 };

test("round-trips the subject through a signed token", () => {
  const token = signAuthToken("emp-1", options);
  assert.equal(verifyAuthToken(token, "test-secret"), "emp-1");
});

test("rejects tokens signed with another secret", () => {
  const token = signAuthToken("emp-1", { ...options, secret: "other-secret" });
  assert.equal(verifyAuthToken(token, "test-secret"), null);
});

test("rejects expired and malformed tokens", () => {
  const expired = signAuthToken("emp-1", { ...options, ttlSeconds: -10 });
  assert.equal(verifyAuthToken(expired, "test-secret"), null);
  assert.equal(verifyAuthToken("not.a.token", "test-secret"), null);
  assert.equal(verifyAuthToken("", "test-secret"), null);
});
