/**
 * Intent: session secret lock: constant-time match and no way to print the value.
 * Scope: SessionSecret comparison and every string/JSON/inspect projection.
 */
import test from "node:test";
import assert from "node:assert/strict";
import { inspect } from "node:util";
import { DEFAULT_SESSION_SECRET, SessionSecret } from "../../../runtime/secrets/session_secret";

test("session secret: matches only the exact value", () => {
  const secret = new SessionSecret("test-secret");

  assert.equal(secret.matches("test-secret"), true);
  assert.equal(secret.matches("test-secret "), false);
  assert.equal(secret.matches("TEST-SECRET"), false);
  assert.equal(secret.matches(""), false);
  assert.equal(secret.matches(undefined), false);
  assert.equal(secret.isDefault, false);
});

test("session secret: value never appears in string, JSON or inspect output", () => {
  const secret = new SessionSecret("test-secret");

  assert.equal(String(secret), "****");
  assert.equal(`${secret}`, "****");
  assert.equal(JSON.stringify({ secret }), '{"secret":"****"}');
  assert.equal(inspect(secret), "SessionSecret(****)");
  assert.equal(inspect({ secret }).includes("test-secret"), false);
});

test("session secret: default value is flagged and empty values are refused", () => {
  assert.equal(new SessionSecret(DEFAULT_SESSION_SECRET).isDefault, true);
  assert.throws(() => new SessionSecret(""), /SESSION_SECRET_ERROR/);
});
