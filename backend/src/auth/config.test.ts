import assert from "node:assert/strict";
import test from "node:test";
import { isAuthDisabled, validateSecurityConfig } from "./config.js";

const STRONG_SECRET = "this-is-a-very-strong-secret-with-at-least-32-chars";

test("validateSecurityConfig throws when secret is missing and auth is enabled", () => {
  assert.throws(
    () => validateSecurityConfig({ NODE_ENV: "development", AUTH_DISABLED: "false" }),
    /Missing AUTH_JWT_SECRET/
  );
});

test("validateSecurityConfig throws for short secrets", () => {
  assert.throws(
    () => validateSecurityConfig({ NODE_ENV: "development", AUTH_JWT_SECRET: "short-secret" }),
    /too short/
  );
});

test("validateSecurityConfig rejects reusing the agent connect secret", () => {
  assert.throws(
    () => validateSecurityConfig({ NODE_ENV: "development", AUTH_JWT_SECRET: STRONG_SECRET, AGENT_CONNECT_SECRET: STRONG_SECRET }),
    /must differ from AGENT_CONNECT_SECRET/
  );
});

test("validateSecurityConfig does not throw when auth is disabled", () => {
  assert.doesNotThrow(() => validateSecurityConfig({ NODE_ENV: "development", AUTH_DISABLED: "true" }));
  assert.equal(isAuthDisabled({ NODE_ENV: "test" }), true);
  assert.equal(isAuthDisabled({ NODE_ENV: "production" }), false);
});

test("validateSecurityConfig does not throw with a valid secret", () => {
  assert.doesNotThrow(() =>
    validateSecurityConfig({ NODE_ENV: "development", AUTH_JWT_SECRET: STRONG_SECRET, AGENT_CONNECT_SECRET: "test-secret" })
  );
});
