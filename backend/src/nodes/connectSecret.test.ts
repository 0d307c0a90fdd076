import assert from "node:assert/strict";
import test from "node:test";
import jwt from "jsonwebtoken";
import { ConnectSecrets } from "./connectSecret.js";

const secrets = new ConnectSecrets("test-secret");

test("issued secret verifies for its own agent only", () => {
  const token = secrets.issue("proj.cb-AbCd");
  assert.equal(secrets.verify("proj.cb-AbCd", token), true);
  assert.equal(secrets.verify("proj.cb-WxYz", token), false);
});

test("secrets signed with another key or scope are rejected", () => {
  const foreign = new ConnectSecrets("other-secret").issue("proj.cb-AbCd");
  assert.equal(secrets.verify("proj.cb-AbCd", foreign), false);

  const wrongScope = jwt.sign({ scope: "user" }, "test-secret", { algorithm: "HS256", subject: "proj.cb-AbCd" });
  assert.equal(secrets.verify("proj.cb-AbCd", wrongScope), false);
  assert.equal(secrets.verify("proj.cb-AbCd", "not-a-token"), false);
});
