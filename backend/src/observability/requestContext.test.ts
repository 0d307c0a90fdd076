import assert from "node:assert/strict";
import test from "node:test";
import type { Request } from "express";
import { resolveRequestContext } from "./requestContext.js";

function mockRequest(input: { path: string; headers?: Record<string, string | undefined> }): Request {
  const headers = input.headers ?? {};
  return {
    path: input.path,
    header(name: string) {
      return headers[name.toLowerCase()];
    }
  } as unknown as Request;
}

test("resolveRequestContext prefers explicit headers", () => {
  const req = mockRequest({
    path: "/clouds/east/provision",
    headers: {
      "x-request-id": "req-header",
      "x-cloud-name": "cloud-header",
      "x-agent-name": "agent-header"
    }
  });

  assert.deepEqual(resolveRequestContext(req), {
    request_id: "req-header",
    cloud: "cloud-header",
    agent: "agent-header"
  });
});

test("resolveRequestContext reads the cloud or agent from the path", () => {
  assert.deepEqual(resolveRequestContext(mockRequest({ path: "/clouds/east/provision", headers: { "x-request-id": "r1" } })), {
    request_id: "r1",
    cloud: "east"
  });
  assert.deepEqual(resolveRequestContext(mockRequest({ path: "/agents/proj.cb-AbCd/events", headers: { "x-request-id": "r2" } })), {
    request_id: "r2",
    agent: "proj.cb-AbCd"
  });
  assert.deepEqual(resolveRequestContext(mockRequest({ path: "/clouds/projects", headers: { "x-request-id": "r3" } })), {
    request_id: "r3"
  });
});

test("resolveRequestContext generates a request id", () => {
  const context = resolveRequestContext(mockRequest({ path: "/provision" }));
  assert.equal(context.request_id.length, 10);
  assert.equal(context.cloud, undefined);
  assert.equal(context.agent, undefined);
});
