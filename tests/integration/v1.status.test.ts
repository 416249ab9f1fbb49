/**
 * /healthz and /v1/status Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { _resetStatusCounters } from "../../src/routes/v1.status.js";
import { SERVICE_VERSION } from "../../src/version.js";
import { buildTestApp, type TestApp } from "../helpers/test-app.js";

describe("status endpoints", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    _resetStatusCounters();
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it("GET /healthz reports liveness", async () => {
    const response = await ctx.app.inject({ method: "GET", url: "/healthz" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true, service: "decigraph", version: SERVICE_VERSION });
  });

  it("echoes an incoming X-Request-Id", async () => {
    const response = await ctx.app.inject({
      method: "GET",
      url: "/healthz",
      headers: { "x-request-id": "test-req-1" },
    });

    expect(response.headers["x-request-id"]).toBe("test-req-1");
  });

  it("generates a request id when none is sent", async () => {
    const response = await ctx.app.inject({ method: "GET", url: "/healthz" });

    expect(response.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("GET /v1/status summarizes the graph and counts requests", async () => {
    await ctx.scratchpad.add("idea", "Try SQLite");
    await ctx.app.inject({ method: "GET", url: "/v1/decisions/DEC-404/cascade" });

    const response = await ctx.app.inject({ method: "GET", url: "/v1/status" });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      schema: "status.v1",
      service: "decigraph",
      version: SERVICE_VERSION,
      requests: { total: 2, client_errors_4xx: 1, server_errors_5xx: 0 },
      graph: { node_count: 2, error_count: 0, warning_count: 0 },
      scratchpad: "1 active — 1 idea(s)",
    });
    expect(body.uptime_seconds).toBeGreaterThanOrEqual(0);
  });

  it("sets security headers", async () => {
    const response = await ctx.app.inject({ method: "GET", url: "/healthz" });

    expect(response.headers["x-content-type-options"]).toBe("nosniff");
    expect(response.headers["strict-transport-security"]).toBe("max-age=31536000; includeSubDomains");
    expect(response.headers["content-security-policy"]).toBeUndefined();
  });
});
