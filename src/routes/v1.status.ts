/**
 * /healthz and /v1/status
 *
 * - /healthz: liveness check (ok/version)
 * - /v1/status: runtime counters plus a summary of the loaded graph
 *
 * No authentication: nothing here exposes decision content.
 */

import type { FastifyInstance } from "fastify";
import type { DecisionService } from "../services/decision-service.js";
import type { ScratchpadStore } from "../store/scratchpad-store.js";
import { SERVICE_VERSION } from "../version.js";

const SERVICE_START_TIME = Date.now();

let totalRequests = 0;
let client4xxErrors = 0;
let server5xxErrors = 0;

export function incrementRequestCount(): void {
  totalRequests++;
}

export function incrementErrorCount(statusCode: number): void {
  if (statusCode >= 500) {
    server5xxErrors++;
  } else if (statusCode >= 400) {
    client4xxErrors++;
  }
}

/** @internal */
export function _resetStatusCounters(): void {
  totalRequests = 0;
  client4xxErrors = 0;
  server5xxErrors = 0;
}

export interface StatusRouteDeps {
  service: DecisionService;
  scratchpad: ScratchpadStore;
}

export async function statusRoutes(app: FastifyInstance, deps: StatusRouteDeps) {
  app.addHook("onRequest", async () => {
    incrementRequestCount();
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: "decigraph",
    version: SERVICE_VERSION,
  }));

  app.get("/v1/status", async () => {
    const report = await deps.service.validate();
    const scratchpad = await deps.scratchpad.summary();

    return {
      schema: "status.v1",
      service: "decigraph",
      version: SERVICE_VERSION,
      uptime_seconds: Math.floor((Date.now() - SERVICE_START_TIME) / 1000),
      timestamp: new Date().toISOString(),
      requests: {
        total: totalRequests,
        client_errors_4xx: client4xxErrors,
        server_errors_5xx: server5xxErrors,
      },
      graph: {
        node_count: report.node_count,
        error_count: report.errors.length,
        warning_count: report.warnings.length,
      },
      scratchpad: scratchpad || null,
    };
  });
}
