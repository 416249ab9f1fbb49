// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { getConfig, scratchpadPath, lintConfigPath, type Config } from "./config/index.js";
import { loadLintConfig } from "./config/lint-config.js";
import { decisionRoutes } from "./routes/v1.decisions.js";
import { graphRoutes } from "./routes/v1.graph.js";
import { incrementErrorCount, statusRoutes } from "./routes/v1.status.js";
import { DecisionService } from "./services/decision-service.js";
import { FileDecisionStore } from "./store/decision-store.js";
import { ScratchpadStore } from "./store/scratchpad-store.js";
import { buildErrorV1, DecisionGraphError, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { getRequestId, REQUEST_ID_HEADER, requestIdFromRaw } from "./utils/request-id.js";
import { SERVICE_VERSION } from "./version.js";

export interface BuildOptions {
  config?: Config;
  /** Replaces the file-backed service, e.g. with one over an in-memory store */
  service?: DecisionService;
  scratchpad?: ScratchpadStore;
}

function resolveAllowedOrigins(config: Config): string[] {
  const origins = config.server.allowedOrigins;
  if (config.server.nodeEnv === "production" && origins.includes("*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }
  return origins;
}

export async function build(options: BuildOptions = {}) {
  const config = options.config ?? getConfig();

  const service =
    options.service ??
    new DecisionService({
      store: new FileDecisionStore({
        projectDir: config.paths.projectDir,
        constitutionDir: config.paths.constitutionDir,
      }),
      lintConfig: await loadLintConfig(lintConfigPath(config)),
    });
  const scratchpad =
    options.scratchpad ??
    new ScratchpadStore({ filePath: scratchpadPath(config), loadGraph: () => service.loadGraph() });

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    genReqId: requestIdFromRaw,
  });

  // CORS: explicit allowlist; empty means same-origin only
  await app.register(cors, {
    origin: resolveAllowedOrigins(config),
  });

  // Pure JSON API: CSP and the embedder/opener policies do not apply
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    // Fastify's own 4xx errors (malformed JSON, wrong content type) keep their status
    const frameworkStatus = error.statusCode;
    const errorV1 =
      !(error instanceof DecisionGraphError) && frameworkStatus !== undefined && frameworkStatus < 500
        ? buildErrorV1("BAD_INPUT", error.message, undefined, getRequestId(request))
        : toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);
    incrementErrorCount(statusCode);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    return reply.status(statusCode).send(errorV1);
  });

  await statusRoutes(app, { service, scratchpad });
  await graphRoutes(app, { service });
  await decisionRoutes(app, { service });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = getConfig();

  build({ config })
    .then(async (app) => {
      app.log.info(
        {
          service: "decigraph",
          version: SERVICE_VERSION,
          root: config.paths.root,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          cors_origins: config.server.allowedOrigins,
        },
        "decigraph server starting",
      );

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
