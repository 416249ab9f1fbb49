/**
 * Read-only graph endpoints.
 *
 * GET /v1/validate                   Full validation report
 * GET /v1/decisions/:id/cascade      Downstream (default) or upstream waves
 * GET /v1/frontier                   Committable, blocked, level gaps, high weight
 * GET /v1/search?q=term term         Any term matches (case-insensitive)
 * GET /v1/manifest?target=human      Compiled manifests
 *
 * Every call reloads the graph from the store.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { CASCADE_DIRECTIONS } from "../analysis/cascade.js";
import { DEFAULT_TOP_N } from "../analysis/frontier.js";
import { MANIFEST_TARGETS } from "../analysis/manifest.js";
import type { DecisionService } from "../services/decision-service.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

const CascadeQuery = z.object({
  direction: z.enum(CASCADE_DIRECTIONS).default("downstream"),
});

const FrontierQuery = z.object({
  top: z.coerce.number().int().nonnegative().default(DEFAULT_TOP_N),
});

const SearchQuery = z.object({
  q: z
    .string()
    .transform((q) => q.toLowerCase().split(/\s+/).filter((term) => term.length > 0))
    .refine((terms) => terms.length > 0, { message: "at least one search term is required" }),
});

const ManifestQuery = z.object({
  target: z.enum(MANIFEST_TARGETS).optional(),
});

const DecisionParams = z.object({
  id: z.string().min(1),
});

export interface GraphRouteDeps {
  service: DecisionService;
}

export async function graphRoutes(app: FastifyInstance, deps: GraphRouteDeps) {
  const { service } = deps;

  app.get("/v1/validate", async () => {
    const report = await service.validate();
    return { schema: "validation.v1", ...report };
  });

  app.get("/v1/decisions/:id/cascade", async (request, reply) => {
    const params = DecisionParams.safeParse(request.params);
    const query = CascadeQuery.safeParse(request.query);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, getRequestId(request)));
    }
    if (!query.success) {
      return reply.code(400).send(zodErrorToErrorV1(query.error, getRequestId(request)));
    }

    const result = await service.cascade(params.data.id, query.data.direction);
    return reply.code(200).send({ schema: "cascade.v1", ...result });
  });

  app.get("/v1/frontier", async (request, reply) => {
    const query = FrontierQuery.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send(zodErrorToErrorV1(query.error, getRequestId(request)));
    }

    const result = await service.frontier(query.data.top);
    return reply.code(200).send({ schema: "frontier.v1", ...result });
  });

  app.get("/v1/search", async (request, reply) => {
    const query = SearchQuery.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send(zodErrorToErrorV1(query.error, getRequestId(request)));
    }

    const results = await service.search(query.data.q);
    return reply.code(200).send({
      schema: "search.v1",
      query: query.data.q,
      count: results.length,
      results,
    });
  });

  app.get("/v1/manifest", async (request, reply) => {
    const query = ManifestQuery.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send(zodErrorToErrorV1(query.error, getRequestId(request)));
    }

    const manifest = await service.manifest(query.data.target);
    return reply.code(200).send({ schema: "manifest.v1", ...manifest });
  });
}
