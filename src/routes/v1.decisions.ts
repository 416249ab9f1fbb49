/**
 * Mutation endpoints.
 *
 * POST  /v1/decisions            Create with the scaffold body
 * PATCH /v1/decisions/:id        Set one frontmatter field
 * POST  /v1/decisions/:id/edit   Replace a unique span of body text
 *
 * A mutation that pre-validation rejects answers 422 with its errors and
 * warnings; nothing is written in that case.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { SCOPES } from "../graph/types.js";
import { coerceSetValue, type DecisionService } from "../services/decision-service.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

const CreateBody = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  level: z.number().int(),
  state: z.string().optional(),
  stakes: z.string().optional(),
  depends_on: z.array(z.string()).default([]),
  partition: z.enum(SCOPES).default("project"),
});

const SetBody = z.object({
  field: z.string().min(1),
  value: z.union([z.string(), z.number(), z.array(z.string())]),
});

const EditBody = z.object({
  old_text: z.string().min(1),
  new_text: z.string(),
});

const DecisionParams = z.object({
  id: z.string().min(1),
});

export interface DecisionRouteDeps {
  service: DecisionService;
}

export async function decisionRoutes(app: FastifyInstance, deps: DecisionRouteDeps) {
  const { service } = deps;

  app.post("/v1/decisions", async (request, reply) => {
    const body = CreateBody.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send(zodErrorToErrorV1(body.error, getRequestId(request)));
    }

    const { id, partition, ...input } = body.data;
    const result = await service.create(id, input, partition);
    if (!result.created) {
      return reply.code(422).send({
        schema: "mutation.rejected.v1",
        errors: result.errors,
        warnings: result.warnings,
      });
    }

    return reply.code(201).send({
      schema: "decision.created.v1",
      id: result.node.id,
      scope: result.node.scope,
      level: result.node.level,
      state: result.node.state,
      warnings: result.warnings,
    });
  });

  app.patch("/v1/decisions/:id", async (request, reply) => {
    const params = DecisionParams.safeParse(request.params);
    const body = SetBody.safeParse(request.body);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, getRequestId(request)));
    }
    if (!body.success) {
      return reply.code(400).send(zodErrorToErrorV1(body.error, getRequestId(request)));
    }

    const { field, value } = body.data;
    const result = await service.set(params.data.id, field, coerceSetValue(field, value));
    if (!result.applied) {
      return reply.code(422).send({
        schema: "mutation.rejected.v1",
        errors: result.errors,
        warnings: result.warnings,
      });
    }

    const { applied: _applied, ...update } = result;
    return reply.code(200).send({ schema: "decision.updated.v1", ...update });
  });

  app.post("/v1/decisions/:id/edit", async (request, reply) => {
    const params = DecisionParams.safeParse(request.params);
    const body = EditBody.safeParse(request.body);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, getRequestId(request)));
    }
    if (!body.success) {
      return reply.code(400).send(zodErrorToErrorV1(body.error, getRequestId(request)));
    }

    const result = await service.edit(params.data.id, body.data.old_text, body.data.new_text);
    return reply.code(200).send({ schema: "decision.edit.v1", ...result });
  });
}
