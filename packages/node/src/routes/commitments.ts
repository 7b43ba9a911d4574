/**
 * Commitment lifecycle routes.
 *
 * POST /api/v1/commitments                 - Create a commitment (caller is the owner)
 * GET  /api/v1/commitments                 - List commitments (?owner=, ?status=)
 * GET  /api/v1/commitments/:id             - Get a single commitment
 * POST /api/v1/commitments/:id/value       - Record the current value (admin)
 * POST /api/v1/commitments/:id/settle      - Settle after expiry (admin)
 * POST /api/v1/commitments/:id/early-exit  - Exit early (token holder)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateCommitmentSchema,
  ListCommitmentsQuerySchema,
  UpdateValueSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { toCommitmentView } from "../types/views.js";

export function createCommitmentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateCommitmentSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("auth").principal;
    const body = c.req.valid("json");

    const commitment = service.createCommitment(caller, body.amount, body.asset, body.rules);

    return c.json({ data: toCommitmentView(commitment) }, 201);
  });

  routes.get("/", (c) => {
    const service = c.get("service");

    const query = parseQuery(ListCommitmentsQuerySchema, c.req.query());
    if (!query.ok) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: query.issues,
        }),
        400,
      );
    }

    const commitments = service.listCommitments(query.value);
    return c.json({ data: commitments.map(toCommitmentView) });
  });

  routes.get("/:id", (c) => {
    const commitment = c.get("service").getCommitment(c.req.param("id"));
    return c.json({ data: toCommitmentView(commitment) });
  });

  routes.post("/:id/value", validateBody(UpdateValueSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const commitment = service.updateValue(c.get("auth").principal, c.req.param("id"), body.value);

    return c.json({ data: toCommitmentView(commitment) });
  });

  routes.post("/:id/settle", (c) => {
    const service = c.get("service");
    const commitment = service.settle(c.get("auth").principal, c.req.param("id"));
    return c.json({ data: toCommitmentView(commitment) });
  });

  routes.post("/:id/early-exit", (c) => {
    const service = c.get("service");
    const { penalty, commitment } = service.earlyExit(c.get("auth").principal, c.req.param("id"));
    return c.json({
      data: { penalty: penalty.toString(), commitment: toCommitmentView(commitment) },
    });
  });

  return routes;
}
