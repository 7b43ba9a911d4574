/**
 * Ownership token routes.
 *
 * GET  /api/v1/tokens/:id                - Get a token
 * POST /api/v1/tokens/:id/transfer       - Transfer from the caller
 * POST /api/v1/tokens/batch-transfer     - Batch transfer (atomic or best_effort)
 * GET  /api/v1/owners/:address/tokens    - Balance and token ids of an owner
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BatchTransferSchema, TokenIdSchema, TransferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { toBatchResultView, toTokenView } from "../types/views.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/tokens/batch-transfer", validateBody(BatchTransferSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const result = service.batchTransfer(c.get("auth").principal, body.mode, body.transfers);

    return c.json({ data: toBatchResultView(result) });
  });

  routes.get("/tokens/:id", (c) => {
    const tokenId = TokenIdSchema.safeParse(c.req.param("id"));
    if (!tokenId.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Token id must be a positive integer"), 400);
    }

    const record = c.get("service").getToken(tokenId.data);
    return c.json({ data: toTokenView(record) });
  });

  routes.post("/tokens/:id/transfer", validateBody(TransferSchema), (c) => {
    const tokenId = TokenIdSchema.safeParse(c.req.param("id"));
    if (!tokenId.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Token id must be a positive integer"), 400);
    }
    const body = c.req.valid("json");

    const record = c.get("service").transfer(c.get("auth").principal, tokenId.data, body.to);
    return c.json({ data: toTokenView(record) });
  });

  routes.get("/owners/:address/tokens", (c) => {
    const owner = c.req.param("address");
    const holdings = c.get("service").tokensOf(owner);
    return c.json({ data: { owner, ...holdings } });
  });

  return routes;
}
