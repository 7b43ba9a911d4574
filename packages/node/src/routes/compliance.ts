/**
 * Compliance routes, per commitment.
 *
 * POST /api/v1/commitments/:id/attestations      - Record an attestation (caller attests)
 * GET  /api/v1/commitments/:id/attestations      - List attestations (?type=)
 * GET  /api/v1/commitments/:id/health-metrics    - Merged health view
 * GET  /api/v1/commitments/:id/compliance-score  - Running and recomputed scores
 * GET  /api/v1/commitments/:id/compliance        - Compliance verdict
 * POST /api/v1/commitments/:id/fees              - Record fees (admin)
 * POST /api/v1/commitments/:id/drawdown          - Record a display drawdown (admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AttestSchema,
  ListAttestationsQuerySchema,
  RecordDrawdownSchema,
  RecordFeesSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { toHealthMetricsView } from "../types/views.js";

export function createComplianceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:id/attestations", validateBody(AttestSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const attestation = service.attest(
      c.get("auth").principal,
      c.req.param("id"),
      body.attestationType,
      body.data,
      body.isCompliant,
    );

    return c.json({ data: attestation }, 201);
  });

  routes.get("/:id/attestations", (c) => {
    const query = parseQuery(ListAttestationsQuerySchema, c.req.query());
    if (!query.ok) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: query.issues,
        }),
        400,
      );
    }

    const attestations = c.get("service").getAttestations(c.req.param("id"), query.value.type);
    return c.json({ data: attestations });
  });

  routes.get("/:id/health-metrics", (c) => {
    const metrics = c.get("service").getHealthMetrics(c.req.param("id"));
    return c.json({ data: toHealthMetricsView(metrics) });
  });

  routes.get("/:id/compliance-score", (c) => {
    const service = c.get("service");
    const id = c.req.param("id");
    return c.json({
      data: {
        commitmentId: id,
        calculated: service.calculateComplianceScore(id),
        stored: service.getHealthMetrics(id).complianceScore,
      },
    });
  });

  routes.get("/:id/compliance", (c) => {
    const id = c.req.param("id");
    return c.json({ data: { commitmentId: id, compliant: c.get("service").verifyCompliance(id) } });
  });

  routes.post("/:id/fees", validateBody(RecordFeesSchema), (c) => {
    const service = c.get("service");
    const id = c.req.param("id");
    const body = c.req.valid("json");

    const total = service.recordFees(c.get("auth").principal, id, body.amount);

    return c.json({ data: { commitmentId: id, feesGenerated: total.toString() } });
  });

  routes.post("/:id/drawdown", validateBody(RecordDrawdownSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const metrics = service.recordDrawdown(c.get("auth").principal, c.req.param("id"), body.percent);

    return c.json({ data: toHealthMetricsView(metrics) });
  });

  return routes;
}
