/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema through Hono's
 * validator, so handlers read the parsed value with `c.req.valid("json")`.
 * Returns 400 with the error envelope on failure.
 */

import { validator } from "hono/validator";
import type { z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return validator("json", (value, c) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

/**
 * Validate query parameters. Returns the parsed value or the issues.
 */
export function parseQuery<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query: Record<string, string>,
): { ok: true; value: T } | { ok: false; issues: readonly ValidationIssue[] } {
  const result = schema.safeParse(query);
  if (!result.success) {
    return { ok: false, issues: formatZodErrors(result.error) };
  }
  return { ok: true, value: result.data };
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

function formatZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
