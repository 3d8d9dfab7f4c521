/**
 * Zod validation middleware and helpers.
 *
 * Returns 400 with a VALIDATION_ERROR envelope on failure.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Validate the JSON request body against a Zod schema.
 *
 * On success, sets a typed `validatedBody` in context variables.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return validationFailure(c, "Request body validation failed", result.error);
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * 400 response for a failed query, path or body parse.
 */
export function validationFailure(c: Context, message: string, error: ZodError): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", message, {
      issues: formatZodErrors(error),
    }),
    400,
  );
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
