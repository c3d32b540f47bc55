/**
 * Zod validation middleware.
 *
 * Wraps Hono's validator so that handlers read typed input through
 * `c.req.valid(target)`. Failures return 400 VALIDATION_ERROR with the
 * zod issues; malformed JSON surfaces as Hono's 400 HTTPException.
 */

import type { Context } from "hono";
import { validator } from "hono/validator";
import type { z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function jsonBody<T>(schema: Schema<T>) {
  return validator("json", (value, c) => check(schema, value, c, "Request body"));
}

export function queryParams<T>(schema: Schema<T>) {
  return validator("query", (value, c) => check(schema, value, c, "Query string"));
}

export function pathParams<T>(schema: Schema<T>) {
  return validator("param", (value, c) => check(schema, value, c, "Path parameters"));
}

function check<T>(schema: Schema<T>, value: unknown, c: Context, what: string): T | Response {
  const result = schema.safeParse(value);
  if (!result.success) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", `${what} validation failed`, {
        issues: formatZodErrors(result.error),
      }),
      400,
    );
  }
  return result.data;
}

export function formatZodErrors(
  error: z.ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
