/**
 * Request validation against zod schemas.
 *
 * validateBody() parses the JSON body into `validatedBody`;
 * validateQuery() parses the query string into `validatedQuery`.
 * Either answers 400 VALIDATION_ERROR with the zod issues on failure.
 */

import type { HonoRequest, MiddlewareHandler } from "hono";
import type { z, ZodError, ZodTypeAny } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export type ValidatedEnv<S extends ZodTypeAny> = {
  Variables: { validatedBody: z.output<S> };
};

export type ValidatedQueryEnv<S extends ZodTypeAny> = {
  Variables: { validatedQuery: z.output<S> };
};

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

const MALFORMED: unique symbol = Symbol("malformed-json");

async function readBody(req: HonoRequest): Promise<unknown> {
  try {
    return await req.json<unknown>();
  } catch {
    return MALFORMED;
  }
}

function rejected(message: string, error: ZodError) {
  return createErrorEnvelope("VALIDATION_ERROR", message, {
    issues: formatZodErrors(error),
  });
}

export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<ValidatedEnv<S>> {
  return async (c, next) => {
    const body = await readBody(c.req);
    if (body === MALFORMED) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return c.json(rejected("Request body validation failed", parsed.error), 400);
    }
    c.set("validatedBody", parsed.data);
    await next();
  };
}

export function validateQuery<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<ValidatedQueryEnv<S>> {
  return async (c, next) => {
    const parsed = schema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json(rejected("Invalid query parameters", parsed.error), 400);
    }
    c.set("validatedQuery", parsed.data);
    await next();
  };
}

/** Flatten zod issues to dotted paths. */
export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map(({ path, message }) => ({ path: path.join("."), message }));
}
