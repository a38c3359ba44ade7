/**
 * Zod parsing helpers for request bodies, queries and path parameters.
 *
 * Failures throw RequestError("VALIDATION_ERROR"), which the global
 * error handler renders as a 400 envelope listing the issues.
 */

import type { Context } from "hono";
import type { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestError } from "../types/error.js";

export async function parseBody<S extends z.ZodTypeAny>(c: Context<AppEnv>, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestError("VALIDATION_ERROR", "Invalid JSON in request body");
  }
  return parseWith(schema, body, "Request body validation failed");
}

export function parseQuery<S extends z.ZodTypeAny>(c: Context<AppEnv>, schema: S): z.output<S> {
  return parseWith(schema, c.req.query(), "Invalid query parameters");
}

export function parseParam<S extends z.ZodTypeAny>(value: string, schema: S, name: string): z.output<S> {
  return parseWith(schema, value, `Invalid path parameter "${name}"`);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestError("VALIDATION_ERROR", message, { issues: formatZodErrors(result.error) });
  }
  return result.data;
}

function formatZodErrors(error: z.ZodError): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
