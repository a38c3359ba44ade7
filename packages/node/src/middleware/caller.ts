/**
 * Caller identity middleware.
 *
 * Mutating routes act on behalf of the address in X-Caller-Address.
 * The header is taken at face value: authorization happens in the
 * contracts, which check the address against their owner sets.
 */

import type { MiddlewareHandler } from "hono";
import { isAddress } from "@phasevault/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Address";

export function requireCaller(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const raw = c.req.header(CALLER_HEADER);
    if (raw === undefined || raw === "") {
      return c.json(createErrorEnvelope("UNAUTHORIZED", `Missing ${CALLER_HEADER} header`), 401);
    }

    const caller = raw.toLowerCase();
    if (!isAddress(caller)) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid ${CALLER_HEADER}: "${raw}"`), 400);
    }

    c.set("caller", caller);
    await next();
  };
}
