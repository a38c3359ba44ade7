/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@phasevault/types";
import type { CustodyService } from "../services/custody-service.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The custody deployment served by this app */
    service: CustodyService;

    /** Address taken from X-Caller-Address (set by caller middleware) */
    caller: Address;
  };
}
