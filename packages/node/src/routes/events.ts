/**
 * Event query routes.
 *
 * GET /api/v1/events — Committed domain events in log order (cursor pagination)
 *
 * Query: `afterPosition` skips everything up to that global position,
 * `type` keeps one event type.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/request.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListEventsQuerySchema);
    const events = c
      .get("service")
      .readAllEvents(query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined);
    const selected = query.type === undefined ? events : events.filter((stored) => stored.event.type === query.type);

    return c.json(
      paginate(selected, { cursor: query.cursor, limit: query.limit }, (stored) => stored.globalPosition),
    );
  });

  return routes;
}
