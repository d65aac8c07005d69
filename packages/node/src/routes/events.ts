/**
 * Event log route.
 *
 * GET /api/v1/events?fromPosition&limit&direction&types
 *
 * Custody notifications and settlement instructions in global order,
 * with their hash-chain links.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const { fromPosition, limit, direction, types } = c.get("validatedQuery");
    const service = c.get("service");
    const events = service.readEvents({
      ...(fromPosition !== undefined ? { fromPosition } : {}),
      maxCount: limit,
      direction,
      ...(types !== undefined ? { types: types.split(",").filter((t) => t.length > 0) } : {}),
    });

    return c.json({
      data: events,
      meta: {
        count: events.length,
        globalPosition: service.eventStore.globalPosition(),
      },
    });
  });

  return routes;
}
