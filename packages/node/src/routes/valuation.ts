/**
 * Valuation routes. Read-only; every call reads the live feed.
 *
 * GET /api/v1/valuation?asset=…&amount=…  — Value of an amount
 * GET /api/v1/valuation/total             — Value of everything held
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ValuationQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { commonValue, valuationJson } from "./serialize.js";

export function createValuationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ValuationQuerySchema), async (c) => {
    const service = c.get("service");
    const { asset, amount } = c.get("validatedQuery");
    const valuation = await service.quote(asset, BigInt(amount));
    return c.json({ data: valuationJson(valuation, service.commonDecimals) });
  });

  routes.get("/total", async (c) => {
    const service = c.get("service");
    const total = await service.totalValue();
    return c.json({ data: commonValue(total, service.commonDecimals) });
  });

  return routes;
}
