/**
 * Limit routes.
 *
 * GET /api/v1/limits           — Capacity and withdraw limits
 * PUT /api/v1/limits/capacity  — Set the capacity limit (operator)
 * PUT /api/v1/limits/withdraw  — Set the per-withdrawal limit (operator)
 *
 * Values travel as decimal strings in the common denomination.
 */

import { Hono } from "hono";
import { parseAmount } from "@tallyvault/custody";
import type { AppEnv } from "../types/api-contract.js";
import { SetLimitSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { limitsJson } from "./serialize.js";

export function createLimitRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: limitsJson(service.limits(), service.commonDecimals) });
  });

  routes.put("/capacity", validateBody(SetLimitSchema), async (c) => {
    const service = c.get("service");
    const value = parseAmount(c.get("validatedBody").value, service.commonDecimals);
    await service.setCapacityLimit(c.get("auth").principal, value);
    return c.json({ data: limitsJson(service.limits(), service.commonDecimals) });
  });

  routes.put("/withdraw", validateBody(SetLimitSchema), async (c) => {
    const service = c.get("service");
    const value = parseAmount(c.get("validatedBody").value, service.commonDecimals);
    await service.setWithdrawLimit(c.get("auth").principal, value);
    return c.json({ data: limitsJson(service.limits(), service.commonDecimals) });
  });

  return routes;
}
