/**
 * Movement routes. The authenticated principal is the user.
 *
 * POST /api/v1/deposits          — Deposit into custody
 * POST /api/v1/withdrawals       — Withdraw from custody
 * POST /api/v1/transfers/direct  — Unsolicited transfer; always rejected
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { MovementSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { receiptJson } from "./serialize.js";

export function createMovementRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposits", validateBody(MovementSchema), async (c) => {
    const { assetId, amount } = c.get("validatedBody");
    const service = c.get("service");
    const receipt = await service.deposit(c.get("auth").principal, assetId, BigInt(amount));
    return c.json({ data: receiptJson(receipt, service.commonDecimals) }, 201);
  });

  routes.post("/withdrawals", validateBody(MovementSchema), async (c) => {
    const { assetId, amount } = c.get("validatedBody");
    const service = c.get("service");
    const receipt = await service.withdraw(c.get("auth").principal, assetId, BigInt(amount));
    return c.json({ data: receiptJson(receipt, service.commonDecimals) }, 201);
  });

  routes.post("/transfers/direct", validateBody(MovementSchema), async (c) => {
    const { assetId, amount } = c.get("validatedBody");
    return c.get("service").receiveDirect(c.get("auth").principal, assetId, BigInt(amount));
  });

  return routes;
}
