/**
 * Asset registry routes.
 *
 * GET  /api/v1/assets  — Registered assets in registration order, with
 *                        the amount held for all users
 * POST /api/v1/assets  — Register or re-point an asset (operator)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RegisterAssetSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const assets = service.listAssets().map(({ assetId, priceSourceId }) => ({
      assetId,
      priceSourceId,
      held: service.heldAmount(assetId).toString(),
    }));
    return c.json({ data: { assets, maxAssets: service.custody.maxAssets } });
  });

  // 201 when the asset is new, 200 when an existing one got a new price source
  routes.post("/", validateBody(RegisterAssetSchema), async (c) => {
    const body = c.get("validatedBody");
    const registration = await c
      .get("service")
      .registerAsset(c.get("auth").principal, body.assetId, body.priceSourceId);

    return c.json({ data: registration }, registration.added ? 201 : 200);
  });

  return routes;
}
