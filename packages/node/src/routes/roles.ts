/**
 * Role routes.
 *
 * GET  /api/v1/roles/:role   — Current members of a role
 * POST /api/v1/roles/grant   — Grant a role (admin)
 * POST /api/v1/roles/revoke  — Revoke a role (admin)
 *
 * Grant and revoke answer `changed: false` when membership was already
 * as requested.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RoleChangeSchema, RoleParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { validateBody } from "../middleware/validate.js";

export function createRoleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:role", (c) => {
    const role = RoleParamSchema.safeParse(c.req.param("role"));
    if (!role.success) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Unknown role '${c.req.param("role")}'`),
        404,
      );
    }
    return c.json({ data: { role: role.data, members: c.get("service").members(role.data) } });
  });

  routes.post("/grant", validateBody(RoleChangeSchema), async (c) => {
    const { role, principal } = c.get("validatedBody");
    const changed = await c.get("service").grantRole(c.get("auth").principal, role, principal);
    return c.json({ data: { role, principal, changed } });
  });

  routes.post("/revoke", validateBody(RoleChangeSchema), async (c) => {
    const { role, principal } = c.get("validatedBody");
    const changed = await c.get("service").revokeRole(c.get("auth").principal, role, principal);
    return c.json({ data: { role, principal, changed } });
  });

  return routes;
}
