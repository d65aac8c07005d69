/**
 * Account query routes.
 *
 * GET /api/v1/accounts/:user/balances         — Non-zero balances
 * GET /api/v1/accounts/:user/balances/:asset  — One balance (0 if none)
 * GET /api/v1/accounts/:user/counters         — Deposit and withdraw counts
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:user/balances", (c) => {
    const user = c.req.param("user");
    const balances = c
      .get("service")
      .balancesOf(user)
      .map(({ assetId, amount }) => ({ assetId, amount: amount.toString() }));
    return c.json({ data: { user, balances } });
  });

  routes.get("/:user/balances/:asset", (c) => {
    const user = c.req.param("user");
    const assetId = c.req.param("asset");
    const amount = c.get("service").balanceOf(user, assetId);
    return c.json({ data: { user, assetId, amount: amount.toString() } });
  });

  routes.get("/:user/counters", (c) => {
    const user = c.req.param("user");
    return c.json({ data: { user, ...c.get("service").countersOf(user) } });
  });

  return routes;
}
