/**
 * Test helpers for @tallyvault/node.
 *
 * Builds the Hono app with all middleware and routes on static feeds,
 * an in-memory event store and a fixed clock. No HTTP server.
 */

import { StaticFeeds } from "@tallyvault/chain-feeds";
import type { Limits } from "@tallyvault/custody";
import { NATIVE_ASSET_ID } from "@tallyvault/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const TS = "2024-01-15T10:00:00.000Z";

export const ADMIN = "admin";
export const ALICE = "alice";
export const BOB = "bob";

export const NATIVE = NATIVE_ASSET_ID;
export const USDC = "0x00000000000000000000000000000000000000aa";

export const NATIVE_FEED = "feed:native-usd";
export const USDC_FEED = "feed:usdc-usd";

/** 1 native unit (18 decimals) */
export const ONE_NATIVE = 10n ** 18n;
/** 1 USDC (6 decimals) */
export const ONE_USDC = 1_000_000n;

/** Common denomination, 6 decimals */
export const DEFAULT_LIMITS: Limits = {
  capacityLimit: 1_000_000_000_000n, // 1,000,000
  withdrawLimit: 10_000_000_000n, // 10,000
};

/** Native at 2000, USDC at 1, both with 8 price decimals. */
export function createTestFeeds(): StaticFeeds {
  return StaticFeeds.fromJson({
    prices: {
      [NATIVE_FEED]: { price: "200000000000", decimals: 8 },
      [USDC_FEED]: { price: "100000000", decimals: 8 },
    },
    assets: {
      [USDC]: { decimals: 6 },
    },
  });
}

export interface TestAppOptions {
  readonly limits?: Limits;
  readonly feeds?: StaticFeeds;
  readonly auth?: CreateAppOptions["auth"];
  readonly logFn?: CreateAppOptions["logFn"];
  readonly enableMetrics?: boolean;
}

export interface TestApp extends AppInstance {
  readonly feeds: StaticFeeds;
}

export function createTestApp(options: TestAppOptions = {}): TestApp {
  let nextId = 0;
  const feeds = options.feeds ?? createTestFeeds();
  const instance = createApp({
    serviceConfig: {
      admin: ADMIN,
      feeds,
      limits: options.limits ?? DEFAULT_LIMITS,
      idGenerator: () => `id-${String(++nextId)}`,
      clock: () => TS,
    },
    ...(options.auth !== undefined ? { auth: options.auth } : {}),
    ...(options.logFn !== undefined ? { logFn: options.logFn } : {}),
    ...(options.enableMetrics !== undefined ? { enableMetrics: options.enableMetrics } : {}),
  });
  return { ...instance, feeds };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** Request acting as `principal` in unsecured mode. */
export function asPrincipal(
  principal: string,
  path: string,
  method: string = "GET",
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Principal": principal });
}

/** Register native and USDC as the admin (who also holds operator). */
export async function seedAssets(app: AppInstance["app"]): Promise<void> {
  for (const [assetId, priceSourceId] of [
    [NATIVE, NATIVE_FEED],
    [USDC, USDC_FEED],
  ] as const) {
    const res = await app.request(
      asPrincipal(ADMIN, "/api/v1/assets", "POST", { assetId, priceSourceId }),
    );
    if (res.status !== 201) {
      throw new Error(`seeding ${assetId} failed with ${String(res.status)}`);
    }
  }
}

/** Parse a JSON body without widening to any. */
export async function readJson(res: Response): Promise<unknown> {
  const body: unknown = await res.json();
  return body;
}
