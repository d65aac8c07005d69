/**
 * @tallyvault/node — Configuration.
 *
 * Everything comes from the environment and is checked by one zod
 * schema at startup; a bad value stops the process before it listens.
 * Limits are decimal strings in the common denomination ("1000000.50");
 * they are scaled to base units once COMMON_DECIMALS is known.
 */

import { z } from "zod";
import { parseAmount } from "@tallyvault/custody";
import type { Limits } from "@tallyvault/custody";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const DecimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal string");

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),
    JWT_SECRET: z.string().optional(),
    JWT_ISSUER: z.string().default("tallyvault"),

    // Custody
    ADMIN_PRINCIPAL: z.string().min(1).default("admin"),
    COMMON_DECIMALS: z.coerce.number().int().min(0).max(36).default(6),
    MAX_ASSETS: z.coerce.number().int().min(1).default(10),
    CAPACITY_LIMIT: DecimalString.default("1000000"),
    WITHDRAW_LIMIT: DecimalString.default("10000"),

    // Feeds
    FEED_MODE: z.enum(["static", "evm"]).default("static"),
    STATIC_FEEDS_FILE: z.string().default("config/feeds.example.json"),
    EVM_CHAIN_ID: z.string().default("eip155:1"),
    EVM_RPC_URL: z.string().url().optional(),
    RPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),

    // Idempotency
    IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
  })
  .refine((config) => config.FEED_MODE !== "evm" || config.EVM_RPC_URL !== undefined, {
    message: "EVM_RPC_URL is required when FEED_MODE is evm",
    path: ["EVM_RPC_URL"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API keys
// =============================================================================

function parseKeyEntry(entry: string): ApiKeyRecord {
  const fields = entry.split(":");
  if (fields.length !== 2) {
    throw new Error(`Invalid API_KEYS entry: "${entry}". Expected format: key:principal`);
  }
  const [key = "", principal = ""] = fields;
  if (key === "") {
    throw new Error("API key cannot be empty");
  }
  if (principal === "") {
    throw new Error("Principal cannot be empty in API_KEYS");
  }
  return { key, principal };
}

/**
 * `API_KEYS="key1:alice,key2:ops"` to key records. A key only names its
 * principal; what that principal may do is up to the custody roles.
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map(parseKeyEntry);
}

// =============================================================================
// Limits
// =============================================================================

/**
 * Scale the configured limits to common-denomination base units.
 */
export function limitsFromConfig(config: AppConfig): Limits {
  return {
    capacityLimit: parseAmount(config.CAPACITY_LIMIT, config.COMMON_DECIMALS),
    withdrawLimit: parseAmount(config.WITHDRAW_LIMIT, config.COMMON_DECIMALS),
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
