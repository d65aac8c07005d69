/**
 * Who is calling.
 *
 * Authentication resolves a request to a principal and stops there.
 * Whether that principal may register assets, change limits or manage
 * roles is the custody core's decision.
 */

import { z } from "zod";

/** "header" is the unsecured mode, where X-Principal names the caller. */
export type AuthMethod = "api-key" | "jwt" | "header";

export interface AuthContext {
  readonly type: AuthMethod;
  readonly principal: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly principal: string;
}

export type ApiKeyRegistry = ReadonlyMap<string, ApiKeyRecord>;

/** Index key records by key. A repeated key keeps its last principal. */
export function apiKeyRegistry(records: readonly ApiKeyRecord[]): ApiKeyRegistry {
  return new Map(records.map((record) => [record.key, record]));
}

// Only HS256 tokens are accepted.
export const JwtHeaderSchema = z.object({ alg: z.literal("HS256") });

export const JwtClaimsSchema = z.object({
  /** The acting principal */
  sub: z.string().min(1),
  iss: z.string().default(""),
  exp: z.number(),
  iat: z.number(),
});

export type JwtClaims = z.output<typeof JwtClaimsSchema>;
