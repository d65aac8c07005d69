/**
 * Resolves the caller of /api routes to a principal.
 *
 * Credentials are tried in order: `X-Api-Key`, then `Authorization:
 * Bearer <HS256 JWT>`. The first credential present decides; a bad one is
 * 401 even when a good one of the other kind follows. Nothing here checks
 * roles.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { JwtClaimsSchema, JwtHeaderSchema } from "../types/auth.js";
import type { ApiKeyRegistry, AuthContext, JwtClaims } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export interface AuthConfig {
  readonly apiKeys: ApiKeyRegistry;
  /** Enables bearer tokens */
  readonly jwtSecret?: string | undefined;
  readonly jwtIssuer?: string | undefined;
}

type Outcome = { readonly auth: AuthContext } | { readonly refused: string };

/** undefined when the request carries no credential of this kind */
type Strategy = (header: (name: string) => string | undefined, config: AuthConfig) => Outcome | undefined;

const apiKeyStrategy: Strategy = (header, config) => {
  const key = header("X-Api-Key");
  if (key === undefined) {
    return undefined;
  }
  const record = config.apiKeys.get(key);
  return record === undefined
    ? { refused: "Invalid API key" }
    : { auth: { type: "api-key", principal: record.principal } };
};

const BEARER = "Bearer ";

const bearerStrategy: Strategy = (header, config) => {
  const authorization = header("Authorization");
  if (authorization === undefined || !authorization.startsWith(BEARER)) {
    return undefined;
  }
  if (config.jwtSecret === undefined) {
    return { refused: "JWT authentication not configured" };
  }
  const claims = verifyJwt(authorization.slice(BEARER.length), config.jwtSecret, config.jwtIssuer);
  return claims === undefined
    ? { refused: "Invalid or expired JWT" }
    : { auth: { type: "jwt", principal: claims.sub } };
};

const STRATEGIES: readonly Strategy[] = [apiKeyStrategy, bearerStrategy];

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = (name: string): string | undefined => c.req.header(name);
    const outcome = STRATEGIES.reduce<Outcome | undefined>(
      (found, strategy) => found ?? strategy(header, config),
      undefined,
    );

    if (outcome === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }
    if ("refused" in outcome) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", outcome.refused), 401);
    }

    c.set("auth", outcome.auth);
    await next();
  };
}

// ─── HS256 ───────────────────────────────────────────────────────────

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf-8").toString("base64url");
}

function decodeSegment(segment: string): unknown {
  try {
    const decoded: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
    return decoded;
  } catch {
    return undefined;
  }
}

function hs256(signingInput: string, secret: string): string {
  return createHmac("sha256", secret).update(signingInput).digest("base64url");
}

function sameSignature(expected: string, presented: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(presented);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Claims of a well-formed, correctly signed, unexpired HS256 token from
 * `expectedIssuer` (when given); otherwise undefined.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const segments = token.split(".");
  if (segments.length !== 3) {
    return undefined;
  }
  const [header = "", payload = "", signature = ""] = segments;
  if (!sameSignature(hs256(`${header}.${payload}`, secret), signature)) {
    return undefined;
  }
  if (!JwtHeaderSchema.safeParse(decodeSegment(header)).success) {
    return undefined;
  }

  const parsed = JwtClaimsSchema.safeParse(decodeSegment(payload));
  if (!parsed.success) {
    return undefined;
  }
  const claims = parsed.data;
  const expired = claims.exp < nowSeconds;
  const foreign = expectedIssuer !== undefined && claims.iss !== expectedIssuer;
  return expired || foreign ? undefined : claims;
}

/** Issue a token; `iat` defaults to now. Used by tests and operators. */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = encodeSegment({ alg: "HS256", typ: "JWT" });
  const payload = encodeSegment({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) });
  return `${header}.${payload}.${hs256(`${header}.${payload}`, secret)}`;
}

// ─── Unsecured mode ──────────────────────────────────────────────────

export const PRINCIPAL_HEADER = "X-Principal";

/**
 * For development and tests: the caller names itself in X-Principal,
 * and a missing or empty header acts as `fallback`.
 */
export function headerPrincipalMiddleware(fallback: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const named = c.req.header(PRINCIPAL_HEADER);
    c.set("auth", {
      type: "header",
      principal: named !== undefined && named.length > 0 ? named : fallback,
    });
    await next();
  };
}
