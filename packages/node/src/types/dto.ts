/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts of an asset are base-unit integer strings ("1500000" is
 * 1.5 of a 6-decimal token). Limits are decimal strings in the common
 * denomination ("25000.5"). Bigints never appear in JSON.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const BaseUnitsSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer string in base units");

export const CommonAmountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal string");

export const AssetIdSchema = z.string().min(1).max(128);

export const PrincipalSchema = z.string().min(1).max(256);

// =============================================================================
// Administration
// =============================================================================

export const RegisterAssetSchema = z.object({
  assetId: AssetIdSchema,
  priceSourceId: z.string().min(1).max(128),
});

export const SetLimitSchema = z.object({
  value: CommonAmountSchema,
});

export const RoleChangeSchema = z.object({
  role: z.enum(["admin", "operator"]),
  principal: PrincipalSchema,
});

// =============================================================================
// Movements
// =============================================================================

export const MovementSchema = z.object({
  assetId: AssetIdSchema,
  amount: BaseUnitsSchema,
});

// =============================================================================
// Queries
// =============================================================================

export const ValuationQuerySchema = z.object({
  asset: AssetIdSchema,
  amount: BaseUnitsSchema,
});

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  direction: z.enum(["forward", "backward"]).default("forward"),
  /** Comma-separated event types */
  types: z.string().optional(),
});

export const RoleParamSchema = z.enum(["admin", "operator"]);

export type RegisterAssetDto = z.infer<typeof RegisterAssetSchema>;
export type SetLimitDto = z.infer<typeof SetLimitSchema>;
export type RoleChangeDto = z.infer<typeof RoleChangeSchema>;
export type MovementDto = z.infer<typeof MovementSchema>;
export type ValuationQuery = z.infer<typeof ValuationQuerySchema>;
export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
