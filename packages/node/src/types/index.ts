/**
 * Type barrel — re-exports all public types from @tallyvault/node.
 */

// DTOs
export {
  BaseUnitsSchema,
  CommonAmountSchema,
  AssetIdSchema,
  PrincipalSchema,
  RegisterAssetSchema,
  SetLimitSchema,
  RoleChangeSchema,
  MovementSchema,
  ValuationQuerySchema,
  ListEventsQuerySchema,
  RoleParamSchema,
} from "./dto.js";
export type {
  RegisterAssetDto,
  SetLimitDto,
  RoleChangeDto,
  MovementDto,
  ValuationQuery,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, ERROR_STATUS, isErrorCode } from "./error.js";
export type { ApiErrorCode, ErrorBody, ErrorCode, ErrorEnvelope } from "./error.js";

// Auth
export { apiKeyRegistry, JwtClaimsSchema, JwtHeaderSchema } from "./auth.js";
export type { AuthContext, AuthMethod, ApiKeyRecord, ApiKeyRegistry, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
