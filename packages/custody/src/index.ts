/**
 * @tallyvault/custody — Multi-asset custody core.
 *
 * Holds user balances of several assets, values them in a common
 * denomination through live price feeds, and enforces a capacity
 * limit on total holdings and a value limit on each withdrawal.
 *
 * Design rules:
 * - All amounts are bigint base units (no floating point)
 * - State changes before the external transfer; failed transfers revert
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies beyond @tallyvault/types
 */

// Facade
export { Custody } from "./custody.js";
export type { CustodyConfig, CustodyNotifications } from "./custody.js";

// Components
export { PermissionGate } from "./permissions.js";
export { AssetRegistry, DEFAULT_MAX_ASSETS } from "./asset-registry.js";
export type { Registration } from "./asset-registry.js";
export { ValuationEngine, DEFAULT_COMMON_DECIMALS } from "./valuation.js";
export { LedgerStore } from "./ledger-store.js";
export { LimitGuard } from "./limit-guard.js";
export type { LimitGuardDeps } from "./limit-guard.js";

// Notifications
export { CUSTODY_EVENTS, createCustodyEvent } from "./events.js";
export type {
  CustodyEventType,
  CustodyEventPayloads,
  MovementPayload,
  AssetConfiguredPayload,
  LimitChangedPayload,
  RoleChangedPayload,
} from "./events.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  pow10,
  convertValue,
  assertNonNegative,
} from "./amount-math.js";

// Types
export type {
  Role,
  PriceOracle,
  AssetMetadata,
  TransferAgent,
  NotificationSink,
  ChangeDirection,
  BalanceChange,
  OperationCounters,
  AssetBalance,
  Valuation,
  Limits,
  OperationKind,
  OperationReceipt,
  CustodySnapshot,
  CustodyErrorCode,
} from "./types.js";

export { CustodyError, ROLES } from "./types.js";
