/**
 * @tallyvault/custody — Types for the custody core.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint in native base units; values are bigint in
 *   common-denomination base units
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type {
  AssetId,
  DomainEvent,
  PriceQuote,
  PriceSourceId,
  Principal,
} from "@tallyvault/types";

// ─── Roles ───────────────────────────────────────────────────────────────

/**
 * The two capability roles.
 *
 * - admin: grants and revokes roles
 * - operator: registers assets and sets limits
 *
 * Flat model: admin does not imply operator.
 */
export type Role = "admin" | "operator";

export const ROLES: readonly Role[] = ["admin", "operator"] as const;

// ─── Collaborators ───────────────────────────────────────────────────────

/** External price feed reader. */
export interface PriceOracle {
  latestPrice(priceSourceId: PriceSourceId): Promise<PriceQuote>;
}

/** Decimal precision of non-native assets. */
export interface AssetMetadata {
  decimals(assetId: AssetId): Promise<number>;
}

/**
 * Moves value between the user and the custodian.
 *
 * Both directions resolve `true` on success. Resolving `false` or
 * rejecting fails the enclosing operation. Implementations may call
 * back into the custody core before settling.
 */
export interface TransferAgent {
  pullFrom(user: Principal, assetId: AssetId, amount: bigint): Promise<boolean>;
  pushTo(user: Principal, assetId: AssetId, amount: bigint): Promise<boolean>;
}

/** Receives committed-operation notifications. Must not block. */
export interface NotificationSink {
  emit(event: DomainEvent): void;
}

// ─── Ledger Store ────────────────────────────────────────────────────────

export type ChangeDirection = "credit" | "debit";

/**
 * Receipt of a single balance mutation.
 * Passed back to LedgerStore.revert() to undo an uncommitted change.
 */
export interface BalanceChange {
  readonly user: Principal;
  readonly assetId: AssetId;
  readonly direction: ChangeDirection;
  readonly amount: bigint;
  readonly balanceAfter: bigint;
}

/** Per-user operation counters. Never decremented once committed. */
export interface OperationCounters {
  readonly deposits: number;
  readonly withdrawals: number;
}

export interface AssetBalance {
  readonly assetId: AssetId;
  readonly amount: bigint;
}

// ─── Valuation ───────────────────────────────────────────────────────────

/** Full breakdown of a single valuation. */
export interface Valuation {
  readonly assetId: AssetId;
  readonly amount: bigint;
  readonly assetDecimals: number;
  readonly price: bigint;
  readonly priceDecimals: number;
  /** Value in common-denomination base units. */
  readonly value: bigint;
}

// ─── Limits ──────────────────────────────────────────────────────────────

/**
 * Both limits are in common-denomination base units.
 * The withdraw limit caps the value of a single withdrawal.
 */
export interface Limits {
  readonly capacityLimit: bigint;
  readonly withdrawLimit: bigint;
}

// ─── Transaction Protocol ────────────────────────────────────────────────

export type OperationKind = "deposit" | "withdraw";

/** Result of a committed deposit or withdrawal. */
export interface OperationReceipt {
  readonly operationId: string;
  readonly kind: OperationKind;
  readonly user: Principal;
  readonly assetId: AssetId;
  readonly amount: bigint;
  /** Common-denomination value of `amount` at the time of the operation. */
  readonly value: bigint;
  readonly balanceAfter: bigint;
  readonly counters: OperationCounters;
  readonly timestamp: string;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire custody state.
 * Bigints are encoded as base-10 strings.
 */
export interface CustodySnapshot {
  readonly version: 1;
  readonly roles: Readonly<Record<Role, readonly Principal[]>>;
  readonly assets: readonly { readonly assetId: AssetId; readonly priceSourceId: PriceSourceId }[];
  readonly maxAssets: number;
  readonly limits: { readonly capacityLimit: string; readonly withdrawLimit: string };
  readonly balances: readonly {
    readonly user: Principal;
    readonly assetId: AssetId;
    readonly amount: string;
  }[];
  readonly counters: readonly {
    readonly user: Principal;
    readonly deposits: number;
    readonly withdrawals: number;
  }[];
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for custody operations. */
export type CustodyErrorCode =
  | "UNAUTHORIZED"
  | "ASSET_NOT_REGISTERED"
  | "INVALID_PRICE"
  | "INVALID_AMOUNT"
  | "NOTHING_TO_DEPOSIT"
  | "NOTHING_TO_WITHDRAW"
  | "INSUFFICIENT_BALANCE"
  | "WITHDRAW_LIMIT_EXCEEDED"
  | "CAPACITY_EXCEEDED"
  | "FAILED_TRANSFER"
  | "INVALID_DIRECT_TRANSFER"
  | "REENTRANT_CALL";

/**
 * Structured error from the custody core.
 * Always thrown — never returns error codes silently.
 */
export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;

  constructor(code: CustodyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CustodyError";
    this.code = code;
  }
}
