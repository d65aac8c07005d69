/**
 * @tallyvault/custody — Notification catalog.
 *
 * Every committed operation produces exactly one DomainEvent.
 * Failed operations produce none.
 */

import type { AssetId, DomainEvent, PriceSourceId, Principal } from "@tallyvault/types";
import type { Role } from "./types.js";

export const CUSTODY_EVENTS = {
  DEPOSITED: "custody.deposited",
  WITHDREW: "custody.withdrew",
  ASSET_CONFIGURED: "custody.asset_configured",
  CAPACITY_CHANGED: "custody.capacity_changed",
  WITHDRAW_LIMIT_CHANGED: "custody.withdraw_limit_changed",
  ROLE_GRANTED: "custody.role_granted",
  ROLE_REVOKED: "custody.role_revoked",
} as const;

export type CustodyEventType = (typeof CUSTODY_EVENTS)[keyof typeof CUSTODY_EVENTS];

// ─── Payloads ────────────────────────────────────────────────────────────

/** Deposited / Withdrew. Amounts and values are base-unit integer strings. */
export type MovementPayload = {
  readonly user: Principal;
  readonly assetId: AssetId;
  readonly amount: string;
  readonly value: string;
  readonly balanceAfter: string;
};

export type AssetConfiguredPayload = {
  readonly assetId: AssetId;
  readonly priceSourceId: PriceSourceId;
  readonly added: boolean;
  readonly previousPriceSourceId?: PriceSourceId;
};

/** CapacityChanged / WithdrawLimitChanged. */
export type LimitChangedPayload = {
  readonly previous: string;
  readonly current: string;
};

export type RoleChangedPayload = {
  readonly role: Role;
  readonly principal: Principal;
};

export interface CustodyEventPayloads {
  "custody.deposited": MovementPayload;
  "custody.withdrew": MovementPayload;
  "custody.asset_configured": AssetConfiguredPayload;
  "custody.capacity_changed": LimitChangedPayload;
  "custody.withdraw_limit_changed": LimitChangedPayload;
  "custody.role_granted": RoleChangedPayload;
  "custody.role_revoked": RoleChangedPayload;
}

/**
 * Build a custody DomainEvent.
 */
export function createCustodyEvent<T extends CustodyEventType>(
  type: T,
  payload: CustodyEventPayloads[T],
  meta: {
    readonly eventId: string;
    readonly timestamp: string;
    readonly actor: Principal;
    readonly correlationId: string;
  },
): DomainEvent {
  return {
    type,
    metadata: { ...meta, source: "custody" },
    payload: { ...payload },
  };
}
