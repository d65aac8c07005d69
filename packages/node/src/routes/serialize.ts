/**
 * JSON shapes for custody results. Bigints become base-10 strings;
 * common-denomination values also carry a formatted decimal.
 */

import { formatAmount } from "@tallyvault/custody";
import type { Limits, OperationReceipt, Valuation } from "@tallyvault/custody";

export interface CommonValueJson {
  readonly value: string;
  readonly formatted: string;
}

export function commonValue(value: bigint, commonDecimals: number): CommonValueJson {
  return { value: value.toString(), formatted: formatAmount(value, commonDecimals) };
}

export function receiptJson(receipt: OperationReceipt, commonDecimals: number) {
  return {
    operationId: receipt.operationId,
    kind: receipt.kind,
    user: receipt.user,
    assetId: receipt.assetId,
    amount: receipt.amount.toString(),
    value: commonValue(receipt.value, commonDecimals),
    balanceAfter: receipt.balanceAfter.toString(),
    counters: receipt.counters,
    timestamp: receipt.timestamp,
  };
}

export function valuationJson(valuation: Valuation, commonDecimals: number) {
  return {
    assetId: valuation.assetId,
    amount: valuation.amount.toString(),
    assetDecimals: valuation.assetDecimals,
    price: valuation.price.toString(),
    priceDecimals: valuation.priceDecimals,
    value: commonValue(valuation.value, commonDecimals),
  };
}

export function limitsJson(limits: Limits, commonDecimals: number) {
  return {
    commonDecimals,
    capacityLimit: commonValue(limits.capacityLimit, commonDecimals),
    withdrawLimit: commonValue(limits.withdrawLimit, commonDecimals),
  };
}
