/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledgerwire domain types.
 * These enable safe runtime validation at system boundaries
 * (subscription payloads, decoded transactions, external effect records).
 */

import type {
  EventKind,
  EventLevel,
  IbcEffect,
  ProposalEffect,
  WireEvent,
  WireEventAttribute,
} from "./event.js";
import type { TxHeader, TxType } from "./tx.js";

// =============================================================================
// Shared helpers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isStringMap(value: unknown): value is Record<string, string> {
  if (!isRecord(value)) return false;
  return Object.values(value).every((v) => typeof v === "string");
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_LEVELS = new Set<string>(["block", "tx"]);

export function isEventLevel(value: unknown): value is EventLevel {
  return typeof value === "string" && EVENT_LEVELS.has(value);
}

export function isEventKind(value: unknown): value is EventKind {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case "accepted":
    case "applied":
    case "proposal":
      return true;
    case "ibc":
      return typeof value.subType === "string";
    default:
      return false;
  }
}

function isEffectRecord(value: unknown): value is IbcEffect | ProposalEffect {
  if (!isRecord(value)) return false;
  return typeof value.eventType === "string" && isStringMap(value.attributes);
}

export function isIbcEffect(value: unknown): value is IbcEffect {
  return isEffectRecord(value);
}

export function isProposalEffect(value: unknown): value is ProposalEffect {
  return isEffectRecord(value);
}

export function isWireEventAttribute(value: unknown): value is WireEventAttribute {
  if (!isRecord(value)) return false;
  return (
    typeof value.key === "string" &&
    typeof value.value === "string" &&
    typeof value.index === "boolean"
  );
}

export function isWireEvent(value: unknown): value is WireEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    Array.isArray(value.attributes) &&
    value.attributes.every(isWireEventAttribute)
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

export function isTxType(value: unknown): value is TxType {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case "raw":
      return true;
    case "wrapper":
      return (
        isRecord(value.fee) &&
        typeof value.fee.amount === "string" &&
        typeof value.fee.token === "string" &&
        typeof value.pk === "string" &&
        typeof value.epoch === "number" &&
        Number.isInteger(value.epoch) &&
        value.epoch >= 0 &&
        typeof value.gasLimit === "string" &&
        typeof value.rawHeaderHash === "string"
      );
    case "decrypted":
      return value.status === "decrypted" || value.status === "undecryptable";
    case "protocol":
      return typeof value.pk === "string" && typeof value.protocolTx === "string";
    default:
      return false;
  }
}

export function isTxHeader(value: unknown): value is TxHeader {
  if (!isRecord(value)) return false;
  return (
    typeof value.chainId === "string" &&
    typeof value.timestamp === "string" &&
    (value.expiration === undefined || typeof value.expiration === "string") &&
    typeof value.codeHash === "string" &&
    typeof value.dataHash === "string" &&
    isTxType(value.txType)
  );
}
