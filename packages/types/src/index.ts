/**
 * @ledgerwire/types — Shared domain types for the ledgerwire stack.
 *
 * These types are used across all ledgerwire packages:
 * - Event kind, level and the consensus-engine wire format
 * - IBC and governance effect records
 * - Transaction headers and type discriminants
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Event types
export type {
  EventKind,
  EventLevel,
  IbcEffect,
  ProposalEffect,
  WireEvent,
  WireEventAttribute,
} from "./event.js";

// Transaction types
export type {
  Fee,
  RawTxType,
  WrapperTxType,
  DecryptionStatus,
  DecryptedTxType,
  ProtocolTxType,
  TxType,
  TxHeader,
} from "./tx.js";

// Runtime type guards
export {
  isRecord,
  isStringMap,
  isEventLevel,
  isEventKind,
  isIbcEffect,
  isProposalEffect,
  isWireEventAttribute,
  isWireEvent,
  isTxType,
  isTxHeader,
} from "./guards.js";
