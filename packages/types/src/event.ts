/**
 * Event Types
 *
 * The notification model a ledger node exposes to subscribers.
 * Every observable outcome (transaction accepted, transaction applied,
 * IBC packet effect, governance proposal executed) becomes one event.
 *
 * Rules:
 * - Event kind and level are fixed at construction
 * - Attribute values are always strings
 * - The rendered kind is the wire `type` field, verbatim
 */

// =============================================================================
// Kind & Level
// =============================================================================

/**
 * Why an event exists.
 *
 * Closed set. `ibc` carries the sub-type string of the originating
 * IBC effect, which is also its rendered wire type.
 */
export type EventKind =
  | { readonly kind: "accepted" }
  | { readonly kind: "applied" }
  | { readonly kind: "ibc"; readonly subType: string }
  | { readonly kind: "proposal" };

/**
 * What an event is about: a whole finalized block, or one transaction in it.
 */
export type EventLevel = "block" | "tx";

// =============================================================================
// Effect Records
// =============================================================================

/**
 * An effect produced by the IBC module while handling a packet.
 */
export interface IbcEffect {
  /** IBC event type (e.g., "send_packet", "write_acknowledgement") */
  readonly eventType: string;

  /** Attributes emitted by the IBC handler */
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * An effect produced by the governance module when a proposal is executed.
 */
export interface ProposalEffect {
  readonly eventType: string;
  readonly attributes: Readonly<Record<string, string>>;
}

// =============================================================================
// Wire Format
// =============================================================================

/**
 * One attribute of a consensus-engine event.
 */
export interface WireEventAttribute {
  readonly key: string;
  readonly value: string;

  /** Whether the consensus engine indexes this attribute for subscriber queries */
  readonly index: boolean;
}

/**
 * The consensus engine's generic event representation.
 */
export interface WireEvent {
  readonly type: string;
  readonly attributes: readonly WireEventAttribute[];
}
