/**
 * @ledgerwire/events — Ledger node event model.
 *
 * Provides:
 * - AttributeStore: the key/value payload of an event
 * - Event + newTxEvent: events for accepted and applied transactions
 * - Wire conversions: effect records → Event → consensus-engine event
 * - Attributes: parser for subscription response payloads
 * - Effect builders for governance and IBC
 * - Canonical JSON codec for events
 *
 * @packageDocumentation
 */

// Attributes
export { AttributeStore } from "./attributes.js";

// Kinds
export {
  ACCEPTED,
  APPLIED,
  PROPOSAL,
  ibcKind,
  renderEventKind,
  eventKindsEqual,
} from "./kind.js";

// Events
export { Event, newTxEvent } from "./event.js";

// Conversions
export { eventFromIbc, eventFromProposal, toWireEvent } from "./convert.js";

// Parsing
export { Attributes } from "./parser.js";

// Effects
export { PROPOSAL_EVENT_TYPE, createProposalEffect, createIbcEffect } from "./effects.js";
export type { TallyResult, ProposalOutcome } from "./effects.js";

// Codec
export { EventKindSchema, EncodedEventSchema, encodeEvent, decodeEvent } from "./codec.js";
export type { EncodedEvent } from "./codec.js";

// Errors
export { EventError, AttributeError, EventCodecError } from "./errors.js";
export type { EventErrorCode, AttributeErrorCode, EventCodecErrorCode } from "./errors.js";
