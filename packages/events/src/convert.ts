/**
 * @ledgerwire/events — Wire conversions.
 *
 * Inbound: IBC and governance effect records become events, with their
 * attribute maps carried over verbatim.
 *
 * Outbound: events become the consensus engine's attribute-list form.
 * Every attribute is marked for indexing so subscribers can query on it.
 * Attributes are emitted in key order.
 */

import type { IbcEffect, ProposalEffect, WireEvent } from "@ledgerwire/types";
import { AttributeStore } from "./attributes.js";
import { Event } from "./event.js";
import { PROPOSAL, ibcKind, renderEventKind } from "./kind.js";

export function eventFromIbc(effect: IbcEffect): Event {
  return new Event(
    ibcKind(effect.eventType),
    "tx",
    AttributeStore.fromRecord(effect.attributes),
  );
}

export function eventFromProposal(effect: ProposalEffect): Event {
  return new Event(PROPOSAL, "block", AttributeStore.fromRecord(effect.attributes));
}

export function toWireEvent(event: Event): WireEvent {
  return {
    type: renderEventKind(event.kind),
    attributes: event.attributes
      .sortedEntries()
      .map(([key, value]) => ({ key, value, index: true })),
  };
}
