/**
 * @ledgerwire/sdk — Subscription responses.
 *
 * Reconstructs events from the JSON a subscriber receives for a block
 * or transaction result:
 *
 *   { "events": [ { "type": "applied", "attributes": [ { "key": ..., "value": ... } ] } ] }
 *
 * Attribute parsing is delegated to Attributes.fromJson; its failures
 * surface as SubscriptionError INVALID_EVENT with the AttributeError as cause.
 */

import { isRecord } from "@ledgerwire/types";
import { AttributeError, Attributes } from "@ledgerwire/events";
import type { SubscriptionEvent } from "./types.js";
import { SubscriptionError } from "./types.js";

/**
 * @throws {SubscriptionError} MISSING_EVENTS, INVALID_EVENT
 */
export function parseSubscriptionEvents(json: unknown): SubscriptionEvent[] {
  if (!isRecord(json) || !Array.isArray(json.events)) {
    throw new SubscriptionError("MISSING_EVENTS", "Response has no `events` array");
  }
  const events: readonly unknown[] = json.events;

  return events.map((raw, i) => {
    if (!isRecord(raw) || typeof raw.type !== "string") {
      throw new SubscriptionError("INVALID_EVENT", `Event ${i} has no string \`type\``);
    }
    try {
      return { type: raw.type, attributes: Attributes.fromJson(raw) };
    } catch (err: unknown) {
      if (err instanceof AttributeError) {
        throw new SubscriptionError("INVALID_EVENT", `Event ${i}: ${err.message}`, err);
      }
      throw err;
    }
  });
}

/**
 * Find the event of the given type whose `hash` attribute matches.
 * Hashes compare case-insensitively.
 */
export function findTxEvent(
  events: readonly SubscriptionEvent[],
  type: "accepted" | "applied",
  hash: string,
): SubscriptionEvent | undefined {
  const wanted = hash.toUpperCase();
  return events.find(
    (event) => event.type === type && event.attributes.get("hash")?.toUpperCase() === wanted,
  );
}
