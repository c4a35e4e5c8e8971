/**
 * @ledgerwire/events — Event.
 *
 * One event per observable effect: an accepted transaction, an applied
 * transaction, an IBC effect, an executed proposal. Kind and level are
 * fixed at construction; attributes are filled in while the event is
 * being built and then the event is handed off for conversion.
 */

import type { EventKind, EventLevel } from "@ledgerwire/types";
import type { Tx } from "@ledgerwire/tx";
import { RAW_TX_TYPE } from "@ledgerwire/tx";
import { AttributeStore } from "./attributes.js";
import { EventError } from "./errors.js";
import { ACCEPTED, APPLIED, eventKindsEqual } from "./kind.js";

export class Event {
  readonly kind: EventKind;
  readonly level: EventLevel;
  readonly attributes: AttributeStore;

  constructor(kind: EventKind, level: EventLevel, attributes: AttributeStore = new AttributeStore()) {
    this.kind = kind;
    this.level = level;
    this.attributes = attributes;
  }

  get(key: string): string | undefined {
    return this.attributes.get(key);
  }

  containsKey(key: string): boolean {
    return this.attributes.containsKey(key);
  }

  /**
   * @throws {EventError} MISSING_ATTRIBUTE_KEY if the key is absent
   */
  getRequired(key: string): string {
    return this.attributes.getRequired(key);
  }

  set(key: string, value: string): this {
    this.attributes.set(key, value);
    return this;
  }

  equals(other: Event): boolean {
    return (
      eventKindsEqual(this.kind, other.kind) &&
      this.level === other.level &&
      this.attributes.equals(other.attributes)
    );
  }
}

// =============================================================================
// Transaction events
// =============================================================================

function renderHeight(height: number | bigint): string {
  if (typeof height === "number" && !Number.isSafeInteger(height)) {
    throw new EventError("INVALID_HEIGHT", `Block height must be an integer, got ${height}`);
  }
  if (height < 0) {
    throw new EventError("INVALID_HEIGHT", `Block height must be non-negative, got ${height}`);
  }
  return height.toString();
}

/**
 * Build the event for a transaction finalized at `height`.
 *
 * - wrapper: accepted, hashed by its own header
 * - decrypted: applied, hashed with the header type reset to raw, which is
 *   the hash the transaction had when it was submitted
 * - protocol: applied, hashed by its own header
 *
 * Every event carries `hash`, `height` and an empty `log`.
 *
 * @throws {EventError} UNREACHABLE_TX_TYPE for a raw transaction
 * @throws {EventError} INVALID_HEIGHT for a negative or fractional height
 */
export function newTxEvent(tx: Tx, height: number | bigint): Event {
  const txType = tx.txType;
  let event: Event;

  switch (txType.type) {
    case "wrapper":
      event = new Event(ACCEPTED, "tx");
      event.set("hash", tx.headerHash().toString());
      break;
    case "decrypted":
      event = new Event(APPLIED, "tx");
      event.set("hash", tx.updateHeader(RAW_TX_TYPE).headerHash().toString());
      break;
    case "protocol":
      event = new Event(APPLIED, "tx");
      event.set("hash", tx.headerHash().toString());
      break;
    case "raw":
      throw new EventError(
        "UNREACHABLE_TX_TYPE",
        "Raw transactions are never finalized directly and have no event",
      );
    default: {
      const unknown: never = txType;
      throw new EventError("UNREACHABLE_TX_TYPE", `Unknown transaction type: ${JSON.stringify(unknown)}`);
    }
  }

  event.set("height", renderHeight(height));
  event.set("log", "");
  return event;
}
