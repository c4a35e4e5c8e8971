/**
 * Tests for Event and newTxEvent.
 *
 * Verifies:
 * - Each transaction type maps to the right kind, level and hash
 * - Decrypted transactions keep the hash they were submitted with
 * - height / log are always present
 * - Raw transactions and bad heights fail fast
 */

import { describe, it, expect } from "vitest";
import {
  RAW_TX_TYPE,
  createProtocolTx,
  createRawTx,
  decryptTx,
  wrapTx,
} from "@ledgerwire/tx";
import type { Tx } from "@ledgerwire/tx";
import { Event, newTxEvent } from "../src/event.js";
import { EventError } from "../src/errors.js";
import { ACCEPTED, APPLIED, PROPOSAL, ibcKind } from "../src/kind.js";
import { AttributeStore } from "../src/attributes.js";

// =============================================================================
// Helpers
// =============================================================================

const encoder = new TextEncoder();

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("expected function to throw");
}

function makeRawTx(data = "transfer 10 tnam1alice tnam1bob"): Tx {
  return createRawTx({
    chainId: "local-devnet",
    timestamp: "2025-01-01T00:00:00Z",
    code: encoder.encode("tx_transfer.wasm"),
    data: encoder.encode(data),
  });
}

function makeWrapper(raw: Tx = makeRawTx()): Tx {
  return wrapTx(raw, {
    fee: { amount: "100", token: "tnam1token" },
    pk: "tpknam1author",
    epoch: 2,
    gasLimit: "50000",
  });
}

function makeProtocolTx(): Tx {
  return createProtocolTx({
    chainId: "local-devnet",
    timestamp: "2025-01-01T00:00:00Z",
    pk: "tpknam1validator",
    protocolTx: "eth_events_vext",
    data: encoder.encode("vext"),
  });
}

// =============================================================================
// Event
// =============================================================================

describe("Event", () => {
  it("exposes the attribute access contract", () => {
    const event = new Event(PROPOSAL, "block");
    expect(event.containsKey("proposal_id")).toBe(false);
    expect(event.get("proposal_id")).toBeUndefined();

    event.set("proposal_id", "4");

    expect(event.containsKey("proposal_id")).toBe(true);
    expect(event.get("proposal_id")).toBe("4");
    expect(event.getRequired("proposal_id")).toBe("4");
  });

  it("getRequired throws on a missing key", () => {
    const event = new Event(APPLIED, "tx");
    expect(() => event.getRequired("code")).toThrow('Event has no attribute "code"');
  });

  it("compares kind, level and attributes", () => {
    const a = new Event(ibcKind("send_packet"), "tx", new AttributeStore([["x", "1"]]));
    const b = new Event(ibcKind("send_packet"), "tx", new AttributeStore([["x", "1"]]));
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new Event(ibcKind("recv_packet"), "tx", new AttributeStore([["x", "1"]])))).toBe(false);
    expect(a.equals(new Event(ibcKind("send_packet"), "block", new AttributeStore([["x", "1"]])))).toBe(false);
    expect(a.equals(new Event(ibcKind("send_packet"), "tx"))).toBe(false);
    expect(new Event(ACCEPTED, "tx").equals(new Event(APPLIED, "tx"))).toBe(false);
  });
});

// =============================================================================
// newTxEvent
// =============================================================================

describe("newTxEvent", () => {
  it("builds an accepted event for a wrapper, hashed by its header", () => {
    const wrapper = makeWrapper();
    const event = newTxEvent(wrapper, 10);

    expect(event.kind).toEqual({ kind: "accepted" });
    expect(event.level).toBe("tx");
    expect(event.getRequired("hash")).toBe(wrapper.headerHash().toString());
  });

  it("builds an applied event for a decrypted transaction", () => {
    const event = newTxEvent(decryptTx(makeWrapper()), 11);
    expect(event.kind).toEqual({ kind: "applied" });
    expect(event.level).toBe("tx");
  });

  it("builds an applied event for a protocol transaction, hashed by its header", () => {
    const tx = makeProtocolTx();
    const event = newTxEvent(tx, 12);

    expect(event.kind).toEqual({ kind: "applied" });
    expect(event.level).toBe("tx");
    expect(event.getRequired("hash")).toBe(tx.headerHash().toString());
  });

  it("always sets height and an empty log", () => {
    for (const tx of [makeWrapper(), decryptTx(makeWrapper()), makeProtocolTx()]) {
      const event = newTxEvent(tx, 42);
      expect(event.getRequired("height")).toBe("42");
      expect(event.getRequired("log")).toBe("");
      expect(event.getRequired("hash")).toMatch(/^[0-9A-F]{64}$/);
      expect(event.attributes.size).toBe(3);
    }
  });

  it("renders bigint heights in decimal", () => {
    const event = newTxEvent(makeWrapper(), 9007199254740993n);
    expect(event.get("height")).toBe("9007199254740993");
  });

  it("accepts height zero", () => {
    expect(newTxEvent(makeWrapper(), 0).get("height")).toBe("0");
  });

  it("rejects negative heights", () => {
    expect(() => newTxEvent(makeWrapper(), -1)).toThrow(
      "Block height must be non-negative, got -1",
    );
    expect(() => newTxEvent(makeWrapper(), -1n)).toThrow(EventError);
  });

  it("rejects fractional heights", () => {
    const err = thrownBy(() => newTxEvent(makeWrapper(), 1.5));
    expect(err).toMatchObject({ code: "INVALID_HEIGHT" });
  });

  it("fails fast on a raw transaction", () => {
    const err = thrownBy(() => newTxEvent(makeRawTx(), 1));
    expect(err).toBeInstanceOf(EventError);
    expect(err).toMatchObject({ code: "UNREACHABLE_TX_TYPE" });
  });
});

// =============================================================================
// Hash continuity
// =============================================================================

describe("hash continuity across decryption", () => {
  it("the applied event carries the hash the transaction was submitted with", () => {
    const raw = makeRawTx();
    const submittedHash = raw.headerHash().toString();

    const wrapper = makeWrapper(raw);
    const wrapperType = wrapper.txType;
    if (wrapperType.type !== "wrapper") {
      throw new Error("expected a wrapper transaction");
    }
    expect(wrapperType.rawHeaderHash).toBe(submittedHash);

    const applied = newTxEvent(decryptTx(wrapper), 20);
    expect(applied.getRequired("hash")).toBe(submittedHash);
  });

  it("does not use the decrypted header's own hash", () => {
    const decrypted = decryptTx(makeWrapper());
    const applied = newTxEvent(decrypted, 20);
    expect(applied.getRequired("hash")).not.toBe(decrypted.headerHash().toString());
    expect(applied.getRequired("hash")).toBe(
      decrypted.updateHeader(RAW_TX_TYPE).headerHash().toString(),
    );
  });

  it("does not mutate the decrypted transaction", () => {
    const decrypted = decryptTx(makeWrapper());
    newTxEvent(decrypted, 20);
    expect(decrypted.txType).toEqual({ type: "decrypted", status: "decrypted" });
  });

  it("undecryptable transactions keep the submitted hash too", () => {
    const raw = makeRawTx();
    const applied = newTxEvent(decryptTx(makeWrapper(raw), "undecryptable"), 21);
    expect(applied.getRequired("hash")).toBe(raw.headerHash().toString());
  });

  it("accepted and applied events of one transaction carry different hashes", () => {
    const wrapper = makeWrapper();
    const accepted = newTxEvent(wrapper, 30);
    const applied = newTxEvent(decryptTx(wrapper), 31);
    expect(accepted.getRequired("hash")).not.toBe(applied.getRequired("hash"));
  });
});
