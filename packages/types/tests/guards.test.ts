/**
 * Runtime type guard tests for @ledgerwire/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
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
} from "../src/guards.js";

// =============================================================================
// Shared helpers
// =============================================================================

describe("isRecord", () => {
  it("accepts plain objects", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord({ a: 1 })).toBe(true);
  });

  it("rejects null, arrays and primitives", () => {
    expect(isRecord(null)).toBe(false);
    expect(isRecord([])).toBe(false);
    expect(isRecord("x")).toBe(false);
    expect(isRecord(undefined)).toBe(false);
  });
});

describe("isStringMap", () => {
  it("accepts string-valued maps", () => {
    expect(isStringMap({ a: "1", b: "" })).toBe(true);
    expect(isStringMap({})).toBe(true);
  });

  it("rejects non-string values", () => {
    expect(isStringMap({ a: 1 })).toBe(false);
    expect(isStringMap({ a: null })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventLevel", () => {
  it("accepts block and tx", () => {
    expect(isEventLevel("block")).toBe(true);
    expect(isEventLevel("tx")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isEventLevel("Block")).toBe(false);
    expect(isEventLevel("")).toBe(false);
    expect(isEventLevel(1)).toBe(false);
  });
});

describe("isEventKind", () => {
  it("accepts the payload-free kinds", () => {
    for (const kind of ["accepted", "applied", "proposal"]) {
      expect(isEventKind({ kind })).toBe(true);
    }
  });

  it("accepts ibc with a sub-type", () => {
    expect(isEventKind({ kind: "ibc", subType: "send_packet" })).toBe(true);
  });

  it("rejects ibc without a sub-type", () => {
    expect(isEventKind({ kind: "ibc" })).toBe(false);
    expect(isEventKind({ kind: "ibc", subType: 7 })).toBe(false);
  });

  it("rejects unknown kinds", () => {
    expect(isEventKind({ kind: "rejected" })).toBe(false);
    expect(isEventKind("accepted")).toBe(false);
    expect(isEventKind(null)).toBe(false);
  });
});

describe("isIbcEffect / isProposalEffect", () => {
  it("accepts an effect with string attributes", () => {
    const effect = { eventType: "send_packet", attributes: { packet_sequence: "1" } };
    expect(isIbcEffect(effect)).toBe(true);
    expect(isProposalEffect({ eventType: "proposal", attributes: {} })).toBe(true);
  });

  it("rejects non-string attribute values", () => {
    expect(isIbcEffect({ eventType: "send_packet", attributes: { seq: 1 } })).toBe(false);
  });

  it("rejects a missing event type", () => {
    expect(isProposalEffect({ attributes: {} })).toBe(false);
  });
});

describe("isWireEvent", () => {
  it("accepts a well-formed wire event", () => {
    expect(
      isWireEvent({
        type: "applied",
        attributes: [{ key: "hash", value: "AB", index: true }],
      }),
    ).toBe(true);
  });

  it("accepts an event with no attributes", () => {
    expect(isWireEvent({ type: "proposal", attributes: [] })).toBe(true);
  });

  it("rejects attributes without an index flag", () => {
    expect(isWireEventAttribute({ key: "hash", value: "AB" })).toBe(false);
    expect(
      isWireEvent({ type: "applied", attributes: [{ key: "hash", value: "AB" }] }),
    ).toBe(false);
  });

  it("rejects non-array attributes", () => {
    expect(isWireEvent({ type: "applied", attributes: {} })).toBe(false);
  });
});

// =============================================================================
// Transaction guards
// =============================================================================

const wrapper = {
  type: "wrapper",
  fee: { amount: "100", token: "tnam1token" },
  pk: "tpknam1author",
  epoch: 3,
  gasLimit: "50000",
  rawHeaderHash: "00",
};

describe("isTxType", () => {
  it("accepts each variant", () => {
    expect(isTxType({ type: "raw" })).toBe(true);
    expect(isTxType(wrapper)).toBe(true);
    expect(isTxType({ type: "decrypted", status: "decrypted" })).toBe(true);
    expect(isTxType({ type: "decrypted", status: "undecryptable" })).toBe(true);
    expect(isTxType({ type: "protocol", pk: "tpknam1v", protocolTx: "eth_events_vext" })).toBe(true);
  });

  it("rejects a wrapper with a negative epoch", () => {
    expect(isTxType({ ...wrapper, epoch: -1 })).toBe(false);
  });

  it("rejects a wrapper without a fee", () => {
    expect(isTxType({ ...wrapper, fee: undefined })).toBe(false);
  });

  it("rejects an unknown decryption status", () => {
    expect(isTxType({ type: "decrypted", status: "pending" })).toBe(false);
  });

  it("rejects unknown discriminants", () => {
    expect(isTxType({ type: "governance" })).toBe(false);
  });
});

describe("isTxHeader", () => {
  const header = {
    chainId: "local-devnet",
    timestamp: "2025-01-01T00:00:00Z",
    codeHash: "aa",
    dataHash: "bb",
    txType: { type: "raw" },
  };

  it("accepts a header without expiration", () => {
    expect(isTxHeader(header)).toBe(true);
  });

  it("accepts a header with expiration", () => {
    expect(isTxHeader({ ...header, expiration: "2025-01-02T00:00:00Z" })).toBe(true);
  });

  it("rejects a header with an invalid tx type", () => {
    expect(isTxHeader({ ...header, txType: { type: "unknown" } })).toBe(false);
  });
});
