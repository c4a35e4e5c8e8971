/**
 * @ledgerwire/tx — SHA-256 hash values.
 *
 * Hashes are rendered as uppercase hex, the form the consensus engine
 * uses for transaction hashes in events and RPC responses.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { TxError } from "./errors.js";

const HASH_HEX_PATTERN = /^[0-9a-fA-F]{64}$/;

export class Hash {
  private constructor(private readonly hex: string) {}

  /** SHA-256 of raw bytes or a UTF-8 string */
  static sha256(content: Uint8Array | string): Hash {
    return new Hash(createHash("sha256").update(content).digest("hex").toUpperCase());
  }

  /** SHA-256 of the RFC 8785 canonical JSON of `value` */
  static ofCanonical(value: unknown): Hash {
    return Hash.sha256(canonicalize(value));
  }

  /**
   * Parse a 64-char hex string (either case).
   *
   * @throws {TxError} INVALID_HASH
   */
  static fromHex(hex: string): Hash {
    if (!HASH_HEX_PATTERN.test(hex)) {
      throw new TxError("INVALID_HASH", `Not a 32-byte hex hash: "${hex}"`);
    }
    return new Hash(hex.toUpperCase());
  }

  equals(other: Hash): boolean {
    return this.hex === other.hex;
  }

  toString(): string {
    return this.hex;
  }

  toJSON(): string {
    return this.hex;
  }
}
