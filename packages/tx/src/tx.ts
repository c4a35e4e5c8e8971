/**
 * @ledgerwire/tx — Transactions.
 *
 * A Tx is a header plus its code and data sections. The header commits
 * to both sections by hash, so the header hash identifies the whole
 * transaction.
 *
 * Lifecycle:
 *
 *   createRawTx → wrapTx (accepted into a block)
 *               → decryptTx (applied in a later block)
 *
 * Protocol transactions skip wrapping entirely.
 *
 * Tx values are immutable: updateHeader returns a new Tx.
 */

import type {
  DecryptionStatus,
  Fee,
  TxHeader,
  TxType,
  WrapperTxType,
} from "@ledgerwire/types";
import { isTxHeader } from "@ledgerwire/types";
import { Hash } from "./hash.js";
import { TxError } from "./errors.js";

/**
 * The empty placeholder header type.
 */
export const RAW_TX_TYPE: TxType = Object.freeze({ type: "raw" });

export class Tx {
  readonly header: TxHeader;
  readonly code: Uint8Array;
  readonly data: Uint8Array;

  constructor(header: TxHeader, code: Uint8Array, data: Uint8Array) {
    if (!isTxHeader(header)) {
      throw new TxError("INVALID_HEADER", "Malformed transaction header");
    }
    if (header.codeHash !== Hash.sha256(code).toString()) {
      throw new TxError("INVALID_HEADER", "Header code hash does not match code section");
    }
    if (header.dataHash !== Hash.sha256(data).toString()) {
      throw new TxError("INVALID_HEADER", "Header data hash does not match data section");
    }
    this.header = header;
    this.code = code;
    this.data = data;
  }

  get txType(): TxType {
    return this.header.txType;
  }

  /**
   * Hash of the header's canonical form.
   *
   * `expiration` is left out of the hashed content when absent.
   */
  headerHash(): Hash {
    const { expiration, ...rest } = this.header;
    return Hash.ofCanonical(expiration === undefined ? rest : { ...rest, expiration });
  }

  /**
   * A copy of this transaction with a different header type.
   */
  updateHeader(txType: TxType): Tx {
    return new Tx({ ...this.header, txType }, this.code, this.data);
  }
}

// =============================================================================
// Lifecycle
// =============================================================================

export interface RawTxInput {
  readonly chainId: string;
  readonly timestamp: string;
  readonly expiration?: string | undefined;
  readonly code: Uint8Array;
  readonly data: Uint8Array;
}

export function createRawTx(input: RawTxInput): Tx {
  const header: TxHeader = {
    chainId: input.chainId,
    timestamp: input.timestamp,
    ...(input.expiration !== undefined ? { expiration: input.expiration } : {}),
    codeHash: Hash.sha256(input.code).toString(),
    dataHash: Hash.sha256(input.data).toString(),
    txType: RAW_TX_TYPE,
  };
  return new Tx(header, input.code, input.data);
}

export interface WrapOptions {
  readonly fee: Fee;
  readonly pk: string;
  readonly epoch: number;
  readonly gasLimit: string;
}

/**
 * Wrap a raw transaction for inclusion in a block.
 *
 * The wrapper header records the raw transaction's header hash so the
 * transaction keeps its identity after decryption.
 *
 * @throws {TxError} INVALID_TX_TYPE if `tx` is not raw
 */
export function wrapTx(tx: Tx, options: WrapOptions): Tx {
  if (tx.txType.type !== "raw") {
    throw new TxError("INVALID_TX_TYPE", `Cannot wrap a ${tx.txType.type} transaction`);
  }
  const wrapper: WrapperTxType = {
    type: "wrapper",
    fee: options.fee,
    pk: options.pk,
    epoch: options.epoch,
    gasLimit: options.gasLimit,
    rawHeaderHash: tx.headerHash().toString(),
  };
  return tx.updateHeader(wrapper);
}

/**
 * Turn a wrapper into the decrypted transaction applied in a later block.
 *
 * @throws {TxError} INVALID_TX_TYPE if `tx` is not a wrapper
 */
export function decryptTx(tx: Tx, status: DecryptionStatus = "decrypted"): Tx {
  if (tx.txType.type !== "wrapper") {
    throw new TxError("INVALID_TX_TYPE", `Cannot decrypt a ${tx.txType.type} transaction`);
  }
  return tx.updateHeader({ type: "decrypted", status });
}

export interface ProtocolTxInput {
  readonly chainId: string;
  readonly timestamp: string;
  readonly pk: string;
  readonly protocolTx: string;
  readonly data: Uint8Array;
}

export function createProtocolTx(input: ProtocolTxInput): Tx {
  const code = new Uint8Array(0);
  const header: TxHeader = {
    chainId: input.chainId,
    timestamp: input.timestamp,
    codeHash: Hash.sha256(code).toString(),
    dataHash: Hash.sha256(input.data).toString(),
    txType: { type: "protocol", pk: input.pk, protocolTx: input.protocolTx },
  };
  return new Tx(header, code, input.data);
}
