/**
 * @ledgerwire/tx — Transaction model.
 *
 * Provides:
 * - Hash: SHA-256 digests rendered as uppercase hex
 * - Tx: header + sections, header hashing, header replacement
 * - Lifecycle helpers: raw → wrapper → decrypted, and protocol transactions
 *
 * @packageDocumentation
 */

export { Hash } from "./hash.js";
export { Tx, RAW_TX_TYPE, createRawTx, wrapTx, decryptTx, createProtocolTx } from "./tx.js";
export type { RawTxInput, WrapOptions, ProtocolTxInput } from "./tx.js";
export { TxError } from "./errors.js";
export type { TxErrorCode } from "./errors.js";
