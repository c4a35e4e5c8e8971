/**
 * Transaction Types
 *
 * Decoded transaction headers as seen by the finalization pipeline.
 * A transaction is submitted raw, wrapped (and encrypted) for inclusion,
 * then decrypted and applied in a later block. Protocol transactions are
 * injected by validators and never wrapped.
 */

/**
 * Fee paid by a wrapper transaction.
 */
export interface Fee {
  /** Amount in the token's smallest unit, as a decimal string */
  readonly amount: string;

  /** Token address */
  readonly token: string;
}

/**
 * A transaction as signed by its author, before wrapping.
 */
export interface RawTxType {
  readonly type: "raw";
}

/**
 * An outer transaction carrying an encrypted inner transaction.
 */
export interface WrapperTxType {
  readonly type: "wrapper";
  readonly fee: Fee;

  /** Public key of the fee payer */
  readonly pk: string;
  readonly epoch: number;
  readonly gasLimit: string;

  /** Header hash of the inner transaction as it was submitted (raw) */
  readonly rawHeaderHash: string;
}

/**
 * Decryption outcome of a wrapped transaction.
 */
export type DecryptionStatus = "decrypted" | "undecryptable";

/**
 * A previously wrapped transaction after decryption, ready to apply.
 */
export interface DecryptedTxType {
  readonly type: "decrypted";
  readonly status: DecryptionStatus;
}

/**
 * A transaction originated by the protocol itself (e.g., validator messages).
 */
export interface ProtocolTxType {
  readonly type: "protocol";

  /** Public key of the validator that originated the transaction */
  readonly pk: string;

  /** Protocol message kind (e.g., "eth_events_vext") */
  readonly protocolTx: string;
}

/**
 * Type discriminant carried by every transaction header.
 */
export type TxType = RawTxType | WrapperTxType | DecryptedTxType | ProtocolTxType;

/**
 * Header of a transaction. Its hash identifies the transaction.
 */
export interface TxHeader {
  readonly chainId: string;

  /** ISO 8601 timestamp set by the author */
  readonly timestamp: string;

  /** ISO 8601 expiration, if any */
  readonly expiration?: string | undefined;

  /** Commitment to the transaction code section */
  readonly codeHash: string;

  /** Commitment to the transaction data section */
  readonly dataHash: string;

  readonly txType: TxType;
}
