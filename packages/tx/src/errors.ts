/**
 * @ledgerwire/tx — Errors.
 */

export type TxErrorCode =
  | "INVALID_HASH"
  | "INVALID_TX_TYPE"
  | "INVALID_HEADER";

export class TxError extends Error {
  constructor(
    public readonly code: TxErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TxError";
  }
}
