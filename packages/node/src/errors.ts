/**
 * @ledgerwire/node — Errors.
 */

export type NodeErrorCode = "EVENT_BATCH_OVERFLOW";

export class NodeError extends Error {
  constructor(
    public readonly code: NodeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "NodeError";
  }
}
