/**
 * @ledgerwire/sdk — SDK types.
 *
 * Types specific to the subscriber side.
 * Domain types are imported from @ledgerwire/types.
 */

import type { Attributes } from "@ledgerwire/events";

// =============================================================================
// Subscription Events
// =============================================================================

/**
 * One event reconstructed from a subscription response.
 */
export interface SubscriptionEvent {
  /** Wire event type (e.g., "applied", "send_packet") */
  readonly type: string;
  readonly attributes: Attributes;
}

// =============================================================================
// Transaction Responses
// =============================================================================

/**
 * Outcome of a transaction, read back from its event.
 */
export interface TxResponseData {
  readonly hash: string;
  readonly height: string;
  readonly log: string;

  /** Present once the transaction has been applied */
  readonly code?: string | undefined;
  readonly gasUsed?: string | undefined;
  readonly info?: string | undefined;

  readonly initializedAccounts: readonly string[];
}

// =============================================================================
// Error Types
// =============================================================================

export type SubscriptionErrorCode =
  | "MISSING_EVENTS"
  | "INVALID_EVENT"
  | "MISSING_FIELD"
  | "INVALID_FIELD";

/**
 * Structured error for malformed subscription responses.
 */
export class SubscriptionError extends Error {
  readonly code: SubscriptionErrorCode;

  /** `cause` carries the underlying attribute parse failure, if any */
  constructor(code: SubscriptionErrorCode, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "SubscriptionError";
    this.code = code;
  }
}
