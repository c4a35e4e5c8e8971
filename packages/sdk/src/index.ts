/**
 * @ledgerwire/sdk — Subscriber-side event decoding.
 *
 * Turns subscription responses back into events and transaction
 * outcomes. Transport (websocket, RPC) is up to the caller.
 *
 * @packageDocumentation
 */

// Types
export type { SubscriptionEvent, TxResponseData, SubscriptionErrorCode } from "./types.js";
export { SubscriptionError } from "./types.js";

// Subscription parsing
export { parseSubscriptionEvents, findTxEvent } from "./subscription.js";

// Transaction responses
export { TxResponse } from "./tx-response.js";
