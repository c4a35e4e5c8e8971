/**
 * @ledgerwire/sdk — Transaction responses.
 *
 * Reads a transaction's outcome out of its event. Every attribute is
 * taken exactly once, so the attributes left behind are the ones this
 * reader does not know about.
 */

import type { Attributes } from "@ledgerwire/events";
import type { SubscriptionEvent, TxResponseData } from "./types.js";
import { SubscriptionError } from "./types.js";
import { findTxEvent, parseSubscriptionEvents } from "./subscription.js";

function takeRequired(attributes: Attributes, key: string): string {
  const value = attributes.take(key);
  if (value === undefined) {
    throw new SubscriptionError("MISSING_FIELD", `Transaction event missing \`${key}\``);
  }
  return value;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function parseAccounts(raw: string | undefined): readonly string[] {
  if (raw === undefined || raw === "") {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new SubscriptionError("INVALID_FIELD", "`initialized_accounts` is not JSON", err);
  }
  if (!isStringArray(parsed)) {
    throw new SubscriptionError(
      "INVALID_FIELD",
      "`initialized_accounts` is not an array of addresses",
    );
  }
  return parsed;
}

export class TxResponse implements TxResponseData {
  readonly hash: string;
  readonly height: string;
  readonly log: string;
  readonly code?: string | undefined;
  readonly gasUsed?: string | undefined;
  readonly info?: string | undefined;
  readonly initializedAccounts: readonly string[];

  private constructor(data: TxResponseData) {
    this.hash = data.hash;
    this.height = data.height;
    this.log = data.log;
    this.code = data.code;
    this.gasUsed = data.gasUsed;
    this.info = data.info;
    this.initializedAccounts = data.initializedAccounts;
  }

  /**
   * Consume the transaction attributes of one event.
   *
   * @throws {SubscriptionError} MISSING_FIELD, INVALID_FIELD
   */
  static fromAttributes(attributes: Attributes): TxResponse {
    return new TxResponse({
      hash: takeRequired(attributes, "hash"),
      height: takeRequired(attributes, "height"),
      log: takeRequired(attributes, "log"),
      code: attributes.take("code"),
      gasUsed: attributes.take("gas_used"),
      info: attributes.take("info"),
      initializedAccounts: parseAccounts(attributes.take("initialized_accounts")),
    });
  }

  /**
   * Find the event for `hash` in a subscription response and read it.
   * Returns undefined when the response has no such event.
   */
  static fromSubscription(
    json: unknown,
    type: "accepted" | "applied",
    hash: string,
  ): TxResponse | undefined {
    const event: SubscriptionEvent | undefined = findTxEvent(
      parseSubscriptionEvents(json),
      type,
      hash,
    );
    return event === undefined ? undefined : TxResponse.fromAttributes(event.attributes);
  }

  /** Applied and exited with code 0 */
  get succeeded(): boolean {
    return this.code === "0";
  }
}
