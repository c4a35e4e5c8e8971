/**
 * @ledgerwire/events — Subscription attribute parser.
 *
 * Rebuilds an event's attributes from a subscription response:
 *
 *   { ..., "attributes": [ { "key": "...", "value": "..." }, ... ], ... }
 *
 * Rules:
 * - A missing `attributes` field is MISSING_ATTRIBUTES
 * - A record without `key` / `value` is MISSING_KEY / MISSING_VALUE,
 *   with the record's canonical JSON (sorted keys) as context
 * - Anything else that is not string pairs is INVALID_ATTRIBUTES
 * - A repeated key overwrites the earlier value
 */

import { canonicalize } from "json-canonicalize";
import { isRecord } from "@ledgerwire/types";
import { AttributeStore } from "./attributes.js";
import { AttributeError } from "./errors.js";

export class Attributes {
  private constructor(private readonly store: AttributeStore) {}

  /**
   * @throws {AttributeError}
   */
  static fromJson(json: unknown): Attributes {
    if (!isRecord(json) || json.attributes === undefined) {
      throw AttributeError.missingAttributes();
    }
    if (!Array.isArray(json.attributes)) {
      throw AttributeError.invalidAttributes(canonicalize(json.attributes));
    }
    const attrs: readonly unknown[] = json.attributes;

    const store = new AttributeStore();
    for (const attr of attrs) {
      const context = canonicalize(attr);
      if (!isRecord(attr) || attr.key === undefined) {
        throw AttributeError.missingKey(context);
      }
      if (attr.value === undefined) {
        throw AttributeError.missingValue(context);
      }
      if (typeof attr.key !== "string" || typeof attr.value !== "string") {
        throw AttributeError.invalidAttributes(context);
      }
      store.set(attr.key, attr.value);
    }
    return new Attributes(store);
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): string | undefined {
    return this.store.get(key);
  }

  /**
   * Remove a value and hand it to the caller. A second take of the
   * same key returns undefined.
   */
  take(key: string): string | undefined {
    return this.store.take(key);
  }

  keys(): string[] {
    return this.store.keys();
  }

  /** A copy of the remaining attributes */
  toStore(): AttributeStore {
    return this.store.clone();
  }
}
