/**
 * @ledgerwire/events — Attribute store.
 *
 * The payload container of an event: attribute name → string value.
 *
 * Access contract:
 * - get / containsKey are total and the only safe way to probe presence
 * - getRequired throws on an absent key (a caller bug, not bad input)
 * - set inserts an empty value first when the key is absent, then overwrites
 *
 * An absent key and a key holding "" are different states.
 */

import { EventError } from "./errors.js";

export class AttributeStore {
  private readonly map: Map<string, string>;

  constructor(entries?: Iterable<readonly [string, string]>) {
    this.map = new Map(entries);
  }

  static fromRecord(record: Readonly<Record<string, string>>): AttributeStore {
    return new AttributeStore(Object.entries(record));
  }

  get size(): number {
    return this.map.size;
  }

  get(key: string): string | undefined {
    return this.map.get(key);
  }

  containsKey(key: string): boolean {
    return this.map.has(key);
  }

  /**
   * Read a key whose presence is guaranteed by construction.
   *
   * @throws {EventError} MISSING_ATTRIBUTE_KEY if the key is absent
   */
  getRequired(key: string): string {
    const value = this.map.get(key);
    if (value === undefined) {
      throw new EventError("MISSING_ATTRIBUTE_KEY", `Event has no attribute "${key}"`);
    }
    return value;
  }

  /**
   * Insert-or-get: returns the current value, inserting "" when absent.
   */
  entry(key: string): string {
    const existing = this.map.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.map.set(key, "");
    return "";
  }

  set(key: string, value: string): this {
    this.entry(key);
    this.map.set(key, value);
    return this;
  }

  /**
   * Remove a key and return its value.
   */
  take(key: string): string | undefined {
    const value = this.map.get(key);
    this.map.delete(key);
    return value;
  }

  keys(): string[] {
    return [...this.map.keys()];
  }

  /** Entries ordered by key */
  sortedEntries(): [string, string][] {
    return [...this.map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.sortedEntries());
  }

  clone(): AttributeStore {
    return new AttributeStore(this.map);
  }

  equals(other: AttributeStore): boolean {
    if (this.map.size !== other.map.size) return false;
    for (const [key, value] of this.map) {
      if (other.map.get(key) !== value) return false;
    }
    return true;
  }
}
