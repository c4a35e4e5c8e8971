/**
 * @ledgerwire/events — Canonical event codec.
 *
 * Encodes an event as RFC 8785 (JCS) canonical JSON, so equal events
 * always encode to the same bytes:
 *
 *   {"attributes":{"hash":"...","height":"7","log":""},"kind":{"kind":"applied"},"level":"tx"}
 *
 * Decoding validates the shape with Zod before rebuilding the event.
 * Attributes are rebuilt from the parsed JSON itself, since Zod's record
 * output leaves out a "__proto__" key.
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { isRecord } from "@ledgerwire/types";
import { AttributeStore } from "./attributes.js";
import { EventCodecError } from "./errors.js";
import { Event } from "./event.js";

// =============================================================================
// Schema
// =============================================================================

export const EventKindSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("accepted") }),
  z.object({ kind: z.literal("applied") }),
  z.object({ kind: z.literal("ibc"), subType: z.string() }),
  z.object({ kind: z.literal("proposal") }),
]);

export const EncodedEventSchema = z.object({
  kind: EventKindSchema,
  level: z.enum(["block", "tx"]),
  attributes: z.record(z.string()),
});

export type EncodedEvent = z.infer<typeof EncodedEventSchema>;

// =============================================================================
// Encode / Decode
// =============================================================================

function attributeEntries(raw: unknown): [string, string][] {
  if (!isRecord(raw) || !isRecord(raw.attributes)) {
    return [];
  }
  return Object.entries(raw.attributes).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string",
  );
}

export function encodeEvent(event: Event): string {
  const encoded: EncodedEvent = {
    kind: event.kind,
    level: event.level,
    attributes: event.attributes.toRecord(),
  };
  return canonicalize(encoded);
}

/**
 * @throws {EventCodecError} INVALID_JSON if `text` is not JSON
 * @throws {EventCodecError} INVALID_SHAPE if it is not an encoded event
 */
export function decodeEvent(text: string): Event {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EventCodecError("INVALID_JSON", `Encoded event is not JSON: ${reason}`);
  }

  const parsed = EncodedEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new EventCodecError("INVALID_SHAPE", `Malformed encoded event: ${issues}`);
  }

  const { kind, level } = parsed.data;
  return new Event(kind, level, new AttributeStore(attributeEntries(raw)));
}
