/**
 * @ledgerwire/events — Event kinds.
 */

import type { EventKind } from "@ledgerwire/types";

export const ACCEPTED: EventKind = Object.freeze({ kind: "accepted" });
export const APPLIED: EventKind = Object.freeze({ kind: "applied" });
export const PROPOSAL: EventKind = Object.freeze({ kind: "proposal" });

export function ibcKind(subType: string): EventKind {
  return Object.freeze({ kind: "ibc", subType });
}

/**
 * Canonical rendering, used verbatim as the wire event type.
 * IBC kinds render as their own sub-type, unprefixed.
 */
export function renderEventKind(kind: EventKind): string {
  switch (kind.kind) {
    case "accepted":
      return "accepted";
    case "applied":
      return "applied";
    case "ibc":
      return kind.subType;
    case "proposal":
      return "proposal";
  }
}

export function eventKindsEqual(a: EventKind, b: EventKind): boolean {
  if (a.kind === "ibc" || b.kind === "ibc") {
    return a.kind === "ibc" && b.kind === "ibc" && a.subType === b.subType;
  }
  return a.kind === b.kind;
}
