/**
 * @ledgerwire/node — Event sinks.
 *
 * A sink receives the wire events of one finalized block, in emission
 * order. Delivery to subscribers is the sink's business.
 */

import type { WireEvent } from "@ledgerwire/types";

export interface EventBatch {
  /** Height of the finalized block, as a decimal string */
  readonly height: string;
  readonly events: readonly WireEvent[];
}

export interface EventSink {
  publish(batch: EventBatch): void;
}

/**
 * Keeps every published batch in memory.
 */
export class InMemoryEventSink implements EventSink {
  private readonly batches: EventBatch[] = [];

  publish(batch: EventBatch): void {
    this.batches.push(batch);
  }

  /** Published batches, oldest first */
  all(): readonly EventBatch[] {
    return [...this.batches];
  }

  /** Every published event, in publication order */
  events(): readonly WireEvent[] {
    return this.batches.flatMap((batch) => batch.events);
  }

  clear(): void {
    this.batches.length = 0;
  }
}
