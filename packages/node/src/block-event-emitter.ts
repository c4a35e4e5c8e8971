/**
 * @ledgerwire/node — Block event emitter.
 *
 * Collects the events of one block while it is being finalized, then
 * hands them to the sink as a single batch:
 *
 *   emitter.emitTx(wrapper)                 → accepted
 *   emitter.emitTx(decrypted, result)       → applied (+ code, gas_used, ...)
 *   emitter.emitIbc(effect)                 → IBC sub-type
 *   emitter.emitProposal(effect)            → proposal
 *   emitter.flush()                         → sink.publish(...)
 *
 * One emitter per block. Events are published in emission order.
 */

import type { IbcEffect, ProposalEffect, WireEvent } from "@ledgerwire/types";
import type { Tx } from "@ledgerwire/tx";
import {
  eventFromIbc,
  eventFromProposal,
  newTxEvent,
  renderEventKind,
  toWireEvent,
} from "@ledgerwire/events";
import type { Event } from "@ledgerwire/events";
import type { EventSink } from "./sink.js";
import type { Logger } from "./logger.js";
import type { AppConfig } from "./config.js";
import { NodeError } from "./errors.js";

/**
 * Outcome of executing a transaction, recorded on its event.
 */
export interface TxResult {
  /** 0 on success */
  readonly code: number;
  readonly gasUsed: number | bigint;
  readonly info: string;

  /** Addresses of accounts created by the transaction */
  readonly initializedAccounts: readonly string[];
}

export interface BlockEventEmitterOptions {
  readonly height: number | bigint;
  readonly sink: EventSink;
  readonly logger: Logger;

  /** Largest batch flush may publish */
  readonly batchLimit: number;
}

export class BlockEventEmitter {
  private readonly height: number | bigint;
  private readonly sink: EventSink;
  private readonly logger: Logger;
  private readonly batchLimit: number;
  private readonly pending: Event[] = [];

  constructor(options: BlockEventEmitterOptions) {
    this.height = options.height;
    this.sink = options.sink;
    this.logger = options.logger.child({ height: options.height.toString() });
    this.batchLimit = options.batchLimit;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  emitTx(tx: Tx, result?: TxResult): Event {
    const event = newTxEvent(tx, this.height);
    if (result !== undefined) {
      event
        .set("code", result.code.toString())
        .set("gas_used", result.gasUsed.toString())
        .set("info", result.info)
        .set("initialized_accounts", JSON.stringify(result.initializedAccounts));

      if (result.code !== 0) {
        this.logger.warn(
          {
            hash: event.getRequired("hash"),
            kind: renderEventKind(event.kind),
            code: result.code,
            info: result.info,
          },
          "Transaction failed",
        );
      }
    }
    this.pending.push(event);
    return event;
  }

  emitIbc(effect: IbcEffect): Event {
    const event = eventFromIbc(effect);
    this.pending.push(event);
    return event;
  }

  emitProposal(effect: ProposalEffect): Event {
    const event = eventFromProposal(effect);
    this.pending.push(event);
    return event;
  }

  /**
   * Convert pending events and publish them as one batch.
   * An empty block publishes an empty batch.
   *
   * @throws {NodeError} EVENT_BATCH_OVERFLOW if more events are pending
   * than the batch limit; nothing is published and the events stay pending
   *
   * An error thrown by the sink propagates and leaves the events pending,
   * so the flush can be retried.
   */
  flush(): readonly WireEvent[] {
    if (this.pending.length > this.batchLimit) {
      throw new NodeError(
        "EVENT_BATCH_OVERFLOW",
        `Block has ${this.pending.length} events, limit is ${this.batchLimit}`,
      );
    }

    const events = this.pending.map(toWireEvent);
    this.sink.publish({ height: this.height.toString(), events });
    this.pending.length = 0;

    this.logger.debug({ count: events.length }, "Published block events");
    return events;
  }
}

/**
 * Bind sink, logger and configured batch limit once; get an emitter per block.
 */
export function createBlockEmitterFactory(
  config: Pick<AppConfig, "EVENT_BATCH_LIMIT">,
  sink: EventSink,
  logger: Logger,
): (height: number | bigint) => BlockEventEmitter {
  return (height) =>
    new BlockEventEmitter({ height, sink, logger, batchLimit: config.EVENT_BATCH_LIMIT });
}
