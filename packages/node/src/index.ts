/**
 * @ledgerwire/node — Node-side event emission.
 *
 * Provides:
 * - Configuration loading (Zod over env vars)
 * - pino logger construction
 * - BlockEventEmitter: per-block event collection and publication
 * - EventSink interface and an in-memory sink
 *
 * @packageDocumentation
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { BlockEventEmitter, createBlockEmitterFactory } from "./block-event-emitter.js";
export type { TxResult, BlockEventEmitterOptions } from "./block-event-emitter.js";
export { InMemoryEventSink } from "./sink.js";
export type { EventSink, EventBatch } from "./sink.js";
export { NodeError } from "./errors.js";
export type { NodeErrorCode } from "./errors.js";
