/**
 * @ledgerwire/events — Errors.
 *
 * Two failure domains:
 * - EventError: contract violations while building or reading an event.
 *   These indicate a bug upstream and are not meant to be recovered from.
 * - AttributeError: malformed subscription data handed to the parser.
 *   Callers decide whether to retry, skip, or surface it.
 */

// =============================================================================
// Contract violations
// =============================================================================

export type EventErrorCode =
  | "UNREACHABLE_TX_TYPE"
  | "MISSING_ATTRIBUTE_KEY"
  | "INVALID_HEIGHT";

export class EventError extends Error {
  constructor(
    public readonly code: EventErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "EventError";
  }
}

// =============================================================================
// Parse failures
// =============================================================================

export type AttributeErrorCode =
  | "MISSING_ATTRIBUTES"
  | "MISSING_KEY"
  | "MISSING_VALUE"
  | "INVALID_ATTRIBUTES";

export class AttributeError extends Error {
  private constructor(
    public readonly code: AttributeErrorCode,
    message: string,
    /** Serialized JSON fragment that failed to parse, if any */
    public readonly context?: string,
  ) {
    super(message);
    this.name = "AttributeError";
  }

  static missingAttributes(): AttributeError {
    return new AttributeError("MISSING_ATTRIBUTES", "Json missing `attributes` field");
  }

  static missingKey(context: string): AttributeError {
    return new AttributeError("MISSING_KEY", `Attributes missing key: ${context}`, context);
  }

  static missingValue(context: string): AttributeError {
    return new AttributeError("MISSING_VALUE", `Attributes missing value: ${context}`, context);
  }

  static invalidAttributes(context: string): AttributeError {
    return new AttributeError(
      "INVALID_ATTRIBUTES",
      `Attributes are not string key/value pairs: ${context}`,
      context,
    );
  }
}

// =============================================================================
// Codec
// =============================================================================

export type EventCodecErrorCode = "INVALID_JSON" | "INVALID_SHAPE";

export class EventCodecError extends Error {
  constructor(
    public readonly code: EventCodecErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "EventCodecError";
  }
}
