/**
 * Typed Error Classes
 *
 * All errors extend Schema.TaggedError for serialization support.
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Crypto Errors
// =============================================================================

export class CryptoError extends Schema.TaggedError<CryptoError>()(
  "CryptoError",
  {
    message: Schema.String,
    operation: Schema.Literal("sign", "hash"),
  }
) {}

export class InvalidPrivateKey extends Schema.TaggedError<InvalidPrivateKey>()(
  "InvalidPrivateKey",
  { message: Schema.String }
) {}

export class InvalidPublicKey extends Schema.TaggedError<InvalidPublicKey>()(
  "InvalidPublicKey",
  { message: Schema.String }
) {}

/** The operator key could not produce a receipt signature */
export class SigningFailure extends Schema.TaggedError<SigningFailure>()(
  "SigningFailure",
  { message: Schema.String }
) {}

// =============================================================================
// Encoding Errors
// =============================================================================

export class DecodingError extends Schema.TaggedError<DecodingError>()(
  "DecodingError",
  { message: Schema.String }
) {}

// =============================================================================
// Connection Errors
// =============================================================================

export class ConnectionError extends Schema.TaggedError<ConnectionError>()(
  "ConnectionError",
  {
    message: Schema.String,
    url: Schema.String,
  }
) {}

export class TimeoutError extends Schema.TaggedError<TimeoutError>()(
  "TimeoutError",
  {
    message: Schema.String,
    durationMs: Schema.Number,
  }
) {}

// =============================================================================
// Lightning Node Errors
// =============================================================================

export class NodeRpcError extends Schema.TaggedError<NodeRpcError>()(
  "NodeRpcError",
  {
    message: Schema.String,
    method: Schema.String,
    code: Schema.optional(Schema.Number),
  }
) {}

// =============================================================================
// Cursor Errors
// =============================================================================

/** Persisted cursor exists but cannot be trusted */
export class CursorCorruption extends Schema.TaggedError<CursorCorruption>()(
  "CursorCorruption",
  {
    message: Schema.String,
    path: Schema.String,
  }
) {}

export class CursorWriteError extends Schema.TaggedError<CursorWriteError>()(
  "CursorWriteError",
  {
    message: Schema.String,
    path: Schema.String,
  }
) {}

/** Attempt to move the cursor backwards */
export class CursorRegression extends Schema.TaggedError<CursorRegression>()(
  "CursorRegression",
  {
    current: Schema.Number,
    attempted: Schema.Number,
  }
) {}
