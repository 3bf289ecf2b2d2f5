/**
 * NIP-01 Core Schemas
 *
 * Event and relay message types used by the zap receipt pipeline.
 * @see https://github.com/nostr-protocol/nips/blob/master/01.md
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Branded Primitive Types
// =============================================================================

/** 64-character lowercase hex string (sha256 hash) */
export const EventId = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("EventId")
)
export type EventId = typeof EventId.Type

/** 64-character lowercase hex string (x-only secp256k1 public key) */
export const PublicKey = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("PublicKey")
)
export type PublicKey = typeof PublicKey.Type

/** 64-character lowercase hex string (secp256k1 private key) */
export const PrivateKey = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("PrivateKey")
)
export type PrivateKey = typeof PrivateKey.Type

/** 128-character lowercase hex string (schnorr signature) */
export const Signature = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{128}$/),
  Schema.brand("Signature")
)
export type Signature = typeof Signature.Type

/** Unix timestamp in seconds (can be 0) */
export const UnixTimestamp = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.brand("UnixTimestamp")
)
export type UnixTimestamp = typeof UnixTimestamp.Type

/** Event kind (0-65535) */
export const EventKind = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.lessThanOrEqualTo(65535),
  Schema.brand("EventKind")
)
export type EventKind = typeof EventKind.Type

/** Tag array (at least one element) */
export const Tag = Schema.Array(Schema.String).pipe(
  Schema.minItems(1),
  Schema.brand("Tag")
)
export type Tag = typeof Tag.Type

// =============================================================================
// Event Types
// =============================================================================

/** Signed Nostr event (NIP-01) */
export const NostrEvent = Schema.Struct({
  id: EventId,
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
  sig: Signature,
})
export type NostrEvent = typeof NostrEvent.Type

// =============================================================================
// Relay Messages
// =============================================================================

/** EVENT message: publish an event */
export const ClientEventMessage = Schema.Tuple(
  Schema.Literal("EVENT"),
  NostrEvent
)
export type ClientEventMessage = typeof ClientEventMessage.Type

/** OK message: event accepted/rejected */
export const RelayOkMessage = Schema.Tuple(
  Schema.Literal("OK"),
  EventId,
  Schema.Boolean,
  Schema.String // reason
)
export type RelayOkMessage = typeof RelayOkMessage.Type

/** NOTICE message: human-readable message */
export const RelayNoticeMessage = Schema.Tuple(
  Schema.Literal("NOTICE"),
  Schema.String
)
export type RelayNoticeMessage = typeof RelayNoticeMessage.Type

// =============================================================================
// NIP-57 Lightning Zaps Event Kinds
// =============================================================================

/** Zap request - sent to LNURL endpoint, embedded in the invoice (NIP-57) */
export const ZAP_REQUEST_KIND = 9734 as EventKind

/** Zap receipt - published after payment (NIP-57) */
export const ZAP_RECEIPT_KIND = 9735 as EventKind

// =============================================================================
// Tag Helpers
// =============================================================================

/**
 * All tags with the given name
 */
export const getTags = (event: NostrEvent, name: string): ReadonlyArray<Tag> =>
  event.tags.filter((tag) => tag[0] === name)
