/**
 * EventService
 *
 * Creates, signs and verifies Nostr events per NIP-01.
 */
import { Context, Effect, Layer } from "effect"
import { CryptoService } from "./CryptoService.js"
import { CryptoError, InvalidPrivateKey, InvalidPublicKey } from "../core/Errors.js"
import type {
  NostrEvent,
  EventKind,
  Tag,
  PrivateKey,
  PublicKey,
  EventId,
  UnixTimestamp,
} from "../core/Schema.js"

// =============================================================================
// Event Parameters
// =============================================================================

export interface CreateEventParams {
  readonly kind: EventKind
  readonly content: string
  readonly tags: readonly Tag[]
  readonly created_at: UnixTimestamp
}

// =============================================================================
// Service Interface
// =============================================================================

export interface EventService {
  readonly _tag: "EventService"

  /**
   * Create and sign a Nostr event
   */
  createEvent(
    params: CreateEventParams,
    privateKey: PrivateKey
  ): Effect.Effect<NostrEvent, CryptoError | InvalidPrivateKey>

  /**
   * ID = sha256(serialized([0, pubkey, created_at, kind, tags, content]))
   */
  computeEventId(
    pubkey: PublicKey,
    created_at: UnixTimestamp,
    kind: EventKind,
    tags: readonly Tag[],
    content: string
  ): Effect.Effect<EventId, CryptoError>

  /**
   * Check that the id matches the content and the signature matches the id
   */
  verifyEvent(
    event: NostrEvent
  ): Effect.Effect<boolean, CryptoError | InvalidPublicKey>
}

// =============================================================================
// Service Tag
// =============================================================================

export const EventService = Context.GenericTag<EventService>("EventService")

/**
 * Canonical NIP-01 serialization used for the event id
 */
export const serializeForId = (
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: readonly Tag[],
  content: string
): string => JSON.stringify([0, pubkey, created_at, kind, tags, content])

// =============================================================================
// Service Implementation
// =============================================================================

const make = Effect.gen(function* () {
  const crypto = yield* CryptoService

  const computeEventId: EventService["computeEventId"] = (
    pubkey,
    created_at,
    kind,
    tags,
    content
  ) => crypto.hash(serializeForId(pubkey, created_at, kind, tags, content))

  const createEvent: EventService["createEvent"] = (params, privateKey) =>
    Effect.gen(function* () {
      const pubkey = yield* crypto.getPublicKey(privateKey)
      const id = yield* computeEventId(
        pubkey,
        params.created_at,
        params.kind,
        params.tags,
        params.content
      )
      const sig = yield* crypto.sign(id, privateKey)

      return {
        id,
        pubkey,
        created_at: params.created_at,
        kind: params.kind,
        tags: params.tags,
        content: params.content,
        sig,
      }
    })

  const verifyEvent: EventService["verifyEvent"] = (event) =>
    Effect.gen(function* () {
      const computedId = yield* computeEventId(
        event.pubkey,
        event.created_at,
        event.kind,
        event.tags,
        event.content
      )

      if (computedId !== event.id) {
        return false
      }

      return yield* crypto.verify(event.sig, event.id, event.pubkey)
    })

  return {
    _tag: "EventService" as const,
    createEvent,
    computeEventId,
    verifyEvent,
  }
})

// =============================================================================
// Service Layer
// =============================================================================

export const EventServiceLive = Layer.effect(EventService, make)
