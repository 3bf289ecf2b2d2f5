/**
 * CryptoService
 *
 * Schnorr signing, key handling and hashing for Nostr events.
 * Uses @noble/curves for secp256k1 and @noble/hashes for SHA256.
 */
import { Context, Effect, Layer } from "effect"
import { schnorr } from "@noble/curves/secp256k1"
import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import {
  CryptoError,
  InvalidPrivateKey,
  InvalidPublicKey,
} from "../core/Errors.js"
import type { EventId, PrivateKey, PublicKey, Signature } from "../core/Schema.js"

// =============================================================================
// Service Interface
// =============================================================================

export interface CryptoService {
  readonly _tag: "CryptoService"

  /**
   * Derive the x-only public key from a private key
   */
  getPublicKey(privateKey: PrivateKey): Effect.Effect<PublicKey, InvalidPrivateKey>

  /**
   * Schnorr-sign a 32-byte event id
   */
  sign(eventId: EventId, privateKey: PrivateKey): Effect.Effect<Signature, CryptoError>

  /**
   * Verify a Schnorr signature over an event id.
   * A well-formed but wrong signature yields false, not an error.
   */
  verify(
    signature: Signature,
    eventId: EventId,
    publicKey: PublicKey
  ): Effect.Effect<boolean, InvalidPublicKey>

  /**
   * SHA256 of a UTF-8 string, hex encoded
   */
  hash(message: string): Effect.Effect<EventId, CryptoError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const CryptoService = Context.GenericTag<CryptoService>("CryptoService")

// =============================================================================
// Service Implementation
// =============================================================================

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

const make: CryptoService = {
  _tag: "CryptoService",

  getPublicKey: (privateKey) =>
    Effect.try({
      try: () => bytesToHex(schnorr.getPublicKey(hexToBytes(privateKey))) as PublicKey,
      catch: (error) =>
        new InvalidPrivateKey({
          message: `Failed to derive public key: ${describe(error)}`,
        }),
    }),

  sign: (eventId, privateKey) =>
    Effect.try({
      try: () => bytesToHex(schnorr.sign(hexToBytes(eventId), hexToBytes(privateKey))) as Signature,
      catch: (error) =>
        new CryptoError({
          message: `Failed to sign event id: ${describe(error)}`,
          operation: "sign",
        }),
    }),

  verify: (signature, eventId, publicKey) =>
    Effect.try({
      try: () => schnorr.verify(hexToBytes(signature), hexToBytes(eventId), hexToBytes(publicKey)),
      catch: (error) =>
        new InvalidPublicKey({
          message: `Failed to verify signature for ${publicKey}: ${describe(error)}`,
        }),
    }),

  hash: (message) =>
    Effect.try({
      try: () => bytesToHex(sha256(new TextEncoder().encode(message))) as EventId,
      catch: (error) =>
        new CryptoError({
          message: `Failed to hash message: ${describe(error)}`,
          operation: "hash",
        }),
    }),
}

// =============================================================================
// Service Layer
// =============================================================================

export const CryptoServiceLive = Layer.succeed(CryptoService, make)
