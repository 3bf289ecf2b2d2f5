/**
 * SigningKey
 *
 * The operator key that signs zap receipts. Loaded once at startup and
 * shared read-only for the life of the process.
 */
import { Context, Effect, Layer, Redacted } from "effect"
import { CryptoService } from "./CryptoService.js"
import { parseSecretKey } from "../core/Nip19.js"
import type { InvalidPrivateKey } from "../core/Errors.js"
import type { PrivateKey, PublicKey } from "../core/Schema.js"

export interface SigningKey {
  readonly _tag: "SigningKey"
  readonly privateKey: Redacted.Redacted<PrivateKey>
  readonly publicKey: PublicKey
}

export const SigningKey = Context.GenericTag<SigningKey>("SigningKey")

/**
 * Build the signing key from configured key material (hex or nsec)
 */
export const makeSigningKey = (
  secret: Redacted.Redacted<string>
): Layer.Layer<SigningKey, InvalidPrivateKey, CryptoService> =>
  Layer.effect(
    SigningKey,
    Effect.gen(function* () {
      const crypto = yield* CryptoService
      const privateKey = yield* parseSecretKey(Redacted.value(secret))
      const publicKey = yield* crypto.getPublicKey(privateKey)
      return {
        _tag: "SigningKey" as const,
        privateKey: Redacted.make(privateKey),
        publicKey,
      }
    })
  )
