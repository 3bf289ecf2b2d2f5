/**
 * NIP-19: bech32-encoded keys
 *
 * Only the key entities are handled here; the operator key may be given
 * as an nsec and receipts are logged with the npub that signed them.
 * @see https://github.com/nostr-protocol/nips/blob/master/19.md
 */
import { Effect } from "effect"
import { Schema } from "@effect/schema"
import { bech32 } from "@scure/base"
import { hexToBytes, bytesToHex } from "@noble/hashes/utils"
import { DecodingError, InvalidPrivateKey } from "./Errors.js"
import { PrivateKey, type PublicKey } from "./Schema.js"

const BECH32_MAX_SIZE = 5000

// Type helper for bech32 decode which expects template literal
type Bech32String = `${string}1${string}`

const isBech32String = (value: string): value is Bech32String => value.includes("1")

const decodePrivateKey = Schema.decodeUnknown(PrivateKey)

/**
 * Encode a public key to npub format
 */
export const encodeNpub = (pubkey: PublicKey): string =>
  bech32.encode("npub", bech32.toWords(hexToBytes(pubkey)), BECH32_MAX_SIZE)

/**
 * Encode a private key to nsec format
 */
export const encodeNsec = (privkey: PrivateKey): string =>
  bech32.encode("nsec", bech32.toWords(hexToBytes(privkey)), BECH32_MAX_SIZE)

/**
 * Decode an nsec string to a hex private key
 */
export const decodeNsec = (nsec: string): Effect.Effect<PrivateKey, DecodingError> =>
  Effect.gen(function* () {
    if (!isBech32String(nsec)) {
      return yield* new DecodingError({ message: "Not a bech32 string" })
    }
    const decoded = yield* Effect.try({
      try: () => bech32.decode(nsec, BECH32_MAX_SIZE),
      catch: (error) =>
        new DecodingError({
          message: `Failed to decode nsec: ${error instanceof Error ? error.message : String(error)}`,
        }),
    })
    if (decoded.prefix !== "nsec") {
      return yield* new DecodingError({ message: `Expected nsec prefix, got ${decoded.prefix}` })
    }
    const bytes = bech32.fromWords(decoded.words)
    if (bytes.length !== 32) {
      return yield* new DecodingError({
        message: `Invalid private key length: expected 32 bytes, got ${bytes.length}`,
      })
    }
    return PrivateKey.make(bytesToHex(Uint8Array.from(bytes)))
  })

/**
 * Parse operator key material: an nsec or 64 hex characters
 */
export const parseSecretKey = (input: string): Effect.Effect<PrivateKey, InvalidPrivateKey> => {
  const trimmed = input.trim()
  if (trimmed.startsWith("nsec1")) {
    return decodeNsec(trimmed).pipe(
      Effect.mapError((error) => new InvalidPrivateKey({ message: error.message }))
    )
  }
  return decodePrivateKey(trimmed.toLowerCase()).pipe(
    Effect.mapError(
      () => new InvalidPrivateKey({ message: "Secret key must be an nsec or 64 hex characters" })
    )
  )
}
