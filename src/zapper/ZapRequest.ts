/**
 * Zap request extraction and validation (NIP-57 appendix E)
 *
 * The LNURL server that issued the invoice put the sender's signed kind 9734
 * event in the invoice description. Here it is recovered and checked
 * against the invoice that was actually paid.
 *
 * @see https://github.com/nostr-protocol/nips/blob/master/57.md
 */
import { Effect, Either } from "effect"
import { Schema } from "@effect/schema"
import { base64 } from "@scure/base"
import { EventService } from "../services/EventService.js"
import { NostrEvent, ZAP_REQUEST_KIND, getTags } from "../core/Schema.js"
import type { PaidInvoice } from "../lightning/Invoice.js"
import {
  ZapOutcome,
  type NotAZap,
  type ValidatedZap,
  type ZapRejection,
} from "./ZapOutcome.js"

const decodeEvent = Schema.decodeUnknownEither(NostrEvent)

const isValidHex64 = (s: string | undefined): boolean =>
  s !== undefined && /^[a-f0-9]{64}$/.test(s)

// =============================================================================
// Extraction
// =============================================================================

/**
 * Encodings an invoice-issuing server may have applied to the description.
 * The raw text always comes first.
 */
const candidateTexts = (description: string): ReadonlyArray<string> => {
  const candidates = [description]

  if (description.includes("%")) {
    const decoded = Either.try(() => decodeURIComponent(description))
    if (Either.isRight(decoded)) candidates.push(decoded.right)
  }

  if (/^[A-Za-z0-9+/]+={0,2}$/.test(description) && description.length % 4 === 0) {
    const decoded = Either.try(() => new TextDecoder("utf-8", { fatal: true }).decode(base64.decode(description)))
    if (Either.isRight(decoded)) candidates.push(decoded.right)
  }

  return candidates
}

const parseJsonObject = (text: string): object | undefined => {
  const parsed = Either.try((): unknown => JSON.parse(text))
  if (Either.isLeft(parsed)) return undefined
  const value = parsed.right
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : undefined
}

/**
 * Recover the serialized zap request from an invoice description.
 *
 * Plain-text descriptions and structured data that is not a signed event
 * are both "not a zap"; neither is an error.
 */
export const extractZapRequest = (description: string): Either.Either<NostrEvent, NotAZap> => {
  const trimmed = description.trim()
  if (trimmed.length === 0) {
    return Either.left(ZapOutcome.NotAZap({ reason: "empty", detail: "Description is empty" }))
  }

  for (const text of candidateTexts(trimmed)) {
    const json = parseJsonObject(text)
    if (json === undefined) continue

    return decodeEvent(json).pipe(
      Either.mapLeft((error) =>
        ZapOutcome.NotAZap({ reason: "malformed", detail: error.message })
      )
    )
  }

  return Either.left(
    ZapOutcome.NotAZap({ reason: "not-json", detail: "Description is not a serialized event" })
  )
}

// =============================================================================
// Validation
// =============================================================================

const invalid = (reason: string, requestId?: string): ZapRejection =>
  ZapOutcome.InvalidRequest({ reason, requestId })

/**
 * Check an extracted request against protocol rules and the paid invoice.
 *
 * In order: signature, declared amount, then addressing. The first
 * failure wins.
 */
export const validateZapRequest = (
  request: NostrEvent,
  invoice: PaidInvoice
): Effect.Effect<ValidatedZap, ZapRejection, EventService> =>
  Effect.gen(function* () {
    const eventService = yield* EventService

    const verified = yield* eventService.verifyEvent(request).pipe(
      Effect.catchAll(() => Effect.succeed(false))
    )
    if (!verified) {
      return yield* Effect.fail(invalid("Invalid signature on zap request.", request.id))
    }

    const amountTag = getTags(request, "amount")[0]
    if (amountTag) {
      const declared = amountTag[1]
      if (declared === undefined || !/^\d+$/.test(declared)) {
        return yield* Effect.fail(invalid("Zap request 'amount' tag is not an integer.", request.id))
      }
      const declaredMsat = Number(declared)
      if (!Number.isSafeInteger(declaredMsat)) {
        return yield* Effect.fail(invalid("Zap request 'amount' tag is out of range.", request.id))
      }
      if (declaredMsat !== invoice.amountMsat) {
        return yield* Effect.fail(
          ZapOutcome.AmountMismatch({
            requestId: request.id,
            declaredMsat,
            paidMsat: invoice.amountMsat,
          })
        )
      }
    }

    if (request.kind !== ZAP_REQUEST_KIND) {
      return yield* Effect.fail(invalid(`Zap request has kind ${request.kind}, expected 9734.`, request.id))
    }

    const pTags = getTags(request, "p")
    const recipient = pTags[0]
    if (pTags.length !== 1 || recipient === undefined) {
      return yield* Effect.fail(invalid("Zap request must have exactly one 'p' tag.", request.id))
    }
    if (!isValidHex64(recipient[1])) {
      return yield* Effect.fail(invalid("Zap request 'p' tag is not valid hex.", request.id))
    }

    const eTags = getTags(request, "e")
    if (eTags.length > 1) {
      return yield* Effect.fail(invalid("Zap request has more than one 'e' tag.", request.id))
    }
    const eventRef = eTags[0]
    if (eventRef && !isValidHex64(eventRef[1])) {
      return yield* Effect.fail(invalid("Zap request 'e' tag is not valid hex.", request.id))
    }

    const aTags = getTags(request, "a")
    if (aTags.length > 1) {
      return yield* Effect.fail(invalid("Zap request has more than one 'a' tag.", request.id))
    }

    if (!invoice.bolt11) {
      return yield* Effect.fail(invalid("Invoice has no bolt11 string.", request.id))
    }

    const relays = getTags(request, "relays").flatMap((tag) => tag.slice(1))

    return {
      request,
      invoice,
      bolt11: invoice.bolt11,
      recipient,
      eventRef,
      addressRef: aTags[0],
      relays,
    }
  })
