/**
 * Zap receipt construction (kind 9735)
 *
 * Deterministic given the validated zap, the signing key and the clock.
 * No network or persistence side effects.
 */
import { Clock, Effect, Redacted } from "effect"
import { Schema } from "@effect/schema"
import { EventService } from "../services/EventService.js"
import { SigningKey } from "../services/SigningKey.js"
import { SigningFailure } from "../core/Errors.js"
import { type NostrEvent, Tag, UnixTimestamp, ZAP_RECEIPT_KIND } from "../core/Schema.js"
import type { ValidatedZap } from "./ZapOutcome.js"

const decodeTag = Schema.decodeSync(Tag)

export interface ZapReceiptOptions {
  /** Receipt content; empty when not configured */
  readonly comment?: string
}

/**
 * Receipt tags: addressing copied from the request, then the sender,
 * the invoice and its proof of payment.
 */
export const receiptTags = (zap: ValidatedZap): ReadonlyArray<Tag> => {
  const tags: Tag[] = [zap.recipient]
  if (zap.eventRef) tags.push(zap.eventRef)
  if (zap.addressRef) tags.push(zap.addressRef)

  tags.push(decodeTag(["P", zap.request.pubkey]))
  tags.push(decodeTag(["bolt11", zap.bolt11]))
  // The description is the serialized request exactly as the invoice committed to it
  tags.push(decodeTag(["description", zap.invoice.description]))

  if (zap.invoice.paymentPreimage) {
    tags.push(decodeTag(["preimage", zap.invoice.paymentPreimage]))
  }
  return tags
}

/**
 * Build and sign the zap receipt for a validated zap request
 */
export const buildZapReceipt = (
  zap: ValidatedZap,
  options: ZapReceiptOptions = {}
): Effect.Effect<NostrEvent, SigningFailure, EventService | SigningKey> =>
  Effect.gen(function* () {
    const eventService = yield* EventService
    const signingKey = yield* SigningKey
    const now = yield* Clock.currentTimeMillis

    return yield* eventService
      .createEvent(
        {
          kind: ZAP_RECEIPT_KIND,
          content: options.comment ?? "",
          tags: receiptTags(zap),
          created_at: UnixTimestamp.make(Math.floor(now / 1000)),
        },
        Redacted.value(signingKey.privateKey)
      )
      .pipe(Effect.mapError((error) => new SigningFailure({ message: error.message })))
  })
