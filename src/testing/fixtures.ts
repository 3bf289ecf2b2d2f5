/**
 * Shared test fixtures: service layers, keys, zap requests and invoices
 */
import { Effect, Layer, Redacted } from "effect"
import { Schema } from "@effect/schema"
import { CryptoService, CryptoServiceLive } from "../services/CryptoService.js"
import { EventService, EventServiceLive } from "../services/EventService.js"
import { SigningKey, makeSigningKey } from "../services/SigningKey.js"
import {
  PrivateKey,
  Tag,
  UnixTimestamp,
  ZAP_REQUEST_KIND,
  type EventKind,
  type NostrEvent,
} from "../core/Schema.js"
import { PayIndex, type PaidInvoice } from "../lightning/Invoice.js"

const decodeTag = Schema.decodeSync(Tag)

/** Operator key used to sign receipts in tests */
export const OPERATOR_KEY = PrivateKey.make("2".repeat(64))

/** Zap sender key */
export const SENDER_KEY = PrivateKey.make("3".repeat(64))

export const RECIPIENT_PUBKEY = "4".repeat(64)
export const TARGET_EVENT_ID = "5".repeat(64)

export const TestServices = Layer.merge(
  CryptoServiceLive,
  EventServiceLive.pipe(Layer.provide(CryptoServiceLive))
)

export const TestSigningKey = makeSigningKey(Redacted.make<string>(OPERATOR_KEY)).pipe(
  Layer.provide(CryptoServiceLive)
)

export const runTest = <A, E>(
  effect: Effect.Effect<A, E, CryptoService | EventService | SigningKey>
): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(Layer.merge(TestServices, TestSigningKey))))

export interface ZapRequestParams {
  readonly amountMsat?: number
  readonly relays?: ReadonlyArray<string>
  readonly eventId?: string
  readonly recipient?: string
  readonly kind?: EventKind
  readonly extraTags?: ReadonlyArray<ReadonlyArray<string>>
  readonly content?: string
}

/**
 * A zap request signed by SENDER_KEY
 */
export const signZapRequest = (params: ZapRequestParams = {}): Effect.Effect<NostrEvent, never, EventService> =>
  Effect.gen(function* () {
    const events = yield* EventService
    const tags: Tag[] = [decodeTag(["p", params.recipient ?? RECIPIENT_PUBKEY])]
    if (params.eventId !== undefined) tags.push(decodeTag(["e", params.eventId]))
    if (params.amountMsat !== undefined) tags.push(decodeTag(["amount", String(params.amountMsat)]))
    if (params.relays !== undefined) tags.push(decodeTag(["relays", ...params.relays]))
    for (const tag of params.extraTags ?? []) tags.push(decodeTag(tag))

    return yield* events
      .createEvent(
        {
          kind: params.kind ?? ZAP_REQUEST_KIND,
          content: params.content ?? "",
          tags,
          created_at: UnixTimestamp.make(1700000000),
        },
        SENDER_KEY
      )
      .pipe(Effect.orDie)
  })

/**
 * A paid invoice whose description is the given text
 */
export const paidInvoice = (
  payIndex: number,
  description: string,
  overrides: Partial<Omit<PaidInvoice, "payIndex" | "description">> = {}
): PaidInvoice => ({
  payIndex: PayIndex.make(payIndex),
  label: `invoice-${payIndex}`,
  amountMsat: 21000,
  description,
  paymentHash: "6".repeat(64),
  bolt11: `lnbc210n1test${payIndex}`,
  paymentPreimage: "7".repeat(64),
  paidAt: 1700000100,
  ...overrides,
})
