/**
 * Outcome of handling one paid invoice, before publication.
 *
 * The watcher's advance-or-hold decision is a total function of this tag.
 */
import { Data } from "effect"
import type { NostrEvent, Tag } from "../core/Schema.js"
import type { PaidInvoice } from "../lightning/Invoice.js"

/** Why a description did not yield a zap request */
export type NotAZapReason = "empty" | "not-json" | "malformed"

/** A zap request that passed validation against its invoice */
export interface ValidatedZap {
  readonly request: NostrEvent
  readonly invoice: PaidInvoice
  readonly bolt11: string
  /** The request's single `p` tag */
  readonly recipient: Tag
  /** The request's `e` tag, when zapping an event */
  readonly eventRef?: Tag
  /** The request's `a` tag, when zapping an addressable event */
  readonly addressRef?: Tag
  /** Relays the sender asked the receipt to be published to */
  readonly relays: ReadonlyArray<string>
}

export type ZapOutcome = Data.TaggedEnum<{
  NotAZap: { readonly reason: NotAZapReason; readonly detail: string }
  InvalidRequest: { readonly reason: string; readonly requestId: string | undefined }
  AmountMismatch: {
    readonly requestId: string
    readonly declaredMsat: number
    readonly paidMsat: number
  }
  Built: { readonly zap: ValidatedZap; readonly receipt: NostrEvent }
}>

export const ZapOutcome = Data.taggedEnum<ZapOutcome>()

export type NotAZap = Data.TaggedEnum.Value<ZapOutcome, "NotAZap">
export type InvalidRequest = Data.TaggedEnum.Value<ZapOutcome, "InvalidRequest">
export type AmountMismatch = Data.TaggedEnum.Value<ZapOutcome, "AmountMismatch">
export type Built = Data.TaggedEnum.Value<ZapOutcome, "Built">

/** Validation failures; both are reported and skipped */
export type ZapRejection = InvalidRequest | AmountMismatch
