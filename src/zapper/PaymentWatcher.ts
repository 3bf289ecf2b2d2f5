/**
 * PaymentWatcher
 *
 * Sequential loop over the node's paid invoices. Each payment is carried
 * through extract → validate → build → publish, and the cursor moves past
 * it only once that handling is finished or deliberately skipped.
 */
import { Context, Data, Duration, Effect, Either, Layer, Ref, Schedule } from "effect"
import { CursorStore } from "./CursorStore.js"
import { extractZapRequest, validateZapRequest } from "./ZapRequest.js"
import { buildZapReceipt } from "./ZapReceipt.js"
import { ZapOutcome, type Built } from "./ZapOutcome.js"
import { LightningNode } from "../lightning/LightningNode.js"
import type { PaidInvoice, PayIndex } from "../lightning/Invoice.js"
import {
  RelayPublisher,
  judgeOutcomes,
  resolveTargets,
  type AckMode,
  type PublishReport,
  type RelayOutcome,
} from "../client/RelayPublisher.js"
import { EventService } from "../services/EventService.js"
import { SigningKey } from "../services/SigningKey.js"
import type { CursorCorruption, SigningFailure } from "../core/Errors.js"

// =============================================================================
// Types
// =============================================================================

export interface PaymentWatcherConfig {
  /** Operator relays, always published to */
  readonly relays: ReadonlyArray<string>
  /** Also publish to the relays named in the zap request */
  readonly includeRequestRelays: boolean
  readonly receiptComment: string
  /** Pause before handling a held payment again */
  readonly holdRetryDelayMs: number
  /** Consecutive holds on one payment before an error-level alert */
  readonly stuckAlertAfter: number
  /** Pause after a failed node call */
  readonly nodeRetryDelayMs: number
  readonly ackMode: AckMode
}

/** What the watcher does with the cursor after one payment */
export type Decision = Data.TaggedEnum<{
  Advance: { readonly reason: string }
  Hold: { readonly reason: string }
}>
export const Decision = Data.taggedEnum<Decision>()

/** Result of handling one payment */
export interface HandledPayment {
  readonly outcome: ZapOutcome | SigningFailure
  readonly report: PublishReport | undefined
  readonly decision: Decision
}

/**
 * A signed receipt whose payment is on hold. Retries republish this
 * exact event, and only to relays that have not accepted it yet.
 */
export interface HeldReceipt {
  readonly payIndex: PayIndex
  readonly outcome: Built
  readonly accepted: ReadonlyArray<RelayOutcome>
}

// =============================================================================
// Decision
// =============================================================================

/**
 * Advance-or-hold as a total function of the outcome and, for built
 * receipts, the publish report.
 */
export const decide = (
  outcome: ZapOutcome | SigningFailure,
  report: PublishReport | undefined,
  ackMode: AckMode = "best-effort"
): Decision => {
  switch (outcome._tag) {
    case "NotAZap":
      return Decision.Advance({ reason: `not a zap (${outcome.reason})` })
    case "InvalidRequest":
      return Decision.Advance({ reason: `invalid zap request: ${outcome.reason}` })
    case "AmountMismatch":
      return Decision.Advance({
        reason: `amount mismatch: request ${outcome.declaredMsat} msat, paid ${outcome.paidMsat} msat`,
      })
    case "SigningFailure":
      return Decision.Hold({ reason: `signing failed: ${outcome.message}` })
    case "Built": {
      if (report === undefined) {
        return Decision.Hold({ reason: "receipt built but not published" })
      }
      switch (report.verdict) {
        case "accepted":
          return Decision.Advance({ reason: "receipt published" })
        case "rejected":
          return ackMode === "strict"
            ? Decision.Hold({ reason: "receipt rejected by a required relay" })
            : Decision.Advance({ reason: "receipt rejected by every relay" })
        case "failed":
          return Decision.Hold({ reason: "no relay acknowledged the receipt" })
      }
    }
  }
}

// =============================================================================
// Service Interface
// =============================================================================

export interface PaymentWatcher {
  readonly _tag: "PaymentWatcher"

  /**
   * Run extract → validate → build → publish for one payment and decide
   * what to do with the cursor. Does not touch the cursor.
   * With a held receipt for the same payment, nothing is rebuilt: the
   * held event goes to the relays that have not accepted it.
   */
  handlePayment(invoice: PaidInvoice, held?: HeldReceipt): Effect.Effect<HandledPayment>

  /**
   * Load the cursor and process payments until interrupted.
   * Only a corrupt cursor ends the loop with an error.
   */
  run(): Effect.Effect<never, CursorCorruption>
}

// =============================================================================
// Service Tag
// =============================================================================

export const PaymentWatcher = Context.GenericTag<PaymentWatcher>("PaymentWatcher")

// =============================================================================
// Service Implementation
// =============================================================================

interface LoopState {
  readonly cursor: PayIndex
  /** Consecutive holds on the payment after the cursor */
  readonly holds: number
  readonly held: HeldReceipt | undefined
}

const make = (config: PaymentWatcherConfig) =>
  Effect.gen(function* () {
    const node = yield* LightningNode
    const store = yield* CursorStore
    const publisher = yield* RelayPublisher
    const eventService = yield* EventService
    const signingKey = yield* SigningKey

    const classify = (invoice: PaidInvoice): Effect.Effect<ZapOutcome, SigningFailure> => {
      const extracted = extractZapRequest(invoice.description)
      if (Either.isLeft(extracted)) {
        return Effect.succeed(extracted.left)
      }
      return validateZapRequest(extracted.right, invoice).pipe(
        Effect.matchEffect({
          onFailure: (rejection) => Effect.succeed<ZapOutcome>(rejection),
          onSuccess: (zap) =>
            buildZapReceipt(zap, { comment: config.receiptComment }).pipe(
              Effect.map((receipt): ZapOutcome => ZapOutcome.Built({ zap, receipt }))
            ),
        }),
        Effect.provideService(EventService, eventService),
        Effect.provideService(SigningKey, signingKey)
      )
    }

    const report = (handled: HandledPayment, invoice: PaidInvoice): Effect.Effect<void> => {
      const { outcome, decision } = handled
      switch (outcome._tag) {
        case "NotAZap":
          return Effect.logDebug(`Invoice ${invoice.label} is not a zap: ${outcome.detail}`)
        case "InvalidRequest":
          return Effect.logWarning(
            `Skipping invalid zap request ${outcome.requestId ?? "(no id)"} on invoice ${invoice.label}: ${outcome.reason}`
          )
        case "AmountMismatch":
          return Effect.logWarning(
            `Zap request ${outcome.requestId} amount ${outcome.declaredMsat} msat does not equal invoice ${invoice.label} amount ${outcome.paidMsat} msat`
          )
        case "SigningFailure":
          return Effect.logError(`Could not sign zap receipt for invoice ${invoice.label}: ${outcome.message}`)
        case "Built": {
          const accepted = handled.report?.outcomes.filter((o) => o._tag === "Accepted").length ?? 0
          if (handled.report?.verdict === "accepted") {
            return Effect.logInfo(`Published zap receipt ${outcome.receipt.id} to ${accepted} relay(s)`)
          }
          return decision._tag === "Advance"
            ? Effect.logError(`Zap receipt ${outcome.receipt.id} was rejected by every relay; not retrying`)
            : Effect.logWarning(`Zap receipt ${outcome.receipt.id} not delivered: ${decision.reason}`)
        }
      }
    }

    const publishReceipt = (
      outcome: Built,
      held: HeldReceipt | undefined
    ): Effect.Effect<PublishReport> =>
      Effect.gen(function* () {
        const targets = resolveTargets(
          config.relays,
          config.includeRequestRelays ? outcome.zap.relays : []
        )
        const accepted = held?.accepted ?? []
        const done = new Set(accepted.map((o) => o.url))
        const remaining = {
          configured: targets.configured.filter((url) => !done.has(url)),
          hinted: targets.hinted.filter((url) => !done.has(url)),
        }

        const fresh =
          remaining.configured.length + remaining.hinted.length > 0
            ? (yield* publisher.publish(outcome.receipt, remaining)).outcomes
            : []
        const outcomes = [...accepted, ...fresh]
        return {
          eventId: outcome.receipt.id,
          outcomes,
          verdict: judgeOutcomes(outcomes, targets.configured, config.ackMode),
        }
      })

    const handlePayment: PaymentWatcher["handlePayment"] = (invoice, held) =>
      Effect.gen(function* () {
        const previous = held?.payIndex === invoice.payIndex ? held : undefined
        const outcome =
          previous !== undefined
            ? previous.outcome
            : yield* classify(invoice).pipe(
                Effect.catchTag("SigningFailure", (failure) => Effect.succeed(failure))
              )

        let publishReport: PublishReport | undefined
        if (outcome._tag === "Built") {
          publishReport = yield* publishReceipt(outcome, previous)
        }

        const handled: HandledPayment = {
          outcome,
          report: publishReport,
          decision: decide(outcome, publishReport, config.ackMode),
        }
        yield* report(handled, invoice)
        return handled
      }).pipe(Effect.annotateLogs({ payIndex: invoice.payIndex }))

    const nextInvoice = (cursor: PayIndex): Effect.Effect<PaidInvoice> =>
      node.waitAnyInvoice(cursor).pipe(
        Effect.tapError((error) => Effect.logWarning(`Error fetching invoice: ${error.message}`)),
        Effect.retry(Schedule.spaced(Duration.millis(config.nodeRetryDelayMs))),
        Effect.orDie
      )

    const step = (stateRef: Ref.Ref<LoopState>): Effect.Effect<void> =>
      Effect.gen(function* () {
        const { cursor, holds, held } = yield* Ref.get(stateRef)
        const invoice = yield* nextInvoice(cursor)

        if (invoice.payIndex <= cursor) {
          yield* Effect.logDebug(`Ignoring invoice ${invoice.label} at or below cursor ${cursor}`)
          yield* Effect.sleep(Duration.millis(config.nodeRetryDelayMs))
          return
        }

        const handled = yield* handlePayment(invoice, held)
        const { decision, outcome } = handled

        if (decision._tag === "Advance") {
          const saved = yield* store.save(invoice.payIndex).pipe(
            Effect.uninterruptible,
            Effect.as(true),
            Effect.catchAll((error) =>
              Effect.logError(`Could not persist cursor ${invoice.payIndex}: ${error._tag}`).pipe(
                Effect.as(false)
              )
            )
          )
          if (saved) {
            yield* Ref.set(stateRef, { cursor: invoice.payIndex, holds: 0, held: undefined })
            return
          }
        }

        const nextHeld: HeldReceipt | undefined =
          outcome._tag === "Built" && handled.report !== undefined
            ? {
                payIndex: invoice.payIndex,
                outcome,
                accepted: handled.report.outcomes.filter((o) => o._tag === "Accepted"),
              }
            : undefined
        const count = holds + 1
        yield* Ref.set(stateRef, { cursor, holds: count, held: nextHeld })
        if (count % config.stuckAlertAfter === 0) {
          yield* Effect.logError(
            `Cursor stuck at ${cursor}: invoice ${invoice.label} held ${count} times in a row (${decision.reason})`
          )
        }
        yield* Effect.sleep(Duration.millis(config.holdRetryDelayMs))
      })

    const run: PaymentWatcher["run"] = () =>
      Effect.gen(function* () {
        const cursor = yield* store.load()
        yield* Effect.logInfo(`Starting at pay index ${cursor}`)
        const stateRef = yield* Ref.make<LoopState>({ cursor, holds: 0, held: undefined })
        return yield* Effect.forever(step(stateRef))
      })

    return {
      _tag: "PaymentWatcher" as const,
      handlePayment,
      run,
    }
  })

// =============================================================================
// Layer Constructor
// =============================================================================

export const makePaymentWatcher = (
  config: PaymentWatcherConfig
): Layer.Layer<
  PaymentWatcher,
  never,
  LightningNode | CursorStore | RelayPublisher | EventService | SigningKey
> => Layer.effect(PaymentWatcher, make(config))
