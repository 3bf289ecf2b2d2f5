/**
 * RelayPublisher
 *
 * Fans a signed event out to a set of relays in parallel. Every relay is
 * attempted independently; transient failures are retried per relay with
 * exponential backoff, explicit rejections are not.
 */
import { Context, Data, Duration, Effect, Layer, Ref, Schedule } from "effect"
import type { NostrEvent } from "../core/Schema.js"
import { makeRelayServiceScoped } from "./RelayService.js"

// =============================================================================
// Types
// =============================================================================

/** How many acknowledgements make a publish successful */
export type AckMode = "best-effort" | "strict"

export interface RelayPublisherConfig {
  readonly ackMode: AckMode
  /** Per-attempt wait for the socket to open and for the OK */
  readonly timeoutMs: number
  /** Retries after the first attempt, for transient failures only */
  readonly retries: number
  /** Base delay of the exponential backoff between retries */
  readonly backoffMs: number
}

/**
 * Relays to publish to. Configured relays are the operator's; hinted
 * relays come from the zap request and never count toward strict mode.
 */
export interface RelayTargets {
  readonly configured: ReadonlyArray<string>
  readonly hinted: ReadonlyArray<string>
}

export type RelayOutcome = Data.TaggedEnum<{
  Accepted: { readonly url: string; readonly message: string; readonly attempts: number }
  Rejected: { readonly url: string; readonly reason: string; readonly attempts: number }
  TimedOut: { readonly url: string; readonly afterMs: number; readonly attempts: number }
  Unreachable: { readonly url: string; readonly reason: string; readonly attempts: number }
}>
export const RelayOutcome = Data.taggedEnum<RelayOutcome>()

/**
 * accepted: the ack policy is met.
 * rejected: not met, and every miss is an explicit rejection.
 * failed: not met, and at least one miss was transient.
 */
export type PublishVerdict = "accepted" | "rejected" | "failed"

export interface PublishReport {
  readonly eventId: string
  readonly outcomes: ReadonlyArray<RelayOutcome>
  readonly verdict: PublishVerdict
}

// =============================================================================
// Service Interface
// =============================================================================

export interface RelayPublisher {
  readonly _tag: "RelayPublisher"

  /**
   * Publish to every target concurrently and report per relay.
   * Never fails; failures are outcomes.
   */
  publish(event: NostrEvent, targets: RelayTargets): Effect.Effect<PublishReport>
}

// =============================================================================
// Service Tag
// =============================================================================

export const RelayPublisher = Context.GenericTag<RelayPublisher>("RelayPublisher")

// =============================================================================
// Target Selection
// =============================================================================

/**
 * Normalize a relay URL: default to wss://, lowercase scheme and host,
 * drop a trailing slash. Returns null for anything that is not a ws(s) URL.
 */
export const normalizeRelayUrl = (url: string): string | null => {
  let candidate = url.trim()
  if (candidate.length === 0) return null
  if (!/^[a-z]+:\/\//i.test(candidate)) {
    candidate = `wss://${candidate}`
  }

  let parsed: URL
  try {
    parsed = new URL(candidate)
  } catch {
    return null
  }
  if (parsed.protocol !== "ws:" && parsed.protocol !== "wss:") return null

  const normalized = parsed.toString()
  return normalized.endsWith("/") ? normalized.slice(0, -1) : normalized
}

/**
 * Union of configured relays and the request's relay hints, normalized and
 * deduplicated. Configured relays come first and keep their role when a
 * hint repeats them.
 */
export const resolveTargets = (
  configured: ReadonlyArray<string>,
  hinted: ReadonlyArray<string>
): RelayTargets => {
  const seen = new Set<string>()
  const collect = (urls: ReadonlyArray<string>): string[] => {
    const out: string[] = []
    for (const url of urls) {
      const normalized = normalizeRelayUrl(url)
      if (normalized !== null && !seen.has(normalized)) {
        seen.add(normalized)
        out.push(normalized)
      }
    }
    return out
  }
  const configuredUrls = collect(configured)
  return { configured: configuredUrls, hinted: collect(hinted) }
}

// =============================================================================
// Verdict
// =============================================================================

const isTransient = (outcome: RelayOutcome): boolean =>
  outcome._tag === "TimedOut" || outcome._tag === "Unreachable"

/**
 * Apply the ack policy to per-relay outcomes
 */
export const judgeOutcomes = (
  outcomes: ReadonlyArray<RelayOutcome>,
  configured: ReadonlyArray<string>,
  ackMode: AckMode
): PublishVerdict => {
  const relevant =
    ackMode === "strict" ? outcomes.filter((o) => configured.includes(o.url)) : outcomes
  const misses = relevant.filter((o) => o._tag !== "Accepted")

  const met =
    ackMode === "strict"
      ? relevant.length > 0 && misses.length === 0
      : relevant.some((o) => o._tag === "Accepted")

  if (met) return "accepted"
  return misses.some(isTransient) || relevant.length === 0 ? "failed" : "rejected"
}

// =============================================================================
// Service Implementation
// =============================================================================

const make = (config: RelayPublisherConfig): RelayPublisher => {
  const retryPolicy = Schedule.exponential(Duration.millis(config.backoffMs)).pipe(
    Schedule.intersect(Schedule.recurs(config.retries))
  )

  const publishTo = (event: NostrEvent, url: string): Effect.Effect<RelayOutcome> =>
    Effect.gen(function* () {
      const attempts = yield* Ref.make(0)

      const attempt = Effect.scoped(
        Effect.gen(function* () {
          yield* Ref.update(attempts, (n) => n + 1)
          const relay = yield* makeRelayServiceScoped({ url, connectTimeoutMs: config.timeoutMs })
          return yield* relay.publish(event, config.timeoutMs)
        })
      ).pipe(
        Effect.tapError((error) =>
          Effect.logDebug(`Publish attempt to ${url} failed: ${error.message}`)
        )
      )

      return yield* attempt.pipe(
        Effect.retry(retryPolicy),
        Effect.flatMap((result) =>
          Effect.map(Ref.get(attempts), (count) =>
            result.accepted
              ? RelayOutcome.Accepted({ url, message: result.message, attempts: count })
              : RelayOutcome.Rejected({ url, reason: result.message, attempts: count })
          )
        ),
        Effect.catchTags({
          TimeoutError: (error) =>
            Effect.map(Ref.get(attempts), (count) =>
              RelayOutcome.TimedOut({ url, afterMs: error.durationMs, attempts: count })
            ),
          ConnectionError: (error) =>
            Effect.map(Ref.get(attempts), (count) =>
              RelayOutcome.Unreachable({ url, reason: error.message, attempts: count })
            ),
        })
      )
    })

  const publish: RelayPublisher["publish"] = (event, targets) =>
    Effect.gen(function* () {
      const urls = [...targets.configured, ...targets.hinted]

      const outcomes = yield* Effect.all(
        urls.map((url) => publishTo(event, url)),
        { concurrency: "unbounded" }
      )

      for (const outcome of outcomes) {
        if (outcome._tag === "Accepted") {
          yield* Effect.logDebug(`Relay ${outcome.url} accepted ${event.id}`)
        } else {
          yield* Effect.logWarning(`Relay ${outcome.url} did not accept ${event.id}: ${describeOutcome(outcome)}`)
        }
      }

      return {
        eventId: event.id,
        outcomes,
        verdict: judgeOutcomes(outcomes, targets.configured, config.ackMode),
      }
    })

  return { _tag: "RelayPublisher", publish }
}

/**
 * One-line description of a relay outcome for logs
 */
export const describeOutcome = (outcome: RelayOutcome): string =>
  RelayOutcome.$match(outcome, {
    Accepted: ({ message }) => `accepted${message ? ` (${message})` : ""}`,
    Rejected: ({ reason, attempts }) => `rejected after ${attempts} attempt(s): ${reason}`,
    TimedOut: ({ afterMs, attempts }) => `timed out after ${afterMs}ms, ${attempts} attempt(s)`,
    Unreachable: ({ reason, attempts }) => `unreachable after ${attempts} attempt(s): ${reason}`,
  })

// =============================================================================
// Layer Constructor
// =============================================================================

export const makeRelayPublisher = (config: RelayPublisherConfig): Layer.Layer<RelayPublisher> =>
  Layer.succeed(RelayPublisher, make(config))
