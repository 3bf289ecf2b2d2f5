/**
 * Runtime configuration
 *
 * Read from ZAPWATCH_* environment variables through effect's Config, so
 * tests can swap in a ConfigProvider.fromMap.
 */
import { Config, LogLevel, Option, Redacted } from "effect"
import type { AckMode } from "../client/RelayPublisher.js"

export interface ZapwatchConfig {
  readonly secretKey: Redacted.Redacted<string>
  readonly relays: ReadonlyArray<string>
  readonly lightningRpc: string
  readonly payIndexPath: Option.Option<string>
  readonly startIndex: number
  readonly ackMode: AckMode
  readonly publishTimeoutMs: number
  readonly publishRetries: number
  readonly publishBackoffMs: number
  readonly includeRequestRelays: boolean
  readonly receiptComment: string
  readonly holdRetryDelayMs: number
  readonly stuckAlertAfter: number
  readonly nodeRetryDelayMs: number
  readonly logLevel: LogLevel.LogLevel
}

const nonNegative = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({ message: "Expected a non-negative integer", validation: (n) => n >= 0 })
  )

const positive = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({ message: "Expected a positive integer", validation: (n) => n > 0 })
  )

export const ZapwatchConfig: Config.Config<ZapwatchConfig> = Config.all({
  secretKey: Config.redacted("ZAPWATCH_NOSTR_SECRET_KEY"),
  relays: Config.array(Config.string(), "ZAPWATCH_RELAYS").pipe(
    Config.withDefault(["ws://localhost:8080"]),
    Config.map((relays) => relays.map((relay) => relay.trim()).filter((relay) => relay.length > 0)),
    Config.validate({ message: "At least one relay is required", validation: (relays) => relays.length > 0 })
  ),
  lightningRpc: Config.string("ZAPWATCH_LIGHTNING_RPC"),
  payIndexPath: Config.option(Config.string("ZAPWATCH_PAY_INDEX_PATH")),
  startIndex: nonNegative("ZAPWATCH_START_INDEX", 0),
  ackMode: Config.literal("best-effort", "strict")("ZAPWATCH_ACK_MODE").pipe(
    Config.withDefault("best-effort" as const)
  ),
  publishTimeoutMs: positive("ZAPWATCH_PUBLISH_TIMEOUT_MS", 10000),
  publishRetries: nonNegative("ZAPWATCH_PUBLISH_RETRIES", 3),
  publishBackoffMs: positive("ZAPWATCH_PUBLISH_BACKOFF_MS", 500),
  includeRequestRelays: Config.boolean("ZAPWATCH_INCLUDE_REQUEST_RELAYS").pipe(Config.withDefault(true)),
  receiptComment: Config.string("ZAPWATCH_RECEIPT_COMMENT").pipe(Config.withDefault("")),
  holdRetryDelayMs: nonNegative("ZAPWATCH_HOLD_RETRY_DELAY_MS", 5000),
  stuckAlertAfter: positive("ZAPWATCH_STUCK_ALERT_AFTER", 5),
  nodeRetryDelayMs: nonNegative("ZAPWATCH_NODE_RETRY_DELAY_MS", 1000),
  logLevel: Config.logLevel("ZAPWATCH_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
})
