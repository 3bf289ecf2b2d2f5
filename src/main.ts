#!/usr/bin/env node
/**
 * zapwatch entry point
 * Usage: ZAPWATCH_NOSTR_SECRET_KEY=nsec1... ZAPWATCH_LIGHTNING_RPC=~/.lightning/bitcoin/lightning-rpc node dist/main.js
 */
import { Cause, Effect, Exit, Fiber, Layer, Logger, Option } from "effect"
import { ZapwatchConfig } from "./core/Config.js"
import { encodeNpub } from "./core/Nip19.js"
import { CryptoServiceLive } from "./services/CryptoService.js"
import { EventServiceLive } from "./services/EventService.js"
import { SigningKey, makeSigningKey } from "./services/SigningKey.js"
import { makeRelayPublisher } from "./client/RelayPublisher.js"
import { makeClnNode } from "./lightning/ClnRpc.js"
import { PayIndex } from "./lightning/Invoice.js"
import { defaultCursorPath, makeFileCursorStore } from "./zapper/CursorStore.js"
import { PaymentWatcher, makePaymentWatcher } from "./zapper/PaymentWatcher.js"

const AppLayer = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* ZapwatchConfig

    const cursorPath = Option.getOrElse(config.payIndexPath, defaultCursorPath)
    const signing = makeSigningKey(config.secretKey).pipe(Layer.provide(CryptoServiceLive))
    const events = EventServiceLive.pipe(Layer.provide(CryptoServiceLive))

    const dependencies = Layer.mergeAll(
      events,
      signing,
      makeFileCursorStore({ path: cursorPath, startIndex: PayIndex.make(config.startIndex) }),
      makeClnNode({ socketPath: config.lightningRpc }),
      makeRelayPublisher({
        ackMode: config.ackMode,
        timeoutMs: config.publishTimeoutMs,
        retries: config.publishRetries,
        backoffMs: config.publishBackoffMs,
      })
    )

    const watcher = makePaymentWatcher({
      relays: config.relays,
      includeRequestRelays: config.includeRequestRelays,
      receiptComment: config.receiptComment,
      holdRetryDelayMs: config.holdRetryDelayMs,
      stuckAlertAfter: config.stuckAlertAfter,
      nodeRetryDelayMs: config.nodeRetryDelayMs,
      ackMode: config.ackMode,
    }).pipe(Layer.provide(dependencies))

    return Layer.mergeAll(
      watcher,
      signing,
      Logger.logFmt,
      Logger.minimumLogLevel(config.logLevel)
    ).pipe(Layer.tap(() => Effect.logInfo(`Cursor file ${cursorPath}`)))
  })
)

const program = Effect.gen(function* () {
  const config = yield* ZapwatchConfig
  const signingKey = yield* SigningKey
  yield* Effect.logInfo(
    `Signing receipts as ${encodeNpub(signingKey.publicKey)}; relays ${config.relays.join(", ")}; ` +
      `ack mode ${config.ackMode}; ${config.publishRetries} retries, ${config.publishBackoffMs}ms backoff, ` +
      `${config.publishTimeoutMs}ms timeout; request relays ${config.includeRequestRelays ? "included" : "ignored"}`
  )
  const watcher = yield* PaymentWatcher
  return yield* watcher.run()
})

const fiber = Effect.runFork(
  program.pipe(
    Effect.provide(AppLayer),
    Effect.tapErrorCause((cause) =>
      Cause.isInterruptedOnly(cause)
        ? Effect.logInfo("zapwatch stopped")
        : Effect.logFatal("zapwatch failed", cause)
    )
  )
)

fiber.addObserver((exit) => {
  if (Exit.isFailure(exit) && !Cause.isInterruptedOnly(exit.cause)) {
    process.exitCode = 1
  }
})

const shutdown = (signal: string): void => {
  Effect.runFork(
    Effect.logInfo(`Received ${signal}, stopping`).pipe(Effect.zipRight(Fiber.interrupt(fiber)))
  )
}

process.once("SIGINT", () => shutdown("SIGINT"))
process.once("SIGTERM", () => shutdown("SIGTERM"))
