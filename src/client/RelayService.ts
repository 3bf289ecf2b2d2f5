/**
 * RelayService
 *
 * Client-side connection to a single relay for publishing events and
 * awaiting their NIP-01 OK acknowledgement.
 */
import WebSocket from "ws"
import { Effect, Option } from "effect"
import { Schema } from "@effect/schema"
import { ConnectionError, TimeoutError } from "../core/Errors.js"
import {
  RelayNoticeMessage,
  RelayOkMessage,
  type ClientEventMessage,
  type NostrEvent,
  type EventId,
} from "../core/Schema.js"

// =============================================================================
// Types
// =============================================================================

type ConnectionState = "disconnected" | "connecting" | "connected"

/** Configuration for relay connection */
export interface RelayConnectionConfig {
  readonly url: string
  /** How long to wait for the socket to open */
  readonly connectTimeoutMs?: number
}

/** Result of publishing an event */
export interface PublishResult {
  readonly accepted: boolean
  readonly message: string
}

/** Pending OK resolver */
interface PendingOk {
  resolve: (result: PublishResult) => void
  reject: (error: Error) => void
}

// Other relay messages (EVENT, EOSE, AUTH, ...) are ignored
const decodeOk = Schema.decodeUnknownOption(Schema.parseJson(RelayOkMessage))
const decodeNotice = Schema.decodeUnknownOption(Schema.parseJson(RelayNoticeMessage))

// =============================================================================
// Service Interface
// =============================================================================

export interface RelayService {
  readonly _tag: "RelayService"

  readonly url: string

  connect(): Effect.Effect<void, ConnectionError | TimeoutError>

  disconnect(): Effect.Effect<void>

  /**
   * Send an event and wait for the relay's OK. A NOTICE the relay sent
   * instead is carried in the timeout error.
   */
  publish(
    event: NostrEvent,
    timeoutMs?: number
  ): Effect.Effect<PublishResult, ConnectionError | TimeoutError>
}

// =============================================================================
// Service Implementation
// =============================================================================

const DEFAULT_TIMEOUT_MS = 10000

/**
 * Create a relay connection. Nothing is opened until connect().
 */
export const makeRelayService = (config: RelayConnectionConfig): Effect.Effect<RelayService> =>
  Effect.sync(() => {
    let state: ConnectionState = "disconnected"
    let ws: WebSocket | null = null
    const pendingOks = new Map<string, PendingOk>()
    let lastNotice: string | undefined

    const rejectPending = (reason: string): void => {
      for (const [, pending] of pendingOks) {
        pending.reject(new Error(reason))
      }
      pendingOks.clear()
    }

    const handleMessage = (data: string): void => {
      const ok = decodeOk(data)
      if (Option.isSome(ok)) {
        const [, eventId, accepted, reason] = ok.value
        const pending = pendingOks.get(eventId)
        if (pending) {
          pendingOks.delete(eventId)
          pending.resolve({ accepted, message: reason })
        }
        return
      }

      const notice = decodeNotice(data)
      if (Option.isSome(notice)) {
        lastNotice = notice.value[1]
      }
    }

    const connect: RelayService["connect"] = () =>
      Effect.async<void, ConnectionError>((resume) => {
        if (state === "connected") {
          resume(Effect.void)
          return
        }
        state = "connecting"

        let socket: WebSocket
        try {
          socket = new WebSocket(config.url)
        } catch (error) {
          state = "disconnected"
          resume(
            Effect.fail(
              new ConnectionError({
                message: error instanceof Error ? error.message : "Connection failed",
                url: config.url,
              })
            )
          )
          return
        }

        let opened = false

        socket.on("open", () => {
          opened = true
          ws = socket
          state = "connected"
          resume(Effect.void)
        })

        socket.on("error", (error) => {
          if (!opened) {
            state = "disconnected"
            resume(Effect.fail(new ConnectionError({ message: error.message, url: config.url })))
          }
        })

        socket.on("close", () => {
          ws = null
          state = "disconnected"
          rejectPending("Connection closed")
        })

        socket.on("message", (data) => {
          handleMessage(data.toString())
        })

        // Cleanup on interrupt
        return Effect.sync(() => {
          if (!opened) {
            socket.terminate()
            state = "disconnected"
          }
        })
      }).pipe(
        Effect.timeoutFail({
          duration: config.connectTimeoutMs ?? DEFAULT_TIMEOUT_MS,
          onTimeout: () =>
            new TimeoutError({
              message: `Timeout connecting to ${config.url}`,
              durationMs: config.connectTimeoutMs ?? DEFAULT_TIMEOUT_MS,
            }),
        })
      )

    const disconnect: RelayService["disconnect"] = () =>
      Effect.sync(() => {
        if (ws) {
          ws.close()
          ws = null
        }
        rejectPending("Disconnected")
        state = "disconnected"
      })

    /**
     * Register the OK waiter, then send, so a fast reply is not missed
     */
    const sendAndAwaitOk = (socket: WebSocket, event: NostrEvent, timeoutMs: number) =>
      Effect.async<PublishResult, ConnectionError | TimeoutError>((resume) => {
        const eventId: EventId = event.id
        const timeoutHandle = setTimeout(() => {
          pendingOks.delete(eventId)
          resume(
            Effect.fail(
              new TimeoutError({
                message:
                  lastNotice === undefined
                    ? `Timeout waiting for OK for event ${eventId}`
                    : `Timeout waiting for OK for event ${eventId} (relay notice: ${lastNotice})`,
                durationMs: timeoutMs,
              })
            )
          )
        }, timeoutMs)

        pendingOks.set(eventId, {
          resolve: (result) => {
            clearTimeout(timeoutHandle)
            resume(Effect.succeed(result))
          },
          reject: (error) => {
            clearTimeout(timeoutHandle)
            resume(Effect.fail(new ConnectionError({ message: error.message, url: config.url })))
          },
        })

        const message: ClientEventMessage = ["EVENT", event]
        socket.send(JSON.stringify(message), (error) => {
          if (error) {
            pendingOks.get(eventId)?.reject(error)
            pendingOks.delete(eventId)
          }
        })

        // Cleanup on interrupt
        return Effect.sync(() => {
          clearTimeout(timeoutHandle)
          pendingOks.delete(eventId)
        })
      })

    const publish: RelayService["publish"] = (event, timeoutMs = DEFAULT_TIMEOUT_MS) =>
      Effect.gen(function* () {
        const socket = ws
        if (!socket || socket.readyState !== WebSocket.OPEN) {
          return yield* new ConnectionError({ message: "Not connected", url: config.url })
        }
        return yield* sendAndAwaitOk(socket, event, timeoutMs)
      })

    return {
      _tag: "RelayService" as const,
      url: config.url,
      connect,
      disconnect,
      publish,
    }
  })

/**
 * Open a relay connection for the lifetime of the current scope
 */
export const makeRelayServiceScoped = (config: RelayConnectionConfig) =>
  Effect.acquireRelease(
    makeRelayService(config).pipe(
      Effect.tap((relay) => relay.connect().pipe(Effect.onError(() => relay.disconnect())))
    ),
    (relay) => relay.disconnect()
  )
