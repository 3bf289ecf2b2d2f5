/**
 * Core Lightning JSON-RPC client
 *
 * Talks JSON-RPC 2.0 over the node's `lightning-rpc` unix socket. Each
 * call opens its own connection since `waitanyinvoice` can block for as
 * long as no invoice is paid.
 */
import { connect } from "node:net"
import { Effect, Layer, Option } from "effect"
import { Schema } from "@effect/schema"
import { NodeRpcError } from "../core/Errors.js"
import { LightningNode } from "./LightningNode.js"
import { WaitAnyInvoiceResponse, toPaidInvoice } from "./Invoice.js"

// =============================================================================
// Types
// =============================================================================

export interface ClnRpcConfig {
  /** Path to the lightning-rpc socket */
  readonly socketPath: string
}

const RpcError = Schema.Struct({
  code: Schema.optional(Schema.Number),
  message: Schema.String,
})

const RpcResponse = Schema.Struct({
  jsonrpc: Schema.optional(Schema.String),
  id: Schema.Union(Schema.Number, Schema.String),
  result: Schema.optional(Schema.Unknown),
  error: Schema.optional(RpcError),
})
type RpcResponse = typeof RpcResponse.Type

const decodeResponse = Schema.decodeUnknownOption(Schema.parseJson(RpcResponse))
const decodeWaitAnyInvoice = Schema.decodeUnknown(WaitAnyInvoiceResponse)

// =============================================================================
// Transport
// =============================================================================

let requestCounter = 0

/**
 * Send one request and resolve with its decoded response.
 * The node terminates every response with a blank line.
 */
const call = (
  config: ClnRpcConfig,
  method: string,
  params: Record<string, unknown>
): Effect.Effect<unknown, NodeRpcError> =>
  Effect.async<RpcResponse, NodeRpcError>((resume) => {
    requestCounter++
    const id = `zapwatch:${method}#${requestCounter}`
    const socket = connect(config.socketPath)
    let buffer = ""
    let settled = false

    const finish = (effect: Effect.Effect<RpcResponse, NodeRpcError>): void => {
      if (settled) return
      settled = true
      socket.destroy()
      resume(effect)
    }

    socket.setEncoding("utf8")

    socket.on("connect", () => {
      socket.write(JSON.stringify({ jsonrpc: "2.0", id, method, params }))
    })

    socket.on("data", (chunk: Buffer | string) => {
      buffer += chunk.toString()
      let boundary = buffer.indexOf("\n\n")
      while (boundary !== -1) {
        const candidate = buffer.slice(0, boundary)
        buffer = buffer.slice(boundary + 2)
        const decoded = decodeResponse(candidate)
        if (Option.isSome(decoded) && decoded.value.id === id) {
          finish(Effect.succeed(decoded.value))
          return
        }
        boundary = buffer.indexOf("\n\n")
      }
    })

    socket.on("error", (error) => {
      finish(Effect.fail(new NodeRpcError({ message: error.message, method })))
    })

    socket.on("close", () => {
      finish(Effect.fail(new NodeRpcError({ message: "Connection closed before response", method })))
    })

    // Cleanup on interrupt
    return Effect.sync(() => {
      settled = true
      socket.destroy()
    })
  }).pipe(
    Effect.flatMap((response) =>
      response.error
        ? Effect.fail(
            new NodeRpcError({
              message: response.error.message,
              method,
              code: response.error.code,
            })
          )
        : Effect.succeed(response.result)
    )
  )

// =============================================================================
// Layer Constructor
// =============================================================================

/**
 * LightningNode backed by a Core Lightning RPC socket
 */
export const makeClnNode = (config: ClnRpcConfig): Layer.Layer<LightningNode> =>
  Layer.succeed(LightningNode, {
    _tag: "LightningNode",

    waitAnyInvoice: (lastPayIndex) =>
      Effect.gen(function* () {
        const result = yield* call(config, "waitanyinvoice", { lastpay_index: lastPayIndex })
        const response = yield* decodeWaitAnyInvoice(result).pipe(
          Effect.mapError(
            (error) =>
              new NodeRpcError({
                message: `Unexpected waitanyinvoice response: ${error.message}`,
                method: "waitanyinvoice",
              })
          )
        )
        const invoice = toPaidInvoice(response)
        if (invoice === null) {
          return yield* new NodeRpcError({
            message: `Invoice ${response.label} is ${response.status} without a pay index or amount`,
            method: "waitanyinvoice",
          })
        }
        return invoice
      }),
  })
