/**
 * LightningNode
 *
 * The node boundary consumed by the payment watcher: "give me the next
 * paid invoice after index K", in the node's ascending index order.
 */
import { Context, Effect } from "effect"
import type { NodeRpcError } from "../core/Errors.js"
import type { PaidInvoice, PayIndex } from "./Invoice.js"

export interface LightningNode {
  readonly _tag: "LightningNode"

  /**
   * Block until an invoice with an index strictly greater than
   * `lastPayIndex` is paid, and return it. Must be interruptible.
   */
  waitAnyInvoice(lastPayIndex: PayIndex): Effect.Effect<PaidInvoice, NodeRpcError>
}

export const LightningNode = Context.GenericTag<LightningNode>("LightningNode")
