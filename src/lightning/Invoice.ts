/**
 * Paid invoice schemas
 *
 * Decodes Core Lightning `waitanyinvoice` results into the PaidInvoice
 * record the zap pipeline works on.
 */
import { ParseResult, Schema } from "@effect/schema"

// =============================================================================
// Primitives
// =============================================================================

/** Node-assigned settlement order of paid invoices */
export const PayIndex = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.brand("PayIndex")
)
export type PayIndex = typeof PayIndex.Type

const NonNegativeInt = Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0))

/**
 * Millisatoshi amount. Newer nodes send a bare integer, older ones a
 * string such as "5000msat". Amounts beyond Number.MAX_SAFE_INTEGER fail
 * rather than round.
 */
export const Msat = Schema.transformOrFail(
  Schema.Union(Schema.Number, Schema.String),
  NonNegativeInt,
  {
    strict: true,
    decode: (input, _, ast) => {
      let amount = input
      if (typeof amount === "string") {
        const match = /^(\d+)(msat)?$/.exec(amount)
        if (!match?.[1]) {
          return ParseResult.fail(new ParseResult.Type(ast, input, `Not an msat amount: ${input}`))
        }
        amount = Number(match[1])
      }
      if (Number.isInteger(amount) && !Number.isSafeInteger(amount)) {
        return ParseResult.fail(new ParseResult.Type(ast, input, `msat amount out of range: ${input}`))
      }
      return ParseResult.succeed(amount)
    },
    encode: (amount) => ParseResult.succeed(amount),
  }
)

// =============================================================================
// waitanyinvoice response
// =============================================================================

export const WaitAnyInvoiceResponse = Schema.Struct({
  label: Schema.String,
  description: Schema.optional(Schema.String),
  payment_hash: Schema.String,
  status: Schema.Literal("paid", "expired"),
  expires_at: Schema.optional(Schema.Number),
  amount_msat: Schema.optional(Msat),
  amount_received_msat: Schema.optional(Msat),
  bolt11: Schema.optional(Schema.String),
  bolt12: Schema.optional(Schema.String),
  pay_index: Schema.optional(PayIndex),
  paid_at: Schema.optional(Schema.Number),
  payment_preimage: Schema.optional(Schema.String),
})
export type WaitAnyInvoiceResponse = typeof WaitAnyInvoiceResponse.Type

// =============================================================================
// Domain record
// =============================================================================

/** A settled invoice as seen by the zap pipeline */
export interface PaidInvoice {
  readonly payIndex: PayIndex
  readonly label: string
  /** Invoice amount, or the received amount for an amountless invoice */
  readonly amountMsat: number
  /** Amount actually received; may exceed amountMsat on overpayment */
  readonly receivedMsat?: number
  readonly description: string
  readonly paymentHash: string
  readonly bolt11?: string
  /** Hex-encoded payment preimage */
  readonly paymentPreimage?: string
  readonly paidAt?: number
}

/**
 * Map a node response to a PaidInvoice.
 * Returns null for responses that are not paid or carry no index.
 */
export const toPaidInvoice = (response: WaitAnyInvoiceResponse): PaidInvoice | null => {
  if (response.status !== "paid" || response.pay_index === undefined) {
    return null
  }
  const amountMsat = response.amount_msat ?? response.amount_received_msat
  if (amountMsat === undefined) {
    return null
  }
  return {
    payIndex: response.pay_index,
    label: response.label,
    amountMsat,
    receivedMsat: response.amount_received_msat,
    description: response.description ?? "",
    paymentHash: response.payment_hash,
    bolt11: response.bolt11,
    paymentPreimage: response.payment_preimage?.toLowerCase(),
    paidAt: response.paid_at,
  }
}
