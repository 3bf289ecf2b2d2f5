import { describe, expect, test } from "vitest"
import { Effect, TestClock, TestContext } from "effect"
import { buildZapReceipt } from "./ZapReceipt.js"
import { validateZapRequest } from "./ZapRequest.js"
import { CryptoService } from "../services/CryptoService.js"
import { EventService } from "../services/EventService.js"
import {
  OPERATOR_KEY,
  RECIPIENT_PUBKEY,
  SENDER_KEY,
  TARGET_EVENT_ID,
  paidInvoice,
  runTest,
  signZapRequest,
} from "../testing/fixtures.js"

const buildFor = (
  params: Parameters<typeof signZapRequest>[0],
  overrides: Parameters<typeof paidInvoice>[2] = {},
  comment?: string
) =>
  runTest(
    Effect.gen(function* () {
      yield* TestClock.setTime(1700000500_000)
      const request = yield* signZapRequest(params)
      const invoice = paidInvoice(7, JSON.stringify(request), overrides)
      const zap = yield* validateZapRequest(request, invoice)
      const receipt = yield* buildZapReceipt(zap, { comment })
      return { request, invoice, receipt }
    }).pipe(Effect.provide(TestContext.TestContext))
  )

describe("buildZapReceipt", () => {
  test("produces a kind 9735 receipt signed by the operator key", async () => {
    const { receipt } = await buildFor({ amountMsat: 21000 })
    const [operatorPubkey, verified] = await runTest(
      Effect.gen(function* () {
        const crypto = yield* CryptoService
        const events = yield* EventService
        return [yield* crypto.getPublicKey(OPERATOR_KEY), yield* events.verifyEvent(receipt)] as const
      })
    )

    expect(receipt.kind).toBe(9735)
    expect(receipt.pubkey).toBe(operatorPubkey)
    expect(verified).toBe(true)
  })

  test("uses the clock for created_at", async () => {
    const { receipt } = await buildFor({})
    expect(receipt.created_at).toBe(1700000500)
  })

  test("copies addressing and carries the invoice proof", async () => {
    const { request, invoice, receipt } = await buildFor({
      amountMsat: 21000,
      eventId: TARGET_EVENT_ID,
      relays: ["wss://relay.one"],
    })
    const senderPubkey = await runTest(
      Effect.flatMap(CryptoService, (crypto) => crypto.getPublicKey(SENDER_KEY))
    )

    expect(receipt.tags).toEqual([
      ["p", RECIPIENT_PUBKEY],
      ["e", TARGET_EVENT_ID],
      ["P", senderPubkey],
      ["bolt11", "lnbc210n1test7"],
      ["description", JSON.stringify(request)],
      ["preimage", "7".repeat(64)],
    ])
    expect(invoice.description).toBe(JSON.stringify(request))
  })

  test("copies an a tag after the e tag", async () => {
    const address = `30023:${RECIPIENT_PUBKEY}:my-article`
    const { receipt } = await buildFor({ eventId: TARGET_EVENT_ID, extraTags: [["a", address]] })
    expect(receipt.tags.slice(0, 3)).toEqual([
      ["p", RECIPIENT_PUBKEY],
      ["e", TARGET_EVENT_ID],
      ["a", address],
    ])
  })

  test("omits the preimage tag when the node did not report one", async () => {
    const { receipt } = await buildFor({}, { paymentPreimage: undefined })
    expect(receipt.tags.some((tag) => tag[0] === "preimage")).toBe(false)
  })

  test("content is empty unless a comment is configured", async () => {
    const plain = await buildFor({})
    const commented = await buildFor({}, {}, "thanks for the zap")
    expect(plain.receipt.content).toBe("")
    expect(commented.receipt.content).toBe("thanks for the zap")
  })
})
