import { afterEach, beforeAll, describe, expect, test } from "vitest"
import { Effect } from "effect"
import {
  RelayOutcome,
  RelayPublisher,
  describeOutcome,
  judgeOutcomes,
  makeRelayPublisher,
  normalizeRelayUrl,
  resolveTargets,
  type RelayPublisherConfig,
  type RelayTargets,
} from "./RelayPublisher.js"
import type { NostrEvent } from "../core/Schema.js"
import { runTest, signZapRequest } from "../testing/fixtures.js"
import { startTestRelay, unusedRelayUrl, type RelayBehavior, type TestRelayHandle } from "../testing/TestRelay.js"

describe("normalizeRelayUrl", () => {
  test("defaults to wss and drops the trailing slash", () => {
    expect(normalizeRelayUrl("relay.example.com")).toBe("wss://relay.example.com")
    expect(normalizeRelayUrl("wss://relay.example.com/")).toBe("wss://relay.example.com")
  })

  test("lowercases scheme and host", () => {
    expect(normalizeRelayUrl("WSS://Relay.Example.COM")).toBe("wss://relay.example.com")
  })

  test("keeps ports and paths", () => {
    expect(normalizeRelayUrl("ws://localhost:8080")).toBe("ws://localhost:8080")
    expect(normalizeRelayUrl("wss://relay.example.com/inbox/")).toBe("wss://relay.example.com/inbox")
  })

  test("rejects non-websocket and empty URLs", () => {
    expect(normalizeRelayUrl("https://relay.example.com")).toBeNull()
    expect(normalizeRelayUrl("   ")).toBeNull()
    expect(normalizeRelayUrl("wss://")).toBeNull()
  })
})

describe("resolveTargets", () => {
  test("puts configured relays first and drops duplicate hints", () => {
    const targets = resolveTargets(
      ["wss://a.example.com", "wss://b.example.com/"],
      ["b.example.com", "wss://c.example.com", "https://d.example.com", "wss://c.example.com/"]
    )
    expect(targets).toEqual({
      configured: ["wss://a.example.com", "wss://b.example.com"],
      hinted: ["wss://c.example.com"],
    })
  })

  test("dedupes configured relays among themselves", () => {
    expect(resolveTargets(["wss://a.example.com", "WSS://A.example.com/"], []).configured).toEqual([
      "wss://a.example.com",
    ])
  })
})

describe("judgeOutcomes", () => {
  const A = "wss://a.example.com"
  const B = "wss://b.example.com"
  const H = "wss://hint.example.com"

  const accepted = (url: string) => RelayOutcome.Accepted({ url, message: "", attempts: 1 })
  const rejected = (url: string) => RelayOutcome.Rejected({ url, reason: "blocked", attempts: 1 })
  const timedOut = (url: string) => RelayOutcome.TimedOut({ url, afterMs: 300, attempts: 2 })
  const unreachable = (url: string) => RelayOutcome.Unreachable({ url, reason: "refused", attempts: 2 })

  test("best-effort needs one acceptance from any relay", () => {
    expect(judgeOutcomes([unreachable(A), timedOut(B), accepted(H)], [A, B], "best-effort")).toBe("accepted")
  })

  test("best-effort with only rejections is rejected", () => {
    expect(judgeOutcomes([rejected(A), rejected(B)], [A, B], "best-effort")).toBe("rejected")
  })

  test("best-effort with any transient miss and no acceptance failed", () => {
    expect(judgeOutcomes([rejected(A), timedOut(B)], [A, B], "best-effort")).toBe("failed")
  })

  test("strict needs every configured relay", () => {
    expect(judgeOutcomes([accepted(A), accepted(B)], [A, B], "strict")).toBe("accepted")
    expect(judgeOutcomes([accepted(A), unreachable(B)], [A, B], "strict")).toBe("failed")
    expect(judgeOutcomes([accepted(A), rejected(B)], [A, B], "strict")).toBe("rejected")
  })

  test("strict ignores hinted relays", () => {
    expect(judgeOutcomes([accepted(A), unreachable(H)], [A], "strict")).toBe("accepted")
  })

  test("no outcomes is a failure", () => {
    expect(judgeOutcomes([], [], "best-effort")).toBe("failed")
    expect(judgeOutcomes([], [], "strict")).toBe("failed")
  })
})

describe("describeOutcome", () => {
  test("names the attempts and the reason", () => {
    expect(
      describeOutcome(RelayOutcome.Unreachable({ url: "wss://a.example.com", reason: "refused", attempts: 2 }))
    ).toBe("unreachable after 2 attempt(s): refused")
    expect(describeOutcome(RelayOutcome.TimedOut({ url: "wss://a.example.com", afterMs: 300, attempts: 1 }))).toBe(
      "timed out after 300ms, 1 attempt(s)"
    )
  })
})

describe("RelayPublisher", () => {
  const baseConfig: RelayPublisherConfig = {
    ackMode: "best-effort",
    timeoutMs: 300,
    retries: 1,
    backoffMs: 10,
  }

  let event: NostrEvent
  const relays: TestRelayHandle[] = []

  const relay = async (behavior: RelayBehavior): Promise<TestRelayHandle> => {
    const handle = await startTestRelay(behavior)
    relays.push(handle)
    return handle
  }

  const publish = (targets: RelayTargets, config: Partial<RelayPublisherConfig> = {}) =>
    Effect.runPromise(
      Effect.flatMap(RelayPublisher, (publisher) => publisher.publish(event, targets)).pipe(
        Effect.provide(makeRelayPublisher({ ...baseConfig, ...config }))
      )
    )

  beforeAll(async () => {
    event = await runTest(signZapRequest())
  })

  afterEach(async () => {
    await Promise.all(relays.splice(0).map((r) => r.stop()))
  })

  test("reports acceptance from a relay that sends OK true", async () => {
    const accepting = await relay("accept")

    const report = await publish({ configured: [accepting.url], hinted: [] })

    expect(report.eventId).toBe(event.id)
    expect(report.verdict).toBe("accepted")
    expect(report.outcomes).toEqual([RelayOutcome.Accepted({ url: accepting.url, message: "", attempts: 1 })])
    expect(accepting.received).toEqual([event.id])
  })

  test("does not retry an explicit rejection", async () => {
    const rejecting = await relay("reject")

    const report = await publish({ configured: [rejecting.url], hinted: [] })

    expect(report.verdict).toBe("rejected")
    expect(report.outcomes).toEqual([
      RelayOutcome.Rejected({ url: rejecting.url, reason: "blocked: not on the allow list", attempts: 1 }),
    ])
    expect(rejecting.received).toEqual([event.id])
  })

  test("retries a silent relay and reports a timeout", async () => {
    const silent = await relay("silent")

    const report = await publish({ configured: [silent.url], hinted: [] })

    expect(report.verdict).toBe("failed")
    expect(report.outcomes).toEqual([RelayOutcome.TimedOut({ url: silent.url, afterMs: 300, attempts: 2 })])
    expect(silent.received).toEqual([event.id, event.id])
  })

  test("retries an unreachable relay", async () => {
    const url = await unusedRelayUrl()

    const report = await publish({ configured: [url], hinted: [] })

    expect(report.verdict).toBe("failed")
    const [outcome] = report.outcomes
    expect(outcome?._tag).toBe("Unreachable")
    expect(outcome?.attempts).toBe(2)
  })

  test("publishes to every relay even when some are down", async () => {
    const down = await unusedRelayUrl()
    const accepting = await relay("accept")
    const rejecting = await relay("reject")

    const report = await publish({ configured: [down, accepting.url], hinted: [rejecting.url] })

    expect(report.verdict).toBe("accepted")
    expect(report.outcomes.map((o) => [o.url, o._tag])).toEqual([
      [down, "Unreachable"],
      [accepting.url, "Accepted"],
      [rejecting.url, "Rejected"],
    ])
    expect(accepting.received).toEqual([event.id])
  })

  test("strict mode fails when a configured relay does not accept", async () => {
    const accepting = await relay("accept")
    const down = await unusedRelayUrl()

    const report = await publish({ configured: [accepting.url, down], hinted: [] }, { ackMode: "strict" })

    expect(report.verdict).toBe("failed")
  })

  test("strict mode succeeds when only a hinted relay is down", async () => {
    const accepting = await relay("accept")
    const down = await unusedRelayUrl()

    const report = await publish({ configured: [accepting.url], hinted: [down] }, { ackMode: "strict" })

    expect(report.verdict).toBe("accepted")
  })
})
