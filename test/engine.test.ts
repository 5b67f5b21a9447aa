import { afterEach, describe, expect, test } from "vitest"
import { MalformedUrlError } from "../src/errors"
import { createSilentLoggers } from "../src/logger"
import { createRuntime, type Runtime } from "../src/runtime"
import { makeConfig } from "./helpers/fake-request"
import type { FetchResult } from "../src/types"
import { countingFetcher, page } from "./helpers/pipeline"

const CHECKOUT = `<script src="https://www.paypal.com/sdk/js?client-id=test"></script>`

type Respond = (url: string) => Promise<FetchResult>

function fakeFetcher(respond: Respond = async (url) => page(url, CHECKOUT)) {
  const base = countingFetcher(respond)
  const state = { closed: 0 }
  return Object.assign(base, {
    state,
    async close() {
      state.closed += 1
    },
  })
}

const runtimes: Runtime[] = []

async function start(env: Record<string, string> = {}, connectRemote?: () => Promise<never>, respond?: Respond) {
  const fetcher = fakeFetcher(respond)
  const runtime = await createRuntime(makeConfig(env), {
    loggers: createSilentLoggers(),
    fetcher,
    retentionSweep: false,
    ...(connectRemote ? { connectRemote } : {}),
  })
  runtimes.push(runtime)
  return { runtime, engine: runtime.engine, fetcher }
}

afterEach(async () => {
  for (const runtime of runtimes.splice(0)) {
    await runtime.close()
  }
})

describe("analysis engine", () => {
  test("denies requesters without an entitlement before fetching", async () => {
    const { engine, fetcher } = await start()

    expect(await engine.analyze("https://example.com/checkout", { requesterId: "bob" })).toEqual({
      kind: "denied",
      decision: { allowed: false, reason: "NoSubscription" },
    })
    expect(await engine.analyzeBatch(["https://example.com/"], { requesterId: "bob", groupId: "team-9" })).toEqual({
      kind: "denied",
      decision: { allowed: false, reason: "GroupNotApproved" },
    })
    expect(fetcher.calls.size).toBe(0)
  })

  test("analyzes for subscribers and caches the result", async () => {
    const { runtime, engine, fetcher } = await start()
    await runtime.gate.grantSubscription("alice", 30)

    const first = await engine.analyze("https://example.com/checkout/", { requesterId: "alice" })
    const second = await engine.analyze("https://example.com/checkout", { requesterId: "alice" })

    expect(first.kind).toBe("analyzed")
    expect(first.kind === "analyzed" ? first.result.gateways.map((gateway) => gateway.id) : []).toEqual(["paypal"])
    expect(first.kind === "analyzed" ? first.cached : null).toBe(false)
    expect(second.kind === "analyzed" ? second.cached : null).toBe(true)
    expect(fetcher.calls.get("https://example.com/checkout")).toBe(1)
  })

  test("accepts batches from approved groups", async () => {
    const { runtime, engine } = await start()
    await runtime.gate.approveGroup("team-1")

    const outcome = await engine.analyzeBatch(
      ["https://a.example.com/", "https://b.example.com/"],
      { requesterId: "bob", groupId: "team-1" },
    )

    expect(outcome.kind).toBe("accepted")
    const summary = outcome.kind === "accepted" ? await outcome.job.done : null
    expect(summary?.state).toBe("completed")
    expect(summary?.progress.succeeded).toBe(2)
  })

  test("single analyses share the worker pool width", async () => {
    let inFlight = 0
    let peak = 0
    const { runtime, engine } = await start({ PAYLENS_WORKER_POOL_WIDTH: "2" }, undefined, async (url) => {
      inFlight += 1
      peak = Math.max(peak, inFlight)
      await new Promise((resolve) => setTimeout(resolve, 5))
      inFlight -= 1
      return page(url)
    })
    await runtime.gate.grantSubscription("alice", 30)

    const urls = Array.from({ length: 8 }, (_, index) => `https://host-${index}.example.com/`)
    const outcomes = await Promise.all(urls.map((url) => engine.analyze(url, { requesterId: "alice" })))

    expect(outcomes.every((outcome) => outcome.kind === "analyzed")).toBe(true)
    expect(peak).toBe(2)
  })

  test("rejects malformed URLs for entitled requesters", async () => {
    const { runtime, engine } = await start()
    await runtime.gate.grantSubscription("alice", 1)

    await expect(engine.analyze("not a url", { requesterId: "alice" })).rejects.toBeInstanceOf(MalformedUrlError)
  })

  test("reports storage and usage statistics", async () => {
    const { runtime, engine } = await start()
    await runtime.gate.grantSubscription("alice", 30)
    await engine.analyze("https://example.com/", { requesterId: "alice" })

    const stats = await engine.stats()

    expect(stats.storage).toEqual({
      backend: "sqlite",
      cacheEntries: 1,
      subscriptions: 1,
      approvedGroups: 0,
      metrics: 2,
    })
    expect(stats.metrics.map((metric) => `${metric.name}=${metric.value}`)).toEqual([
      "analyses.requester.alice=1",
      "analyses.total=1",
    ])
    expect(stats.fallbackUsed).toBe(false)
    expect(stats.catalogVersion).toMatch(/^2026\.10\.1\+/)
    expect(await engine.vacuum()).toBe(0)
    expect(engine.reloadCatalog()).toBe(stats.catalogVersion)
  })

  test("falls back to local storage when the networked store is down", async () => {
    const { engine } = await start({ PAYLENS_PREFER_LOCAL_STORAGE: "false", PAYLENS_MONGO_URL: "mongodb://db.invalid/paylens" }, async () => {
      throw new Error("connection refused")
    })

    const stats = await engine.stats()
    expect(stats.storage.backend).toBe("sqlite")
    expect(stats.fallbackUsed).toBe(true)
  })

  test("closes the fetcher once", async () => {
    const { runtime, fetcher } = await start()

    await runtime.close()
    await runtime.close()

    expect(fetcher.state.closed).toBe(1)
  })
})
