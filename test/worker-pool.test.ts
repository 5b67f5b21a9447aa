import { describe, expect, test } from "vitest"
import { TaskCancelledError, WorkerPool } from "../src/services/worker-pool"

function deferred() {
  let release: () => void = () => {}
  const promise = new Promise<void>((resolve) => {
    release = resolve
  })
  return { promise, release }
}

describe("worker pool", () => {
  test("never runs more than the configured width at once", async () => {
    const pool = new WorkerPool({ concurrency: 2 })
    let running = 0
    let peak = 0

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((value) =>
        pool.schedule(async () => {
          running += 1
          peak = Math.max(peak, running)
          await new Promise((resolve) => setTimeout(resolve, 5))
          running -= 1
          return value * 10
        }),
      ),
    )

    expect(results).toEqual([10, 20, 30, 40, 50])
    expect(peak).toBe(2)
    expect(pool.activeCount).toBe(0)
  })

  test("drops queued tasks whose signal aborts", async () => {
    const pool = new WorkerPool({ concurrency: 1 })
    const gate = deferred()
    const controller = new AbortController()
    const started: string[] = []

    const first = pool.schedule(async () => {
      started.push("first")
      await gate.promise
      return "first"
    }, controller.signal)
    const second = pool.schedule(async () => {
      started.push("second")
      return "second"
    }, controller.signal)

    expect(pool.pendingCount).toBe(1)
    controller.abort()
    gate.release()

    await expect(second).rejects.toBeInstanceOf(TaskCancelledError)
    await expect(first).resolves.toBe("first")
    expect(started).toEqual(["first"])
    expect(pool.pendingCount).toBe(0)
  })

  test("rejects immediately when the signal is already aborted", async () => {
    const pool = new WorkerPool({ concurrency: 1 })

    await expect(pool.schedule(async () => 1, AbortSignal.abort())).rejects.toBeInstanceOf(TaskCancelledError)
  })

  test("passes task errors through and keeps draining", async () => {
    const pool = new WorkerPool({ concurrency: 1 })

    const failing = pool.schedule(async () => {
      throw new Error("boom")
    })
    const next = pool.schedule(async () => "after")

    await expect(failing).rejects.toThrow("boom")
    await expect(next).resolves.toBe("after")
  })
})
