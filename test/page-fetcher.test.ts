import { describe, expect, test } from "vitest"
import { MalformedUrlError } from "../src/errors"
import { PageFetcher } from "../src/services/page-fetcher"
import { hangingRequest, makeFetchSettings, routeRequests } from "./helpers/fake-request"

describe("page fetcher", () => {
  test("follows redirects by hand and keeps the chain", async () => {
    const guarded: string[] = []
    const { request, calls } = routeRequests({
      "https://example.com/start": { status: 301, headers: { location: "/middle" } },
      "https://example.com/middle": { status: 302, headers: { location: "https://www.example.com/final#frag" } },
      "https://www.example.com/final": {
        headers: { "content-type": "text/html", "set-cookie": ["a=1; Secure", "b=2"] },
        body: "<html>ok</html>",
      },
    })

    const fetcher = new PageFetcher(makeFetchSettings(), {
      requestImpl: request,
      assertPublicHost: async (host) => {
        guarded.push(host)
      },
      now: () => 1_000,
    })

    const result = await fetcher.fetch("https://example.com/start")

    expect(result).toEqual({
      requestedUrl: "https://example.com/start",
      finalUrl: "https://www.example.com/final",
      redirectChain: ["https://example.com/start", "https://example.com/middle"],
      status: 200,
      headers: [
        ["content-type", "text/html"],
        ["set-cookie", "a=1; Secure"],
        ["set-cookie", "b=2"],
      ],
      body: "<html>ok</html>",
      bodyTruncated: false,
      elapsedMs: 0,
      fetchedAt: 1_000,
      error: null,
    })
    expect(guarded).toEqual(["example.com", "example.com", "www.example.com"])
    expect(calls[0]?.options.headers["user-agent"]).toBe("test-agent")
  })

  test("stops after the redirect limit", async () => {
    const { request } = routeRequests({
      "https://example.com/a": { status: 302, headers: { location: "/b" } },
      "https://example.com/b": { status: 302, headers: { location: "/a" } },
    })
    const fetcher = new PageFetcher(makeFetchSettings({ maxRedirects: 2 }), {
      requestImpl: request,
      assertPublicHost: async () => {},
    })

    const result = await fetcher.fetch("https://example.com/a")

    expect(result.status).toBeNull()
    expect(result.redirectChain).toEqual(["https://example.com/a", "https://example.com/b"])
    expect(result.error).toEqual({
      code: "TooManyRedirects",
      message: "Fetching https://example.com/a followed more than 2 redirects",
    })
  })

  test("reports a timeout distinctly from other failures", async () => {
    const fetcher = new PageFetcher(makeFetchSettings({ timeoutMs: 50 }), {
      requestImpl: hangingRequest,
      assertPublicHost: async () => {},
    })

    const result = await fetcher.fetch("https://slow.example.com/")

    expect(result.error).toEqual({
      code: "FetchTimeout",
      message: "Fetching https://slow.example.com/ exceeded 50ms",
    })
    expect(result.body).toBe("")
  })

  test("counts a slow host check against the fetch deadline", async () => {
    const { request, calls } = routeRequests({ "https://example.com/": { body: "late" } })
    const fetcher = new PageFetcher(makeFetchSettings({ timeoutMs: 50 }), {
      requestImpl: request,
      assertPublicHost: () => new Promise<void>((resolve) => setTimeout(resolve, 600)),
    })

    const started = Date.now()
    const result = await fetcher.fetch("https://example.com/")

    expect(Date.now() - started).toBeLessThan(500)
    expect(calls).toHaveLength(0)
    expect(result.status).toBeNull()
    expect(result.error).toEqual({
      code: "FetchTimeout",
      message: "Fetching https://example.com/ exceeded 50ms",
    })
  })

  test("stops a host check when the caller aborts", async () => {
    const fetcher = new PageFetcher(makeFetchSettings(), {
      requestImpl: routeRequests({}).request,
      assertPublicHost: () => new Promise<void>((resolve) => setTimeout(resolve, 600)),
    })
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 10)

    const result = await fetcher.fetch("https://example.com/", controller.signal)

    expect(result.error).toEqual({
      code: "FetchError",
      message: "Fetch of https://example.com/ was aborted",
      cause: "aborted",
    })
  })

  test("reports a caller abort as a fetch error", async () => {
    const fetcher = new PageFetcher(makeFetchSettings(), {
      requestImpl: hangingRequest,
      assertPublicHost: async () => {},
    })
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 10)

    const result = await fetcher.fetch("https://example.com/", controller.signal)

    expect(result.error).toEqual({
      code: "FetchError",
      message: "Fetch of https://example.com/ was aborted",
      cause: "aborted",
    })
  })

  test("truncates bodies at the byte limit", async () => {
    const { request } = routeRequests({
      "https://example.com/big": { body: ["hello ", "world and more"] },
    })
    const fetcher = new PageFetcher(makeFetchSettings({ maxBodyBytes: 10 }), {
      requestImpl: request,
      assertPublicHost: async () => {},
    })

    const result = await fetcher.fetch("https://example.com/big")

    expect(result.body).toBe("hello worl")
    expect(result.bodyTruncated).toBe(true)
    expect(result.error).toBeNull()
  })

  test("wraps transport errors", async () => {
    const { request } = routeRequests({})
    const fetcher = new PageFetcher(makeFetchSettings(), {
      requestImpl: request,
      assertPublicHost: async () => {},
    })

    const result = await fetcher.fetch("https://example.com/missing")

    expect(result.error).toEqual({
      code: "FetchError",
      message: "Fetch of https://example.com/missing failed",
      cause: "connect ECONNREFUSED for https://example.com/missing",
    })
  })

  test("refuses private hosts before connecting", async () => {
    const { request, calls } = routeRequests({})
    const fetcher = new PageFetcher(makeFetchSettings(), { requestImpl: request })

    const result = await fetcher.fetch("http://127.0.0.1/admin")

    expect(calls).toHaveLength(0)
    expect(result.error).toEqual({
      code: "FetchError",
      message: "Refused to fetch 127.0.0.1",
      cause: "Host 127.0.0.1 is not a public IP address",
    })
  })

  test("throws on malformed input", async () => {
    const fetcher = new PageFetcher(makeFetchSettings(), { requestImpl: routeRequests({}).request })

    await expect(fetcher.fetch("mailto:someone@example.com")).rejects.toBeInstanceOf(MalformedUrlError)
  })
})
