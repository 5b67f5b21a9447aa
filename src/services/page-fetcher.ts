import { Agent, request } from "undici"
import type { FetchSettings } from "../config"
import {
  FetchError,
  FetchTimeoutError,
  TooManyRedirectsError,
  toFetchFailure,
} from "../errors"
import { assertPublicHost as assertPublicHostDefault } from "../lib/network"
import { normalizeUrl } from "../lib/url"
import type { FetchResult, HeaderEntry } from "../types"

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])

export interface RawBody extends AsyncIterable<Uint8Array> {
  dump(): Promise<void>
}

export type RawHeaders = Record<string, string | string[] | undefined>

export interface RawResponse {
  statusCode: number
  headers: RawHeaders
  body: RawBody
}

export interface RawRequestOptions {
  method: "GET"
  headers: Record<string, string>
  signal: AbortSignal
}

export type RequestLike = (url: string, options: RawRequestOptions) => Promise<RawResponse>

interface PageFetcherDeps {
  requestImpl?: RequestLike
  assertPublicHost?: (host: string) => Promise<void>
  now?: () => number
}

export class PageFetcher {
  private readonly agent: Agent | null
  private readonly requestImpl: RequestLike
  private readonly assertPublicHost: (host: string) => Promise<void>
  private readonly now: () => number

  constructor(
    private readonly settings: FetchSettings,
    deps: PageFetcherDeps = {},
  ) {
    if (deps.requestImpl) {
      this.agent = null
      this.requestImpl = deps.requestImpl
    } else {
      const agent = new Agent({
        connections: settings.maxConnections,
        connectTimeout: settings.timeoutMs,
      })
      this.agent = agent
      this.requestImpl = (url, options) => request(url, { ...options, dispatcher: agent })
    }
    this.assertPublicHost = deps.assertPublicHost ?? assertPublicHostDefault
    this.now = deps.now ?? Date.now
  }

  /**
   * Retrieves `url`, following redirects by hand so the full chain is kept.
   * Malformed input throws; every other failure is reported in `error`.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
    const requestedUrl = normalizeUrl(url)
    const started = this.now()
    const deadline = AbortSignal.timeout(this.settings.timeoutMs)
    const combined = signal ? AbortSignal.any([deadline, signal]) : deadline
    const redirectChain: string[] = []
    let current = requestedUrl

    try {
      for (let hop = 0; ; hop += 1) {
        if (!this.settings.allowPrivateHosts) {
          await this.guardHost(current, combined)
        }

        const response = await this.requestImpl(current, {
          method: "GET",
          headers: {
            "user-agent": this.settings.userAgent,
            "accept": "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5",
          },
          signal: combined,
        })

        const location = firstHeader(response.headers.location)
        if (REDIRECT_STATUSES.has(response.statusCode) && location) {
          await response.body.dump()
          if (hop >= this.settings.maxRedirects) {
            throw new TooManyRedirectsError(requestedUrl, this.settings.maxRedirects)
          }

          redirectChain.push(current)
          current = resolveLocation(location, current)
          continue
        }

        const { body, truncated } = await readBodyWithLimit(response.body, this.settings.maxBodyBytes)
        return {
          requestedUrl,
          finalUrl: current,
          redirectChain,
          status: response.statusCode,
          headers: flattenHeaders(response.headers),
          body,
          bodyTruncated: truncated,
          elapsedMs: this.now() - started,
          fetchedAt: started,
          error: null,
        }
      }
    } catch (error) {
      const failure = deadline.aborted
        ? new FetchTimeoutError(requestedUrl, this.settings.timeoutMs)
        : asFetchError(requestedUrl, error, signal)

      return {
        requestedUrl,
        finalUrl: current,
        redirectChain,
        status: null,
        headers: [],
        body: "",
        bodyTruncated: false,
        elapsedMs: this.now() - started,
        fetchedAt: started,
        error: toFetchFailure(failure),
      }
    }
  }

  async close(): Promise<void> {
    await this.agent?.close()
  }

  /** The lookup counts against the fetch deadline and honours the caller's abort. */
  private async guardHost(url: string, signal: AbortSignal): Promise<void> {
    const { hostname } = new URL(url)
    signal.throwIfAborted()

    const check = this.assertPublicHost(hostname).catch((error: unknown) => {
      throw new FetchError(url, `Refused to fetch ${hostname}`, { cause: error })
    })
    let onAbort = () => {}
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(signal.reason)
      signal.addEventListener("abort", onAbort, { once: true })
    })

    try {
      await Promise.race([check, aborted])
    } finally {
      signal.removeEventListener("abort", onAbort)
    }
  }
}

function asFetchError(url: string, error: unknown, signal: AbortSignal | undefined): Error {
  if (error instanceof TooManyRedirectsError || error instanceof FetchError) {
    return error
  }

  if (signal?.aborted) {
    return new FetchError(url, `Fetch of ${url} was aborted`, { cause: "aborted" })
  }

  return new FetchError(url, `Fetch of ${url} failed`, { cause: error })
}

function resolveLocation(location: string, base: string): string {
  let next: URL
  try {
    next = new URL(location, base)
  } catch (error) {
    throw new FetchError(base, `Invalid redirect location '${location}'`, { cause: error })
  }

  if (next.protocol !== "http:" && next.protocol !== "https:") {
    throw new FetchError(base, `Redirect to unsupported scheme ${next.protocol}`)
  }

  next.hash = ""
  return next.toString()
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

function flattenHeaders(headers: RawHeaders): HeaderEntry[] {
  const entries: HeaderEntry[] = []
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue
    }

    const key = name.toLowerCase()
    if (Array.isArray(value)) {
      for (const item of value) {
        entries.push([key, item])
      }
    } else {
      entries.push([key, value])
    }
  }

  return entries
}

async function readBodyWithLimit(
  body: RawBody,
  maxBytes: number,
): Promise<{ body: string; truncated: boolean }> {
  let total = 0
  let truncated = false
  const chunks: Uint8Array[] = []

  for await (const chunk of body) {
    const remaining = maxBytes - total
    if (chunk.byteLength > remaining) {
      chunks.push(chunk.subarray(0, remaining))
      total += remaining
      truncated = true
      break
    }

    chunks.push(chunk)
    total += chunk.byteLength
  }

  const merged = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    merged.set(chunk, offset)
    offset += chunk.byteLength
  }

  return { body: new TextDecoder().decode(merged), truncated }
}
