import { MalformedUrlError } from "../errors"

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"])

/**
 * Canonical string form of a URL, used as cache and storage key.
 *
 * Scheme and host are lower-cased and default ports dropped by WHATWG parsing.
 * The fragment is stripped, and a trailing slash is removed from every path
 * except the root. The query string is kept as given.
 */
export function normalizeUrl(input: string): string {
  const trimmed = input.trim()
  if (!trimmed) {
    throw new MalformedUrlError(input, "empty input")
  }

  let parsed: URL
  try {
    parsed = new URL(trimmed)
  } catch {
    throw new MalformedUrlError(input, "not an absolute URL")
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new MalformedUrlError(input, `unsupported scheme ${parsed.protocol}`)
  }

  if (!parsed.hostname) {
    throw new MalformedUrlError(input, "missing host")
  }

  if (parsed.username || parsed.password) {
    throw new MalformedUrlError(input, "embedded credentials are not allowed")
  }

  parsed.hash = ""
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname
  } catch {
    return null
  }
}

export function siteHost(host: string): string {
  return host.toLowerCase().replace(/^www\./, "")
}
