import { hostOf, siteHost } from "../lib/url"
import type {
  AnalysisResult,
  Confidence,
  FetchResult,
  GatewayFinding,
  Indicator,
  RedirectFindings,
  SecurityFindings,
  ThreatFindings,
} from "../types"
import type { FindingKind, RuleTarget, SignatureCatalog } from "./signature-catalog"

const SCRIPT_SRC_RE = /<script\b[^>]*?\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi
const FORM_TAG_RE = /<form\b[^>]*>/gi
const FORM_ACTION_RE = /\baction\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i

const CONFIDENCE_RANK: Record<Confidence, number> = { low: 1, medium: 2, high: 3 }

interface PageView {
  finalUrl: string
  headers: Map<string, string[]>
  targets: Record<RuleTarget, string[]>
}

interface Aggregate {
  confidence: Confidence
  matchedRules: string[]
}

/**
 * Applies the catalog to one fetched page. Pure and total: the same fetch and
 * catalog always give the same result, and missing data reads as "not found".
 */
export function classify(fetched: FetchResult, catalog: SignatureCatalog): AnalysisResult {
  if (fetched.error) {
    return deepFreeze<AnalysisResult>({
      url: fetched.requestedUrl,
      finalUrl: fetched.finalUrl,
      status: "errored",
      httpStatus: null,
      gateways: [],
      security: null,
      threats: null,
      error: { ...fetched.error },
      catalogVersion: catalog.version,
      analyzedAt: fetched.fetchedAt,
      ttlSeconds: null,
    })
  }

  const page = buildPageView(fetched)
  const matches = evaluateRules(page, catalog)

  return deepFreeze<AnalysisResult>({
    url: fetched.requestedUrl,
    finalUrl: fetched.finalUrl,
    status: "scored",
    httpStatus: fetched.status,
    gateways: collectGateways(matches.gateway, catalog),
    security: inspectSecurity(page),
    threats: inspectThreats(page, fetched, matches, catalog),
    error: null,
    catalogVersion: catalog.version,
    analyzedAt: fetched.fetchedAt,
    ttlSeconds: null,
  })
}

function buildPageView(fetched: FetchResult): PageView {
  const headers = new Map<string, string[]>()
  for (const [name, value] of fetched.headers) {
    const key = name.toLowerCase()
    const existing = headers.get(key)
    if (existing) {
      existing.push(value)
    } else {
      headers.set(key, [value])
    }
  }

  return {
    finalUrl: fetched.finalUrl,
    headers,
    targets: {
      body: [fetched.body],
      script_src: extractScriptSources(fetched.body, fetched.finalUrl),
      final_url: [fetched.finalUrl],
      form_action: extractFormActions(fetched.body, fetched.finalUrl),
      header: fetched.headers.map(([name, value]) => `${name.toLowerCase()}: ${value}`),
    },
  }
}

function evaluateRules(
  page: PageView,
  catalog: SignatureCatalog,
): Record<FindingKind, Map<string, Aggregate>> {
  const matches: Record<FindingKind, Map<string, Aggregate>> = {
    gateway: new Map(),
    phishing: new Map(),
    malware: new Map(),
    fingerprinting: new Map(),
  }

  for (const rule of catalog.rules) {
    const hit = page.targets[rule.target].some((text) => rule.pattern.test(text))
    if (!hit) {
      continue
    }

    const bucket = matches[rule.finding]
    const key = rule.gateway ?? rule.finding
    const existing = bucket.get(key)
    if (!existing) {
      bucket.set(key, { confidence: rule.confidence, matchedRules: [rule.id] })
      continue
    }

    existing.matchedRules.push(rule.id)
    if (CONFIDENCE_RANK[rule.confidence] > CONFIDENCE_RANK[existing.confidence]) {
      existing.confidence = rule.confidence
    }
  }

  return matches
}

function collectGateways(matches: Map<string, Aggregate>, catalog: SignatureCatalog): GatewayFinding[] {
  return [...matches.entries()]
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([id, aggregate]) => ({
      id,
      name: catalog.gatewayNames.get(id) ?? id,
      confidence: aggregate.confidence,
      matchedRules: aggregate.matchedRules,
    }))
}

function inspectSecurity(page: PageView): SecurityFindings {
  const cookies = page.headers.get("set-cookie") ?? []
  const csp = page.headers.get("content-security-policy") ?? []

  const tls = page.finalUrl.startsWith("https:")

  return {
    tls,
    // browsers ignore the header on plain http
    hsts: tls && page.headers.has("strict-transport-security"),
    csp: csp.length > 0,
    secureCookies: cookies.length === 0 ? null : cookies.every((cookie) => /;\s*secure\s*(;|$)/i.test(cookie)),
    httpOnlyCookies: cookies.length === 0 ? null : cookies.every((cookie) => /;\s*httponly\s*(;|$)/i.test(cookie)),
    frameProtection:
      page.headers.has("x-frame-options") || csp.some((value) => /\bframe-ancestors\b/i.test(value)),
    xssProtection: page.headers.has("x-xss-protection"),
  }
}

function inspectThreats(
  page: PageView,
  fetched: FetchResult,
  matches: Record<FindingKind, Map<string, Aggregate>>,
  catalog: SignatureCatalog,
): ThreatFindings {
  return {
    phishing: toIndicator(matches.phishing.get("phishing")),
    malware: toIndicator(matches.malware.get("malware")),
    fingerprinting: toIndicator(matches.fingerprinting.get("fingerprinting")),
    insecureForm: page.targets.form_action.some((action) => action.startsWith("http:")),
    redirects: inspectRedirects(fetched, catalog.redirectHopThreshold),
  }
}

function toIndicator(aggregate: Aggregate | undefined): Indicator {
  if (!aggregate) {
    return { detected: false, confidence: null, matchedRules: [] }
  }

  return { detected: true, confidence: aggregate.confidence, matchedRules: aggregate.matchedRules }
}

function inspectRedirects(fetched: FetchResult, hopThreshold: number): RedirectFindings {
  const chain = [...fetched.redirectChain, fetched.finalUrl]
  let crossDomainHops = 0

  for (let index = 1; index < chain.length; index += 1) {
    const previous = hostOf(chain[index - 1] ?? "")
    const next = hostOf(chain[index] ?? "")
    if (previous === null || next === null || siteHost(previous) !== siteHost(next)) {
      crossDomainHops += 1
    }
  }

  const hops = fetched.redirectChain.length
  return {
    hops,
    crossDomainHops,
    suspicious: hops > hopThreshold || crossDomainHops > 0,
  }
}

function extractScriptSources(body: string, baseUrl: string): string[] {
  const sources: string[] = []
  for (const match of body.matchAll(SCRIPT_SRC_RE)) {
    const raw = (match[1] ?? match[2] ?? match[3] ?? "").trim()
    if (raw) {
      sources.push(resolveAgainst(raw, baseUrl))
    }
  }
  return sources
}

function extractFormActions(body: string, baseUrl: string): string[] {
  const actions: string[] = []
  for (const match of body.matchAll(FORM_TAG_RE)) {
    const action = FORM_ACTION_RE.exec(match[0])
    const raw = (action?.[1] ?? action?.[2] ?? action?.[3] ?? "").trim()
    actions.push(raw ? resolveAgainst(raw, baseUrl) : baseUrl)
  }
  return actions
}

function resolveAgainst(value: string, baseUrl: string): string {
  try {
    return new URL(value, baseUrl).toString()
  } catch {
    return value
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }
  return value
}
