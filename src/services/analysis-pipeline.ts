import type { Loggers } from "../logger"
import { normalizeUrl } from "../lib/url"
import type { AnalysisRequest, AnalysisResult, FetchFailure, FetchResult, RequesterContext } from "../types"
import type { AnalysisCache } from "./analysis-cache"
import { classify } from "./classifier"
import type { CatalogSource } from "./signature-catalog"
import type { UsageMetrics } from "./usage-metrics"

export interface PageFetcherLike {
  fetch(url: string, signal?: AbortSignal): Promise<FetchResult>
}

export interface PipelineOutcome {
  result: AnalysisResult
  cached: boolean
}

interface AnalysisPipelineDeps {
  fetcher: PageFetcherLike
  cache: AnalysisCache
  catalogs: CatalogSource
  usage: UsageMetrics
  loggers: Loggers
  now?: () => number
}

/** Builds the immutable request for one submitted URL; malformed input throws. */
export function createAnalysisRequest(
  url: string,
  requester: RequesterContext,
  requestedAt = Date.now(),
): AnalysisRequest {
  return Object.freeze({
    url: normalizeUrl(url),
    requesterId: requester.requesterId,
    ...(requester.groupId === undefined ? {} : { groupId: requester.groupId }),
    requestedAt,
  })
}

export function isRetriableFailure(error: FetchFailure | null): boolean {
  return error?.code === "FetchError" || error?.code === "FetchTimeout"
}

/**
 * One URL, start to finish: cache lookup, then fetch, classify and cache
 * write on a miss. Failed fetches come back as errored results and are
 * never cached.
 */
export class AnalysisPipeline {
  private readonly now: () => number

  constructor(private readonly deps: AnalysisPipelineDeps) {
    this.now = deps.now ?? Date.now
  }

  async run(request: AnalysisRequest, signal?: AbortSignal): Promise<PipelineOutcome> {
    const catalog = this.deps.catalogs.current
    const hit = await this.deps.cache.get(request.url, catalog.version)
    if (hit) {
      await this.deps.usage.recordAnalysis(request.requesterId, true)
      return { result: hit, cached: true }
    }

    const fetched = await this.deps.fetcher.fetch(request.url, signal)
    const classified = classify(fetched, catalog)

    if (classified.status === "errored") {
      this.deps.loggers.app.warn(
        { url: request.url, error: classified.error, elapsedMs: fetched.elapsedMs },
        "fetch failed, result left unscored",
      )
      await this.deps.usage.recordAnalysis(request.requesterId, false)
      return { result: classified, cached: false }
    }

    this.auditThreats(request, classified)
    const stored = await this.deps.cache.put(request.url, classified)
    await this.deps.usage.recordAnalysis(request.requesterId, false)

    this.deps.loggers.app.info(
      {
        url: request.url,
        httpStatus: classified.httpStatus,
        gateways: classified.gateways.map((gateway) => gateway.id),
        elapsedMs: fetched.elapsedMs,
        durationMs: this.now() - request.requestedAt,
      },
      "url analyzed",
    )

    return { result: stored, cached: false }
  }

  private auditThreats(request: AnalysisRequest, result: AnalysisResult): void {
    const threats = result.threats
    if (!threats) {
      return
    }

    const flags = [
      ...(threats.phishing.detected ? threats.phishing.matchedRules : []),
      ...(threats.malware.detected ? threats.malware.matchedRules : []),
      ...(threats.insecureForm ? ["insecure_form"] : []),
      ...(threats.redirects.suspicious ? ["suspicious_redirect"] : []),
    ]

    if (flags.length > 0) {
      this.deps.loggers.audit.warn(
        { url: request.url, finalUrl: result.finalUrl, requesterId: request.requesterId, flags },
        "threat indicators detected",
      )
    }
  }
}
