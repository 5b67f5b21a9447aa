import { createSilentLoggers } from "../../src/logger"
import { AnalysisCache } from "../../src/services/analysis-cache"
import { AnalysisPipeline, type PageFetcherLike } from "../../src/services/analysis-pipeline"
import { loadSignatureCatalog } from "../../src/services/signature-catalog"
import { UsageMetrics } from "../../src/services/usage-metrics"
import { PersistenceTier } from "../../src/storage/persistence-tier"
import type { FetchFailureCode, FetchResult } from "../../src/types"
import { MemoryStore } from "./memory-store"

export function page(url: string, body = "<html><body>ok</body></html>"): FetchResult {
  return {
    requestedUrl: url,
    finalUrl: url,
    redirectChain: [],
    status: 200,
    headers: [["content-type", "text/html"]],
    body,
    bodyTruncated: false,
    elapsedMs: 1,
    fetchedAt: 1_000,
    error: null,
  }
}

export function failedPage(url: string, code: FetchFailureCode): FetchResult {
  return {
    requestedUrl: url,
    finalUrl: url,
    redirectChain: [],
    status: null,
    headers: [],
    body: "",
    bodyTruncated: false,
    elapsedMs: 1,
    fetchedAt: 1_000,
    error: { code, message: `${code} for ${url}` },
  }
}

/** Counts calls per URL and delegates to `respond`. */
export function countingFetcher(
  respond: (url: string, signal?: AbortSignal) => Promise<FetchResult>,
): PageFetcherLike & { calls: Map<string, number> } {
  const calls = new Map<string, number>()
  return {
    calls,
    fetch(url, signal) {
      calls.set(url, (calls.get(url) ?? 0) + 1)
      return respond(url, signal)
    },
  }
}

export function createPipeline(fetcher: PageFetcherLike) {
  const store = new MemoryStore("mongo")
  const storage = new PersistenceTier(store, 1_000)
  const loggers = createSilentLoggers()
  const catalog = loadSignatureCatalog()
  const cache = new AnalysisCache(storage, loggers.app, { defaultTtlSeconds: 3_600 })
  const usage = new UsageMetrics(storage, loggers.app)
  const pipeline = new AnalysisPipeline({ fetcher, cache, catalogs: { current: catalog }, usage, loggers })

  return { store, storage, loggers, catalog, cache, usage, pipeline }
}
