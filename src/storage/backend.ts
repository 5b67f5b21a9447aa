import { z } from "zod"
import type { AnalysisResult, CacheEntry, EntitlementKind, EntitlementRecord } from "../types"

export type BackendKind = "mongo" | "sqlite"

export interface MetricRecord {
  name: string
  value: number
  updatedAt: number
}

export interface RecordDump {
  cache: CacheEntry[]
  entitlements: EntitlementRecord[]
  metrics: MetricRecord[]
}

export interface ImportCounts {
  cache: number
  entitlements: number
  metrics: number
}

export interface StorageStats {
  backend: BackendKind
  cacheEntries: number
  subscriptions: number
  approvedGroups: number
  metrics: number
}

/**
 * Storage contract shared by the networked and the file-backed stores.
 * Single-key writes are atomic; a cache write replaces any prior entry.
 */
export interface StorageBackend {
  readonly kind: BackendKind
  readCache(key: string): Promise<CacheEntry | null>
  writeCache(entry: CacheEntry): Promise<void>
  deleteCache(key: string): Promise<void>
  readEntitlement(subject: string, kind: EntitlementKind): Promise<EntitlementRecord | null>
  writeEntitlement(record: EntitlementRecord): Promise<void>
  deleteEntitlement(subject: string, kind: EntitlementKind): Promise<void>
  incrementMetric(name: string, by: number, now: number): Promise<void>
  readMetrics(): Promise<MetricRecord[]>
  stats(): Promise<StorageStats>
  /** Removes expired cache entries and lapsed subscriptions; returns how many went. */
  vacuum(now: number): Promise<number>
  exportRecords(): Promise<RecordDump>
  /** Inserts records whose key is absent; existing keys are left untouched. */
  importMissing(dump: RecordDump): Promise<ImportCounts>
  close(): Promise<void>
}

const ConfidenceSchema = z.enum(["high", "medium", "low"])

const IndicatorSchema = z.object({
  detected: z.boolean(),
  confidence: ConfidenceSchema.nullable(),
  matchedRules: z.array(z.string()),
})

const FetchFailureSchema = z.object({
  code: z.enum(["FetchTimeout", "TooManyRedirects", "FetchError"]),
  message: z.string(),
  cause: z.string().optional(),
})

const AnalysisResultSchema = z.object({
  url: z.string(),
  finalUrl: z.string().nullable(),
  status: z.enum(["scored", "errored"]),
  httpStatus: z.number().int().nullable(),
  gateways: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      confidence: ConfidenceSchema,
      matchedRules: z.array(z.string()),
    }),
  ),
  security: z
    .object({
      tls: z.boolean(),
      hsts: z.boolean(),
      csp: z.boolean(),
      secureCookies: z.boolean().nullable(),
      httpOnlyCookies: z.boolean().nullable(),
      frameProtection: z.boolean(),
      xssProtection: z.boolean(),
    })
    .nullable(),
  threats: z
    .object({
      phishing: IndicatorSchema,
      malware: IndicatorSchema,
      fingerprinting: IndicatorSchema,
      insecureForm: z.boolean(),
      redirects: z.object({
        hops: z.number().int(),
        crossDomainHops: z.number().int(),
        suspicious: z.boolean(),
      }),
    })
    .nullable(),
  error: FetchFailureSchema.nullable(),
  catalogVersion: z.string(),
  analyzedAt: z.number(),
  ttlSeconds: z.number().nullable(),
})

export function encodeResult(result: AnalysisResult): string {
  return JSON.stringify(result)
}

export function decodeResult(json: string): AnalysisResult {
  return AnalysisResultSchema.parse(JSON.parse(json))
}
