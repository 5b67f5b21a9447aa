import { z } from "zod"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface FetchSettings {
  timeoutMs: number
  maxRedirects: number
  maxBodyBytes: number
  maxConnections: number
  allowPrivateHosts: boolean
  userAgent: string
}

export interface StorageSettings {
  mongoUrl: string
  preferLocal: boolean
  dbPath: string
  operationTimeoutMs: number
  connectTimeoutMs: number
  migrateOnStartup: boolean
}

export interface BatchSettings {
  concurrency: number
  maxUrls: number
  retryMax: number
}

export interface AppConfig {
  fetch: FetchSettings
  storage: StorageSettings
  batch: BatchSettings
  cacheTtlSeconds: number
  catalogPath: string | null
  logDir: string
  logLevel: LogLevel
  retentionSweepMs: number
}

const EnvSchema = z.object({
  PAYLENS_MONGO_URL: z.string().default(""),
  PAYLENS_PREFER_LOCAL_STORAGE: z.string().optional(),
  PAYLENS_DB_PATH: z.string().default("./data/paylens.db"),
  PAYLENS_LOG_DIR: z.string().default("./data/logs"),
  PAYLENS_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  PAYLENS_CACHE_TTL_SECONDS: z.string().optional(),
  PAYLENS_FETCH_TIMEOUT_SECONDS: z.string().optional(),
  PAYLENS_MAX_REDIRECTS: z.string().optional(),
  PAYLENS_MAX_BODY_BYTES: z.string().optional(),
  PAYLENS_MAX_CONNECTIONS: z.string().optional(),
  PAYLENS_ALLOW_PRIVATE_HOSTS: z.string().optional(),
  PAYLENS_WORKER_POOL_WIDTH: z.string().optional(),
  PAYLENS_BATCH_MAX_URLS: z.string().optional(),
  PAYLENS_BATCH_RETRY_MAX: z.string().optional(),
  PAYLENS_STORAGE_TIMEOUT_MS: z.string().optional(),
  PAYLENS_MONGO_CONNECT_TIMEOUT_MS: z.string().optional(),
  PAYLENS_MIGRATE_ON_STARTUP: z.string().optional(),
  PAYLENS_CATALOG_PATH: z.string().optional(),
  PAYLENS_USER_AGENT: z.string().default("paylens/0.1 (+url-inspection)"),
  PAYLENS_RETENTION_SWEEP_MINUTES: z.string().optional(),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)
  const catalogPath = parsed.PAYLENS_CATALOG_PATH?.trim()

  return {
    fetch: {
      timeoutMs: toMinInteger(parsed.PAYLENS_FETCH_TIMEOUT_SECONDS, 15, 1) * 1000,
      maxRedirects: toMinInteger(parsed.PAYLENS_MAX_REDIRECTS, 10, 0),
      maxBodyBytes: toMinInteger(parsed.PAYLENS_MAX_BODY_BYTES, 2_000_000, 1024),
      maxConnections: toMinInteger(parsed.PAYLENS_MAX_CONNECTIONS, 10, 1),
      allowPrivateHosts: toBoolean(parsed.PAYLENS_ALLOW_PRIVATE_HOSTS, false),
      userAgent: parsed.PAYLENS_USER_AGENT,
    },
    storage: {
      mongoUrl: parsed.PAYLENS_MONGO_URL.trim(),
      preferLocal: toBoolean(parsed.PAYLENS_PREFER_LOCAL_STORAGE, false),
      dbPath: parsed.PAYLENS_DB_PATH,
      operationTimeoutMs: toMinInteger(parsed.PAYLENS_STORAGE_TIMEOUT_MS, 5_000, 100),
      connectTimeoutMs: toMinInteger(parsed.PAYLENS_MONGO_CONNECT_TIMEOUT_MS, 3_000, 100),
      migrateOnStartup: toBoolean(parsed.PAYLENS_MIGRATE_ON_STARTUP, true),
    },
    batch: {
      concurrency: toMinInteger(parsed.PAYLENS_WORKER_POOL_WIDTH, 5, 1),
      maxUrls: toMinInteger(parsed.PAYLENS_BATCH_MAX_URLS, 50, 1),
      retryMax: toMinInteger(parsed.PAYLENS_BATCH_RETRY_MAX, 1, 0),
    },
    cacheTtlSeconds: toMinInteger(parsed.PAYLENS_CACHE_TTL_SECONDS, 3_600, 1),
    catalogPath: catalogPath ? catalogPath : null,
    logDir: parsed.PAYLENS_LOG_DIR,
    logLevel: parsed.PAYLENS_LOG_LEVEL,
    retentionSweepMs: toMinInteger(parsed.PAYLENS_RETENTION_SWEEP_MINUTES, 30, 1) * 60 * 1000,
  }
}
