import { expect, test } from "vitest"
import { loadConfig } from "../src/config"

test("uses local defaults when nothing is set", () => {
  const config = loadConfig({})

  expect(config.storage.mongoUrl).toBe("")
  expect(config.storage.preferLocal).toBe(false)
  expect(config.storage.dbPath).toBe("./data/paylens.db")
  expect(config.storage.operationTimeoutMs).toBe(5000)
  expect(config.storage.connectTimeoutMs).toBe(3000)
  expect(config.storage.migrateOnStartup).toBe(true)
  expect(config.fetch.timeoutMs).toBe(15000)
  expect(config.fetch.maxRedirects).toBe(10)
  expect(config.fetch.maxBodyBytes).toBe(2_000_000)
  expect(config.fetch.maxConnections).toBe(10)
  expect(config.fetch.allowPrivateHosts).toBe(false)
  expect(config.batch).toEqual({ concurrency: 5, maxUrls: 50, retryMax: 1 })
  expect(config.cacheTtlSeconds).toBe(3600)
  expect(config.catalogPath).toBeNull()
  expect(config.logLevel).toBe("info")
  expect(config.retentionSweepMs).toBe(30 * 60 * 1000)
})

test("parses PAYLENS settings", () => {
  const config = loadConfig({
    PAYLENS_MONGO_URL: " mongodb://localhost:27017/paylens ",
    PAYLENS_PREFER_LOCAL_STORAGE: "yes",
    PAYLENS_FETCH_TIMEOUT_SECONDS: "4",
    PAYLENS_WORKER_POOL_WIDTH: "2",
    PAYLENS_BATCH_RETRY_MAX: "0",
    PAYLENS_MIGRATE_ON_STARTUP: "off",
    PAYLENS_CATALOG_PATH: "/etc/paylens/signatures.json",
    PAYLENS_LOG_LEVEL: "debug",
  })

  expect(config.storage.mongoUrl).toBe("mongodb://localhost:27017/paylens")
  expect(config.storage.preferLocal).toBe(true)
  expect(config.storage.migrateOnStartup).toBe(false)
  expect(config.fetch.timeoutMs).toBe(4000)
  expect(config.batch.concurrency).toBe(2)
  expect(config.batch.retryMax).toBe(0)
  expect(config.catalogPath).toBe("/etc/paylens/signatures.json")
  expect(config.logLevel).toBe("debug")
})

test("clamps out-of-range integers and ignores garbage", () => {
  const config = loadConfig({
    PAYLENS_WORKER_POOL_WIDTH: "0",
    PAYLENS_MAX_BODY_BYTES: "12",
    PAYLENS_CACHE_TTL_SECONDS: "not-a-number",
    PAYLENS_ALLOW_PRIVATE_HOSTS: "maybe",
  })

  expect(config.batch.concurrency).toBe(1)
  expect(config.fetch.maxBodyBytes).toBe(1024)
  expect(config.cacheTtlSeconds).toBe(3600)
  expect(config.fetch.allowPrivateHosts).toBe(false)
})

test("rejects unknown log levels", () => {
  expect(() => loadConfig({ PAYLENS_LOG_LEVEL: "loud" })).toThrow()
})
