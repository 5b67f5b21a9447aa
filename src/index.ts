export { loadConfig } from "./config"
export type { AppConfig, BatchSettings, FetchSettings, LogLevel, StorageSettings } from "./config"
export { createLoggers, createSilentLoggers } from "./logger"
export type { Loggers } from "./logger"
export {
  AnalysisError,
  BatchTooLargeError,
  ClassificationError,
  FetchError,
  FetchTimeoutError,
  MalformedUrlError,
  PersistenceError,
  TooManyRedirectsError,
} from "./errors"
export { AnalysisEngine } from "./engine"
export type { AnalyzeOutcome, BatchOutcome, EngineStats } from "./engine"
export { createRuntime } from "./runtime"
export type { Runtime, RuntimeDeps } from "./runtime"
export { normalizeUrl } from "./lib/url"
export { classify } from "./services/classifier"
export { compileCatalog, loadSignatureCatalog, CatalogProvider } from "./services/signature-catalog"
export type { SignatureCatalog, SignatureRule } from "./services/signature-catalog"
export type {
  BatchEvent,
  BatchJob,
  BatchProgress,
  BatchState,
  BatchSummary,
} from "./services/batch-coordinator"
export type {
  AnalysisRequest,
  AnalysisResult,
  Confidence,
  DenialReason,
  EntitlementDecision,
  EntitlementKind,
  EntitlementRecord,
  FetchFailure,
  FetchResult,
  GatewayFinding,
  RequesterContext,
  SecurityFindings,
  ThreatFindings,
} from "./types"
