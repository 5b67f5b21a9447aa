export type FetchFailureCode = "FetchTimeout" | "TooManyRedirects" | "FetchError";

export interface FetchFailure {
  code: FetchFailureCode;
  message: string;
  cause?: string;
}

export type HeaderEntry = readonly [name: string, value: string];

export interface FetchResult {
  requestedUrl: string;
  finalUrl: string;
  redirectChain: string[];
  status: number | null;
  headers: HeaderEntry[];
  body: string;
  bodyTruncated: boolean;
  elapsedMs: number;
  fetchedAt: number;
  error: FetchFailure | null;
}

export type Confidence = "high" | "medium" | "low";

export interface GatewayFinding {
  id: string;
  name: string;
  confidence: Confidence;
  matchedRules: string[];
}

export interface Indicator {
  detected: boolean;
  confidence: Confidence | null;
  matchedRules: string[];
}

export interface SecurityFindings {
  tls: boolean;
  hsts: boolean;
  csp: boolean;
  secureCookies: boolean | null;
  httpOnlyCookies: boolean | null;
  frameProtection: boolean;
  xssProtection: boolean;
}

export interface RedirectFindings {
  hops: number;
  crossDomainHops: number;
  suspicious: boolean;
}

export interface ThreatFindings {
  phishing: Indicator;
  malware: Indicator;
  fingerprinting: Indicator;
  insecureForm: boolean;
  redirects: RedirectFindings;
}

export interface AnalysisResult {
  readonly url: string;
  readonly finalUrl: string | null;
  readonly status: "scored" | "errored";
  readonly httpStatus: number | null;
  readonly gateways: readonly GatewayFinding[];
  readonly security: SecurityFindings | null;
  readonly threats: ThreatFindings | null;
  readonly error: FetchFailure | null;
  readonly catalogVersion: string;
  readonly analyzedAt: number;
  readonly ttlSeconds: number | null;
}

export interface CacheEntry {
  key: string;
  result: AnalysisResult;
  storedAt: number;
  ttlSeconds: number;
}

export type EntitlementKind = "individual-subscription" | "group-approval";

export interface EntitlementRecord {
  subject: string;
  kind: EntitlementKind;
  expiresAt: number | null;
  grantedAt: number;
}

export interface RequesterContext {
  requesterId: string;
  groupId?: string;
}

export interface AnalysisRequest {
  readonly url: string;
  readonly requesterId: string;
  readonly groupId?: string;
  readonly requestedAt: number;
}

export type DenialReason = "NoSubscription" | "SubscriptionExpired" | "GroupNotApproved";

export type EntitlementDecision =
  | { allowed: true; via: EntitlementKind }
  | { allowed: false; reason: DenialReason };
