import { createHash } from "node:crypto"
import { readFileSync } from "node:fs"
import { z } from "zod"
import { ClassificationError } from "../errors"
import type { Confidence } from "../types"

export type FindingKind = "gateway" | "phishing" | "malware" | "fingerprinting"
export type RuleTarget = "body" | "script_src" | "final_url" | "form_action" | "header"

export const BUNDLED_CATALOG_URL = new URL("./signatures.json", import.meta.url)

const ConfidenceSchema = z.enum(["high", "medium", "low"])

const RuleSchema = z.object({
  id: z.string().min(1),
  finding: z.enum(["gateway", "phishing", "malware", "fingerprinting"]),
  gateway: z.string().min(1).optional(),
  target: z.enum(["body", "script_src", "final_url", "form_action", "header"]),
  pattern: z.string().min(1),
  // "g" and "y" make RegExp#test stateful
  flags: z.string().regex(/^[imsu]*$/).default("i"),
  confidence: ConfidenceSchema,
})

const CatalogSchema = z.object({
  version: z.string().min(1),
  redirectHopThreshold: z.number().int().min(0).default(3),
  gateways: z.array(z.object({ id: z.string().min(1), name: z.string().min(1) })),
  rules: z.array(RuleSchema),
})

export type CatalogDefinition = z.infer<typeof CatalogSchema>

export interface SignatureRule {
  id: string
  finding: FindingKind
  gateway: string | null
  target: RuleTarget
  pattern: RegExp
  confidence: Confidence
}

export interface SignatureCatalog {
  version: string
  redirectHopThreshold: number
  gatewayNames: ReadonlyMap<string, string>
  rules: readonly SignatureRule[]
}

/**
 * Validates a catalog definition and compiles its patterns. Any problem with
 * the definition is catalog corruption and raises ClassificationError.
 */
export function compileCatalog(input: unknown): SignatureCatalog {
  const parsed = CatalogSchema.safeParse(input)
  if (!parsed.success) {
    throw new ClassificationError(`Invalid signature catalog: ${parsed.error.message}`)
  }

  const definition = parsed.data
  const gatewayNames = new Map<string, string>()
  for (const gateway of definition.gateways) {
    if (gatewayNames.has(gateway.id)) {
      throw new ClassificationError(`Duplicate gateway id '${gateway.id}'`)
    }
    gatewayNames.set(gateway.id, gateway.name)
  }

  const seen = new Set<string>()
  const rules: SignatureRule[] = []
  for (const rule of definition.rules) {
    if (seen.has(rule.id)) {
      throw new ClassificationError(`Duplicate rule id '${rule.id}'`)
    }
    seen.add(rule.id)

    if (rule.finding === "gateway") {
      if (!rule.gateway || !gatewayNames.has(rule.gateway)) {
        throw new ClassificationError(`Rule '${rule.id}' references unknown gateway '${rule.gateway ?? ""}'`)
      }
    } else if (rule.gateway) {
      throw new ClassificationError(`Rule '${rule.id}' is not a gateway rule but names a gateway`)
    }

    let pattern: RegExp
    try {
      pattern = new RegExp(rule.pattern, rule.flags)
    } catch (error) {
      throw new ClassificationError(`Rule '${rule.id}' has an invalid pattern`, { cause: error })
    }

    rules.push({
      id: rule.id,
      finding: rule.finding,
      gateway: rule.gateway ?? null,
      target: rule.target,
      pattern,
      confidence: rule.confidence,
    })
  }

  const digest = createHash("sha256").update(JSON.stringify(definition)).digest("hex").slice(0, 12)

  return {
    version: `${definition.version}+${digest}`,
    redirectHopThreshold: definition.redirectHopThreshold,
    gatewayNames,
    rules,
  }
}

export function loadSignatureCatalog(path: string | URL = BUNDLED_CATALOG_URL): SignatureCatalog {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, "utf8"))
  } catch (error) {
    throw new ClassificationError(`Could not read signature catalog from ${String(path)}`, { cause: error })
  }

  return compileCatalog(raw)
}

export interface CatalogSource {
  readonly current: SignatureCatalog
}

/** Holds the active catalog; `reload` swaps it atomically. */
export class CatalogProvider implements CatalogSource {
  private catalog: SignatureCatalog

  constructor(private readonly path: string | URL = BUNDLED_CATALOG_URL) {
    this.catalog = loadSignatureCatalog(path)
  }

  get current(): SignatureCatalog {
    return this.catalog
  }

  reload(): SignatureCatalog {
    this.catalog = loadSignatureCatalog(this.path)
    return this.catalog
  }
}
