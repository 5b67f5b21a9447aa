#!/usr/bin/env -S npx tsx
import { existsSync } from "node:fs"
import { loadConfig } from "../src/config"
import { createRuntime, type Runtime } from "../src/runtime"
import { SqliteStore } from "../src/storage/sqlite-store"
import type { RequesterContext } from "../src/types"

const ADMIN_REQUESTER = "paylens-admin"

function printUsage(): void {
  console.log(`Usage: npm run admin -- <command> [args]

Commands:
  grant <requester> <days>      Grant or extend an individual subscription
  revoke <requester>            Revoke an individual subscription
  approve-group <group>         Approve a group for analyses
  revoke-group <group>          Withdraw a group approval
  check <requester> [group]     Show the entitlement decision for a requester
  analyze <url...>              Analyze URLs as <requester> (--as <id>, --group <id>)
  stats                         Show storage counts and usage metrics
  vacuum                        Delete expired cache entries and subscriptions
  migrate                       Copy local records into networked storage
  --help                        Show this message
`)
}

function parsePositiveNumber(value: string | undefined, name: string): number {
  const parsed = Number(value)
  if (!value || !Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number`)
  }
  return parsed
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is required`)
  }
  return value
}

function parseAnalyzeArgs(argv: string[]): { requester: RequesterContext; urls: string[] } {
  let requesterId = ADMIN_REQUESTER
  let groupId: string | undefined
  const urls: string[] = []

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]
    if (arg === "--as") {
      requesterId = requireArg(argv[index + 1], "--as")
      index += 1
      continue
    }

    if (arg === "--group") {
      groupId = requireArg(argv[index + 1], "--group")
      index += 1
      continue
    }

    if (arg) {
      urls.push(arg)
    }
  }

  if (urls.length === 0) {
    throw new Error("analyze requires at least one URL")
  }

  return { requester: groupId === undefined ? { requesterId } : { requesterId, groupId }, urls }
}

async function analyze(runtime: Runtime, argv: string[]): Promise<void> {
  const { requester, urls } = parseAnalyzeArgs(argv)

  if (urls.length === 1 && urls[0]) {
    const outcome = await runtime.engine.analyze(urls[0], requester)
    if (outcome.kind === "denied") {
      console.log(`Denied: ${outcome.decision.reason}`)
      process.exitCode = 2
      return
    }
    console.log(JSON.stringify({ cached: outcome.cached, result: outcome.result }, null, 2))
    return
  }

  const outcome = await runtime.engine.analyzeBatch(urls, requester)
  if (outcome.kind === "denied") {
    console.log(`Denied: ${outcome.decision.reason}`)
    process.exitCode = 2
    return
  }

  for await (const event of outcome.job) {
    const detail = event.outcome === "succeeded" ? `${event.result.gateways.length} gateway(s)` : event.error.code
    console.log(
      `[${event.progress.completed}/${event.progress.submitted}] ${event.outcome} ${event.url} (${detail})`,
    )
  }

  const summary = await outcome.job.done
  console.log(`Batch ${summary.jobId} ${summary.state}`)
}

async function migrate(runtime: Runtime): Promise<void> {
  if (runtime.storage.backendKind !== "mongo") {
    console.log("Networked storage is not active; nothing to migrate")
    return
  }

  const dbPath = runtime.config.storage.dbPath
  if (!existsSync(dbPath)) {
    console.log(`No local database at ${dbPath}`)
    return
  }

  const local = new SqliteStore(dbPath)
  try {
    const imported = await runtime.storage.migrateFrom(local)
    console.log(
      `Migrated ${imported.cache} cache entries, ${imported.entitlements} entitlements, ${imported.metrics} metrics`,
    )
  } finally {
    await local.close()
  }
}

async function runCommand(runtime: Runtime, command: string, args: string[]): Promise<void> {
  const { engine, gate } = runtime

  switch (command) {
    case "grant": {
      const subject = requireArg(args[0], "requester")
      const record = await gate.grantSubscription(subject, parsePositiveNumber(args[1], "days"))
      console.log(`Subscription for ${subject} valid until ${new Date(record.expiresAt ?? 0).toISOString()}`)
      return
    }
    case "revoke":
      await gate.revokeSubscription(requireArg(args[0], "requester"))
      console.log("Subscription revoked")
      return
    case "approve-group":
      await gate.approveGroup(requireArg(args[0], "group"))
      console.log("Group approved")
      return
    case "revoke-group":
      await gate.revokeGroup(requireArg(args[0], "group"))
      console.log("Group approval revoked")
      return
    case "check": {
      const requesterId = requireArg(args[0], "requester")
      const decision = await engine.checkEntitlement(
        args[1] === undefined ? { requesterId } : { requesterId, groupId: args[1] },
      )
      console.log(decision.allowed ? `Allowed via ${decision.via}` : `Denied: ${decision.reason}`)
      return
    }
    case "analyze":
      await analyze(runtime, args)
      return
    case "stats":
      console.log(JSON.stringify(await engine.stats(), null, 2))
      return
    case "vacuum":
      console.log(`Removed ${await engine.vacuum()} expired record(s)`)
      return
    case "migrate":
      await migrate(runtime)
      return
    default:
      throw new Error(`Unknown command '${command}'`)
  }
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2)
  if (!command || command === "--help" || command === "-h") {
    printUsage()
    return
  }

  const runtime = await createRuntime(loadConfig(), { retentionSweep: false })
  try {
    await runCommand(runtime, command, args)
  } finally {
    await runtime.close()
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
