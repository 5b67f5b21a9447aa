import type pino from "pino"
import type { PersistenceTier } from "../storage/persistence-tier"
import type { EntitlementDecision, EntitlementRecord } from "../types"

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Decides whether a requester may run analyses. An unexpired individual
 * subscription or an approved group each suffice. Storage errors propagate.
 */
export class EntitlementGate {
  constructor(
    private readonly storage: PersistenceTier,
    private readonly audit: pino.Logger,
    private readonly now: () => number = Date.now,
  ) {}

  async authorize(requesterId: string, groupId?: string): Promise<EntitlementDecision> {
    const subscription = await this.storage.readEntitlement(requesterId, "individual-subscription")
    const current = this.now()

    if (subscription && subscription.expiresAt !== null && subscription.expiresAt > current) {
      return this.record(requesterId, groupId, { allowed: true, via: "individual-subscription" })
    }

    if (groupId !== undefined) {
      const approval = await this.storage.readEntitlement(groupId, "group-approval")
      if (approval) {
        return this.record(requesterId, groupId, { allowed: true, via: "group-approval" })
      }

      return this.record(requesterId, groupId, { allowed: false, reason: "GroupNotApproved" })
    }

    if (subscription) {
      return this.record(requesterId, groupId, { allowed: false, reason: "SubscriptionExpired" })
    }

    return this.record(requesterId, groupId, { allowed: false, reason: "NoSubscription" })
  }

  async grantSubscription(subject: string, days: number): Promise<EntitlementRecord> {
    if (!Number.isFinite(days) || days <= 0) {
      throw new Error("Subscription length must be a positive number of days")
    }

    const grantedAt = this.now()
    const existing = await this.storage.readEntitlement(subject, "individual-subscription")
    // renewals extend an active subscription rather than restarting it
    const base = existing?.expiresAt && existing.expiresAt > grantedAt ? existing.expiresAt : grantedAt
    const record: EntitlementRecord = {
      subject,
      kind: "individual-subscription",
      expiresAt: base + Math.round(days * DAY_MS),
      grantedAt,
    }

    await this.storage.writeEntitlement(record)
    this.audit.info({ subject, expiresAt: record.expiresAt }, "subscription granted")
    return record
  }

  async revokeSubscription(subject: string): Promise<void> {
    await this.storage.deleteEntitlement(subject, "individual-subscription")
    this.audit.info({ subject }, "subscription revoked")
  }

  async approveGroup(groupId: string): Promise<EntitlementRecord> {
    const record: EntitlementRecord = {
      subject: groupId,
      kind: "group-approval",
      expiresAt: null,
      grantedAt: this.now(),
    }

    await this.storage.writeEntitlement(record)
    this.audit.info({ groupId }, "group approved")
    return record
  }

  async revokeGroup(groupId: string): Promise<void> {
    await this.storage.deleteEntitlement(groupId, "group-approval")
    this.audit.info({ groupId }, "group approval revoked")
  }

  private record(
    requesterId: string,
    groupId: string | undefined,
    decision: EntitlementDecision,
  ): EntitlementDecision {
    if (decision.allowed) {
      this.audit.debug({ requesterId, groupId, via: decision.via }, "entitlement granted")
    } else {
      this.audit.info({ requesterId, groupId, reason: decision.reason }, "entitlement denied")
    }
    return decision
  }
}
