import { v4 as uuidv4 } from "uuid";
import {
  LIVE_QUEUE_STATUSES,
  getLevelRules,
  type ApplicationKind,
  type ApplicationRecord,
  type ProgramRules,
  type QueueEntryRecord,
  type QueueEntryStatus,
  type QueueFilter,
  type ReviewLevelRules,
} from "@flockreview/shared";
import type { AuditLog } from "./audit-chain";
import {
  AlreadyClaimedError,
  InvalidStateError,
  NotClaimedByCallerError,
  ProgramRulesError,
  QueueEntryNotFoundError,
} from "./errors";
import { logInfo } from "./logger";
import { recordClaimConflict } from "./observability/metrics";
import { canReview, type ReviewerResolver } from "./policy";
import { compareRankedEntries, rankApplication, type RankedEntry } from "./priority";
import type { ProgramRulesProvider } from "./program-rules";
import type { QueueEntryQuery, ReviewRepository, ReviewTransaction } from "./repository";
import { computeSlaDeadline } from "./sla";

export interface QueueStatistics {
  reviewLevel: number | null;
  total: number;
  pending: number;
  claimed: number;
  inProgress: number;
  overdue: number;
}

export interface QueueManagerDeps {
  repository: ReviewRepository;
  rulesProvider: ProgramRulesProvider;
  audit: AuditLog;
  /** Needed only by levels that auto-assign. */
  reviewerResolver?: ReviewerResolver;
  now?: () => Date;
}

/**
 * Per-level review queue. Owns `QueueEntry.status` and `assignedTo`.
 *
 * Operations that take an optional `tx` join the caller's transaction when
 * one is passed and open their own otherwise.
 */
export class QueueManager {
  private readonly repository: ReviewRepository;
  private readonly rulesProvider: ProgramRulesProvider;
  private readonly audit: AuditLog;
  private readonly reviewerResolver: ReviewerResolver | null;
  private readonly now: () => Date;

  constructor(deps: QueueManagerDeps) {
    this.repository = deps.repository;
    this.rulesProvider = deps.rulesProvider;
    this.audit = deps.audit;
    this.reviewerResolver = deps.reviewerResolver ?? null;
    this.now = deps.now ?? (() => new Date());
  }

  private run<T>(tx: ReviewTransaction | undefined, fn: (tx: ReviewTransaction) => Promise<T>): Promise<T> {
    return tx ? fn(tx) : this.repository.transaction(fn);
  }

  /** Locks the owning application row, then the entry. Every writer takes them in this order. */
  private async requireEntry(tx: ReviewTransaction, entryId: string): Promise<QueueEntryRecord> {
    const located = await tx.getQueueEntry(entryId);
    if (!located) throw new QueueEntryNotFoundError(entryId);
    await tx.getApplication(located.applicationId, { forUpdate: true });
    const entry = await tx.getQueueEntry(entryId, { forUpdate: true });
    if (!entry) throw new QueueEntryNotFoundError(entryId);
    return entry;
  }

  async enqueue(
    tx: ReviewTransaction,
    application: ApplicationRecord,
    level: number,
    slaDays?: number
  ): Promise<QueueEntryRecord> {
    const rules = await this.rulesProvider.getRules(application.kind);
    const levelRules = getLevelRules(rules, level);
    if (!levelRules) {
      throw new ProgramRulesError(`${application.kind} has no review level ${level}`);
    }
    const now = this.now();
    const entry: QueueEntryRecord = {
      id: uuidv4(),
      applicationId: application.id,
      kind: application.kind,
      reviewLevel: level,
      status: "PENDING",
      assignedTo: null,
      claimedAt: null,
      autoAssigned: false,
      prioritySnapshot: 0,
      jurisdiction: application.jurisdiction,
      slaDeadline: computeSlaDeadline(
        now,
        slaDays ?? levelRules.slaDays,
        rules.sla.calendar,
        rules.sla.holidays
      ),
      isOverdue: false,
      escalatedAt: null,
      reminderSentAt: null,
      enteredAt: now,
      completedAt: null,
    };
    entry.prioritySnapshot = rankApplication(application, entry, rules.priority, now);

    const assignee = levelRules.autoAssign ? await this.leastLoadedReviewer(tx, levelRules, application) : null;
    if (assignee) {
      entry.status = "CLAIMED";
      entry.assignedTo = assignee.userId;
      entry.claimedAt = now;
      entry.autoAssigned = true;
    }
    await tx.insertQueueEntry(entry);
    if (assignee) {
      await this.audit.record(tx, {
        applicationId: application.id,
        action: "AUTO_ASSIGNED",
        reviewerId: assignee.userId,
        reviewLevel: level,
        queueEntryId: entry.id,
        metadata: { openEntries: assignee.openEntries },
      });
      logInfo("Queue entry auto-assigned", { entryId: entry.id, reviewLevel: level, openEntries: assignee.openEntries });
    }
    return entry;
  }

  /**
   * The eligible reviewer holding the fewest live entries, ties broken by user
   * id. Null when the level has no eligible reviewer; the entry then stays in
   * the shared pool.
   */
  private async leastLoadedReviewer(
    tx: ReviewTransaction,
    levelRules: ReviewLevelRules,
    application: ApplicationRecord
  ): Promise<{ userId: string; openEntries: number } | null> {
    if (!this.reviewerResolver) return null;
    const candidates = (await this.reviewerResolver.listActiveReviewers(levelRules.reviewerRoles)).filter(
      (reviewer) => canReview(reviewer, levelRules, application.jurisdiction).authorized
    );
    if (candidates.length === 0) return null;
    const load = await tx.countLiveAssignments(candidates.map((reviewer) => reviewer.userId));
    const ranked = candidates
      .map((reviewer) => ({ userId: reviewer.userId, openEntries: load.get(reviewer.userId) ?? 0 }))
      .sort((a, b) => a.openEntries - b.openEntries || a.userId.localeCompare(b.userId));
    return ranked[0] ?? null;
  }

  async claim(entryId: string, reviewerId: string, tx?: ReviewTransaction): Promise<QueueEntryRecord> {
    return this.run(tx, async (t) => {
      await this.requireEntry(t, entryId);
      const now = this.now();
      const claimed = await t.updateQueueEntry(
        entryId,
        { status: "CLAIMED", assignedTo: reviewerId, claimedAt: now },
        { expectedStatuses: ["PENDING"] }
      );
      if (!claimed) {
        const existing = await t.getQueueEntry(entryId);
        if (!existing) throw new QueueEntryNotFoundError(entryId);
        recordClaimConflict(existing.kind, existing.reviewLevel);
        throw new AlreadyClaimedError(entryId);
      }
      await this.audit.record(t, {
        applicationId: claimed.applicationId,
        action: "CLAIMED",
        reviewerId,
        reviewLevel: claimed.reviewLevel,
        queueEntryId: claimed.id,
      });
      return claimed;
    });
  }

  async release(entryId: string, reviewerId: string, tx?: ReviewTransaction): Promise<QueueEntryRecord> {
    return this.run(tx, async (t) => {
      const entry = await this.requireEntry(t, entryId);
      if (entry.status !== "CLAIMED" || entry.assignedTo !== reviewerId) {
        throw new NotClaimedByCallerError(entryId, reviewerId);
      }
      const released = await t.updateQueueEntry(
        entryId,
        { status: "PENDING", assignedTo: null, claimedAt: null, autoAssigned: false },
        { expectedStatuses: ["CLAIMED"] }
      );
      if (!released) throw new NotClaimedByCallerError(entryId, reviewerId);
      await this.audit.record(t, {
        applicationId: released.applicationId,
        action: "RELEASED",
        reviewerId,
        reviewLevel: released.reviewLevel,
        queueEntryId: released.id,
      });
      return released;
    });
  }

  /** Idempotent: completing a completed entry returns it unchanged. */
  async complete(tx: ReviewTransaction, entryId: string): Promise<QueueEntryRecord> {
    const entry = await this.requireEntry(tx, entryId);
    if (entry.status === "COMPLETED") return entry;
    const completed = await tx.updateQueueEntry(
      entryId,
      { status: "COMPLETED", completedAt: this.now() },
      { expectedStatuses: [entry.status] }
    );
    if (!completed) throw new InvalidStateError(`Queue entry ${entryId} changed while completing`);
    return completed;
  }

  /**
   * Supervisory override. Authorization of both parties is checked by the
   * caller; this only moves the claim.
   */
  async reassign(
    entryId: string,
    newReviewerId: string,
    supervisorId: string,
    tx?: ReviewTransaction
  ): Promise<QueueEntryRecord> {
    return this.run(tx, async (t) => {
      const entry = await this.requireEntry(t, entryId);
      if (entry.status === "COMPLETED") {
        throw new InvalidStateError(`Queue entry ${entryId} is completed`);
      }
      // An entry waiting on the applicant stays waiting; only the owner changes.
      const status: QueueEntryStatus = entry.status === "IN_PROGRESS" ? "IN_PROGRESS" : "CLAIMED";
      const reassigned = await t.updateQueueEntry(
        entryId,
        { status, assignedTo: newReviewerId, claimedAt: this.now(), autoAssigned: false },
        { expectedStatuses: [entry.status] }
      );
      if (!reassigned) throw new InvalidStateError(`Queue entry ${entryId} changed while reassigning`);
      await this.audit.record(t, {
        applicationId: reassigned.applicationId,
        action: "REASSIGNED",
        reviewerId: supervisorId,
        reviewLevel: reassigned.reviewLevel,
        queueEntryId: reassigned.id,
        metadata: { previousAssignee: entry.assignedTo, newAssignee: newReviewerId },
      });
      logInfo("Queue entry reassigned", {
        entryId,
        reviewLevel: reassigned.reviewLevel,
        supervisorId,
      });
      return reassigned;
    });
  }

  /** Changes were requested; the entry waits on the applicant. */
  async markInProgress(tx: ReviewTransaction, entryId: string, reviewerId: string): Promise<QueueEntryRecord> {
    const entry = await this.requireEntry(tx, entryId);
    const updated = await tx.updateQueueEntry(
      entryId,
      { status: "IN_PROGRESS", assignedTo: entry.assignedTo ?? reviewerId, claimedAt: entry.claimedAt ?? this.now() },
      { expectedStatuses: ["PENDING", "CLAIMED"] }
    );
    if (!updated) throw new InvalidStateError(`Queue entry ${entryId} is ${entry.status}`);
    return updated;
  }

  /** Applicant resubmitted; the entry returns to whoever requested the changes. */
  async reopen(tx: ReviewTransaction, entryId: string): Promise<QueueEntryRecord> {
    const entry = await this.requireEntry(tx, entryId);
    const updated = await tx.updateQueueEntry(
      entryId,
      entry.assignedTo ? { status: "CLAIMED" } : { status: "PENDING" },
      { expectedStatuses: ["IN_PROGRESS"] }
    );
    if (!updated) throw new InvalidStateError(`Queue entry ${entryId} is ${entry.status}`);
    return updated;
  }

  /** Returns the entry to the shared pool, flagged as escalated. */
  async escalate(tx: ReviewTransaction, entryId: string): Promise<QueueEntryRecord> {
    const entry = await this.requireEntry(tx, entryId);
    const updated = await tx.updateQueueEntry(
      entryId,
      { status: "PENDING", assignedTo: null, claimedAt: null, autoAssigned: false, escalatedAt: this.now() },
      { expectedStatuses: LIVE_QUEUE_STATUSES.slice() }
    );
    if (!updated) throw new InvalidStateError(`Queue entry ${entryId} is ${entry.status}`);
    return updated;
  }

  async list(level: number, filters: QueueFilter = {}): Promise<RankedEntry[]> {
    const statuses = LIVE_QUEUE_STATUSES.filter((status) => !filters.status || status === filters.status);
    if (statuses.length === 0) return [];
    const now = this.now();
    return this.rankedQuery({
      reviewLevel: level,
      kind: filters.kind,
      region: filters.region,
      district: filters.district,
      constituency: filters.constituency,
      assignedTo: filters.assignedTo,
      statuses,
      overdueBefore: filters.overdueOnly ? now : undefined,
    }, now);
  }

  /** Live entries held by one reviewer, across levels. */
  async listAssignedTo(reviewerId: string): Promise<RankedEntry[]> {
    return this.rankedQuery({ assignedTo: reviewerId, statuses: LIVE_QUEUE_STATUSES.slice() }, this.now());
  }

  async getStatistics(level?: number): Promise<QueueStatistics> {
    const now = this.now();
    const entries = await this.repository.transaction((tx) =>
      tx.listQueueEntries({ reviewLevel: level, statuses: LIVE_QUEUE_STATUSES.slice() })
    );
    const count = (status: QueueEntryStatus) => entries.filter((entry) => entry.status === status).length;
    return {
      reviewLevel: level ?? null,
      total: entries.length,
      pending: count("PENDING"),
      claimed: count("CLAIMED"),
      inProgress: count("IN_PROGRESS"),
      overdue: entries.filter((entry) => entry.slaDeadline.getTime() < now.getTime()).length,
    };
  }

  private async rankedQuery(query: QueueEntryQuery, now: Date): Promise<RankedEntry[]> {
    const { entries, applications } = await this.repository.transaction(async (tx) => {
      const found = await tx.listQueueEntries(query);
      const apps = await tx.getApplications(Array.from(new Set(found.map((entry) => entry.applicationId))));
      return { entries: found, applications: apps };
    });

    const byId = new Map(applications.map((application) => [application.id, application]));
    const rulesByKind = new Map<ApplicationKind, ProgramRules>();
    const ranked: RankedEntry[] = [];
    for (const entry of entries) {
      const application = byId.get(entry.applicationId);
      if (!application) continue;
      let rules = rulesByKind.get(entry.kind);
      if (!rules) {
        rules = await this.rulesProvider.getRules(entry.kind);
        rulesByKind.set(entry.kind, rules);
      }
      ranked.push({ entry, application, rank: rankApplication(application, entry, rules.priority, now) });
    }
    return ranked.sort(compareRankedEntries);
  }
}
