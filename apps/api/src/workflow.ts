import { v4 as uuidv4 } from "uuid";
import {
  ApplicationKindEnum,
  DraftApplicationInputSchema,
  getLevelRules,
  isFinalLevel,
  isTerminalStatus,
  validateSnapshotForSubmission,
  type ApplicationKind,
  type ApplicationRecord,
  type DraftApplicationInput,
  type ProgramRules,
  type QueueEntryRecord,
  type QueueFilter,
  type ReviewActionRecord,
  type ReviewActionType,
  type ReviewLevelRules,
} from "@flockreview/shared";
import { AuditLog, verifyAuditTrail, type AuditChainVerificationResult } from "./audit-chain";
import { scoreEligibility } from "./eligibility";
import {
  ApplicationNotFoundError,
  DeadlineExpiredError,
  InvalidStateError,
  LevelMismatchError,
  NotClaimedByCallerError,
  ProgramRulesError,
  QueueEntryNotFoundError,
  UnauthorizedError,
  ValidationError,
  type PolicyContext,
} from "./errors";
import {
  SequentialIdentifierIssuer,
  allocateReferenceNumber,
  type IdentifierIssuer,
} from "./identifiers";
import { errorMessage, logError, logInfo, logWarn } from "./logger";
import {
  buildNotification,
  dispatchNotifications,
  type Notifier,
  type NotificationRecipient,
  type PendingNotification,
} from "./notifications";
import { recordPolicyViolation, recordWorkflowTransition } from "./observability/metrics";
import { canReview, isSupervisor, type ReviewerResolver } from "./policy";
import type { RankedEntry } from "./priority";
import type { ProgramRulesProvider } from "./program-rules";
import { QueueManager } from "./queue";
import type { ReviewRepository, ReviewTransaction } from "./repository";
import { addDays } from "./sla";

/** Runs once per application when it reaches APPROVED, REJECTED or WITHDRAWN. */
export type TerminalHandler = (application: ApplicationRecord) => Promise<void>;

export interface ReviewWorkflowDeps {
  repository: ReviewRepository;
  rulesProvider: ProgramRulesProvider;
  reviewerResolver: ReviewerResolver;
  notifier: Notifier;
  identifierIssuer?: IdentifierIssuer;
  terminalHandlers?: Partial<Record<ApplicationKind, TerminalHandler>>;
  now?: () => Date;
}

export const CHANGES_DEADLINE_EXPIRED = "CHANGES_DEADLINE_EXPIRED";

interface CommitEffects {
  notifications: PendingNotification[];
  transitions: Array<{ application: ApplicationRecord; action: ReviewActionType }>;
  terminal: ApplicationRecord[];
}

function applicantRecipient(application: ApplicationRecord): NotificationRecipient {
  return { type: "USER", userId: application.applicantId };
}

function policyLevel(level: number): number | null {
  return Number.isInteger(level) && level >= 1 ? level : null;
}

/**
 * The review state machine. One engine serves every application kind; level
 * count, SLA days, reviewer classes and eligibility rules come from the kind's
 * program rules.
 *
 * Every operation runs in one repository transaction. Notifications, metrics
 * and terminal handlers run only after that transaction commits; the caller
 * never waits on notification delivery.
 */
export class ReviewWorkflowEngine {
  readonly queue: QueueManager;
  readonly audit: AuditLog;

  private readonly repository: ReviewRepository;
  private readonly rulesProvider: ProgramRulesProvider;
  private readonly reviewerResolver: ReviewerResolver;
  private readonly notifier: Notifier;
  private readonly identifierIssuer: IdentifierIssuer;
  private readonly terminalHandlers = new Map<ApplicationKind, TerminalHandler>();
  private readonly inflightNotifications = new Set<Promise<void>>();
  private readonly now: () => Date;

  constructor(deps: ReviewWorkflowDeps) {
    this.repository = deps.repository;
    this.rulesProvider = deps.rulesProvider;
    this.reviewerResolver = deps.reviewerResolver;
    this.notifier = deps.notifier;
    this.identifierIssuer = deps.identifierIssuer ?? new SequentialIdentifierIssuer();
    this.now = deps.now ?? (() => new Date());
    this.audit = new AuditLog(this.now);
    this.queue = new QueueManager({
      repository: this.repository,
      rulesProvider: this.rulesProvider,
      audit: this.audit,
      reviewerResolver: this.reviewerResolver,
      now: this.now,
    });
    for (const kind of ApplicationKindEnum.options) {
      const handler = deps.terminalHandlers?.[kind];
      if (handler) this.terminalHandlers.set(kind, handler);
    }
  }

  registerTerminalHandler(kind: ApplicationKind, handler: TerminalHandler): void {
    this.terminalHandlers.set(kind, handler);
  }

  // ── Applicant operations ────────────────────────────────────────────────────

  async createDraft(input: DraftApplicationInput): Promise<ApplicationRecord> {
    const parsed = DraftApplicationInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Draft application is invalid", parsed.error.issues);
    }
    const draft = parsed.data;
    const rules = await this.rulesProvider.getRules(draft.kind);

    return this.commit(async (tx) => {
      const now = this.now();
      const application: ApplicationRecord = {
        id: uuidv4(),
        referenceNumber: await allocateReferenceNumber(tx, rules, now),
        kind: draft.kind,
        status: "DRAFT",
        currentReviewLevel: null,
        applicantId: draft.applicantId,
        jurisdiction: draft.jurisdiction,
        snapshot: draft.snapshot,
        eligibilityScore: null,
        eligibilityFlags: [],
        changesRequested: [],
        changesDeadline: null,
        resubmissionCount: 0,
        issuedIdentifier: null,
        rowVersion: 0,
        submittedAt: null,
        finalDecisionAt: null,
        createdAt: now,
        updatedAt: now,
      };
      await tx.insertApplication(application);
      return application;
    });
  }

  /**
   * Validates, scores and either enqueues the application at level 1 or
   * rejects it outright. `snapshot`, when given, replaces the draft's data.
   */
  async submit(applicationId: string, applicantId: string, snapshot?: unknown): Promise<ApplicationRecord> {
    return this.guarded(() =>
      this.commit(async (tx, effects) => {
        const application = await this.lockApplication(tx, applicationId);
        this.assertApplicant(application, applicantId);
        if (application.status !== "DRAFT") {
          throw new InvalidStateError(`Application ${applicationId} is ${application.status}, not DRAFT`);
        }
        const rules = await this.rulesProvider.getRules(application.kind);
        const validated = validateSnapshotForSubmission(application.kind, snapshot ?? application.snapshot);
        if (!validated.success || !validated.data) {
          throw new ValidationError("Application is incomplete", validated.errors ?? []);
        }

        const now = this.now();
        const eligibility = scoreEligibility(
          { snapshot: validated.data, jurisdiction: application.jurisdiction, asOf: now },
          rules.eligibility
        );
        const scored = {
          snapshot: validated.data,
          eligibilityScore: eligibility.score,
          eligibilityFlags: eligibility.flags,
          submittedAt: now,
        };
        const eligibilityMetadata = {
          score: eligibility.score,
          flags: eligibility.flags,
          passThreshold: rules.eligibility.passThreshold,
        };

        await this.audit.record(tx, { applicationId, action: "SUBMITTED", reviewerId: applicantId });

        if (!eligibility.passed) {
          const rejected = await this.save(tx, application, {
            ...scored,
            status: "REJECTED",
            currentReviewLevel: null,
            finalDecisionAt: now,
          });
          await this.audit.record(tx, {
            applicationId,
            action: "ELIGIBILITY_FAILED",
            metadata: eligibilityMetadata,
          });
          effects.transitions.push({ application: rejected, action: "ELIGIBILITY_FAILED" });
          effects.notifications.push(
            buildNotification(applicantRecipient(rejected), "APPLICATION_REJECTED", rejected, {
              reason: "ELIGIBILITY_FAILED",
            })
          );
          effects.terminal.push(rejected);
          return rejected;
        }

        const underReview = await this.save(tx, application, {
          ...scored,
          status: "UNDER_REVIEW",
          currentReviewLevel: 1,
        });
        await this.audit.record(tx, {
          applicationId,
          action: "ELIGIBILITY_PASSED",
          reviewLevel: 1,
          metadata: eligibilityMetadata,
        });
        const entry = await this.queue.enqueue(tx, underReview, 1);
        effects.transitions.push({ application: underReview, action: "SUBMITTED" });
        effects.notifications.push(
          buildNotification(applicantRecipient(underReview), "APPLICATION_SUBMITTED", underReview, {
            slaDeadline: entry.slaDeadline.toISOString(),
          }),
          ...this.assignmentNotice(entry, underReview)
        );
        return underReview;
      })
    );
  }

  /**
   * Replaces the snapshot after changes were requested and returns the
   * application to review at the same level. The eligibility score is kept.
   *
   * Past the changes deadline the program's expiry policy is applied instead
   * and the resulting application returned. The submitted snapshot is then
   * discarded, also under ESCALATE where the result is back UNDER_REVIEW; the
   * expiry action records `resubmissionDiscarded` so the trail shows it.
   */
  async resubmit(applicationId: string, applicantId: string, snapshot: unknown): Promise<ApplicationRecord> {
    try {
      return await this.guarded(() =>
        this.commit(async (tx, effects) => {
          const application = await this.lockApplication(tx, applicationId);
          this.assertApplicant(application, applicantId);
          if (application.status !== "CHANGES_REQUESTED") {
            throw new InvalidStateError(
              `Application ${applicationId} is ${application.status}, not CHANGES_REQUESTED`
            );
          }
          const now = this.now();
          if (application.changesDeadline && now.getTime() > application.changesDeadline.getTime()) {
            throw new DeadlineExpiredError(applicationId, application.changesDeadline);
          }
          const validated = validateSnapshotForSubmission(application.kind, snapshot);
          if (!validated.success || !validated.data) {
            throw new ValidationError("Resubmitted application is incomplete", validated.errors ?? []);
          }

          const entry = await this.requireLiveEntry(tx, application);
          const reopened = await this.queue.reopen(tx, entry.id);
          const updated = await this.save(tx, application, {
            status: "UNDER_REVIEW",
            snapshot: validated.data,
            changesRequested: [],
            changesDeadline: null,
            resubmissionCount: application.resubmissionCount + 1,
          });
          await this.audit.record(tx, {
            applicationId,
            action: "RESUBMITTED",
            reviewerId: applicantId,
            reviewLevel: updated.currentReviewLevel,
            queueEntryId: entry.id,
            metadata: { resubmissionCount: updated.resubmissionCount },
          });
          effects.transitions.push({ application: updated, action: "RESUBMITTED" });
          if (reopened.assignedTo) {
            effects.notifications.push(
              buildNotification({ type: "USER", userId: reopened.assignedTo }, "REVIEW_ASSIGNED", updated, {
                reviewLevel: updated.currentReviewLevel,
                resubmitted: true,
              })
            );
          }
          return updated;
        })
      );
    } catch (error) {
      if (error instanceof DeadlineExpiredError) {
        logWarn("Resubmission after changes deadline discarded; applying expiry policy", {
          applicationId,
          deadline: error.deadline,
        });
        return this.applyChangesExpiry(applicationId, { discardedResubmissionBy: applicantId });
      }
      throw error;
    }
  }

  async withdraw(applicationId: string, applicantId: string, reason?: string): Promise<ApplicationRecord> {
    return this.guarded(() =>
      this.commit(async (tx, effects) => {
        const application = await this.lockApplication(tx, applicationId);
        this.assertApplicant(application, applicantId);
        if (isTerminalStatus(application.status)) {
          throw new InvalidStateError(`Application ${applicationId} is already ${application.status}`);
        }
        const entry = await tx.findLiveQueueEntry(applicationId);
        if (entry) await this.queue.complete(tx, entry.id);

        const withdrawn = await this.save(tx, application, {
          status: "WITHDRAWN",
          currentReviewLevel: null,
          changesDeadline: null,
          finalDecisionAt: this.now(),
        });
        await this.audit.record(tx, {
          applicationId,
          action: "WITHDRAWN",
          reviewerId: applicantId,
          reviewLevel: application.currentReviewLevel,
          queueEntryId: entry?.id ?? null,
          notes: reason ?? "",
        });
        effects.transitions.push({ application: withdrawn, action: "WITHDRAWN" });
        if (entry?.assignedTo) {
          effects.notifications.push(
            buildNotification({ type: "USER", userId: entry.assignedTo }, "APPLICATION_WITHDRAWN", withdrawn)
          );
        }
        effects.terminal.push(withdrawn);
        return withdrawn;
      })
    );
  }

  // ── Reviewer decisions ──────────────────────────────────────────────────────

  async approve(applicationId: string, reviewerId: string, level: number, notes = ""): Promise<ApplicationRecord> {
    return this.guarded(() =>
      this.commit(async (tx, effects) => {
        const { application, rules, entry } = await this.prepareDecision(tx, applicationId, reviewerId, level);
        await this.queue.complete(tx, entry.id);
        await this.audit.record(tx, {
          applicationId,
          action: "APPROVED",
          reviewerId,
          reviewLevel: level,
          queueEntryId: entry.id,
          notes,
        });

        if (!isFinalLevel(rules, level)) {
          const advanced = await this.save(tx, application, { currentReviewLevel: level + 1 });
          const next = await this.queue.enqueue(tx, advanced, level + 1);
          effects.transitions.push({ application: advanced, action: "APPROVED" });
          effects.notifications.push(
            buildNotification(applicantRecipient(advanced), "APPLICATION_ADVANCED", advanced, {
              reviewLevel: next.reviewLevel,
            }),
            ...this.assignmentNotice(next, advanced)
          );
          return advanced;
        }

        const identifier = await this.identifierIssuer.issueIdentifier(application, { tx, rules });
        const approved = await this.save(tx, application, {
          status: "APPROVED",
          currentReviewLevel: null,
          issuedIdentifier: identifier,
          finalDecisionAt: this.now(),
        });
        if (application.issuedIdentifier !== identifier) {
          await this.audit.record(tx, {
            applicationId,
            action: "IDENTIFIER_ISSUED",
            reviewLevel: level,
            metadata: { identifier },
          });
        }
        effects.transitions.push({ application: approved, action: "APPROVED" });
        effects.notifications.push(
          buildNotification(applicantRecipient(approved), "APPLICATION_APPROVED", approved, { identifier })
        );
        effects.terminal.push(approved);
        return approved;
      })
    );
  }

  async reject(applicationId: string, reviewerId: string, level: number, reason: string): Promise<ApplicationRecord> {
    if (!reason || !reason.trim()) {
      throw new ValidationError("A rejection reason is required");
    }
    return this.guarded(() =>
      this.commit(async (tx, effects) => {
        const { application, entry } = await this.prepareDecision(tx, applicationId, reviewerId, level);
        await this.queue.complete(tx, entry.id);
        const rejected = await this.save(tx, application, {
          status: "REJECTED",
          currentReviewLevel: null,
          finalDecisionAt: this.now(),
        });
        await this.audit.record(tx, {
          applicationId,
          action: "REJECTED",
          reviewerId,
          reviewLevel: level,
          queueEntryId: entry.id,
          notes: reason.trim(),
        });
        effects.transitions.push({ application: rejected, action: "REJECTED" });
        effects.notifications.push(
          buildNotification(applicantRecipient(rejected), "APPLICATION_REJECTED", rejected, { reason: reason.trim() })
        );
        effects.terminal.push(rejected);
        return rejected;
      })
    );
  }

  async requestChanges(
    applicationId: string,
    reviewerId: string,
    level: number,
    requestedChanges: string[],
    deadlineDays?: number
  ): Promise<ApplicationRecord> {
    const changes = requestedChanges.map((change) => change.trim()).filter(Boolean);
    if (changes.length === 0) {
      throw new ValidationError("At least one requested change is required");
    }
    if (deadlineDays !== undefined && (!Number.isInteger(deadlineDays) || deadlineDays < 1)) {
      throw new ValidationError("deadlineDays must be a positive integer");
    }
    return this.guarded(() =>
      this.commit(async (tx, effects) => {
        const { application, rules, entry } = await this.prepareDecision(tx, applicationId, reviewerId, level);
        await this.queue.markInProgress(tx, entry.id, reviewerId);
        const deadline = addDays(this.now(), deadlineDays ?? rules.changesRequested.defaultDeadlineDays);
        const updated = await this.save(tx, application, {
          status: "CHANGES_REQUESTED",
          changesRequested: changes,
          changesDeadline: deadline,
        });
        await this.audit.record(tx, {
          applicationId,
          action: "CHANGES_REQUESTED",
          reviewerId,
          reviewLevel: level,
          queueEntryId: entry.id,
          metadata: { requestedChanges: changes, deadline: deadline.toISOString() },
        });
        effects.transitions.push({ application: updated, action: "CHANGES_REQUESTED" });
        effects.notifications.push(
          buildNotification(applicantRecipient(updated), "CHANGES_REQUESTED", updated, {
            requestedChanges: changes,
            deadline: deadline.toISOString(),
          })
        );
        return updated;
      })
    );
  }

  // ── Queue pass-throughs ─────────────────────────────────────────────────────

  async claim(entryId: string, reviewerId: string): Promise<QueueEntryRecord> {
    return this.guarded(() =>
      this.commit(async (tx) => {
        const { application, levelRules } = await this.loadEntryContext(tx, entryId);
        await this.authorizeReviewer(application, levelRules, reviewerId);
        return this.queue.claim(entryId, reviewerId, tx);
      })
    );
  }

  async release(entryId: string, reviewerId: string): Promise<QueueEntryRecord> {
    return this.queue.release(entryId, reviewerId);
  }

  /** Supervisor override: moves a live entry to another eligible reviewer. */
  async reassign(entryId: string, newReviewerId: string, supervisorId: string): Promise<QueueEntryRecord> {
    return this.guarded(() =>
      this.commit(async (tx, effects) => {
        const { entry, application, rules, levelRules } = await this.loadEntryContext(tx, entryId);
        const supervisor = await this.reviewerResolver.resolve(supervisorId);
        if (!isSupervisor(supervisor, rules)) {
          throw new UnauthorizedError(`${supervisorId} may not reassign ${rules.displayName} reviews`, {
            applicationId: application.id,
            actorId: supervisorId,
            reviewLevel: entry.reviewLevel,
          });
        }
        await this.authorizeReviewer(application, levelRules, newReviewerId, supervisorId);
        const reassigned = await this.queue.reassign(entryId, newReviewerId, supervisorId, tx);
        effects.transitions.push({ application, action: "REASSIGNED" });
        effects.notifications.push(
          buildNotification({ type: "USER", userId: newReviewerId }, "REVIEW_ASSIGNED", application, {
            reviewLevel: reassigned.reviewLevel,
          })
        );
        return reassigned;
      })
    );
  }

  // ── Reads ───────────────────────────────────────────────────────────────────

  async listQueue(level: number, filters: QueueFilter = {}): Promise<RankedEntry[]> {
    return this.queue.list(level, filters);
  }

  async getApplication(applicationId: string): Promise<ApplicationRecord> {
    const application = await this.repository.transaction((tx) => tx.getApplication(applicationId));
    if (!application) throw new ApplicationNotFoundError(applicationId);
    return application;
  }

  async getAuditTrail(applicationId: string): Promise<ReviewActionRecord[]> {
    return this.repository.transaction(async (tx) => {
      const application = await tx.getApplication(applicationId);
      if (!application) throw new ApplicationNotFoundError(applicationId);
      return tx.listReviewActions(applicationId);
    });
  }

  async verifyAuditTrail(applicationId: string): Promise<AuditChainVerificationResult> {
    return verifyAuditTrail(await this.getAuditTrail(applicationId));
  }

  // ── Deadlines ───────────────────────────────────────────────────────────────

  /**
   * Applies the program's changes-deadline policy to one application.
   * Returns the application unchanged when it is not waiting on changes or
   * its deadline has not passed, so repeated sweeps are harmless.
   */
  async applyChangesExpiry(
    applicationId: string,
    options: { discardedResubmissionBy?: string } = {}
  ): Promise<ApplicationRecord> {
    return this.commit(async (tx, effects) => {
      const application = await this.lockApplication(tx, applicationId);
      const now = this.now();
      if (
        application.status !== "CHANGES_REQUESTED" ||
        !application.changesDeadline ||
        now.getTime() <= application.changesDeadline.getTime()
      ) {
        return application;
      }
      const rules = await this.rulesProvider.getRules(application.kind);
      const entry = await this.requireLiveEntry(tx, application);
      const metadata = {
        reason: CHANGES_DEADLINE_EXPIRED,
        deadline: application.changesDeadline.toISOString(),
        policy: rules.changesRequested.onExpiry,
        ...(options.discardedResubmissionBy
          ? { resubmissionDiscarded: true, discardedResubmissionBy: options.discardedResubmissionBy }
          : {}),
      };

      if (rules.changesRequested.onExpiry === "ESCALATE") {
        await this.queue.escalate(tx, entry.id);
        const escalated = await this.save(tx, application, {
          status: "UNDER_REVIEW",
          changesDeadline: null,
        });
        await this.audit.record(tx, {
          applicationId,
          action: "ESCALATED",
          reviewLevel: application.currentReviewLevel,
          queueEntryId: entry.id,
          metadata,
        });
        effects.transitions.push({ application: escalated, action: "ESCALATED" });
        effects.notifications.push(
          buildNotification(applicantRecipient(escalated), "CHANGES_DEADLINE_EXPIRED", escalated),
          ...rules.supervisorRoles.map((role) =>
            buildNotification(
              { type: "ROLE", role, region: escalated.jurisdiction.region },
              "CHANGES_DEADLINE_EXPIRED",
              escalated,
              { escalated: true, reviewLevel: escalated.currentReviewLevel }
            )
          )
        );
        return escalated;
      }

      await this.queue.complete(tx, entry.id);
      const rejected = await this.save(tx, application, {
        status: "REJECTED",
        currentReviewLevel: null,
        finalDecisionAt: now,
      });
      await this.audit.record(tx, {
        applicationId,
        action: "AUTO_REJECTED",
        reviewLevel: application.currentReviewLevel,
        queueEntryId: entry.id,
        metadata,
      });
      effects.transitions.push({ application: rejected, action: "AUTO_REJECTED" });
      effects.notifications.push(
        buildNotification(applicantRecipient(rejected), "CHANGES_DEADLINE_EXPIRED", rejected)
      );
      effects.terminal.push(rejected);
      return rejected;
    });
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private async commit<T>(fn: (tx: ReviewTransaction, effects: CommitEffects) => Promise<T>): Promise<T> {
    const effects: CommitEffects = { notifications: [], transitions: [], terminal: [] };
    const result = await this.repository.transaction((tx) => fn(tx, effects));

    for (const { application, action } of effects.transitions) {
      recordWorkflowTransition(application.kind, action);
      logInfo("Workflow transition", {
        applicationId: application.id,
        kind: application.kind,
        action,
        status: application.status,
        reviewLevel: application.currentReviewLevel,
      });
    }
    this.dispatchAfterCommit(effects.notifications);
    for (const application of effects.terminal) {
      await this.runTerminalHandler(application);
    }
    return result;
  }

  /**
   * Starts delivery without waiting for it. The send is tracked until it
   * settles so `flushNotifications` can wait for it on shutdown.
   */
  dispatchAfterCommit(pending: readonly PendingNotification[]): void {
    if (pending.length === 0) return;
    const delivery: Promise<void> = dispatchNotifications(this.notifier, pending)
      .catch((error: unknown) => {
        logError("Notification dispatch crashed", { count: pending.length, error: errorMessage(error) });
      })
      .finally(() => {
        this.inflightNotifications.delete(delivery);
      });
    this.inflightNotifications.add(delivery);
  }

  /** Resolves once every notification started so far has settled. */
  async flushNotifications(): Promise<void> {
    await Promise.allSettled(Array.from(this.inflightNotifications));
  }

  get pendingNotificationCount(): number {
    return this.inflightNotifications.size;
  }

  private assignmentNotice(entry: QueueEntryRecord, application: ApplicationRecord): PendingNotification[] {
    if (!entry.autoAssigned || !entry.assignedTo) return [];
    return [
      buildNotification({ type: "USER", userId: entry.assignedTo }, "REVIEW_ASSIGNED", application, {
        reviewLevel: entry.reviewLevel,
        autoAssigned: true,
      }),
    ];
  }

  private async runTerminalHandler(application: ApplicationRecord): Promise<void> {
    const handler = this.terminalHandlers.get(application.kind);
    if (!handler) return;
    try {
      await handler(application);
    } catch (error) {
      logError("Terminal handler failed", {
        applicationId: application.id,
        kind: application.kind,
        status: application.status,
        error: errorMessage(error),
      });
    }
  }

  /** Writes policy violations to the audit trail in their own transaction, then rethrows. */
  private async guarded<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if ((error instanceof UnauthorizedError || error instanceof LevelMismatchError) && error.context) {
        await this.recordViolation(error.context, error.code, error.message);
      }
      throw error;
    }
  }

  private async recordViolation(context: PolicyContext, code: string, message: string): Promise<void> {
    try {
      const kind = await this.repository.transaction(async (tx) => {
        const application = await tx.getApplication(context.applicationId);
        if (!application) return null;
        await this.audit.record(tx, {
          applicationId: context.applicationId,
          action: "POLICY_VIOLATION",
          reviewerId: context.actorId,
          reviewLevel: context.reviewLevel,
          metadata: { code, message },
        });
        return application.kind;
      });
      if (kind) recordPolicyViolation(kind, code);
      logWarn("POLICY_VIOLATION", {
        applicationId: context.applicationId,
        actorId: context.actorId,
        reviewLevel: context.reviewLevel,
        code,
      });
    } catch (error) {
      logError("Failed to record policy violation", {
        applicationId: context.applicationId,
        code,
        error: errorMessage(error),
      });
    }
  }

  private async lockApplication(tx: ReviewTransaction, applicationId: string): Promise<ApplicationRecord> {
    const application = await tx.getApplication(applicationId, { forUpdate: true });
    if (!application) throw new ApplicationNotFoundError(applicationId);
    return application;
  }

  private assertApplicant(application: ApplicationRecord, applicantId: string): void {
    if (application.applicantId !== applicantId) {
      throw new UnauthorizedError(`${applicantId} is not the applicant of ${application.id}`, {
        applicationId: application.id,
        actorId: applicantId,
        reviewLevel: application.currentReviewLevel,
      });
    }
  }

  private async save(
    tx: ReviewTransaction,
    current: ApplicationRecord,
    patch: Partial<ApplicationRecord>
  ): Promise<ApplicationRecord> {
    const next: ApplicationRecord = {
      ...current,
      ...patch,
      id: current.id,
      rowVersion: current.rowVersion + 1,
      updatedAt: this.now(),
    };
    await tx.saveApplication(next, current.rowVersion);
    return next;
  }

  private async requireLiveEntry(tx: ReviewTransaction, application: ApplicationRecord): Promise<QueueEntryRecord> {
    const entry = await tx.findLiveQueueEntry(application.id);
    if (!entry || entry.reviewLevel !== application.currentReviewLevel) {
      throw new InvalidStateError(
        `Application ${application.id} has no live queue entry at level ${application.currentReviewLevel ?? "none"}`
      );
    }
    return entry;
  }

  private levelRulesFor(rules: ProgramRules, level: number): ReviewLevelRules {
    const levelRules = getLevelRules(rules, level);
    if (!levelRules) throw new ProgramRulesError(`${rules.kind} has no review level ${level}`);
    return levelRules;
  }

  private async authorizeReviewer(
    application: ApplicationRecord,
    levelRules: ReviewLevelRules,
    reviewerId: string,
    actorId: string = reviewerId
  ): Promise<void> {
    const reviewer = await this.reviewerResolver.resolve(reviewerId);
    const access = canReview(reviewer, levelRules, application.jurisdiction);
    if (!access.authorized) {
      throw new UnauthorizedError(
        `${reviewerId} may not review ${application.id} at level ${levelRules.level} (${access.reason})`,
        { applicationId: application.id, actorId, reviewLevel: levelRules.level }
      );
    }
  }

  /**
   * Shared guards of approve, reject and requestChanges. A pending entry is
   * claimed for the deciding reviewer on the way through.
   */
  private async prepareDecision(
    tx: ReviewTransaction,
    applicationId: string,
    reviewerId: string,
    level: number
  ): Promise<{ application: ApplicationRecord; rules: ProgramRules; entry: QueueEntryRecord }> {
    const application = await this.lockApplication(tx, applicationId);
    if (application.status !== "UNDER_REVIEW") {
      throw new InvalidStateError(`Application ${applicationId} is ${application.status}, not UNDER_REVIEW`);
    }
    if (application.currentReviewLevel !== level) {
      throw new LevelMismatchError(application.currentReviewLevel, level, {
        applicationId,
        actorId: reviewerId,
        reviewLevel: policyLevel(level),
      });
    }
    const rules = await this.rulesProvider.getRules(application.kind);
    const levelRules = this.levelRulesFor(rules, level);
    await this.authorizeReviewer(application, levelRules, reviewerId);

    let entry = await this.requireLiveEntry(tx, application);
    if (entry.status === "PENDING") {
      entry = await this.queue.claim(entry.id, reviewerId, tx);
    } else if (entry.assignedTo !== reviewerId) {
      throw new NotClaimedByCallerError(entry.id, reviewerId);
    }
    return { application, rules, entry };
  }

  private async loadEntryContext(
    tx: ReviewTransaction,
    entryId: string
  ): Promise<{
    entry: QueueEntryRecord;
    application: ApplicationRecord;
    rules: ProgramRules;
    levelRules: ReviewLevelRules;
  }> {
    const located = await tx.getQueueEntry(entryId);
    if (!located) throw new QueueEntryNotFoundError(entryId);
    const application = await this.lockApplication(tx, located.applicationId);
    const entry = await tx.getQueueEntry(entryId, { forUpdate: true });
    if (!entry) throw new QueueEntryNotFoundError(entryId);
    if (entry.status === "COMPLETED" || application.currentReviewLevel !== entry.reviewLevel) {
      throw new InvalidStateError(`Queue entry ${entryId} is not live`);
    }
    const rules = await this.rulesProvider.getRules(application.kind);
    const levelRules = this.levelRulesFor(rules, entry.reviewLevel);
    return { entry, application, rules, levelRules };
  }
}
