/**
 * Persistence boundary for the review workflow.
 *
 * Every mutation happens inside `transaction`; state, queue and audit writes
 * made through one `ReviewTransaction` commit together or not at all.
 */
import type {
  ApplicationKind,
  ApplicationRecord,
  QueueEntryRecord,
  QueueEntryStatus,
  ReviewActionRecord,
} from "@flockreview/shared";

export interface QueueEntryQuery {
  reviewLevel?: number;
  kind?: ApplicationKind;
  region?: string;
  district?: string;
  constituency?: string;
  assignedTo?: string;
  statuses?: QueueEntryStatus[];
  /** Only entries whose SLA deadline is earlier than this instant. */
  overdueBefore?: Date;
}

export type QueueEntryPatch = Partial<
  Pick<
    QueueEntryRecord,
    | "status"
    | "assignedTo"
    | "claimedAt"
    | "autoAssigned"
    | "isOverdue"
    | "escalatedAt"
    | "reminderSentAt"
    | "completedAt"
  >
>;

export interface ReviewTransaction {
  /** `forUpdate` takes a row lock for the rest of the transaction. */
  getApplication(id: string, options?: { forUpdate?: boolean }): Promise<ApplicationRecord | null>;
  getApplications(ids: string[]): Promise<ApplicationRecord[]>;
  insertApplication(application: ApplicationRecord): Promise<void>;
  /**
   * Writes `next` if the stored row still has `expectedRowVersion`.
   * Throws InvalidStateError otherwise.
   */
  saveApplication(next: ApplicationRecord, expectedRowVersion: number): Promise<void>;
  listExpiredChangeRequests(now: Date): Promise<ApplicationRecord[]>;

  getQueueEntry(id: string, options?: { forUpdate?: boolean }): Promise<QueueEntryRecord | null>;
  /** The non-completed entry of an application, if any. */
  findLiveQueueEntry(applicationId: string): Promise<QueueEntryRecord | null>;
  /** Throws DuplicateEntryError when the (application, level) pair already has a live entry. */
  insertQueueEntry(entry: QueueEntryRecord): Promise<void>;
  /**
   * Conditional update. With `expectedStatuses` the row is only changed when
   * its current status is one of them; null means nothing matched.
   */
  updateQueueEntry(
    id: string,
    patch: QueueEntryPatch,
    options?: { expectedStatuses?: QueueEntryStatus[] }
  ): Promise<QueueEntryRecord | null>;
  listQueueEntries(filter: QueueEntryQuery): Promise<QueueEntryRecord[]>;
  listBreachCandidates(now: Date): Promise<QueueEntryRecord[]>;
  listReminderCandidates(now: Date, dueBefore: Date): Promise<QueueEntryRecord[]>;
  /** Non-completed entries held by each reviewer; reviewers holding none are absent. */
  countLiveAssignments(reviewerIds: string[]): Promise<Map<string, number>>;

  appendReviewAction(action: ReviewActionRecord): Promise<void>;
  getLastReviewAction(applicationId: string): Promise<ReviewActionRecord | null>;
  listReviewActions(applicationId: string): Promise<ReviewActionRecord[]>;

  /** Monotonic per-scope counter starting at 1. */
  nextSequence(scope: string): Promise<number>;
}

export interface ReviewRepository {
  transaction<T>(fn: (tx: ReviewTransaction) => Promise<T>): Promise<T>;
}
