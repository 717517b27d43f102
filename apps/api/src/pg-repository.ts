import {
  ApplicationRecordSchema,
  QueueEntryRecordSchema,
  ReviewActionRecordSchema,
  type ApplicationRecord,
  type QueueEntryRecord,
  type QueueEntryStatus,
  type ReviewActionRecord,
} from "@flockreview/shared";
import { DuplicateEntryError, InvalidStateError } from "./errors";
import { errorMessage, logWarn } from "./logger";
import type {
  QueueEntryPatch,
  QueueEntryQuery,
  ReviewRepository,
  ReviewTransaction,
} from "./repository";

type Row = Record<string, unknown>;

export interface SqlQueryResult {
  rows: Row[];
  rowCount: number | null;
}

/** The slice of a pg `PoolClient` the repository uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
  release(): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
}

/** Wraps each statement a transaction runs, for timing and logging. */
export type QueryObserver = (text: string, run: () => Promise<SqlQueryResult>) => Promise<SqlQueryResult>;

const unobserved: QueryObserver = (_text, run) => run();

const LOCK_TIMEOUT = "5s";

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

function toApplication(row: Row): ApplicationRecord {
  return ApplicationRecordSchema.parse({
    id: row.id,
    referenceNumber: row.reference_number,
    kind: row.kind,
    status: row.status,
    currentReviewLevel: row.current_review_level,
    applicantId: row.applicant_id,
    jurisdiction: { region: row.region, district: row.district, constituency: row.constituency },
    snapshot: row.snapshot_jsonb,
    eligibilityScore: row.eligibility_score,
    eligibilityFlags: row.eligibility_flags,
    changesRequested: row.changes_requested,
    changesDeadline: row.changes_deadline,
    resubmissionCount: row.resubmission_count,
    issuedIdentifier: row.issued_identifier,
    rowVersion: row.row_version,
    submittedAt: row.submitted_at,
    finalDecisionAt: row.final_decision_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function toQueueEntry(row: Row): QueueEntryRecord {
  return QueueEntryRecordSchema.parse({
    id: row.id,
    applicationId: row.application_id,
    kind: row.kind,
    reviewLevel: row.review_level,
    status: row.status,
    assignedTo: row.assigned_to,
    claimedAt: row.claimed_at,
    autoAssigned: row.auto_assigned ?? false,
    prioritySnapshot: row.priority_snapshot,
    jurisdiction: { region: row.region, district: row.district, constituency: row.constituency },
    slaDeadline: row.sla_deadline,
    isOverdue: row.is_overdue,
    escalatedAt: row.escalated_at,
    reminderSentAt: row.reminder_sent_at,
    enteredAt: row.entered_at,
    completedAt: row.completed_at,
  });
}

function toReviewAction(row: Row): ReviewActionRecord {
  return ReviewActionRecordSchema.parse({
    id: row.id,
    applicationId: row.application_id,
    sequence: row.sequence,
    reviewerId: row.reviewer_id,
    reviewLevel: row.review_level,
    queueEntryId: row.queue_entry_id,
    action: row.action,
    notes: row.notes,
    metadata: row.metadata_jsonb,
    createdAt: row.created_at,
    prevHash: row.prev_hash,
    hash: row.hash,
  });
}

const QUEUE_PATCH_COLUMNS = [
  ["status", "status"],
  ["assignedTo", "assigned_to"],
  ["claimedAt", "claimed_at"],
  ["autoAssigned", "auto_assigned"],
  ["isOverdue", "is_overdue"],
  ["escalatedAt", "escalated_at"],
  ["reminderSentAt", "reminder_sent_at"],
  ["completedAt", "completed_at"],
] as const;

const LIVE_ENTRY = "status <> 'COMPLETED'";

export class PgReviewTransaction implements ReviewTransaction {
  constructor(private readonly client: SqlClient) {}

  async getApplication(id: string, options?: { forUpdate?: boolean }): Promise<ApplicationRecord | null> {
    const result = await this.client.query(
      `SELECT * FROM review_application WHERE id = $1${options?.forUpdate ? " FOR UPDATE" : ""}`,
      [id]
    );
    return result.rows[0] ? toApplication(result.rows[0]) : null;
  }

  async getApplications(ids: string[]): Promise<ApplicationRecord[]> {
    if (ids.length === 0) return [];
    const result = await this.client.query("SELECT * FROM review_application WHERE id = ANY($1::text[])", [ids]);
    return result.rows.map(toApplication);
  }

  async insertApplication(application: ApplicationRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO review_application (
         id, reference_number, kind, status, current_review_level, applicant_id,
         region, district, constituency, snapshot_jsonb, eligibility_score, eligibility_flags,
         changes_requested, changes_deadline, resubmission_count, issued_identifier, row_version,
         submitted_at, final_decision_at, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21)`,
      [
        application.id,
        application.referenceNumber,
        application.kind,
        application.status,
        application.currentReviewLevel,
        application.applicantId,
        application.jurisdiction.region,
        application.jurisdiction.district,
        application.jurisdiction.constituency,
        JSON.stringify(application.snapshot),
        application.eligibilityScore,
        JSON.stringify(application.eligibilityFlags),
        JSON.stringify(application.changesRequested),
        application.changesDeadline,
        application.resubmissionCount,
        application.issuedIdentifier,
        application.rowVersion,
        application.submittedAt,
        application.finalDecisionAt,
        application.createdAt,
        application.updatedAt,
      ]
    );
  }

  async saveApplication(next: ApplicationRecord, expectedRowVersion: number): Promise<void> {
    const result = await this.client.query(
      `UPDATE review_application
          SET status = $2, current_review_level = $3, snapshot_jsonb = $4, eligibility_score = $5,
              eligibility_flags = $6, changes_requested = $7, changes_deadline = $8,
              resubmission_count = $9, issued_identifier = $10, row_version = $11,
              submitted_at = $12, final_decision_at = $13, updated_at = $14
        WHERE id = $1 AND row_version = $15`,
      [
        next.id,
        next.status,
        next.currentReviewLevel,
        JSON.stringify(next.snapshot),
        next.eligibilityScore,
        JSON.stringify(next.eligibilityFlags),
        JSON.stringify(next.changesRequested),
        next.changesDeadline,
        next.resubmissionCount,
        next.issuedIdentifier,
        next.rowVersion,
        next.submittedAt,
        next.finalDecisionAt,
        next.updatedAt,
        expectedRowVersion,
      ]
    );
    if (result.rowCount === 0) {
      throw new InvalidStateError(`Application ${next.id} was modified concurrently`);
    }
  }

  async listExpiredChangeRequests(now: Date): Promise<ApplicationRecord[]> {
    const result = await this.client.query(
      `SELECT * FROM review_application
        WHERE status = 'CHANGES_REQUESTED' AND changes_deadline < $1
        ORDER BY changes_deadline ASC`,
      [now]
    );
    return result.rows.map(toApplication);
  }

  async getQueueEntry(id: string, options?: { forUpdate?: boolean }): Promise<QueueEntryRecord | null> {
    const result = await this.client.query(
      `SELECT * FROM review_queue_entry WHERE id = $1${options?.forUpdate ? " FOR UPDATE" : ""}`,
      [id]
    );
    return result.rows[0] ? toQueueEntry(result.rows[0]) : null;
  }

  async findLiveQueueEntry(applicationId: string): Promise<QueueEntryRecord | null> {
    const result = await this.client.query(
      `SELECT * FROM review_queue_entry
        WHERE application_id = $1 AND ${LIVE_ENTRY}
        ORDER BY review_level DESC
        LIMIT 1
        FOR UPDATE`,
      [applicationId]
    );
    return result.rows[0] ? toQueueEntry(result.rows[0]) : null;
  }

  async insertQueueEntry(entry: QueueEntryRecord): Promise<void> {
    try {
      await this.client.query(
        `INSERT INTO review_queue_entry (
           id, application_id, kind, review_level, status, assigned_to, claimed_at, priority_snapshot,
           region, district, constituency, sla_deadline, is_overdue, escalated_at, reminder_sent_at,
           entered_at, completed_at, auto_assigned
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)`,
        [
          entry.id,
          entry.applicationId,
          entry.kind,
          entry.reviewLevel,
          entry.status,
          entry.assignedTo,
          entry.claimedAt,
          entry.prioritySnapshot,
          entry.jurisdiction.region,
          entry.jurisdiction.district,
          entry.jurisdiction.constituency,
          entry.slaDeadline,
          entry.isOverdue,
          entry.escalatedAt,
          entry.reminderSentAt,
          entry.enteredAt,
          entry.completedAt,
          entry.autoAssigned,
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError(entry.applicationId, entry.reviewLevel);
      }
      throw error;
    }
  }

  async updateQueueEntry(
    id: string,
    patch: QueueEntryPatch,
    options?: { expectedStatuses?: QueueEntryStatus[] }
  ): Promise<QueueEntryRecord | null> {
    const params: unknown[] = [id];
    const sets: string[] = [];
    for (const [field, column] of QUEUE_PATCH_COLUMNS) {
      const value = patch[field];
      if (value === undefined) continue;
      params.push(value);
      sets.push(`${column} = $${params.length}`);
    }
    if (sets.length === 0) return this.getQueueEntry(id);

    let condition = "id = $1";
    if (options?.expectedStatuses) {
      params.push(options.expectedStatuses);
      condition += ` AND status = ANY($${params.length}::text[])`;
    }
    const result = await this.client.query(
      `UPDATE review_queue_entry SET ${sets.join(", ")} WHERE ${condition} RETURNING *`,
      params
    );
    return result.rows[0] ? toQueueEntry(result.rows[0]) : null;
  }

  async listQueueEntries(filter: QueueEntryQuery): Promise<QueueEntryRecord[]> {
    const params: unknown[] = [];
    const where: string[] = [];
    const add = (clause: (placeholder: string) => string, value: unknown) => {
      params.push(value);
      where.push(clause(`$${params.length}`));
    };

    if (filter.reviewLevel !== undefined) add((p) => `review_level = ${p}`, filter.reviewLevel);
    if (filter.kind) add((p) => `kind = ${p}`, filter.kind);
    if (filter.region) add((p) => `lower(region) = lower(${p})`, filter.region);
    if (filter.district) add((p) => `lower(district) = lower(${p})`, filter.district);
    if (filter.constituency) add((p) => `lower(constituency) = lower(${p})`, filter.constituency);
    if (filter.assignedTo) add((p) => `assigned_to = ${p}`, filter.assignedTo);
    if (filter.statuses) add((p) => `status = ANY(${p}::text[])`, filter.statuses);
    if (filter.overdueBefore) add((p) => `sla_deadline < ${p}`, filter.overdueBefore);

    const result = await this.client.query(
      `SELECT * FROM review_queue_entry
        ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
        ORDER BY entered_at ASC, id ASC`,
      params
    );
    return result.rows.map(toQueueEntry);
  }

  async listBreachCandidates(now: Date): Promise<QueueEntryRecord[]> {
    const result = await this.client.query(
      `SELECT * FROM review_queue_entry
        WHERE ${LIVE_ENTRY} AND is_overdue = FALSE AND sla_deadline < $1
        ORDER BY sla_deadline ASC`,
      [now]
    );
    return result.rows.map(toQueueEntry);
  }

  async listReminderCandidates(now: Date, dueBefore: Date): Promise<QueueEntryRecord[]> {
    const result = await this.client.query(
      `SELECT * FROM review_queue_entry
        WHERE ${LIVE_ENTRY} AND reminder_sent_at IS NULL
          AND sla_deadline >= $1 AND sla_deadline <= $2
        ORDER BY sla_deadline ASC`,
      [now, dueBefore]
    );
    return result.rows.map(toQueueEntry);
  }

  async countLiveAssignments(reviewerIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    if (reviewerIds.length === 0) return counts;
    const result = await this.client.query(
      `SELECT assigned_to, COUNT(*) AS open_entries
         FROM review_queue_entry
        WHERE assigned_to = ANY($1::text[]) AND ${LIVE_ENTRY}
        GROUP BY assigned_to`,
      [reviewerIds]
    );
    for (const row of result.rows) {
      if (typeof row.assigned_to === "string") counts.set(row.assigned_to, Number(row.open_entries));
    }
    return counts;
  }

  async appendReviewAction(action: ReviewActionRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO review_action (
         id, application_id, sequence, reviewer_id, review_level, queue_entry_id, action,
         notes, metadata_jsonb, created_at, prev_hash, hash
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      [
        action.id,
        action.applicationId,
        action.sequence,
        action.reviewerId,
        action.reviewLevel,
        action.queueEntryId,
        action.action,
        action.notes,
        JSON.stringify(action.metadata),
        action.createdAt,
        action.prevHash,
        action.hash,
      ]
    );
  }

  async getLastReviewAction(applicationId: string): Promise<ReviewActionRecord | null> {
    // Lock the application row so concurrent writers extend the chain one at a time.
    await this.client.query("SELECT id FROM review_application WHERE id = $1 FOR UPDATE", [applicationId]);
    const result = await this.client.query(
      "SELECT * FROM review_action WHERE application_id = $1 ORDER BY sequence DESC LIMIT 1",
      [applicationId]
    );
    return result.rows[0] ? toReviewAction(result.rows[0]) : null;
  }

  async listReviewActions(applicationId: string): Promise<ReviewActionRecord[]> {
    const result = await this.client.query(
      "SELECT * FROM review_action WHERE application_id = $1 ORDER BY sequence ASC",
      [applicationId]
    );
    return result.rows.map(toReviewAction);
  }

  async nextSequence(scope: string): Promise<number> {
    const result = await this.client.query(
      `INSERT INTO review_sequence (scope, value) VALUES ($1, 1)
       ON CONFLICT (scope) DO UPDATE SET value = review_sequence.value + 1
       RETURNING value`,
      [scope]
    );
    const value = Number(result.rows[0]?.value);
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new InvalidStateError(`Sequence ${scope} returned an invalid value`);
    }
    return value;
  }
}

export class PgReviewRepository implements ReviewRepository {
  constructor(
    private readonly pool: SqlPool,
    private readonly observe: QueryObserver = unobserved
  ) {}

  async transaction<T>(fn: (tx: ReviewTransaction) => Promise<T>): Promise<T> {
    const raw = await this.pool.connect();
    const client: SqlClient = {
      query: (text, values) => this.observe(text, () => raw.query(text, values)),
      release: () => raw.release(),
    };
    try {
      await client.query("BEGIN");
      await client.query(`SET LOCAL lock_timeout = '${LOCK_TIMEOUT}'`);
      const result = await fn(new PgReviewTransaction(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        logWarn("Rollback failed", { error: errorMessage(rollbackError) });
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
