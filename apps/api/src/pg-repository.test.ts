import { describe, expect, it, vi } from "vitest";
import { observeQuery } from "./db";
import { DuplicateEntryError, InvalidStateError } from "./errors";
import { getMetricsSnapshot } from "./observability/metrics";
import { PgReviewRepository, type SqlClient, type SqlQueryResult } from "./pg-repository";

type Responder = (text: string, values?: unknown[]) => SqlQueryResult | Promise<SqlQueryResult>;

function empty(rowCount = 0): SqlQueryResult {
  return { rows: [], rowCount };
}

function fakePool(respond: Responder = () => empty()) {
  const query = vi.fn(async (text: string, values?: unknown[]) => respond(text, values));
  const release = vi.fn();
  const client: SqlClient = { query, release };
  const connect = vi.fn(async () => client);
  return { pool: { connect }, query, release };
}

function statements(query: ReturnType<typeof fakePool>["query"]): string[] {
  return query.mock.calls.map(([text]) => text.replace(/\s+/g, " ").trim());
}

const ENTRY_ROW = {
  id: "entry-1",
  application_id: "app-1",
  kind: "NEW_FARMER_SCREENING",
  review_level: 1,
  status: "CLAIMED",
  assigned_to: "officer-tema",
  claimed_at: "2026-03-02T10:00:00.000Z",
  auto_assigned: false,
  priority_snapshot: 12,
  region: "Greater Accra",
  district: "Tema Metropolitan",
  constituency: "Tema East",
  sla_deadline: new Date("2026-03-09T09:00:00.000Z"),
  is_overdue: false,
  escalated_at: null,
  reminder_sent_at: null,
  entered_at: new Date("2026-03-02T09:00:00.000Z"),
  completed_at: null,
};

describe("PgReviewRepository.transaction", () => {
  it("wraps the callback in BEGIN and COMMIT with a lock timeout", async () => {
    const { pool, query, release } = fakePool();
    const repository = new PgReviewRepository(pool);

    const result = await repository.transaction(async () => "done");

    expect(result).toBe("done");
    expect(statements(query)).toEqual(["BEGIN", "SET LOCAL lock_timeout = '5s'", "COMMIT"]);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("rolls back and rethrows when the callback fails", async () => {
    const { pool, query, release } = fakePool();
    const repository = new PgReviewRepository(pool);

    await expect(
      repository.transaction(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(statements(query)).toEqual(["BEGIN", "SET LOCAL lock_timeout = '5s'", "ROLLBACK"]);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("keeps the original error when the rollback also fails", async () => {
    const { pool, release } = fakePool((text) => {
      if (text === "ROLLBACK") throw new Error("connection lost");
      return empty();
    });
    const repository = new PgReviewRepository(pool);

    await expect(
      repository.transaction(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(release).toHaveBeenCalledTimes(1);
  });
});

describe("query observation", () => {
  it("passes every transaction statement through the observer", async () => {
    const { pool } = fakePool((text) =>
      text.startsWith("SELECT * FROM review_queue_entry") ? { rows: [ENTRY_ROW], rowCount: 1 } : empty()
    );
    const seen: string[] = [];
    const repository = new PgReviewRepository(pool, async (text, run) => {
      seen.push(text);
      return run();
    });

    const entry = await repository.transaction((tx) => tx.getQueueEntry("entry-1"));

    expect(entry?.id).toBe("entry-1");
    expect(seen).toEqual([
      "BEGIN",
      "SET LOCAL lock_timeout = '5s'",
      "SELECT * FROM review_queue_entry WHERE id = $1",
      "COMMIT",
    ]);
  });

  it("counts observed statements in the query metrics", async () => {
    const result = await observeQuery("VACUUM review_sequence", async () => empty());

    expect(result.rowCount).toBe(0);
    const line = (await getMetricsSnapshot())
      .split("\n")
      .find(
        (row) =>
          row.startsWith("flockreview_db_queries_total{") &&
          row.includes('operation="VACUUM"') &&
          row.includes('success="true"')
      );
    expect(line?.endsWith(" 1")).toBe(true);
  });
});

describe("PgReviewTransaction", () => {
  it("maps a queue entry row into a record", async () => {
    const { pool } = fakePool((text) =>
      text.startsWith("SELECT * FROM review_queue_entry") ? { rows: [ENTRY_ROW], rowCount: 1 } : empty()
    );
    const repository = new PgReviewRepository(pool);

    const entry = await repository.transaction((tx) => tx.getQueueEntry("entry-1"));

    expect(entry).toEqual({
      id: "entry-1",
      applicationId: "app-1",
      kind: "NEW_FARMER_SCREENING",
      reviewLevel: 1,
      status: "CLAIMED",
      assignedTo: "officer-tema",
      claimedAt: new Date("2026-03-02T10:00:00.000Z"),
      autoAssigned: false,
      prioritySnapshot: 12,
      jurisdiction: { region: "Greater Accra", district: "Tema Metropolitan", constituency: "Tema East" },
      slaDeadline: new Date("2026-03-09T09:00:00.000Z"),
      isOverdue: false,
      escalatedAt: null,
      reminderSentAt: null,
      enteredAt: new Date("2026-03-02T09:00:00.000Z"),
      completedAt: null,
    });
  });

  it("builds a conditional update and returns null when no row matched", async () => {
    const { pool, query } = fakePool();
    const repository = new PgReviewRepository(pool);
    const claimedAt = new Date("2026-03-02T10:00:00.000Z");

    const updated = await repository.transaction((tx) =>
      tx.updateQueueEntry(
        "entry-1",
        { status: "CLAIMED", assignedTo: "officer-tema", claimedAt },
        { expectedStatuses: ["PENDING"] }
      )
    );

    expect(updated).toBeNull();
    const call = query.mock.calls[2];
    expect(call[0]).toBe(
      "UPDATE review_queue_entry SET status = $2, assigned_to = $3, claimed_at = $4 WHERE id = $1 AND status = ANY($5::text[]) RETURNING *"
    );
    expect(call[1]).toEqual(["entry-1", "CLAIMED", "officer-tema", claimedAt, ["PENDING"]]);
  });

  it("writes a null assignee instead of skipping it", async () => {
    const { pool, query } = fakePool(() => ({ rows: [{ ...ENTRY_ROW, status: "PENDING", assigned_to: null, claimed_at: null }], rowCount: 1 }));
    const repository = new PgReviewRepository(pool);

    const released = await repository.transaction((tx) =>
      tx.updateQueueEntry("entry-1", { status: "PENDING", assignedTo: null, claimedAt: null })
    );

    expect(released?.assignedTo).toBeNull();
    expect(query.mock.calls[2][1]).toEqual(["entry-1", "PENDING", null, null]);
  });

  it("turns a unique violation into DuplicateEntryError", async () => {
    const { pool } = fakePool((text) => {
      if (text.includes("INSERT INTO review_queue_entry")) {
        throw Object.assign(new Error("duplicate key value"), { code: "23505" });
      }
      return empty();
    });
    const repository = new PgReviewRepository(pool);

    await expect(
      repository.transaction((tx) =>
        tx.insertQueueEntry({
          id: "entry-2",
          applicationId: "app-1",
          kind: "NEW_FARMER_SCREENING",
          reviewLevel: 1,
          status: "PENDING",
          assignedTo: null,
          claimedAt: null,
          autoAssigned: false,
          prioritySnapshot: 0,
          jurisdiction: { region: "Greater Accra", district: "", constituency: "" },
          slaDeadline: new Date("2026-03-09T09:00:00.000Z"),
          isOverdue: false,
          escalatedAt: null,
          reminderSentAt: null,
          enteredAt: new Date("2026-03-02T09:00:00.000Z"),
          completedAt: null,
        })
      )
    ).rejects.toBeInstanceOf(DuplicateEntryError);
  });

  it("reads sequence values returned as text", async () => {
    const { pool, query } = fakePool((text) =>
      text.includes("review_sequence") ? { rows: [{ value: "42" }], rowCount: 1 } : empty()
    );
    const repository = new PgReviewRepository(pool);

    expect(await repository.transaction((tx) => tx.nextSequence("reference:FARM-2026"))).toBe(42);
    expect(query.mock.calls[2][1]).toEqual(["reference:FARM-2026"]);
  });

  it("rejects a stale application save", async () => {
    const { pool } = fakePool();
    const repository = new PgReviewRepository(pool);

    await expect(
      repository.transaction(async (tx) => {
        const snapshot = { applicant: { fullName: "Ama Mensah" }, sponsored: false, documents: [] };
        await tx.saveApplication(
          {
            id: "app-1",
            referenceNumber: "FARM-2026-00001",
            kind: "NEW_FARMER_SCREENING",
            status: "UNDER_REVIEW",
            currentReviewLevel: 1,
            applicantId: "farmer-1",
            jurisdiction: { region: "Greater Accra", district: "", constituency: "" },
            snapshot,
            eligibilityScore: 50,
            eligibilityFlags: [],
            changesRequested: [],
            changesDeadline: null,
            resubmissionCount: 0,
            issuedIdentifier: null,
            rowVersion: 2,
            submittedAt: null,
            finalDecisionAt: null,
            createdAt: new Date("2026-03-02T09:00:00.000Z"),
            updatedAt: new Date("2026-03-02T09:00:00.000Z"),
          },
          1
        );
      })
    ).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("filters queue listings case-insensitively by area", async () => {
    const { pool, query } = fakePool();
    const repository = new PgReviewRepository(pool);

    await repository.transaction((tx) =>
      tx.listQueueEntries({ reviewLevel: 2, region: "greater accra", statuses: ["PENDING", "CLAIMED"] })
    );

    const [text, values] = query.mock.calls[2];
    expect(text.replace(/\s+/g, " ").trim()).toBe(
      "SELECT * FROM review_queue_entry WHERE review_level = $1 AND lower(region) = lower($2) AND status = ANY($3::text[]) ORDER BY entered_at ASC, id ASC"
    );
    expect(values).toEqual([2, "greater accra", ["PENDING", "CLAIMED"]]);
  });
});
