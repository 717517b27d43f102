import { describe, expect, it, vi } from "vitest";
import type { ApplicationRecord } from "@flockreview/shared";
import {
  ApplicationNotFoundError,
  InvalidStateError,
  LevelMismatchError,
  NotClaimedByCallerError,
  UnauthorizedError,
  ValidationError,
} from "./errors";
import { CHANGES_DEADLINE_EXPIRED } from "./workflow";
import {
  APPLICANT_ID,
  KUMASI,
  createHarness,
  enrollmentDraft,
  screeningDraft,
  submitScreening,
  tablesLockedFirst,
  type RowLock,
  type TestHarness,
} from "./workflow.test-helpers";

function actionsOf(harness: TestHarness, applicationId: string): string[] {
  return harness.repository.allActions(applicationId).map((action) => action.action);
}

function liveEntry(harness: TestHarness, applicationId: string) {
  const [entry] = harness.repository.allQueueEntries(applicationId).filter((item) => item.status !== "COMPLETED");
  if (!entry) throw new Error(`no live entry for ${applicationId}`);
  return entry;
}

function lastAction(harness: TestHarness, applicationId: string) {
  const actions = harness.repository.allActions(applicationId);
  return actions[actions.length - 1];
}

describe("ReviewWorkflowEngine: drafts and submission", () => {
  it("creates a draft with a reference number and no review level", async () => {
    const harness = createHarness();
    const draft = await harness.engine.createDraft(screeningDraft());

    expect(draft.status).toBe("DRAFT");
    expect(draft.currentReviewLevel).toBeNull();
    expect(draft.referenceNumber).toBe("FARM-2026-00001");
    expect(draft.rowVersion).toBe(0);
    const second = await harness.engine.createDraft(screeningDraft());
    expect(second.referenceNumber).toBe("FARM-2026-00002");
  });

  it("rejects a malformed draft", async () => {
    const harness = createHarness();
    const input = screeningDraft();
    await expect(
      harness.engine.createDraft({ ...input, snapshot: { ...input.snapshot, applicant: { fullName: " " } } })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("refuses to submit an incomplete application and leaves it a draft", async () => {
    const harness = createHarness();
    const draft = await harness.engine.createDraft(
      screeningDraft({ snapshot: { applicant: { fullName: "Ama Mensah" }, programTrack: "broiler" } })
    );

    const error = await harness.engine.submit(draft.id, APPLICANT_ID).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.issues.map((issue) => issue.path.join("."))).toEqual([
      "applicant.phone",
      "farm",
    ]);
    expect((await harness.engine.getApplication(draft.id)).status).toBe("DRAFT");
    expect(actionsOf(harness, draft.id)).toEqual([]);
  });

  it("only lets the applicant submit", async () => {
    const harness = createHarness();
    const draft = await harness.engine.createDraft(screeningDraft());
    await expect(harness.engine.submit(draft.id, "someone-else")).rejects.toBeInstanceOf(UnauthorizedError);
    expect(actionsOf(harness, draft.id)).toEqual(["POLICY_VIOLATION"]);
  });

  it("auto-rejects an application that fails eligibility without queueing it", async () => {
    const handler = vi.fn(async (_application: ApplicationRecord) => undefined);
    const harness = createHarness({ terminalHandlers: { NEW_FARMER_SCREENING: handler } });
    const draft = await harness.engine.createDraft(
      screeningDraft({
        snapshot: {
          applicant: { fullName: "Yaw Asante", dateOfBirth: "2010-01-01", phone: "+233209998887" },
          farm: { farmName: "Backyard Birds" },
          programTrack: "broiler",
        },
      })
    );

    const result = await harness.engine.submit(draft.id, APPLICANT_ID);

    expect(result.status).toBe("REJECTED");
    expect(result.currentReviewLevel).toBeNull();
    expect(result.eligibilityScore).toBe(20);
    expect(result.eligibilityFlags).toEqual(["AGE_BELOW_MINIMUM"]);
    expect(harness.repository.allQueueEntries(draft.id)).toEqual([]);
    expect(actionsOf(harness, draft.id)).toEqual(["SUBMITTED", "ELIGIBILITY_FAILED"]);
    expect(harness.notifier.eventTypes()).toEqual(["APPLICATION_REJECTED"]);
    expect(handler).toHaveBeenCalledTimes(1);
    await expect(harness.engine.submit(draft.id, APPLICANT_ID)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("queues a passing application at level 1", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);

    expect(app.status).toBe("UNDER_REVIEW");
    expect(app.currentReviewLevel).toBe(1);
    expect(app.eligibilityScore).toBe(50);
    expect(app.submittedAt?.toISOString()).toBe("2026-03-02T09:00:00.000Z");
    expect(actionsOf(harness, app.id)).toEqual(["SUBMITTED", "ELIGIBILITY_PASSED"]);
    expect(harness.notifier.sent[0]).toMatchObject({
      recipient: { type: "USER", userId: APPLICANT_ID },
      eventType: "APPLICATION_SUBMITTED",
      payload: {
        applicationId: app.id,
        referenceNumber: "FARM-2026-00001",
        slaDeadline: "2026-03-09T09:00:00.000Z",
      },
    });
  });
});

describe("ReviewWorkflowEngine: review decisions", () => {
  it("walks both levels and issues the identifier once", async () => {
    const handler = vi.fn(async (_application: ApplicationRecord) => undefined);
    const harness = createHarness({ terminalHandlers: { NEW_FARMER_SCREENING: handler } });
    const app = await submitScreening(harness);

    const advanced = await harness.engine.approve(app.id, "officer-tema", 1, "Farm visited");
    expect(advanced.status).toBe("UNDER_REVIEW");
    expect(advanced.currentReviewLevel).toBe(2);
    const levelTwo = liveEntry(harness, app.id);
    expect(levelTwo.reviewLevel).toBe(2);
    expect(levelTwo.status).toBe("PENDING");

    const approved = await harness.engine.approve(app.id, "coordinator-accra", 2);
    expect(approved.status).toBe("APPROVED");
    expect(approved.currentReviewLevel).toBeNull();
    expect(approved.issuedIdentifier).toBe("YEA-GREA-TEMA-0001");
    expect(approved.finalDecisionAt?.toISOString()).toBe("2026-03-02T09:00:00.000Z");
    expect(harness.issuer.calls).toBe(1);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].status).toBe("APPROVED");

    expect(harness.repository.allQueueEntries(app.id).map((entry) => entry.status)).toEqual([
      "COMPLETED",
      "COMPLETED",
    ]);
    expect(actionsOf(harness, app.id)).toEqual([
      "SUBMITTED",
      "ELIGIBILITY_PASSED",
      "CLAIMED",
      "APPROVED",
      "CLAIMED",
      "APPROVED",
      "IDENTIFIER_ISSUED",
    ]);
    expect(harness.notifier.eventTypes()).toEqual([
      "APPLICATION_SUBMITTED",
      "APPLICATION_ADVANCED",
      "APPLICATION_APPROVED",
    ]);
    expect(await harness.engine.verifyAuditTrail(app.id)).toEqual({ ok: true, checked: 7 });

    await expect(harness.engine.approve(app.id, "coordinator-accra", 2)).rejects.toBeInstanceOf(
      InvalidStateError
    );
    expect(harness.issuer.calls).toBe(1);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("requires a reason to reject and treats rejection as terminal", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);

    await expect(harness.engine.reject(app.id, "officer-tema", 1, "  ")).rejects.toBeInstanceOf(ValidationError);
    const rejected = await harness.engine.reject(app.id, "officer-tema", 1, " Farm not found at address ");

    expect(rejected.status).toBe("REJECTED");
    expect(rejected.currentReviewLevel).toBeNull();
    expect(lastAction(harness, app.id)).toMatchObject({ action: "REJECTED", notes: "Farm not found at address" });
    expect(liveEntryCount(harness, app.id)).toBe(0);
    await expect(harness.engine.approve(app.id, "officer-tema", 1)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("records a policy violation for a decision at the wrong level", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);

    await expect(harness.engine.approve(app.id, "coordinator-accra", 2)).rejects.toBeInstanceOf(
      LevelMismatchError
    );

    expect(lastAction(harness, app.id)).toMatchObject({
      action: "POLICY_VIOLATION",
      reviewerId: "coordinator-accra",
      reviewLevel: 2,
      metadata: { code: "LEVEL_MISMATCH" },
    });
    const unchanged = await harness.engine.getApplication(app.id);
    expect(unchanged.currentReviewLevel).toBe(1);
    expect(unchanged.rowVersion).toBe(app.rowVersion);
    expect(liveEntry(harness, app.id).status).toBe("PENDING");
  });

  it("records a policy violation for a reviewer outside the jurisdiction", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);

    await expect(harness.engine.approve(app.id, "officer-kumasi", 1)).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(harness.engine.reject(app.id, "ghost", 1, "no")).rejects.toBeInstanceOf(UnauthorizedError);

    const violations = harness.repository
      .allActions(app.id)
      .filter((action) => action.action === "POLICY_VIOLATION");
    expect(violations.map((action) => action.reviewerId)).toEqual(["officer-kumasi", "ghost"]);
    expect(violations.every((action) => action.metadata.code === "UNAUTHORIZED")).toBe(true);
    expect(await harness.engine.verifyAuditTrail(app.id)).toEqual({ ok: true, checked: 4 });
  });

  it("refuses a decision on an entry claimed by someone else", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    await harness.engine.claim(liveEntry(harness, app.id).id, "officer-tema");

    await expect(harness.engine.approve(app.id, "officer-tema-2", 1)).rejects.toBeInstanceOf(
      NotClaimedByCallerError
    );
    expect(actionsOf(harness, app.id)).toEqual(["SUBMITTED", "ELIGIBILITY_PASSED", "CLAIMED"]);
  });

  it("checks reviewer eligibility before claiming", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    const entry = liveEntry(harness, app.id);

    await expect(harness.engine.claim(entry.id, "officer-kumasi")).rejects.toBeInstanceOf(UnauthorizedError);
    expect(liveEntry(harness, app.id).status).toBe("PENDING");
    const claimed = await harness.engine.claim(entry.id, "officer-tema");
    expect(claimed.assignedTo).toBe("officer-tema");
    const released = await harness.engine.release(entry.id, "officer-tema");
    expect(released.status).toBe("PENDING");
  });

  it("leaves no partial state when a write fails mid-transition", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    harness.repository.hooks.beforeAppendReviewAction = (action) => {
      if (action.action === "APPROVED") throw new Error("disk full");
    };

    await expect(harness.engine.approve(app.id, "officer-tema", 1)).rejects.toThrow("disk full");

    const unchanged = await harness.engine.getApplication(app.id);
    expect(unchanged.status).toBe("UNDER_REVIEW");
    expect(unchanged.currentReviewLevel).toBe(1);
    expect(harness.repository.allQueueEntries(app.id)).toHaveLength(1);
    expect(liveEntry(harness, app.id).status).toBe("PENDING");
    expect(actionsOf(harness, app.id)).toEqual(["SUBMITTED", "ELIGIBILITY_PASSED"]);
    expect(harness.notifier.eventTypes()).toEqual(["APPLICATION_SUBMITTED"]);

    harness.repository.hooks.beforeAppendReviewAction = undefined;
    const advanced = await harness.engine.approve(app.id, "officer-tema", 1);
    expect(advanced.currentReviewLevel).toBe(2);
  });

  it("keeps a committed transition when notification delivery fails", async () => {
    const harness = createHarness();
    harness.notifier.failWith = new Error("sms gateway unavailable");

    const app = await submitScreening(harness);

    expect(app.status).toBe("UNDER_REVIEW");
    expect((await harness.engine.getApplication(app.id)).status).toBe("UNDER_REVIEW");
    expect(harness.notifier.sent).toEqual([]);
  });

  it("returns decisions and runs terminal handlers while delivery never settles", async () => {
    const handler = vi.fn(async (_application: ApplicationRecord) => undefined);
    const notify = vi.fn(() => new Promise<void>(() => undefined));
    const harness = createHarness({ notifier: { notify }, terminalHandlers: { NEW_FARMER_SCREENING: handler } });

    const app = await submitScreening(harness);
    await harness.engine.approve(app.id, "officer-tema", 1);
    const approved = await harness.engine.approve(app.id, "coordinator-accra", 2);

    expect(approved.status).toBe("APPROVED");
    expect(handler).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledTimes(3);
    expect(harness.engine.pendingNotificationCount).toBe(3);
  });

  it("waits for outstanding deliveries on flush", async () => {
    const releases: Array<() => void> = [];
    const notify = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          releases.push(resolve);
        })
    );
    const harness = createHarness({ notifier: { notify } });

    await submitScreening(harness);
    expect(harness.engine.pendingNotificationCount).toBe(1);

    const flushed = harness.engine.flushNotifications();
    releases.forEach((release) => release());
    await flushed;
    expect(harness.engine.pendingNotificationCount).toBe(0);
  });

  it("does not fail the decision when the terminal handler throws", async () => {
    const harness = createHarness({
      terminalHandlers: {
        NEW_FARMER_SCREENING: async () => {
          throw new Error("onboarding service down");
        },
      },
    });
    const app = await submitScreening(harness);
    const rejected = await harness.engine.reject(app.id, "officer-tema", 1, "Duplicate registration");
    expect(rejected.status).toBe("REJECTED");
  });
});

function liveEntryCount(harness: TestHarness, applicationId: string): number {
  return harness.repository.allQueueEntries(applicationId).filter((entry) => entry.status !== "COMPLETED").length;
}

describe("ReviewWorkflowEngine: changes requested", () => {
  it("returns a resubmission to the same reviewer and keeps the eligibility score", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);

    const waiting = await harness.engine.requestChanges(app.id, "officer-tema", 1, ["Upload a farm photo", " "]);
    expect(waiting.status).toBe("CHANGES_REQUESTED");
    expect(waiting.currentReviewLevel).toBe(1);
    expect(waiting.changesRequested).toEqual(["Upload a farm photo"]);
    expect(waiting.changesDeadline?.toISOString()).toBe("2026-03-16T09:00:00.000Z");
    expect(liveEntry(harness, app.id)).toMatchObject({ status: "IN_PROGRESS", assignedTo: "officer-tema" });
    await expect(harness.engine.approve(app.id, "officer-tema", 1)).rejects.toBeInstanceOf(InvalidStateError);

    harness.clock.advanceDays(3);
    const draft = screeningDraft();
    const resubmitted = await harness.engine.resubmit(app.id, APPLICANT_ID, {
      ...draft.snapshot,
      programTrack: "turkeys",
      documents: ["ghana_card", "farm_photo"],
    });

    expect(resubmitted.status).toBe("UNDER_REVIEW");
    expect(resubmitted.currentReviewLevel).toBe(1);
    expect(resubmitted.resubmissionCount).toBe(1);
    expect(resubmitted.changesRequested).toEqual([]);
    expect(resubmitted.changesDeadline).toBeNull();
    expect(resubmitted.eligibilityScore).toBe(50);
    expect(resubmitted.snapshot.documents).toEqual(["ghana_card", "farm_photo"]);
    expect(liveEntry(harness, app.id)).toMatchObject({ status: "CLAIMED", assignedTo: "officer-tema" });
    expect(harness.notifier.sent[harness.notifier.sent.length - 1]).toMatchObject({
      recipient: { type: "USER", userId: "officer-tema" },
      eventType: "REVIEW_ASSIGNED",
    });

    const advanced = await harness.engine.approve(app.id, "officer-tema", 1);
    expect(advanced.currentReviewLevel).toBe(2);
  });

  it("validates the requested changes and deadline", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    await expect(harness.engine.requestChanges(app.id, "officer-tema", 1, [" "])).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(
      harness.engine.requestChanges(app.id, "officer-tema", 1, ["Upload a farm photo"], 0)
    ).rejects.toBeInstanceOf(ValidationError);
    const waiting = await harness.engine.requestChanges(app.id, "officer-tema", 1, ["Upload a farm photo"], 3);
    expect(waiting.changesDeadline?.toISOString()).toBe("2026-03-05T09:00:00.000Z");
  });

  it("auto-rejects a resubmission that arrives after the deadline", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    await harness.engine.requestChanges(app.id, "officer-tema", 1, ["Upload a farm photo"]);
    harness.clock.advanceDays(15);

    const result = await harness.engine.resubmit(app.id, APPLICANT_ID, screeningDraft().snapshot);

    expect(result.status).toBe("REJECTED");
    expect(result.currentReviewLevel).toBeNull();
    expect(liveEntryCount(harness, app.id)).toBe(0);
    expect(lastAction(harness, app.id)).toMatchObject({
      action: "AUTO_REJECTED",
      reviewLevel: 1,
      metadata: {
        reason: CHANGES_DEADLINE_EXPIRED,
        deadline: "2026-03-16T09:00:00.000Z",
        policy: "AUTO_REJECT",
      },
    });
    expect(harness.notifier.eventTypes()).toContain("CHANGES_DEADLINE_EXPIRED");
  });

  it("escalates an expired change request when the program says so", async () => {
    const harness = createHarness();
    const draft = await harness.engine.createDraft(enrollmentDraft());
    expect(draft.referenceNumber).toBe("PROG-2026-00001");
    const app = await harness.engine.submit(draft.id, APPLICANT_ID);
    expect(app.eligibilityScore).toBe(100);

    await harness.engine.requestChanges(app.id, "coordinator-accra", 1, ["Add the farm's tax id"], 3);
    harness.clock.advanceDays(2);
    expect((await harness.engine.applyChangesExpiry(app.id)).status).toBe("CHANGES_REQUESTED");

    harness.clock.advanceDays(2);
    const escalated = await harness.engine.applyChangesExpiry(app.id);

    expect(escalated.status).toBe("UNDER_REVIEW");
    expect(escalated.currentReviewLevel).toBe(1);
    expect(escalated.changesDeadline).toBeNull();
    const entry = liveEntry(harness, app.id);
    expect(entry.status).toBe("PENDING");
    expect(entry.assignedTo).toBeNull();
    expect(entry.escalatedAt?.toISOString()).toBe("2026-03-06T09:00:00.000Z");
    expect(lastAction(harness, app.id)).toMatchObject({
      action: "ESCALATED",
      metadata: { reason: CHANGES_DEADLINE_EXPIRED, policy: "ESCALATE" },
    });
    expect(harness.notifier.sent.slice(-2).map((item) => item.recipient)).toEqual([
      { type: "USER", userId: APPLICANT_ID },
      { type: "ROLE", role: "NATIONAL_ADMIN", region: "Greater Accra" },
    ]);

    const actionCount = harness.repository.allActions(app.id).length;
    await harness.engine.applyChangesExpiry(app.id);
    expect(harness.repository.allActions(app.id)).toHaveLength(actionCount);
  });

  it("records the discarded snapshot when a late resubmission is escalated", async () => {
    const harness = createHarness();
    const draft = await harness.engine.createDraft(enrollmentDraft());
    const app = await harness.engine.submit(draft.id, APPLICANT_ID);
    await harness.engine.requestChanges(app.id, "coordinator-accra", 1, ["Add the farm's tax id"], 3);
    harness.clock.advanceDays(4);

    const late = { ...enrollmentDraft().snapshot, taxId: "TIN-0001" };
    const result = await harness.engine.resubmit(app.id, APPLICANT_ID, late);

    expect(result.status).toBe("UNDER_REVIEW");
    expect(result.resubmissionCount).toBe(0);
    expect(result.snapshot).toEqual(app.snapshot);
    expect(lastAction(harness, app.id)).toMatchObject({
      action: "ESCALATED",
      metadata: {
        reason: CHANGES_DEADLINE_EXPIRED,
        policy: "ESCALATE",
        resubmissionDiscarded: true,
        discardedResubmissionBy: APPLICANT_ID,
      },
    });
    expect(actionsOf(harness, app.id)).not.toContain("RESUBMITTED");
  });

  it("refuses a resubmission from anyone but the applicant", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    await harness.engine.requestChanges(app.id, "officer-tema", 1, ["Upload a farm photo"]);
    await expect(
      harness.engine.resubmit(app.id, "someone-else", screeningDraft().snapshot)
    ).rejects.toBeInstanceOf(UnauthorizedError);
    expect((await harness.engine.getApplication(app.id)).status).toBe("CHANGES_REQUESTED");
  });
});

describe("ReviewWorkflowEngine: withdrawal and reassignment", () => {
  it("withdraws an application under review and tells its reviewer", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    await harness.engine.claim(liveEntry(harness, app.id).id, "officer-tema");

    await expect(harness.engine.withdraw(app.id, "someone-else")).rejects.toBeInstanceOf(UnauthorizedError);
    const withdrawn = await harness.engine.withdraw(app.id, APPLICANT_ID, "Moved abroad");

    expect(withdrawn.status).toBe("WITHDRAWN");
    expect(withdrawn.currentReviewLevel).toBeNull();
    expect(liveEntryCount(harness, app.id)).toBe(0);
    expect(lastAction(harness, app.id)).toMatchObject({ action: "WITHDRAWN", notes: "Moved abroad", reviewLevel: 1 });
    expect(harness.notifier.sent[harness.notifier.sent.length - 1]).toMatchObject({
      recipient: { type: "USER", userId: "officer-tema" },
      eventType: "APPLICATION_WITHDRAWN",
    });
    await expect(harness.engine.withdraw(app.id, APPLICANT_ID)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("lets a supervisor move a claimed entry to another eligible reviewer", async () => {
    const harness = createHarness();
    const app = await submitScreening(harness);
    const entry = liveEntry(harness, app.id);
    await harness.engine.claim(entry.id, "officer-tema");

    await expect(
      harness.engine.reassign(entry.id, "officer-tema-2", "coordinator-accra")
    ).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(harness.engine.reassign(entry.id, "officer-kumasi", "admin-national")).rejects.toBeInstanceOf(
      UnauthorizedError
    );

    const reassigned = await harness.engine.reassign(entry.id, "officer-tema-2", "admin-national");
    expect(reassigned.status).toBe("CLAIMED");
    expect(reassigned.assignedTo).toBe("officer-tema-2");
    expect(lastAction(harness, app.id)).toMatchObject({
      action: "REASSIGNED",
      reviewerId: "admin-national",
      metadata: { previousAssignee: "officer-tema", newAssignee: "officer-tema-2" },
    });
    expect(harness.notifier.sent[harness.notifier.sent.length - 1]).toMatchObject({
      recipient: { type: "USER", userId: "officer-tema-2" },
      eventType: "REVIEW_ASSIGNED",
    });

    const approved = await harness.engine.approve(app.id, "officer-tema-2", 1);
    expect(approved.currentReviewLevel).toBe(2);
  });
});

describe("ReviewWorkflowEngine: invariants", () => {
  it("keeps the level null exactly when the application is a draft or terminal", async () => {
    const harness = createHarness();
    const approved = await submitScreening(harness);
    await harness.engine.approve(approved.id, "officer-tema", 1);
    await harness.engine.approve(approved.id, "coordinator-accra", 2);
    const rejected = await submitScreening(harness, { jurisdiction: KUMASI });
    await harness.engine.reject(rejected.id, "officer-kumasi", 1, "Incomplete farm records");
    const draft = await harness.engine.createDraft(screeningDraft());
    const active = await submitScreening(harness);

    for (const id of [approved.id, rejected.id, draft.id, active.id]) {
      const app = await harness.engine.getApplication(id);
      const inactive = ["DRAFT", "APPROVED", "REJECTED", "WITHDRAWN"].includes(app.status);
      expect(app.currentReviewLevel === null).toBe(inactive);
      const live = harness.repository.allQueueEntries(id).filter((entry) => entry.status !== "COMPLETED");
      expect(live.length).toBe(inactive ? 0 : 1);
    }
  });

  it("reports unknown applications", async () => {
    const harness = createHarness();
    await expect(harness.engine.getApplication("missing")).rejects.toBeInstanceOf(ApplicationNotFoundError);
    await expect(harness.engine.getAuditTrail("missing")).rejects.toBeInstanceOf(ApplicationNotFoundError);
  });
});

describe("ReviewWorkflowEngine: row lock order", () => {
  it("locks the application before its queue entry in every transaction", async () => {
    const harness = createHarness();
    const locks: RowLock[] = [];
    harness.repository.hooks.onRowLock = (lock) => {
      locks.push(lock);
    };

    const app = await submitScreening(harness);
    const entryId = liveEntry(harness, app.id).id;
    await harness.engine.claim(entryId, "officer-tema");
    await harness.engine.release(entryId, "officer-tema");
    await harness.engine.queue.claim(entryId, "officer-tema");
    await harness.engine.release(entryId, "officer-tema");
    await harness.engine.reassign(entryId, "officer-tema-2", "admin-national");
    await harness.engine.approve(app.id, "officer-tema-2", 1);
    await harness.engine.requestChanges(app.id, "coordinator-accra", 2, ["Add a photo of the pen"]);
    await harness.engine.resubmit(app.id, APPLICANT_ID, screeningDraft().snapshot);
    const other = await submitScreening(harness);
    await harness.engine.withdraw(other.id, APPLICANT_ID);

    expect(locks.some((lock) => lock.table === "queue_entry")).toBe(true);
    expect(tablesLockedFirst(locks).filter((table) => table !== "application")).toEqual([]);
  });
});
