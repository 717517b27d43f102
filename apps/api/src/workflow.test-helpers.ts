import {
  LIVE_QUEUE_STATUSES,
  type ApplicationRecord,
  type DraftApplicationInput,
  type ProgramRulesInput,
  type QueueEntryRecord,
  type QueueEntryStatus,
  type ReviewActionRecord,
} from "@flockreview/shared";
import { DuplicateEntryError, InvalidStateError } from "./errors";
import { SequentialIdentifierIssuer, type IdentifierIssuer, type IssueContext } from "./identifiers";
import type {
  NotificationEventType,
  NotificationPayload,
  NotificationRecipient,
  Notifier,
} from "./notifications";
import type { ReviewerProfile, ReviewerResolver } from "./policy";
import { StaticProgramRulesProvider } from "./program-rules";
import type {
  QueueEntryPatch,
  QueueEntryQuery,
  ReviewRepository,
  ReviewTransaction,
} from "./repository";
import { ReviewWorkflowEngine, type ReviewWorkflowDeps } from "./workflow";

// ── In-process repository ─────────────────────────────────────────────────────

interface MemoryState {
  applications: Map<string, ApplicationRecord>;
  entries: Map<string, QueueEntryRecord>;
  actions: ReviewActionRecord[];
  sequences: Map<string, number>;
}

function sameArea(left: string, right: string): boolean {
  return left.trim().toLowerCase() === right.trim().toLowerCase();
}

function matchesQuery(entry: QueueEntryRecord, filter: QueueEntryQuery): boolean {
  if (filter.reviewLevel !== undefined && entry.reviewLevel !== filter.reviewLevel) return false;
  if (filter.kind && entry.kind !== filter.kind) return false;
  if (filter.region && !sameArea(entry.jurisdiction.region, filter.region)) return false;
  if (filter.district && !sameArea(entry.jurisdiction.district, filter.district)) return false;
  if (filter.constituency && !sameArea(entry.jurisdiction.constituency, filter.constituency)) return false;
  if (filter.assignedTo && entry.assignedTo !== filter.assignedTo) return false;
  if (filter.statuses && !filter.statuses.includes(entry.status)) return false;
  if (filter.overdueBefore && entry.slaDeadline.getTime() >= filter.overdueBefore.getTime()) return false;
  return true;
}

function isLive(entry: QueueEntryRecord): boolean {
  return LIVE_QUEUE_STATUSES.includes(entry.status);
}

class MemoryTransaction implements ReviewTransaction {
  constructor(
    private readonly state: MemoryState,
    private readonly hooks: MemoryRepositoryHooks,
    private readonly transactionId: number
  ) {}

  /** Reports the row locks the Postgres repository would take for the same call. */
  private lock(table: RowLock["table"], id: string): void {
    this.hooks.onRowLock?.({ transactionId: this.transactionId, table, id });
  }

  async getApplication(id: string, options?: { forUpdate?: boolean }): Promise<ApplicationRecord | null> {
    if (options?.forUpdate) this.lock("application", id);
    const found = this.state.applications.get(id);
    return found ? structuredClone(found) : null;
  }

  async getApplications(ids: string[]): Promise<ApplicationRecord[]> {
    return ids.flatMap((id) => {
      const found = this.state.applications.get(id);
      return found ? [structuredClone(found)] : [];
    });
  }

  async insertApplication(application: ApplicationRecord): Promise<void> {
    this.state.applications.set(application.id, structuredClone(application));
  }

  async saveApplication(next: ApplicationRecord, expectedRowVersion: number): Promise<void> {
    const current = this.state.applications.get(next.id);
    if (!current || current.rowVersion !== expectedRowVersion) {
      throw new InvalidStateError(`Application ${next.id} was modified concurrently`);
    }
    this.state.applications.set(next.id, structuredClone(next));
  }

  async listExpiredChangeRequests(now: Date): Promise<ApplicationRecord[]> {
    return Array.from(this.state.applications.values())
      .filter(
        (app) =>
          app.status === "CHANGES_REQUESTED" &&
          app.changesDeadline !== null &&
          app.changesDeadline.getTime() < now.getTime()
      )
      .map((app) => structuredClone(app));
  }

  async getQueueEntry(id: string, options?: { forUpdate?: boolean }): Promise<QueueEntryRecord | null> {
    if (options?.forUpdate) this.lock("queue_entry", id);
    const found = this.state.entries.get(id);
    return found ? structuredClone(found) : null;
  }

  async findLiveQueueEntry(applicationId: string): Promise<QueueEntryRecord | null> {
    const found = Array.from(this.state.entries.values()).find(
      (entry) => entry.applicationId === applicationId && isLive(entry)
    );
    if (found) this.lock("queue_entry", found.id);
    return found ? structuredClone(found) : null;
  }

  async insertQueueEntry(entry: QueueEntryRecord): Promise<void> {
    const duplicate = Array.from(this.state.entries.values()).some(
      (existing) =>
        existing.applicationId === entry.applicationId &&
        existing.reviewLevel === entry.reviewLevel &&
        isLive(existing)
    );
    if (duplicate) throw new DuplicateEntryError(entry.applicationId, entry.reviewLevel);
    this.state.entries.set(entry.id, structuredClone(entry));
  }

  async updateQueueEntry(
    id: string,
    patch: QueueEntryPatch,
    options?: { expectedStatuses?: QueueEntryStatus[] }
  ): Promise<QueueEntryRecord | null> {
    const current = this.state.entries.get(id);
    if (!current) return null;
    this.lock("queue_entry", id);
    if (options?.expectedStatuses && !options.expectedStatuses.includes(current.status)) return null;
    const next = { ...current, ...patch };
    this.state.entries.set(id, next);
    return structuredClone(next);
  }

  async listQueueEntries(filter: QueueEntryQuery): Promise<QueueEntryRecord[]> {
    return Array.from(this.state.entries.values())
      .filter((entry) => matchesQuery(entry, filter))
      .map((entry) => structuredClone(entry));
  }

  async listBreachCandidates(now: Date): Promise<QueueEntryRecord[]> {
    return Array.from(this.state.entries.values())
      .filter((entry) => isLive(entry) && !entry.isOverdue && entry.slaDeadline.getTime() < now.getTime())
      .map((entry) => structuredClone(entry));
  }

  async listReminderCandidates(now: Date, dueBefore: Date): Promise<QueueEntryRecord[]> {
    return Array.from(this.state.entries.values())
      .filter(
        (entry) =>
          isLive(entry) &&
          entry.reminderSentAt === null &&
          entry.slaDeadline.getTime() >= now.getTime() &&
          entry.slaDeadline.getTime() <= dueBefore.getTime()
      )
      .map((entry) => structuredClone(entry));
  }

  async countLiveAssignments(reviewerIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    for (const entry of this.state.entries.values()) {
      if (!entry.assignedTo || !isLive(entry) || !reviewerIds.includes(entry.assignedTo)) continue;
      counts.set(entry.assignedTo, (counts.get(entry.assignedTo) ?? 0) + 1);
    }
    return counts;
  }

  async appendReviewAction(action: ReviewActionRecord): Promise<void> {
    this.hooks.beforeAppendReviewAction?.(action);
    this.state.actions.push(structuredClone(action));
  }

  async getLastReviewAction(applicationId: string): Promise<ReviewActionRecord | null> {
    this.lock("application", applicationId);
    const own = this.state.actions.filter((action) => action.applicationId === applicationId);
    const last = own[own.length - 1];
    return last ? structuredClone(last) : null;
  }

  async listReviewActions(applicationId: string): Promise<ReviewActionRecord[]> {
    return this.state.actions
      .filter((action) => action.applicationId === applicationId)
      .sort((a, b) => a.sequence - b.sequence)
      .map((action) => structuredClone(action));
  }

  async nextSequence(scope: string): Promise<number> {
    const next = (this.state.sequences.get(scope) ?? 0) + 1;
    this.state.sequences.set(scope, next);
    return next;
  }
}

export interface RowLock {
  transactionId: number;
  table: "application" | "queue_entry";
  id: string;
}

export interface MemoryRepositoryHooks {
  /** Throw from here to simulate a write failure mid-transaction. */
  beforeAppendReviewAction?: (action: ReviewActionRecord) => void;
  onRowLock?: (lock: RowLock) => void;
}

/**
 * Serializes transactions on a promise chain. Each transaction works on a
 * deep copy that replaces the committed state only when the callback resolves.
 */
export class MemoryReviewRepository implements ReviewRepository {
  readonly hooks: MemoryRepositoryHooks = {};
  private state: MemoryState = {
    applications: new Map(),
    entries: new Map(),
    actions: [],
    sequences: new Map(),
  };
  private tail: Promise<void> = Promise.resolve();
  private transactionCount = 0;

  transaction<T>(fn: (tx: ReviewTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const working = structuredClone(this.state);
      this.transactionCount += 1;
      const result = await fn(new MemoryTransaction(working, this.hooks, this.transactionCount));
      this.state = working;
      return result;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  allQueueEntries(applicationId?: string): QueueEntryRecord[] {
    return Array.from(this.state.entries.values())
      .filter((entry) => !applicationId || entry.applicationId === applicationId)
      .map((entry) => structuredClone(entry));
  }

  allActions(applicationId?: string): ReviewActionRecord[] {
    return this.state.actions
      .filter((action) => !applicationId || action.applicationId === applicationId)
      .map((action) => structuredClone(action));
  }

  /** Direct write for tamper and fixture scenarios. */
  overwriteAction(action: ReviewActionRecord): void {
    this.state.actions = this.state.actions.map((existing) => (existing.id === action.id ? action : existing));
  }
}

/** The table each transaction locked first, in transaction order. */
export function tablesLockedFirst(locks: readonly RowLock[]): Array<RowLock["table"]> {
  const first = new Map<number, RowLock["table"]>();
  for (const lock of locks) {
    if (!first.has(lock.transactionId)) first.set(lock.transactionId, lock.table);
  }
  return Array.from(first.values());
}

// ── Collaborator doubles ──────────────────────────────────────────────────────

export class StaticReviewerResolver implements ReviewerResolver {
  private readonly profiles: Map<string, ReviewerProfile>;

  constructor(profiles: ReviewerProfile[]) {
    this.profiles = new Map(profiles.map((profile) => [profile.userId, profile]));
  }

  async resolve(userId: string): Promise<ReviewerProfile | null> {
    return this.profiles.get(userId) ?? null;
  }

  async listActiveReviewers(roles: readonly string[]): Promise<ReviewerProfile[]> {
    return Array.from(this.profiles.values()).filter((profile) => roles.includes(profile.role));
  }
}

export interface SentNotification {
  recipient: NotificationRecipient;
  eventType: NotificationEventType;
  payload: NotificationPayload;
}

export class RecordingNotifier implements Notifier {
  readonly sent: SentNotification[] = [];
  failWith: Error | null = null;

  async notify(
    recipient: NotificationRecipient,
    eventType: NotificationEventType,
    payload: NotificationPayload
  ): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push({ recipient, eventType, payload });
  }

  eventTypes(): NotificationEventType[] {
    return this.sent.map((item) => item.eventType);
  }
}

export class CountingIdentifierIssuer implements IdentifierIssuer {
  calls = 0;
  private readonly inner = new SequentialIdentifierIssuer();

  async issueIdentifier(application: ApplicationRecord, context: IssueContext): Promise<string> {
    this.calls += 1;
    return this.inner.issueIdentifier(application, context);
  }
}

export class FakeClock {
  private current: Date;

  constructor(start: string | Date = "2026-03-02T09:00:00.000Z") {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * 24 * 60 * 60 * 1000);
  }

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }
}

// ── Fixtures ──────────────────────────────────────────────────────────────────

export const TEMA = { region: "Greater Accra", district: "Tema Metropolitan", constituency: "Tema East" };
export const KUMASI = { region: "Ashanti", district: "Kumasi Metropolitan", constituency: "Manhyia South" };

export const APPLICANT_ID = "farmer-1";

export const REVIEWERS: ReviewerProfile[] = [
  { userId: "officer-tema", role: "CONSTITUENCY_OFFICIAL", ...TEMA },
  { userId: "officer-tema-2", role: "CONSTITUENCY_OFFICIAL", ...TEMA },
  { userId: "officer-kumasi", role: "CONSTITUENCY_OFFICIAL", ...KUMASI },
  { userId: "coordinator-accra", role: "REGIONAL_COORDINATOR", region: "Greater Accra", district: "", constituency: "" },
  { userId: "coordinator-ashanti", role: "REGIONAL_COORDINATOR", region: "Ashanti", district: "", constituency: "" },
  { userId: "admin-national", role: "NATIONAL_ADMIN", region: "", district: "", constituency: "" },
];

/** Two levels, eligibility by track and age, auto-reject on expired changes. */
export const SCREENING_RULES: ProgramRulesInput = {
  kind: "NEW_FARMER_SCREENING",
  displayName: "New Farmer Screening",
  referencePrefix: "FARM",
  identifierPrefix: "YEA",
  supervisorRoles: ["NATIONAL_ADMIN"],
  levels: [
    {
      level: 1,
      name: "Constituency",
      slaDays: 7,
      reviewerRoles: ["CONSTITUENCY_OFFICIAL"],
      jurisdictionScope: "CONSTITUENCY",
    },
    {
      level: 2,
      name: "Regional",
      slaDays: 5,
      reviewerRoles: ["REGIONAL_COORDINATOR"],
      jurisdictionScope: "REGION",
    },
  ],
  eligibility: {
    baseScore: 0,
    passThreshold: 50,
    programTracks: ["broiler", "layers"],
    applicantAge: { min: 18, max: 65 },
  },
};

/** One level, escalate on expired changes. */
export const ENROLLMENT_RULES: ProgramRulesInput = {
  kind: "PROGRAM_ENROLLMENT",
  displayName: "Program Enrollment",
  referencePrefix: "PROG",
  identifierPrefix: "ENR",
  supervisorRoles: ["NATIONAL_ADMIN"],
  levels: [
    {
      level: 1,
      name: "Regional",
      slaDays: 5,
      reviewerRoles: ["REGIONAL_COORDINATOR"],
      jurisdictionScope: "REGION",
    },
  ],
  changesRequested: { defaultDeadlineDays: 10, onExpiry: "ESCALATE" },
  eligibility: { baseScore: 100 },
};

export function screeningDraft(overrides: Partial<DraftApplicationInput> = {}): DraftApplicationInput {
  return {
    kind: "NEW_FARMER_SCREENING",
    applicantId: APPLICANT_ID,
    jurisdiction: TEMA,
    snapshot: {
      applicant: { fullName: "Ama Mensah", dateOfBirth: "1990-05-01", phone: "+233201234567" },
      farm: { farmName: "Sunrise Poultry", birdCapacity: 800, yearsOperational: 2 },
      programTrack: "broiler",
      documents: ["ghana_card"],
    },
    ...overrides,
  };
}

export function enrollmentDraft(overrides: Partial<DraftApplicationInput> = {}): DraftApplicationInput {
  return {
    kind: "PROGRAM_ENROLLMENT",
    applicantId: APPLICANT_ID,
    jurisdiction: TEMA,
    snapshot: {
      applicant: { fullName: "Ama Mensah" },
      farm: { farmName: "Sunrise Poultry" },
      programTrack: "layers",
    },
    ...overrides,
  };
}

export interface TestHarness {
  engine: ReviewWorkflowEngine;
  repository: MemoryReviewRepository;
  notifier: RecordingNotifier;
  issuer: CountingIdentifierIssuer;
  clock: FakeClock;
}

export function createHarness(overrides: Partial<ReviewWorkflowDeps> = {}): TestHarness {
  const repository = new MemoryReviewRepository();
  const notifier = new RecordingNotifier();
  const issuer = new CountingIdentifierIssuer();
  const clock = new FakeClock();
  const engine = new ReviewWorkflowEngine({
    repository,
    rulesProvider: new StaticProgramRulesProvider([SCREENING_RULES, ENROLLMENT_RULES]),
    reviewerResolver: new StaticReviewerResolver(REVIEWERS),
    notifier,
    identifierIssuer: issuer,
    now: clock.now,
    ...overrides,
  });
  return { engine, repository, notifier, issuer, clock };
}

/** Creates and submits a screening application that passes eligibility. */
export async function submitScreening(
  harness: TestHarness,
  overrides: Partial<DraftApplicationInput> = {}
): Promise<ApplicationRecord> {
  const draft = await harness.engine.createDraft(screeningDraft(overrides));
  return harness.engine.submit(draft.id, draft.applicantId);
}
