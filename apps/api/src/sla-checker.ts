/**
 * SLA sweeps: changes-deadline expiry, breach detection and due-soon reminders.
 *
 * Each entry or application is handled in its own transaction, so one bad row
 * does not block the rest. Every sweep is safe to repeat. Like the engine,
 * a sweep locks the application row before its queue entry.
 */
import { v4 as uuidv4 } from "uuid";
import type { QueueEntryRecord } from "@flockreview/shared";
import { runWithLogContext } from "./log-context";
import { errorMessage, logError, logInfo } from "./logger";
import { buildNotification, type PendingNotification } from "./notifications";
import { updateQueueBacklogMetric } from "./observability/metrics";
import type { ProgramRulesProvider } from "./program-rules";
import type { ReviewRepository } from "./repository";
import { parseNonNegativeIntEnv, parsePositiveIntEnv } from "./runtime-safety";
import { addDays } from "./sla";
import type { ReviewWorkflowEngine } from "./workflow";

export interface SlaSweepDeps {
  engine: ReviewWorkflowEngine;
  repository: ReviewRepository;
  rulesProvider: ProgramRulesProvider;
  now?: () => Date;
}

export interface ChangesExpiryResult {
  expired: number;
  autoRejected: number;
  escalated: number;
  errors: string[];
}

export interface SlaBreachResult {
  breachedEntries: number;
  notificationsQueued: number;
  errors: string[];
}

export interface SlaReminderResult {
  remindersSent: number;
  errors: string[];
}

export interface SlaSweepResult {
  changesExpiry: ChangesExpiryResult;
  breaches: SlaBreachResult;
  reminders: SlaReminderResult;
}

function clockOf(deps: SlaSweepDeps): Date {
  return deps.now ? deps.now() : new Date();
}

export async function processExpiredChangeRequests(
  deps: SlaSweepDeps,
  now: Date = clockOf(deps)
): Promise<ChangesExpiryResult> {
  const result: ChangesExpiryResult = { expired: 0, autoRejected: 0, escalated: 0, errors: [] };
  const expired = await deps.repository.transaction((tx) => tx.listExpiredChangeRequests(now));

  for (const application of expired) {
    try {
      const updated = await deps.engine.applyChangesExpiry(application.id);
      if (updated.status === "REJECTED") {
        result.expired += 1;
        result.autoRejected += 1;
      } else if (updated.status === "UNDER_REVIEW") {
        result.expired += 1;
        result.escalated += 1;
      }
    } catch (error) {
      const message = errorMessage(error);
      result.errors.push(`${application.id}: ${message}`);
      logError("Changes-deadline expiry failed", { applicationId: application.id, error: message });
    }
  }

  if (result.expired > 0) {
    logInfo("Changes-deadline sweep completed", {
      expired: result.expired,
      autoRejected: result.autoRejected,
      escalated: result.escalated,
    });
  }
  return result;
}

/**
 * Flags live entries past their deadline, once each, with an SLA_BREACHED
 * action. The assignee is told; unassigned entries go to the supervisors.
 */
export async function detectSlaBreaches(
  deps: SlaSweepDeps,
  now: Date = clockOf(deps)
): Promise<SlaBreachResult> {
  const result: SlaBreachResult = { breachedEntries: 0, notificationsQueued: 0, errors: [] };
  const candidates = await deps.repository.transaction((tx) => tx.listBreachCandidates(now));
  const pending: PendingNotification[] = [];

  for (const candidate of candidates) {
    try {
      const notifications = await deps.repository.transaction(async (tx) => {
        const application = await tx.getApplication(candidate.applicationId, { forUpdate: true });
        if (!application) return null;
        const entry = await tx.getQueueEntry(candidate.id, { forUpdate: true });
        if (!entry || entry.isOverdue || entry.status === "COMPLETED") return null;

        await tx.updateQueueEntry(entry.id, { isOverdue: true }, { expectedStatuses: [entry.status] });
        await deps.engine.audit.record(tx, {
          applicationId: entry.applicationId,
          action: "SLA_BREACHED",
          reviewLevel: entry.reviewLevel,
          queueEntryId: entry.id,
          metadata: {
            slaDeadline: entry.slaDeadline.toISOString(),
            breachedAt: now.toISOString(),
            assignedTo: entry.assignedTo,
          },
        });

        const extra = { reviewLevel: entry.reviewLevel, slaDeadline: entry.slaDeadline.toISOString() };
        if (entry.assignedTo) {
          return [buildNotification({ type: "USER", userId: entry.assignedTo }, "SLA_BREACHED", application, extra)];
        }
        const rules = await deps.rulesProvider.getRules(entry.kind);
        return rules.supervisorRoles.map((role) =>
          buildNotification(
            { type: "ROLE", role, region: entry.jurisdiction.region },
            "SLA_BREACHED",
            application,
            extra
          )
        );
      });
      if (notifications) {
        result.breachedEntries += 1;
        pending.push(...notifications);
      }
    } catch (error) {
      const message = errorMessage(error);
      result.errors.push(`${candidate.id}: ${message}`);
      logError("SLA breach processing failed", { entryId: candidate.id, error: message });
    }
  }

  result.notificationsQueued = pending.length;
  deps.engine.dispatchAfterCommit(pending);

  if (result.breachedEntries > 0) {
    logInfo("SLA breach scan completed", {
      breachedEntries: result.breachedEntries,
      notificationsQueued: result.notificationsQueued,
    });
  }
  return result;
}

/** One reminder per claimed entry that falls due within `withinDays`. */
export async function sendSlaReminders(
  deps: SlaSweepDeps,
  withinDays: number = parsePositiveIntEnv(process.env.SLA_REMINDER_WITHIN_DAYS, 2),
  now: Date = clockOf(deps)
): Promise<SlaReminderResult> {
  const result: SlaReminderResult = { remindersSent: 0, errors: [] };
  const dueBefore = addDays(now, withinDays);
  const candidates = await deps.repository.transaction((tx) => tx.listReminderCandidates(now, dueBefore));
  const pending: PendingNotification[] = [];

  for (const candidate of candidates.filter((entry: QueueEntryRecord) => entry.assignedTo)) {
    try {
      const notification = await deps.repository.transaction(async (tx) => {
        const application = await tx.getApplication(candidate.applicationId, { forUpdate: true });
        if (!application) return null;
        const entry = await tx.getQueueEntry(candidate.id, { forUpdate: true });
        if (!entry || !entry.assignedTo || entry.reminderSentAt || entry.status === "COMPLETED") return null;
        await tx.updateQueueEntry(entry.id, { reminderSentAt: now }, { expectedStatuses: [entry.status] });
        return buildNotification({ type: "USER", userId: entry.assignedTo }, "SLA_REMINDER", application, {
          reviewLevel: entry.reviewLevel,
          slaDeadline: entry.slaDeadline.toISOString(),
        });
      });
      if (notification) {
        result.remindersSent += 1;
        pending.push(notification);
      }
    } catch (error) {
      const message = errorMessage(error);
      result.errors.push(`${candidate.id}: ${message}`);
      logError("SLA reminder failed", { entryId: candidate.id, error: message });
    }
  }

  deps.engine.dispatchAfterCommit(pending);
  return result;
}

export async function refreshQueueBacklogMetric(deps: SlaSweepDeps): Promise<void> {
  const stats = await deps.engine.queue.getStatistics();
  updateQueueBacklogMetric({ openEntries: stats.total, overdueEntries: stats.overdue });
}

export async function runSlaSweep(deps: SlaSweepDeps): Promise<SlaSweepResult> {
  return runWithLogContext({ requestId: uuidv4(), operation: "sla-sweep" }, async () => {
    const now = clockOf(deps);
    const changesExpiry = await processExpiredChangeRequests(deps, now);
    const breaches = await detectSlaBreaches(deps, now);
    const reminders = await sendSlaReminders(deps, undefined, now);
    await refreshQueueBacklogMetric(deps);
    return { changesExpiry, breaches, reminders };
  });
}

/**
 * Start periodic SLA sweeps.
 * Default: runs every 30 minutes.
 */
export function startSlaChecker(
  deps: SlaSweepDeps,
  intervalMs: number = parsePositiveIntEnv(process.env.SLA_CHECK_INTERVAL_MS, 30 * 60 * 1000)
): NodeJS.Timeout {
  const initialDelayMs = parseNonNegativeIntEnv(process.env.SLA_CHECK_INITIAL_DELAY_MS, 30000);
  logInfo("Starting SLA checker", {
    intervalSeconds: intervalMs / 1000,
    initialDelaySeconds: initialDelayMs / 1000,
  });

  setTimeout(() => {
    runSlaSweep(deps).catch((err) => {
      logError("Initial SLA sweep failed", { error: errorMessage(err) });
    });
  }, initialDelayMs).unref();

  return setInterval(() => {
    runSlaSweep(deps).catch((err) => {
      logError("Periodic SLA sweep failed", { error: errorMessage(err) });
    });
  }, intervalMs);
}
