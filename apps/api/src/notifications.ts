import crypto from "crypto";
import { getStatusLabel, getWorkflowStateName, type ApplicationStatus } from "@flockreview/shared";
import { errorMessage, logError, logInfo } from "./logger";
import { recordNotificationFailure } from "./observability/metrics";

export type NotificationRecipient =
  | { type: "USER"; userId: string }
  | { type: "ROLE"; role: string; region?: string };

export type NotificationEventType =
  | "APPLICATION_SUBMITTED"
  | "APPLICATION_ADVANCED"
  | "APPLICATION_APPROVED"
  | "APPLICATION_REJECTED"
  | "APPLICATION_WITHDRAWN"
  | "CHANGES_REQUESTED"
  | "CHANGES_DEADLINE_EXPIRED"
  | "REVIEW_ASSIGNED"
  | "SLA_BREACHED"
  | "SLA_REMINDER";

export interface NotificationPayload {
  applicationId: string;
  referenceNumber: string;
  title: string;
  message: string;
  /** Human-readable status, e.g. "Level 2 Review". */
  statusLabel: string;
  /** Dashboard state name, e.g. "level-2-review". */
  workflowState: string;
  [key: string]: unknown;
}

/** Delivery channel supplied by the host (email, SMS, in-app). */
export interface Notifier {
  notify(
    recipient: NotificationRecipient,
    eventType: NotificationEventType,
    payload: NotificationPayload
  ): Promise<void>;
}

export interface PendingNotification {
  recipient: NotificationRecipient;
  eventType: NotificationEventType;
  payload: NotificationPayload;
}

const EVENT_TEXT: Record<NotificationEventType, (ref: string) => { title: string; message: string }> = {
  APPLICATION_SUBMITTED: (ref) => ({
    title: "Application Submitted",
    message: `Your application ${ref} has been submitted for review.`,
  }),
  APPLICATION_ADVANCED: (ref) => ({
    title: "Review Level Passed",
    message: `Application ${ref} has moved to the next review level.`,
  }),
  APPLICATION_APPROVED: (ref) => ({
    title: "Application Approved",
    message: `Your application ${ref} has been approved.`,
  }),
  APPLICATION_REJECTED: (ref) => ({
    title: "Application Rejected",
    message: `Your application ${ref} has been rejected.`,
  }),
  APPLICATION_WITHDRAWN: (ref) => ({
    title: "Application Withdrawn",
    message: `Application ${ref} has been withdrawn.`,
  }),
  CHANGES_REQUESTED: (ref) => ({
    title: "Changes Requested",
    message: `Changes are required for application ${ref}.`,
  }),
  CHANGES_DEADLINE_EXPIRED: (ref) => ({
    title: "Changes Deadline Passed",
    message: `The deadline to update application ${ref} has passed.`,
  }),
  REVIEW_ASSIGNED: (ref) => ({
    title: "Review Assigned",
    message: `Application ${ref} has been assigned to you.`,
  }),
  SLA_BREACHED: (ref) => ({
    title: "Review Overdue",
    message: `The review of application ${ref} is past its deadline.`,
  }),
  SLA_REMINDER: (ref) => ({
    title: "Review Due Soon",
    message: `The review of application ${ref} is due soon.`,
  }),
};

export function buildNotification(
  recipient: NotificationRecipient,
  eventType: NotificationEventType,
  application: {
    id: string;
    referenceNumber: string;
    status: ApplicationStatus;
    currentReviewLevel: number | null;
  },
  extra: Record<string, unknown> = {}
): PendingNotification {
  const text = EVENT_TEXT[eventType](application.referenceNumber);
  return {
    recipient,
    eventType,
    payload: {
      ...extra,
      applicationId: application.id,
      referenceNumber: application.referenceNumber,
      title: text.title,
      message: text.message,
      statusLabel: getStatusLabel(application.status, application.currentReviewLevel),
      workflowState: getWorkflowStateName(application.status, application.currentReviewLevel),
    },
  };
}

export function hashIdentifierForLog(value: string | undefined): string {
  if (!value) return "none";
  return crypto.createHash("sha256").update(value).digest("hex").slice(0, 12);
}

function recipientLogContext(recipient: NotificationRecipient) {
  return recipient.type === "USER"
    ? { recipientType: "USER", userIdHash: hashIdentifierForLog(recipient.userId) }
    : { recipientType: "ROLE", role: recipient.role, region: recipient.region };
}

/**
 * Sends after the owning transaction has committed. Failures are logged and
 * counted; they never reach the caller.
 */
export async function dispatchNotifications(
  notifier: Notifier,
  pending: readonly PendingNotification[]
): Promise<void> {
  const results = await Promise.allSettled(
    pending.map((item) => notifier.notify(item.recipient, item.eventType, item.payload))
  );
  results.forEach((result, index) => {
    if (result.status === "fulfilled") return;
    const item = pending[index];
    recordNotificationFailure(item.eventType);
    logError("Notification dispatch failed", {
      event: item.eventType,
      applicationIdHash: hashIdentifierForLog(item.payload.applicationId),
      ...recipientLogContext(item.recipient),
      error: errorMessage(result.reason),
    });
  });
}

/** Writes notifications to the structured log; used when no channel is wired in. */
export class LoggingNotifier implements Notifier {
  async notify(
    recipient: NotificationRecipient,
    eventType: NotificationEventType,
    payload: NotificationPayload
  ): Promise<void> {
    logInfo("Notification", {
      event: eventType,
      title: payload.title,
      workflowState: payload.workflowState,
      applicationIdHash: hashIdentifierForLog(payload.applicationId),
      ...recipientLogContext(recipient),
    });
  }
}
