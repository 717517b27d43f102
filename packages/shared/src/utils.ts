/**
 * Display helpers for notification payloads.
 * Usage: import { getStatusLabel, getWorkflowStateName } from "@flockreview/shared";
 */
import type { ApplicationStatus } from "./review-model";

export function getStatusLabel(status: ApplicationStatus, currentReviewLevel: number | null): string {
  const labelMap: Record<ApplicationStatus, string> = {
    DRAFT: "Draft",
    SUBMITTED: "Submitted",
    UNDER_REVIEW: "Under Review",
    CHANGES_REQUESTED: "Changes Requested",
    APPROVED: "Approved",
    REJECTED: "Rejected",
    WITHDRAWN: "Withdrawn",
  };
  if (status === "UNDER_REVIEW" && currentReviewLevel !== null) {
    return `Level ${currentReviewLevel} Review`;
  }
  return labelMap[status];
}

/** Workflow state name in the `level-N-review` form used by dashboards. */
export function getWorkflowStateName(status: ApplicationStatus, currentReviewLevel: number | null): string {
  if (status === "UNDER_REVIEW" && currentReviewLevel !== null) {
    return `level-${currentReviewLevel}-review`;
  }
  return status.toLowerCase().replace(/_/g, "-");
}
