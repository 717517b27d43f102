import type {
  Jurisdiction,
  JurisdictionScope,
  ProgramRules,
  ReviewLevelRules,
} from "@flockreview/shared";

export interface ReviewerProfile {
  userId: string;
  role: string;
  region: string;
  district: string;
  constituency: string;
}

export interface ReviewerResolver {
  resolve(userId: string): Promise<ReviewerProfile | null>;
  /** Active reviewers holding any of `roles`; the candidates for auto-assignment. */
  listActiveReviewers(roles: readonly string[]): Promise<ReviewerProfile[]>;
}

export type ReviewDenialReason =
  | "REVIEWER_UNKNOWN"
  | "ROLE_NOT_ALLOWED"
  | "OUTSIDE_JURISDICTION"
  | "NOT_A_SUPERVISOR";

export interface ReviewAccessResult {
  authorized: boolean;
  reason?: ReviewDenialReason;
}

function sameArea(left: string, right: string): boolean {
  const a = left.trim().toLowerCase();
  return a.length > 0 && a === right.trim().toLowerCase();
}

export function isWithinJurisdiction(
  reviewer: ReviewerProfile,
  scope: JurisdictionScope,
  jurisdiction: Jurisdiction
): boolean {
  switch (scope) {
    case "NATIONAL":
      return true;
    case "REGION":
      return sameArea(reviewer.region, jurisdiction.region);
    case "DISTRICT":
      return (
        sameArea(reviewer.region, jurisdiction.region) &&
        sameArea(reviewer.district, jurisdiction.district)
      );
    case "CONSTITUENCY":
      return (
        sameArea(reviewer.region, jurisdiction.region) &&
        sameArea(reviewer.constituency, jurisdiction.constituency)
      );
  }
}

/**
 * The single capability check behind claim, approve, reject, requestChanges
 * and reassignment targets: the reviewer must hold one of the level's roles
 * and sit in the application's area at the level's scope.
 */
export function canReview(
  reviewer: ReviewerProfile | null,
  levelRules: ReviewLevelRules,
  jurisdiction: Jurisdiction
): ReviewAccessResult {
  if (!reviewer) return { authorized: false, reason: "REVIEWER_UNKNOWN" };
  if (!levelRules.reviewerRoles.includes(reviewer.role)) {
    return { authorized: false, reason: "ROLE_NOT_ALLOWED" };
  }
  if (!isWithinJurisdiction(reviewer, levelRules.jurisdictionScope, jurisdiction)) {
    return { authorized: false, reason: "OUTSIDE_JURISDICTION" };
  }
  return { authorized: true };
}

export function isSupervisor(reviewer: ReviewerProfile | null, rules: ProgramRules): boolean {
  return reviewer !== null && rules.supervisorRoles.includes(reviewer.role);
}
