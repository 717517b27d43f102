/**
 * Application schema: the subject of the review workflow.
 *
 * `status` is the canonical lifecycle state. `currentReviewLevel` says which
 * review tier holds the application while it is active and is null once the
 * application reaches a terminal state.
 *
 * `snapshot` is the data being judged. It is frozen at submission and only
 * replaced by an explicit resubmission after changes were requested.
 */
import { z } from "zod";
import {
  Email,
  ISODate,
  JurisdictionSchema,
  NonEmptyString,
  NullableTimestamp,
  Phone,
  Timestamp,
} from "./primitives";

export const ApplicationKindEnum = z.enum([
  "NEW_FARMER_SCREENING",
  "PROGRAM_ENROLLMENT",
  "STAFF_INVITATION",
]);

export type ApplicationKind = z.infer<typeof ApplicationKindEnum>;

export const ApplicationStatusEnum = z.enum([
  "DRAFT",
  "SUBMITTED",
  "UNDER_REVIEW",
  "CHANGES_REQUESTED",
  "APPROVED",
  "REJECTED",
  "WITHDRAWN",
]);

export type ApplicationStatus = z.infer<typeof ApplicationStatusEnum>;

export const TERMINAL_STATUSES: readonly ApplicationStatus[] = ["APPROVED", "REJECTED", "WITHDRAWN"];

export function isTerminalStatus(status: ApplicationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ---------------------------------------------------------------------------
// Snapshot of the data under review
// ---------------------------------------------------------------------------

export const ApplicantSchema = z.object({
  fullName: NonEmptyString,
  dateOfBirth: ISODate.optional(),
  phone: Phone.optional(),
  email: Email.optional(),
  nationalId: z.string().trim().optional(),
});

export type Applicant = z.infer<typeof ApplicantSchema>;

export const FarmSchema = z.object({
  farmName: NonEmptyString,
  yearsOperational: z.number().min(0).optional(),
  birdCapacity: z.number().int().min(0).optional(),
  taxId: z.string().trim().optional(),
  businessRegistrationNumber: z.string().trim().optional(),
});

export type Farm = z.infer<typeof FarmSchema>;

export const ApplicationSnapshotSchema = z.object({
  applicant: ApplicantSchema,
  farm: FarmSchema.optional(),
  /** Program track applied for (e.g. "broiler", "layers"). */
  programTrack: z.string().trim().optional(),
  /** Sponsored tracks are reviewed ahead of the rest of the queue. */
  sponsored: z.boolean().default(false),
  /** Staff invitations only. */
  requestedRole: z.string().trim().optional(),
  /** Document type codes supplied with the application. */
  documents: z.array(NonEmptyString).default([]),
});

export type ApplicationSnapshot = z.infer<typeof ApplicationSnapshotSchema>;

export const DraftApplicationInputSchema = z.object({
  kind: ApplicationKindEnum,
  applicantId: NonEmptyString,
  jurisdiction: JurisdictionSchema,
  snapshot: ApplicationSnapshotSchema,
});

export type DraftApplicationInput = z.input<typeof DraftApplicationInputSchema>;

// ---------------------------------------------------------------------------
// Stored record
// ---------------------------------------------------------------------------

export const ApplicationRecordSchema = z.object({
  id: NonEmptyString,
  referenceNumber: NonEmptyString,
  kind: ApplicationKindEnum,
  status: ApplicationStatusEnum,
  currentReviewLevel: z.number().int().min(1).nullable(),
  applicantId: NonEmptyString,
  jurisdiction: JurisdictionSchema,
  snapshot: ApplicationSnapshotSchema,
  eligibilityScore: z.number().int().min(0).max(100).nullable(),
  eligibilityFlags: z.array(z.string()).default([]),
  changesRequested: z.array(z.string()).default([]),
  changesDeadline: NullableTimestamp,
  resubmissionCount: z.number().int().min(0).default(0),
  issuedIdentifier: z.string().nullable(),
  rowVersion: z.number().int().min(0),
  submittedAt: NullableTimestamp,
  finalDecisionAt: NullableTimestamp,
  createdAt: Timestamp,
  updatedAt: Timestamp,
});

export type ApplicationRecord = z.infer<typeof ApplicationRecordSchema>;

// ---------------------------------------------------------------------------
// Submission validation: required sections differ per kind
// ---------------------------------------------------------------------------

function requiredIssue(path: (string | number)[], message: string): z.ZodIssue {
  return { code: z.ZodIssueCode.custom, path, message };
}

export interface SnapshotValidationResult {
  success: boolean;
  data?: ApplicationSnapshot;
  errors?: z.ZodIssue[];
}

/**
 * Validate a snapshot at submit / resubmit time.
 *
 * The lenient schema accepts partial drafts; this adds the per-kind required
 * fields that must be present before the application enters review.
 */
export function validateSnapshotForSubmission(
  kind: ApplicationKind,
  raw: unknown
): SnapshotValidationResult {
  const parsed = ApplicationSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, errors: parsed.error.issues };
  }

  const snapshot = parsed.data;
  const issues: z.ZodIssue[] = [];

  switch (kind) {
    case "NEW_FARMER_SCREENING":
      if (!snapshot.applicant.phone) {
        issues.push(requiredIssue(["applicant", "phone"], "phone is required for farmer screening"));
      }
      if (!snapshot.farm) {
        issues.push(requiredIssue(["farm"], "farm section is required for farmer screening"));
      }
      break;
    case "PROGRAM_ENROLLMENT":
      if (!snapshot.farm) {
        issues.push(requiredIssue(["farm"], "farm section is required for program enrollment"));
      }
      if (!snapshot.programTrack) {
        issues.push(requiredIssue(["programTrack"], "programTrack is required for program enrollment"));
      }
      break;
    case "STAFF_INVITATION":
      if (!snapshot.applicant.email) {
        issues.push(requiredIssue(["applicant", "email"], "email is required for staff invitations"));
      }
      if (!snapshot.requestedRole) {
        issues.push(requiredIssue(["requestedRole"], "requestedRole is required for staff invitations"));
      }
      break;
  }

  if (issues.length > 0) {
    return { success: false, errors: issues };
  }
  return { success: true, data: snapshot };
}
