/**
 * Review actions: the append-only record of who did what, and when.
 */
import { z } from "zod";
import { NonEmptyString, Timestamp } from "./primitives";

export const ReviewActionEnum = z.enum([
  "SUBMITTED",
  "ELIGIBILITY_PASSED",
  "ELIGIBILITY_FAILED",
  "CLAIMED",
  "AUTO_ASSIGNED",
  "RELEASED",
  "REASSIGNED",
  "APPROVED",
  "REJECTED",
  "CHANGES_REQUESTED",
  "RESUBMITTED",
  "WITHDRAWN",
  "ESCALATED",
  "AUTO_REJECTED",
  "SLA_BREACHED",
  "POLICY_VIOLATION",
  "IDENTIFIER_ISSUED",
]);

export type ReviewActionType = z.infer<typeof ReviewActionEnum>;

export const ReviewActionRecordSchema = z.object({
  id: NonEmptyString,
  applicationId: NonEmptyString,
  sequence: z.number().int().min(1),
  reviewerId: z.string().nullable(),
  reviewLevel: z.number().int().min(1).nullable(),
  queueEntryId: z.string().nullable(),
  action: ReviewActionEnum,
  notes: z.string().default(""),
  metadata: z.record(z.unknown()).default({}),
  createdAt: Timestamp,
  prevHash: NonEmptyString,
  hash: NonEmptyString,
});

export type ReviewActionRecord = z.infer<typeof ReviewActionRecordSchema>;
