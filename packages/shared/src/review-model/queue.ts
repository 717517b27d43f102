/**
 * Review queue entries, one per (application, review level).
 */
import { z } from "zod";
import { JurisdictionSchema, NonEmptyString, NullableTimestamp, Timestamp } from "./primitives";
import { ApplicationKindEnum } from "./application";

export const QueueEntryStatusEnum = z.enum(["PENDING", "CLAIMED", "IN_PROGRESS", "COMPLETED"]);

export type QueueEntryStatus = z.infer<typeof QueueEntryStatusEnum>;

export const LIVE_QUEUE_STATUSES: readonly QueueEntryStatus[] = ["PENDING", "CLAIMED", "IN_PROGRESS"];

export const QueueEntryRecordSchema = z.object({
  id: NonEmptyString,
  applicationId: NonEmptyString,
  kind: ApplicationKindEnum,
  reviewLevel: z.number().int().min(1),
  status: QueueEntryStatusEnum,
  assignedTo: z.string().nullable(),
  claimedAt: NullableTimestamp,
  autoAssigned: z.boolean().default(false),
  /** Rank at enqueue time; listings always recompute. */
  prioritySnapshot: z.number().int(),
  jurisdiction: JurisdictionSchema,
  slaDeadline: Timestamp,
  isOverdue: z.boolean().default(false),
  escalatedAt: NullableTimestamp,
  reminderSentAt: NullableTimestamp,
  enteredAt: Timestamp,
  completedAt: NullableTimestamp,
});

export type QueueEntryRecord = z.infer<typeof QueueEntryRecordSchema>;

export const QueueFilterSchema = z.object({
  kind: ApplicationKindEnum.optional(),
  region: z.string().optional(),
  district: z.string().optional(),
  constituency: z.string().optional(),
  assignedTo: z.string().optional(),
  status: QueueEntryStatusEnum.optional(),
  overdueOnly: z.boolean().optional(),
});

export type QueueFilter = z.infer<typeof QueueFilterSchema>;
