/**
 * Review workflow model barrel export.
 *
 * Usage:
 *   import { ProgramRulesSchema, validateSnapshotForSubmission } from "@flockreview/shared";
 *   import type { ApplicationRecord, QueueEntryRecord } from "@flockreview/shared";
 */

// Primitives
export {
  NonEmptyString,
  ISODate,
  ISODateTime,
  Email,
  Phone,
  Timestamp,
  NullableTimestamp,
  JurisdictionSchema,
  JurisdictionScopeEnum,
  type Jurisdiction,
  type JurisdictionScope,
} from "./primitives";

// Application
export {
  ApplicationKindEnum,
  ApplicationStatusEnum,
  TERMINAL_STATUSES,
  isTerminalStatus,
  ApplicantSchema,
  FarmSchema,
  ApplicationSnapshotSchema,
  DraftApplicationInputSchema,
  ApplicationRecordSchema,
  validateSnapshotForSubmission,
  type ApplicationKind,
  type ApplicationStatus,
  type Applicant,
  type Farm,
  type ApplicationSnapshot,
  type DraftApplicationInput,
  type ApplicationRecord,
  type SnapshotValidationResult,
} from "./application";

// Queue
export {
  QueueEntryStatusEnum,
  LIVE_QUEUE_STATUSES,
  QueueEntryRecordSchema,
  QueueFilterSchema,
  type QueueEntryStatus,
  type QueueEntryRecord,
  type QueueFilter,
} from "./queue";

// Review actions
export {
  ReviewActionEnum,
  ReviewActionRecordSchema,
  type ReviewActionType,
  type ReviewActionRecord,
} from "./review-action";

// Program rules
export {
  ReviewLevelRulesSchema,
  EligibilityDeltasSchema,
  EligibilityRulesSchema,
  PriorityRulesSchema,
  ChangesExpiryPolicyEnum,
  SlaCalendarEnum,
  ProgramRulesSchema,
  getLevelRules,
  isFinalLevel,
  type ReviewLevelRules,
  type EligibilityDeltas,
  type EligibilityRules,
  type PriorityRules,
  type ChangesExpiryPolicy,
  type ProgramRules,
  type ProgramRulesInput,
} from "./program-rules";
