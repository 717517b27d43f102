/**
 * Program rules: per-kind configuration for the review workflow.
 *
 * One document per application kind. It declares the review levels (and so the
 * level count), the reviewer class each level requires, per-level SLA days,
 * the eligibility rule table and the queue priority weights.
 */
import { z } from "zod";
import { ApplicationKindEnum } from "./application";
import { ISODate, JurisdictionScopeEnum, NonEmptyString } from "./primitives";

export const ReviewLevelRulesSchema = z.object({
  level: z.number().int().min(1),
  name: NonEmptyString,
  slaDays: z.number().int().min(1),
  reviewerRoles: z.array(NonEmptyString).min(1),
  jurisdictionScope: JurisdictionScopeEnum,
  /** New entries at this level go straight to the eligible reviewer with the fewest open entries. */
  autoAssign: z.boolean().default(false),
});

export type ReviewLevelRules = z.infer<typeof ReviewLevelRulesSchema>;

export const EligibilityDeltasSchema = z.object({
  trackMatch: z.number().int().default(50),
  missingDocument: z.number().int().default(-40),
  ageOutOfRange: z.number().int().default(-30),
  pastDeadline: z.number().int().default(-50),
  atCapacity: z.number().int().default(-50),
  constituencyNotEligible: z.number().int().default(-40),
  birdCapacityOutOfRange: z.number().int().default(-20),
  farmTooNew: z.number().int().default(-25),
});

export type EligibilityDeltas = z.infer<typeof EligibilityDeltasSchema>;

export const EligibilityRulesSchema = z.object({
  baseScore: z.number().int().min(0).max(100).default(0),
  passThreshold: z.number().int().min(0).max(100).default(50),
  programTracks: z.array(NonEmptyString).default([]),
  mandatoryDocuments: z.array(NonEmptyString).default([]),
  applicantAge: z.object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
  }).optional(),
  applicationDeadline: ISODate.optional(),
  capacity: z.object({
    totalSlots: z.number().int().min(0),
    slotsFilled: z.number().int().min(0),
  }).optional(),
  eligibleConstituencies: z.array(NonEmptyString).default([]),
  birdCapacity: z.object({
    min: z.number().int().min(0).optional(),
    max: z.number().int().min(0).optional(),
  }).optional(),
  minFarmAgeMonths: z.number().int().min(0).optional(),
  deltas: EligibilityDeltasSchema.default({}),
});

export type EligibilityRules = z.infer<typeof EligibilityRulesSchema>;

export const PriorityRulesSchema = z.object({
  sponsoredTrackBonus: z.number().int().default(50),
  documentsBonus: z.number().int().default(30),
  minDocumentsForBonus: z.number().int().min(0).default(5),
  taxIdBonus: z.number().int().default(10),
  businessRegistrationBonus: z.number().int().default(10),
  waitBonusPerDay: z.number().int().min(0).default(1),
  waitBonusCap: z.number().int().min(0).default(30),
  overdueBonus: z.number().int().default(40),
  dueWithinOneDayBonus: z.number().int().default(20),
  dueWithinThreeDaysBonus: z.number().int().default(10),
});

export type PriorityRules = z.infer<typeof PriorityRulesSchema>;

export const ChangesExpiryPolicyEnum = z.enum(["AUTO_REJECT", "ESCALATE"]);

export type ChangesExpiryPolicy = z.infer<typeof ChangesExpiryPolicyEnum>;

export const SlaCalendarEnum = z.enum(["CALENDAR_DAYS", "WORKING_DAYS"]);

export const ProgramRulesSchema = z.object({
  kind: ApplicationKindEnum,
  displayName: NonEmptyString,
  referencePrefix: z.string().regex(/^[A-Z]{2,6}$/, "2-6 uppercase letters"),
  identifierPrefix: z.string().regex(/^[A-Z]{2,6}$/, "2-6 uppercase letters"),
  levels: z.array(ReviewLevelRulesSchema).min(1),
  supervisorRoles: z.array(NonEmptyString).default([]),
  sla: z.object({
    calendar: SlaCalendarEnum.default("CALENDAR_DAYS"),
    holidays: z.array(ISODate).default([]),
  }).default({}),
  changesRequested: z.object({
    defaultDeadlineDays: z.number().int().min(1).default(14),
    onExpiry: ChangesExpiryPolicyEnum.default("AUTO_REJECT"),
  }).default({}),
  eligibility: EligibilityRulesSchema.default({}),
  priority: PriorityRulesSchema.default({}),
}).superRefine((rules, ctx) => {
  rules.levels.forEach((level, index) => {
    if (level.level !== index + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["levels", index, "level"],
        message: `levels must be numbered 1..N in order (expected ${index + 1})`,
      });
    }
  });
  const age = rules.eligibility.applicantAge;
  if (age && age.min > age.max) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["eligibility", "applicantAge"],
      message: "applicantAge.min must not exceed applicantAge.max",
    });
  }
});

export type ProgramRules = z.infer<typeof ProgramRulesSchema>;
export type ProgramRulesInput = z.input<typeof ProgramRulesSchema>;

export function getLevelRules(rules: ProgramRules, level: number): ReviewLevelRules | undefined {
  return rules.levels.find((entry) => entry.level === level);
}

export function isFinalLevel(rules: ProgramRules, level: number): boolean {
  return level === rules.levels.length;
}
