/**
 * Eligibility scorer.
 *
 * Pure: the result depends only on the snapshot, the jurisdiction, the
 * evaluation instant and the program's rule table. No I/O and no clock reads.
 */
import type {
  ApplicationSnapshot,
  EligibilityRules,
  Jurisdiction,
} from "@flockreview/shared";

export type EligibilityFlag =
  | "PROGRAM_TRACK_MISMATCH"
  | `MISSING_DOCUMENT:${string}`
  | "AGE_BELOW_MINIMUM"
  | "AGE_ABOVE_MAXIMUM"
  | "SUBMISSION_PAST_DEADLINE"
  | "PROGRAM_AT_CAPACITY"
  | "CONSTITUENCY_NOT_ELIGIBLE"
  | "BIRD_CAPACITY_BELOW_MINIMUM"
  | "BIRD_CAPACITY_ABOVE_MAXIMUM"
  | "FARM_TOO_NEW";

export interface EligibilityInput {
  snapshot: ApplicationSnapshot;
  jurisdiction: Jurisdiction;
  asOf: Date;
}

export interface EligibilityResult {
  score: number;
  flags: EligibilityFlag[];
  passed: boolean;
}

/** Whole years between an ISO birth date and `asOf`, both read in UTC. */
export function ageInYears(dateOfBirth: string, asOf: Date): number {
  const dob = new Date(`${dateOfBirth}T00:00:00.000Z`);
  let age = asOf.getUTCFullYear() - dob.getUTCFullYear();
  const beforeBirthday =
    asOf.getUTCMonth() < dob.getUTCMonth() ||
    (asOf.getUTCMonth() === dob.getUTCMonth() && asOf.getUTCDate() < dob.getUTCDate());
  if (beforeBirthday) age -= 1;
  return age;
}

function clamp(value: number): number {
  return Math.min(100, Math.max(0, value));
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

export function scoreEligibility(input: EligibilityInput, rules: EligibilityRules): EligibilityResult {
  const { snapshot, jurisdiction, asOf } = input;
  const deltas = rules.deltas;
  const flags: EligibilityFlag[] = [];
  let score = rules.baseScore;

  if (rules.programTracks.length > 0) {
    const track = snapshot.programTrack ? normalize(snapshot.programTrack) : "";
    if (track && rules.programTracks.some((t) => normalize(t) === track)) {
      score += deltas.trackMatch;
    } else {
      flags.push("PROGRAM_TRACK_MISMATCH");
    }
  }

  const supplied = new Set(snapshot.documents.map(normalize));
  for (const code of rules.mandatoryDocuments) {
    if (!supplied.has(normalize(code))) {
      score += deltas.missingDocument;
      flags.push(`MISSING_DOCUMENT:${code}`);
    }
  }

  if (rules.applicantAge && snapshot.applicant.dateOfBirth) {
    const age = ageInYears(snapshot.applicant.dateOfBirth, asOf);
    if (age < rules.applicantAge.min) {
      score += deltas.ageOutOfRange;
      flags.push("AGE_BELOW_MINIMUM");
    } else if (age > rules.applicantAge.max) {
      score += deltas.ageOutOfRange;
      flags.push("AGE_ABOVE_MAXIMUM");
    }
  }

  // The deadline day itself is still open.
  if (rules.applicationDeadline && asOf.toISOString().slice(0, 10) > rules.applicationDeadline) {
    score += deltas.pastDeadline;
    flags.push("SUBMISSION_PAST_DEADLINE");
  }

  if (rules.capacity && rules.capacity.slotsFilled >= rules.capacity.totalSlots) {
    score += deltas.atCapacity;
    flags.push("PROGRAM_AT_CAPACITY");
  }

  if (rules.eligibleConstituencies.length > 0) {
    const constituency = normalize(jurisdiction.constituency);
    if (!rules.eligibleConstituencies.some((c) => normalize(c) === constituency)) {
      score += deltas.constituencyNotEligible;
      flags.push("CONSTITUENCY_NOT_ELIGIBLE");
    }
  }

  const birdCapacity = snapshot.farm?.birdCapacity;
  if (rules.birdCapacity && birdCapacity !== undefined) {
    const { min, max } = rules.birdCapacity;
    if (min !== undefined && birdCapacity < min) {
      score += deltas.birdCapacityOutOfRange;
      flags.push("BIRD_CAPACITY_BELOW_MINIMUM");
    } else if (max !== undefined && birdCapacity > max) {
      score += deltas.birdCapacityOutOfRange;
      flags.push("BIRD_CAPACITY_ABOVE_MAXIMUM");
    }
  }

  const yearsOperational = snapshot.farm?.yearsOperational;
  if (rules.minFarmAgeMonths !== undefined && yearsOperational !== undefined) {
    if (Math.floor(yearsOperational * 12) < rules.minFarmAgeMonths) {
      score += deltas.farmTooNew;
      flags.push("FARM_TOO_NEW");
    }
  }

  const finalScore = clamp(score);
  return { score: finalScore, flags, passed: finalScore >= rules.passThreshold };
}
