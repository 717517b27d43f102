import { describe, expect, it } from "vitest";
import {
  ApplicationSnapshotSchema,
  EligibilityRulesSchema,
  type Jurisdiction,
} from "@flockreview/shared";
import { ageInYears, scoreEligibility } from "./eligibility";

const JURISDICTION: Jurisdiction = {
  region: "Greater Accra",
  district: "Tema Metropolitan",
  constituency: "Tema East",
};

const AS_OF = new Date("2026-03-01T09:00:00.000Z");

function snapshot(overrides: Record<string, unknown> = {}) {
  return ApplicationSnapshotSchema.parse({
    applicant: { fullName: "Ama Mensah", dateOfBirth: "1990-05-01" },
    programTrack: "broiler",
    documents: [],
    ...overrides,
  });
}

describe("scoreEligibility", () => {
  const trackRules = EligibilityRulesSchema.parse({
    programTracks: ["broiler", "layers"],
    applicantAge: { min: 18, max: 65 },
  });

  it("passes a matching track with an in-range applicant", () => {
    const result = scoreEligibility(
      { snapshot: snapshot(), jurisdiction: JURISDICTION, asOf: AS_OF },
      trackRules
    );
    expect(result).toEqual({ score: 50, flags: [], passed: true });
  });

  it("fails an under-age applicant below the pass threshold", () => {
    const result = scoreEligibility(
      {
        snapshot: snapshot({ applicant: { fullName: "Kofi Boateng", dateOfBirth: "2010-03-02" } }),
        jurisdiction: JURISDICTION,
        asOf: AS_OF,
      },
      trackRules
    );
    expect(result).toEqual({ score: 20, flags: ["AGE_BELOW_MINIMUM"], passed: false });
  });

  it("flags a track mismatch without awarding the match bonus", () => {
    const result = scoreEligibility(
      { snapshot: snapshot({ programTrack: "aquaculture" }), jurisdiction: JURISDICTION, asOf: AS_OF },
      trackRules
    );
    expect(result.score).toBe(0);
    expect(result.flags).toEqual(["PROGRAM_TRACK_MISMATCH"]);
  });

  it("deducts once per missing mandatory document, case-insensitively", () => {
    const rules = EligibilityRulesSchema.parse({
      baseScore: 100,
      mandatoryDocuments: ["ghana_card", "farm_photo"],
    });
    const result = scoreEligibility(
      { snapshot: snapshot({ documents: ["GHANA_CARD"] }), jurisdiction: JURISDICTION, asOf: AS_OF },
      rules
    );
    expect(result).toEqual({ score: 60, flags: ["MISSING_DOCUMENT:farm_photo"], passed: true });
  });

  it("treats the deadline day as still open", () => {
    const rules = EligibilityRulesSchema.parse({ baseScore: 100, applicationDeadline: "2026-02-28" });
    const onDeadline = scoreEligibility(
      { snapshot: snapshot(), jurisdiction: JURISDICTION, asOf: new Date("2026-02-28T23:00:00.000Z") },
      rules
    );
    const afterDeadline = scoreEligibility(
      { snapshot: snapshot(), jurisdiction: JURISDICTION, asOf: AS_OF },
      rules
    );
    expect(onDeadline.flags).toEqual([]);
    expect(afterDeadline).toEqual({ score: 50, flags: ["SUBMISSION_PAST_DEADLINE"], passed: true });
  });

  it("applies capacity, constituency, flock size and farm age rules and clamps at zero", () => {
    const rules = EligibilityRulesSchema.parse({
      baseScore: 100,
      capacity: { totalSlots: 10, slotsFilled: 10 },
      eligibleConstituencies: ["Ablekuma North"],
      birdCapacity: { min: 500 },
      minFarmAgeMonths: 6,
    });
    const result = scoreEligibility(
      {
        snapshot: snapshot({ farm: { farmName: "Sunrise Farm", birdCapacity: 100, yearsOperational: 0.25 } }),
        jurisdiction: JURISDICTION,
        asOf: AS_OF,
      },
      rules
    );
    expect(result).toEqual({
      score: 0,
      flags: [
        "PROGRAM_AT_CAPACITY",
        "CONSTITUENCY_NOT_ELIGIBLE",
        "BIRD_CAPACITY_BELOW_MINIMUM",
        "FARM_TOO_NEW",
      ],
      passed: false,
    });
  });

  it("uses configured deltas", () => {
    const rules = EligibilityRulesSchema.parse({
      baseScore: 80,
      birdCapacity: { max: 1000 },
      deltas: { birdCapacityOutOfRange: -5 },
    });
    const result = scoreEligibility(
      {
        snapshot: snapshot({ farm: { farmName: "Sunrise Farm", birdCapacity: 5000 } }),
        jurisdiction: JURISDICTION,
        asOf: AS_OF,
      },
      rules
    );
    expect(result).toEqual({ score: 75, flags: ["BIRD_CAPACITY_ABOVE_MAXIMUM"], passed: true });
  });

  it("is deterministic and leaves its input untouched", () => {
    const input = { snapshot: snapshot({ documents: ["ghana_card"] }), jurisdiction: JURISDICTION, asOf: AS_OF };
    const before = JSON.stringify(input);
    const first = scoreEligibility(input, trackRules);
    const second = scoreEligibility(input, trackRules);
    expect(second).toEqual(first);
    expect(JSON.stringify(input)).toBe(before);
  });
});

describe("ageInYears", () => {
  it("counts the birthday itself as a completed year", () => {
    expect(ageInYears("2008-03-01", AS_OF)).toBe(18);
    expect(ageInYears("2008-03-02", AS_OF)).toBe(17);
  });
});
