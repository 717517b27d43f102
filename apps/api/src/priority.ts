import type { ApplicationRecord, PriorityRules, QueueEntryRecord } from "@flockreview/shared";
import { daysBetween } from "./sla";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RankedEntry {
  entry: QueueEntryRecord;
  application: ApplicationRecord;
  rank: number;
}

/**
 * Queue-ordering score. Higher is reviewed sooner.
 *
 * Static bonuses come from the snapshot; the wait and urgency components move
 * with `now`, which is why listings re-rank instead of trusting
 * `prioritySnapshot`.
 */
export function rankApplication(
  application: ApplicationRecord,
  entry: QueueEntryRecord,
  rules: PriorityRules,
  now: Date
): number {
  const { snapshot } = application;
  let rank = 0;

  if (snapshot.sponsored) rank += rules.sponsoredTrackBonus;
  if (snapshot.documents.length >= rules.minDocumentsForBonus) rank += rules.documentsBonus;
  if (snapshot.farm?.taxId) rank += rules.taxIdBonus;
  if (snapshot.farm?.businessRegistrationNumber) rank += rules.businessRegistrationBonus;

  const waitingSince = application.submittedAt ?? entry.enteredAt;
  rank += Math.min(rules.waitBonusCap, daysBetween(waitingSince, now) * rules.waitBonusPerDay);

  const remainingMs = entry.slaDeadline.getTime() - now.getTime();
  if (remainingMs < 0) {
    rank += rules.overdueBonus;
  } else if (remainingMs <= DAY_MS) {
    rank += rules.dueWithinOneDayBonus;
  } else if (remainingMs <= 3 * DAY_MS) {
    rank += rules.dueWithinThreeDaysBonus;
  }

  return rank;
}

/** Rank descending, then earliest submission, then entry id. */
export function compareRankedEntries(a: RankedEntry, b: RankedEntry): number {
  if (a.rank !== b.rank) return b.rank - a.rank;
  const aSubmitted = (a.application.submittedAt ?? a.entry.enteredAt).getTime();
  const bSubmitted = (b.application.submittedAt ?? b.entry.enteredAt).getTime();
  if (aSubmitted !== bSubmitted) return aSubmitted - bSubmitted;
  return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0;
}
