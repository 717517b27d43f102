import { createHash } from "node:crypto";
import { v4 as uuidv4 } from "uuid";
import type { ReviewActionRecord, ReviewActionType } from "@flockreview/shared";
import type { ReviewTransaction } from "./repository";

export const GENESIS_HASH = "GENESIS";

export interface AuditChainMismatch {
  index: number;
  sequence: number;
  actionId: string;
  reason: "SEQUENCE_GAP" | "PREV_HASH_MISMATCH" | "EVENT_HASH_MISMATCH" | "HASH_MISSING";
  expectedPrevHash: string;
  actualPrevHash: string | null;
  expectedHash: string;
  actualHash: string | null;
}

export interface AuditChainVerificationResult {
  ok: boolean;
  checked: number;
  mismatch?: AuditChainMismatch;
}

/** JSON with object keys sorted at every depth; jsonb does not keep insertion order. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

type HashedFields = Omit<ReviewActionRecord, "hash">;

export function computeActionHash(action: HashedFields): string {
  const canonical = [
    action.id,
    action.applicationId,
    String(action.sequence),
    action.reviewerId || "",
    action.reviewLevel === null ? "" : String(action.reviewLevel),
    action.queueEntryId || "",
    action.action,
    action.notes,
    canonicalJson(action.metadata),
    action.createdAt.toISOString(),
    action.prevHash,
  ].join("|");
  return createHash("sha256").update(canonical).digest("hex");
}

export interface RecordActionInput {
  applicationId: string;
  action: ReviewActionType;
  reviewerId?: string | null;
  reviewLevel?: number | null;
  queueEntryId?: string | null;
  notes?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Append-only review ledger. Each application's actions form their own
 * chain: `sequence` counts from 1 and every hash covers the previous one.
 */
export class AuditLog {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async record(tx: ReviewTransaction, input: RecordActionInput): Promise<ReviewActionRecord> {
    const last = await tx.getLastReviewAction(input.applicationId);
    const unhashed: HashedFields = {
      id: uuidv4(),
      applicationId: input.applicationId,
      sequence: (last?.sequence ?? 0) + 1,
      reviewerId: input.reviewerId ?? null,
      reviewLevel: input.reviewLevel ?? null,
      queueEntryId: input.queueEntryId ?? null,
      action: input.action,
      notes: input.notes ?? "",
      metadata: input.metadata ?? {},
      createdAt: this.now(),
      prevHash: last?.hash ?? GENESIS_HASH,
    };
    const record: ReviewActionRecord = { ...unhashed, hash: computeActionHash(unhashed) };
    await tx.appendReviewAction(record);
    return record;
  }
}

/** Re-derives the chain of one application's actions, ordered by sequence. */
export function verifyAuditTrail(actions: readonly ReviewActionRecord[]): AuditChainVerificationResult {
  let runningPrevHash = GENESIS_HASH;
  for (let index = 0; index < actions.length; index += 1) {
    const action = actions[index];
    const { hash, ...fields } = action;
    const expectedHash = computeActionHash({ ...fields, prevHash: runningPrevHash });
    const mismatch = (reason: AuditChainMismatch["reason"]): AuditChainVerificationResult => ({
      ok: false,
      checked: index,
      mismatch: {
        index,
        sequence: action.sequence,
        actionId: action.id,
        reason,
        expectedPrevHash: runningPrevHash,
        actualPrevHash: action.prevHash || null,
        expectedHash,
        actualHash: hash || null,
      },
    });

    if (!action.prevHash || !hash) return mismatch("HASH_MISSING");
    if (action.sequence !== index + 1) return mismatch("SEQUENCE_GAP");
    if (action.prevHash !== runningPrevHash) return mismatch("PREV_HASH_MISMATCH");
    if (hash !== expectedHash) return mismatch("EVENT_HASH_MISMATCH");

    runningPrevHash = hash;
  }
  return { ok: true, checked: actions.length };
}
