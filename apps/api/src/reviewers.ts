import { query } from "./db";
import type { ReviewerProfile, ReviewerResolver } from "./policy";

interface ReviewerRow {
  user_id: string;
  role: string;
  region: string | null;
  district: string | null;
  constituency: string | null;
}

function toProfile(row: ReviewerRow): ReviewerProfile {
  return {
    userId: row.user_id,
    role: row.role,
    region: row.region ?? "",
    district: row.district ?? "",
    constituency: row.constituency ?? "",
  };
}

function isReviewerRow(row: unknown): row is ReviewerRow {
  if (typeof row !== "object" || row === null) return false;
  return (
    "user_id" in row &&
    typeof row.user_id === "string" &&
    "role" in row &&
    typeof row.role === "string"
  );
}

/** Reads active reviewers from the `reviewer` table. Inactive users resolve to null. */
export class PgReviewerResolver implements ReviewerResolver {
  async resolve(userId: string): Promise<ReviewerProfile | null> {
    const result = await query(
      `SELECT user_id, role, region, district, constituency
         FROM reviewer
        WHERE user_id = $1 AND active = TRUE`,
      [userId]
    );
    const row: unknown = result.rows[0];
    return isReviewerRow(row) ? toProfile(row) : null;
  }

  async listActiveReviewers(roles: readonly string[]): Promise<ReviewerProfile[]> {
    if (roles.length === 0) return [];
    const result = await query(
      `SELECT user_id, role, region, district, constituency
         FROM reviewer
        WHERE role = ANY($1::text[]) AND active = TRUE
        ORDER BY user_id ASC`,
      [Array.from(roles)]
    );
    const rows: unknown[] = result.rows;
    return rows.filter(isReviewerRow).map(toProfile);
  }
}
