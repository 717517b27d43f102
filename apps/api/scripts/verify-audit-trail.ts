import { closePool, query } from "../src/db";
import { createReviewService } from "../src/service";

async function main(): Promise<void> {
  const { engine } = createReviewService();
  const result = await query("SELECT id FROM review_application ORDER BY created_at, id");
  let checked = 0;
  let broken = 0;

  for (const row of result.rows) {
    const id: unknown = row.id;
    if (typeof id !== "string") continue;
    const verification = await engine.verifyAuditTrail(id);
    checked += verification.checked;
    if (!verification.ok) {
      broken++;
      console.error("[AUDIT_TRAIL_BROKEN] integrity mismatch detected", {
        applicationId: id,
        checkedBeforeFailure: verification.checked,
        mismatch: verification.mismatch,
      });
    }
  }

  await closePool();
  if (broken > 0) {
    process.exit(1);
  }
  console.log(`[AUDIT_TRAIL_OK] verified ${checked} action(s) across ${result.rows.length} application(s)`);
}

main().catch((error) => {
  console.error("[AUDIT_TRAIL_VERIFY_FAILED]", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
