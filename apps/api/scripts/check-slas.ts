import { closePool } from "../src/db";
import { createReviewService } from "../src/service";
import { runSlaSweep } from "../src/sla-checker";

async function main(): Promise<void> {
  const result = await runSlaSweep(createReviewService());
  console.log("[SLA_SWEEP_DONE]", {
    expired: result.changesExpiry.expired,
    autoRejected: result.changesExpiry.autoRejected,
    escalated: result.changesExpiry.escalated,
    breachedEntries: result.breaches.breachedEntries,
    remindersSent: result.reminders.remindersSent,
  });
  await closePool();
  const errors = [...result.changesExpiry.errors, ...result.breaches.errors, ...result.reminders.errors];
  if (errors.length > 0) {
    console.error(`[SLA_SWEEP_ERRORS] ${errors.length} item(s) failed`, errors);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("[SLA_SWEEP_FAILED]", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
