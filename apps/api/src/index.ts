export { ReviewWorkflowEngine, CHANGES_DEADLINE_EXPIRED } from "./workflow";
export type { ReviewWorkflowDeps, TerminalHandler } from "./workflow";
export { QueueManager } from "./queue";
export type { QueueManagerDeps, QueueStatistics } from "./queue";
export { AuditLog, GENESIS_HASH, computeActionHash, verifyAuditTrail } from "./audit-chain";
export type { AuditChainMismatch, AuditChainVerificationResult, RecordActionInput } from "./audit-chain";
export { scoreEligibility, ageInYears } from "./eligibility";
export type { EligibilityFlag, EligibilityInput, EligibilityResult } from "./eligibility";
export { rankApplication, compareRankedEntries } from "./priority";
export type { RankedEntry } from "./priority";
export { computeSlaDeadline } from "./sla";
export { canReview, isSupervisor, isWithinJurisdiction } from "./policy";
export type { ReviewerProfile, ReviewerResolver, ReviewAccessResult } from "./policy";
export {
  FileProgramRulesProvider,
  StaticProgramRulesProvider,
  parseProgramRulesYaml,
} from "./program-rules";
export type { ProgramRulesProvider } from "./program-rules";
export { SequentialIdentifierIssuer, allocateReferenceNumber, areaCode } from "./identifiers";
export type { IdentifierIssuer, IssueContext } from "./identifiers";
export { LoggingNotifier, dispatchNotifications } from "./notifications";
export type { Notifier, NotificationEventType, NotificationRecipient, NotificationPayload } from "./notifications";
export { PgReviewRepository } from "./pg-repository";
export type { SqlClient, SqlPool } from "./pg-repository";
export type { ReviewRepository, ReviewTransaction, QueueEntryQuery, QueueEntryPatch } from "./repository";
export {
  processExpiredChangeRequests,
  detectSlaBreaches,
  sendSlaReminders,
  runSlaSweep,
  startSlaChecker,
} from "./sla-checker";
export type { SlaSweepDeps } from "./sla-checker";
export * from "./errors";
export { getMetricsSnapshot, getMetricsContentType } from "./observability/metrics";
