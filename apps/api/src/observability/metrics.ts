import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";

const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: "flockreview_" });

const workflowTransitionsTotal = new Counter({
  name: "flockreview_workflow_transitions_total",
  help: "Committed workflow transitions",
  labelNames: ["kind", "action"] as const,
  registers: [registry],
});

const queueClaimConflictsTotal = new Counter({
  name: "flockreview_queue_claim_conflicts_total",
  help: "Claim attempts that lost the race or found the entry already claimed",
  labelNames: ["kind", "level"] as const,
  registers: [registry],
});

const policyViolationsTotal = new Counter({
  name: "flockreview_policy_violations_total",
  help: "Rejected attempts to act outside the reviewer's level or jurisdiction",
  labelNames: ["kind", "code"] as const,
  registers: [registry],
});

const notificationFailuresTotal = new Counter({
  name: "flockreview_notification_failures_total",
  help: "Notifier calls that failed",
  labelNames: ["event_type"] as const,
  registers: [registry],
});

const dbQueryDurationSeconds = new Histogram({
  name: "flockreview_db_query_duration_seconds",
  help: "DB query latency in seconds",
  labelNames: ["operation", "success"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

const dbQueriesTotal = new Counter({
  name: "flockreview_db_queries_total",
  help: "Total DB queries",
  labelNames: ["operation", "success"] as const,
  registers: [registry],
});

const dbPoolTotalClients = new Gauge({
  name: "flockreview_db_pool_total_clients",
  help: "Total clients in the pg pool",
  registers: [registry],
});

const dbPoolIdleClients = new Gauge({
  name: "flockreview_db_pool_idle_clients",
  help: "Idle clients in the pg pool",
  registers: [registry],
});

const dbPoolWaitingClients = new Gauge({
  name: "flockreview_db_pool_waiting_clients",
  help: "Requests waiting for a pg client",
  registers: [registry],
});

const queueBacklogOpenEntries = new Gauge({
  name: "flockreview_queue_backlog_open_entries",
  help: "Live review queue entries",
  registers: [registry],
});

const queueBacklogOverdueEntries = new Gauge({
  name: "flockreview_queue_backlog_overdue_entries",
  help: "Live review queue entries past their SLA deadline",
  registers: [registry],
});

function normalizeOperation(sql: string): string {
  const trimmed = sql.trim();
  if (!trimmed) return "UNKNOWN";
  const match = trimmed.match(/^([A-Za-z]+)/);
  return (match?.[1] || "UNKNOWN").toUpperCase();
}

export function recordWorkflowTransition(kind: string, action: string): void {
  workflowTransitionsTotal.inc({ kind, action }, 1);
}

export function recordClaimConflict(kind: string, level: number): void {
  queueClaimConflictsTotal.inc({ kind, level: String(level) }, 1);
}

export function recordPolicyViolation(kind: string, code: string): void {
  policyViolationsTotal.inc({ kind, code }, 1);
}

export function recordNotificationFailure(eventType: string): void {
  notificationFailuresTotal.inc({ event_type: eventType }, 1);
}

export function recordDbQueryMetric(sql: string, durationSeconds: number, success: boolean): void {
  const labels = {
    operation: normalizeOperation(sql),
    success: success ? "true" : "false",
  };
  dbQueriesTotal.inc(labels, 1);
  dbQueryDurationSeconds.observe(labels, durationSeconds);
}

export function updateDbPoolMetric(input: {
  totalClients: number;
  idleClients: number;
  waitingClients: number;
}): void {
  dbPoolTotalClients.set(input.totalClients);
  dbPoolIdleClients.set(input.idleClients);
  dbPoolWaitingClients.set(input.waitingClients);
}

export function updateQueueBacklogMetric(input: {
  openEntries: number;
  overdueEntries: number;
}): void {
  queueBacklogOpenEntries.set(input.openEntries);
  queueBacklogOverdueEntries.set(input.overdueEntries);
}

export function getMetricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
