import { getLogContext } from "./log-context";
import { trace } from "@opentelemetry/api";

type LogLevel = "info" | "warn" | "error";

type LogFields = Record<string, unknown>;

// Applicant snapshots carry personal data; never let it reach the log sink.
const REDACT_KEY_PATTERN = /(password|token|secret|authorization|cookie|email|phone|mobile|nationalid|dateofbirth|taxid)/i;
const MAX_REDACTION_DEPTH = 6;

function redactValue(value: unknown, depth = 0): unknown {
  if (depth >= MAX_REDACTION_DEPTH) return "[MAX_DEPTH]";
  if (value == null) return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  if (typeof value === "object") {
    const output: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (REDACT_KEY_PATTERN.test(key)) {
        output[key] = "[REDACTED]";
      } else {
        output[key] = redactValue(entry, depth + 1);
      }
    }
    return output;
  }
  return value;
}

export function redactLogFields(fields: LogFields): LogFields {
  const output: LogFields = {};
  for (const [key, entry] of Object.entries(fields)) {
    output[key] = REDACT_KEY_PATTERN.test(key) ? "[REDACTED]" : redactValue(entry, 1);
  }
  return output;
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  const context = getLogContext();
  const spanContext = trace.getActiveSpan()?.spanContext();
  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    requestId: context?.requestId ?? null,
    operation: context?.operation ?? null,
    actorId: context?.actorId ?? null,
    traceId: spanContext?.traceId ?? null,
    spanId: spanContext?.spanId ?? null,
    ...(fields ? redactLogFields(fields) : {}),
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logInfo(message: string, fields?: LogFields): void {
  write("info", message, fields);
}

export function logWarn(message: string, fields?: LogFields): void {
  write("warn", message, fields);
}

export function logError(message: string, fields?: LogFields): void {
  write("error", message, fields);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
