/**
 * Typed workflow errors. Every error carries a stable upper-case `code`
 * so callers can branch without string-matching messages.
 */
import type { z } from "zod";

export type WorkflowErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_ENTRY"
  | "ALREADY_CLAIMED"
  | "NOT_CLAIMED_BY_CALLER"
  | "LEVEL_MISMATCH"
  | "UNAUTHORIZED"
  | "DEADLINE_EXPIRED"
  | "APPLICATION_NOT_FOUND"
  | "QUEUE_ENTRY_NOT_FOUND"
  | "INVALID_STATE"
  | "PROGRAM_RULES_INVALID";

/** Who attempted what, attached to errors that are also written to the audit trail. */
export interface PolicyContext {
  applicationId: string;
  actorId: string;
  reviewLevel: number | null;
}

export class WorkflowError extends Error {
  name = "WorkflowError";
  readonly code: WorkflowErrorCode;

  constructor(code: WorkflowErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export class ValidationError extends WorkflowError {
  name = "ValidationError";
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super("VALIDATION_FAILED", message);
    this.issues = issues;
  }
}

export class DuplicateEntryError extends WorkflowError {
  name = "DuplicateEntryError";

  constructor(readonly applicationId: string, readonly reviewLevel: number) {
    super("DUPLICATE_ENTRY", `Application ${applicationId} already has a live queue entry at level ${reviewLevel}`);
  }
}

export class AlreadyClaimedError extends WorkflowError {
  name = "AlreadyClaimedError";

  constructor(readonly entryId: string) {
    super("ALREADY_CLAIMED", `Queue entry ${entryId} is not pending`);
  }
}

export class NotClaimedByCallerError extends WorkflowError {
  name = "NotClaimedByCallerError";

  constructor(readonly entryId: string, readonly callerId: string) {
    super("NOT_CLAIMED_BY_CALLER", `Queue entry ${entryId} is not claimed by ${callerId}`);
  }
}

export class LevelMismatchError extends WorkflowError {
  name = "LevelMismatchError";

  constructor(
    readonly expectedLevel: number | null,
    readonly actualLevel: number,
    readonly context?: PolicyContext
  ) {
    super(
      "LEVEL_MISMATCH",
      `Application is at review level ${expectedLevel ?? "none"}, not ${actualLevel}`
    );
  }
}

export class UnauthorizedError extends WorkflowError {
  name = "UnauthorizedError";

  constructor(message: string, readonly context?: PolicyContext) {
    super("UNAUTHORIZED", message);
  }
}

/** Raised inside resubmit and converted into the program's expiry transition. */
export class DeadlineExpiredError extends WorkflowError {
  name = "DeadlineExpiredError";

  constructor(readonly applicationId: string, readonly deadline: Date) {
    super("DEADLINE_EXPIRED", `Changes deadline for ${applicationId} passed at ${deadline.toISOString()}`);
  }
}

export class ApplicationNotFoundError extends WorkflowError {
  name = "ApplicationNotFoundError";

  constructor(readonly applicationId: string) {
    super("APPLICATION_NOT_FOUND", `Application ${applicationId} not found`);
  }
}

export class QueueEntryNotFoundError extends WorkflowError {
  name = "QueueEntryNotFoundError";

  constructor(readonly entryId: string) {
    super("QUEUE_ENTRY_NOT_FOUND", `Queue entry ${entryId} not found`);
  }
}

export class InvalidStateError extends WorkflowError {
  name = "InvalidStateError";

  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}

export class ProgramRulesError extends WorkflowError {
  name = "ProgramRulesError";

  constructor(message: string) {
    super("PROGRAM_RULES_INVALID", message);
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
