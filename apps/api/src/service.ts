import type { ApplicationKind } from "@flockreview/shared";
import { observeQuery, pool } from "./db";
import type { IdentifierIssuer } from "./identifiers";
import { LoggingNotifier, type Notifier } from "./notifications";
import { PgReviewRepository } from "./pg-repository";
import type { ReviewerResolver } from "./policy";
import { FileProgramRulesProvider } from "./program-rules";
import { PgReviewerResolver } from "./reviewers";
import type { SlaSweepDeps } from "./sla-checker";
import { ReviewWorkflowEngine, type TerminalHandler } from "./workflow";

export interface ReviewServiceOptions {
  notifier?: Notifier;
  reviewerResolver?: ReviewerResolver;
  identifierIssuer?: IdentifierIssuer;
  terminalHandlers?: Partial<Record<ApplicationKind, TerminalHandler>>;
  rulesDirectory?: string;
}

export interface ReviewService extends SlaSweepDeps {
  rulesProvider: FileProgramRulesProvider;
}

/** Wires the engine to PostgreSQL, the YAML program rules and the reviewer table. */
export function createReviewService(options: ReviewServiceOptions = {}): ReviewService {
  const repository = new PgReviewRepository(pool, observeQuery);
  const rulesProvider = new FileProgramRulesProvider({ directory: options.rulesDirectory });
  const notifier = options.notifier ?? new LoggingNotifier();
  const engine = new ReviewWorkflowEngine({
    repository,
    rulesProvider,
    reviewerResolver: options.reviewerResolver ?? new PgReviewerResolver(),
    notifier,
    identifierIssuer: options.identifierIssuer,
    terminalHandlers: options.terminalHandlers,
  });
  return { engine, repository, rulesProvider };
}
