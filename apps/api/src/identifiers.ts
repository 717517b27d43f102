import type { ApplicationRecord, ProgramRules } from "@flockreview/shared";
import type { ReviewTransaction } from "./repository";

export interface IssueContext {
  tx: ReviewTransaction;
  rules: ProgramRules;
}

/**
 * Issues the permanent identifier of an approved application. Must return the
 * application's existing identifier when it already has one.
 */
export interface IdentifierIssuer {
  issueIdentifier(application: ApplicationRecord, context: IssueContext): Promise<string>;
}

/** First four letters of an area name, upper-cased; "UNK" when there are none. */
export function areaCode(name: string): string {
  const letters = name.replace(/[^A-Za-z]/g, "").toUpperCase();
  return letters ? letters.slice(0, 4) : "UNK";
}

/** `<PREFIX>-<REGION4>-<CONST4>-<NNNN>`, numbered per prefix and area. */
export class SequentialIdentifierIssuer implements IdentifierIssuer {
  async issueIdentifier(application: ApplicationRecord, { tx, rules }: IssueContext): Promise<string> {
    if (application.issuedIdentifier) return application.issuedIdentifier;

    const { region, district, constituency } = application.jurisdiction;
    const prefix = [
      rules.identifierPrefix,
      areaCode(region),
      areaCode(constituency || district || region),
    ].join("-");
    const next = await tx.nextSequence(`identifier:${prefix}`);
    return `${prefix}-${String(next).padStart(4, "0")}`;
  }
}

export function formatReferenceNumber(prefix: string, year: number, sequence: number): string {
  return `${prefix}-${year}-${String(sequence).padStart(5, "0")}`;
}

export async function allocateReferenceNumber(
  tx: ReviewTransaction,
  rules: ProgramRules,
  now: Date
): Promise<string> {
  const year = now.getUTCFullYear();
  const next = await tx.nextSequence(`reference:${rules.referencePrefix}-${year}`);
  return formatReferenceNumber(rules.referencePrefix, year, next);
}
