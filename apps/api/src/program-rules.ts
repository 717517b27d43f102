import { promises as fs } from "fs";
import path from "path";
import { parse } from "yaml";
import {
  ProgramRulesSchema,
  type ApplicationKind,
  type ProgramRules,
  type ProgramRulesInput,
} from "@flockreview/shared";
import { ProgramRulesError } from "./errors";
import { logInfo } from "./logger";
import { parsePositiveIntEnv } from "./runtime-safety";

export interface ProgramRulesProvider {
  getRules(kind: ApplicationKind): Promise<ProgramRules>;
}

export function parseProgramRulesYaml(
  rawYaml: string,
  sourceLabel: string,
  options?: { expectedKind?: ApplicationKind }
): ProgramRules {
  let parsed: unknown;
  try {
    parsed = parse(rawYaml);
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown parse error";
    throw new ProgramRulesError(`[PROGRAM_RULES_INVALID] ${sourceLabel} contains invalid YAML: ${message}`);
  }

  const result = ProgramRulesSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProgramRulesError(`[PROGRAM_RULES_INVALID] ${sourceLabel}: ${details}`);
  }
  if (options?.expectedKind && result.data.kind !== options.expectedKind) {
    throw new ProgramRulesError(
      `[PROGRAM_RULES_INVALID] ${sourceLabel}: kind ${result.data.kind} does not match ${options.expectedKind}`
    );
  }
  return result.data;
}

export function programRulesFileName(kind: ApplicationKind): string {
  return `${kind.toLowerCase()}.yaml`;
}

type ProgramRulesCacheEntry = {
  expiresAtMs: number;
  value: ProgramRules;
};

export interface FileProgramRulesProviderOptions {
  directory?: string;
  cacheTtlMs?: number;
  nowMs?: () => number;
}

/**
 * Loads `<directory>/<kind>.yaml`. Parsed documents are cached per kind until
 * the TTL lapses or `invalidate` is called, so edited files take effect
 * without a restart.
 */
export class FileProgramRulesProvider implements ProgramRulesProvider {
  private readonly directory: string;
  private readonly cacheTtlMs: number;
  private readonly nowMs: () => number;
  private readonly cache = new Map<ApplicationKind, ProgramRulesCacheEntry>();

  constructor(options: FileProgramRulesProviderOptions = {}) {
    this.directory =
      options.directory ??
      process.env.PROGRAM_RULES_DIR ??
      path.resolve(__dirname, "..", "..", "..", "program-rules");
    this.cacheTtlMs =
      options.cacheTtlMs ?? parsePositiveIntEnv(process.env.PROGRAM_RULES_CACHE_TTL_MS, 60000);
    this.nowMs = options.nowMs ?? Date.now;
  }

  async getRules(kind: ApplicationKind): Promise<ProgramRules> {
    const now = this.nowMs();
    const cached = this.cache.get(kind);
    if (cached && cached.expiresAtMs > now) {
      return cached.value;
    }

    const filePath = path.join(this.directory, programRulesFileName(kind));
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProgramRulesError(`[PROGRAM_RULES_MISSING] ${filePath}: ${message}`);
    }

    const rules = parseProgramRulesYaml(raw, filePath, { expectedKind: kind });
    this.cache.set(kind, { value: rules, expiresAtMs: now + this.cacheTtlMs });
    logInfo("Program rules loaded", { kind, levels: rules.levels.length, source: filePath });
    return rules;
  }

  invalidate(kind?: ApplicationKind): void {
    if (kind) {
      this.cache.delete(kind);
      return;
    }
    this.cache.clear();
  }
}

/** Fixed in-memory rules, validated once at construction. */
export class StaticProgramRulesProvider implements ProgramRulesProvider {
  private readonly rules = new Map<ApplicationKind, ProgramRules>();

  constructor(documents: ProgramRulesInput[]) {
    for (const document of documents) {
      const result = ProgramRulesSchema.safeParse(document);
      if (!result.success) {
        throw new ProgramRulesError(
          `[PROGRAM_RULES_INVALID] ${document.kind}: ${result.error.issues.map((i) => i.message).join("; ")}`
        );
      }
      this.rules.set(result.data.kind, result.data);
    }
  }

  async getRules(kind: ApplicationKind): Promise<ProgramRules> {
    const rules = this.rules.get(kind);
    if (!rules) {
      throw new ProgramRulesError(`[PROGRAM_RULES_MISSING] no rules registered for ${kind}`);
    }
    return rules;
  }
}
