import { ExtractorDocumentError } from "../common/errors";
import { readJsonFile } from "../common/files";
import type { Diagnostics } from "../common/diagnostics";
import { RuleEntry } from "./rule-entry";
import { RuleEntryMap } from "./rule-entry-map";
import { type RuleRecordInput, ruleEntriesDocumentSchema, ruleRecordSchema } from "./schema";

/**
 * Validates one record and turns it into a rule entry
 */
export function parseRuleRecord(input: RuleRecordInput): RuleEntry {
  return new RuleEntry(ruleRecordSchema.parse(input));
}

export function parseRuleEntriesDocument(
  raw: unknown,
  options?: { path?: string; diagnostics?: Diagnostics },
): RuleEntryMap {
  const result = ruleEntriesDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ExtractorDocumentError("Rule entries document is invalid", {
      path: options?.path,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const map = new RuleEntryMap({ diagnostics: options?.diagnostics });
  for (const record of result.data.rules) {
    map.insert(new RuleEntry(record));
  }
  return map;
}

/**
 * Reads the JSON document written by the Bazel aspect
 */
export async function loadRuleEntries(path: string, options?: { diagnostics?: Diagnostics }): Promise<RuleEntryMap> {
  const raw = await readJsonFile(path);
  return parseRuleEntriesDocument(raw, { path, diagnostics: options?.diagnostics });
}
