import type { DeploymentTarget } from "../bazel/deployment-target";
import type { RuleEntry } from "../bazel/rule-entry";
import { hex8 } from "../common/helpers";
import { INDEXER_TARGET_PREFIX, MAX_INDEXER_NAME_LENGTH } from "./constants";

/**
 * `_idx_<name>_<hash>_<platform>_min<version>`. Very long names are cut and marked with `_etc`.
 */
export function indexerNameForTargetName(targetName: string, hash: number, deploymentTarget?: DeploymentTarget): string {
  const normalized =
    targetName.length > MAX_INDEXER_NAME_LENGTH ? `${targetName.slice(0, MAX_INDEXER_NAME_LENGTH - 4)}_etc` : targetName;
  const name = `${INDEXER_TARGET_PREFIX}${normalized}_${hex8(hash)}`;
  return deploymentTarget ? `${name}_${deploymentTarget.toString()}` : name;
}

/**
 * Longest strict prefix shared by all strings that ends on `separator`, or "" if there is none
 */
export function longestCommonPrefix(strings: ReadonlySet<string>, separator: string): string {
  if (strings.size < 2) {
    return "";
  }
  let shortest: string | undefined;
  for (const value of strings) {
    if (shortest === undefined || value.length < shortest.length) {
      shortest = value;
    }
  }
  if (!shortest) {
    return "";
  }

  // Drop the last component so the prefix is strict
  let components = shortest.split(separator).filter((component) => component !== "").slice(0, -1);
  const prefixOf = (parts: string[]) => `${parts.join(separator)}${separator}`;
  let prefix = prefixOf(components);

  for (const value of strings) {
    while (components.length > 0 && !value.startsWith(prefix)) {
      components = components.slice(0, -1);
      prefix = prefixOf(components);
    }
  }
  return components.length > 0 ? prefix : "";
}

/**
 * Moves entries whose `namer` result is unique (and not yet taken) into `named`. Returns the
 * entries that still need a name.
 */
function assignUniqueNames(
  entries: readonly RuleEntry[],
  named: Map<string, RuleEntry>,
  namer: (entry: RuleEntry) => string | undefined,
): RuleEntry[] {
  const unnamed: RuleEntry[] = [];
  const byName = new Map<string, RuleEntry[]>();
  for (const entry of entries) {
    const name = namer(entry);
    if (name === undefined) {
      unnamed.push(entry);
      continue;
    }
    const bucket = byName.get(name);
    if (bucket) {
      bucket.push(entry);
    } else {
      byName.set(name, [entry]);
    }
  }

  for (const [name, bucket] of byName) {
    if (bucket.length === 1 && !named.has(name)) {
      named.set(name, bucket[0]);
    } else {
      unnamed.push(...bucket);
    }
  }
  return unnamed;
}

/**
 * Picks a target name per entry: the bundle name when unique, then the target name, and finally
 * the full label name with the prefix all colliding entries share stripped off.
 */
export function generateUniqueNames(entries: readonly RuleEntry[]): Map<string, RuleEntry> {
  const named = new Map<string, RuleEntry>();
  let unnamed = assignUniqueNames(entries, named, (entry) => entry.bundleName);
  unnamed = assignUniqueNames(unnamed, named, (entry) => entry.label.targetName);
  if (unnamed.length === 0) {
    return named;
  }

  const fullName = (entry: RuleEntry) => entry.label.asFullTargetName ?? entry.label.value;
  const prefix = longestCommonPrefix(new Set(unnamed.map(fullName)), "-");

  for (const entry of unnamed) {
    const full = fullName(entry);
    const shortened = full.slice(prefix.length);
    if (prefix === "" || shortened === "" || named.has(shortened)) {
      named.set(full, entry);
    } else {
      named.set(shortened, entry);
    }
  }
  return named;
}
