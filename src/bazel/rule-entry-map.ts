import type { Diagnostics } from "../common/diagnostics";
import type { DeploymentTarget } from "./deployment-target";
import type { BuildLabel } from "./label";
import type { RuleEntry } from "./rule-entry";

/**
 * Store of all rule entries read from the extractor output.
 *
 * A label may map to several entries when Bazel splits configurations: an objc_library used by
 * an iOS 9 application and an iOS 10 test appears once per deployment target.
 */
export class RuleEntryMap {
  private labelToEntries = new Map<string, RuleEntry[]>();
  private entries: RuleEntry[] = [];
  private labelsWithWarning = new Set<string>();
  private diagnostics: Diagnostics | undefined;

  constructor(options?: { diagnostics?: Diagnostics }) {
    this.diagnostics = options?.diagnostics;
  }

  get allEntries(): readonly RuleEntry[] {
    return this.entries;
  }

  get labels(): string[] {
    return [...this.labelToEntries.keys()];
  }

  insert(entry: RuleEntry): void {
    this.entries.push(entry);
    const bucket = this.labelToEntries.get(entry.label.value);
    if (bucket) {
      bucket.push(entry);
    } else {
      this.labelToEntries.set(entry.label.value, [entry]);
    }
  }

  hasEntries(label: BuildLabel): boolean {
    return this.anyEntry(label) !== undefined;
  }

  /**
   * Most recently inserted entry for the label
   */
  anyEntry(label: BuildLabel): RuleEntry | undefined {
    const bucket = this.labelToEntries.get(label.value);
    return bucket?.[bucket.length - 1];
  }

  entriesForLabel(label: BuildLabel): readonly RuleEntry[] {
    return this.labelToEntries.get(label.value) ?? [];
  }

  /**
   * Entry for a dependency of `depender`, matched by the depender's deployment target
   */
  entry(label: BuildLabel, depender: RuleEntry): RuleEntry | undefined {
    const deploymentTarget = depender.deploymentTarget;
    if (!deploymentTarget) {
      this.diagnostics?.warning("DependentRuleEntryHasNoDeploymentTarget", depender.label.value, label.value);
      return this.anyEntry(label);
    }
    return this.entryForDeploymentTarget(label, deploymentTarget);
  }

  entryForDeploymentTarget(label: BuildLabel, deploymentTarget: DeploymentTarget): RuleEntry | undefined {
    const bucket = this.labelToEntries.get(label.value);
    if (!bucket || bucket.length === 0) {
      return undefined;
    }

    // A single entry is assumed to be right
    if (bucket.length === 1) {
      return bucket[0];
    }

    const match = bucket.find((entry) => entry.deploymentTarget?.equals(deploymentTarget));
    if (match) {
      return match;
    }

    if (!this.labelsWithWarning.has(label.value)) {
      this.labelsWithWarning.add(label.value);
      this.diagnostics?.warning("AmbiguousRuleEntryReference", label.value);
    }
    return bucket[bucket.length - 1];
  }
}
