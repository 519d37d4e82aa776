export { BuildLabel } from "./bazel/label";
export { DeploymentTarget, DottedVersion, type PlatformType } from "./bazel/deployment-target";
export { BazelFileInfo, RuleEntry } from "./bazel/rule-entry";
export { RuleEntryMap } from "./bazel/rule-entry-map";
export { loadRuleEntries, parseRuleEntriesDocument, parseRuleRecord } from "./bazel/extractor";
export type { RuleEntriesDocument, RuleRecordInput } from "./bazel/schema";
export { WorkspaceInfoFetcher, type WorkspaceInfo } from "./bazel/workspace-info";

export { type Config, loadWorkspaceConfig, parseConfig } from "./common/config";
export { type Diagnostic, Diagnostics } from "./common/diagnostics";
export * from "./common/errors";
export { Logger, LogLevel } from "./common/logger";
export { getMetrics } from "./common/metrics";

export { IndexerSynthesizer, mergeIndexers } from "./generator/indexer";
export {
  type GenerationResult,
  ProjectGenerator,
  type ProjectWriter,
  type WorkspaceInfoSource,
  resolveSelectedEntries,
} from "./generator/project-generator";
export { LabelState, TargetGenerator, type TargetGeneratorOptions } from "./generator/target-generator";

export { Project } from "./xcode/pbx/project";
export { ProductType } from "./xcode/pbx/product-type";
export { serializeProject } from "./xcode/serializer/openstep";
export { type ProjectSummary, inspectProject, summarizeProject } from "./xcode/summary";
