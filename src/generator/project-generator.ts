import path from "node:path";
import { loadRuleEntries, parseRuleRecord } from "../bazel/extractor";
import { BuildLabel } from "../bazel/label";
import type { RuleEntry } from "../bazel/rule-entry";
import type { RuleEntryMap } from "../bazel/rule-entry-map";
import { type WorkspaceInfo, WorkspaceInfoFetcher } from "../bazel/workspace-info";
import type { Config } from "../common/config";
import { Diagnostics } from "../common/diagnostics";
import { ConfigError, DirectoryCreationError, LabelResolutionError } from "../common/errors";
import { createDirectory, replaceSymlink, writeTextFile } from "../common/files";
import { commonLogger } from "../common/logger";
import { measureGeneration } from "../common/metrics";
import { Project } from "../xcode/pbx/project";
import { serializeProject } from "../xcode/serializer/openstep";
import { splitShellWords } from "./commandline";
import { EXECUTION_ROOT_SYMLINK_PATH, OUTPUT_BASE_SYMLINK_PATH } from "./constants";
import { createPathFilter, mainGroupForOutputFolder } from "./paths";
import { TargetGenerator } from "./target-generator";

const DEFAULT_BAZEL_PATH = "bazel";
const PROJECT_FILE_NAME = "project.pbxproj";

/**
 * File system operations used to write the project bundle. Tests swap in an in-memory version.
 */
export interface ProjectWriter {
  createDirectory(directory: string): Promise<unknown>;
  writeTextFile(filePath: string, content: string): Promise<void>;
  replaceSymlink(target: string, linkPath: string): Promise<void>;
}

export const fileSystemWriter: ProjectWriter = {
  createDirectory,
  writeTextFile,
  replaceSymlink,
};

export interface WorkspaceInfoSource {
  fetch(): Promise<WorkspaceInfo>;
}

export type GenerationResult = {
  project: Project;
  bundlePath: string;
  projectFilePath: string;
  contents: string;
  diagnostics: Diagnostics;
};

function requireConfig<K extends keyof Config>(config: Config, key: K): NonNullable<Config[K]> {
  const value = config[key];
  if (value === undefined || value === null) {
    throw new ConfigError("Configuration is incomplete", { issues: [`${key}: Required`] });
  }
  return value;
}

function hostLabelForEntry(entry: RuleEntry): BuildLabel | undefined {
  const host = entry.attributes.test_host ?? entry.attributes.xctest_app;
  return host ? new BuildLabel(host) : undefined;
}

/**
 * Resolves the labels the user asked for into the entries that get product targets: test
 * suites are replaced by their members, and the hosts and extensions of selected rules are
 * pulled in.
 */
export function resolveSelectedEntries(
  ruleEntryMap: RuleEntryMap,
  labels: readonly string[],
  diagnostics: Diagnostics,
): RuleEntry[] {
  const selected: RuleEntry[] = [];
  const missing: string[] = [];
  for (const value of labels) {
    const entry = ruleEntryMap.anyEntry(new BuildLabel(value));
    if (entry) {
      selected.push(entry);
    } else {
      missing.push(value);
    }
  }
  if (missing.length > 0) {
    throw new LabelResolutionError("Failed to resolve the selected labels", { labels: missing });
  }

  const expanded = expandTestSuites(ruleEntryMap, selected, diagnostics);
  addTestHosts(ruleEntryMap, expanded, diagnostics);
  addExtensions(ruleEntryMap, expanded, diagnostics);
  return uniqueByLabel(expanded);
}

// The first entry of a label wins; later configuration variants of it would collide on target name
function uniqueByLabel(entries: readonly RuleEntry[]): RuleEntry[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    if (seen.has(entry.label.value)) {
      return false;
    }
    seen.add(entry.label.value);
    return true;
  });
}

function expandTestSuites(ruleEntryMap: RuleEntryMap, entries: readonly RuleEntry[], diagnostics: Diagnostics): RuleEntry[] {
  const result: RuleEntry[] = [];
  const visited = new Set<RuleEntry>();

  const visit = (entry: RuleEntry) => {
    if (visited.has(entry)) {
      return;
    }
    visited.add(entry);
    if (entry.kind !== "test_suite") {
      result.push(entry);
      return;
    }
    for (const member of entry.weakDependencies) {
      const memberEntry = ruleEntryMap.entry(member, entry);
      if (!memberEntry) {
        diagnostics.warning("TestSuiteMemberResolutionFailed", member.value, entry.label.value);
        continue;
      }
      visit(memberEntry);
    }
  };

  for (const entry of entries) {
    visit(entry);
  }
  return result;
}

/**
 * A test can only be linked to a host that has a target. Hosts that exist but weren't selected
 * are added; hosts the extractor knows nothing about get a placeholder application.
 */
function addTestHosts(ruleEntryMap: RuleEntryMap, entries: RuleEntry[], diagnostics: Diagnostics): void {
  const selectedLabels = new Set(entries.map((entry) => entry.label.value));
  for (const entry of [...entries]) {
    const hostLabel = hostLabelForEntry(entry);
    if (!hostLabel || selectedLabels.has(hostLabel.value)) {
      continue;
    }

    let host = ruleEntryMap.entry(hostLabel, entry);
    if (host) {
      diagnostics.warning("MissingTestHost", entry.label.value, hostLabel.value);
    } else {
      diagnostics.warning("MissingTestHostPlaceholder", entry.label.value, hostLabel.value);
      const deploymentTarget = entry.deploymentTarget;
      host = parseRuleRecord({
        label: hostLabel.value,
        kind: "_test_host_",
        deployment_target: deploymentTarget
          ? { platform: deploymentTarget.platform, os_version: deploymentTarget.osVersion.toString() }
          : undefined,
      });
      ruleEntryMap.insert(host);
    }
    entries.push(host);
    selectedLabels.add(hostLabel.value);
  }
}

function addExtensions(ruleEntryMap: RuleEntryMap, entries: RuleEntry[], diagnostics: Diagnostics): void {
  for (const entry of [...entries]) {
    for (const extension of entry.extensions) {
      const extensionEntry = ruleEntryMap.entry(extension, entry);
      if (!extensionEntry) {
        diagnostics.warning("ExtensionResolutionFailed", extension.value, entry.label.value);
        continue;
      }
      entries.push(extensionEntry);
    }
  }
}

/**
 * Turns the extractor output for a workspace into an `.xcodeproj` bundle
 */
export class ProjectGenerator {
  private config: Config;
  private writer: ProjectWriter;
  private workspaceInfo: WorkspaceInfoSource | undefined;
  readonly diagnostics: Diagnostics;

  constructor(options: {
    config: Config;
    writer?: ProjectWriter;
    workspaceInfo?: WorkspaceInfoSource;
    diagnostics?: Diagnostics;
  }) {
    this.config = options.config;
    this.writer = options.writer ?? fileSystemWriter;
    this.workspaceInfo = options.workspaceInfo;
    this.diagnostics = options.diagnostics ?? new Diagnostics();
  }

  get projectName(): string {
    return requireConfig(this.config, "project.name");
  }

  get workspaceRoot(): string {
    return this.config["project.workspaceRoot"] ?? process.cwd();
  }

  get outputFolder(): string {
    return this.config["project.outputFolder"] ?? this.workspaceRoot;
  }

  get bundlePath(): string {
    return path.join(this.outputFolder, `${this.projectName}.xcodeproj`);
  }

  /**
   * Builds the project graph for the configured labels. No file system or process access.
   */
  buildProject(ruleEntryMap: RuleEntryMap): Project {
    const config = this.config;
    const selected = resolveSelectedEntries(ruleEntryMap, config["project.buildTargets"] ?? [], this.diagnostics);

    const project = new Project({
      name: this.projectName,
      mainGroup: mainGroupForOutputFolder(this.outputFolder, this.workspaceRoot),
    });
    if (config["generator.suppressSwiftUpdateCheck"]) {
      project.lastSwiftUpdateCheck = undefined;
    }

    const generator = new TargetGenerator({
      project,
      ruleEntryMap,
      diagnostics: this.diagnostics,
      options: {
        bazelPath: config["bazel.path"] ?? DEFAULT_BAZEL_PATH,
        pathFilter: createPathFilter(config["project.sourceFilters"]),
        suppressCompilerDefines: config["generator.suppressCompilerDefines"],
        improvedImportAutocompletion: config["generator.improvedImportAutocompletion"],
        buildOptions: config["bazel.buildOptions"],
        startupOptions: config["bazel.startupOptions"],
        targetOptions: config["build.targets"],
        preBuildScript: config["build.preBuildScript"],
        postBuildScript: config["build.postBuildScript"],
      },
    });

    generator.generateFileReferencesForFilePaths(config["project.additionalFilePaths"] ?? []);
    for (const entry of selected) {
      generator.registerRuleEntryForIndexer(entry);
    }
    const indexers = generator.generateIndexerTargets();
    commonLogger.debug("Generated indexer targets", { count: indexers.size });

    generator.generateBazelCleanTarget({
      startupOptions: splitShellWords(config["bazel.startupOptions"]?.Debug),
    });
    generator.generateTopLevelBuildConfigurations(config["build.settings"]);
    const targets = generator.generateBuildTargetsForRuleEntries(selected);
    commonLogger.debug("Generated build targets", { labels: [...targets.keys()] });

    return project;
  }

  private async loadRuleEntryMap(): Promise<RuleEntryMap> {
    const ruleEntriesPath = path.resolve(this.workspaceRoot, requireConfig(this.config, "bazel.ruleEntriesPath"));
    return await loadRuleEntries(ruleEntriesPath, { diagnostics: this.diagnostics });
  }

  /**
   * Loads rule entries, builds the project and writes the bundle with its symlinks
   */
  async generate(options?: { ruleEntryMap?: RuleEntryMap }): Promise<GenerationResult> {
    return await measureGeneration(async () => {
      const workspaceInfo =
        this.workspaceInfo ??
        new WorkspaceInfoFetcher({
          bazelPath: this.config["bazel.path"] ?? DEFAULT_BAZEL_PATH,
          workspaceRoot: this.workspaceRoot,
        });
      // Bazel answers while the extractor document is read
      const pendingInfo = workspaceInfo.fetch().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.diagnostics.warning("BazelWorkspaceInfoQueryFailed", message);
        throw error;
      });
      const [info, ruleEntryMap] = await Promise.all([
        pendingInfo,
        options?.ruleEntryMap ?? this.loadRuleEntryMap(),
      ]);

      const project = this.buildProject(ruleEntryMap);
      const contents = serializeProject(project);
      const bundlePath = this.bundlePath;
      const projectFilePath = path.join(bundlePath, PROJECT_FILE_NAME);

      try {
        await this.writer.createDirectory(bundlePath);
      } catch (error) {
        throw new DirectoryCreationError("Failed to create the project bundle", {
          path: bundlePath,
          errorMessage: error instanceof Error ? error.message : String(error),
        });
      }
      await this.writer.writeTextFile(projectFilePath, contents);
      await this.writer.replaceSymlink(info.executionRoot, path.join(bundlePath, EXECUTION_ROOT_SYMLINK_PATH));
      await this.writer.replaceSymlink(info.outputBase, path.join(bundlePath, OUTPUT_BASE_SYMLINK_PATH));

      commonLogger.log("Project generated", {
        path: projectFilePath,
        targets: project.allTargets.length,
        warnings: this.diagnostics.warnings.length,
      });
      return { project, bundlePath, projectFilePath, contents, diagnostics: this.diagnostics };
    });
  }
}
