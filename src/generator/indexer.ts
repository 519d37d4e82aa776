import { DEFAULT_DEPLOYMENT_TARGET, type DeploymentTarget, deploymentTargetSetting, deviceSDK } from "../bazel/deployment-target";
import type { BuildLabel } from "../bazel/label";
import { BazelFileInfo, type RuleEntry } from "../bazel/rule-entry";
import type { RuleEntryMap } from "../bazel/rule-entry-map";
import type { Diagnostics } from "../common/diagnostics";
import { arraysEqual, compareStrings, setsEqual, stableHash } from "../common/helpers";
import { commonLogger } from "../common/logger";
import { GENERATED_TARGETS, MERGED_INDEXERS } from "../common/metrics";
import { dirname, isCompilableUTI, lastPathComponent, utiForPath } from "../xcode/file-types";
import type { BuildSettings } from "../xcode/pbx/configuration";
import { SourcesBuildPhase } from "../xcode/pbx/phases";
import { ProductType } from "../xcode/pbx/product-type";
import type { Project } from "../xcode/pbx/project";
import { FileReference, type Reference, SourceTree, type VersionGroup } from "../xcode/pbx/references";
import { type NativeTarget, ProxyType } from "../xcode/pbx/targets";
import { createBuildConfigurations } from "./build-configurations";
import { defineFlags, resolveCompileSettings } from "./compile-settings";
import { EXECUTION_ROOT_VAR, WORKSPACE_ROOT_VAR } from "./constants";
import { indexerNameForTargetName } from "./naming";
import { type PathFilter, projectRefForFileInfo } from "./paths";

const DISABLE_ARC_SETTINGS = { COMPILER_FLAGS: "-fno-objc-arc" };

/**
 * Identity of one rule folded into an indexer
 */
export type NameInfoToken = {
  label: BuildLabel;
  targetName: string;
  hash: number;
};

export function nameInfoToken(entry: RuleEntry): NameInfoToken {
  return {
    label: entry.label,
    targetName: entry.label.targetName ?? entry.label.value,
    hash: stableHash(entry.label.value),
  };
}

/**
 * Name of the indexer that was registered for `entry` before any merging. Merged indexers keep
 * these names as aliases.
 */
export function indexerNameForEntry(entry: RuleEntry): string {
  const token = nameInfoToken(entry);
  return indexerNameForTargetName(token.targetName, token.hash, entry.deploymentTarget ?? DEFAULT_DEPLOYMENT_TARGET);
}

function sameFile(a: BazelFileInfo | undefined, b: BazelFileInfo | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.isSource === b.isSource && a.fullPath === b.fullPath && a.isDirectory === b.isDirectory;
}

export type IndexerDataFields = {
  nameInfo: readonly NameInfoToken[];
  dependencies: ReadonlySet<string>;
  resolvedDependencies: ReadonlySet<RuleEntry>;
  defines: ReadonlySet<string>;
  otherCFlags: readonly string[];
  otherSwiftFlags: readonly string[];
  includes: readonly string[];
  frameworkSearchPaths: readonly string[];
  swiftIncludePaths: readonly string[];
  deploymentTarget: DeploymentTarget;
  buildPhase: SourcesBuildPhase;
  pchFile?: BazelFileInfo;
  bridgingHeader?: BazelFileInfo;
  enableModules: boolean;
  swiftLanguageVersion?: string;
};

/**
 * Settings and sources of an indexer target before it is added to the project. Records with
 * identical settings are merged so the project gets one indexer per settings combination
 * instead of one per rule.
 */
export class IndexerData {
  readonly nameInfo: readonly NameInfoToken[];
  readonly dependencies: ReadonlySet<string>;
  readonly resolvedDependencies: ReadonlySet<RuleEntry>;
  readonly defines: ReadonlySet<string>;
  readonly otherCFlags: readonly string[];
  readonly otherSwiftFlags: readonly string[];
  readonly includes: readonly string[];
  readonly frameworkSearchPaths: readonly string[];
  readonly swiftIncludePaths: readonly string[];
  readonly deploymentTarget: DeploymentTarget;
  readonly buildPhase: SourcesBuildPhase;
  readonly pchFile: BazelFileInfo | undefined;
  readonly bridgingHeader: BazelFileInfo | undefined;
  readonly enableModules: boolean;
  readonly swiftLanguageVersion: string | undefined;

  constructor(fields: IndexerDataFields) {
    this.nameInfo = fields.nameInfo;
    this.dependencies = fields.dependencies;
    this.resolvedDependencies = fields.resolvedDependencies;
    this.defines = fields.defines;
    this.otherCFlags = fields.otherCFlags;
    this.otherSwiftFlags = fields.otherSwiftFlags;
    this.includes = fields.includes;
    this.frameworkSearchPaths = fields.frameworkSearchPaths;
    this.swiftIncludePaths = fields.swiftIncludePaths;
    this.deploymentTarget = fields.deploymentTarget;
    this.buildPhase = fields.buildPhase;
    this.pchFile = fields.pchFile;
    this.bridgingHeader = fields.bridgingHeader;
    this.enableModules = fields.enableModules;
    this.swiftLanguageVersion = fields.swiftLanguageVersion;
  }

  /**
   * Target name. Tokens are ordered by label so the name doesn't depend on merge order.
   */
  get indexerName(): string {
    const tokens = [...this.nameInfo].sort((a, b) => compareStrings(a.label.value, b.label.value));
    let hash = 0;
    for (const token of tokens) {
      hash = (hash + token.hash) >>> 0;
    }
    const fullName = tokens.map((token) => token.targetName).join("_");
    return indexerNameForTargetName(fullName, hash, this.deploymentTarget);
  }

  /**
   * Names of the unmerged indexers this record stands for
   */
  get supportedIndexingTargets(): string[] {
    return this.nameInfo.map((token) => indexerNameForTargetName(token.targetName, token.hash, this.deploymentTarget));
  }

  get indexerNamesForResolvedDependencies(): string[] {
    return [...this.resolvedDependencies].map((entry) => indexerNameForEntry(entry));
  }

  canMergeWith(other: IndexerData): boolean {
    if (!sameFile(this.pchFile, other.pchFile) || !sameFile(this.bridgingHeader, other.bridgingHeader)) {
      return false;
    }
    return (
      setsEqual(this.defines, other.defines) &&
      this.enableModules === other.enableModules &&
      arraysEqual(this.otherCFlags, other.otherCFlags) &&
      arraysEqual(this.otherSwiftFlags, other.otherSwiftFlags) &&
      arraysEqual(this.frameworkSearchPaths, other.frameworkSearchPaths) &&
      arraysEqual(this.includes, other.includes) &&
      arraysEqual(this.swiftIncludePaths, other.swiftIncludePaths) &&
      this.deploymentTarget.equals(other.deploymentTarget) &&
      this.swiftLanguageVersion === other.swiftLanguageVersion
    );
  }

  merging(other: IndexerData): IndexerData {
    const buildPhase = new SourcesBuildPhase();
    buildPhase.files.push(...this.buildPhase.files, ...other.buildPhase.files);
    return new IndexerData({
      nameInfo: [...this.nameInfo, ...other.nameInfo],
      dependencies: new Set([...this.dependencies, ...other.dependencies]),
      resolvedDependencies: new Set([...this.resolvedDependencies, ...other.resolvedDependencies]),
      defines: this.defines,
      otherCFlags: this.otherCFlags,
      otherSwiftFlags: this.otherSwiftFlags,
      includes: this.includes,
      frameworkSearchPaths: this.frameworkSearchPaths,
      swiftIncludePaths: this.swiftIncludePaths,
      deploymentTarget: this.deploymentTarget,
      buildPhase,
      pchFile: this.pchFile,
      bridgingHeader: this.bridgingHeader,
      enableModules: this.enableModules,
      swiftLanguageVersion: this.swiftLanguageVersion,
    });
  }
}

/**
 * Greedy reduction: take the record with the greatest name, fold every compatible record into
 * it, and repeat with what is left.
 */
export function mergeIndexers(indexers: Iterable<IndexerData>): Map<string, IndexerData> {
  const merged = new Map<string, IndexerData>();
  let remaining = [...indexers].sort((a, b) => compareStrings(a.indexerName, b.indexerName));

  let current = remaining.pop();
  while (current) {
    const rest: IndexerData[] = [];
    for (const candidate of remaining) {
      if (current.canMergeWith(candidate)) {
        current = current.merging(candidate);
        MERGED_INDEXERS.inc();
      } else {
        rest.push(candidate);
      }
    }
    merged.set(current.indexerName, current);
    remaining = rest;
    current = remaining.pop();
  }
  return merged;
}

export type IndexerSynthesizerOptions = {
  pathFilter: PathFilter;
  suppressCompilerDefines?: boolean;
  improvedImportAutocompletion?: boolean;
};

/**
 * Creates the `_idx_` targets that let Xcode index sources Bazel compiles
 */
export class IndexerSynthesizer {
  private project: Project;
  private ruleEntryMap: RuleEntryMap;
  private diagnostics: Diagnostics | undefined;
  private options: IndexerSynthesizerOptions;

  // Framework search paths accumulated per processed entry
  private processedEntries = new Map<RuleEntry, ReadonlySet<string>>();
  private staticIndexers = new Map<string, IndexerData>();
  private frameworkIndexers = new Map<string, IndexerData>();
  private indexerTargetByName = new Map<string, NativeTarget>();

  constructor(options: IndexerSynthesizerOptions & {
    project: Project;
    ruleEntryMap: RuleEntryMap;
    diagnostics?: Diagnostics;
  }) {
    this.project = options.project;
    this.ruleEntryMap = options.ruleEntryMap;
    this.diagnostics = options.diagnostics;
    this.options = options;
  }

  /**
   * Registered records, before merging when called before `generateIndexerTargets`
   */
  get registeredIndexers(): IndexerData[] {
    return [...this.staticIndexers.values(), ...this.frameworkIndexers.values()];
  }

  /**
   * Registers `entry` and its dependency closure. Entries already seen are skipped.
   */
  registerRuleEntry(entry: RuleEntry): void {
    // Direct dependencies of tests get their sources added to the test target instead
    const skipped = new Set<string>();
    const addTestDepsToSkipList = (current: RuleEntry, visited: Set<RuleEntry>) => {
      if (!current.isTest || visited.has(current)) {
        return;
      }
      visited.add(current);
      for (const dep of current.dependencies) {
        skipped.add(dep.value);
        const depEntry = this.ruleEntryMap.entry(dep, current);
        if (!depEntry) {
          this.diagnostics?.warning("UnknownTargetRule", dep.value);
          continue;
        }
        addTestDepsToSkipList(depEntry, visited);
      }
    };
    addTestDepsToSkipList(entry, new Set());

    this.registerGraph(entry, skipped);
  }

  /**
   * Merges the registered records and adds one target per survivor, then links the targets
   * along the rule dependencies. Returns every indexer name, merged or not, with its target.
   */
  generateIndexerTargets(): Map<string, NativeTarget> {
    this.staticIndexers = mergeIndexers(this.staticIndexers.values());
    this.frameworkIndexers = mergeIndexers(this.frameworkIndexers.values());

    for (const [name, data] of this.staticIndexers) {
      this.generateIndexer(name, ProductType.StaticLibrary, data);
    }
    for (const [name, data] of this.frameworkIndexers) {
      this.generateIndexer(name, ProductType.Framework, data);
    }

    this.linkDependencies(this.staticIndexers);
    this.linkDependencies(this.frameworkIndexers);
    return this.indexerTargetByName;
  }

  /**
   * Indexer target that covers the sources of `entry`, if one was generated
   */
  indexerTargetForEntry(entry: RuleEntry): NativeTarget | undefined {
    return this.indexerTargetByName.get(indexerNameForEntry(entry));
  }

  private registerGraph(entry: RuleEntry, skipped: ReadonlySet<string>): ReadonlySet<string> {
    const processed = this.processedEntries.get(entry);
    if (processed) {
      return processed;
    }
    const frameworkSearchPaths = new Set<string>();
    // Marked before recursing so dependency cycles terminate
    this.processedEntries.set(entry, frameworkSearchPaths);

    const resolvedDependencies = new Set<RuleEntry>();
    for (const dep of entry.dependencies) {
      const depEntry = this.ruleEntryMap.entry(dep, entry);
      if (!depEntry) {
        this.diagnostics?.warning("UnknownTargetRule", dep.value);
        continue;
      }
      resolvedDependencies.add(depEntry);
      for (const path of this.registerGraph(depEntry, skipped)) {
        frameworkSearchPaths.add(path);
      }
    }

    // Search paths are added for every framework, even ones outside the path filters
    for (const framework of entry.frameworkImports) {
      frameworkSearchPaths.add(`$(${EXECUTION_ROOT_VAR})/${dirname(framework.fullPath)}`);
    }

    const include = (info: BazelFileInfo) => this.options.pathFilter(info.fullPath);
    const sourceFiles = entry.sourceFiles.filter(include);
    const nonARCSourceFiles = entry.nonARCSourceFiles.filter(include);
    const frameworkFiles = entry.frameworkImports.filter(include);
    const versionedFiles = entry.versionedNonSourceArtifacts.filter(include);

    for (const artifact of entry.normalNonSourceArtifacts.filter(include)) {
      this.addFileReference(artifact);
    }

    const nothingToIndex =
      sourceFiles.length === 0 && nonARCSourceFiles.length === 0 && frameworkFiles.length === 0 && versionedFiles.length === 0;
    if (nothingToIndex || entry.isTest || entry.kind === "filegroup" || skipped.has(entry.label.value)) {
      this.addBuildFileForRule(entry);
      return frameworkSearchPaths;
    }

    const settings = resolveCompileSettings(entry, { suppressCompilerDefines: this.options.suppressCompilerDefines });

    const pchFile = entry.attributes.pch ? new BazelFileInfo(entry.attributes.pch) : undefined;
    if (pchFile && include(pchFile)) {
      this.addFileReference(pchFile);
    }
    const bridgingHeader = entry.attributes.bridging_header ? new BazelFileInfo(entry.attributes.bridging_header) : undefined;
    if (bridgingHeader && include(bridgingHeader)) {
      this.addFileReference(bridgingHeader);
    }

    this.addBuildFileForRule(entry);

    const nonARCReferences = this.fileReferencesForFileInfos(nonARCSourceFiles);
    const references: Reference[] = [
      ...this.createVersionGroups(versionedFiles),
      ...this.fileReferencesForFileInfos(sourceFiles),
      ...this.fileReferencesForFileInfos(frameworkFiles),
      ...nonARCReferences,
    ];
    const buildPhase = createSourcesBuildPhase(references, new Set(nonARCReferences));
    if (buildPhase.files.length === 0) {
      return frameworkSearchPaths;
    }

    let deploymentTarget = entry.deploymentTarget;
    if (!deploymentTarget) {
      deploymentTarget = DEFAULT_DEPLOYMENT_TARGET;
      this.diagnostics?.warning("NoDeploymentTarget", entry.label.value);
    }

    const data = new IndexerData({
      nameInfo: [nameInfoToken(entry)],
      dependencies: new Set(entry.dependencies.map((dep) => dep.value)),
      resolvedDependencies,
      defines: settings.defines,
      otherCFlags: settings.otherCFlags,
      otherSwiftFlags: settings.otherSwiftFlags,
      includes: [...settings.includes],
      frameworkSearchPaths: [...frameworkSearchPaths],
      swiftIncludePaths: [...settings.swiftIncludePaths],
      deploymentTarget,
      buildPhase,
      pchFile,
      bridgingHeader,
      enableModules: entry.attributes.enable_modules === true,
      swiftLanguageVersion: entry.attributes.swift_language_version,
    });

    if (entry.isSwift) {
      this.frameworkIndexers.set(data.indexerName, data);
    } else {
      this.staticIndexers.set(data.indexerName, data);
    }
    return frameworkSearchPaths;
  }

  private addFileReference(info: BazelFileInfo): FileReference {
    const reference = this.project.mainGroup.getOrCreateFileReferenceForPath(info.fullPath);
    reference.isInputFile = info.isSource;
    return reference;
  }

  private addBuildFileForRule(entry: RuleEntry): void {
    const buildFile = entry.buildFilePath;
    if (buildFile === undefined || !this.options.pathFilter(buildFile)) {
      return;
    }
    this.project.mainGroup.getOrCreateFileReferenceForPath(buildFile);
  }

  private fileReferencesForFileInfos(infos: readonly BazelFileInfo[]): FileReference[] {
    return infos.map((info) => this.addFileReference(info));
  }

  /**
   * Core Data style models: each `.xcdatamodeld` becomes a version group holding its versions
   */
  private createVersionGroups(infos: readonly BazelFileInfo[]): VersionGroup[] {
    const groups = new Map<string, VersionGroup>();
    for (const info of infos) {
      const groupPath = dirname(info.fullPath);
      const versionGroup = this.project.getOrCreateVersionGroupForPath(groupPath, utiForPath(info.path) ?? "");
      groups.set(groupPath, versionGroup);
      const reference = versionGroup.getOrCreateFileReference(SourceTree.Group, lastPathComponent(info.fullPath));
      reference.isInputFile = info.isSource;
    }

    for (const group of groups.values()) {
      // Without a readable current version marker, a single version is the current one
      const versions = group.children.filter((child) => child instanceof FileReference);
      if (group.currentVersion === undefined && versions.length === 1 && versions[0].path !== undefined) {
        group.setCurrentVersionByName(versions[0].path);
      }
    }
    return [...groups.values()];
  }

  private generateIndexer(name: string, productType: ProductType, data: IndexerData): void {
    const target = this.project.createNativeTarget(name, productType);
    target.buildPhases.push(data.buildPhase);
    this.addConfigsForIndexingTarget(target, data);
    GENERATED_TARGETS.labels("indexer").inc();

    for (const alias of data.supportedIndexingTargets) {
      this.indexerTargetByName.set(alias, target);
    }
  }

  private linkDependencies(indexers: ReadonlyMap<string, IndexerData>): void {
    for (const [name, data] of indexers) {
      const target = this.project.targetByName(name);
      if (!target) {
        commonLogger.log("Failed to resolve indexer", { name });
        continue;
      }

      for (const dependencyName of data.indexerNamesForResolvedDependencies) {
        const dependency = this.indexerTargetByName.get(dependencyName);
        if (!dependency) {
          this.diagnostics?.info("UnresolvedIndexerDependency", name, dependencyName);
          continue;
        }
        if (dependency === target) {
          continue;
        }
        target.createDependencyOn(dependency, ProxyType.TargetReference, this.project);
      }
    }
  }

  private addConfigsForIndexingTarget(target: NativeTarget, data: IndexerData): void {
    const settings: BuildSettings = { PRODUCT_NAME: target.productName ?? target.name };

    if (data.pchFile) {
      settings.GCC_PREFIX_HEADER = projectRefForFileInfo(data.pchFile);
    }

    const otherCFlags = [...data.otherCFlags.filter((flag) => !flag.startsWith("-W")), ...defineFlags(data.defines)];
    if (otherCFlags.length > 0) {
      settings.OTHER_CFLAGS = otherCFlags.join(" ");
    }

    if (data.bridgingHeader) {
      settings.SWIFT_OBJC_BRIDGING_HEADER = projectRefForFileInfo(data.bridgingHeader);
    }
    if (data.enableModules) {
      settings.CLANG_ENABLE_MODULES = "YES";
    }
    if (data.swiftLanguageVersion) {
      settings.SWIFT_VERSION = data.swiftLanguageVersion;
    }
    if (data.includes.length > 0) {
      settings.HEADER_SEARCH_PATHS = `$(inherited) ${data.includes.join(" ")} `;
    }
    if (data.frameworkSearchPaths.length > 0) {
      settings.FRAMEWORK_SEARCH_PATHS = `$(inherited) ${data.frameworkSearchPaths.join(" ")}`;
    }
    if (data.swiftIncludePaths.length > 0) {
      settings.SWIFT_INCLUDE_PATHS = `$(inherited) ${data.swiftIncludePaths.join(" ")}`;
    }
    if (data.otherSwiftFlags.length > 0) {
      settings.OTHER_SWIFT_FLAGS = `$(inherited) ${data.otherSwiftFlags.join(" ")}`;
    }
    if (this.options.improvedImportAutocompletion && target.productType === ProductType.StaticLibrary) {
      settings.USER_HEADER_SEARCH_PATHS = `$(${WORKSPACE_ROOT_VAR})`;
    }

    // Index for the device SDK so Swift modules built for device are found
    const platform = data.deploymentTarget.platform;
    settings.SDKROOT = deviceSDK(platform);
    settings[deploymentTargetSetting(platform)] = data.deploymentTarget.osVersion.toString();

    createBuildConfigurations(target.buildConfigurationList, settings);
  }
}

/**
 * Sources phase for the given references. Headers and other non-compilable files are skipped;
 * version groups are always added.
 */
export function createSourcesBuildPhase(references: readonly Reference[], nonARC: ReadonlySet<Reference>): SourcesBuildPhase {
  const phase = new SourcesBuildPhase();
  for (const reference of references) {
    if (reference instanceof FileReference) {
      if (!isCompilableUTI(reference.fileType)) {
        continue;
      }
      phase.addFile(reference, nonARC.has(reference) ? { ...DISABLE_ARC_SETTINGS } : undefined);
    } else {
      phase.addFile(reference);
    }
  }
  return phase;
}
