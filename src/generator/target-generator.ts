import { DEFAULT_DEPLOYMENT_TARGET, deploymentTargetSetting, testHostPath } from "../bazel/deployment-target";
import { BuildLabel } from "../bazel/label";
import type { BazelFileInfo, RuleEntry } from "../bazel/rule-entry";
import type { RuleEntryMap } from "../bazel/rule-entry-map";
import type { PerConfigOptions, TargetOptions } from "../common/config";
import type { Diagnostics } from "../common/diagnostics";
import { UnsupportedRuleKindError } from "../common/errors";
import { commonLogger } from "../common/logger";
import { GENERATED_TARGETS } from "../common/metrics";
import type { BuildSettings } from "../xcode/pbx/configuration";
import { ShellScriptBuildPhase } from "../xcode/pbx/phases";
import { ProductType, isWatchApp, productName, watchAppExtensionType } from "../xcode/pbx/product-type";
import type { Project } from "../xcode/pbx/project";
import { type FileReference, SourceTree } from "../xcode/pbx/references";
import { type LegacyTarget, type NativeTarget, ProxyType, type Target } from "../xcode/pbx/targets";
import {
  addTestRunnerBuildConfigurations,
  createBuildConfigurations,
  updateMissingBuildConfigurations,
} from "./build-configurations";
import { buildScriptCommandline, quoteShellWords } from "./commandline";
import { otherSwiftFlagsForEntry, resolveCompileSettings } from "./compile-settings";
import {
  BAZEL_BIN_PATH,
  BAZEL_CLEAN_TARGET_NAME,
  BAZEL_GENFILES_PATH,
  BUILD_PATH_VAR,
  BUILD_SCRIPT_PATH,
  CLEAN_SCRIPT_PATH,
  EXECUTION_ROOT_SYMLINK_PATH,
  EXECUTION_ROOT_VAR,
  GENERATOR_VERSION,
  INCLUDES_PATH,
  OUTPUT_BASE_SYMLINK_PATH,
  OUTPUT_BASE_VAR,
  STUB_PLIST_DIRECTORY,
  TEST_RUNNER_ONLY_VAR,
  VERSION_VAR,
  WATCH_APP_EXTENSION_PREFIX,
  WORKSPACE_ROOT_VAR,
  XCODE_VERSION_VAR,
} from "./constants";
import { IndexerSynthesizer, createSourcesBuildPhase } from "./indexer";
import { generateUniqueNames } from "./naming";
import { type PathFilter, workingDirectoryForGroup } from "./paths";

/**
 * Progress of a label through generation. A label only ever moves forward; dependency-only
 * rules stay registered for indexing and never get a product target.
 */
export enum LabelState {
  Unregistered = 0,
  RegisteredForIndexing = 1,
  Materialized = 2,
  Linked = 3,
}

export type TargetGeneratorOptions = {
  bazelPath: string;
  bazelBinPath?: string;
  buildScriptPath?: string;
  cleanScriptPath?: string;
  pathFilter: PathFilter;
  suppressCompilerDefines?: boolean;
  improvedImportAutocompletion?: boolean;
  buildOptions?: PerConfigOptions;
  startupOptions?: PerConfigOptions;

  // Keyed by label or by target name
  targetOptions?: Record<string, TargetOptions>;

  preBuildScript?: string;
  postBuildScript?: string;
  version?: string;
};

type TestLinkage = { target: NativeTarget; hostLabel: BuildLabel | undefined; entry: RuleEntry };

function stubPlistPath(entry: RuleEntry, productType: ProductType): string {
  switch (productType) {
    case ProductType.Watch1App:
    case ProductType.Watch2App:
      return `${STUB_PLIST_DIRECTORY}/StubWatchOS2InfoPlist.plist`;
    case ProductType.Watch1Extension:
    case ProductType.Watch2Extension:
      return `${STUB_PLIST_DIRECTORY}/StubWatchOS2AppExInfoPlist.plist`;
    case ProductType.AppExtension:
    case ProductType.TVAppExtension:
      return `${STUB_PLIST_DIRECTORY}/Stub_${entry.label.asFullTargetName ?? entry.label.value}.plist`;
    default:
      return `${STUB_PLIST_DIRECTORY}/StubInfoPlist.plist`;
  }
}

/**
 * Fills a project with the targets for a set of rule entries: indexers for code intelligence,
 * one script target per selected rule that asks Bazel to build it, and the shared clean target.
 */
export class TargetGenerator {
  readonly project: Project;
  private ruleEntryMap: RuleEntryMap;
  private diagnostics: Diagnostics | undefined;
  private options: TargetGeneratorOptions;
  private indexer: IndexerSynthesizer;
  private cleanTarget: LegacyTarget | undefined;
  private states = new Map<string, LabelState>();
  private swiftDependencyCache = new Map<RuleEntry, boolean>();

  constructor(options: {
    project: Project;
    ruleEntryMap: RuleEntryMap;
    diagnostics?: Diagnostics;
    options: TargetGeneratorOptions;
  }) {
    this.project = options.project;
    this.ruleEntryMap = options.ruleEntryMap;
    this.diagnostics = options.diagnostics;
    this.options = options.options;
    this.indexer = new IndexerSynthesizer({
      project: this.project,
      ruleEntryMap: this.ruleEntryMap,
      diagnostics: this.diagnostics,
      pathFilter: this.options.pathFilter,
      suppressCompilerDefines: this.options.suppressCompilerDefines,
      improvedImportAutocompletion: this.options.improvedImportAutocompletion,
    });
  }

  get bazelBinPath(): string {
    return this.options.bazelBinPath ?? BAZEL_BIN_PATH;
  }

  get indexerSynthesizer(): IndexerSynthesizer {
    return this.indexer;
  }

  labelState(label: BuildLabel): LabelState {
    return this.states.get(label.value) ?? LabelState.Unregistered;
  }

  /**
   * References files that belong to no rule, such as top-level BUILD or config files
   */
  generateFileReferencesForFilePaths(paths: readonly string[]): FileReference[] {
    return this.project.getOrCreateFileReferencesForPaths(paths);
  }

  registerRuleEntryForIndexer(entry: RuleEntry): void {
    this.indexer.registerRuleEntry(entry);
    this.advance(entry.label, LabelState.RegisteredForIndexing);
  }

  generateIndexerTargets(): Map<string, NativeTarget> {
    return this.indexer.generateIndexerTargets();
  }

  /**
   * Adds the target Xcode runs on clean. Every existing target, and every product target created
   * afterwards, depends on it first.
   */
  generateBazelCleanTarget(options?: { workingDirectory?: string; startupOptions?: readonly string[] }): LegacyTarget {
    if (this.cleanTarget) {
      commonLogger.warn("Clean target was already generated");
      return this.cleanTarget;
    }

    const args = [this.options.bazelPath, this.bazelBinPath, ...(options?.startupOptions ?? [])];
    const cleanTarget = this.project.createLegacyTarget({
      name: BAZEL_CLEAN_TARGET_NAME,
      buildToolPath: this.options.cleanScriptPath ?? CLEAN_SCRIPT_PATH,
      buildArguments: args.map((arg) => `"${arg}"`).join(" "),
      buildWorkingDirectory: options?.workingDirectory ?? workingDirectoryForGroup(this.project.mainGroup),
    });
    this.cleanTarget = cleanTarget;
    GENERATED_TARGETS.labels("clean").inc();

    for (const target of this.project.allTargets) {
      if (target !== cleanTarget) {
        target.createDependencyOn(cleanTarget, ProxyType.TargetReference, this.project, { first: true });
      }
    }
    return cleanTarget;
  }

  generateTopLevelBuildConfigurations(overrides: BuildSettings = {}): void {
    const sourceDirectory = workingDirectoryForGroup(this.project.mainGroup) || "$(SRCROOT)";
    const searchPaths = [
      `$(${EXECUTION_ROOT_VAR})`,
      `$(${WORKSPACE_ROOT_VAR})/${this.bazelBinPath}`,
      `$(${WORKSPACE_ROOT_VAR})/${BAZEL_GENFILES_PATH}`,
      `$(${EXECUTION_ROOT_VAR})/${INCLUDES_PATH}`,
    ];

    const settings: BuildSettings = {
      ...overrides,
      ONLY_ACTIVE_ARCH: "YES",
      ENABLE_TESTABILITY: "YES",
      // Bazel sources are ARC unless listed in non_arc_srcs
      CLANG_ENABLE_OBJC_ARC: "YES",
      // Bazel signs what it builds
      CODE_SIGNING_REQUIRED: "NO",
      CODE_SIGN_IDENTITY: "",
      CODE_SIGNING_ALLOWED: "NO",
      FRAMEWORK_SEARCH_PATHS: "$(PLATFORM_DIR)/Developer/Library/Frameworks",
      DONT_RUN_SWIFT_STDLIB_TOOL: "YES",
      [WORKSPACE_ROOT_VAR]: sourceDirectory,
      [EXECUTION_ROOT_VAR]: `$(PROJECT_FILE_PATH)/${EXECUTION_ROOT_SYMLINK_PATH}`,
      [OUTPUT_BASE_VAR]: `$(PROJECT_FILE_PATH)/${OUTPUT_BASE_SYMLINK_PATH}`,
      [VERSION_VAR]: this.options.version ?? GENERATOR_VERSION,
      PYTHONIOENCODING: "utf8",
      HEADER_SEARCH_PATHS: searchPaths.join(" "),
    };

    createBuildConfigurations(this.project.buildConfigurationList, settings);
    addTestRunnerBuildConfigurations(this.project.buildConfigurationList);
  }

  /**
   * Creates one target per entry, then links tests to their hosts and watch apps to their
   * extensions. Returns the targets by label.
   */
  generateBuildTargetsForRuleEntries(entries: readonly RuleEntry[]): Map<string, NativeTarget> {
    const namedEntries = generateUniqueNames(entries);
    const targetsByLabel = new Map<string, NativeTarget>();
    const testLinkages: TestLinkage[] = [];
    const watchApps: Array<{ target: NativeTarget; entry: RuleEntry }> = [];

    for (const [name, entry] of namedEntries) {
      const target = this.createBuildTargetForRuleEntry(entry, name);
      targetsByLabel.set(entry.label.value, target);
      this.advance(entry.label, LabelState.Materialized);

      const targetOptions = this.targetOptionsFor(entry, name);
      const preBuildScript = targetOptions?.preBuildScript ?? this.options.preBuildScript;
      if (preBuildScript) {
        target.buildPhases.unshift(this.runScriptPhase(preBuildScript, "Pre-build Run Script"));
      }
      const postBuildScript = targetOptions?.postBuildScript ?? this.options.postBuildScript;
      if (postBuildScript) {
        target.buildPhases.push(this.runScriptPhase(postBuildScript, "Post-build Run Script"));
      }

      const hostLabel = entry.attributes.test_host ?? entry.attributes.xctest_app;
      if (hostLabel) {
        testLinkages.push({ target, hostLabel: new BuildLabel(hostLabel), entry });
      } else if (target.productType === ProductType.UnitTest) {
        // Library based test without a host
        testLinkages.push({ target, hostLabel: undefined, entry });
      }

      if (isWatchApp(target.productType)) {
        watchApps.push({ target, entry });
      }
    }

    for (const { target, entry } of watchApps) {
      this.linkWatchApp(target, entry, targetsByLabel);
    }

    for (const { target, hostLabel, entry } of testLinkages) {
      let hostTarget: NativeTarget | undefined;
      if (hostLabel) {
        hostTarget = targetsByLabel.get(hostLabel.value);
        if (!hostTarget) {
          this.diagnostics?.warning("MissingTestHost", entry.label.value, hostLabel.value);
          continue;
        }
      }
      this.updateTestTarget(target, hostTarget, entry);
    }

    for (const entry of namedEntries.values()) {
      this.advance(entry.label, LabelState.Linked);
    }
    return targetsByLabel;
  }

  private advance(label: BuildLabel, state: LabelState): void {
    if (state > this.labelState(label)) {
      this.states.set(label.value, state);
    }
  }

  private targetOptionsFor(entry: RuleEntry, name: string): TargetOptions | undefined {
    return this.options.targetOptions?.[entry.label.value] ?? this.options.targetOptions?.[name];
  }

  private createBuildTargetForRuleEntry(entry: RuleEntry, name: string): NativeTarget {
    const productType = entry.productType;
    if (productType === undefined) {
      throw new UnsupportedRuleKindError("Rule kind cannot be built as an Xcode target", {
        label: entry.label.value,
        kind: entry.kind,
      });
    }

    const target = this.project.createNativeTarget(name, productType);
    for (const artifact of entry.secondaryArtifacts) {
      const reference = this.project.productsGroup.getOrCreateFileReference(SourceTree.BuiltProductsDir, artifact.fullPath);
      reference.isInputFile = false;
    }

    const settings: BuildSettings = { ...this.targetOptionsFor(entry, name)?.settings };
    settings[BUILD_PATH_VAR] = entry.label.packageName;
    settings.PRODUCT_NAME = name;
    if (entry.bundleID) {
      settings.PRODUCT_BUNDLE_IDENTIFIER = entry.bundleID;
    }
    const sdkRoot = entry.sdkRoot;
    if (sdkRoot) {
      settings.SDKROOT = sdkRoot;
    }

    // Suppresses Xcode's warning about missing launch images
    settings.ASSETCATALOG_COMPILER_LAUNCHIMAGE_NAME = "Stub Launch Image";
    settings.INFOPLIST_FILE = stubPlistPath(entry, productType);

    if (entry.deploymentTarget) {
      settings[deploymentTargetSetting(entry.deploymentTarget.platform)] = entry.deploymentTarget.osVersion.toString();
    }

    // watchOS 1 apps are a specialization of an iOS target
    if (productType === ProductType.Watch1App) {
      settings.TARGETED_DEVICE_FAMILY = "4";
      settings["TARGETED_DEVICE_FAMILY[sdk=iphonesimulator*]"] = "1,4";
    }

    if (entry.xcodeVersion) {
      settings[XCODE_VERSION_VAR] = entry.xcodeVersion;
    }

    settings.DEBUG_INFORMATION_FORMAT = this.hasSwiftLibraryDependency(entry) ? "dwarf-with-dsym" : "dwarf";

    // Passed through the environment to the build script
    settings.BAZEL_TARGET = entry.label.value;
    const binary = entry.attributes.binary;
    if (binary) {
      settings.BAZEL_BINARY_TARGET = binary;
      const binaryLabel = new BuildLabel(binary);
      const binaryBundle = productName(productType, binaryLabel.targetName ?? name);
      settings.BAZEL_BINARY_DSYM = `${binaryLabel.packageName}/${binaryBundle}.dSYM`;
    }

    createBuildConfigurations(target.buildConfigurationList, settings);
    addTestRunnerBuildConfigurations(target.buildConfigurationList);

    target.buildPhases.push(this.createBuildPhaseForRuleEntry(entry, name));

    if (this.cleanTarget) {
      target.createDependencyOn(this.cleanTarget, ProxyType.TargetReference, this.project, { first: true });
    }

    GENERATED_TARGETS.labels(entry.kind).inc();
    return target;
  }

  private createBuildPhaseForRuleEntry(entry: RuleEntry, name: string): ShellScriptBuildPhase {
    const targetOptions = this.targetOptionsFor(entry, name);
    const commandLine = buildScriptCommandline({
      scriptPath: this.options.buildScriptPath ?? BUILD_SCRIPT_PATH,
      label: entry.label.value,
      bazelPath: this.options.bazelPath,
      bazelBinPath: this.bazelBinPath,
      buildOptions: { ...this.options.buildOptions, ...targetOptions?.buildOptions },
      startupOptions: { ...this.options.startupOptions, ...targetOptions?.startupOptions },
    });

    const workingDirectory = workingDirectoryForGroup(this.project.mainGroup);
    const changeDirectory = workingDirectory ? `cd "${workingDirectory}"` : "";
    const phase = new ShellScriptBuildPhase({
      shellScript: `set -e\n${changeDirectory}\nexec ${commandLine}`,
      shellPath: "/bin/bash",
      name: `build ${entry.label.value}`,
    });
    // Runs after Xcode processes the Info.plist so the script can replace it
    phase.inputPaths = ["$(TARGET_BUILD_DIR)/$(INFOPLIST_PATH)"];
    phase.showEnvVarsInLog = true;
    phase.mnemonic = "BazelBuild";
    return phase;
  }

  private runScriptPhase(script: string, name: string): ShellScriptBuildPhase {
    const phase = new ShellScriptBuildPhase({ shellScript: script, shellPath: "/bin/bash", name });
    phase.showEnvVarsInLog = true;
    phase.mnemonic = name;
    return phase;
  }

  /**
   * Whether any rule in the dependency closure of `entry` is a swift_library
   */
  private hasSwiftLibraryDependency(entry: RuleEntry, visiting = new Set<RuleEntry>()): boolean {
    const cached = this.swiftDependencyCache.get(entry);
    if (cached !== undefined) {
      return cached;
    }
    visiting.add(entry);

    let result = false;
    for (const dep of entry.dependencies) {
      const depEntry = this.ruleEntryMap.entry(dep, entry);
      if (!depEntry || visiting.has(depEntry)) {
        continue;
      }
      if (depEntry.kind === "swift_library" || this.hasSwiftLibraryDependency(depEntry, visiting)) {
        result = true;
        break;
      }
    }
    this.swiftDependencyCache.set(entry, result);
    return result;
  }

  private linkWatchApp(target: NativeTarget, entry: RuleEntry, targetsByLabel: ReadonlyMap<string, NativeTarget>): void {
    const extensionType = watchAppExtensionType(target.productType);
    if (extensionType !== undefined) {
      // Xcode only debugs watch apps that ship an extension target
      const name = `${WATCH_APP_EXTENSION_PREFIX}${target.name}`;
      const stub = this.project.createNativeTarget(name, extensionType);
      const platform = entry.deploymentTarget?.platform ?? DEFAULT_DEPLOYMENT_TARGET.platform;
      const settings: BuildSettings = {
        PRODUCT_NAME: name,
        SDKROOT: entry.sdkRoot ?? "iphoneos",
        INFOPLIST_FILE: stubPlistPath(entry, extensionType),
      };
      if (entry.deploymentTarget) {
        settings[deploymentTargetSetting(platform)] = entry.deploymentTarget.osVersion.toString();
      }
      createBuildConfigurations(stub.buildConfigurationList, settings);
      target.createBuildActionDependencyOn(stub);
      GENERATED_TARGETS.labels("watch_extension_stub").inc();
    }

    for (const extension of entry.extensions) {
      // Unresolved extensions were reported when the selection was expanded
      const extensionEntry = this.ruleEntryMap.entry(extension, entry);
      const extensionTarget = extensionEntry ? targetsByLabel.get(extensionEntry.label.value) : undefined;
      if (!extensionTarget) {
        this.diagnostics?.warning("FindingWatchExtensionFailed", extension.value);
        continue;
      }
      target.createDependencyOn(extensionTarget, ProxyType.TargetReference, this.project);
    }
  }

  private updateTestTarget(target: NativeTarget, hostTarget: NativeTarget | undefined, entry: RuleEntry): void {
    if (hostTarget) {
      this.project.linkTestTarget(target, hostTarget);
    }

    // Missing keys come from the test's own indexer, if it has one
    const indexerTarget: Target | undefined = this.indexer.indexerTargetForEntry(entry);
    updateMissingBuildConfigurations(target.buildConfigurationList, this.testSettings(target, hostTarget, entry), {
      base: indexerTarget?.buildConfigurationList,
      suppressed: new Set(["ARCHS", "VALID_ARCHS"]),
    });

    this.updateTestTargetBuildPhases(target, entry);
  }

  private testSettings(target: NativeTarget, hostTarget: NativeTarget | undefined, entry: RuleEntry): BuildSettings {
    const settings: BuildSettings = { [TEST_RUNNER_ONLY_VAR]: "YES" };

    const hostPath = hostTarget?.productReference?.path;
    const hostProductName = hostTarget?.productName;
    if (hostPath !== undefined && hostProductName !== undefined && entry.deploymentTarget) {
      if (target.productType === ProductType.UIUnitTest) {
        settings.TEST_TARGET_NAME = hostProductName;
      } else {
        const testHost = testHostPath(entry.deploymentTarget.platform, hostPath, hostProductName);
        if (testHost !== undefined) {
          settings.BUNDLE_LOADER = "$(TEST_HOST)";
          settings.TEST_HOST = testHost;
        }
      }
    }

    // Defines are not used since a test target mixes files from several rules
    const compileSettings = resolveCompileSettings(entry);
    if (compileSettings.includes.size > 0) {
      settings.HEADER_SEARCH_PATHS = `$(inherited) ${[...compileSettings.includes].join(" ")}`;
    }
    if (compileSettings.swiftIncludePaths.size > 0) {
      settings.SWIFT_INCLUDE_PATHS = `$(inherited) ${[...compileSettings.swiftIncludePaths].join(" ")}`;
    }
    const otherSwiftFlags = otherSwiftFlagsForEntry(entry);
    if (otherSwiftFlags.length > 0) {
      settings.OTHER_SWIFT_FLAGS = `$(inherited) ${otherSwiftFlags.join(" ")}`;
    }
    if (entry.moduleName) {
      settings.PRODUCT_MODULE_NAME = entry.moduleName;
    }
    return settings;
  }

  private updateTestTargetBuildPhases(target: NativeTarget, entry: RuleEntry): void {
    const include = (info: BazelFileInfo) => this.options.pathFilter(info.fullPath);
    const sourceFiles = entry.sourceFiles.filter(include);
    const nonARCSourceFiles = entry.nonARCSourceFiles.filter(include);

    // Must come before the sources phase
    if (entry.attributes.has_swift_dependency) {
      target.buildPhases.push(createSwiftDummyFilesPhase());
    }
    if (sourceFiles.length === 0 && nonARCSourceFiles.length === 0) {
      return;
    }

    const nonSwiftSources = [...sourceFiles, ...nonARCSourceFiles].filter((info) => info.extension !== "swift");
    if (nonSwiftSources.length > 0) {
      target.buildPhases.push(createObjcDummyFilesPhase(nonSwiftSources));
    }

    const references = sourceFiles.map((info) => this.fileReference(info));
    const nonARCReferences = nonARCSourceFiles.map((info) => this.fileReference(info));
    target.buildPhases.push(createSourcesBuildPhase([...references, ...nonARCReferences], new Set(nonARCReferences)));
  }

  private fileReference(info: BazelFileInfo): FileReference {
    const reference = this.project.mainGroup.getOrCreateFileReferenceForPath(info.fullPath);
    reference.isInputFile = info.isSource;
    return reference;
  }
}

function createSwiftDummyFilesPhase(): ShellScriptBuildPhase {
  const shellScript = [
    "# Script to generate specific Swift files Xcode expects when running tests.",
    "set -eu",
    "ARCH_ARRAY=($ARCHS)",
    "SUFFIXES=(swiftdoc swiftmodule)",
    'for ARCH in "${ARCH_ARRAY[@]}"',
    "do",
    '  mkdir -p "$OBJECT_FILE_DIR_normal/$ARCH/"',
    '  touch "$OBJECT_FILE_DIR_normal/$ARCH/$SWIFT_OBJC_INTERFACE_HEADER_NAME"',
    '  for SUFFIX in "${SUFFIXES[@]}"',
    "  do",
    '    touch "$OBJECT_FILE_DIR_normal/$ARCH/$PRODUCT_MODULE_NAME.$SUFFIX"',
    "  done",
    "done",
    "",
  ].join("\n");
  const phase = new ShellScriptBuildPhase({ shellScript, shellPath: "/bin/bash", name: "Swift dummy file generation" });
  phase.showEnvVarsInLog = true;
  phase.mnemonic = "SwiftDummy";
  return phase;
}

function createObjcDummyFilesPhase(sources: readonly BazelFileInfo[]): ShellScriptBuildPhase {
  const files = sources.map((info) => {
    const dot = info.basename.lastIndexOf(".");
    return dot > 0 ? info.basename.slice(0, dot) : info.basename;
  });
  const shellScript = [
    "# Script to generate dependency files Xcode expects when running tests.",
    "set -eu",
    "ARCH_ARRAY=($ARCHS)",
    `FILES=(${quoteShellWords(files)})`,
    'for ARCH in "${ARCH_ARRAY[@]}"',
    "do",
    '  mkdir -p "$OBJECT_FILE_DIR_normal/$ARCH/"',
    '  rm -f "$OBJECT_FILE_DIR_normal/$ARCH/${PRODUCT_NAME}_dependency_info.dat"',
    "  printf '\\x00\\x31\\x00' >\"$OBJECT_FILE_DIR_normal/$ARCH/${PRODUCT_NAME}_dependency_info.dat\"",
    '  for FILE in "${FILES[@]}"',
    "  do",
    '    touch "$OBJECT_FILE_DIR_normal/$ARCH/$FILE.d"',
    "  done",
    "done",
    "",
  ].join("\n");
  const phase = new ShellScriptBuildPhase({ shellScript, shellPath: "/bin/bash", name: "Objective-C dummy file generation" });
  phase.showEnvVarsInLog = true;
  phase.mnemonic = "ObjcDummy";
  return phase;
}
