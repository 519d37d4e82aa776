import { ProductType } from "../xcode/pbx/product-type";
import { DeploymentTarget } from "./deployment-target";
import { BuildLabel } from "./label";
import type { FileInfo, IncludePath, RuleAttributes, RuleKind, RuleRecord } from "./schema";

/**
 * File produced or consumed by a rule, relative to the execution root
 */
export class BazelFileInfo {
  readonly path: string;
  readonly isSource: boolean;
  readonly root: string | undefined;
  readonly isDirectory: boolean;

  constructor(info: FileInfo) {
    this.path = info.path;
    this.isSource = info.src;
    this.root = info.root;
    this.isDirectory = info.is_dir ?? false;
  }

  get fullPath(): string {
    return this.root ? `${this.root}/${this.path}` : this.path;
  }

  get basename(): string {
    const slash = this.path.lastIndexOf("/");
    return slash === -1 ? this.path : this.path.slice(slash + 1);
  }

  get extension(): string | undefined {
    const name = this.basename;
    const dot = name.lastIndexOf(".");
    return dot > 0 ? name.slice(dot + 1) : undefined;
  }
}

const PRODUCT_TYPES: Record<RuleKind, ProductType | undefined> = {
  apple_ui_test: ProductType.UIUnitTest,
  apple_unit_test: ProductType.UnitTest,
  ios_test: ProductType.UnitTest,
  apple_watch1_extension: ProductType.Watch1App,
  apple_watch2_extension: ProductType.Watch2App,
  ios_application: ProductType.Application,
  _ios_application: ProductType.Application,
  tvos_application: ProductType.Application,
  _tvos_application: ProductType.Application,
  objc_binary: ProductType.Application,
  _test_host_: ProductType.Application,
  ios_extension: ProductType.AppExtension,
  _ios_extension: ProductType.AppExtension,
  ios_framework: ProductType.Framework,
  objc_library: ProductType.StaticLibrary,
  swift_library: ProductType.StaticLibrary,
  tvos_extension: ProductType.TVAppExtension,
  _tvos_extension: ProductType.TVAppExtension,
  test_suite: undefined,
  filegroup: undefined,
};

const TEST_KINDS: ReadonlySet<RuleKind> = new Set<RuleKind>(["apple_unit_test", "apple_ui_test", "ios_test"]);

function uniqueLabels(values: readonly string[]): BuildLabel[] {
  return [...new Set(values)].map((value) => new BuildLabel(value));
}

function files(infos: readonly FileInfo[] | undefined): BazelFileInfo[] {
  return (infos ?? []).map((info) => new BazelFileInfo(info));
}

/**
 * One resolved Bazel target in one configuration. A label built for several deployment targets
 * produces one entry per target.
 */
export class RuleEntry {
  readonly label: BuildLabel;
  readonly kind: RuleKind;
  readonly attributes: RuleAttributes;
  readonly sourceFiles: BazelFileInfo[];
  readonly nonARCSourceFiles: BazelFileInfo[];
  readonly frameworkImports: BazelFileInfo[];
  readonly artifacts: BazelFileInfo[];
  readonly secondaryArtifacts: BazelFileInfo[];
  readonly dependencies: BuildLabel[];
  readonly weakDependencies: BuildLabel[];
  readonly extensions: BuildLabel[];
  readonly bundleID: string | undefined;
  readonly bundleName: string | undefined;
  readonly extensionBundleID: string | undefined;
  readonly buildFilePath: string | undefined;
  readonly deploymentTarget: DeploymentTarget | undefined;
  readonly includePaths: IncludePath[];
  readonly swiftTransitiveModules: BazelFileInfo[];
  readonly objCModuleMaps: BazelFileInfo[];
  readonly moduleName: string | undefined;
  readonly swiftDefines: string[];
  readonly xcodeVersion: string | undefined;

  constructor(record: RuleRecord) {
    this.label = new BuildLabel(record.label);
    this.kind = record.kind;
    this.attributes = record.attr;
    this.sourceFiles = files(record.srcs);
    this.nonARCSourceFiles = files(record.non_arc_srcs);
    this.frameworkImports = files(record.framework_imports);
    this.artifacts = files(record.artifacts);
    this.secondaryArtifacts = files(record.secondary_artifacts);
    this.dependencies = uniqueLabels(record.deps);
    this.weakDependencies = uniqueLabels(record.weak_deps);
    this.extensions = uniqueLabels(record.extensions);
    this.bundleID = record.bundle_id;
    this.bundleName = record.bundle_name;
    this.extensionBundleID = record.extension_bundle_id;
    this.buildFilePath = record.build_file;
    this.deploymentTarget = record.deployment_target
      ? DeploymentTarget.from(record.deployment_target.platform, record.deployment_target.os_version)
      : undefined;
    this.includePaths = record.includes;
    this.swiftTransitiveModules = files(record.swift_transitive_modules);
    this.objCModuleMaps = files(record.objc_module_maps);
    this.moduleName = record.module_name;
    this.swiftDefines = record.swift_defines;
    this.xcodeVersion = record.xcode_version;
  }

  /**
   * Product type of the Xcode target that builds this rule. Undefined for kinds that have no
   * buildable product, such as test suites.
   */
  get productType(): ProductType | undefined {
    if (this.kind === "ios_test" && this.attributes.xctest === false) {
      return ProductType.Application;
    }
    return PRODUCT_TYPES[this.kind];
  }

  get isTest(): boolean {
    return TEST_KINDS.has(this.kind);
  }

  get isSwift(): boolean {
    return this.kind === "swift_library" || this.attributes.has_swift_info === true;
  }

  /**
   * Value for SDKROOT. Watch1 apps build with the iphoneos SDK since the watchos SDK only exists
   * for watchOS 2 and later.
   */
  get sdkRoot(): string | undefined {
    const productType = this.productType;
    if (productType === undefined) {
      return undefined;
    }
    if (productType === ProductType.Watch2App) {
      return "watchos";
    }
    if (productType === ProductType.TVAppExtension || this.kind === "_tvos_application") {
      return "appletvos";
    }
    return "iphoneos";
  }

  /**
   * Labels of targets this rule is built into, such as the host of a test
   */
  get linkedTargetLabels(): BuildLabel[] {
    const labels: string[] = [];
    if (this.attributes.xctest_app) {
      labels.push(this.attributes.xctest_app);
    }
    if (this.attributes.test_host) {
      labels.push(this.attributes.test_host);
    }
    return uniqueLabels(labels);
  }

  get normalNonSourceArtifacts(): BazelFileInfo[] {
    const artifacts: BazelFileInfo[] = [];
    if (this.attributes.launch_storyboard) {
      artifacts.push(new BazelFileInfo(this.attributes.launch_storyboard));
    }
    artifacts.push(...files(this.attributes.supporting_files));
    return artifacts;
  }

  /**
   * Artifacts that need a version group in the project, like Core Data models
   */
  get versionedNonSourceArtifacts(): BazelFileInfo[] {
    return files(this.attributes.datamodels);
  }

  get projectArtifacts(): BazelFileInfo[] {
    return [
      ...this.sourceFiles,
      ...this.nonARCSourceFiles,
      ...this.frameworkImports,
      ...this.normalNonSourceArtifacts,
      ...this.versionedNonSourceArtifacts,
    ];
  }
}
