import { compareStrings } from "../../common/helpers";
import { dirname, lastPathComponent } from "../file-types";
import { ConfigurationList } from "./configuration";
import { type FieldDictionary, type FieldSerializer, type FieldValue, PBXObject } from "./object";
import { type ProductType, productName } from "./product-type";
import { type FileReference, Group, SourceTree, type VersionGroup } from "./references";
import {
  ContainerItemProxy,
  LegacyTarget,
  NativeTarget,
  ProxyType,
  type Target,
  TargetDependency,
  type TargetDependencyFactory,
} from "./targets";

export const PRODUCTS_GROUP_NAME = "Products";

/**
 * Root object of a pbxproj file: the group tree, the targets and the project-level settings
 */
export class Project extends PBXObject implements TargetDependencyFactory {
  readonly isa = "PBXProject";
  readonly name: string;
  readonly mainGroup: Group;
  readonly buildConfigurationList: ConfigurationList;

  lastUpgradeCheck = "0830";
  lastSwiftUpdateCheck: string | undefined = "0710";
  compatibilityVersion = "Xcode 3.2";

  private targetsByName = new Map<string, Target>();
  private dependencyCache = new Map<Target, Map<ProxyType, TargetDependency>>();
  private testLinkages: Array<{ test: Target; host: Target }> = [];

  constructor(options: { name: string; mainGroup?: Group }) {
    super();
    this.name = options.name;
    this.mainGroup = options.mainGroup ?? new Group({ name: "mainGroup", sourceTree: SourceTree.Group });
    this.buildConfigurationList = new ConfigurationList(this);
  }

  get comment(): string {
    return "Project object";
  }

  get identity(): string {
    return this.name;
  }

  get allTargets(): Target[] {
    return [...this.targetsByName.values()];
  }

  get testTargetLinkages(): ReadonlyArray<{ test: Target; host: Target }> {
    return this.testLinkages;
  }

  targetByName(name: string): Target | undefined {
    return this.targetsByName.get(name);
  }

  get productsGroup(): Group {
    const group = this.mainGroup.getOrCreateChildGroupByName(PRODUCTS_GROUP_NAME, undefined);
    group.serializesName = true;
    return group;
  }

  /**
   * Creates a native target and the reference to its product in the Products group
   */
  createNativeTarget(name: string, productType: ProductType, options?: { productName?: string }): NativeTarget {
    const target = new NativeTarget(name, productType);
    target.productName = options?.productName ?? name;
    const productReference = this.productsGroup.getOrCreateFileReference(
      SourceTree.BuiltProductsDir,
      productName(productType, target.productName),
    );
    productReference.isInputFile = false;
    productReference.fileTypeOverride = target.explicitFileType;
    target.productReference = productReference;
    this.targetsByName.set(name, target);
    return target;
  }

  createLegacyTarget(options: {
    name: string;
    buildToolPath: string;
    buildArguments: string;
    buildWorkingDirectory: string;
  }): LegacyTarget {
    const target = new LegacyTarget(options);
    this.targetsByName.set(options.name, target);
    return target;
  }

  /**
   * Returns the dependency on `target`, reusing the one created by an earlier call
   */
  createTargetDependency(target: Target, proxyType: ProxyType): TargetDependency {
    let byProxyType = this.dependencyCache.get(target);
    if (!byProxyType) {
      byProxyType = new Map();
      this.dependencyCache.set(target, byProxyType);
    }
    const existing = byProxyType.get(proxyType);
    if (existing) {
      return existing;
    }
    const dependency = new TargetDependency(new ContainerItemProxy(this, target, proxyType));
    byProxyType.set(proxyType, dependency);
    return dependency;
  }

  /**
   * Records that `test` runs inside `host` and makes the test depend on it
   */
  linkTestTarget(test: Target, host: Target): void {
    this.testLinkages.push({ test, host });
    test.createDependencyOn(host, ProxyType.TargetReference, this);
  }

  /**
   * Plain groups for each component of the path, ignoring bundle extensions
   */
  getOrCreateGroupForPath(path: string): Group {
    if (path === "") {
      return this.mainGroup;
    }
    let group = this.mainGroup;
    for (const component of path.split("/")) {
      group = group.getOrCreateChildGroupByName(component === "" ? "/" : component, component);
    }
    return group;
  }

  getOrCreateVersionGroupForPath(path: string, versionGroupType: string): VersionGroup {
    const group = this.getOrCreateGroupForPath(dirname(path));
    const name = lastPathComponent(path);
    const versionGroup = group.getOrCreateChildVersionGroupByName(name, name);
    versionGroup.versionGroupType = versionGroupType;
    return versionGroup;
  }

  getOrCreateFileReferencesForPaths(paths: readonly string[]): FileReference[] {
    return paths.map((path) => this.mainGroup.getOrCreateFileReferenceForPath(path));
  }

  serializeInto(serializer: FieldSerializer): void {
    const attributes: Record<string, FieldValue> = { LastUpgradeCheck: this.lastUpgradeCheck };
    if (this.lastSwiftUpdateCheck !== undefined) {
      attributes.LastSwiftUpdateCheck = this.lastSwiftUpdateCheck;
    }

    // Test targets point at the application that hosts them
    const targetAttributes: Record<string, FieldDictionary> = {};
    for (const { test, host } of this.testLinkages) {
      targetAttributes[serializer.globalId(test)] = { TestTargetID: serializer.globalId(host) };
    }
    if (Object.keys(targetAttributes).length > 0) {
      attributes.TargetAttributes = targetAttributes;
    }

    serializer.addField("attributes", attributes);
    serializer.addField("buildConfigurationList", this.buildConfigurationList);
    serializer.addField("compatibilityVersion", this.compatibilityVersion);
    serializer.addField("mainGroup", this.mainGroup);
    serializer.addField(
      "targets",
      this.allTargets.sort((a, b) => compareStrings(a.name, b.name)),
    );

    // Defaults Xcode writes for new projects
    serializer.addField("developmentRegion", "English");
    serializer.addField("hasScannedForEncodings", false);
    serializer.addField("knownRegions", ["en"]);
  }
}
