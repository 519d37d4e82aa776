import { commonLogger } from "../../common/logger";
import { ConfigurationList } from "./configuration";
import { type FieldSerializer, PBXObject } from "./object";
import type { BuildPhase } from "./phases";
import { type ProductType, explicitFileType } from "./product-type";
import type { FileReference } from "./references";

/**
 * Kind of item a container proxy points at
 */
export enum ProxyType {
  TargetReference = 1,
  FileReference = 2,
}

/**
 * The project side of a dependency edge. Only the project can create proxies and dependencies,
 * which is what lets it cache them.
 */
export interface TargetDependencyFactory extends PBXObject {
  createTargetDependency(target: Target, proxyType: ProxyType): TargetDependency;
}

export abstract class Target extends PBXObject {
  readonly name: string;
  productName: string | undefined;
  readonly buildConfigurationList: ConfigurationList;
  readonly buildPhases: BuildPhase[] = [];
  readonly dependencies: TargetDependency[] = [];

  /**
   * Targets that must be built alongside this one in its scheme, without a project-level
   * dependency edge
   */
  readonly buildActionDependencies = new Set<Target>();

  constructor(name: string) {
    super();
    this.name = name;
    this.buildConfigurationList = new ConfigurationList(this);
  }

  get comment(): string {
    return this.name;
  }

  get identity(): string {
    return this.name;
  }

  /**
   * Makes this target depend on `target`. Existing edges are kept as is and a target never
   * depends on itself. With `first` the edge is inserted before all others.
   */
  createDependencyOn(
    target: Target,
    proxyType: ProxyType,
    project: TargetDependencyFactory,
    options?: { first?: boolean },
  ): void {
    if (target === this) {
      commonLogger.warn("Ignoring dependency of a target on itself", { target: this.name });
      return;
    }

    const dependency = project.createTargetDependency(target, proxyType);
    if (this.dependencies.includes(dependency)) {
      return;
    }
    if (options?.first) {
      this.dependencies.unshift(dependency);
    } else {
      this.dependencies.push(dependency);
    }
  }

  createBuildActionDependencyOn(target: Target): void {
    if (target === this) {
      return;
    }
    this.buildActionDependencies.add(target);
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("buildConfigurationList", this.buildConfigurationList);
    serializer.addField("buildPhases", this.buildPhases);
    serializer.addField("dependencies", this.dependencies);
    serializer.addField("name", this.name);
    serializer.addField("productName", this.productName);
  }
}

/**
 * Target that produces a binary or bundle
 */
export class NativeTarget extends Target {
  readonly isa = "PBXNativeTarget";
  readonly productType: ProductType;
  productReference: FileReference | undefined;

  constructor(name: string, productType: ProductType) {
    super(name);
    this.productType = productType;
  }

  get explicitFileType(): string {
    return explicitFileType(this.productType);
  }

  serializeInto(serializer: FieldSerializer): void {
    super.serializeInto(serializer);
    // Xcode always writes an empty list of build rules
    serializer.addField("buildRules", []);
    serializer.addField("productReference", this.productReference);
    serializer.addField("productType", this.productType);
  }
}

/**
 * Target that runs an external tool instead of Xcode's build system
 */
export class LegacyTarget extends Target {
  readonly isa = "PBXLegacyTarget";
  readonly buildToolPath: string;
  readonly buildArgumentsString: string;
  readonly buildWorkingDirectory: string;
  passBuildSettingsInEnvironment = true;

  constructor(options: {
    name: string;
    buildToolPath: string;
    buildArguments: string;
    buildWorkingDirectory: string;
  }) {
    super(options.name);
    this.buildToolPath = options.buildToolPath;
    this.buildArgumentsString = options.buildArguments;
    this.buildWorkingDirectory = options.buildWorkingDirectory;
  }

  serializeInto(serializer: FieldSerializer): void {
    super.serializeInto(serializer);
    serializer.addField("buildArgumentsString", this.buildArgumentsString);
    serializer.addField("buildToolPath", this.buildToolPath);
    serializer.addField("buildWorkingDirectory", this.buildWorkingDirectory);
    serializer.addField("passBuildSettingsInEnvironment", this.passBuildSettingsInEnvironment);
  }
}

/**
 * Link to a target, possibly in another project
 */
export class ContainerItemProxy extends PBXObject {
  readonly isa = "PBXContainerItemProxy";
  readonly containerPortal: PBXObject;
  readonly target: Target;
  readonly proxyType: ProxyType;

  constructor(containerPortal: PBXObject, target: Target, proxyType: ProxyType) {
    super();
    this.containerPortal = containerPortal;
    this.target = target;
    this.proxyType = proxyType;
  }

  get comment(): string {
    return "PBXContainerItemProxy";
  }

  get identity(): string {
    return `${this.target.identity}:${this.proxyType}`;
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("containerPortal", this.containerPortal);
    serializer.addField("proxyType", this.proxyType);
    serializer.addRawIdField("remoteGlobalIDString", this.target);
    serializer.addField("remoteInfo", this.target.name);
  }
}

export class TargetDependency extends PBXObject {
  readonly isa = "PBXTargetDependency";
  readonly targetProxy: ContainerItemProxy;

  constructor(targetProxy: ContainerItemProxy) {
    super();
    this.targetProxy = targetProxy;
  }

  get comment(): string {
    return "PBXTargetDependency";
  }

  get identity(): string {
    return this.targetProxy.identity;
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("target", this.targetProxy.target);
    serializer.addField("targetProxy", this.targetProxy);
  }
}
