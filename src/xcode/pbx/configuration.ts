import { compareStrings } from "../../common/helpers";
import { type FieldSerializer, PBXObject } from "./object";

export type BuildSettings = Record<string, string>;

export class BuildConfiguration extends PBXObject {
  readonly isa = "XCBuildConfiguration";
  readonly name: string;
  buildSettings: BuildSettings = {};

  constructor(name: string) {
    super();
    this.name = name;
  }

  get comment(): string {
    return this.name;
  }

  get identity(): string {
    return this.name;
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("buildSettings", this.buildSettings);
    serializer.addField("name", this.name);
  }
}

/**
 * The build configurations of a target or project, keyed by name
 */
export class ConfigurationList extends PBXObject {
  readonly isa = "XCConfigurationList";
  private configurations = new Map<string, BuildConfiguration>();
  private owner: { isa: string; name: string };
  defaultConfigurationIsVisible = false;
  defaultConfigurationName: string | undefined;

  constructor(owner: { isa: string; name: string }) {
    super();
    this.owner = owner;
  }

  get comment(): string {
    return `Build configuration list for ${this.owner.isa} "${this.owner.name}"`;
  }

  get identity(): string {
    return `${this.owner.isa}:${this.owner.name}`;
  }

  get buildConfigurations(): BuildConfiguration[] {
    return [...this.configurations.values()];
  }

  get configurationNames(): string[] {
    return [...this.configurations.keys()];
  }

  getBuildConfiguration(name: string): BuildConfiguration | undefined {
    return this.configurations.get(name);
  }

  getOrCreateBuildConfiguration(name: string): BuildConfiguration {
    const existing = this.configurations.get(name);
    if (existing) {
      return existing;
    }
    const configuration = new BuildConfiguration(name);
    this.configurations.set(name, configuration);
    return configuration;
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField(
      "buildConfigurations",
      this.buildConfigurations.sort((a, b) => compareStrings(a.name, b.name)),
    );
    serializer.addField("defaultConfigurationIsVisible", this.defaultConfigurationIsVisible);
    if (this.defaultConfigurationName !== undefined) {
      serializer.addField("defaultConfigurationName", this.defaultConfigurationName);
    }
  }
}
