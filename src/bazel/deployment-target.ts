export type PlatformType = "ios" | "macos" | "tvos" | "watchos";

type PlatformInfo = {
  deploymentTargetSetting: string;
  deviceSDK: string;
};

const PLATFORMS: Record<PlatformType, PlatformInfo> = {
  ios: {
    deploymentTargetSetting: "IPHONEOS_DEPLOYMENT_TARGET",
    deviceSDK: "iphoneos",
  },
  macos: {
    deploymentTargetSetting: "MACOSX_DEPLOYMENT_TARGET",
    deviceSDK: "macosx",
  },
  tvos: {
    deploymentTargetSetting: "TVOS_DEPLOYMENT_TARGET",
    deviceSDK: "appletvos",
  },
  watchos: {
    deploymentTargetSetting: "WATCHOS_DEPLOYMENT_TARGET",
    deviceSDK: "watchos",
  },
};

export function deploymentTargetSetting(platform: PlatformType): string {
  return PLATFORMS[platform].deploymentTargetSetting;
}

export function deviceSDK(platform: PlatformType): string {
  return PLATFORMS[platform].deviceSDK;
}

/**
 * Where the test host binary is expected to be built. watchOS has no test hosts.
 */
export function testHostPath(platform: PlatformType, hostPath: string, hostProductName: string): string | undefined {
  switch (platform) {
    case "ios":
    case "tvos":
      return `$(BUILT_PRODUCTS_DIR)/${hostPath}/${hostProductName}`;
    case "macos":
      return `$(BUILT_PRODUCTS_DIR)/${hostPath}/Contents/MacOS/${hostProductName}`;
    case "watchos":
      return undefined;
  }
}

/**
 * Version of the form "x.y.z". Missing components compare as zero, so "10" equals "10.0".
 */
export class DottedVersion {
  private readonly components: readonly number[];

  private constructor(components: number[]) {
    this.components = components;
  }

  static parse(value: string): DottedVersion | undefined {
    const components: number[] = [];
    for (const part of value.split(".")) {
      if (part === "") {
        components.push(0);
        continue;
      }
      if (!/^\d+$/.test(part)) {
        return undefined;
      }
      components.push(Number.parseInt(part, 10));
    }
    return new DottedVersion(components);
  }

  static of(...components: number[]): DottedVersion {
    return new DottedVersion(components);
  }

  compare(other: DottedVersion): number {
    const length = Math.max(this.components.length, other.components.length);
    for (let i = 0; i < length; i++) {
      const diff = (this.components[i] ?? 0) - (other.components[i] ?? 0);
      if (diff !== 0) {
        return diff < 0 ? -1 : 1;
      }
    }
    return 0;
  }

  equals(other: DottedVersion): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    return this.components.join(".");
  }
}

export class DeploymentTarget {
  readonly platform: PlatformType;
  readonly osVersion: DottedVersion;

  constructor(platform: PlatformType, osVersion: DottedVersion) {
    this.platform = platform;
    this.osVersion = osVersion;
  }

  /**
   * Parses a deployment target from the extractor output. Returns undefined if the version
   * isn't dotted numbers.
   */
  static from(platform: PlatformType, osVersion: string): DeploymentTarget | undefined {
    const version = DottedVersion.parse(osVersion);
    if (!version) {
      return undefined;
    }
    return new DeploymentTarget(platform, version);
  }

  equals(other: DeploymentTarget): boolean {
    return this.platform === other.platform && this.osVersion.equals(other.osVersion);
  }

  toString(): string {
    return `${this.platform}_min${this.osVersion.toString()}`;
  }
}

/**
 * Used for rules whose extractor output carries no deployment target
 */
export const DEFAULT_DEPLOYMENT_TARGET = new DeploymentTarget("ios", DottedVersion.of(9, 0));
