import type { BuildSettings, ConfigurationList } from "../xcode/pbx/configuration";
import { BUILD_CONFIG_NAMES, TEST_RUNNER_CONFIG_NAMES } from "./constants";

const PREPROCESSOR_DEFINITIONS = "GCC_PREPROCESSOR_DEFINITIONS";

// Defines Bazel injects for each configuration
const CONFIG_DEFINES: Record<string, string> = {
  Debug: "DEBUG=1",
  Release: "NDEBUG=1",
};

/**
 * Creates Debug and Release with `buildSettings`, adding the define Bazel passes for each
 */
export function createBuildConfigurations(list: ConfigurationList, buildSettings: BuildSettings): void {
  for (const name of BUILD_CONFIG_NAMES) {
    const config = list.getOrCreateBuildConfiguration(name);
    config.buildSettings = { ...buildSettings };

    const define = CONFIG_DEFINES[name];
    const existing = config.buildSettings[PREPROCESSOR_DEFINITIONS];
    config.buildSettings[PREPROCESSOR_DEFINITIONS] = existing ? `${existing} ${define}` : define;
  }
}

/**
 * Adds a test runner copy of each configuration. Compile and link invocations become
 * `--version` calls so running a test never compiles its sources.
 */
export function addTestRunnerBuildConfigurations(list: ConfigurationList): void {
  for (const { name, base } of TEST_RUNNER_CONFIG_NAMES) {
    const baseConfig = list.getOrCreateBuildConfiguration(base);
    const config = list.getOrCreateBuildConfiguration(name);
    config.buildSettings = {
      ...baseConfig.buildSettings,
      OTHER_CFLAGS: "--version",
      OTHER_SWIFT_FLAGS: "--version",
      OTHER_LDFLAGS: "--version",
      // Keep in sync with the dummy file phase of test targets
      SWIFT_OBJC_INTERFACE_HEADER_NAME: "$(PRODUCT_NAME).h",
      SWIFT_INSTALL_OBJC_HEADER: "NO",
      ONLY_ACTIVE_ARCH: "YES",
      // Large values here can exceed environment limits and are never used by the runner
      FRAMEWORK_SEARCH_PATHS: "",
      HEADER_SEARCH_PATHS: "",
    };
  }
}

function mergeMissing(target: BuildSettings, source: BuildSettings, suppressed: ReadonlySet<string>): void {
  for (const [key, value] of Object.entries(source)) {
    if (key in target || suppressed.has(key)) {
      continue;
    }
    target[key] = value;
  }
}

/**
 * Fills keys that are not yet set, first from `settings` and then from the configuration of the
 * same name in `base`. Test runner configurations fall back to the base list's plain
 * configuration when it has no test runner variant.
 */
export function updateMissingBuildConfigurations(
  list: ConfigurationList,
  settings: BuildSettings,
  options?: { base?: ConfigurationList; suppressed?: ReadonlySet<string> },
): void {
  const suppressed = options?.suppressed ?? new Set<string>();
  const base = options?.base;

  for (const name of BUILD_CONFIG_NAMES) {
    const config = list.getOrCreateBuildConfiguration(name);
    mergeMissing(config.buildSettings, settings, suppressed);
    const baseSettings = base?.getBuildConfiguration(name)?.buildSettings;
    if (baseSettings) {
      mergeMissing(config.buildSettings, baseSettings, suppressed);
    }
  }

  for (const { name, base: baseName } of TEST_RUNNER_CONFIG_NAMES) {
    const config = list.getOrCreateBuildConfiguration(name);
    mergeMissing(config.buildSettings, settings, suppressed);
    const baseSettings =
      base?.getBuildConfiguration(name)?.buildSettings ?? base?.getBuildConfiguration(baseName)?.buildSettings;
    if (baseSettings) {
      mergeMissing(config.buildSettings, baseSettings, suppressed);
    }
  }
}
