/**
 * Names of build configurations. Must stay in sync with the CONFIGURATION handling in the build
 * script installed into the project bundle.
 */
export const BUILD_CONFIG_NAMES = ["Debug", "Release"] as const;
export type BuildConfigName = (typeof BUILD_CONFIG_NAMES)[number];

/**
 * Prefix of the configurations used when running tests. They turn every compile and link call
 * into `--version` so test bundles keep their sources for indexing without compiling them.
 */
export const TEST_RUNNER_CONFIG_PREFIX = "__BazelTestRunner_";

export const TEST_RUNNER_CONFIG_NAMES: ReadonlyArray<{ name: string; base: BuildConfigName }> = BUILD_CONFIG_NAMES.map(
  (base) => ({ name: `${TEST_RUNNER_CONFIG_PREFIX}${base}`, base }),
);

export const INDEXER_TARGET_PREFIX = "_idx_";

// Longer names run into file system limits
export const MAX_INDEXER_NAME_LENGTH = 180;

export const BAZEL_CLEAN_TARGET_NAME = "_bazel_clean_";

// Prefix of the stub extension targets Xcode needs to debug watch apps
export const WATCH_APP_EXTENSION_PREFIX = "_appex_";

// Build setting names shared with the build scripts
export const WORKSPACE_ROOT_VAR = "BXP_WR";
export const EXECUTION_ROOT_VAR = "BXP_EXECUTION_ROOT";
export const OUTPUT_BASE_VAR = "BXP_OUTPUT_BASE";
export const BUILD_PATH_VAR = "BXP_BUILD_PATH";
export const TEST_RUNNER_ONLY_VAR = "BXP_TEST_RUNNER_ONLY";
export const VERSION_VAR = "BXP_VERSION";
export const XCODE_VERSION_VAR = "BXP_XCODE_VERSION";

// Symlinks inside the project bundle, created next to project.pbxproj
export const EXECUTION_ROOT_SYMLINK_PATH = ".bxp/execution-root";
export const OUTPUT_BASE_SYMLINK_PATH = ".bxp/output-base";

export const BUILD_SCRIPT_PATH = "${PROJECT_FILE_PATH}/.bxp/Scripts/bazel_build.py";
export const CLEAN_SCRIPT_PATH = "${PROJECT_FILE_PATH}/.bxp/Scripts/bazel_clean.sh";
export const STUB_PLIST_DIRECTORY = "${PROJECT_FILE_PATH}/.bxp/Generated";

// Generated headers are collected here by the build script
export const INCLUDES_PATH = "bazel-bxp-includes/x/x";

export const BAZEL_BIN_PATH = "bazel-bin";
export const BAZEL_GENFILES_PATH = "bazel-genfiles";

export const GENERATOR_VERSION = "0.4.0";
