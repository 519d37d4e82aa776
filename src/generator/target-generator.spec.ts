import { parseRuleRecord } from "../bazel/extractor";
import { BuildLabel } from "../bazel/label";
import type { RuleEntry } from "../bazel/rule-entry";
import { RuleEntryMap } from "../bazel/rule-entry-map";
import type { RuleRecordInput } from "../bazel/schema";
import { Diagnostics } from "../common/diagnostics";
import { UnsupportedRuleKindError } from "../common/errors";
import { Logger } from "../common/logger";
import { ShellScriptBuildPhase } from "../xcode/pbx/phases";
import { ProductType } from "../xcode/pbx/product-type";
import { Project } from "../xcode/pbx/project";
import { NativeTarget, ProxyType, type Target } from "../xcode/pbx/targets";
import { createPathFilter, mainGroupForOutputFolder } from "./paths";
import { LabelState, TargetGenerator, type TargetGeneratorOptions } from "./target-generator";

const IOS_10 = { platform: "ios", os_version: "10.0" } as const;

const APP = {
  label: "//app:A",
  kind: "ios_application",
  bundle_name: "App",
  bundle_id: "com.example.app",
  srcs: [{ path: "app/main.m" }],
  deployment_target: IOS_10,
} satisfies RuleRecordInput;

function setup(records: RuleRecordInput[], options?: Partial<TargetGeneratorOptions> & { outputFolder?: string }) {
  const diagnostics = new Diagnostics();
  const ruleEntryMap = new RuleEntryMap({ diagnostics });
  const entries: RuleEntry[] = [];
  for (const record of records) {
    const entry = parseRuleRecord(record);
    ruleEntryMap.insert(entry);
    entries.push(entry);
  }
  const project = new Project({
    name: "App",
    mainGroup: options?.outputFolder ? mainGroupForOutputFolder(options.outputFolder, "/ws") : undefined,
  });
  const generator = new TargetGenerator({
    project,
    ruleEntryMap,
    diagnostics,
    options: { bazelPath: "/usr/bin/bazel", pathFilter: createPathFilter(undefined), ...options },
  });
  return { diagnostics, project, generator, entries };
}

function scriptPhases(target: Target | undefined): ShellScriptBuildPhase[] {
  return (target?.buildPhases ?? []).filter((phase): phase is ShellScriptBuildPhase => phase instanceof ShellScriptBuildPhase);
}

function debugSettings(target: Target | undefined): Record<string, string> | undefined {
  return target?.buildConfigurationList.getBuildConfiguration("Debug")?.buildSettings;
}

describe("TargetGenerator", () => {
  beforeEach(() => {
    Logger.writer = () => {};
  });

  describe("product targets", () => {
    it("sets the settings the build script reads", () => {
      const { generator, entries } = setup([APP]);

      const targets = generator.generateBuildTargetsForRuleEntries(entries);
      const app = targets.get("//app:A");

      expect(app?.name).toBe("App");
      expect(app?.productType).toBe(ProductType.Application);
      expect(debugSettings(app)).toEqual({
        BXP_BUILD_PATH: "app",
        PRODUCT_NAME: "App",
        PRODUCT_BUNDLE_IDENTIFIER: "com.example.app",
        SDKROOT: "iphoneos",
        ASSETCATALOG_COMPILER_LAUNCHIMAGE_NAME: "Stub Launch Image",
        INFOPLIST_FILE: "${PROJECT_FILE_PATH}/.bxp/Generated/StubInfoPlist.plist",
        IPHONEOS_DEPLOYMENT_TARGET: "10.0",
        DEBUG_INFORMATION_FORMAT: "dwarf",
        BAZEL_TARGET: "//app:A",
        GCC_PREPROCESSOR_DEFINITIONS: "DEBUG=1",
      });
      expect(app?.buildConfigurationList.configurationNames).toEqual([
        "Debug",
        "Release",
        "__BazelTestRunner_Debug",
        "__BazelTestRunner_Release",
      ]);
    });

    it("runs the build script for the label", () => {
      const { generator, entries } = setup([APP]);

      const app = generator.generateBuildTargetsForRuleEntries(entries).get("//app:A");
      const [phase] = scriptPhases(app);

      expect(phase.name).toBe("build //app:A");
      expect(phase.shellPath).toBe("/bin/bash");
      expect(phase.inputPaths).toEqual(["$(TARGET_BUILD_DIR)/$(INFOPLIST_PATH)"]);
      expect(phase.shellScript).toBe(
        'set -e\n\nexec "${PROJECT_FILE_PATH}/.bxp/Scripts/bazel_build.py" //app:A --bazel "/usr/bin/bazel" ' +
          '--bazel_bin_path "bazel-bin" --verbose ',
      );
    });

    it("applies per-target options over the global ones", () => {
      const { generator, entries } = setup([APP], {
        outputFolder: "/ws/xcode",
        buildOptions: { Debug: "--x", Release: "--x" },
        targetOptions: { "//app:A": { settings: { CUSTOM: "1" }, buildOptions: { Debug: "--config=dbg" } } },
      });

      const app = generator.generateBuildTargetsForRuleEntries(entries).get("//app:A");

      expect(debugSettings(app)?.CUSTOM).toBe("1");
      expect(scriptPhases(app)[0].shellScript).toBe(
        'set -e\ncd "${SRCROOT}/.."\nexec "${PROJECT_FILE_PATH}/.bxp/Scripts/bazel_build.py" //app:A ' +
          '--bazel "/usr/bin/bazel" --bazel_bin_path "bazel-bin" --verbose ' +
          "--bazel_options[Debug] --config=dbg -- --bazel_options[Release] --x -- ",
      );
    });

    it("wraps the build phase with pre and post scripts", () => {
      const { generator, entries } = setup([APP], {
        preBuildScript: "echo pre",
        postBuildScript: "echo post",
        targetOptions: { App: { preBuildScript: "echo mine" } },
      });

      const app = generator.generateBuildTargetsForRuleEntries(entries).get("//app:A");
      const phases = scriptPhases(app);

      expect(phases.map((phase) => phase.name)).toEqual(["Pre-build Run Script", "build //app:A", "Post-build Run Script"]);
      expect(phases[0].shellScript).toBe("echo mine");
      expect(phases[2].shellScript).toBe("echo post");
    });

    it("keeps dSYMs when a swift library is in the dependency closure", () => {
      const { generator, entries } = setup([
        { ...APP, deps: ["//lib:L"] },
        { label: "//lib:L", kind: "objc_library", deps: ["//lib:S"], deployment_target: IOS_10 },
        { label: "//lib:S", kind: "swift_library", deployment_target: IOS_10 },
      ]);

      const app = generator.generateBuildTargetsForRuleEntries([entries[0]]).get("//app:A");
      expect(debugSettings(app)?.DEBUG_INFORMATION_FORMAT).toBe("dwarf-with-dsym");
    });

    it("points at the binary and its dSYM", () => {
      const { generator, entries } = setup([{ ...APP, attr: { binary: "//app:A_bin" } }]);

      const settings = debugSettings(generator.generateBuildTargetsForRuleEntries(entries).get("//app:A"));
      expect(settings?.BAZEL_BINARY_TARGET).toBe("//app:A_bin");
      expect(settings?.BAZEL_BINARY_DSYM).toBe("app/A_bin.app.dSYM");
    });

    it("rejects rule kinds without a product", () => {
      const { generator, entries } = setup([{ label: "//res:files", kind: "filegroup" }]);
      expect(() => generator.generateBuildTargetsForRuleEntries(entries)).toThrow(UnsupportedRuleKindError);
    });
  });

  describe("clean target", () => {
    it("becomes the first dependency of every target", () => {
      const { project, generator, entries } = setup([APP]);
      const existing = project.createNativeTarget("Existing", ProductType.StaticLibrary);
      const other = project.createNativeTarget("Other", ProductType.StaticLibrary);
      existing.createDependencyOn(other, ProxyType.TargetReference, project);

      const clean = generator.generateBazelCleanTarget({ startupOptions: ["--batch"] });
      const app = generator.generateBuildTargetsForRuleEntries(entries).get("//app:A");

      expect(clean.name).toBe("_bazel_clean_");
      expect(clean.buildToolPath).toBe("${PROJECT_FILE_PATH}/.bxp/Scripts/bazel_clean.sh");
      expect(clean.buildArgumentsString).toBe('"/usr/bin/bazel" "bazel-bin" "--batch"');
      expect(existing.dependencies.map((dependency) => dependency.targetProxy.target)).toEqual([clean, other]);
      expect(app?.dependencies[0].targetProxy.target).toBe(clean);
      expect(clean.dependencies).toHaveLength(0);
    });

    it("is only created once", () => {
      const { generator } = setup([]);
      expect(generator.generateBazelCleanTarget()).toBe(generator.generateBazelCleanTarget());
    });
  });

  it("creates project level configurations", () => {
    const { project, generator } = setup([]);

    generator.generateTopLevelBuildConfigurations({ CUSTOM: "1" });

    const settings = project.buildConfigurationList.getBuildConfiguration("Debug")?.buildSettings;
    expect(settings?.CUSTOM).toBe("1");
    expect(settings?.BXP_WR).toBe("$(SRCROOT)");
    expect(settings?.BXP_EXECUTION_ROOT).toBe("$(PROJECT_FILE_PATH)/.bxp/execution-root");
    expect(settings?.HEADER_SEARCH_PATHS).toBe(
      "$(BXP_EXECUTION_ROOT) $(BXP_WR)/bazel-bin $(BXP_WR)/bazel-genfiles $(BXP_EXECUTION_ROOT)/bazel-bxp-includes/x/x",
    );
    expect(project.buildConfigurationList.getBuildConfiguration("__BazelTestRunner_Release")?.buildSettings.OTHER_CFLAGS).toBe(
      "--version",
    );
  });

  describe("tests", () => {
    const TEST = {
      label: "//tests:T",
      kind: "apple_unit_test",
      srcs: [{ path: "tests/t.m" }],
      attr: { test_host: "//app:A" },
      deployment_target: IOS_10,
    } satisfies RuleRecordInput;

    it("links a test to its host", () => {
      const { project, generator, entries } = setup([APP, TEST]);

      const targets = generator.generateBuildTargetsForRuleEntries(entries);
      const app = targets.get("//app:A");
      const tests = targets.get("//tests:T");

      expect(project.testTargetLinkages).toEqual([{ test: tests, host: app }]);
      expect(tests?.dependencies.map((dependency) => dependency.targetProxy.target)).toEqual([app]);
      const settings = debugSettings(tests);
      expect(settings?.TEST_HOST).toBe("$(BUILT_PRODUCTS_DIR)/App.app/App");
      expect(settings?.BUNDLE_LOADER).toBe("$(TEST_HOST)");
      expect(settings?.BXP_TEST_RUNNER_ONLY).toBe("YES");
      expect(settings?.PRODUCT_NAME).toBe("T");
    });

    it("adds dummy file and source phases", () => {
      const { generator, entries } = setup([APP, TEST]);

      const tests = generator.generateBuildTargetsForRuleEntries(entries).get("//tests:T");

      expect(tests?.buildPhases.map((phase) => phase.isa)).toEqual([
        "PBXShellScriptBuildPhase",
        "PBXShellScriptBuildPhase",
        "PBXSourcesBuildPhase",
      ]);
      expect(tests?.buildPhases.map((phase) => phase.mnemonic)).toEqual(["BazelBuild", "ObjcDummy", ""]);
      expect(scriptPhases(tests)[1].shellScript).toContain("FILES=(t)\n");
      expect(tests?.buildPhases[2].files.map((file) => file.fileRef.name)).toEqual(["t.m"]);
    });

    it("names the host for UI tests", () => {
      const { generator, entries } = setup([APP, { ...TEST, kind: "apple_ui_test" }]);

      const tests = generator.generateBuildTargetsForRuleEntries(entries).get("//tests:T");
      expect(debugSettings(tests)?.TEST_TARGET_NAME).toBe("App");
      expect(debugSettings(tests)?.TEST_HOST).toBeUndefined();
    });

    it("warns when the host has no target", () => {
      const { diagnostics, project, generator, entries } = setup([
        { ...TEST, attr: { test_host: "//app:Missing" } },
      ]);

      const tests = generator.generateBuildTargetsForRuleEntries(entries).get("//tests:T");

      expect(diagnostics.withKey("MissingTestHost").map((item) => item.values)).toEqual([["//tests:T", "//app:Missing"]]);
      expect(tests?.dependencies).toHaveLength(0);
      expect(project.testTargetLinkages).toHaveLength(0);
    });
  });

  describe("watch apps", () => {
    it("adds the extension stub and depends on resolved extensions", () => {
      const { diagnostics, project, generator, entries } = setup([
        {
          label: "//watch:W",
          kind: "apple_watch2_extension",
          extensions: ["//watch:Ext", "//watch:Gone"],
          deployment_target: { platform: "watchos", os_version: "3.0" },
        },
        { label: "//watch:Ext", kind: "ios_extension", deployment_target: { platform: "watchos", os_version: "3.0" } },
      ]);

      const targets = generator.generateBuildTargetsForRuleEntries(entries);
      const watch = targets.get("//watch:W");
      const stub = project.targetByName("_appex_W");

      expect(stub).toBeInstanceOf(NativeTarget);
      expect(stub instanceof NativeTarget ? stub.productType : undefined).toBe(ProductType.Watch2Extension);
      expect([...(watch?.buildActionDependencies ?? [])]).toEqual([stub]);
      expect(debugSettings(stub)?.SDKROOT).toBe("watchos");
      expect(debugSettings(stub)?.INFOPLIST_FILE).toBe("${PROJECT_FILE_PATH}/.bxp/Generated/StubWatchOS2AppExInfoPlist.plist");
      expect(watch?.dependencies.map((dependency) => dependency.targetProxy.target)).toEqual([targets.get("//watch:Ext")]);
      expect(diagnostics.withKey("FindingWatchExtensionFailed").map((item) => item.values)).toEqual([["//watch:Gone"]]);
    });
  });

  it("tracks how far each label got", () => {
    const { generator, entries } = setup([APP]);
    const label = new BuildLabel("//app:A");

    expect(generator.labelState(label)).toBe(LabelState.Unregistered);
    generator.registerRuleEntryForIndexer(entries[0]);
    expect(generator.labelState(label)).toBe(LabelState.RegisteredForIndexing);
    generator.generateIndexerTargets();
    generator.generateBuildTargetsForRuleEntries(entries);
    expect(generator.labelState(label)).toBe(LabelState.Linked);
    expect(generator.labelState(new BuildLabel("//other:X"))).toBe(LabelState.Unregistered);
  });
});
