import { parseRuleRecord } from "../bazel/extractor";
import type { RuleEntry } from "../bazel/rule-entry";
import { RuleEntryMap } from "../bazel/rule-entry-map";
import type { RuleRecordInput } from "../bazel/schema";
import { Diagnostics } from "../common/diagnostics";
import { Logger } from "../common/logger";
import { ProductType } from "../xcode/pbx/product-type";
import { Project } from "../xcode/pbx/project";
import type { NativeTarget } from "../xcode/pbx/targets";
import { IndexerSynthesizer, mergeIndexers } from "./indexer";
import { createPathFilter } from "./paths";

const IOS_10 = { platform: "ios", os_version: "10.0" } as const;

function setup(records: RuleRecordInput[], options?: { sourceFilters?: string[] }) {
  const diagnostics = new Diagnostics();
  const ruleEntryMap = new RuleEntryMap({ diagnostics });
  const entries = new Map<string, RuleEntry>();
  for (const record of records) {
    const entry = parseRuleRecord(record);
    ruleEntryMap.insert(entry);
    entries.set(entry.label.value, entry);
  }
  const project = new Project({ name: "App" });
  const synthesizer = new IndexerSynthesizer({
    project,
    ruleEntryMap,
    diagnostics,
    pathFilter: createPathFilter(options?.sourceFilters),
  });
  const entry = (label: string): RuleEntry => {
    const found = entries.get(label);
    if (!found) {
      throw new Error(`No entry for ${label}`);
    }
    return found;
  };
  return { diagnostics, project, synthesizer, entry };
}

function sourceNames(target: NativeTarget | undefined): string[] {
  return (target?.buildPhases[0]?.files ?? []).map((file) => file.fileRef.name);
}

describe("IndexerSynthesizer", () => {
  beforeEach(() => {
    Logger.writer = () => {};
  });

  it("creates a static library indexer with the rule's settings", () => {
    const { project, synthesizer, entry } = setup([
      {
        label: "//lib:L",
        kind: "objc_library",
        srcs: [{ path: "lib/a.m" }, { path: "lib/a.h" }, { path: "lib/b.m" }],
        attr: { copts: ["-DFOO=1", "-Wall"] },
        deployment_target: IOS_10,
      },
    ]);

    synthesizer.registerRuleEntry(entry("//lib:L"));
    const targets = synthesizer.generateIndexerTargets();

    const [name] = [...targets.keys()];
    expect(name).toMatch(/^_idx_L_[0-9A-F]{8}_ios_min10\.0$/);
    const target = project.targetByName(name);
    expect(target).toBe(synthesizer.indexerTargetForEntry(entry("//lib:L")));
    expect(sourceNames(synthesizer.indexerTargetForEntry(entry("//lib:L")))).toEqual(["a.m", "b.m"]);
    expect(target?.buildConfigurationList.getBuildConfiguration("Debug")?.buildSettings).toEqual({
      PRODUCT_NAME: name,
      OTHER_CFLAGS: "-DFOO=1",
      SDKROOT: "iphoneos",
      IPHONEOS_DEPLOYMENT_TARGET: "10.0",
      GCC_PREPROCESSOR_DEFINITIONS: "DEBUG=1",
    });
  });

  it("uses framework indexers for swift and links indexers along dependencies", () => {
    const { project, synthesizer, entry } = setup([
      {
        label: "//app:A",
        kind: "ios_application",
        srcs: [{ path: "app/main.m" }],
        deps: ["//lib:S"],
        deployment_target: IOS_10,
      },
      { label: "//lib:S", kind: "swift_library", srcs: [{ path: "lib/s.swift" }], deployment_target: IOS_10 },
    ]);

    synthesizer.registerRuleEntry(entry("//app:A"));
    synthesizer.generateIndexerTargets();

    const app = synthesizer.indexerTargetForEntry(entry("//app:A"));
    const swift = synthesizer.indexerTargetForEntry(entry("//lib:S"));
    expect(project.allTargets).toHaveLength(2);
    expect(swift?.productType).toBe(ProductType.Framework);
    expect(app?.dependencies.map((dependency) => dependency.targetProxy.target)).toEqual([swift]);
  });

  it("marks non-ARC sources", () => {
    const { synthesizer, entry } = setup([
      {
        label: "//lib:L",
        kind: "objc_library",
        srcs: [{ path: "lib/a.m" }],
        non_arc_srcs: [{ path: "lib/mrc.m" }],
        deployment_target: IOS_10,
      },
    ]);

    synthesizer.registerRuleEntry(entry("//lib:L"));
    synthesizer.generateIndexerTargets();

    const files = synthesizer.indexerTargetForEntry(entry("//lib:L"))?.buildPhases[0]?.files ?? [];
    expect(files.map((file) => [file.fileRef.name, file.settings])).toEqual([
      ["a.m", undefined],
      ["mrc.m", { COMPILER_FLAGS: "-fno-objc-arc" }],
    ]);
  });

  it("skips tests and their direct dependencies", () => {
    const { project, synthesizer, entry } = setup([
      {
        label: "//tests:T",
        kind: "apple_unit_test",
        srcs: [{ path: "tests/t.m" }],
        deps: ["//lib:L"],
        deployment_target: IOS_10,
      },
      { label: "//lib:L", kind: "objc_library", srcs: [{ path: "lib/a.m" }], deployment_target: IOS_10 },
    ]);

    synthesizer.registerRuleEntry(entry("//tests:T"));

    expect(synthesizer.registeredIndexers).toHaveLength(0);
    expect(synthesizer.generateIndexerTargets().size).toBe(0);
    expect(project.allTargets).toHaveLength(0);
  });

  it("leaves out sources outside the path filters", () => {
    const { synthesizer, entry } = setup(
      [{ label: "//lib:L", kind: "objc_library", srcs: [{ path: "lib/a.m" }], deployment_target: IOS_10 }],
      { sourceFilters: ["app/..."] },
    );

    synthesizer.registerRuleEntry(entry("//lib:L"));
    expect(synthesizer.registeredIndexers).toHaveLength(0);
  });

  it("falls back to the default deployment target with a warning", () => {
    const { diagnostics, synthesizer, entry } = setup([
      { label: "//lib:L", kind: "objc_library", srcs: [{ path: "lib/a.m" }] },
    ]);

    synthesizer.registerRuleEntry(entry("//lib:L"));

    expect(synthesizer.registeredIndexers[0].indexerName).toMatch(/_ios_min9\.0$/);
    expect(diagnostics.withKey("NoDeploymentTarget").map((item) => item.values)).toEqual([["//lib:L"]]);
  });
});

describe("mergeIndexers", () => {
  beforeEach(() => {
    Logger.writer = () => {};
  });

  function library(name: string, attr?: { pch?: { path: string }; copts?: string[] }): RuleRecordInput {
    return {
      label: `//lib:${name}`,
      kind: "objc_library",
      srcs: [{ path: `lib/${name}.m` }],
      attr,
      deployment_target: IOS_10,
    };
  }

  it("merges records with equal settings into one name regardless of order", () => {
    const { synthesizer, entry } = setup([library("L1"), library("L2"), library("L3")]);
    for (const label of ["//lib:L1", "//lib:L2", "//lib:L3"]) {
      synthesizer.registerRuleEntry(entry(label));
    }
    const [first, second, third] = synthesizer.registeredIndexers;

    const orders = [
      [first, second, third],
      [third, first, second],
      [second, third, first],
    ];
    const names = orders.map((order) => [...mergeIndexers(order).keys()]);

    expect(names[0]).toHaveLength(1);
    expect(names[0][0]).toMatch(/^_idx_L1_L2_L3_[0-9A-F]{8}_ios_min10\.0$/);
    expect(names[1]).toEqual(names[0]);
    expect(names[2]).toEqual(names[0]);

    const merged = orders.map((order) => [...mergeIndexers(order).values()][0]);
    const files = merged.map((data) => data.buildPhase.files.map((file) => file.fileRef.name).sort());
    const aliases = merged.map((data) => [...data.supportedIndexingTargets].sort());

    expect(files[0]).toEqual(["L1.m", "L2.m", "L3.m"]);
    expect(files[1]).toEqual(files[0]);
    expect(files[2]).toEqual(files[0]);
    expect(aliases[0]).toHaveLength(3);
    expect(aliases[1]).toEqual(aliases[0]);
    expect(aliases[2]).toEqual(aliases[0]);
  });

  it("never merges records with different prefix headers", () => {
    const { synthesizer, entry } = setup([
      library("L1", { pch: { path: "lib/L1.pch" } }),
      library("L2", { pch: { path: "lib/L2.pch" } }),
      library("L3"),
    ]);
    for (const label of ["//lib:L1", "//lib:L2", "//lib:L3"]) {
      synthesizer.registerRuleEntry(entry(label));
    }

    expect(mergeIndexers(synthesizer.registeredIndexers).size).toBe(3);
  });

  it("keeps records with different defines apart", () => {
    const { synthesizer, entry } = setup([
      library("L1"),
      library("L2", { copts: ["-DFOO=1"] }),
    ]);
    synthesizer.registerRuleEntry(entry("//lib:L1"));
    synthesizer.registerRuleEntry(entry("//lib:L2"));

    expect(mergeIndexers(synthesizer.registeredIndexers).size).toBe(2);
  });
});
