import { BazelFileInfo } from "../bazel/rule-entry";
import { SourceTree } from "../xcode/pbx/references";
import { createPathFilter, mainGroupForOutputFolder, projectRefForFileInfo, workingDirectoryForGroup } from "./paths";

describe("createPathFilter", () => {
  it("accepts everything without filters", () => {
    expect(createPathFilter(undefined)("any/where/a.m")).toBe(true);
  });

  it("matches a directory exactly", () => {
    const filter = createPathFilter(["lib"]);
    expect(filter("lib/a.m")).toBe(true);
    expect(filter("lib/sub/a.m")).toBe(false);
    expect(filter("other/a.m")).toBe(false);
  });

  it("matches everything below a recursive filter", () => {
    const filter = createPathFilter(["lib/..."]);
    expect(filter("lib/a.m")).toBe(true);
    expect(filter("lib/sub/a.m")).toBe(true);
    expect(filter("libfoo/a.m")).toBe(false);
  });

  it("matches the whole workspace with ...", () => {
    const filter = createPathFilter(["..."]);
    expect(filter("BUILD")).toBe(true);
    expect(filter("deep/path/a.m")).toBe(true);
  });
});

describe("mainGroupForOutputFolder", () => {
  it("uses the project folder when output and workspace match", () => {
    const group = mainGroupForOutputFolder("/ws/", "/ws");
    expect(group.sourceTree).toBe(SourceTree.SourceRoot);
    expect(group.path).toBeUndefined();
    expect(workingDirectoryForGroup(group)).toBe("");
  });

  it("walks up from an output folder inside the workspace", () => {
    const group = mainGroupForOutputFolder("/ws/out/xcode", "/ws");
    expect(group.path).toBe("../..");
    expect(workingDirectoryForGroup(group)).toBe("${SRCROOT}/../..");
  });

  it("walks down to a workspace inside the output folder", () => {
    const group = mainGroupForOutputFolder("/projects", "/projects/ws");
    expect(group.path).toBe("ws");
  });

  it("uses an absolute path otherwise", () => {
    const group = mainGroupForOutputFolder("/tmp/out", "/ws");
    expect(group.sourceTree).toBe(SourceTree.Absolute);
    expect(workingDirectoryForGroup(group)).toBe("/ws");
  });
});

describe("projectRefForFileInfo", () => {
  it("roots sources at the execution root and generated files at the workspace", () => {
    expect(projectRefForFileInfo(new BazelFileInfo({ path: "lib/L.pch", src: true }))).toBe(
      "$(BXP_EXECUTION_ROOT)/lib/L.pch",
    );
    expect(projectRefForFileInfo(new BazelFileInfo({ path: "lib/gen.h", src: false, root: "bazel-genfiles" }))).toBe(
      "$(BXP_WR)/bazel-genfiles/lib/gen.h",
    );
  });
});
