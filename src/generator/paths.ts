import type { BazelFileInfo } from "../bazel/rule-entry";
import { dirname } from "../xcode/file-types";
import { Group, SourceTree } from "../xcode/pbx/references";
import { EXECUTION_ROOT_VAR, WORKSPACE_ROOT_VAR } from "./constants";

export type PathFilter = (path: string) => boolean;

/**
 * Builds a predicate for workspace-relative file paths. A filter `a/b` accepts files directly in
 * `a/b`; `a/b/...` also accepts everything below it. Without filters every path is accepted.
 */
export function createPathFilter(filters: readonly string[] | undefined): PathFilter {
  if (filters === undefined) {
    return () => true;
  }
  const exact = new Set(filters);
  const recursive = filters.filter((filter) => filter.endsWith("/...") || filter === "...").map((filter) => filter.slice(0, -3));

  return (path: string) => {
    const dir = dirname(path);
    if (exact.has(dir)) {
      return true;
    }
    const terminated = `${dir}/`;
    return recursive.some((prefix) => terminated.startsWith(prefix));
  };
}

function trimTrailingSlash(value: string): string {
  return value.length > 1 && value.endsWith("/") ? value.slice(0, -1) : value;
}

/**
 * Top level group of the project. Its path leads from the folder holding the .xcodeproj to the
 * workspace root, so every file reference below it can be workspace-relative.
 */
export function mainGroupForOutputFolder(outputFolder: string, workspaceRoot: string): Group {
  const output = trimTrailingSlash(outputFolder);
  const root = trimTrailingSlash(workspaceRoot);

  if (output === root) {
    return new Group({ name: "mainGroup", sourceTree: SourceTree.SourceRoot });
  }

  // Workspace below the output folder
  if (root.startsWith(`${output}/`)) {
    return new Group({ name: "mainGroup", path: root.slice(output.length + 1), sourceTree: SourceTree.SourceRoot });
  }

  // Output folder below the workspace: walk back up
  if (output.startsWith(`${root}/`)) {
    const depth = output
      .slice(root.length + 1)
      .split("/")
      .filter((component) => component !== "").length;
    const relative = Array.from({ length: depth }, () => "..").join("/");
    return new Group({ name: "mainGroup", path: relative, sourceTree: SourceTree.SourceRoot });
  }

  return new Group({ name: "mainGroup", path: root, sourceTree: SourceTree.Absolute });
}

/**
 * Directory build scripts should run in for the given main group, or "" for the project folder
 */
export function workingDirectoryForGroup(group: Group): string {
  switch (group.sourceTree) {
    case SourceTree.SourceRoot:
      return group.path ? `\${SRCROOT}/${group.path}` : "";
    case SourceTree.Absolute:
      return group.path ?? "";
    default:
      return "";
  }
}

/**
 * Build setting value pointing at a file through the workspace or execution root variables
 */
export function projectRefForFileInfo(info: BazelFileInfo): string {
  if (info.isSource) {
    return `$(${EXECUTION_ROOT_VAR})/${info.fullPath}`;
  }
  return `$(${WORKSPACE_ROOT_VAR})/${info.fullPath}`;
}
