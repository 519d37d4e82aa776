import type { RuleEntry } from "../bazel/rule-entry";
import { dirname } from "../xcode/file-types";
import { EXECUTION_ROOT_VAR, INCLUDES_PATH, OUTPUT_BASE_VAR, WORKSPACE_ROOT_VAR } from "./constants";

const EXTERNAL_PREFIX = "external/";

/**
 * Compiler settings of one rule as Xcode needs them for indexing. Sets keep insertion order and
 * drop repeats.
 */
export type CompileSettings = {
  defines: Set<string>;
  includes: Set<string>;
  otherCFlags: string[];
  swiftIncludePaths: Set<string>;
  otherSwiftFlags: string[];
};

function rootedInExecutionRoot(path: string): string {
  return path.startsWith("/") ? path : `$(${EXECUTION_ROOT_VAR})/${path}`;
}

/**
 * Include paths declared by the rule, rooted at the variable of the tree they live in. Generated
 * headers only exist under the execution root; external repositories are referenced through the
 * output base, which survives between builds.
 */
export function includePathsForEntry(entry: RuleEntry): string[] {
  return entry.includePaths.map(({ path, recursive }) => {
    let variable = WORKSPACE_ROOT_VAR;
    if (path.startsWith(INCLUDES_PATH)) {
      variable = EXECUTION_ROOT_VAR;
    } else if (path.startsWith(EXTERNAL_PREFIX)) {
      variable = OUTPUT_BASE_VAR;
    }
    const rooted = `$(${variable})/${path}`;
    return recursive ? `${rooted}/**` : rooted;
  });
}

export function swiftIncludePathsForEntry(entry: RuleEntry): string[] {
  return entry.swiftTransitiveModules.map((module) => `$(${EXECUTION_ROOT_VAR})/${dirname(module.fullPath)}`);
}

/**
 * Module maps are loaded explicitly so Clang never sees a header both as modular and as textual
 */
export function otherSwiftFlagsForEntry(entry: RuleEntry): string[] {
  const flags = entry.objCModuleMaps.map((map) => `-Xcc -fmodule-map-file=$(${EXECUTION_ROOT_VAR})/${map.fullPath}`);
  for (const define of entry.swiftDefines) {
    flags.push(`-D${define}`);
  }
  return flags;
}

/**
 * Sorts the rule's own compiler options into settings: `-D` and `-I` are picked apart, anything
 * else is passed through as is.
 */
export function addLocalSettings(entry: RuleEntry, settings: CompileSettings): void {
  for (const opt of entry.attributes.swiftc_opts ?? []) {
    if (opt.startsWith("-I")) {
      settings.swiftIncludePaths.add(rootedInExecutionRoot(opt.slice(2)));
    } else {
      settings.otherSwiftFlags.push(opt);
    }
  }

  for (const opt of entry.attributes.copts ?? []) {
    if (opt.startsWith("-D")) {
      settings.defines.add(opt.slice(2));
    } else if (opt.startsWith("-I")) {
      settings.includes.add(rootedInExecutionRoot(opt.slice(2)));
    } else {
      settings.otherCFlags.push(opt);
    }
  }
}

export function resolveCompileSettings(
  entry: RuleEntry,
  options?: { suppressCompilerDefines?: boolean },
): CompileSettings {
  const defines = new Set(entry.attributes.defines ?? []);
  if (!options?.suppressCompilerDefines) {
    for (const define of entry.attributes.compiler_defines ?? []) {
      defines.add(define);
    }
  }

  const settings: CompileSettings = {
    defines,
    includes: new Set(includePathsForEntry(entry)),
    otherCFlags: [],
    swiftIncludePaths: new Set(),
    otherSwiftFlags: [],
  };
  addLocalSettings(entry, settings);
  settings.otherSwiftFlags.push(...otherSwiftFlagsForEntry(entry));
  for (const path of swiftIncludePathsForEntry(entry)) {
    settings.swiftIncludePaths.add(path);
  }
  return settings;
}

/**
 * `-D` flags for OTHER_CFLAGS in a stable order. Defines with whitespace are quoted unless they
 * already are.
 */
export function defineFlags(defines: Iterable<string>): string[] {
  return [...defines].sort().map((define) => {
    const quoted = (define.startsWith('"') && define.endsWith('"')) || (define.startsWith("'") && define.endsWith("'"));
    if (/\s/.test(define) && !quoted) {
      return `-D"${define}"`;
    }
    return `-D${define}`;
  });
}
