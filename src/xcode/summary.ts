import path from "node:path";
import { parse as parseChevrotain } from "@bacons/xcode/json";
import { readTextFile } from "../common/files";
import { compareStrings, uniqueFilter } from "../common/helpers";

export type TargetSummary = {
  name: string;
  isa: string;
  productType: string | undefined;
  dependencies: number;
};

export type ProjectSummary = {
  targets: TargetSummary[];
  configurations: string[];
};

const TARGET_ISAS: ReadonlySet<string> = new Set(["PBXNativeTarget", "PBXLegacyTarget"]);

function field(object: unknown, key: string): unknown {
  if (object && typeof object === "object" && key in object) {
    return Object.getOwnPropertyDescriptor(object, key)?.value;
  }
  return undefined;
}

function stringField(object: unknown, key: string): string | undefined {
  const value = field(object, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Lists targets and configuration names of a `project.pbxproj`, read back as plain objects
 */
export function summarizeProject(contents: string): ProjectSummary {
  const parsed = parseChevrotain(contents);
  const objects: Record<string, unknown> = parsed.objects ?? {};

  const targets: TargetSummary[] = [];
  const configurations: string[] = [];
  for (const object of Object.values(objects)) {
    const isa = stringField(object, "isa");
    if (isa === "XCBuildConfiguration") {
      const name = stringField(object, "name");
      if (name) {
        configurations.push(name);
      }
      continue;
    }

    const name = stringField(object, "name");
    if (isa && name && TARGET_ISAS.has(isa)) {
      const dependencies = field(object, "dependencies");
      targets.push({
        name,
        isa,
        productType: stringField(object, "productType"),
        dependencies: Array.isArray(dependencies) ? dependencies.length : 0,
      });
    }
  }

  targets.sort((a, b) => compareStrings(a.name, b.name));
  return {
    targets,
    configurations: configurations.filter(uniqueFilter).sort(compareStrings),
  };
}

/**
 * Reads `<bundle>/project.pbxproj`. Accepts the bundle or the project file itself.
 */
export async function inspectProject(projectPath: string): Promise<ProjectSummary> {
  const pbxprojPath = projectPath.endsWith(".pbxproj") ? projectPath : path.join(projectPath, "project.pbxproj");
  const contents = await readTextFile(pbxprojPath);
  return summarizeProject(contents);
}

export function formatSummary(summary: ProjectSummary): string {
  const lines = ["Targets:"];
  for (const target of summary.targets) {
    const kind = target.productType ?? "legacy";
    lines.push(`  ${target.name} (${kind}, ${target.dependencies} dependencies)`);
  }
  lines.push("Configurations:");
  for (const name of summary.configurations) {
    lines.push(`  ${name}`);
  }
  return lines.join("\n");
}
