import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { readJsonFile } from "./files";
import { expandEnvVars } from "./helpers";

export const DEFAULT_CONFIG_FILE = "bazel-xcodeproj.json";

const perConfigOptionsSchema = z
  .object({
    Debug: z.string().optional(),
    Release: z.string().optional(),
  })
  .strict();

const targetOptionsSchema = z
  .object({
    settings: z.record(z.string()).optional(),
    buildOptions: perConfigOptionsSchema.optional(),
    startupOptions: perConfigOptionsSchema.optional(),
    preBuildScript: z.string().optional(),
    postBuildScript: z.string().optional(),
  })
  .strict();

const configSchema = z
  .object({
    "project.name": z.string().min(1),
    "project.workspaceRoot": z.string(),
    "project.outputFolder": z.string(),
    "project.buildTargets": z.array(z.string()),
    "project.sourceFilters": z.array(z.string()),
    "project.additionalFilePaths": z.array(z.string()),
    "bazel.path": z.string(),
    "bazel.ruleEntriesPath": z.string(),
    "bazel.buildOptions": perConfigOptionsSchema,
    "bazel.startupOptions": perConfigOptionsSchema,
    "build.settings": z.record(z.string()),
    "build.targets": z.record(targetOptionsSchema),
    "build.preBuildScript": z.string(),
    "build.postBuildScript": z.string(),
    "generator.suppressCompilerDefines": z.boolean(),
    "generator.improvedImportAutocompletion": z.boolean(),
    "generator.suppressSwiftUpdateCheck": z.boolean(),
    "system.logLevel": z.enum(["debug", "info", "warn", "error"]),
    "system.enableSentry": z.boolean(),
  })
  .partial()
  .strict();

export type Config = z.infer<typeof configSchema>;
export type ConfigKey = keyof Config;
export type PerConfigOptions = z.infer<typeof perConfigOptionsSchema>;
export type TargetOptions = z.infer<typeof targetOptionsSchema>;

let currentConfig: Config = {};

/**
 * Expand environment variables in every string of a parsed JSON tree
 */
function expandTree(value: unknown): unknown {
  if (typeof value === "string") {
    return expandEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandTree(item));
  }
  if (value && typeof value === "object") {
    const expanded: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      expanded[k] = expandTree(v);
    }
    return expanded;
  }
  return value;
}

export function parseConfig(raw: unknown, configPath?: string): Config {
  const result = configSchema.safeParse(expandTree(raw));
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      path: configPath,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

export async function loadWorkspaceConfig(configPath: string): Promise<Config> {
  const raw = await readJsonFile(configPath);
  const config = parseConfig(raw, configPath);

  // Relative paths in the file are relative to the file itself
  const baseDir = path.dirname(path.resolve(configPath));
  if (config["project.workspaceRoot"] !== undefined) {
    config["project.workspaceRoot"] = path.resolve(baseDir, config["project.workspaceRoot"]);
  } else {
    config["project.workspaceRoot"] = baseDir;
  }

  currentConfig = config;
  return config;
}

export function setWorkspaceConfig(config: Config): void {
  currentConfig = config;
}

export function getWorkspaceConfig<K extends ConfigKey>(key: K): Config[K] | undefined {
  return currentConfig[key];
}
