import { parse, quote } from "shell-quote";
import type { PerConfigOptions } from "../common/config";
import { ConfigError } from "../common/errors";
import { BUILD_CONFIG_NAMES } from "./constants";

/**
 * Emits `<flag> <value> -- ` once when every configuration uses the same value, otherwise one
 * `<flag>[<Config>] <value> -- ` group per configuration that has a value.
 */
export function perConfigFlags(flag: string, values: PerConfigOptions): string {
  const perConfig = BUILD_CONFIG_NAMES.map((config) => ({ config, value: values[config] }));
  const first = perConfig[0].value;
  if (first !== undefined && perConfig.every(({ value }) => value === first)) {
    return `${flag} ${first} -- `;
  }

  let out = "";
  for (const { config, value } of perConfig) {
    if (value === undefined) {
      continue;
    }
    out += `${flag}[${config}] ${value} -- `;
  }
  return out;
}

/**
 * Command line of the script phase that asks Bazel to build `label`
 */
export function buildScriptCommandline(options: {
  scriptPath: string;
  label: string;
  bazelPath: string;
  bazelBinPath: string;
  buildOptions?: PerConfigOptions;
  startupOptions?: PerConfigOptions;
}): string {
  let commandLine =
    `"${options.scriptPath}" ` +
    `${options.label} ` +
    `--bazel "${options.bazelPath}" ` +
    `--bazel_bin_path "${options.bazelBinPath}" ` +
    "--verbose ";
  commandLine += perConfigFlags("--bazel_options", options.buildOptions ?? {});
  commandLine += perConfigFlags("--bazel_startup_options", options.startupOptions ?? {});
  return commandLine;
}

/**
 * Splits a user supplied option string into words the way a shell would. Variables are kept as
 * written so the words match the string the build script receives; operators, globs and
 * comments are rejected.
 */
export function splitShellWords(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const words: string[] = [];
  for (const entry of parse(value, (name) => `$${name}`)) {
    if (typeof entry !== "string") {
      throw new ConfigError("Unsupported shell syntax in option string", {
        issues: [`"${value}" contains ${"op" in entry ? `"${entry.op}"` : "a comment"}`],
      });
    }
    words.push(entry);
  }
  return words;
}

export function quoteShellWords(words: readonly string[]): string {
  return quote([...words]);
}
