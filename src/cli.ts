#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import { DEFAULT_CONFIG_FILE, loadWorkspaceConfig } from "./common/config";
import { errorReporting } from "./common/error-reporting";
import { GeneratorError } from "./common/errors";
import { Logger, commonLogger } from "./common/logger";
import { getMetrics } from "./common/metrics";
import { GENERATOR_VERSION } from "./generator/constants";
import { ProjectGenerator } from "./generator/project-generator";
import { formatSummary, inspectProject } from "./xcode/summary";

type GenerateOptions = {
  config: string;
  output?: string;
  metrics?: boolean;
};

async function generateCommand(options: GenerateOptions): Promise<void> {
  const config = await loadWorkspaceConfig(path.resolve(options.config));
  if (config["system.logLevel"]) {
    Logger.setLevel(config["system.logLevel"]);
  }
  errorReporting.setup();
  if (options.output) {
    config["project.outputFolder"] = path.resolve(options.output);
  }

  const generator = new ProjectGenerator({ config });
  const result = await generator.generate();
  process.stdout.write(`${result.bundlePath}\n`);

  for (const warning of result.diagnostics.warnings) {
    process.stdout.write(`warning: ${warning.message}\n`);
  }
  if (options.metrics) {
    process.stdout.write(await getMetrics().metrics());
  }
}

async function inspectCommand(projectPath: string): Promise<void> {
  const summary = await inspectProject(path.resolve(projectPath));
  process.stdout.write(`${formatSummary(summary)}\n`);
}

/**
 * Runs a command and turns any failure into exit code 1
 */
function withErrorHandling<A extends unknown[]>(
  name: string,
  callback: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await errorReporting.withScope((scope) => {
        scope.setTag("command", name);
        return callback(...args);
      });
    } catch (error) {
      const context = error instanceof GeneratorError ? error.context : {};
      commonLogger.error(`Command "${name}" failed`, { error, errorContext: context });
      await errorReporting.captureException(error);
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`error: ${message}\n`);
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program.name("bazel-xcodeproj").description("Generate Xcode projects for Bazel targets").version(GENERATOR_VERSION);

program
  .command("generate")
  .description("Generate an .xcodeproj for the targets listed in the configuration file")
  .option("-c, --config <path>", "Path to the configuration file", DEFAULT_CONFIG_FILE)
  .option("-o, --output <path>", "Folder to write the .xcodeproj bundle to")
  .option("--metrics", "Print generation metrics in the Prometheus text format")
  .action(withErrorHandling("generate", (options: GenerateOptions) => generateCommand(options)));

program
  .command("inspect")
  .description("List the targets and configurations of a generated project")
  .argument("<project>", "Path to an .xcodeproj bundle or a project.pbxproj file")
  .action(withErrorHandling("inspect", (projectPath: string) => inspectCommand(projectPath)));

program.parseAsync(process.argv).catch((error: unknown) => {
  commonLogger.error("Unexpected error", { error });
  process.exitCode = 1;
});
