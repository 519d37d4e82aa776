import execa from "execa";
import { ExecBaseError, ExecError } from "./errors";
import { prepareEnvVars } from "./helpers";
import { commonLogger } from "./logger";

export type ExecOptions = {
  command: string;
  args: string[];
  cwd?: string;
  env?: { [key: string]: string | null };
  timeoutMs?: number;
};

/**
 * Runs a command to completion and returns its stdout. A command that can't be started throws
 * ExecBaseError; one that exits non-zero, is killed or times out throws ExecError.
 */
export async function exec(options: ExecOptions): Promise<string> {
  const invocation = {
    command: options.command,
    args: options.args,
    cwd: options.cwd ?? process.cwd(),
  };
  commonLogger.debug("Running command", { ...invocation, env: options.env, timeoutMs: options.timeoutMs });

  let result: execa.ExecaReturnValue;
  try {
    result = await execa(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: prepareEnvVars(options.env),
      timeout: options.timeoutMs,
      // Failures are read from the result
      reject: false,
    });
  } catch (error) {
    commonLogger.error("Command could not be started", { error, ...invocation });
    throw new ExecBaseError(`Failed to run "${invocation.command}"`, {
      ...invocation,
      errorMessage: error instanceof Error ? error.message : String(error),
    });
  }

  commonLogger.debug("Command finished", { ...invocation, exitCode: result.exitCode, stderr: result.stderr });

  if (result.timedOut) {
    throw new ExecError(`"${invocation.command}" timed out after ${options.timeoutMs} ms`, {
      ...invocation,
      stderr: result.stderr,
      errorMessage: result.stderr || "[no error output]",
    });
  }
  // Spawn failures (ENOENT, EACCES) come back as a failed result with neither exit code nor signal
  if (result.failed && typeof result.exitCode !== "number" && !result.signal) {
    commonLogger.error("Command could not be started", { ...invocation, stderr: result.stderr });
    throw new ExecBaseError(`Failed to run "${invocation.command}"`, {
      ...invocation,
      errorMessage: result.stderr || "[process did not start]",
    });
  }
  if (result.signal) {
    throw new ExecError(`"${invocation.command}" was killed by ${result.signal}`, {
      ...invocation,
      stderr: result.stderr,
      errorMessage: result.stderr || "[no error output]",
    });
  }
  if (result.failed || result.exitCode !== 0) {
    throw new ExecError(`"${invocation.command}" exited with code ${result.exitCode}`, {
      ...invocation,
      stderr: result.stderr,
      errorMessage: result.stderr || "[no error output]",
    });
  }
  return result.stdout;
}
