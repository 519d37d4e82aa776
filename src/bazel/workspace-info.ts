import { exec } from "../common/exec";
import { commonLogger } from "../common/logger";

// The first call may start the Bazel server
const BAZEL_INFO_TIMEOUT_MS = 120_000;

export type WorkspaceInfo = {
  executionRoot: string;
  outputBase: string;
  packagePath: string;
};

/**
 * Parses `key: value` lines printed by `bazel info`. Values may contain ": " themselves.
 */
export function parseBazelInfo(output: string): WorkspaceInfo {
  const info: WorkspaceInfo = { executionRoot: "", outputBase: "", packagePath: "" };
  for (const line of output.split(/\r?\n/)) {
    const [key, ...valueParts] = line.split(": ");
    if (!key || valueParts.length === 0) {
      continue;
    }
    const value = valueParts.join(": ");
    switch (key) {
      case "execution_root":
        info.executionRoot = value;
        break;
      case "output_base":
        info.outputBase = value;
        break;
      case "package_path":
        info.packagePath = value;
        break;
    }
  }
  return info;
}

/**
 * Runs `bazel info` once for a workspace. Every getter waits for that single run; a failure
 * rejects all of them.
 */
export class WorkspaceInfoFetcher {
  private bazelPath: string;
  private workspaceRoot: string;
  private pending: Promise<WorkspaceInfo> | undefined;

  constructor(options: { bazelPath: string; workspaceRoot: string }) {
    this.bazelPath = options.bazelPath;
    this.workspaceRoot = options.workspaceRoot;
  }

  /**
   * Starts the fetch if it hasn't been started yet
   */
  fetch(): Promise<WorkspaceInfo> {
    if (!this.pending) {
      this.pending = this.run();
    }
    return this.pending;
  }

  async getExecutionRoot(): Promise<string> {
    const info = await this.fetch();
    return info.executionRoot;
  }

  async getOutputBase(): Promise<string> {
    const info = await this.fetch();
    return info.outputBase;
  }

  async getPackagePath(): Promise<string> {
    const info = await this.fetch();
    return info.packagePath;
  }

  private async run(): Promise<WorkspaceInfo> {
    commonLogger.debug("Fetching bazel path info", {
      bazelPath: this.bazelPath,
      workspaceRoot: this.workspaceRoot,
    });
    const stdout = await exec({
      command: this.bazelPath,
      args: ["info", "execution_root", "output_base", "package_path"],
      cwd: this.workspaceRoot,
      timeoutMs: BAZEL_INFO_TIMEOUT_MS,
    });
    return parseBazelInfo(stdout);
  }
}
