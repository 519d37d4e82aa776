import { ExecBaseError, ExecError } from "./errors";
import { exec } from "./exec";
import { Logger } from "./logger";

jest.mock("execa", () => jest.fn());

const mockExeca = jest.requireMock<jest.Mock>("execa");

function execaResult(fields: { stdout?: string; stderr?: string; exitCode?: number; failed?: boolean; timedOut?: boolean; signal?: string }) {
  return {
    command: "bazel info",
    stdout: "",
    stderr: "",
    failed: false,
    timedOut: false,
    killed: false,
    ...fields,
  };
}

describe("exec", () => {
  beforeEach(() => {
    Logger.writer = () => {};
    mockExeca.mockReset();
  });

  it("returns stdout of a successful command", async () => {
    mockExeca.mockResolvedValue(execaResult({ stdout: "release 7.0.0", exitCode: 0 }));

    await expect(exec({ command: "bazel", args: ["info"], cwd: "/workspace", timeoutMs: 50 })).resolves.toBe("release 7.0.0");
    expect(mockExeca).toHaveBeenCalledWith("bazel", ["info"], { cwd: "/workspace", env: {}, timeout: 50, reject: false });
  });

  it("reports a command that could not be started as ExecBaseError", async () => {
    mockExeca.mockResolvedValue(execaResult({ failed: true }));

    const error = await exec({ command: "bazel", args: ["info"], cwd: "/workspace" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExecBaseError);
    expect(error).not.toBeInstanceOf(ExecError);
    expect(error).toHaveProperty("message", 'Failed to run "bazel"');
    expect(error).toHaveProperty("context", {
      command: "bazel",
      args: ["info"],
      cwd: "/workspace",
      errorMessage: "[process did not start]",
    });
  });

  it("reports a non-zero exit with its stderr", async () => {
    mockExeca.mockResolvedValue(execaResult({ failed: true, exitCode: 2, stderr: "ERROR: no workspace" }));

    const error = await exec({ command: "bazel", args: ["info"], cwd: "/workspace" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExecError);
    expect(error).toHaveProperty("message", '"bazel" exited with code 2');
    expect(error).toHaveProperty("context.errorMessage", "ERROR: no workspace");
  });

  it("reports a timeout", async () => {
    mockExeca.mockResolvedValue(execaResult({ failed: true, timedOut: true, signal: "SIGTERM" }));

    await expect(exec({ command: "bazel", args: ["info"], cwd: "/workspace", timeoutMs: 50 })).rejects.toThrow(
      '"bazel" timed out after 50 ms',
    );
  });

  it("reports a command killed by a signal", async () => {
    mockExeca.mockResolvedValue(execaResult({ failed: true, signal: "SIGKILL" }));

    await expect(exec({ command: "bazel", args: ["info"], cwd: "/workspace" })).rejects.toThrow('"bazel" was killed by SIGKILL');
  });
});
