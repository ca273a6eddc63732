import * as exec from "@actions/exec";
import { describe, expect, it, vi } from "vitest";
import { DryRunCommandRunner, ExecCommandRunner, formatCommand, splitCommandLine } from "./commands";
import { ExternalToolFailure } from "./errors";

vi.mock("@actions/core", () => ({
  debug: vi.fn(),
  info: vi.fn(),
}));

vi.mock("@actions/exec", () => ({
  getExecOutput: vi.fn(),
}));

describe("ExecCommandRunner", () => {
  it("returns stdout on success and forwards options", async () => {
    vi.mocked(exec.getExecOutput).mockResolvedValueOnce({ exitCode: 0, stdout: "ok\n", stderr: "" });

    const result = await new ExecCommandRunner().run("docker", ["login", "--password-stdin"], {
      cwd: "/work",
      env: { AWS_REGION: "us-east-2" },
      input: "test-password",
      silent: true,
    });

    expect(result).toEqual({ exitCode: 0, stdout: "ok\n" });
    const [command, args, options] = vi.mocked(exec.getExecOutput).mock.calls[0] ?? [];
    expect(command).toBe("docker");
    expect(args).toEqual(["login", "--password-stdin"]);
    expect(options?.cwd).toBe("/work");
    expect(options?.silent).toBe(true);
    expect(options?.ignoreReturnCode).toBe(true);
    expect(options?.env?.AWS_REGION).toBe("us-east-2");
    expect(options?.input?.toString("utf8")).toBe("test-password");
  });

  it("throws ExternalToolFailure on a non-zero exit", async () => {
    vi.mocked(exec.getExecOutput).mockResolvedValueOnce({ exitCode: 2, stdout: "", stderr: "denied" });

    const err = await new ExecCommandRunner().run("aws", ["ecr", "get-login-password"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalToolFailure);
    if (err instanceof ExternalToolFailure) {
      expect(err.command).toBe("aws");
      expect(err.exitCode).toBe(2);
      expect(err.message).toBe("aws failed with exit code 2");
    }
  });

  it("throws ExternalToolFailure when the tool cannot be started", async () => {
    const spawnError = new Error("Unable to locate executable file: aws");
    vi.mocked(exec.getExecOutput).mockRejectedValueOnce(spawnError);

    const err = await new ExecCommandRunner().run("aws", ["ecr", "get-login-password"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalToolFailure);
    if (err instanceof ExternalToolFailure) {
      expect(err.code).toBe("EXTERNAL_TOOL_FAILURE");
      expect(err.exitCode).toBeUndefined();
      expect(err.cause).toBe(spawnError);
      expect(err.message).toBe("aws could not be started: Unable to locate executable file: aws");
    }
  });
});

describe("DryRunCommandRunner", () => {
  it("records commands without running them", async () => {
    const runner = new DryRunCommandRunner();
    const result = await runner.run("docker", ["buildx", "create", "--use"]);
    await runner.run("docker", ["login", "--password-stdin"], { input: "test-password" });

    expect(result).toEqual({ exitCode: 0, stdout: "" });
    expect(runner.commands).toEqual([
      { command: "docker", args: ["buildx", "create", "--use"], cwd: undefined, env: undefined, hasInput: false },
      { command: "docker", args: ["login", "--password-stdin"], cwd: undefined, env: undefined, hasInput: true },
    ]);
    expect(exec.getExecOutput).not.toHaveBeenCalled();
  });
});

describe("command lines", () => {
  it("splits on whitespace", () => {
    expect(splitCommandLine("  ./setup.py   bdist_wheel ")).toEqual({ command: "./setup.py", args: ["bdist_wheel"] });
  });

  it("rejects an empty line", () => {
    expect(() => splitCommandLine("   ")).toThrow("empty command line");
  });

  it("formats for logs", () => {
    expect(formatCommand("docker", ["buildx", "create"])).toBe("docker buildx create");
  });
});
