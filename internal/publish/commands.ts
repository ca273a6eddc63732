/**
 * Command runner seam.
 *
 * Every external tool (aws, docker, the package build) goes through a
 * CommandRunner so the pipeline can be run for real, printed (dry run),
 * or recorded in tests.
 */
import * as core from "@actions/core";
import * as exec from "@actions/exec";
import { ExternalToolFailure } from "./errors";

export type RunOptions = {
  cwd?: string;
  env?: Record<string, string>;
  /** Piped to stdin. Treated as secret: never logged. */
  input?: string;
  /** Keep stdout/stderr out of the job log (used when stdout is a credential). */
  silent?: boolean;
};

export type RunResult = {
  exitCode: number;
  stdout: string;
};

export interface CommandRunner {
  /** True when commands are only printed; nothing is built or pushed. */
  readonly dryRun: boolean;
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

/**
 * Splits a configured command line on whitespace.
 * No quoting support; package commands are expected to be simple.
 */
export function splitCommandLine(line: string): { command: string; args: string[] } {
  const [command, ...args] = line.trim().split(/\s+/).filter(Boolean);
  if (!command) throw new Error("empty command line");
  return { command, args };
}

export class ExecCommandRunner implements CommandRunner {
  readonly dryRun = false;

  async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    core.debug(`exec: ${formatCommand(command, args)}${options.cwd ? ` (cwd: ${options.cwd})` : ""}`);

    const env: Record<string, string> = {};
    for (const [k, v] of Object.entries(process.env)) {
      if (v !== undefined) env[k] = v;
    }

    let out: exec.ExecOutput;
    try {
      out = await exec.getExecOutput(command, args, {
        cwd: options.cwd,
        env: { ...env, ...options.env },
        input: options.input !== undefined ? Buffer.from(options.input, "utf8") : undefined,
        silent: options.silent ?? false,
        ignoreReturnCode: true,
      });
    } catch (err) {
      throw new ExternalToolFailure(command, undefined, err);
    }

    if (out.exitCode !== 0) throw new ExternalToolFailure(command, out.exitCode);
    return { exitCode: out.exitCode, stdout: out.stdout };
  }
}

export type RecordedCommand = {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  hasInput: boolean;
};

/**
 * Prints what would run and returns success. stdout is always empty, so a
 * dry-run ECR login pipes nothing into docker login (which is also not run).
 */
export class DryRunCommandRunner implements CommandRunner {
  readonly dryRun = true;
  readonly commands: RecordedCommand[] = [];

  async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    this.commands.push({
      command,
      args,
      cwd: options.cwd,
      env: options.env,
      hasInput: options.input !== undefined,
    });
    core.info(`[dry-run] ${formatCommand(command, args)}${options.cwd ? ` (cwd: ${options.cwd})` : ""}`);
    return { exitCode: 0, stdout: "" };
  }
}
