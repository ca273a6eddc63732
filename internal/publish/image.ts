/**
 * Image build commands.
 *
 * Arguments are built as plain data so they can be asserted on without a
 * docker daemon. Build args never carry credentials: registry auth is
 * handled by the login steps.
 */
import path from "node:path";
import { splitCommandLine, type CommandRunner } from "./commands";
import type { PublishConfig } from "./config";
import { ConfigError } from "./errors";
import type { TagSelection } from "./tag";

const SECRET_LIKE = ["TOKEN", "PASSWORD", "SECRET", "KEY", "CREDENTIAL"];

export function assertNoSecretsInBuildArgs(buildArgs: Record<string, string>) {
  for (const [k, v] of Object.entries(buildArgs)) {
    const upper = k.toUpperCase();
    if (SECRET_LIKE.some((f) => upper.includes(f))) {
      throw new ConfigError(`build arg "${k}" looks secret-like. Use registry auth, not build args.`);
    }
    if (v.includes("\r") || v.includes("\0") || v.includes("\n")) {
      throw new ConfigError(`build arg "${k}" contains invalid control characters`);
    }
  }
}

export function buildImageArgs(image: PublishConfig["image"], selection: TagSelection): string[] {
  assertNoSecretsInBuildArgs(selection.buildArgs);

  const args = ["buildx", "build", "--file", path.posix.join(image.context, image.dockerfile), "--tag", selection.tag];
  for (const [k, v] of Object.entries(selection.buildArgs)) {
    args.push("--build-arg", `${k}=${v}`);
  }
  if (selection.push) args.push("--push");
  args.push(image.context);
  return args;
}

export async function setupBuilder(runner: CommandRunner): Promise<void> {
  await runner.run("docker", ["buildx", "create", "--use"]);
}

export async function buildPackage(
  runner: CommandRunner,
  pkg: NonNullable<PublishConfig["package"]>,
  workspace: string
): Promise<void> {
  const { command, args } = splitCommandLine(pkg.command);
  await runner.run(command, args, { cwd: path.resolve(workspace, pkg.workingDirectory) });
}

export async function buildAndPushImage(
  runner: CommandRunner,
  image: PublishConfig["image"],
  selection: TagSelection,
  workspace: string
): Promise<void> {
  await runner.run("docker", buildImageArgs(image, selection), { cwd: workspace });
}
