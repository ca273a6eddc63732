/**
 * docker-publish action body.
 *
 * Evidence is written on every exit path, including config and schema
 * failures, before the error is rethrown for core.setFailed.
 */
import * as core from "@actions/core";
import path from "node:path";
import { DryRunCommandRunner, ExecCommandRunner, type CommandRunner } from "./commands";
import { DEFAULT_CONFIG_PATH, loadPublishConfig, loadSchema } from "./config";
import { PublishPipeline, type PublishResult } from "./pipeline";
import type { RegistryCredentials } from "./registry";
import { describeError, evidenceDirFor, writeEvidence, type PublishReport } from "./report";

export type ActionInputs = {
  mode: string;
  configPath: string;
  dryRun: boolean;
  credentials: RegistryCredentials;
};

export type ActionEnvironment = {
  /** Caller repo checkout (GITHUB_WORKSPACE). */
  workspace: string;
  /** This action's directory (GITHUB_ACTION_PATH); the schema lives three levels up. */
  actionPath?: string;
  /** owner/name (GITHUB_REPOSITORY). */
  repository?: string;
  /** Replaces the exec/dry-run runner chosen from inputs.dryRun. */
  runner?: CommandRunner;
};

export type ActionOutcome = {
  result: PublishResult;
  reportPath: string;
};

export function readCredentials(): RegistryCredentials {
  const accessKeyId = core.getInput("aws_access_key_id");
  const secretAccessKey = core.getInput("aws_secret_access_key");
  const username = core.getInput("docker_username");
  const password = core.getInput("docker_password");

  // Half-filled pairs are kept so registry login can name what is missing.
  return {
    aws:
      accessKeyId || secretAccessKey
        ? { accessKeyId, secretAccessKey, region: core.getInput("aws_region") || undefined }
        : undefined,
    dockerHub: username || password ? { username, password } : undefined,
  };
}

export function readInputs(): ActionInputs {
  return {
    mode: core.getInput("mode", { trimWhitespace: false }),
    configPath: core.getInput("config_path") || DEFAULT_CONFIG_PATH,
    dryRun: (core.getInput("dry_run") || "false").toLowerCase() === "true",
    credentials: readCredentials(),
  };
}

export function readEnvironment(): ActionEnvironment {
  return {
    workspace: process.env.GITHUB_WORKSPACE || process.cwd(),
    actionPath: process.env.GITHUB_ACTION_PATH,
    repository: process.env.GITHUB_REPOSITORY,
  };
}

function resolveActionRepoRoot(actionPath: string | undefined): string {
  if (!actionPath) throw new Error("GITHUB_ACTION_PATH is not set (expected in GitHub Actions runtime).");
  return path.resolve(actionPath, "../../..");
}

function setOutputs(result: PublishResult, reportPath: string) {
  core.setOutput("mode", result.mode ?? "");
  core.setOutput("version", result.request?.version ?? "");
  core.setOutput("tag", result.tag ?? "");
  core.setOutput("pushed", result.pushed ? "true" : "false");
  core.setOutput("skipped", result.skipped ? "true" : "false");
  core.setOutput("report_path", reportPath);
}

export async function runAction(inputs: ActionInputs, env: ActionEnvironment): Promise<ActionOutcome> {
  const t0 = Date.now();

  const absConfigPath = path.join(env.workspace, inputs.configPath);
  const evidenceDir = evidenceDirFor(env.workspace);
  const runner = env.runner ?? (inputs.dryRun ? new DryRunCommandRunner() : new ExecCommandRunner());
  let pipeline: PublishPipeline | undefined;

  const finish = (err?: unknown): ActionOutcome => {
    const result: PublishResult = pipeline?.snapshot() ?? { skipped: false, pushed: false, steps: [] };
    const report: PublishReport = {
      ok: err === undefined,
      dryRun: inputs.dryRun,
      result,
      error: err === undefined ? undefined : describeError(err),
      files: { configPath: absConfigPath, evidenceDir },
      timingsMs: { total: Date.now() - t0 },
    };
    const reportPath = writeEvidence(report);
    setOutputs(result, reportPath);
    return { result, reportPath };
  };

  try {
    const schema = loadSchema(resolveActionRepoRoot(env.actionPath));
    const { config } = loadPublishConfig(absConfigPath, schema.data);

    pipeline = new PublishPipeline({
      config,
      mode: inputs.mode,
      credentials: inputs.credentials,
      runner,
      workspace: env.workspace,
      currentRepository: env.repository,
    });

    await pipeline.run();
  } catch (err) {
    const { reportPath } = finish(err);
    core.error(`Publish failed: see ${path.relative(env.workspace, reportPath)}`);
    throw err;
  }

  const outcome = finish();
  if (outcome.result.skipped) {
    core.info("Publish skipped.");
  } else {
    core.info(`${inputs.dryRun ? "[dry-run] " : ""}Published ${outcome.result.tag ?? "(no tag)"}`);
  }
  return outcome;
}
