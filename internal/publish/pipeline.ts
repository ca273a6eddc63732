/**
 * Publish pipeline.
 *
 * Strictly sequential, fail-fast:
 *   mode -> repository guard -> builder -> registry logins -> version
 *   -> package build -> image build/push
 *
 * The first failing step aborts the run; nothing is rolled back. Step
 * records survive the failure so the caller can still write evidence.
 */
import path from "node:path";
import * as core from "@actions/core";
import type { CommandRunner } from "./commands";
import type { PublishConfig } from "./config";
import { MissingVersionError, errorMessage } from "./errors";
import { buildAndPushImage, buildPackage, setupBuilder } from "./image";
import { modeRequiresVersion, parseMode, type PublishMode } from "./mode";
import { resolveVersion } from "./properties";
import { planRegistryLogins, type RegistryCredentials } from "./registry";
import { selectTag, type TagSelection } from "./tag";

export type StepStatus = "success" | "failure";

export type StepRecord = {
  name: string;
  status: StepStatus;
  durationMs: number;
  error?: string;
};

export type PublishRequest = Readonly<{
  mode: PublishMode;
  version?: string;
  pushEnabled: boolean;
}>;

export type PublishResult = {
  skipped: boolean;
  skipReason?: string;
  mode?: PublishMode;
  request?: PublishRequest;
  tag?: string;
  pushed: boolean;
  steps: StepRecord[];
};

export type PipelineOptions = {
  config: PublishConfig;
  /** Raw trigger input; "" means nightly. */
  mode: string;
  credentials: RegistryCredentials;
  runner: CommandRunner;
  workspace: string;
  /** owner/name of the repository running the workflow (GITHUB_REPOSITORY). */
  currentRepository?: string;
  now?: () => number;
};

export class PublishPipeline {
  private readonly result: PublishResult = { skipped: false, pushed: false, steps: [] };
  private readonly now: () => number;

  constructor(private readonly options: PipelineOptions) {
    this.now = options.now ?? (() => Date.now());
  }

  /** Current state; complete after run() settles, partial if it threw. */
  snapshot(): PublishResult {
    return { ...this.result, steps: [...this.result.steps] };
  }

  async run(): Promise<PublishResult> {
    const { config, credentials, runner, workspace, currentRepository } = this.options;

    const mode = parseMode(this.options.mode);
    this.result.mode = mode;

    if (config.repository && currentRepository && config.repository !== currentRepository) {
      this.result.skipped = true;
      this.result.skipReason = `repository ${currentRepository} is not ${config.repository}`;
      core.notice(`Skipping publish: ${this.result.skipReason}`);
      return this.snapshot();
    }

    // Fail on missing credentials before any tool runs.
    const logins = planRegistryLogins(config.registries, credentials);

    await this.step("Setup Docker buildx", () => setupBuilder(runner));

    for (const l of logins) {
      await this.step(l.name, () => l.login(runner));
    }

    const selection = await this.step("Resolve version", async (): Promise<TagSelection> => {
      const propsPath = path.resolve(workspace, config.properties.path);
      const version = resolveVersion(propsPath, config.properties.versionKey);

      if (!version) {
        if (modeRequiresVersion(mode)) throw new MissingVersionError(`${config.properties.path} (${config.properties.versionKey})`);
        core.warning(`${config.properties.versionKey} not found in ${config.properties.path}; continuing with nightly tag`);
      } else {
        core.info(`${config.properties.versionKey}=${version}`);
      }

      const selected = selectTag(mode, version, config.image.name, {
        flavor: config.image.flavor,
        versionBuildArg: config.image.versionBuildArg,
      });
      this.result.request = { mode, version, pushEnabled: selected.push };
      this.result.tag = selected.tag;
      core.info(`Selected tag ${selected.tag} (push=${selected.push})`);
      return selected;
    });

    const pkg = config.package;
    if (pkg) {
      await this.step("Build package", () => buildPackage(runner, pkg, workspace));
    }

    await this.step(`Build and push ${mode} image`, () => buildAndPushImage(runner, config.image, selection, workspace));
    this.result.pushed = selection.push && !runner.dryRun;

    return this.snapshot();
  }

  private async step<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const start = this.now();
    try {
      const value = await core.group(name, fn);
      this.result.steps.push({ name, status: "success", durationMs: this.now() - start });
      return value;
    } catch (err) {
      this.result.steps.push({ name, status: "failure", durationMs: this.now() - start, error: errorMessage(err) });
      throw err;
    }
  }
}

export function runPublish(options: PipelineOptions): Promise<PublishResult> {
  return new PublishPipeline(options).run();
}
