import * as core from "@actions/core";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readInputs, runAction, type ActionInputs } from "./action";
import { ConfigError, MissingVersionError } from "./errors";
import type { PublishReport } from "./report";
import { RecordingRunner } from "./testing/recording-runner";

vi.mock("@actions/core", () => ({
  getInput: vi.fn(),
  setOutput: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
  warning: vi.fn(),
  notice: vi.fn(),
  error: vi.fn(),
  setSecret: vi.fn(),
  group: vi.fn(async (_name: string, fn: () => Promise<unknown>) => fn()),
}));

const actionPath = path.resolve(__dirname, "../../.github/actions/docker-publish");

const CONFIG = [
  "schemaVersion: 1",
  "properties:",
  "  versionKey: app_version",
  "image:",
  "  name: example-org/example-app",
  "registries:",
  "  dockerHub: {}",
  "",
].join("\n");

function givenInputs(values: Record<string, string>) {
  vi.mocked(core.getInput).mockImplementation((name: string) => values[name] ?? "");
}

function readReport(reportPath: string): PublishReport {
  return JSON.parse(fs.readFileSync(reportPath, "utf8"));
}

describe("runAction", () => {
  let workspace: string;
  let runner: RecordingRunner;

  function inputs(overrides: Partial<ActionInputs> = {}): ActionInputs {
    return {
      mode: "",
      configPath: ".publish/docker.yml",
      dryRun: false,
      credentials: { dockerHub: { username: "test-user", password: "test-password" } },
      ...overrides,
    };
  }

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "publish-action-"));
    fs.mkdirSync(path.join(workspace, ".publish"));
    fs.writeFileSync(path.join(workspace, ".publish", "docker.yml"), CONFIG);
    runner = new RecordingRunner();
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it("publishes, writes evidence and sets outputs", async () => {
    fs.writeFileSync(path.join(workspace, "gradle.properties"), "app_version=0.25.0\n");

    const outcome = await runAction(inputs({ mode: "release" }), { workspace, actionPath, runner });

    const reportPath = path.join(workspace, ".audit", "PUBLISH", "publish-report.json");
    expect(outcome.reportPath).toBe(reportPath);
    const report = readReport(reportPath);
    expect(report.ok).toBe(true);
    expect(report.result.tag).toBe("example-org/example-app:0.25.0-cpu");
    expect(fs.existsSync(path.join(workspace, ".audit", "PUBLISH", "publish-summary.md"))).toBe(true);

    expect(core.setOutput).toHaveBeenCalledWith("tag", "example-org/example-app:0.25.0-cpu");
    expect(core.setOutput).toHaveBeenCalledWith("version", "0.25.0");
    expect(core.setOutput).toHaveBeenCalledWith("pushed", "true");
    expect(core.setOutput).toHaveBeenCalledWith("report_path", reportPath);
  });

  it("still writes the report when the pipeline fails", async () => {
    await expect(runAction(inputs({ mode: "release" }), { workspace, actionPath, runner })).rejects.toThrow(
      MissingVersionError
    );

    const report = readReport(path.join(workspace, ".audit", "PUBLISH", "publish-report.json"));
    expect(report.ok).toBe(false);
    expect(report.error?.code).toBe("MISSING_VERSION");
    expect(report.result.mode).toBe("release");
    expect(report.result.steps.at(-1)?.status).toBe("failure");
    expect(core.setOutput).toHaveBeenCalledWith("pushed", "false");
    expect(core.error).toHaveBeenCalledWith(`Publish failed: see ${path.join(".audit", "PUBLISH", "publish-report.json")}`);
  });

  it("records config problems with their issues", async () => {
    await expect(
      runAction(inputs({ configPath: "missing.yml" }), { workspace, actionPath, runner })
    ).rejects.toThrow(ConfigError);

    const report = readReport(path.join(workspace, ".audit", "PUBLISH", "publish-report.json"));
    expect(report.ok).toBe(false);
    expect(report.error?.code).toBe("CONFIG_INVALID");
    expect(report.error?.issues?.[0]?.code).toBe("CONFIG_NOT_FOUND");
    expect(report.result).toEqual({ skipped: false, pushed: false, steps: [] });
    expect(runner.calls).toEqual([]);
  });

  it("records half-filled credentials as a config error", async () => {
    await expect(
      runAction(inputs({ credentials: { dockerHub: { username: "test-user", password: "" } } }), {
        workspace,
        actionPath,
        runner,
      })
    ).rejects.toThrow("registries.dockerHub is configured but docker_username / docker_password are missing");

    const report = readReport(path.join(workspace, ".audit", "PUBLISH", "publish-report.json"));
    expect(report.error?.code).toBe("CONFIG_INVALID");
    expect(runner.calls).toEqual([]);
  });

  it("writes evidence when the action path is unknown", async () => {
    await expect(runAction(inputs(), { workspace, runner })).rejects.toThrow("GITHUB_ACTION_PATH is not set");

    const report = readReport(path.join(workspace, ".audit", "PUBLISH", "publish-report.json"));
    expect(report.error?.code).toBe("UNEXPECTED");
  });
});

describe("readInputs", () => {
  it("reads flags without throwing on unexpected values", () => {
    givenInputs({ dry_run: "yes" });
    expect(readInputs().dryRun).toBe(false);

    givenInputs({ dry_run: "TRUE" });
    expect(readInputs().dryRun).toBe(true);
  });

  it("defaults the config path and leaves empty credentials out", () => {
    givenInputs({ mode: "release" });
    expect(readInputs()).toEqual({
      mode: "release",
      configPath: ".publish/docker.yml",
      dryRun: false,
      credentials: { aws: undefined, dockerHub: undefined },
    });
  });

  it("keeps a half-filled credential pair", () => {
    givenInputs({ docker_username: "test-user" });
    expect(readInputs().credentials.dockerHub).toEqual({ username: "test-user", password: "" });
  });
});
