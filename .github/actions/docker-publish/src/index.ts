/**
 * docker-publish action
 *
 * Builds and pushes a container image under a nightly or release tag:
 *   - nightly (default, cron runs): <image>:<flavor>-nightly
 *   - release (manual dispatch):    <image>:<version>-<flavor>
 *
 * The version comes from a key=value properties file in the caller repo.
 * Registry credentials come from action inputs only.
 *
 * Schema lookup:
 *   GITHUB_WORKSPACE is the *caller* repo. The schema ships with this action,
 *   so it is read relative to GITHUB_ACTION_PATH
 *   (.github/actions/docker-publish -> repo root).
 *
 * Bundled with ncc (dist/index.js) for zero-install CI usage.
 */

import * as core from "@actions/core";
import { readEnvironment, readInputs, runAction } from "../../../../internal/publish/action";

runAction(readInputs(), readEnvironment()).catch((err: unknown) => {
  core.setFailed(err instanceof Error ? err.message : String(err));
});
