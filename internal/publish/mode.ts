/**
 * Publish mode (v1)
 *
 * The trigger hands us a loosely-typed string (cron runs send nothing,
 * manual dispatch sends whatever was typed). It becomes a closed union here
 * and nowhere else. Matching is exact: only "", "nightly" and "release".
 *
 * - nightly: rolling tag, rebuilt on every scheduled run
 * - release: tag bound to the version from the properties file
 */

import { InvalidModeError } from "./errors";

export type PublishMode = "nightly" | "release";

export const PUBLISH_MODES: readonly PublishMode[] = ["nightly", "release"];

export const DEFAULT_MODE: PublishMode = "nightly";

function isPublishMode(value: string): value is PublishMode {
  return PUBLISH_MODES.some((m) => m === value);
}

export function parseMode(raw: string | undefined | null): PublishMode {
  const value = raw ?? "";
  if (value === "") return DEFAULT_MODE;
  if (!isPublishMode(value)) throw new InvalidModeError(value);
  return value;
}

/** Release tags are immutable and name a version; nightly tags don't. */
export function modeRequiresVersion(mode: PublishMode): boolean {
  return mode === "release";
}
