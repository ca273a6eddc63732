import { MissingVersionError } from "./errors";
import { parseMode, type PublishMode } from "./mode";

export const DEFAULT_FLAVOR = "cpu";

export type TagSelection = {
  mode: PublishMode;
  tag: string;
  push: boolean;
  buildArgs: Record<string, string>;
};

export type TagOptions = {
  flavor?: string;
  /** Build arg that receives the version on release builds, e.g. APP_VERSION. */
  versionBuildArg?: string;
};

/**
 * Release Tag Selector.
 *
 *   ""/nightly -> <image>:<flavor>-nightly
 *   release    -> <image>:<version>-<flavor>
 *
 * Both push. Pure: the same inputs always give the same selection.
 */
export function selectTag(
  mode: string,
  version: string | undefined,
  image: string,
  options: TagOptions = {}
): TagSelection {
  const parsed = parseMode(mode);
  const flavor = options.flavor || DEFAULT_FLAVOR;

  if (parsed === "nightly") {
    return { mode: parsed, tag: `${image}:${flavor}-nightly`, push: true, buildArgs: {} };
  }

  const v = (version ?? "").trim();
  if (!v) throw new MissingVersionError();

  const buildArgs: Record<string, string> = {};
  if (options.versionBuildArg) buildArgs[options.versionBuildArg] = v;

  return { mode: parsed, tag: `${image}:${v}-${flavor}`, push: true, buildArgs };
}
