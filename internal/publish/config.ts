/**
 * Publish config loader.
 *
 * Reads the caller's publish config (YAML), validates it against
 * schemas/publish.schema.json and fills in defaults so the pipeline never
 * has to guess. Local filesystem only.
 */
import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import Ajv, { type ErrorObject, type SchemaObject } from "ajv";
import addFormats from "ajv-formats";
import { ConfigError, type ValidationIssue } from "./errors";
import { DEFAULT_FLAVOR } from "./tag";

export const DEFAULT_CONFIG_PATH = ".publish/docker.yml";

export type RawPublishConfig = {
  schemaVersion: number;
  repository?: string;
  properties: { path?: string; versionKey: string };
  package?: { workingDirectory?: string; command: string };
  image: {
    name: string;
    context?: string;
    dockerfile?: string;
    flavor?: string;
    versionBuildArg?: string;
  };
  registries?: {
    ecr?: { region?: string; registries: string[] };
    dockerHub?: { registry?: string };
  };
};

export type PublishConfig = {
  repository?: string;
  properties: { path: string; versionKey: string };
  package?: { workingDirectory: string; command: string };
  image: {
    name: string;
    context: string;
    dockerfile: string;
    flavor: string;
    versionBuildArg?: string;
  };
  registries: {
    ecr?: { region?: string; registries: string[] };
    dockerHub?: { registry?: string };
  };
};

export type LoadedSchema = { path: string; data: SchemaObject };

export function loadSchema(repoRoot: string): LoadedSchema {
  const p = path.join(repoRoot, "schemas", "publish.schema.json");
  if (!fs.existsSync(p)) throw new ConfigError(`publish.schema.json not found at: ${p}`);
  const data: SchemaObject = JSON.parse(fs.readFileSync(p, "utf8"));
  return { path: p, data };
}

function formatAjvErrors(errors: ErrorObject[]): ValidationIssue[] {
  return errors.map((e) => {
    const extra = e.keyword === "additionalProperties" ? `/${String(e.params.additionalProperty)}` : "";
    const suggestion =
      e.keyword === "enum"
        ? "Choose one of the allowed values."
        : e.keyword === "additionalProperties"
          ? "Remove the property or check its spelling."
          : undefined;

    return {
      level: "error",
      code: `SCHEMA_${e.keyword.toUpperCase()}`,
      path: `${e.instancePath}${extra}` || "(root)",
      message: e.message || "invalid value",
      suggestion,
    };
  });
}

/**
 * Schema check only. Returns the typed config on success; throws a
 * ConfigError carrying every issue otherwise.
 */
export function validatePublishConfig(raw: unknown, schema: SchemaObject): RawPublishConfig {
  const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
  addFormats(ajv);

  const validate = ajv.compile<RawPublishConfig>(schema);
  if (validate(raw)) return raw;

  const issues = formatAjvErrors(validate.errors || []);
  const first = issues[0];
  throw new ConfigError(
    `Invalid publish config: ${first ? `${first.path} ${first.message}` : "schema validation failed"}`,
    issues
  );
}

export function resolvePublishConfig(raw: RawPublishConfig): PublishConfig {
  const pkg = raw.package
    ? { workingDirectory: raw.package.workingDirectory || ".", command: raw.package.command.trim() }
    : undefined;

  return {
    repository: raw.repository,
    properties: {
      path: raw.properties.path || "gradle.properties",
      versionKey: raw.properties.versionKey,
    },
    package: pkg,
    image: {
      name: raw.image.name,
      context: raw.image.context || ".",
      dockerfile: raw.image.dockerfile || "Dockerfile",
      flavor: raw.image.flavor || DEFAULT_FLAVOR,
      versionBuildArg: raw.image.versionBuildArg,
    },
    registries: {
      ecr: raw.registries?.ecr,
      dockerHub: raw.registries?.dockerHub,
    },
  };
}

export function parsePublishConfig(rawYaml: string, schema: SchemaObject): PublishConfig {
  let raw: unknown;
  try {
    raw = yaml.load(rawYaml);
  } catch (err) {
    throw new ConfigError(`Publish config is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolvePublishConfig(validatePublishConfig(raw, schema));
}

export function loadPublishConfig(configPath: string, schema: SchemaObject): { rawYaml: string; config: PublishConfig } {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Publish config not found: ${configPath}`, [
      {
        level: "error",
        code: "CONFIG_NOT_FOUND",
        path: configPath,
        message: "publish config not found",
        suggestion: `Create ${DEFAULT_CONFIG_PATH} using docs/publish/docker.example.yml as a template.`,
      },
    ]);
  }

  const rawYaml = fs.readFileSync(configPath, "utf8");
  return { rawYaml, config: parsePublishConfig(rawYaml, schema) };
}
