/**
 * Registry login.
 *
 * Credentials arrive as an explicit struct from the action inputs; nothing
 * here reads process.env for secrets. Each secret is masked before any
 * command sees it.
 */
import * as core from "@actions/core";
import type { CommandRunner } from "./commands";
import type { PublishConfig } from "./config";
import { ConfigError } from "./errors";

export type AwsCredentials = {
  accessKeyId: string;
  secretAccessKey: string;
  /** Overrides registries.ecr.region from the publish config. */
  region?: string;
};

export type DockerHubCredentials = {
  username: string;
  password: string;
};

export type RegistryCredentials = {
  aws?: AwsCredentials;
  dockerHub?: DockerHubCredentials;
};

export type RegistryLogin = {
  name: string;
  login: (runner: CommandRunner) => Promise<void>;
};

export function ecrHost(registryId: string, region: string): string {
  return `${registryId}.dkr.ecr.${region}.amazonaws.com`;
}

function maskAll(values: Array<string | undefined>) {
  for (const v of values) if (v) core.setSecret(v);
}

/**
 * Builds the login steps the config asks for. Fails before anything runs if
 * a configured registry has no credentials (or ECR has no region).
 */
export function planRegistryLogins(
  registries: PublishConfig["registries"],
  credentials: RegistryCredentials
): RegistryLogin[] {
  const logins: RegistryLogin[] = [];

  const ecr = registries.ecr;
  if (ecr) {
    const aws = credentials.aws;
    if (!aws || !aws.accessKeyId || !aws.secretAccessKey) {
      throw new ConfigError("registries.ecr is configured but aws_access_key_id / aws_secret_access_key are missing");
    }
    const region = aws.region || ecr.region;
    if (!region) {
      throw new ConfigError("registries.ecr requires a region (set registries.ecr.region or the aws_region input)");
    }
    maskAll([aws.accessKeyId, aws.secretAccessKey]);

    const awsEnv = {
      AWS_ACCESS_KEY_ID: aws.accessKeyId,
      AWS_SECRET_ACCESS_KEY: aws.secretAccessKey,
      AWS_REGION: region,
      AWS_DEFAULT_REGION: region,
    };

    for (const registryId of ecr.registries) {
      const host = ecrHost(registryId, region);
      logins.push({
        name: `Login to Amazon ECR (${host})`,
        login: async (runner) => {
          const { stdout } = await runner.run("aws", ["ecr", "get-login-password", "--region", region], {
            env: awsEnv,
            silent: true,
          });
          const password = stdout.trim();
          if (password) core.setSecret(password);
          await runner.run("docker", ["login", "--username", "AWS", "--password-stdin", host], { input: password });
        },
      });
    }
  }

  const hub = registries.dockerHub;
  if (hub) {
    const creds = credentials.dockerHub;
    if (!creds || !creds.username || !creds.password) {
      throw new ConfigError("registries.dockerHub is configured but docker_username / docker_password are missing");
    }
    maskAll([creds.username, creds.password]);

    const args = ["login", "--username", creds.username, "--password-stdin"];
    if (hub.registry) args.push(hub.registry);

    logins.push({
      name: `Login to Docker Hub${hub.registry ? ` (${hub.registry})` : ""}`,
      login: async (runner) => {
        await runner.run("docker", args, { input: creds.password });
      },
    });
  }

  return logins;
}
