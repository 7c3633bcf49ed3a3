//! Typed configuration read from the CI environment.

import { z } from "zod";
import { DEFAULT_DESCRIPTOR_BASE_URL, type RubySet } from "./descriptors.js";
import { ConfigError } from "./errors.js";
import { type Repository, parseRepository } from "./octokitReleaseApi.js";
import type { MatrixOptions } from "./plan.js";
import type { ReconcileOptions } from "./reconcile.js";

export const DEFAULT_RUNTIME_REPO = "tamatebako/tebako-runtime-ruby";
export const DEFAULT_PACKAGES_DIR = "runtime-packages";
export const DEFAULT_MATRIX_PATH = "build-matrix.json";

export type Env = Record<string, string | undefined>;

const requiredVar = (key: string) => {
  const message = `${key} environment variable is required`;
  return z.string({ required_error: message }).min(1, message);
};

const optionalVar = z
  .string()
  .optional()
  .transform((value) => (value === "" ? undefined : value));

const releaseEnvSchema = z.object({
  GITHUB_TOKEN: requiredVar("GITHUB_TOKEN"),
  TEBAKO_VERSION: requiredVar("TEBAKO_VERSION"),
  FORCE_REBUILD: optionalVar,
  RUNTIME_REPO: optionalVar,
});

const matrixEnvSchema = z.object({
  GITHUB_TOKEN: optionalVar,
  GITHUB_EVENT_NAME: optionalVar,
  RUNTIME_REPO: optionalVar,
});

const parseEnv = <T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> => {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return result.data;
};

export type ReleaseConfig = ReconcileOptions & {
  token: string;
  repository: Repository;
};

export const loadReleaseConfig = (
  env: Env,
  overrides: { packagesDir?: string; forceRebuild?: boolean } = {},
): ReleaseConfig => {
  const vars = parseEnv(releaseEnvSchema, env);
  return {
    token: vars.GITHUB_TOKEN,
    version: vars.TEBAKO_VERSION,
    forceRebuild: overrides.forceRebuild || vars.FORCE_REBUILD === "true",
    packagesDir: overrides.packagesDir ?? DEFAULT_PACKAGES_DIR,
    repository: parseRepository(vars.RUNTIME_REPO ?? DEFAULT_RUNTIME_REPO),
  };
};

export type MatrixConfig = MatrixOptions & {
  token?: string;
  repository: Repository;
  outputPath: string;
};

export type MatrixArgs = {
  version: string;
  forceRebuild?: boolean;
  tidy?: boolean;
  output?: string;
  descriptorBaseUrl?: string;
  exeExtension?: boolean;
  skipLookupOnForce?: boolean;
};

/// Pull requests build the reduced ruby set.
export const selectRubySet = (tidy: boolean, eventName?: string): RubySet =>
  tidy || eventName === "pull_request" ? "tidy" : "full";

export const loadMatrixConfig = (args: MatrixArgs, env: Env): MatrixConfig => {
  if (args.version.trim() === "") {
    throw new ConfigError("Tebako version is required");
  }
  const vars = parseEnv(matrixEnvSchema, env);
  return {
    version: args.version.trim(),
    forceRebuild: args.forceRebuild ?? false,
    descriptorBaseUrl: args.descriptorBaseUrl ?? DEFAULT_DESCRIPTOR_BASE_URL,
    rubySet: selectRubySet(args.tidy ?? false, vars.GITHUB_EVENT_NAME),
    appendWindowsExeExtension: args.exeExtension ?? false,
    skipExistingLookupOnForceRebuild: args.skipLookupOnForce ?? false,
    token: vars.GITHUB_TOKEN,
    repository: parseRepository(vars.RUNTIME_REPO ?? DEFAULT_RUNTIME_REPO),
    outputPath: args.output ?? DEFAULT_MATRIX_PATH,
  };
};
