//! The CLI commands, wired to the environment but with injectable
//! collaborators.

import * as core from "@actions/core";
import type { AxiosInstance } from "axios";
import {
  type Env,
  type MatrixArgs,
  type MatrixConfig,
  type ReleaseConfig,
  loadMatrixConfig,
  loadReleaseConfig,
} from "./config.js";
import { defaultHttp } from "./descriptors.js";
import { actionsLogger, type Logger } from "./log.js";
import { octokitReleaseApi } from "./octokitReleaseApi.js";
import { type Matrix, buildMatrix, writeMatrix } from "./plan.js";
import { type ReconcileResult, reconcileRelease } from "./reconcile.js";
import type { ReleaseApi } from "./releaseApi.js";

export type CommandDeps = {
  env: Env;
  log?: Logger;
  http?: AxiosInstance;
  releaseApi?: (config: MatrixConfig | ReleaseConfig) => ReleaseApi;
  setOutput?: (name: string, value: unknown) => void;
};

const defaultReleaseApi = (config: MatrixConfig | ReleaseConfig) =>
  octokitReleaseApi({ repository: config.repository, token: config.token });

export const matrixCommand = async (
  args: MatrixArgs,
  {
    env,
    log = actionsLogger,
    http = defaultHttp(),
    releaseApi = defaultReleaseApi,
    setOutput = core.setOutput,
  }: CommandDeps,
): Promise<Matrix> => {
  const config = loadMatrixConfig(args, env);
  const include = await buildMatrix(config, {
    http,
    releaseApi: releaseApi(config),
    log,
  });
  const matrix = await writeMatrix(config.outputPath, include);
  log.info(`Wrote ${include.length} build jobs to ${config.outputPath}`);

  // Export the matrix so it's available to the following workflow jobs.
  if (env["GITHUB_OUTPUT"]) {
    setOutput("matrix", matrix);
  }
  return matrix;
};

export type UploadArgs = {
  packagesDir?: string;
  forceRebuild?: boolean;
};

export const uploadCommand = async (
  args: UploadArgs,
  { env, log = actionsLogger, releaseApi = defaultReleaseApi }: CommandDeps,
): Promise<ReconcileResult> => {
  const config = loadReleaseConfig(env, args);
  return reconcileRelease(config, { releaseApi: releaseApi(config), log });
};

/// Logs the error with its stack and marks the run as failed.
export const reportFailure = (error: unknown, log: Logger = actionsLogger) => {
  const message = error instanceof Error ? error.message : String(error);
  log.error(`Error: ${message}`);
  if (error instanceof Error && error.stack !== undefined) {
    log.info(error.stack);
  }
  process.exitCode = 1;
};
