import { writeFile } from "node:fs/promises";
import type { AxiosInstance } from "axios";
import * as platforms from "./platforms.js";
import {
  type PlatformDescriptor,
  type RubySet,
  fetchDescriptor,
} from "./descriptors.js";
import { actionsLogger, type Logger } from "./log.js";
import { evalMatrix, logMatrix, uniqueBy } from "./matrix.js";
import {
  type ReleaseApi,
  type ReleaseAsset,
  describeApiError,
} from "./releaseApi.js";

export type BuildJob = {
  runtimeVersion: string;
  os: string;
  platform: platforms.PlatformFamily;
  platformName: string;
  arch: platforms.Arch;
  filename: string;
  releaseInfo?: { url: string };
};

export type Matrix = { include: BuildJob[] };

export type MatrixOptions = {
  version: string;
  forceRebuild: boolean;
  descriptorBaseUrl: string;
  rubySet: RubySet;
  /// Append `.exe` to windows filenames.
  appendWindowsExeExtension: boolean;
  /// With `forceRebuild`, do not look for existing release assets at all.
  skipExistingLookupOnForceRebuild: boolean;
};

export type MatrixDeps = {
  http: AxiosInstance;
  releaseApi: ReleaseApi;
  log?: Logger;
};

export const releaseTag = (version: string) => `v${version}`;

export const artifactFilename = (
  version: string,
  runtimeVersion: string,
  platformName: string,
  arch: platforms.Arch,
  extension = "",
) =>
  `tebako-ruby-${version}-${runtimeVersion}-${platformName}-${arch}${extension}`;

/// Downloads every descriptor, keyed by its source.
export const loadDescriptors = async (
  http: AxiosInstance,
  options: Pick<MatrixOptions, "descriptorBaseUrl" | "version" | "rubySet">,
) => {
  const descriptors = new Map<platforms.DescriptorSource, PlatformDescriptor>();
  for (const source of platforms.descriptorSources) {
    descriptors.set(
      source,
      await fetchDescriptor(http, {
        baseUrl: options.descriptorBaseUrl,
        version: options.version,
        source,
        rubySet: options.rubySet,
      }),
    );
  }
  return descriptors;
};

/// The assets already published for the version. Lookup failures degrade to
/// an empty snapshot, since the matrix is still usable for fresh builds.
export const fetchExistingAssets = async (
  releaseApi: ReleaseApi,
  version: string,
  log: Logger,
): Promise<ReadonlyMap<string, ReleaseAsset>> => {
  const tag = releaseTag(version);
  log.info(`Checking release ${tag}`);

  const release = await releaseApi.getReleaseByTag(tag);
  if (!release.ok) {
    const cause =
      release.error.kind === "notFound"
        ? `release ${tag} not found`
        : describeApiError(release.error);
    log.warning(`No release info available: ${cause}`);
    return new Map();
  }

  const assets = await releaseApi.listReleaseAssets(release.value);
  if (!assets.ok) {
    log.warning(
      `No release info available: ${describeApiError(assets.error)}`,
    );
    return new Map();
  }
  return new Map(assets.value.map((asset) => [asset.name, asset]));
};

/// Tags every environment with the family of the descriptor it came from.
export const tagEnvironments = (
  descriptors: ReadonlyMap<platforms.DescriptorSource, PlatformDescriptor>,
): platforms.TaggedEnvironment[] =>
  [...descriptors].flatMap(([source, descriptor]) =>
    descriptor.env.map((env) => ({
      ...env,
      platform: platforms.familyOf(source),
    })),
  );

export const buildJobs = (
  options: Pick<MatrixOptions, "version" | "appendWindowsExeExtension">,
  runtimeVersions: ReadonlyArray<string>,
  environments: ReadonlyArray<platforms.TaggedEnvironment>,
  existingAssets: ReadonlyMap<string, ReleaseAsset>,
): BuildJob[] => {
  const combinations = evalMatrix<{
    runtimeVersion: string;
    environment: platforms.TaggedEnvironment;
  }>({ runtimeVersion: runtimeVersions, environment: environments });

  const jobs = combinations.flatMap(({ runtimeVersion, environment }) => {
    const platform: platforms.Platform = platforms.all[environment.platform];
    const platformName = platform.platformName(environment);
    const extension =
      platform.family === "windows" && options.appendWindowsExeExtension
        ? ".exe"
        : "";

    return platform.arches.map((arch): BuildJob => {
      const filename = artifactFilename(
        options.version,
        runtimeVersion,
        platformName,
        arch,
        extension,
      );
      const asset = existingAssets.get(filename);
      return {
        runtimeVersion,
        os: environment.os,
        platform: platform.family,
        platformName,
        arch,
        filename,
        ...(asset && { releaseInfo: { url: asset.downloadUrl } }),
      };
    });
  });

  return uniqueBy(jobs, (job) => job.filename);
};

export const buildMatrix = async (
  options: MatrixOptions,
  { http, releaseApi, log = actionsLogger }: MatrixDeps,
): Promise<BuildJob[]> => {
  log.info(`Using ${options.rubySet} ruby versions for tebako ${options.version}`);
  const descriptors = await loadDescriptors(http, options);

  // Ruby versions in first-seen order across all the descriptors.
  const runtimeVersions = [
    ...new Set([...descriptors.values()].flatMap((d) => d.ruby)),
  ];
  const environments = tagEnvironments(descriptors);

  let existingAssets: ReadonlyMap<string, ReleaseAsset> = new Map();
  if (options.forceRebuild && options.skipExistingLookupOnForceRebuild) {
    log.info("Force rebuild requested, not looking up existing packages");
  } else {
    existingAssets = await fetchExistingAssets(
      releaseApi,
      options.version,
      log,
    );
  }

  const include = buildJobs(
    options,
    runtimeVersions,
    environments,
    existingAssets,
  );

  // Print the matrix, useful for local debugging.
  log.startGroup("Generated build matrix");
  logMatrix(log, { include });
  log.endGroup();

  return include;
};

export const writeMatrix = async (path: string, include: BuildJob[]) => {
  const matrix: Matrix = { include };
  await writeFile(path, JSON.stringify(matrix));
  return matrix;
};
