//! Publishes built runtime packages as assets of the version's release.

import { readFile } from "node:fs/promises";
import { actionsLogger, type Logger } from "./log.js";
import { type PackageFile, listPackages } from "./packages.js";
import { releaseTag } from "./plan.js";
import {
  type Release,
  type ReleaseApi,
  type ReleaseAsset,
  unwrap,
} from "./releaseApi.js";
import {
  categorizePackages,
  emptySections,
  generateReleaseNotes,
} from "./releaseNotes.js";

export type ReconcileOptions = {
  version: string;
  packagesDir: string;
  forceRebuild: boolean;
};

export type ReconcileDeps = {
  releaseApi: ReleaseApi;
  log?: Logger;
  now?: () => Date;
};

export type UploadOutcome = "uploaded" | "replaced" | "skipped";

export type ReconcileResult = {
  releaseId: number;
  filenames: string[];
  outcomes: Map<string, UploadOutcome>;
  body: string;
};

export const releaseTitle = (tag: string) => `Tebako runtime packages ${tag}`;

export const getOrCreateRelease = async (
  releaseApi: ReleaseApi,
  tag: string,
  date: Date,
  log: Logger,
): Promise<Release> => {
  log.info(`Looking for release with tag: ${tag}`);
  const existing = await releaseApi.getReleaseByTag(tag);
  if (existing.ok) {
    return existing.value;
  }
  if (existing.error.kind !== "notFound") {
    return unwrap<Release>(existing, `look up release ${tag}`);
  }

  log.info(`Creating new release for tag: ${tag}`);
  const created = await releaseApi.createRelease({
    tag,
    name: releaseTitle(tag),
    body: generateReleaseNotes(tag, emptySections(), date),
  });
  return unwrap(created, `create release ${tag}`);
};

const uploadPackage = async (
  releaseApi: ReleaseApi,
  release: Release,
  existingAssets: ReadonlyMap<string, ReleaseAsset>,
  pkg: PackageFile,
  forceRebuild: boolean,
  log: Logger,
): Promise<UploadOutcome> => {
  const { filename } = pkg;
  log.info(`Processing ${filename}...`);

  const existing = existingAssets.get(filename);
  if (existing !== undefined && !forceRebuild) {
    log.info(
      `Skipping upload of existing asset ${filename} (FORCE_REBUILD not set)`,
    );
    return "skipped";
  }

  const data = await readFile(pkg.path);
  if (existing !== undefined) {
    log.info(`Deleting existing asset ${filename}`);
    unwrap(
      await releaseApi.deleteAsset(existing),
      `delete existing asset ${filename}`,
    );
  }

  log.info(`Uploading ${filename}`);
  unwrap(
    await releaseApi.uploadAsset(release, {
      name: filename,
      data,
      contentType: "application/octet-stream",
    }),
    `upload ${filename}`,
  );
  return existing === undefined ? "uploaded" : "replaced";
};

export const reconcileRelease = async (
  { version, packagesDir, forceRebuild }: ReconcileOptions,
  { releaseApi, log = actionsLogger, now = () => new Date() }: ReconcileDeps,
): Promise<ReconcileResult> => {
  const tag = releaseTag(version);
  const release = await getOrCreateRelease(releaseApi, tag, now(), log);
  log.info(`Working with release ID: ${release.id}`);

  // A single snapshot of the assets, taken before anything is uploaded.
  const assets = unwrap(
    await releaseApi.listReleaseAssets(release),
    `list assets of release ${tag}`,
  );
  const existingAssets: ReadonlyMap<string, ReleaseAsset> = new Map(
    assets.map((asset) => [asset.name, asset]),
  );

  const packages = await listPackages(packagesDir, log);
  log.info(
    `Found packages:\n${packages.map((pkg) => pkg.filename).join("\n")}`,
  );

  const outcomes = new Map<string, UploadOutcome>();
  for (const pkg of packages) {
    outcomes.set(
      pkg.filename,
      await uploadPackage(
        releaseApi,
        release,
        existingAssets,
        pkg,
        forceRebuild,
        log,
      ),
    );
  }

  const filenames = packages.map((pkg) => pkg.filename);
  const body = generateReleaseNotes(tag, categorizePackages(filenames), now());
  unwrap(
    await releaseApi.updateReleaseBody(release, body),
    `update release ${tag} notes`,
  );
  log.info("Successfully updated release notes");

  return { releaseId: release.id, filenames, outcomes, body };
};
