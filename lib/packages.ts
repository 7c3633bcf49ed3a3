import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import { actionsLogger, type Logger } from "./log.js";

export type PackageFile = {
  filename: string;
  path: string;
};

const isMissing = (error: unknown) =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "ENOENT" || error.code === "ENOTDIR");

/// Files directly inside the directory, symlinks followed, sorted by name.
export const listPackages = async (
  dir: string,
  log: Logger = actionsLogger,
): Promise<PackageFile[]> => {
  const names = await readdir(dir).catch((error: unknown) => {
    if (isMissing(error)) {
      throw new ConfigError(`No runtime packages directory found: ${dir}`);
    }
    throw error;
  });

  const packages: PackageFile[] = [];
  for (const filename of [...names].sort()) {
    const path = join(dir, filename);
    const target = await stat(path).catch((error: unknown) => {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    });
    if (target === undefined || !target.isFile()) {
      log.warning(`Skipping ${filename}: not a regular file`);
      continue;
    }
    packages.push({ filename, path });
  }

  if (packages.length === 0) {
    throw new ConfigError(`No packages found in ${dir}`);
  }
  return packages;
};
