import { mkdir, symlink } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "./errors.js";
import { listPackages } from "./packages.js";
import { recordingLogger } from "./recordingLogger.js";
import {
  type CleanupStack,
  cleanupStack,
  makeTempDir,
  writeFiles,
} from "./tempDir.js";

const macos = "tebako-ruby-0.12.5-3.4.1-macos14-arm64";
const windows = "tebako-ruby-0.12.5-3.4.1-windows-x64";

describe("listPackages", () => {
  let cleanup: CleanupStack;
  let dir: string;
  beforeEach(async () => {
    cleanup = cleanupStack();
    dir = await makeTempDir(cleanup, "runtime-packages-");
  });
  afterEach(() => cleanup.run());

  it("lists the files sorted by name", async () => {
    await writeFiles(dir, { [windows]: "win", [macos]: "mac" });

    expect(await listPackages(dir, recordingLogger())).toEqual([
      { filename: macos, path: join(dir, macos) },
      { filename: windows, path: join(dir, windows) },
    ]);
  });

  it("follows symlinks to files", async () => {
    const build = await makeTempDir(cleanup, "runtime-build-");
    await writeFiles(build, { [macos]: "mac" });
    await writeFiles(dir, { [windows]: "win" });
    await symlink(join(build, macos), join(dir, macos));

    const packages = await listPackages(dir, recordingLogger());

    expect(packages.map(({ filename }) => filename)).toEqual([macos, windows]);
  });

  it("warns about entries that are not files", async () => {
    await writeFiles(dir, { [windows]: "win" });
    await mkdir(join(dir, "nested"));
    await symlink(join(dir, "gone"), join(dir, "dangling"));
    const log = recordingLogger();

    const packages = await listPackages(dir, log);

    expect(packages.map(({ filename }) => filename)).toEqual([windows]);
    expect(log.messages("warning")).toEqual([
      "Skipping dangling: not a regular file",
      "Skipping nested: not a regular file",
    ]);
  });

  it("rejects a missing directory", async () => {
    const missing = join(dir, "missing");

    await expect(listPackages(missing, recordingLogger())).rejects.toThrow(
      new ConfigError(`No runtime packages directory found: ${missing}`),
    );
  });

  it("rejects a directory without files", async () => {
    await mkdir(join(dir, "nested"));

    await expect(listPackages(dir, recordingLogger())).rejects.toThrow(
      `No packages found in ${dir}`,
    );
  });
});
