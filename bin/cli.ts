#!/usr/bin/env node
import { cac } from "cac";
import {
  DEFAULT_MATRIX_PATH,
  DEFAULT_PACKAGES_DIR,
} from "../lib/config.js";
import {
  type UploadArgs,
  matrixCommand,
  reportFailure,
  uploadCommand,
} from "../lib/commands.js";

type MatrixCommandOptions = {
  forceRebuild: boolean;
  tidy: boolean;
  output: string;
  descriptorBaseUrl?: string;
  exeExtension: boolean;
  skipLookupOnForce: boolean;
};

const cli = cac("tebako-runtime-ci");

cli
  .command("matrix <version>", "Generate build matrix for given tebako version")
  .option("--force-rebuild", "Force rebuild all packages", { default: false })
  .option("--tidy", "Use the reduced ruby version set", { default: false })
  .option("--output <path>", "Where to write the matrix", {
    default: DEFAULT_MATRIX_PATH,
  })
  .option("--descriptor-base-url <url>", "Where platform descriptors live")
  .option("--exe-extension", "Append .exe to windows package names", {
    default: false,
  })
  .option(
    "--skip-lookup-on-force",
    "Do not look up existing packages when force rebuilding",
    { default: false },
  )
  .action(async (version: string, options: MatrixCommandOptions) => {
    await matrixCommand({ version: String(version), ...options }, {
      env: process.env,
    });
  });

cli
  .command("upload", "Upload runtime packages to the tebako version release")
  .option("--packages-dir <dir>", "Directory with the built packages", {
    default: DEFAULT_PACKAGES_DIR,
  })
  .option("--force-rebuild", "Replace packages that are already published", {
    default: false,
  })
  .action(async (options: UploadArgs) => {
    await uploadCommand(options, { env: process.env });
  });

cli.help();

const main = async () => {
  cli.parse(process.argv, { run: false });
  if (cli.options["help"]) {
    return;
  }
  if (cli.matchedCommand === undefined) {
    cli.outputHelp();
    process.exitCode = 1;
    return;
  }
  await cli.runMatchedCommand();
};

main().catch((error: unknown) => reportFailure(error));
