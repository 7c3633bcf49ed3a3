import { PatternExtractionError } from "./errors.js";

export type PlatformFamily = "macos" | "ubuntu" | "windows" | "alpine";

export type Arch = "x86_64" | "arm64" | "x64";

/// One OS/toolchain environment from a platform descriptor.
export type EnvironmentRecord = {
  os: string;
  ALPINE_VER?: string;
  [key: string]: unknown;
};

export type TaggedEnvironment = EnvironmentRecord & {
  platform: PlatformFamily;
};

export type Platform = {
  family: PlatformFamily;
  arches: ReadonlyArray<Arch>;
  platformName: (env: EnvironmentRecord) => string;
};

export type Platforms = Record<PlatformFamily, Platform>;

// Extracts the first capture of the pattern from the os string.
const osVersion = (family: PlatformFamily, os: string, pattern: RegExp) => {
  const version = pattern.exec(os)?.[1];
  if (version === undefined) {
    throw new PatternExtractionError(
      `Cannot extract ${family} version from os "${os}" (expected ${pattern})`,
    );
  }
  return version;
};

// All the platform families we build runtimes for.
export const all = {
  macos: {
    family: "macos",
    arches: ["x86_64", "arm64"],
    platformName: ({ os }) => `macos${osVersion("macos", os, /macos-(\d+)/)}`,
  },
  ubuntu: {
    family: "ubuntu",
    arches: ["x86_64", "arm64"],
    platformName: ({ os }) =>
      `ubuntu${osVersion("ubuntu", os, /ubuntu-(\d+\.\d+)/)}`,
  },
  windows: {
    family: "windows",
    arches: ["x64"],
    platformName: () => "windows",
  },
  alpine: {
    family: "alpine",
    arches: ["x86_64", "arm64"],
    platformName: (env) => {
      const version = env.ALPINE_VER;
      if (typeof version !== "string" || version === "") {
        throw new PatternExtractionError(
          `Cannot extract alpine version: os "${env.os}" has no ALPINE_VER`,
        );
      }
      return `alpine${version}`;
    },
  },
} satisfies Platforms;

/// Descriptor documents published per release, in the order they are read.
export const descriptorSources = [
  "macos",
  "ubuntu",
  "windows-msys",
  "alpine",
] as const;

export type DescriptorSource = (typeof descriptorSources)[number];

/// The family a descriptor source describes, without its installer suffix.
export const familyOf = (source: DescriptorSource): PlatformFamily => {
  switch (source) {
    case "windows-msys":
      return "windows";
    default:
      return source;
  }
};
