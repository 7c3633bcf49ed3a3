import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export type CleanupFn = () => void | Promise<void>;

export type CleanupStack = {
  push: (fn: CleanupFn) => void;
  run: () => Promise<void>;
};

/// Cleanups run in reverse order of registration.
export const cleanupStack = (): CleanupStack => {
  const stack: CleanupFn[] = [];
  return {
    push: (fn) => {
      stack.push(fn);
    },
    run: async () => {
      for (let fn = stack.pop(); fn !== undefined; fn = stack.pop()) {
        await fn();
      }
    },
  };
};

/// Creates a fresh directory under the OS temp dir, removed on cleanup.
export const makeTempDir = async (cleanup: CleanupStack, prefix: string) => {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  cleanup.push(() => rm(dir, { recursive: true, force: true }));
  return dir;
};

export const writeFiles = async (
  dir: string,
  files: Record<string, string>,
) => {
  for (const [name, contents] of Object.entries(files)) {
    await writeFile(join(dir, name), contents);
  }
};
