import * as core from "@actions/core";

/// The part of `@actions/core` the library logs through.
export type Logger = Pick<
  typeof core,
  "info" | "warning" | "error" | "startGroup" | "endGroup"
>;

export const actionsLogger: Logger = core;
