import type { Logger } from "./log.js";

export type LogLine = {
  level: "info" | "warning" | "error" | "group";
  message: string;
};

/// A `Logger` that keeps what it is given.
export const recordingLogger = (): Logger & {
  lines: LogLine[];
  messages: (level: LogLine["level"]) => string[];
} => {
  const lines: LogLine[] = [];
  const text = (message: string | Error) =>
    message instanceof Error ? message.message : message;
  return {
    lines,
    messages: (level) =>
      lines.filter((line) => line.level === level).map((line) => line.message),
    info: (message) => {
      lines.push({ level: "info", message });
    },
    warning: (message) => {
      lines.push({ level: "warning", message: text(message) });
    },
    error: (message) => {
      lines.push({ level: "error", message: text(message) });
    },
    startGroup: (name) => {
      lines.push({ level: "group", message: name });
    },
    endGroup: () => {},
  };
};
