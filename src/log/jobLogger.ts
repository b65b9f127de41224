import fs from "fs";
import path from "path";

export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export type LoggerOptions = {
  // Lines are also appended here, for monitoring long unattended runs.
  logFile?: string;
  // Suppresses console output; the log file (if any) is still written.
  quiet?: boolean;
};

export function createJobLogger(jobLabel: string, opts: LoggerOptions = {}): Logger {
  if (opts.logFile) fs.mkdirSync(path.dirname(path.resolve(opts.logFile)), { recursive: true });

  const write = (level: "info" | "warn" | "error", msg: string) => {
    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] [${jobLabel}] ${level === "info" ? "" : level.toUpperCase() + " "}${msg}`;
    if (!opts.quiet) {
      if (level === "error") console.error(line);
      else if (level === "warn") console.warn(line);
      else console.log(line);
    }
    if (opts.logFile) fs.appendFileSync(opts.logFile, line + "\n", "utf8");
  };

  return {
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg) => write("error", msg)
  };
}
