import fs from "fs";
import path from "path";

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

type Level = "info" | "warn" | "error";

/**
 * Timestamped console logger that also appends every line to `file` for
 * monitoring long unattended runs.
 */
export function createLogger(opts: { file?: string } = {}): Logger {
  if (opts.file) fs.mkdirSync(path.dirname(opts.file), { recursive: true });

  const write = (level: Level, msg: string) => {
    const line = `[${new Date().toISOString()}] ${msg}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
    if (opts.file) fs.appendFileSync(opts.file, line + "\n", "utf8");
  };

  return {
    info: msg => write("info", msg),
    warn: msg => write("warn", msg),
    error: msg => write("error", msg)
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};
