import fs from "fs-extra";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LoggerState {
  verbose: boolean;
  quiet: boolean; // Console output off; the file sink still writes
  logFile: string | null;
}

const state: LoggerState = {
  verbose: false,
  quiet: false,
  logFile: null,
};

export function configureLogger(options: Partial<LoggerState>): void {
  if (options.verbose !== undefined) state.verbose = options.verbose;
  if (options.quiet !== undefined) state.quiet = options.quiet;
  if (options.logFile !== undefined) {
    state.logFile = options.logFile;
    if (state.logFile) fs.ensureFileSync(state.logFile);
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
  if (typeof arg === "string") return arg;
  return JSON.stringify(arg);
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (level === "debug" && !state.verbose) return;

  if (!state.quiet) {
    switch (level) {
      case "error":
        console.error(message, ...args);
        break;
      case "warn":
        console.warn(message, ...args);
        break;
      default:
        console.log(message, ...args);
    }
  }

  if (state.logFile) {
    const line = [message, ...args.map(formatArg)].join(" ");
    fs.appendFileSync(
      state.logFile,
      `${new Date().toISOString()} ${level.toUpperCase()} ${line}\n`
    );
  }
}

export const logger = {
  debug: (message: string, ...args: unknown[]) => write("debug", message, args),
  info: (message: string, ...args: unknown[]) => write("info", message, args),
  warn: (message: string, ...args: unknown[]) => write("warn", message, args),
  error: (message: string, ...args: unknown[]) => write("error", message, args),
};
