import { createWriteStream } from "node:fs";
import { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const satisfies ReadonlyArray<LogLevel>;

export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  /** Derive a logger that tags every line with `scope`. */
  child: (scope: string) => Logger;
};

/** Anything with a `write(line)`; process.stderr and fs write streams both fit. */
export interface LogSink {
  write(line: string): unknown;
}

export interface FileLogSink extends LogSink {
  close(): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  scope?: string;
  /** Colorize level tags. Defaults to whether stderr is a TTY. */
  color?: boolean;
  now?: () => Date;
}

type EmittingLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

function levelColors(
  chalk: ChalkInstance,
): Readonly<Record<EmittingLevel, (text: string) => string>> {
  return {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "warn";
  const sink = options.sink ?? process.stderr;
  const color = options.color ?? Boolean(process.stderr.isTTY);
  const now = options.now ?? (() => new Date());
  const threshold = LEVEL_RANK[level];
  // Own instance: the default one sizes its color support from stdout.
  const paint = levelColors(new Chalk({ level: color ? 1 : 0 }));

  const emit =
    (lineLevel: EmittingLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LEVEL_RANK[lineLevel] < threshold) return;

      const tag = lineLevel.toUpperCase();
      const parts = [
        now().toISOString(),
        paint[lineLevel](tag),
      ];
      if (options.scope) parts.push(`[${options.scope}]`);
      parts.push(message, ...args.map(formatArg));
      sink.write(`${parts.join(" ")}\n`);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (scope) =>
      createLogger({
        ...options,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};

/** Append-mode file sink for `--log-file`. */
export function createFileSink(path: string): FileLogSink {
  const stream = createWriteStream(path, { flags: "a" });

  return {
    write: (line) => stream.write(line),
    close: () =>
      new Promise<void>((resolve, reject) => {
        stream.once("error", reject);
        stream.end(() => resolve());
      }),
  };
}
