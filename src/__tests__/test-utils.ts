import { createLogger, type Logger } from "@/game/utils/logger";

export interface RecordingLogger {
  logger: Logger;
  /** Emitted lines without their trailing newline. */
  lines: string[];
}

/** Debug-level, uncolored logger pinned to the epoch. */
export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const logger = createLogger({
    level: "debug",
    color: false,
    now: () => new Date(0),
    sink: { write: (line: string) => lines.push(line.replace(/\n$/, "")) },
  });
  return { logger, lines };
}

/** Create a deterministic RNG that always returns a fixed value. */
export function fixedRng(value: number): () => number {
  return () => value;
}

/** Create an RNG that returns values from a sequence. */
export function sequenceRng(values: number[]): () => number {
  let index = 0;
  return () => {
    const val = values[index % values.length];
    index++;
    return val;
  };
}

const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** Lines of an Ink frame with color codes removed. */
export function frameLines(frame: string | undefined): string[] {
  return stripAnsi(frame ?? "")
    .split("\n")
    .map((line) => line.trimEnd());
}

/** Resolve after `ms` of real time; lets React flush passive effects. */
export function delay(ms = 20): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
