import { pathToFileURL } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import { render } from "ink";
import Game from "./components/Game";
import {
  type GameConfig,
  type GameConfigOverrides,
  GameConfigError,
  resolveGameConfig,
} from "./game/config";
import {
  type LogLevel,
  LOG_LEVELS,
  createFileSink,
  createLogger,
  isLogLevel,
} from "./game/utils/logger";

export type CliOptions = {
  width?: number;
  height?: number;
  tickMs?: number;
  foodMs?: number;
  frameMs?: number;
  logLevel: LogLevel;
  logFile?: string;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(", ")}.`);
  }
  return value;
}

export function createProgram(): Command {
  return new Command()
    .name("snake")
    .description("Grid snake in the terminal")
    .option("--width <cells>", "arena width in cells", parseNumber)
    .option("--height <cells>", "arena height in cells", parseNumber)
    .option("--tick-ms <ms>", "movement period", parseNumber)
    .option("--food-ms <ms>", "food spawn period", parseNumber)
    .option("--frame-ms <ms>", "frame driver period", parseNumber)
    .option("--log-level <level>", "debug, info, warn, error or silent", parseLogLevel, "warn")
    .option("--log-file <path>", "append log lines to a file instead of stderr");
}

export function parseCliArgs(argv: ReadonlyArray<string>, program = createProgram()): CliOptions {
  return program.parse([...argv], { from: "user" }).opts<CliOptions>();
}

export function toConfigOverrides(options: CliOptions): GameConfigOverrides {
  return {
    arena: { width: options.width, height: options.height },
    moveIntervalMs: options.tickMs,
    foodSpawnIntervalMs: options.foodMs,
    frameIntervalMs: options.frameMs,
  };
}

export async function main(argv: ReadonlyArray<string> = process.argv.slice(2)): Promise<number> {
  const options = parseCliArgs(argv);

  let config: GameConfig;
  try {
    config = resolveGameConfig(toConfigOverrides(options));
  } catch (error) {
    if (error instanceof GameConfigError) {
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const sink = options.logFile ? createFileSink(options.logFile) : undefined;
  const logger = createLogger({
    level: options.logLevel,
    sink,
    color: sink ? false : undefined,
  });
  logger.child("cli").info("starting", config);

  const app = render(<Game config={config} logger={logger} />);
  await app.waitUntilExit();
  await sink?.close();
  return 0;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
