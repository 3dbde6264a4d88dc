import { z } from "zod";
import type { Direction, GridBounds, GridPos } from "./utils/grid";

// ── Arena Dimensions (grid cells) ────────────────────────────────
export const ARENA_WIDTH = 10;
export const ARENA_HEIGHT = 10;

// ── Timing ───────────────────────────────────────────────────────
export const MOVE_INTERVAL_MS = 150;
export const FOOD_SPAWN_INTERVAL_MS = 1000;
/** Period of the terminal frame driver. */
export const FRAME_INTERVAL_MS = 16;

// ── Canonical start state ───────────────────────────────────────
export const START_HEAD_POS: GridPos = Object.freeze({ x: 3, y: 3 });
export const START_SEGMENTS: ReadonlyArray<GridPos> = Object.freeze([
  Object.freeze({ x: 3, y: 2 }),
]);
export const START_DIRECTION: Direction = "up";

// ── Terminal glyphs and colors ──────────────────────────────────
export const GLYPHS = {
  SNAKE_HEAD: "@",
  SNAKE_BODY: "o",
  FOOD: "*",
  EMPTY: ".",
} as const;

export const COLORS = {
  SNAKE_HEAD: "#b3b3b3",
  SNAKE_BODY: "#4d4d4d",
  FOOD: "#ff00ff",
  EMPTY: "#333333",
  HUD: "#00f0ff",
} as const;

// ── Game configuration ──────────────────────────────────────────

export interface SnakeStartConfig {
  head: GridPos;
  /** Body cells in head-to-tail order (at least one). */
  segments: ReadonlyArray<GridPos>;
  direction: Direction;
}

export interface GameConfig {
  arena: GridBounds;
  moveIntervalMs: number;
  foodSpawnIntervalMs: number;
  frameIntervalMs: number;
  start: SnakeStartConfig;
}

export interface GameConfigOverrides {
  arena?: Partial<GridBounds>;
  moveIntervalMs?: number;
  foodSpawnIntervalMs?: number;
  frameIntervalMs?: number;
  start?: Partial<SnakeStartConfig>;
}

export const DEFAULT_GAME_CONFIG: GameConfig = Object.freeze({
  arena: Object.freeze({ width: ARENA_WIDTH, height: ARENA_HEIGHT }),
  moveIntervalMs: MOVE_INTERVAL_MS,
  foodSpawnIntervalMs: FOOD_SPAWN_INTERVAL_MS,
  frameIntervalMs: FRAME_INTERVAL_MS,
  start: Object.freeze({
    head: START_HEAD_POS,
    segments: START_SEGMENTS,
    direction: START_DIRECTION,
  }),
});

const gridPosSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

const periodSchema = z.number().finite().positive();

export const gameConfigSchema = z
  .object({
    arena: z.object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    }),
    moveIntervalMs: periodSchema,
    foodSpawnIntervalMs: periodSchema,
    frameIntervalMs: periodSchema,
    start: z.object({
      head: gridPosSchema,
      segments: z.array(gridPosSchema).min(1),
      direction: z.enum(["left", "up", "right", "down"]),
    }),
  })
  .superRefine((config, ctx) => {
    const { width, height } = config.arena;
    const cells = [config.start.head, ...config.start.segments];

    cells.forEach((cell, index) => {
      if (cell.x >= 0 && cell.y >= 0 && cell.x < width && cell.y < height) {
        return;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: index === 0 ? ["start", "head"] : ["start", "segments", index - 1],
        message: `cell (${cell.x}, ${cell.y}) is outside the ${width}x${height} arena`,
      });
    });
  });

/** Raised when configuration overrides fail validation. */
export class GameConfigError extends Error {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(
      `Invalid game configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    );
    this.name = "GameConfigError";
    this.issues = issues;
  }
}

/**
 * Merge `overrides` onto the defaults and validate the result. Fields left
 * `undefined` keep their default.
 *
 * @throws GameConfigError listing every failed field as `path: message`.
 */
export function resolveGameConfig(
  overrides: GameConfigOverrides = {},
): GameConfig {
  const defaults = DEFAULT_GAME_CONFIG;
  const candidate = {
    arena: {
      width: overrides.arena?.width ?? defaults.arena.width,
      height: overrides.arena?.height ?? defaults.arena.height,
    },
    moveIntervalMs: overrides.moveIntervalMs ?? defaults.moveIntervalMs,
    foodSpawnIntervalMs:
      overrides.foodSpawnIntervalMs ?? defaults.foodSpawnIntervalMs,
    frameIntervalMs: overrides.frameIntervalMs ?? defaults.frameIntervalMs,
    start: {
      head: overrides.start?.head ?? defaults.start.head,
      segments: overrides.start?.segments ?? defaults.start.segments,
      direction: overrides.start?.direction ?? defaults.start.direction,
    },
  };

  const result = gameConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new GameConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  return result.data;
}
