import { ARENA_HEIGHT, ARENA_WIDTH, MOVE_INTERVAL_MS } from "../config";

export const DEFAULT_MOVE_INTERVAL_MS = MOVE_INTERVAL_MS;

/** Integer cell coordinates on the arena grid (not pixels). */
export type GridPos = Readonly<{
  x: number;
  y: number;
}>;

export type GridBounds = Readonly<{
  width: number;
  height: number;
}>;

export type Direction = "left" | "up" | "right" | "down";

export const CARDINAL_DIRECTIONS = [
  "left",
  "up",
  "right",
  "down",
] as const satisfies ReadonlyArray<Direction>;

// The vertical axis grows upward: "up" is y + 1.
const DIRECTION_VECTORS: Readonly<Record<Direction, GridPos>> = Object.freeze({
  left: Object.freeze({ x: -1, y: 0 }),
  up: Object.freeze({ x: 0, y: 1 }),
  right: Object.freeze({ x: 1, y: 0 }),
  down: Object.freeze({ x: 0, y: -1 }),
});

const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> =
  Object.freeze({
    left: "right",
    up: "down",
    right: "left",
    down: "up",
  });

export const DEFAULT_GRID_BOUNDS: GridBounds = Object.freeze({
  width: ARENA_WIDTH,
  height: ARENA_HEIGHT,
});

const sanitizeFiniteNonNegative = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, value);
};

const sanitizePositive = (value: number, fallback: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return value;
};

// ── Direction helpers ───────────────────────────────────────────

export const directionVector = (direction: Direction): GridPos =>
  DIRECTION_VECTORS[direction];

export const oppositeDirection = (direction: Direction): Direction =>
  OPPOSITE_DIRECTIONS[direction];

export const isOppositeDirection = (
  currentDirection: Direction,
  nextDirection: Direction,
): boolean => oppositeDirection(currentDirection) === nextDirection;

// ── Position helpers ────────────────────────────────────────────

export const gridEquals = (first: GridPos, second: GridPos): boolean =>
  first.x === second.x && first.y === second.y;

export const gridKey = (position: GridPos): string =>
  `${position.x},${position.y}`;

export const stepInDirection = (
  position: GridPos,
  direction: Direction,
): GridPos => {
  const vector = directionVector(direction);

  return {
    x: position.x + vector.x,
    y: position.y + vector.y,
  };
};

/** Whether `position` lies inside `[0, width) × [0, height)`. */
export const isInBounds = (
  position: GridPos,
  bounds: GridBounds = DEFAULT_GRID_BOUNDS,
): boolean =>
  position.x >= 0 &&
  position.y >= 0 &&
  position.x < bounds.width &&
  position.y < bounds.height;

// ── Movement clock ──────────────────────────────────────────────

/**
 * Repeating countdown that gates snake movement.
 *
 * `advance()` fires at most once per call: when the accumulated time reaches
 * the interval, only the remainder modulo the interval is kept, so a long
 * frame never produces a burst of steps.
 */
export class MoveTicker {
  private readonly intervalMs: number;

  private elapsedMs = 0;

  constructor(intervalMs = DEFAULT_MOVE_INTERVAL_MS) {
    this.intervalMs = sanitizePositive(intervalMs, DEFAULT_MOVE_INTERVAL_MS);
  }

  get interval(): number {
    return this.intervalMs;
  }

  get elapsed(): number {
    return this.elapsedMs;
  }

  /** Add `deltaMs` and report whether the clock fired. */
  advance(deltaMs: number): boolean {
    this.elapsedMs += sanitizeFiniteNonNegative(deltaMs);

    if (this.elapsedMs < this.intervalMs) {
      return false;
    }

    this.elapsedMs %= this.intervalMs;
    return true;
  }

  reset(): void {
    this.elapsedMs = 0;
  }
}
