import { FOOD_SPAWN_INTERVAL_MS } from "../config";
import {
  type GridBounds,
  type GridPos,
  DEFAULT_GRID_BOUNDS,
  MoveTicker,
  gridEquals,
} from "../utils/grid";
import { type Logger, silentLogger } from "../utils/logger";

/** What the snake core needs from whoever owns the food. */
export interface FoodSource {
  getPositions(): ReadonlyArray<GridPos>;
  /** Remove one food item at `position`. Returns `false` when none is there. */
  removeAt(position: GridPos): boolean;
}

export interface FoodFieldOptions {
  bounds?: GridBounds;
  spawnIntervalMs?: number;
  /**
   * Optional RNG function (returns a value in [0, 1)).
   * Defaults to Math.random; injectable for deterministic tests.
   */
  rng?: () => number;
  logger?: Logger;
}

/**
 * Timer-driven food spawner.
 *
 * Every spawn interval one food item drops on a uniformly random cell of the
 * arena. Placement ignores the snake and existing food, so items may stack.
 */
export class FoodField implements FoodSource {
  private positions: GridPos[] = [];

  private readonly bounds: GridBounds;

  private readonly ticker: MoveTicker;

  private readonly rng: () => number;

  private readonly logger: Logger;

  constructor(options: FoodFieldOptions = {}) {
    this.bounds = options.bounds ?? DEFAULT_GRID_BOUNDS;
    this.ticker = new MoveTicker(
      options.spawnIntervalMs ?? FOOD_SPAWN_INTERVAL_MS,
    );
    this.rng = options.rng ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  /** Advance the spawn timer; returns the spawned cell when it fired. */
  update(deltaMs: number): GridPos | null {
    if (!this.ticker.advance(deltaMs)) return null;

    const position = {
      x: Math.floor(this.rng() * this.bounds.width),
      y: Math.floor(this.rng() * this.bounds.height),
    };
    this.spawnAt(position);
    this.logger.debug("food spawned", position);
    return position;
  }

  spawnAt(position: GridPos): void {
    this.positions.push({ ...position });
  }

  getPositions(): ReadonlyArray<GridPos> {
    return this.positions;
  }

  removeAt(position: GridPos): boolean {
    const index = this.positions.findIndex((cell) => gridEquals(cell, position));
    if (index < 0) return false;
    this.positions.splice(index, 1);
    return true;
  }
}

/**
 * Eat every food item sitting on `head`. Each one is removed from `source`
 * and counts as one growth event.
 */
export function consumeFoodAt(source: FoodSource, head: GridPos): number {
  let eaten = 0;

  for (const position of [...source.getPositions()]) {
    if (gridEquals(position, head) && source.removeAt(position)) {
      eaten++;
    }
  }

  return eaten;
}
