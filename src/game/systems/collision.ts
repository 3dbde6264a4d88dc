import {
  type GridBounds,
  type GridPos,
  gridEquals,
  isInBounds,
} from "../utils/grid";

export type CollisionKind = "boundary" | "self";

/**
 * Collisions for a head about to move to `nextHead`.
 *
 * `chainBeforeShift` is the whole chain as it was before this tick's shift,
 * head and tail cells included. Both checks run; the result lists every kind
 * that hit, boundary first.
 */
export function detectCollisions(
  nextHead: GridPos,
  chainBeforeShift: ReadonlyArray<GridPos>,
  bounds: GridBounds,
): CollisionKind[] {
  const collisions: CollisionKind[] = [];

  if (!isInBounds(nextHead, bounds)) {
    collisions.push("boundary");
  }

  if (chainBeforeShift.some((cell) => gridEquals(cell, nextHead))) {
    collisions.push("self");
  }

  return collisions;
}
