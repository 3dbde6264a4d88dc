import { describe, it, expect } from "vitest";
import { FoodField, consumeFoodAt } from "@/game/entities/Food";
import { fixedRng, recordingLogger, sequenceRng } from "./test-utils";

describe("FoodField spawning", () => {
  it("does not spawn before the interval elapses", () => {
    const food = new FoodField({ spawnIntervalMs: 1000, rng: fixedRng(0.5) });

    expect(food.update(999)).toBeNull();
    expect(food.getPositions()).toEqual([]);
  });

  it("spawns on the cell picked by scaling the RNG to the arena", () => {
    const food = new FoodField({
      bounds: { width: 10, height: 10 },
      spawnIntervalMs: 1000,
      rng: sequenceRng([0.1, 0.95]),
    });

    expect(food.update(1000)).toEqual({ x: 1, y: 9 });
    expect(food.getPositions()).toEqual([{ x: 1, y: 9 }]);
  });

  it("lets repeated spawns stack on the same cell", () => {
    const food = new FoodField({ spawnIntervalMs: 100, rng: fixedRng(0) });
    food.update(100);
    food.update(100);

    expect(food.getPositions()).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 0 },
    ]);
  });

  it("logs each spawn at debug level", () => {
    const { logger, lines } = recordingLogger();
    const food = new FoodField({
      spawnIntervalMs: 1000,
      rng: fixedRng(0.5),
      logger: logger.child("food"),
    });
    food.update(1000);

    expect(lines).toEqual([
      '1970-01-01T00:00:00.000Z DEBUG [food] food spawned {"x":5,"y":5}',
    ]);
  });

  it("stores a copy of a manually placed item", () => {
    const food = new FoodField();
    const position = { x: 2, y: 2 };
    food.spawnAt(position);
    position.x = 7;

    expect(food.getPositions()).toEqual([{ x: 2, y: 2 }]);
  });
});

describe("FoodField.removeAt", () => {
  it("removes one matching item", () => {
    const food = new FoodField();
    food.spawnAt({ x: 4, y: 4 });
    food.spawnAt({ x: 4, y: 4 });

    expect(food.removeAt({ x: 4, y: 4 })).toBe(true);
    expect(food.getPositions()).toEqual([{ x: 4, y: 4 }]);
  });

  it("returns false when nothing is there", () => {
    const food = new FoodField();

    expect(food.removeAt({ x: 1, y: 1 })).toBe(false);
  });
});

describe("consumeFoodAt", () => {
  it("eats every item stacked on the head cell", () => {
    const food = new FoodField();
    food.spawnAt({ x: 3, y: 4 });
    food.spawnAt({ x: 1, y: 1 });
    food.spawnAt({ x: 3, y: 4 });

    expect(consumeFoodAt(food, { x: 3, y: 4 })).toBe(2);
    expect(food.getPositions()).toEqual([{ x: 1, y: 1 }]);
  });

  it("eats nothing when the head cell is empty", () => {
    const food = new FoodField();
    food.spawnAt({ x: 1, y: 1 });

    expect(consumeFoodAt(food, { x: 3, y: 3 })).toBe(0);
    expect(food.getPositions()).toEqual([{ x: 1, y: 1 }]);
  });
});
