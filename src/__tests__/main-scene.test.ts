import { describe, it, expect, vi } from "vitest";
import { GameBridge } from "@/game/bridge";
import { resolveGameConfig } from "@/game/config";
import { SegmentStore } from "@/game/entities/SegmentStore";
import { MainScene } from "@/game/scenes/MainScene";
import { KeyboardState } from "@/game/utils/keyboard";
import { fixedRng, recordingLogger } from "./test-utils";

const CANONICAL = [
  { x: 3, y: 3 },
  { x: 3, y: 2 },
];

describe("MainScene start", () => {
  it("publishes the spawned snake before the first frame", () => {
    const bridge = new GameBridge();
    new MainScene({ bridge });

    expect(bridge.getSnapshot()).toEqual({
      frame: 0,
      segments: CANONICAL,
      hasHead: true,
      direction: "up",
      food: [],
      resets: 0,
    });
  });

  it("does not move until the movement period has elapsed", () => {
    const scene = new MainScene();
    const snapshot = scene.update(16);

    expect(snapshot.frame).toBe(1);
    expect(snapshot.segments).toEqual(CANONICAL);
  });
});

describe("MainScene input", () => {
  it("turns on a held key and clears the latch after the pass", () => {
    const keyboard = new KeyboardState();
    const scene = new MainScene({ input: keyboard });
    keyboard.press("ArrowLeft");

    const snapshot = scene.update(150);

    expect(snapshot.direction).toBe("left");
    expect(snapshot.segments[0]).toEqual({ x: 2, y: 3 });
    expect(keyboard.isPressed("ArrowLeft")).toBe(false);
  });

  it("accepts an input source without a frame hook", () => {
    const scene = new MainScene({
      input: { isPressed: (code) => code === "ArrowRight" },
    });

    expect(scene.update(150).segments[0]).toEqual({ x: 4, y: 3 });
  });

  it("ignores a reversal request", () => {
    const keyboard = new KeyboardState();
    const scene = new MainScene({ input: keyboard });
    keyboard.press("KeyS");

    expect(scene.update(150).segments[0]).toEqual({ x: 3, y: 4 });
  });
});

describe("MainScene game over", () => {
  it("resets the snake in the same pass it leaves the arena", () => {
    const { logger, lines } = recordingLogger();
    const bridge = new GameBridge();
    const onReset = vi.fn();
    bridge.on("reset", onReset);
    const scene = new MainScene({ bridge, logger, rng: fixedRng(0.95) });

    for (let i = 0; i < 6; i++) scene.update(150);
    expect(scene.getSnake().getHeadPosition()).toEqual({ x: 3, y: 9 });

    const snapshot = scene.update(150);

    expect(snapshot.segments).toEqual(CANONICAL);
    expect(snapshot.direction).toBe("up");
    expect(snapshot.resets).toBe(1);
    expect(snapshot.food).toEqual([{ x: 9, y: 9 }]);
    expect(scene.getResetCount()).toBe(1);
    expect(onReset).toHaveBeenCalledWith({
      frame: 7,
      reasons: ["boundary"],
      lengthAtDeath: 2,
    });
    expect(lines.filter((line) => line.includes(" INFO "))).toEqual([
      '1970-01-01T00:00:00.000Z INFO [scene] game over, snake reset {"reasons":["boundary"],"lengthAtDeath":2}',
    ]);
  });

  it("does not eat food on the collision cell", () => {
    const scene = new MainScene({ config: resolveGameConfig({ arena: { height: 5 } }) });
    scene.getFood().spawnAt({ x: 3, y: 5 });

    scene.update(150);
    const snapshot = scene.update(150);

    expect(snapshot.resets).toBe(1);
    expect(snapshot.segments).toEqual(CANONICAL);
    expect(snapshot.food).toEqual([{ x: 3, y: 5 }]);
  });

  it("does not grow from food on the start cell in the reset pass", () => {
    const bridge = new GameBridge();
    const onGrowth = vi.fn();
    bridge.on("growth", onGrowth);
    const scene = new MainScene({
      bridge,
      config: resolveGameConfig({ arena: { height: 5 } }),
    });

    scene.update(150);
    scene.getFood().spawnAt({ x: 3, y: 3 });
    const snapshot = scene.update(150);

    expect(snapshot.resets).toBe(1);
    expect(snapshot.segments).toEqual(CANONICAL);
    expect(snapshot.food).toEqual([{ x: 3, y: 3 }]);
    expect(onGrowth).not.toHaveBeenCalled();
  });

  it("resets once when the head runs into its own body", () => {
    const start = [
      { x: 3, y: 3 },
      { x: 3, y: 2 },
      { x: 4, y: 2 },
      { x: 4, y: 3 },
    ];
    const bridge = new GameBridge();
    const onReset = vi.fn();
    bridge.on("reset", onReset);
    const scene = new MainScene({
      bridge,
      config: resolveGameConfig({ start: { segments: start.slice(1) } }),
      input: { isPressed: (code) => code === "ArrowRight" },
    });

    const snapshot = scene.update(150);

    expect(onReset).toHaveBeenCalledTimes(1);
    expect(onReset).toHaveBeenCalledWith({
      frame: 1,
      reasons: ["self"],
      lengthAtDeath: 4,
    });
    expect(snapshot.resets).toBe(1);
    expect(snapshot.segments).toEqual(start);
    expect(snapshot.direction).toBe("up");
  });
});

describe("MainScene growth", () => {
  it("eats food under the new head and grows at the vacated tail cell", () => {
    const bridge = new GameBridge();
    const onGrowth = vi.fn();
    bridge.on("growth", onGrowth);
    const scene = new MainScene({ bridge });
    scene.getFood().spawnAt({ x: 3, y: 4 });

    const snapshot = scene.update(150);

    expect(snapshot.segments).toEqual([
      { x: 3, y: 4 },
      { x: 3, y: 3 },
      { x: 3, y: 2 },
    ]);
    expect(snapshot.food).toEqual([]);
    expect(onGrowth).toHaveBeenCalledWith({ frame: 1, added: 1, length: 3 });
  });

  it("leaves chain and food alone on frames without a tick", () => {
    const bridge = new GameBridge();
    const onGrowth = vi.fn();
    bridge.on("growth", onGrowth);
    const scene = new MainScene({ bridge });
    scene.getFood().spawnAt({ x: 3, y: 3 });

    const idle = scene.update(16);

    expect(idle.segments).toEqual(CANONICAL);
    expect(idle.food).toEqual([{ x: 3, y: 3 }]);

    const moved = scene.update(134);

    expect(moved.segments).toEqual([
      { x: 3, y: 4 },
      { x: 3, y: 3 },
    ]);
    expect(moved.food).toEqual([{ x: 3, y: 3 }]);
    expect(onGrowth).not.toHaveBeenCalled();
  });

  it("grows once per stacked item", () => {
    const scene = new MainScene();
    scene.getFood().spawnAt({ x: 3, y: 4 });
    scene.getFood().spawnAt({ x: 3, y: 4 });

    expect(scene.update(150).segments).toHaveLength(4);
  });
});

describe("MainScene consistency faults", () => {
  it("reports a dangling chain handle and skips the move", () => {
    const store = new SegmentStore();
    const bridge = new GameBridge();
    const onFault = vi.fn();
    bridge.on("fault", onFault);
    const scene = new MainScene({ bridge, store });
    store.destroy(scene.getSnake().getChainHandles()[1]);

    scene.update(150);

    expect(onFault).toHaveBeenCalledWith({ frame: 1, expected: 2, resolved: 1 });
    expect(scene.getFaultCount()).toBe(1);
    expect(scene.getResetCount()).toBe(0);
    expect(scene.getSnake().getHeadPosition()).toEqual({ x: 3, y: 3 });
  });
});
