import { GameBridge, type FrameSnapshot } from "../bridge";
import { DEFAULT_GAME_CONFIG, type GameConfig } from "../config";
import { FoodField, consumeFoodAt } from "../entities/Food";
import type { SegmentStore } from "../entities/SegmentStore";
import { Snake } from "../entities/Snake";
import type { CollisionKind } from "../systems/collision";
import { type GridPos, MoveTicker } from "../utils/grid";
import {
  type InputSource,
  KeyboardState,
  readDirectionInput,
} from "../utils/keyboard";
import { type Logger, silentLogger } from "../utils/logger";

export interface MainSceneOptions {
  config?: GameConfig;
  input?: InputSource;
  bridge?: GameBridge;
  logger?: Logger;
  /** Segment storage for the snake; a fresh store when omitted. */
  store?: SegmentStore;
  /** RNG for food placement; returns a value in [0, 1). */
  rng?: () => number;
}

/**
 * Frame driver for one game.
 *
 * Each `update()` is one pass in a fixed order: input, movement and
 * collision, then either the game-over reset or food consumption and growth,
 * then food spawning, and finally the frame snapshot for the presentation.
 * Snake logic only runs on a movement tick. Game-over never leaves a
 * visible dead state: the reset lands in the same pass that detected it.
 */
export class MainScene {
  private readonly snake: Snake;

  private readonly food: FoodField;

  private readonly input: InputSource;

  private readonly bridge: GameBridge;

  private readonly logger: Logger;

  private frame = 0;

  private resets = 0;

  private faults = 0;

  constructor(options: MainSceneOptions = {}) {
    const config = options.config ?? DEFAULT_GAME_CONFIG;
    this.input = options.input ?? new KeyboardState();
    this.bridge = options.bridge ?? new GameBridge();

    const logger = options.logger ?? silentLogger;
    this.logger = logger.child("scene");

    this.snake = new Snake(config.start, {
      bounds: config.arena,
      ticker: new MoveTicker(config.moveIntervalMs),
      store: options.store,
      logger: logger.child("snake"),
    });
    this.food = new FoodField({
      bounds: config.arena,
      spawnIntervalMs: config.foodSpawnIntervalMs,
      rng: options.rng,
      logger: logger.child("food"),
    });

    this.bridge.publishFrame(this.snapshot());
  }

  /** Run one frame pass covering `deltaMs` of elapsed time. */
  update(deltaMs: number): FrameSnapshot {
    this.frame++;

    // Input
    const requested = readDirectionInput(this.input);
    if (requested) {
      this.snake.turn(requested);
    }
    this.input.endFrame?.();

    // Movement and collision
    const tick = this.snake.update(deltaMs);
    if (tick?.kind === "fault") {
      this.faults++;
      this.bridge.emitFault({
        frame: this.frame,
        expected: tick.expected,
        resolved: tick.resolved,
      });
    } else if (tick?.kind === "moved") {
      // Game-over preempts food: a colliding tick never grows.
      if (tick.collisions.length > 0) {
        this.handleGameOver(tick.collisions);
      } else {
        this.feed(tick.head);
      }
    }

    this.food.update(deltaMs);

    const snapshot = this.snapshot();
    this.bridge.publishFrame(snapshot);
    return snapshot;
  }

  private feed(head: GridPos): void {
    const growthEvents = consumeFoodAt(this.food, head);
    if (growthEvents === 0) return;

    const length = this.snake.grow(growthEvents);
    this.bridge.emitGrowth({ frame: this.frame, added: growthEvents, length });
  }

  private handleGameOver(reasons: ReadonlyArray<CollisionKind>): void {
    const lengthAtDeath = this.snake.getLength();
    this.snake.reset();
    this.resets++;

    this.logger.info("game over, snake reset", { reasons, lengthAtDeath });
    this.bridge.emitReset({ frame: this.frame, reasons, lengthAtDeath });
  }

  private snapshot(): FrameSnapshot {
    return {
      frame: this.frame,
      segments: this.snake.getSegments(),
      hasHead: this.snake.hasHead(),
      direction: this.snake.getDirection(),
      food: [...this.food.getPositions()],
      resets: this.resets,
    };
  }

  // ── Accessors (for tests and the presentation) ────────────────

  getSnake(): Snake {
    return this.snake;
  }

  getFood(): FoodField {
    return this.food;
  }

  getBridge(): GameBridge {
    return this.bridge;
  }

  getResetCount(): number {
    return this.resets;
  }

  getFaultCount(): number {
    return this.faults;
  }
}
