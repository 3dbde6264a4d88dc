import { DEFAULT_GAME_CONFIG, type SnakeStartConfig } from "../config";
import { type CollisionKind, detectCollisions } from "../systems/collision";
import {
  type Direction,
  type GridBounds,
  type GridPos,
  DEFAULT_GRID_BOUNDS,
  MoveTicker,
  isOppositeDirection,
  stepInDirection,
} from "../utils/grid";
import { type Logger, silentLogger } from "../utils/logger";
import { type SegmentHandle, SegmentStore } from "./SegmentStore";

interface SnakeHead {
  handle: SegmentHandle;
  direction: Direction;
}

/** Outcome of one fired tick. */
export type TickResult =
  | Readonly<{
      kind: "moved";
      head: GridPos;
      /** Empty when the move was safe. */
      collisions: ReadonlyArray<CollisionKind>;
    }>
  | Readonly<{
      kind: "fault";
      /** Recorded chain length. */
      expected: number;
      /** Positions that actually resolved. */
      resolved: number;
    }>;

export interface SnakeOptions {
  bounds?: GridBounds;
  ticker?: MoveTicker;
  store?: SegmentStore;
  logger?: Logger;
}

// ── Snake entity ─────────────────────────────────────────────────

export class Snake {
  /** Chain handles: index 0 = head, rest = body in head-to-tail order. */
  private chain: SegmentHandle[] = [];

  /** The head record; `null` only while a reset is rebuilding the chain. */
  private head: SnakeHead | null = null;

  /** Cell the last chain element held before the latest shift. */
  private pendingTail: GridPos | null = null;

  private readonly start: SnakeStartConfig;

  private readonly bounds: GridBounds;

  /** Movement clock. */
  private readonly ticker: MoveTicker;

  private readonly store: SegmentStore;

  private readonly logger: Logger;

  constructor(
    start: SnakeStartConfig = DEFAULT_GAME_CONFIG.start,
    options: SnakeOptions = {},
  ) {
    this.start = start;
    this.bounds = options.bounds ?? DEFAULT_GRID_BOUNDS;
    this.ticker = options.ticker ?? new MoveTicker();
    this.store = options.store ?? new SegmentStore();
    this.logger = options.logger ?? silentLogger;

    this.spawn();
  }

  // ── Input handling ─────────────────────────────────────────────

  /**
   * Point the head at `direction` unless it is the exact opposite of the
   * current heading. Returns whether the direction was applied.
   */
  turn(direction: Direction): boolean {
    if (!this.head) return false;
    if (isOppositeDirection(this.head.direction, direction)) return false;

    this.head.direction = direction;
    return true;
  }

  // ── Movement ───────────────────────────────────────────────────

  /**
   * Advance the movement clock by `deltaMs`. Returns the tick outcome when
   * the clock fired, `null` otherwise.
   */
  update(deltaMs: number): TickResult | null {
    if (!this.ticker.advance(deltaMs)) return null;
    return this.step();
  }

  /**
   * Move one cell: compute the new head, test it against the pre-shift
   * chain, then shift every segment into its predecessor's old cell.
   *
   * A chain with dangling handles aborts the tick untouched.
   */
  step(): TickResult {
    const before = this.resolveChain();

    if (!this.head || before.length !== this.chain.length) {
      const fault = {
        kind: "fault",
        expected: this.chain.length,
        resolved: before.length,
      } as const;
      this.logger.error("chain consistency fault, tick aborted", {
        expected: fault.expected,
        resolved: fault.resolved,
      });
      return fault;
    }

    const nextHead = stepInDirection(before[0], this.head.direction);
    const collisions = detectCollisions(nextHead, before, this.bounds);

    // Shift from the snapshot so updates never cascade within a tick.
    this.store.set(this.chain[0], nextHead);
    for (let i = 1; i < this.chain.length; i++) {
      this.store.set(this.chain[i], before[i - 1]);
    }
    this.pendingTail = before[before.length - 1];

    return { kind: "moved", head: nextHead, collisions };
  }

  // ── Growth ─────────────────────────────────────────────────────

  /**
   * Append `count` segments at the pending tail cell. Before the first tick
   * after a spawn there is no pending tail, so the current tail cell is used.
   *
   * Returns the chain length afterwards.
   */
  grow(count = 1): number {
    const tailHandle = this.chain[this.chain.length - 1];
    const spawnAt = this.pendingTail ?? this.store.get(tailHandle);

    if (!spawnAt) {
      this.logger.error("growth skipped, tail does not resolve", { count });
      return this.chain.length;
    }

    for (let i = 0; i < count; i++) {
      this.chain.push(this.store.spawn(spawnAt));
    }

    this.logger.debug("grew", { count, length: this.chain.length });
    return this.chain.length;
  }

  // ── Reset ──────────────────────────────────────────────────────

  /**
   * Destroy the whole chain, head included, and rebuild the start state.
   * Pending tail data is discarded; the movement clock keeps its remainder.
   */
  reset(): void {
    for (const handle of this.chain) {
      this.store.destroy(handle);
    }
    this.chain = [];
    this.head = null;
    this.pendingTail = null;

    this.spawn();
  }

  private spawn(): void {
    const headHandle = this.store.spawn(this.start.head);
    this.head = { handle: headHandle, direction: this.start.direction };
    this.chain = [
      headHandle,
      ...this.start.segments.map((cell) => this.store.spawn(cell)),
    ];
  }

  private resolveChain(): GridPos[] {
    const positions: GridPos[] = [];
    for (const handle of this.chain) {
      const position = this.store.get(handle);
      if (position) positions.push(position);
    }
    return positions;
  }

  // ── State queries ──────────────────────────────────────────────

  /** Resolvable chain positions, head first. */
  getSegments(): GridPos[] {
    return this.resolveChain();
  }

  getHeadPosition(): GridPos | null {
    return this.head ? this.store.get(this.head.handle) ?? null : null;
  }

  hasHead(): boolean {
    return this.head !== null && this.store.isAlive(this.head.handle);
  }

  getDirection(): Direction | null {
    return this.head?.direction ?? null;
  }

  /** Recorded chain length (head + body). */
  getLength(): number {
    return this.chain.length;
  }

  getPendingTail(): GridPos | null {
    return this.pendingTail ? { ...this.pendingTail } : null;
  }

  getChainHandles(): ReadonlyArray<SegmentHandle> {
    return this.chain;
  }

  getTicker(): MoveTicker {
    return this.ticker;
  }
}
