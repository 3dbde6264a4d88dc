/**
 * Scene ↔ presentation state bridge.
 *
 * A lightweight typed event emitter that the scene writes to once per frame
 * and the terminal components subscribe to. It also keeps the latest
 * snapshot so late subscribers can render without waiting for an event.
 */
import type { CollisionKind } from "./systems/collision";
import type { Direction, GridPos } from "./utils/grid";

// ── Snapshot shape ──────────────────────────────────────────────
export interface FrameSnapshot {
  frame: number;
  /** Chain positions in head-to-tail order. */
  segments: ReadonlyArray<GridPos>;
  hasHead: boolean;
  direction: Direction | null;
  food: ReadonlyArray<GridPos>;
  /** Number of resets since the scene started. */
  resets: number;
}

export interface ResetRecord {
  frame: number;
  reasons: ReadonlyArray<CollisionKind>;
  /** Chain length at the moment of the collision. */
  lengthAtDeath: number;
}

export interface GrowthRecord {
  frame: number;
  added: number;
  length: number;
}

export interface FaultRecord {
  frame: number;
  expected: number;
  resolved: number;
}

// ── Event map: event name → payload ─────────────────────────────
export interface GameBridgeEvents {
  frame: FrameSnapshot;
  reset: ResetRecord;
  growth: GrowthRecord;
  fault: FaultRecord;
}

export type GameBridgeEventName = keyof GameBridgeEvents;

type Listener<T> = (value: T) => void;

type ListenerRegistry = {
  [K in GameBridgeEventName]: Set<Listener<GameBridgeEvents[K]>>;
};

export const EMPTY_FRAME: FrameSnapshot = Object.freeze({
  frame: 0,
  segments: [],
  hasHead: false,
  direction: null,
  food: [],
  resets: 0,
});

export class GameBridge {
  private snapshot: FrameSnapshot = EMPTY_FRAME;

  private listeners: ListenerRegistry = {
    frame: new Set(),
    reset: new Set(),
    growth: new Set(),
    fault: new Set(),
  };

  getSnapshot(): Readonly<FrameSnapshot> {
    return this.snapshot;
  }

  // ── Mutations (called by the scene) ─────────────────────────
  publishFrame(snapshot: FrameSnapshot): void {
    this.snapshot = snapshot;
    this.emit("frame", snapshot);
  }

  emitReset(record: ResetRecord): void {
    this.emit("reset", record);
  }

  emitGrowth(record: GrowthRecord): void {
    this.emit("growth", record);
  }

  emitFault(record: FaultRecord): void {
    this.emit("fault", record);
  }

  // ── Pub / Sub ───────────────────────────────────────────────
  on<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.registry(event).add(listener);
  }

  off<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.registry(event).delete(listener);
  }

  private emit<K extends GameBridgeEventName>(
    event: K,
    value: GameBridgeEvents[K],
  ): void {
    this.registry(event).forEach((fn) => fn(value));
  }

  private registry<K extends GameBridgeEventName>(
    event: K,
  ): Set<Listener<GameBridgeEvents[K]>> {
    return this.listeners[event];
  }
}
