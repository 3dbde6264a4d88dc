import type { GridPos } from "../utils/grid";

/** Addressable reference to a segment record. */
export type SegmentHandle = Readonly<{
  index: number;
  generation: number;
}>;

interface Slot {
  generation: number;
  /** `null` while the slot is free. */
  position: GridPos | null;
}

/**
 * Pool of segment records addressed by generational handles.
 *
 * Destroying a record bumps its slot generation, so any handle still pointing
 * at the slot stops resolving instead of reading whatever reuses it.
 */
export class SegmentStore {
  private slots: Slot[] = [];

  private freeSlots: number[] = [];

  private liveCount = 0;

  /** Number of live records. */
  get size(): number {
    return this.liveCount;
  }

  spawn(position: GridPos): SegmentHandle {
    const reused = this.freeSlots.pop();
    const index = reused ?? this.slots.length;

    if (reused === undefined) {
      this.slots.push({ generation: 0, position: null });
    }

    const slot = this.slots[index];
    slot.position = { ...position };
    this.liveCount++;

    return { index, generation: slot.generation };
  }

  isAlive(handle: SegmentHandle): boolean {
    return this.resolve(handle) !== null;
  }

  get(handle: SegmentHandle): GridPos | undefined {
    const position = this.resolve(handle)?.position;
    return position ? { ...position } : undefined;
  }

  /** Overwrite a live record's position. Returns `false` for stale handles. */
  set(handle: SegmentHandle, position: GridPos): boolean {
    const slot = this.resolve(handle);
    if (!slot) return false;
    slot.position = { ...position };
    return true;
  }

  destroy(handle: SegmentHandle): boolean {
    const slot = this.resolve(handle);
    if (!slot) return false;

    slot.position = null;
    slot.generation++;
    this.freeSlots.push(handle.index);
    this.liveCount--;
    return true;
  }

  private resolve(handle: SegmentHandle): Slot | null {
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation || !slot.position) {
      return null;
    }
    return slot;
  }
}
