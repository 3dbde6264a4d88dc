import type { Direction } from "./grid";

// ── Key bindings ─────────────────────────────────────────────────

export type KeyCode =
  | "ArrowLeft"
  | "ArrowRight"
  | "ArrowDown"
  | "ArrowUp"
  | "KeyA"
  | "KeyD"
  | "KeyS"
  | "KeyW";

/** Scan order for held keys; the first one held wins the pass. */
export const DIRECTION_KEY_PRIORITY = [
  "ArrowLeft",
  "ArrowRight",
  "ArrowDown",
  "ArrowUp",
  "KeyA",
  "KeyD",
  "KeyS",
  "KeyW",
] as const satisfies ReadonlyArray<KeyCode>;

export const KEY_DIRECTION_MAP: Readonly<Record<KeyCode, Direction>> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowDown: "down",
  ArrowUp: "up",
  KeyA: "left",
  KeyD: "right",
  KeyS: "down",
  KeyW: "up",
};

const LETTER_KEY_CODES: Readonly<Record<string, KeyCode>> = {
  a: "KeyA",
  d: "KeyD",
  s: "KeyS",
  w: "KeyW",
};

export interface InputSource {
  isPressed(code: KeyCode): boolean;
  /** Called once after the input pass of every frame. */
  endFrame?(): void;
}

/** Arrow flags as reported by the terminal key parser. */
export type TerminalKey = Readonly<{
  leftArrow: boolean;
  rightArrow: boolean;
  upArrow: boolean;
  downArrow: boolean;
}>;

/**
 * Candidate direction for this pass: the binding of the first held key in
 * `DIRECTION_KEY_PRIORITY`, or `null` when nothing is held.
 */
export function readDirectionInput(input: InputSource): Direction | null {
  const held = DIRECTION_KEY_PRIORITY.find((code) => input.isPressed(code));
  return held ? KEY_DIRECTION_MAP[held] : null;
}

export function keyCodeFromTerminal(
  input: string,
  key: TerminalKey,
): KeyCode | null {
  if (key.leftArrow) return "ArrowLeft";
  if (key.rightArrow) return "ArrowRight";
  if (key.downArrow) return "ArrowDown";
  if (key.upArrow) return "ArrowUp";
  return LETTER_KEY_CODES[input.toLowerCase()] ?? null;
}

/**
 * Held-key state fed by terminal key presses.
 *
 * Terminals report presses but never releases, so a press counts as held
 * for the next frame pass only; `endFrame()` drops the latch.
 */
export class KeyboardState implements InputSource {
  private pressed = new Set<KeyCode>();

  press(code: KeyCode): void {
    this.pressed.add(code);
  }

  isPressed(code: KeyCode): boolean {
    return this.pressed.has(code);
  }

  endFrame(): void {
    this.pressed.clear();
  }
}
