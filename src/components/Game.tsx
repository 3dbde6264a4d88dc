import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useMemo, useState } from "react";
import type { FrameSnapshot } from "@/game/bridge";
import { DEFAULT_GAME_CONFIG, type GameConfig } from "@/game/config";
import { MainScene } from "@/game/scenes/MainScene";
import { KeyboardState, keyCodeFromTerminal } from "@/game/utils/keyboard";
import { type Logger, silentLogger } from "@/game/utils/logger";
import Board from "./Board";
import HUD from "./HUD";

const defaultNow = (): number => performance.now();

interface GameProps {
  config?: GameConfig;
  logger?: Logger;
  /** RNG for food placement; returns a value in [0, 1). */
  rng?: () => number;
  /** Millisecond clock used to measure frame deltas. */
  now?: () => number;
}

/**
 * Terminal game: owns one scene, drives it from a frame interval and
 * feeds it key presses. `q` or Escape quits.
 */
export default function Game({
  config = DEFAULT_GAME_CONFIG,
  logger = silentLogger,
  rng,
  now = defaultNow,
}: GameProps) {
  const { exit } = useApp();
  const keyboard = useMemo(() => new KeyboardState(), []);
  const scene = useMemo(
    () => new MainScene({ config, input: keyboard, logger, rng }),
    [config, keyboard, logger, rng],
  );
  const [snapshot, setSnapshot] = useState<Readonly<FrameSnapshot>>(() =>
    scene.getBridge().getSnapshot(),
  );

  useEffect(() => {
    const bridge = scene.getBridge();
    const onFrame = (next: FrameSnapshot) => setSnapshot(next);
    setSnapshot(bridge.getSnapshot());
    bridge.on("frame", onFrame);
    return () => bridge.off("frame", onFrame);
  }, [scene]);

  useEffect(() => {
    let last = now();
    const handle = setInterval(() => {
      const current = now();
      scene.update(current - last);
      last = current;
    }, config.frameIntervalMs);

    return () => clearInterval(handle);
  }, [scene, now, config.frameIntervalMs]);

  useInput((input, key) => {
    if (input === "q" || key.escape) {
      exit();
      return;
    }
    const code = keyCodeFromTerminal(input, key);
    if (code) {
      keyboard.press(code);
    }
  });

  return (
    <Box flexDirection="column" alignItems="flex-start">
      <HUD bridge={scene.getBridge()} />
      <Board
        bounds={config.arena}
        segments={snapshot.segments}
        food={snapshot.food}
        hasHead={snapshot.hasHead}
      />
      <Text dimColor>arrows or WASD to steer, q to quit</Text>
    </Box>
  );
}
