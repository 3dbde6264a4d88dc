import { Box, Text } from "ink";
import { useEffect, useState } from "react";
import type { FrameSnapshot, GameBridge, ResetRecord } from "@/game/bridge";
import { COLORS } from "@/game/config";

interface HUDProps {
  bridge: GameBridge;
}

/**
 * Status line above the board: chain length and reset count, plus what
 * ended the previous run. Subscribes to the bridge for updates.
 */
export default function HUD({ bridge }: HUDProps) {
  const [snapshot, setSnapshot] = useState<Readonly<FrameSnapshot>>(
    () => bridge.getSnapshot(),
  );
  const [lastReset, setLastReset] = useState<ResetRecord | null>(null);

  useEffect(() => {
    const onFrame = (next: FrameSnapshot) => setSnapshot(next);
    const onReset = (record: ResetRecord) => setLastReset(record);

    bridge.on("frame", onFrame);
    bridge.on("reset", onReset);

    return () => {
      bridge.off("frame", onFrame);
      bridge.off("reset", onReset);
    };
  }, [bridge]);

  return (
    <Box flexDirection="column">
      <Text color={COLORS.HUD}>
        {`LENGTH ${snapshot.segments.length}  RESETS ${snapshot.resets}`}
      </Text>
      {lastReset ? (
        <Text dimColor>
          {`last run: ${lastReset.reasons.join(" + ")} at length ${lastReset.lengthAtDeath}`}
        </Text>
      ) : null}
    </Box>
  );
}
