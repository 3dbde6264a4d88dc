import { Box, Text } from "ink";
import { COLORS, GLYPHS } from "@/game/config";
import { type GridBounds, type GridPos, gridKey } from "@/game/utils/grid";

export type CellKind = "head" | "body" | "food" | "empty";

const CELL_GLYPHS: Record<CellKind, string> = {
  head: GLYPHS.SNAKE_HEAD,
  body: GLYPHS.SNAKE_BODY,
  food: GLYPHS.FOOD,
  empty: GLYPHS.EMPTY,
};

const CELL_COLORS: Record<CellKind, string> = {
  head: COLORS.SNAKE_HEAD,
  body: COLORS.SNAKE_BODY,
  food: COLORS.FOOD,
  empty: COLORS.EMPTY,
};

/**
 * Lay the arena out as rows of cells, top row first.
 *
 * The top row is `y = height - 1` because grid y grows upward. Head wins
 * over body, body over food. Cells outside the arena are not drawn.
 */
export function boardCells(
  bounds: GridBounds,
  segments: ReadonlyArray<GridPos>,
  food: ReadonlyArray<GridPos>,
  hasHead = true,
): CellKind[][] {
  const occupied = new Map<string, CellKind>();

  for (const cell of food) {
    occupied.set(gridKey(cell), "food");
  }
  // Tail to head, so the head is written last.
  for (let index = segments.length - 1; index >= 0; index--) {
    occupied.set(
      gridKey(segments[index]),
      index === 0 && hasHead ? "head" : "body",
    );
  }

  const rows: CellKind[][] = [];
  for (let y = bounds.height - 1; y >= 0; y--) {
    const row: CellKind[] = [];
    for (let x = 0; x < bounds.width; x++) {
      row.push(occupied.get(gridKey({ x, y })) ?? "empty");
    }
    rows.push(row);
  }
  return rows;
}

interface BoardProps {
  bounds: GridBounds;
  segments: ReadonlyArray<GridPos>;
  food: ReadonlyArray<GridPos>;
  hasHead: boolean;
}

export default function Board({ bounds, segments, food, hasHead }: BoardProps) {
  const rows = boardCells(bounds, segments, food, hasHead);

  return (
    <Box flexDirection="column" borderStyle="single" alignSelf="flex-start">
      {rows.map((row, rowIndex) => (
        <Text key={`row-${rowIndex}`}>
          {row.map((cell, x) => (
            <Text key={`cell-${x}`} color={CELL_COLORS[cell]}>
              {CELL_GLYPHS[cell]}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
}
