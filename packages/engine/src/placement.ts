import { createCell, emptyGrid, positionKey } from "@breachgrid/core";
import type { Code, Grid, Position, RandomSource } from "@breachgrid/core";

export interface PlacedPath {
  /** Path cells hold their codes; every other cell holds the empty code. */
  grid: Grid;
  path: Position[];
}

/**
 * Lay the merged path onto an empty grid. The first pick is any column of
 * row 0; after that picks alternate between the last pick's column and its
 * row, never revisiting a cell.
 *
 * Returns null when a step has no free cell left; callers retry with fresh
 * randomness.
 */
export function placeSolutionPath(
  mergedPath: readonly Code[],
  gridSize: number,
  rng: RandomSource,
): PlacedPath | null {
  if (gridSize < 1 || mergedPath.length === 0) return null;

  const grid = emptyGrid(gridSize);
  const path: Position[] = [];
  const used = new Set<string>();

  let horizontal = true;
  let current: Position = { row: 0, col: rng.nextInt(gridSize) };

  for (let step = 0; step < mergedPath.length; step++) {
    if (step > 0) {
      const candidates: Position[] = [];
      for (let i = 0; i < gridSize; i++) {
        const pos = horizontal
          ? { row: current.row, col: i }
          : { row: i, col: current.col };
        if (!used.has(positionKey(pos))) candidates.push(pos);
      }
      const chosen = rng.pick(candidates);
      if (!chosen) return null;
      current = chosen;
    }

    const { row, col } = current;
    grid[row][col] = createCell(mergedPath[step], row, col);
    path.push(current);
    used.add(positionKey(current));
    horizontal = !horizontal;
  }

  return { grid, path };
}
