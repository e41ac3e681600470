import { inBounds, isBlocked, isWildcard, positionKey } from "@breachgrid/core";
import type { Puzzle } from "@breachgrid/core";
import { advanceProgress, isComplete } from "./progress";

export interface ValidateOptions {
  /** Reject puzzles whose solution path crosses a blocker. */
  checkBlockers?: boolean;
}

/**
 * Replays the puzzle's solution path under the selection rules and checks
 * that it completes every sequence. Pure: the same puzzle always gives the
 * same answer.
 */
export function validatePuzzle(
  puzzle: Puzzle,
  options: ValidateOptions = {},
): boolean {
  const { grid, solutionPath: path } = puzzle;
  const size = grid.length;

  if (size === 0 || grid.some((row) => row.length !== size)) return false;
  if (path.length === 0 || path.length !== puzzle.par) return false;
  if (puzzle.bufferSize < puzzle.par) return false;
  if (path[0].row !== 0) return false;

  const seen = new Set<string>();
  const sequences = puzzle.sequences.map((s) => s.codes);
  const progress = sequences.map(() => 0);

  for (let i = 0; i < path.length; i++) {
    const pos = path[i];
    if (!inBounds(size, pos)) return false;

    const key = positionKey(pos);
    if (seen.has(key)) return false;
    seen.add(key);

    // The first pick is row 0; after it picks alternate column, row, column...
    if (i > 0) {
      const prev = path[i - 1];
      const vertical = i % 2 === 1;
      if (vertical ? pos.col !== prev.col : pos.row !== prev.row) return false;
    }

    const cell = grid[pos.row][pos.col];
    if (options.checkBlockers && isBlocked(cell)) return false;
    advanceProgress(sequences, progress, cell.code, isWildcard(cell));
  }

  return isComplete(sequences, progress);
}
