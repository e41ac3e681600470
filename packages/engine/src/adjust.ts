import { cloneGrid, createCell, inRange, positionKey } from "@breachgrid/core";
import type {
  Code,
  Grid,
  IntRange,
  Position,
  RandomSource,
  SolveResult,
} from "@breachgrid/core";
import { solve } from "./solver";
import type { Sequences } from "./progress";

export interface AdjustInput {
  grid: Grid;
  solutionPath: readonly Position[];
  sequences: Sequences;
  bufferSize: number;
  targetRange: IntRange;
  codePool: readonly Code[];
  rng: RandomSource;
  /** Mutate-and-resolve rounds before giving up. */
  maxRounds?: number;
  /** Cells promoted or demoted per round. */
  cellsPerRound?: number;
}

export interface AdjustOutcome {
  grid: Grid;
  /** Solver output for `grid`, capped at one past the target maximum. */
  result: SolveResult;
}

/**
 * Nudge non-path cells until the solution count lands in `targetRange`.
 * Too few solutions: random non-path cells take sequence codes. Too many:
 * sequence-bearing non-path cells take codes no sequence uses.
 *
 * Returns null when the count is still outside the range after the last
 * round, or when there is nothing left to change.
 */
export function adjustSolutionCount(input: AdjustInput): AdjustOutcome | null {
  const { solutionPath, sequences, bufferSize, targetRange, codePool, rng } =
    input;
  const maxRounds = input.maxRounds ?? 3;
  const cellsPerRound = input.cellsPerRound ?? 3;
  const cap = targetRange[1] + 1;

  const pathKeys = new Set(solutionPath.map(positionKey));
  const seqCodes = new Set(sequences.flat());
  const decoys = [...seqCodes];
  const safe = codePool.filter((c) => !seqCodes.has(c));

  let grid = cloneGrid(input.grid);
  let result = solve(grid, sequences, bufferSize, cap);

  for (let round = 0; round < maxRounds; round++) {
    if (inRange(targetRange, result.solutionCount)) return { grid, result };

    const tooFew = result.solutionCount < targetRange[0];
    const pool = tooFew ? decoys : safe;
    const targets: Position[] = [];
    for (const row of grid) {
      for (const cell of row) {
        if (pathKeys.has(positionKey(cell))) continue;
        if (cell.kind.type !== "normal") continue;
        if (seqCodes.has(cell.code) !== tooFew) {
          targets.push({ row: cell.row, col: cell.col });
        }
      }
    }
    if (targets.length === 0 || pool.length === 0) return null;

    grid = cloneGrid(grid);
    for (const pos of rng.sample(targets, cellsPerRound)) {
      const code = pool[rng.nextInt(pool.length)];
      grid[pos.row][pos.col] = createCell(code, pos.row, pos.col);
    }
    result = solve(grid, sequences, bufferSize, cap);
  }

  return inRange(targetRange, result.solutionCount) ? { grid, result } : null;
}
