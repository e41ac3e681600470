import {
  cloneGrid,
  createCell,
  isBlocked,
  isWildcard,
  positionKey,
} from "@breachgrid/core";
import type {
  Grid,
  IntRange,
  Position,
  RandomSource,
} from "@breachgrid/core";

export interface SpecialCellPlan {
  blockerCount: IntRange;
  wildcardChance: number;
  decayCellCount: number;
  /** Moves before a decay cell changes code. */
  decayMoves?: IntRange;
}

function offPath(
  grid: Grid,
  pathKeys: ReadonlySet<string>,
  accept: (row: number, col: number) => boolean,
): Position[] {
  const out: Position[] = [];
  for (let row = 0; row < grid.length; row++) {
    for (let col = 0; col < grid[row].length; col++) {
      if (pathKeys.has(positionKey({ row, col }))) continue;
      if (accept(row, col)) out.push({ row, col });
    }
  }
  return out;
}

/**
 * Layer blockers, then wildcards, then decay cells over a filled grid.
 * The solution path is never touched.
 */
export function layerSpecialCells(
  grid: Grid,
  solutionPath: readonly Position[],
  plan: SpecialCellPlan,
  rng: RandomSource,
): Grid {
  const result = cloneGrid(grid);
  const pathKeys = new Set(solutionPath.map(positionKey));

  const blockers = rng.intBetween(plan.blockerCount[0], plan.blockerCount[1]);
  const open = offPath(result, pathKeys, () => true);
  for (const { row, col } of rng.sample(open, blockers)) {
    result[row][col] = createCell("XX", row, col, { type: "blocker" });
  }

  if (plan.wildcardChance > 0) {
    const unblocked = offPath(
      result,
      pathKeys,
      (r, c) => !isBlocked(result[r][c]),
    );
    for (const { row, col } of unblocked) {
      if (rng.chance(plan.wildcardChance)) {
        const { code } = result[row][col];
        result[row][col] = createCell(code, row, col, { type: "wildcard" });
      }
    }
  }

  const [minMoves, maxMoves] = plan.decayMoves ?? [3, 5];
  const decayable = offPath(
    result,
    pathKeys,
    (r, c) => !isBlocked(result[r][c]) && !isWildcard(result[r][c]),
  );
  for (const pos of rng.sample(decayable, plan.decayCellCount)) {
    const { code } = result[pos.row][pos.col];
    result[pos.row][pos.col] = createCell(code, pos.row, pos.col, {
      type: "decay",
      movesRemaining: rng.intBetween(minMoves, maxMoves),
    });
  }

  return result;
}
