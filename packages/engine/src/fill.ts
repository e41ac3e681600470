import { cloneGrid, createCell, positionKey } from "@breachgrid/core";
import type {
  Code,
  FillPlan,
  FillStrategy,
  Grid,
  Position,
  RandomSource,
} from "@breachgrid/core";

/** Draw the puzzle's alphabet from the catalog. */
export function selectCodePool(
  catalog: readonly Code[],
  size: number,
  rng: RandomSource,
): Code[] {
  return rng.sample(catalog, Math.min(size, catalog.length));
}

export function resolveFillStrategy(
  plan: FillPlan,
  sequences: readonly (readonly Code[])[],
): FillStrategy {
  switch (plan.kind) {
    case "forgiving":
      return { kind: "forgiving", solutionCodeDensity: plan.density };
    case "moderate":
      return { kind: "moderate", redHerringDensity: plan.density };
    case "deceptive":
      return {
        kind: "deceptive",
        decoyDensity: plan.density,
        sequenceCodes: new Set(sequences.flat()),
      };
  }
}

const NEIGHBOURS: readonly [number, number][] = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

function adjacentToPath(
  pos: Position,
  pathKeys: ReadonlySet<string>,
): boolean {
  return NEIGHBOURS.some(([dr, dc]) =>
    pathKeys.has(positionKey({ row: pos.row + dr, col: pos.col + dc })),
  );
}

function codeChooser(
  strategy: FillStrategy,
  pathKeys: ReadonlySet<string>,
  pathCodes: readonly Code[],
  codePool: readonly Code[],
  rng: RandomSource,
): (pos: Position) => Code {
  const pickPool = (): Code => codePool[rng.nextInt(codePool.length)];

  switch (strategy.kind) {
    case "forgiving":
    case "moderate": {
      const density =
        strategy.kind === "forgiving"
          ? strategy.solutionCodeDensity
          : strategy.redHerringDensity;
      return () =>
        rng.chance(density) ? (rng.pick(pathCodes) ?? pickPool()) : pickPool();
    }
    case "deceptive": {
      const decoys = [...strategy.sequenceCodes];
      const safe = codePool.filter((c) => !strategy.sequenceCodes.has(c));
      return (pos) => {
        const adjacent = adjacentToPath(pos, pathKeys);
        if (adjacent && rng.chance(strategy.decoyDensity)) {
          return rng.pick(decoys) ?? pickPool();
        }
        return rng.pick(safe) ?? pickPool();
      };
    }
  }
}

/**
 * Populate every non-path cell. Path cells are copied through untouched.
 *
 * - forgiving / moderate: with probability `density` a code that appears on
 *   the path, else any pool code.
 * - deceptive: cells touching the path get a sequence code with probability
 *   `decoyDensity`; everything else gets a code no sequence uses, when the
 *   pool has one.
 */
export function fillGridByStrategy(
  grid: Grid,
  solutionPath: readonly Position[],
  strategy: FillStrategy,
  codePool: readonly Code[],
  rng: RandomSource,
): Grid {
  const filled = cloneGrid(grid);
  const pathKeys = new Set(solutionPath.map(positionKey));
  const pathCodes = [
    ...new Set(solutionPath.map((p) => grid[p.row][p.col].code)),
  ];

  const chooseCode = codeChooser(strategy, pathKeys, pathCodes, codePool, rng);

  for (let row = 0; row < filled.length; row++) {
    for (let col = 0; col < filled[row].length; col++) {
      const pos = { row, col };
      if (pathKeys.has(positionKey(pos))) continue;
      filled[row][col] = createCell(chooseCode(pos), row, col);
    }
  }

  return filled;
}
