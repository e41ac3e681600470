import {
  BUFFER_CAP,
  DEFAULT_CODES,
  createTargetSequence,
  isDecay,
  log as rootLog,
  rushBufferSize,
  rushStageFor,
} from "@breachgrid/core";
import type {
  Code,
  FillStrategy,
  Logger,
  Puzzle,
  RandomSource,
  RushStage,
  SolutionChain,
} from "@breachgrid/core";
import { generateOverlappingSequences, randomLengths } from "./sequences";
import { placeSolutionPath } from "./placement";
import { fillGridByStrategy, selectCodePool } from "./fill";
import { layerSpecialCells } from "./specialCells";
import { findShortestSolution, solve } from "./solver";
import { validatePuzzle } from "./validate";
import { generateFallback } from "./fallback";
import { DEFAULT_MAX_ATTEMPTS } from "./generator";

export interface RushOptions {
  codes?: readonly Code[];
  maxAttempts?: number;
  logger?: Logger;
  /** Overrides the stage looked up from the grid number. */
  stage?: RushStage;
}

/** Stages at or above this cap are accepted without running the solver. */
const UNGATED_CAP = 100;

function buildChain(
  stage: RushStage,
  codePool: readonly Code[],
  rng: RandomSource,
): SolutionChain {
  const count = stage.sequenceCount;
  if (count === 1) {
    const length = rng.intBetween(3, 4);
    return generateOverlappingSequences(
      { overlapCount: 0, overlapDepth: 0, codePool, sequenceLengths: [length] },
      rng,
    );
  }

  const overlapCount = count >= 3 ? Math.min(2, count - 1) : 1;
  const overlapDepth = count >= 3 ? 2 : 1;
  const merged = rng.intBetween(5, 6);
  return generateOverlappingSequences(
    {
      overlapCount,
      overlapDepth,
      codePool,
      sequenceLengths: randomLengths(merged, count, overlapDepth, rng),
    },
    rng,
  );
}

function fillStrategyFor(stage: RushStage, sequences: Code[][]): FillStrategy {
  if (stage.maxSolutions >= UNGATED_CAP) {
    return { kind: "forgiving", solutionCodeDensity: 0.5 };
  }
  if (stage.maxSolutions >= 8) {
    return { kind: "moderate", redHerringDensity: 0.15 };
  }
  return {
    kind: "deceptive",
    decoyDensity: 0.3,
    sequenceCodes: new Set(sequences.flat()),
  };
}

function tryGenerateRush(
  stage: RushStage,
  catalog: readonly Code[],
  rng: RandomSource,
  log: Logger,
): Puzzle | null {
  const codePool = selectCodePool(catalog, stage.codePoolSize, rng);

  const chain = buildChain(stage, codePool, rng);
  if (chain.sequences.length === 0) return null;

  const placed = placeSolutionPath(chain.mergedPath, stage.gridSize, rng);
  if (!placed) return null;

  const filled = fillGridByStrategy(
    placed.grid,
    placed.path,
    fillStrategyFor(stage, chain.sequences),
    codePool,
    rng,
  );
  const grid = layerSpecialCells(filled, placed.path, stage, rng);

  const solutionPath =
    findShortestSolution(grid, chain.sequences, placed.path.length - 1) ??
    placed.path;
  // A decaying cell may change code before the player reaches it.
  if (solutionPath.some((pos) => isDecay(grid[pos.row][pos.col]))) {
    log.debug("Rejected: shortest path crosses a decay cell");
    return null;
  }
  const par = solutionPath.length;
  const puzzle: Puzzle = {
    grid,
    sequences: chain.sequences.map((codes) => createTargetSequence(codes)),
    bufferSize: Math.min(par + 2, BUFFER_CAP),
    par,
    difficulty: "medium",
    solutionPath,
  };

  if (!validatePuzzle(puzzle, { checkBlockers: true })) return null;
  if (stage.maxSolutions >= UNGATED_CAP) return puzzle;

  const result = solve(
    grid,
    chain.sequences,
    puzzle.bufferSize,
    stage.maxSolutions + 1,
  );
  if (!result.solvable) {
    log.debug("Rejected: not solvable");
    return null;
  }
  if (result.solutionCount > stage.maxSolutions) {
    log.debug(
      { solutions: result.solutionCount },
      "Rejected: too many solutions",
    );
    return null;
  }
  if (result.falseStarts < stage.minFalseStarts) {
    log.debug(
      { falseStarts: result.falseStarts },
      "Rejected: too few false starts",
    );
    return null;
  }
  return puzzle;
}

/** Generate the board for the `gridNumber`-th grid of a rush run. */
export function generateRushPuzzle(
  gridNumber: number,
  rng: RandomSource,
  options: RushOptions = {},
): Puzzle {
  const stage = options.stage ?? rushStageFor(gridNumber);
  const catalog = options.codes ?? DEFAULT_CODES;
  if (catalog.length === 0) throw new Error("Code catalog is empty");
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const log = (options.logger ?? rootLog).child({
    component: "rush",
    gridNumber,
    gridSize: stage.gridSize,
  });

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const puzzle = tryGenerateRush(stage, catalog, rng, log);
    if (puzzle) {
      log.info({ attempts: attempt + 1 }, "Grid Rush puzzle generated");
      return puzzle;
    }
  }

  log.warn({ attempts: maxAttempts }, "Grid Rush puzzle used fallback");
  return generateFallback(
    stage.gridSize,
    rushBufferSize(stage),
    "medium",
    rng,
    catalog,
  );
}
