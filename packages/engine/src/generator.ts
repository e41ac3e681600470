import {
  DEFAULT_CODES,
  DIFFICULTY_TIERS,
  createTargetSequence,
  inRange,
  positionKey,
  log as rootLog,
} from "@breachgrid/core";
import type {
  Code,
  Difficulty,
  DifficultyTable,
  Logger,
  Position,
  Puzzle,
  RandomSource,
  SolutionChain,
} from "@breachgrid/core";
import { generateOverlappingSequences } from "./sequences";
import { placeSolutionPath } from "./placement";
import {
  fillGridByStrategy,
  resolveFillStrategy,
  selectCodePool,
} from "./fill";
import { findShortestSolution, solve } from "./solver";
import { adjustSolutionCount } from "./adjust";
import { validatePuzzle } from "./validate";
import { sampleDifficultyParams } from "./params";
import type { DifficultyParams } from "./params";
import { generateFallback } from "./fallback";

export const DEFAULT_MAX_ATTEMPTS = 20;

export interface GeneratorOptions {
  tiers?: DifficultyTable;
  /** Catalog each attempt's code pool is drawn from. */
  codes?: readonly Code[];
  maxAttempts?: number;
  logger?: Logger;
}

/** Why an attempt was thrown away. */
export type RejectReason =
  | { kind: "build" }
  | { kind: "validation" }
  | { kind: "unsolvable" }
  | { kind: "falseStarts"; found: number; need: number }
  | { kind: "solutions"; found: number; cap: number }
  | { kind: "adjustment" };

export type RejectKind = RejectReason["kind"];

export interface GenerationReport {
  puzzle: Puzzle;
  /** Attempts spent, the fallback excluded. */
  attempts: number;
  usedFallback: boolean;
  rejects: Partial<Record<RejectKind, number>>;
}

export type Attempt =
  | { puzzle: Puzzle; reason?: undefined }
  | { puzzle?: undefined; reason: RejectReason };

function reject(reason: RejectReason): Attempt {
  return { reason };
}

/**
 * The path the puzzle advertises: the shortest solution that is no longer
 * than the placed one. Accidental shortcuts created by the fill become the
 * canonical path, so par is always the true minimum.
 */
function canonicalPath(
  puzzleGrid: Puzzle["grid"],
  sequences: readonly Code[][],
  placed: Position[],
): Position[] {
  return (
    findShortestSolution(puzzleGrid, sequences, placed.length - 1) ?? placed
  );
}

function buildPuzzle(
  grid: Puzzle["grid"],
  chain: SolutionChain,
  placed: Position[],
  params: DifficultyParams,
  difficulty: Difficulty,
): Puzzle {
  const solutionPath = canonicalPath(grid, chain.sequences, placed);
  const par = solutionPath.length;
  return {
    grid,
    sequences: chain.sequences.map((codes) => createTargetSequence(codes)),
    bufferSize: Math.min(par + params.bufferMargin, params.bufferCap),
    par,
    difficulty,
    solutionPath,
  };
}

function tryGenerate(
  difficulty: Difficulty,
  params: DifficultyParams,
  catalog: readonly Code[],
  rng: RandomSource,
): Attempt {
  const codePool = selectCodePool(catalog, params.codePoolSize, rng);

  const chain = generateOverlappingSequences(
    {
      overlapCount: params.overlapCount,
      overlapDepth: params.overlapDepth,
      codePool,
      sequenceLengths: params.sequenceLengths,
    },
    rng,
  );
  if (chain.sequences.length === 0) return reject({ kind: "build" });

  const placed = placeSolutionPath(chain.mergedPath, params.gridSize, rng);
  if (!placed) return reject({ kind: "build" });

  const strategy = resolveFillStrategy(params.fill, chain.sequences);
  const grid = fillGridByStrategy(
    placed.grid,
    placed.path,
    strategy,
    codePool,
    rng,
  );

  const puzzle = buildPuzzle(grid, chain, placed.path, params, difficulty);
  if (!validatePuzzle(puzzle)) return reject({ kind: "validation" });

  if (!params.usesQualityGate) return { puzzle };

  return verifySolverQuality(
    puzzle,
    chain,
    placed.path,
    codePool,
    params,
    rng,
  );
}

/** Placed path first, then any advertised cells it does not already cover. */
function protectedCells(
  puzzle: Puzzle,
  placedPath: readonly Position[],
): Position[] {
  const keys = new Set(placedPath.map(positionKey));
  return [
    ...placedPath,
    ...puzzle.solutionPath.filter((pos) => !keys.has(positionKey(pos))),
  ];
}

/**
 * Solver gate for tiers that use it. Adjustment may only rewrite cells off
 * both the placed path and the advertised path, so the advertised path and
 * its codes survive unchanged; an adjustment that opens a shorter path is
 * thrown away rather than moving par.
 */
export function verifySolverQuality(
  puzzle: Puzzle,
  chain: SolutionChain,
  placedPath: readonly Position[],
  codePool: readonly Code[],
  params: DifficultyParams,
  rng: RandomSource,
): Attempt {
  const cap = params.targetSolutions[1];
  const result = solve(
    puzzle.grid,
    chain.sequences,
    puzzle.bufferSize,
    cap + 1,
  );

  if (!result.solvable) return reject({ kind: "unsolvable" });
  if (result.falseStarts < params.minFalseStarts) {
    return reject({
      kind: "falseStarts",
      found: result.falseStarts,
      need: params.minFalseStarts,
    });
  }
  if (inRange(params.targetSolutions, result.solutionCount)) {
    return { puzzle };
  }

  const adjusted = adjustSolutionCount({
    grid: puzzle.grid,
    solutionPath: protectedCells(puzzle, placedPath),
    sequences: chain.sequences,
    bufferSize: puzzle.bufferSize,
    targetRange: params.targetSolutions,
    codePool,
    rng,
  });
  if (!adjusted) {
    return result.solutionCount > cap
      ? reject({ kind: "solutions", found: result.solutionCount, cap })
      : reject({ kind: "adjustment" });
  }
  if (!adjusted.result.solvable) return reject({ kind: "unsolvable" });
  if (adjusted.result.falseStarts < params.minFalseStarts) {
    return reject({
      kind: "falseStarts",
      found: adjusted.result.falseStarts,
      need: params.minFalseStarts,
    });
  }

  // Promoted cells can open a path shorter than par.
  const shortcut = findShortestSolution(
    adjusted.grid,
    chain.sequences,
    puzzle.par - 1,
  );
  if (shortcut) return reject({ kind: "adjustment" });

  const rebased: Puzzle = { ...puzzle, grid: adjusted.grid };
  if (!validatePuzzle(rebased)) return reject({ kind: "validation" });

  return { puzzle: rebased };
}

function summarize(counts: Partial<Record<string, number>>): string {
  return Object.entries(counts)
    .sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0))
    .map(([key, value]) => `${key}=${value}`)
    .join(" ");
}

/**
 * Generate a puzzle for `difficulty`, retrying with fresh parameters until
 * an attempt passes, and falling back to a fixed three-cell puzzle once the
 * attempt budget is spent. Never throws for a valid tier table.
 */
export function generateWithReport(
  difficulty: Difficulty,
  rng: RandomSource,
  options: GeneratorOptions = {},
): GenerationReport {
  const tier = (options.tiers ?? DIFFICULTY_TIERS)[difficulty];
  const catalog = options.codes ?? DEFAULT_CODES;
  if (catalog.length === 0) throw new Error("Code catalog is empty");
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const log = (options.logger ?? rootLog).child({
    component: "generator",
    difficulty,
  });

  const rejects: Partial<Record<RejectKind, number>> = {};
  const seqRolls: Partial<Record<string, number>> = {};

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const params = sampleDifficultyParams(tier, rng);
    const rollKey = `${params.sequenceCount}seq`;
    seqRolls[rollKey] = (seqRolls[rollKey] ?? 0) + 1;

    const outcome = tryGenerate(difficulty, params, catalog, rng);
    if (outcome.puzzle) {
      const { puzzle } = outcome;
      log.info(
        {
          attempts: attempt + 1,
          seqCount: puzzle.sequences.length,
          seqLens: params.sequenceLengths,
          par: puzzle.par,
          buffer: puzzle.bufferSize,
        },
        "Puzzle generated",
      );
      return { puzzle, attempts: attempt + 1, usedFallback: false, rejects };
    }

    const { reason } = outcome;
    rejects[reason.kind] = (rejects[reason.kind] ?? 0) + 1;
    log.debug({ attempt: attempt + 1, reason }, "Attempt rejected");
  }

  log.warn(
    {
      attempts: maxAttempts,
      rejects: summarize(rejects),
      seqRolls: summarize(seqRolls),
    },
    "Puzzle generation used fallback",
  );
  const puzzle = generateFallback(
    tier.gridSize,
    tier.nominalBufferSize,
    difficulty,
    rng,
    catalog,
  );
  return { puzzle, attempts: maxAttempts, usedFallback: true, rejects };
}

export function generate(
  difficulty: Difficulty,
  rng: RandomSource,
  options: GeneratorOptions = {},
): Puzzle {
  return generateWithReport(difficulty, rng, options).puzzle;
}
