import {
  DEFAULT_CODES,
  createCell,
  createTargetSequence,
} from "@breachgrid/core";
import type {
  Code,
  Difficulty,
  Grid,
  Position,
  Puzzle,
  RandomSource,
} from "@breachgrid/core";

const FALLBACK_PATH: readonly Position[] = [
  { row: 0, col: 0 },
  { row: 1, col: 0 },
  { row: 1, col: 1 },
];

/**
 * A puzzle that needs no search and cannot fail: one three-code sequence
 * laid out at (0,0) → (1,0) → (1,1). Every other cell holds a code outside
 * the sequence, so that path is the only shortest solution.
 */
export function generateFallback(
  gridSize: number,
  bufferSize: number,
  difficulty: Difficulty,
  rng: RandomSource,
  codes: readonly Code[] = DEFAULT_CODES,
): Puzzle {
  const size = Math.max(2, gridSize);
  const catalog = codes.length > 0 ? codes : DEFAULT_CODES;
  const shuffled = rng.sample(catalog, catalog.length);

  const sequence: Code[] = FALLBACK_PATH.map(
    (_, i) => shuffled[i % shuffled.length],
  );
  const filler = shuffled.filter((c) => !sequence.includes(c));
  const fillerPool = filler.length > 0 ? filler : shuffled;

  const grid: Grid = Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, col) =>
      createCell(fillerPool[rng.nextInt(fillerPool.length)], row, col),
    ),
  );
  FALLBACK_PATH.forEach((pos, i) => {
    grid[pos.row][pos.col] = createCell(sequence[i], pos.row, pos.col);
  });

  return {
    grid,
    sequences: [createTargetSequence(sequence)],
    bufferSize: Math.max(bufferSize, sequence.length),
    par: sequence.length,
    difficulty,
    solutionPath: [...FALLBACK_PATH],
  };
}
