export type Difficulty = "easy" | "medium" | "hard" | "expert";

export const DIFFICULTIES: readonly Difficulty[] = [
  "easy",
  "medium",
  "hard",
  "expert",
];

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((d) => d === value);
}

/** Inclusive [min, max]. */
export type IntRange = readonly [number, number];

export function inRange(range: IntRange, value: number): boolean {
  return value >= range[0] && value <= range[1];
}

/** How a tier fills non-path cells. Resolved per attempt. */
export type FillPlan =
  | { kind: "forgiving"; density: number }
  | { kind: "moderate"; density: number }
  | { kind: "deceptive"; density: number };

export interface DifficultyTier {
  gridSize: number;
  sequenceCount: IntRange;
  /** How many catalog codes a puzzle draws on (fewer = more ambiguity). */
  codePoolSize: IntRange;
  /** Buffer = par + margin, capped at `bufferCap`. */
  bufferMargin: IntRange;
  bufferCap: number;
  /** Buffer used by the fallback puzzle. */
  nominalBufferSize: number;
  minSequenceLength: number;
  maxSequenceLength: number;
  overlapCount: IntRange;
  overlapDepth: IntRange;
  fill: FillPlan;
  usesQualityGate: boolean;
  targetSolutions: IntRange;
  minFalseStarts: number;
}

export type DifficultyTable = Record<Difficulty, DifficultyTier>;

/**
 * Grid Rush stage: a harder board per cleared grid, with blockers,
 * wildcards and decaying cells layered over the fill.
 */
export interface RushStage {
  gridSize: number;
  sequenceCount: number;
  blockerCount: IntRange;
  decayCellCount: number;
  wildcardChance: number;
  codePoolSize: number;
  /** 100 or more skips the solver check. */
  maxSolutions: number;
  minFalseStarts: number;
}
