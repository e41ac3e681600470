import type { Code, Grid, Position } from "./grid";
import type { Difficulty } from "./difficulty";

/**
 * A run of codes the player must select in order, not necessarily
 * contiguously. `matchedCount` and `impossible` belong to the play loop.
 */
export interface TargetSequence {
  readonly codes: readonly Code[];
  matchedCount: number;
  impossible: boolean;
}

export function createTargetSequence(codes: readonly Code[]): TargetSequence {
  return { codes: [...codes], matchedCount: 0, impossible: false };
}

export function isSequenceComplete(sequence: TargetSequence): boolean {
  return sequence.matchedCount >= sequence.codes.length;
}

export function nextNeededCode(sequence: TargetSequence): Code | null {
  return isSequenceComplete(sequence)
    ? null
    : sequence.codes[sequence.matchedCount];
}

/** Target sequences plus the single code run that satisfies all of them. */
export interface SolutionChain {
  sequences: Code[][];
  mergedPath: Code[];
}

export interface OverlapConfig {
  /** Junctions between adjacent sequences that share codes. */
  overlapCount: number;
  /** Codes shared at each overlapping junction. */
  overlapDepth: number;
  codePool: readonly Code[];
  sequenceLengths: readonly number[];
}

export type FillStrategy =
  | { kind: "forgiving"; solutionCodeDensity: number }
  | { kind: "moderate"; redHerringDensity: number }
  | {
      kind: "deceptive";
      decoyDensity: number;
      sequenceCodes: ReadonlySet<Code>;
    };

export class SolveResult {
  constructor(
    /** Sorted shortest first. */
    readonly solutions: Position[][],
    readonly falseStarts: number,
  ) {}

  get solvable(): boolean {
    return this.solutions.length > 0;
  }

  /** Length of the shortest discovered solution, 0 when unsolvable. */
  get par(): number {
    return this.solutions[0]?.length ?? 0;
  }

  get solutionCount(): number {
    return this.solutions.length;
  }
}

export interface Puzzle {
  readonly grid: Grid;
  readonly sequences: readonly TargetSequence[];
  /** Selections available to the player. */
  readonly bufferSize: number;
  readonly par: number;
  readonly difficulty: Difficulty;
  readonly solutionPath: readonly Position[];
}

export function sequenceCodes(puzzle: Puzzle): Code[][] {
  return puzzle.sequences.map((s) => [...s.codes]);
}
