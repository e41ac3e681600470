import type {
  DifficultyTier,
  FillPlan,
  IntRange,
  RandomSource,
} from "@breachgrid/core";
import { randomSequenceLengths } from "./sequences";

/** Randomized difficulty parameters, fixed for one generation attempt. */
export interface DifficultyParams {
  gridSize: number;
  sequenceCount: number;
  sequenceLengths: number[];
  codePoolSize: number;
  bufferMargin: number;
  bufferCap: number;
  overlapCount: number;
  overlapDepth: number;
  fill: FillPlan;
  usesQualityGate: boolean;
  targetSolutions: IntRange;
  minFalseStarts: number;
}

function roll(range: IntRange, rng: RandomSource): number {
  return rng.intBetween(range[0], range[1]);
}

function assertTier(tier: DifficultyTier): void {
  if (!Number.isInteger(tier.gridSize) || tier.gridSize < 1) {
    throw new Error(
      `Invalid tier: gridSize must be a positive integer, got ${tier.gridSize}`,
    );
  }
  if (tier.sequenceCount[0] < 1) {
    throw new Error(
      "Invalid tier: sequenceCount must start at 1 or more, " +
        `got ${tier.sequenceCount[0]}`,
    );
  }
  if (
    tier.minSequenceLength < 1 ||
    tier.maxSequenceLength < tier.minSequenceLength
  ) {
    const { minSequenceLength: min, maxSequenceLength: max } = tier;
    throw new Error(
      `Invalid tier: sequence lengths ${min}..${max} are not a valid range`,
    );
  }
}

export function sampleDifficultyParams(
  tier: DifficultyTier,
  rng: RandomSource,
): DifficultyParams {
  assertTier(tier);

  const sequenceCount = roll(tier.sequenceCount, rng);
  const junctions = sequenceCount - 1;
  // Overlap parameters come first: they decide how long the sequences may be.
  const overlapCount = Math.min(roll(tier.overlapCount, rng), junctions);
  const overlapDepth = Math.max(
    0,
    Math.min(roll(tier.overlapDepth, rng), tier.minSequenceLength - 1),
  );

  // Enough codes that the merged path fills the buffer cap exactly.
  const maxTotal = tier.bufferCap + overlapCount * overlapDepth;
  const sequenceLengths = randomSequenceLengths(
    sequenceCount,
    tier.minSequenceLength,
    maxTotal,
    rng,
    tier.maxSequenceLength,
  );

  return {
    gridSize: tier.gridSize,
    sequenceCount,
    sequenceLengths,
    codePoolSize: roll(tier.codePoolSize, rng),
    bufferMargin: roll(tier.bufferMargin, rng),
    bufferCap: tier.bufferCap,
    overlapCount,
    overlapDepth,
    fill: tier.fill,
    usesQualityGate: tier.usesQualityGate,
    targetSolutions: tier.targetSolutions,
    minFalseStarts: tier.minFalseStarts,
  };
}
