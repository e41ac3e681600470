import type { DifficultyTable, RushStage } from "../types/difficulty";

/** Merged paths never outgrow this many selections. */
export const BUFFER_CAP = 8;

export const DIFFICULTY_TIERS: DifficultyTable = {
  easy: {
    gridSize: 5,
    sequenceCount: [1, 2],
    codePoolSize: [6, 6],
    bufferMargin: [3, 3],
    bufferCap: BUFFER_CAP,
    nominalBufferSize: 7,
    minSequenceLength: 2,
    maxSequenceLength: 5,
    overlapCount: [1, 1],
    overlapDepth: [1, 1],
    fill: { kind: "forgiving", density: 0.5 },
    usesQualityGate: false,
    targetSolutions: [2, 100],
    minFalseStarts: 0,
  },
  medium: {
    gridSize: 5,
    sequenceCount: [1, 2],
    codePoolSize: [5, 5],
    bufferMargin: [2, 2],
    bufferCap: BUFFER_CAP,
    nominalBufferSize: 7,
    minSequenceLength: 2,
    maxSequenceLength: 5,
    overlapCount: [0, 1],
    overlapDepth: [1, 1],
    fill: { kind: "moderate", density: 0.15 },
    usesQualityGate: false,
    targetSolutions: [1, 50],
    minFalseStarts: 0,
  },
  hard: {
    gridSize: 5,
    sequenceCount: [2, 3],
    codePoolSize: [4, 5],
    bufferMargin: [1, 1],
    bufferCap: BUFFER_CAP,
    nominalBufferSize: 8,
    minSequenceLength: 3,
    maxSequenceLength: 5,
    overlapCount: [1, 2],
    overlapDepth: [1, 2],
    fill: { kind: "deceptive", density: 0.3 },
    usesQualityGate: false,
    targetSolutions: [1, 25],
    minFalseStarts: 0,
  },
  expert: {
    gridSize: 6,
    sequenceCount: [2, 4],
    codePoolSize: [4, 4],
    bufferMargin: [0, 1],
    bufferCap: BUFFER_CAP,
    nominalBufferSize: 8,
    minSequenceLength: 3,
    maxSequenceLength: 5,
    overlapCount: [2, 3],
    overlapDepth: [1, 2],
    fill: { kind: "deceptive", density: 0.4 },
    usesQualityGate: true,
    targetSolutions: [1, 10],
    minFalseStarts: 1,
  },
};

/** Rush stages, keyed by the first grid number they apply to. */
export const RUSH_STAGES: readonly { fromGrid: number; stage: RushStage }[] = [
  {
    fromGrid: 1,
    stage: {
      gridSize: 4,
      sequenceCount: 2,
      blockerCount: [0, 0],
      decayCellCount: 0,
      wildcardChance: 0,
      codePoolSize: 6,
      maxSolutions: 100,
      minFalseStarts: 0,
    },
  },
  {
    fromGrid: 3,
    stage: {
      gridSize: 5,
      sequenceCount: 2,
      blockerCount: [2, 3],
      decayCellCount: 0,
      wildcardChance: 0,
      codePoolSize: 5,
      maxSolutions: 20,
      minFalseStarts: 0,
    },
  },
  {
    fromGrid: 5,
    stage: {
      gridSize: 5,
      sequenceCount: 3,
      blockerCount: [4, 5],
      decayCellCount: 0,
      wildcardChance: 0.1,
      codePoolSize: 5,
      maxSolutions: 8,
      minFalseStarts: 1,
    },
  },
  {
    fromGrid: 7,
    stage: {
      gridSize: 6,
      sequenceCount: 3,
      blockerCount: [6, 8],
      decayCellCount: 2,
      wildcardChance: 0.15,
      codePoolSize: 4,
      maxSolutions: 5,
      minFalseStarts: 1,
    },
  },
];

export function rushStageFor(gridNumber: number): RushStage {
  let found = RUSH_STAGES[0].stage;
  for (const entry of RUSH_STAGES) {
    if (gridNumber >= entry.fromGrid) found = entry.stage;
  }
  return found;
}

/** Buffer size for a rush board (scales with grid size). */
export function rushBufferSize(stage: RushStage): number {
  switch (stage.gridSize) {
    case 4:
      return 6;
    case 6:
      return 8;
    default:
      return 7;
  }
}
