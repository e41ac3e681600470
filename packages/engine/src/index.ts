export {
  generate,
  generateWithReport,
  DEFAULT_MAX_ATTEMPTS,
} from "./generator";
export type {
  GeneratorOptions,
  GenerationReport,
  RejectReason,
  RejectKind,
} from "./generator";
export { generateRushPuzzle } from "./rush";
export type { RushOptions } from "./rush";
export { solve, findShortestSolution } from "./solver";
export { validatePuzzle } from "./validate";
export type { ValidateOptions } from "./validate";
export { generateFallback } from "./fallback";

// Pipeline stages, exported for callers that assemble their own boards
export {
  generateOverlappingSequences,
  randomSequenceLengths,
  randomLengths,
} from "./sequences";
export { placeSolutionPath } from "./placement";
export type { PlacedPath } from "./placement";
export {
  fillGridByStrategy,
  resolveFillStrategy,
  selectCodePool,
} from "./fill";
export { adjustSolutionCount } from "./adjust";
export type { AdjustInput, AdjustOutcome } from "./adjust";
export { layerSpecialCells } from "./specialCells";
export type { SpecialCellPlan } from "./specialCells";
export { sampleDifficultyParams } from "./params";
export type { DifficultyParams } from "./params";
export {
  advanceProgress,
  retreatProgress,
  isComplete,
  neededCodes,
  verifyPathCompletes,
  bufferContainsSequence,
} from "./progress";
export type { Sequences } from "./progress";
