export * from "./types/grid";
export * from "./types/puzzle";
export * from "./types/difficulty";
export { RandomSource, SeededRng, MathRandomSource } from "./libs/prng";

// Logging
export {
  default as log,
  createLogger,
  silentLogger,
  isLogLevel,
  parseLogLevel,
} from "./libs/logger";
export type { Logger, LogLevel } from "./libs/logger";

// Tables
export { DEFAULT_CODES } from "./config/codes";
export {
  BUFFER_CAP,
  DIFFICULTY_TIERS,
  RUSH_STAGES,
  rushStageFor,
  rushBufferSize,
} from "./config/tiers";
