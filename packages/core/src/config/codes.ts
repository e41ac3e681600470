import type { Code } from "../types/grid";

/** Catalog a puzzle's code pool is drawn from. */
export const DEFAULT_CODES: readonly Code[] = [
  "1C",
  "BD",
  "55",
  "E9",
  "7A",
  "FF",
];
