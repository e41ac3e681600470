import {
  createCell,
  createTargetSequence,
  isDifficulty,
} from "@breachgrid/core";
import type { Cell, CellKind, Grid, Position, Puzzle } from "@breachgrid/core";

/** What `--json` prints and `solve` reads back. */
export interface PuzzleFile {
  difficulty: string;
  bufferSize: number;
  par: number;
  sequences: string[][];
  grid: { code: string; kind: CellKind }[][];
  solutionPath: Position[];
  seed?: string;
  attempts?: number;
  usedFallback?: boolean;
}

export interface PuzzleFileMeta {
  seed?: string;
  attempts?: number;
  usedFallback?: boolean;
}

export function toPuzzleFile(
  puzzle: Puzzle,
  meta: PuzzleFileMeta = {},
): PuzzleFile {
  return {
    difficulty: puzzle.difficulty,
    bufferSize: puzzle.bufferSize,
    par: puzzle.par,
    sequences: puzzle.sequences.map((s) => [...s.codes]),
    grid: puzzle.grid.map((row) =>
      row.map((cell) => ({ code: cell.code, kind: cell.kind })),
    ),
    solutionPath: puzzle.solutionPath.map((p) => ({ row: p.row, col: p.col })),
    ...meta,
  };
}

function invalid(reason: string): Error {
  return new Error(`Invalid puzzle file: ${reason}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function parseKind(value: unknown, where: string): CellKind {
  if (value === undefined) return { type: "normal" };
  if (!isRecord(value)) throw invalid(`${where}.kind must be an object`);
  const { type, movesRemaining } = value;
  switch (type) {
    case "normal":
    case "blocker":
    case "wildcard":
      return { type };
    case "decay":
      if (!isNonNegativeInt(movesRemaining)) {
        throw invalid(`${where}.kind.movesRemaining must be a whole number`);
      }
      return { type, movesRemaining };
    default:
      throw invalid(`${where}.kind.type "${String(type)}" is not a cell kind`);
  }
}

function parseGrid(value: unknown): Grid {
  if (!Array.isArray(value) || value.length === 0) {
    throw invalid("grid must be a non-empty array of rows");
  }
  const size = value.length;
  return value.map((row: unknown, r): Cell[] => {
    if (!Array.isArray(row) || row.length !== size) {
      throw invalid(`grid row ${r} must have ${size} cells`);
    }
    return row.map((cell: unknown, c): Cell => {
      const where = `grid[${r}][${c}]`;
      if (!isRecord(cell)) throw invalid(`${where} must be an object`);
      const { code, kind } = cell;
      if (typeof code !== "string") {
        throw invalid(`${where}.code must be a string`);
      }
      return createCell(code, r, c, parseKind(kind, where));
    });
  });
}

function parseSequences(value: unknown): string[][] {
  if (!Array.isArray(value) || value.length === 0) {
    throw invalid("sequences must be a non-empty array");
  }
  return value.map((seq: unknown, i) => {
    if (!Array.isArray(seq) || seq.length === 0) {
      throw invalid(`sequence ${i} must be a non-empty array`);
    }
    return seq.map((code: unknown) => {
      if (typeof code !== "string") {
        throw invalid(`sequence ${i} must hold strings`);
      }
      return code;
    });
  });
}

function parsePath(value: unknown): Position[] {
  if (!Array.isArray(value)) throw invalid("solutionPath must be an array");
  return value.map((pos: unknown, i) => {
    if (!isRecord(pos)) {
      throw invalid(`solutionPath[${i}] must be { row, col }`);
    }
    const { row, col } = pos;
    if (!isNonNegativeInt(row) || !isNonNegativeInt(col)) {
      throw invalid(`solutionPath[${i}] must be { row, col }`);
    }
    return { row, col };
  });
}

export function parsePuzzleFile(text: string): Puzzle {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    throw invalid(err instanceof Error ? err.message : String(err));
  }
  if (!isRecord(data)) throw invalid("expected a JSON object");

  const { difficulty, bufferSize, par } = data;
  if (typeof difficulty !== "string" || !isDifficulty(difficulty)) {
    throw invalid(`unknown difficulty "${String(difficulty)}"`);
  }
  if (!isNonNegativeInt(bufferSize) || bufferSize < 1) {
    throw invalid("bufferSize must be a positive whole number");
  }
  if (!isNonNegativeInt(par)) throw invalid("par must be a whole number");

  return {
    grid: parseGrid(data.grid),
    sequences: parseSequences(data.sequences).map((codes) =>
      createTargetSequence(codes),
    ),
    bufferSize,
    par,
    difficulty,
    solutionPath: parsePath(data.solutionPath ?? []),
  };
}
