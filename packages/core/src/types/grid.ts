export type Code = string;

export interface Position {
  readonly row: number;
  readonly col: number;
}

export type CellKind =
  | { type: "normal" }
  | { type: "blocker" }
  | { type: "wildcard" }
  | { type: "decay"; movesRemaining: number };

export interface Cell {
  code: Code;
  row: number;
  col: number;
  kind: CellKind;
  /** Set by the play loop; generation never reads it. */
  selected: boolean;
}

/** Square, row-major. Exactly one cell per position. */
export type Grid = Cell[][];

export const NORMAL: CellKind = { type: "normal" };

/** Code a cell holds before the filler reaches it. */
export const EMPTY_CODE: Code = "";

export function createCell(
  code: Code,
  row: number,
  col: number,
  kind: CellKind = NORMAL,
): Cell {
  return { code, row, col, kind, selected: false };
}

/** Stable string key so positions can live in a Set or Map. */
export function positionKey(pos: Position): string {
  return `${pos.row},${pos.col}`;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

export function isBlocked(cell: Cell): boolean {
  return cell.kind.type === "blocker";
}

export function isWildcard(cell: Cell): boolean {
  return cell.kind.type === "wildcard";
}

export function isDecay(cell: Cell): boolean {
  return cell.kind.type === "decay";
}

/** Label shown for a cell: "??" for wildcards, "XX" for blockers. */
export function displayCode(cell: Cell): string {
  switch (cell.kind.type) {
    case "wildcard":
      return "??";
    case "blocker":
      return "XX";
    default:
      return cell.code;
  }
}

/** Build a grid from a square table of codes. */
export function gridFromCodes(codes: Code[][]): Grid {
  return codes.map((rowCodes, row) =>
    rowCodes.map((code, col) => createCell(code, row, col)),
  );
}

export function emptyGrid(size: number): Grid {
  return Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, col) =>
      createCell(EMPTY_CODE, row, col),
    ),
  );
}

export function cloneGrid(grid: Grid): Grid {
  return grid.map((row) =>
    row.map((cell) => ({ ...cell, kind: { ...cell.kind } })),
  );
}

export function gridCodes(grid: Grid): Code[][] {
  return grid.map((row) => row.map((cell) => cell.code));
}

export function inBounds(size: number, pos: Position): boolean {
  return pos.row >= 0 && pos.row < size && pos.col >= 0 && pos.col < size;
}
