import { SolveResult, isBlocked, isWildcard } from "@breachgrid/core";
import type { Cell, Grid, Position } from "@breachgrid/core";
import {
  advanceProgress,
  isComplete,
  maxRemaining,
  retreatProgress,
} from "./progress";
import type { Sequences } from "./progress";

/**
 * One record for the whole search: each step pushes onto it before
 * descending and restores it on the way back.
 */
interface SearchState {
  readonly grid: Grid;
  readonly sequences: Sequences;
  readonly size: number;
  readonly maxSolutions: number;
  progress: number[];
  /** Row-major flags, `row * size + col`. */
  used: boolean[];
  path: Position[];
  current: Position;
  horizontal: boolean;
  movesRemaining: number;
  solutions: Position[][];
}

/** Does selecting `cell` move at least one incomplete sequence forward? */
function advances(state: SearchState, cell: Cell): boolean {
  if (isWildcard(cell)) return true;
  const { sequences, progress } = state;
  for (let i = 0; i < sequences.length; i++) {
    const seq = sequences[i];
    if (progress[i] < seq.length && seq[progress[i]] === cell.code) {
      return true;
    }
  }
  return false;
}

/** Free cells on the current line, advancing cells first. */
function candidates(state: SearchState): Cell[] {
  const { grid, size, current, used } = state;
  const advancing: Cell[] = [];
  const others: Cell[] = [];

  for (let i = 0; i < size; i++) {
    const cell = state.horizontal
      ? grid[current.row][i]
      : grid[i][current.col];
    if (used[cell.row * size + cell.col] || isBlocked(cell)) continue;
    if (advances(state, cell)) advancing.push(cell);
    else others.push(cell);
  }

  return advancing.concat(others);
}

function search(state: SearchState): void {
  if (state.movesRemaining <= 0) return;
  if (state.solutions.length >= state.maxSolutions) return;
  // One pick can serve several sequences, so the bound is the max, not the sum.
  if (state.movesRemaining < maxRemaining(state.sequences, state.progress)) {
    return;
  }

  const next = candidates(state);
  const from = state.current;
  const horizontal = state.horizontal;

  for (const cell of next) {
    const pos = { row: cell.row, col: cell.col };
    const key = cell.row * state.size + cell.col;
    const advanced = advanceProgress(
      state.sequences,
      state.progress,
      cell.code,
      isWildcard(cell),
    );

    state.used[key] = true;
    state.path.push(pos);
    state.current = pos;
    state.horizontal = !horizontal;
    state.movesRemaining--;

    if (isComplete(state.sequences, state.progress)) {
      state.solutions.push([...state.path]);
    } else {
      search(state);
    }

    state.movesRemaining++;
    state.horizontal = horizontal;
    state.current = from;
    state.path.pop();
    state.used[key] = false;
    retreatProgress(state.progress, advanced);

    if (state.solutions.length >= state.maxSolutions) return;
  }
}

/**
 * Enumerate selection paths that complete every sequence within
 * `bufferSize` picks, trying each selectable row-0 cell as the first pick.
 *
 * Stops once `maxSolutions` paths are found. A row-0 start that yields no
 * solution counts as a false start; blocked row-0 cells are not starts at
 * all and are not counted.
 */
export function solve(
  grid: Grid,
  sequences: Sequences,
  bufferSize: number,
  maxSolutions = 10,
): SolveResult {
  const size = grid.length;
  if (
    size === 0 ||
    sequences.length === 0 ||
    bufferSize < 1 ||
    maxSolutions < 1
  ) {
    return new SolveResult([], 0);
  }

  const solutions: Position[][] = [];
  let falseStarts = 0;

  for (let col = 0; col < size; col++) {
    const cell = grid[0][col];
    if (isBlocked(cell)) continue;

    const start = { row: 0, col };
    const state: SearchState = {
      grid,
      sequences,
      size,
      maxSolutions,
      progress: sequences.map(() => 0),
      used: Array<boolean>(size * size).fill(false),
      path: [start],
      current: start,
      horizontal: false,
      movesRemaining: bufferSize - 1,
      solutions,
    };
    state.used[col] = true;
    advanceProgress(sequences, state.progress, cell.code, isWildcard(cell));

    const before = solutions.length;
    if (isComplete(sequences, state.progress)) {
      solutions.push([start]);
    } else {
      search(state);
    }

    if (solutions.length === before) falseStarts++;
    if (solutions.length >= maxSolutions) break;
  }

  solutions.sort((a, b) => a.length - b.length);
  return new SolveResult(solutions, falseStarts);
}

/**
 * Shortest path completing every sequence in at most `maxLength` picks, or
 * null. Deepens one pick at a time, so the first hit is minimal.
 */
export function findShortestSolution(
  grid: Grid,
  sequences: Sequences,
  maxLength: number,
): Position[] | null {
  const lowerBound = Math.max(1, ...sequences.map((s) => s.length));
  for (let depth = lowerBound; depth <= maxLength; depth++) {
    const result = solve(grid, sequences, depth, 1);
    if (result.solvable) return result.solutions[0];
  }
  return null;
}
