import { displayCode, positionKey } from "@breachgrid/core";
import type { Grid, Position, Puzzle } from "@breachgrid/core";

/**
 * One line per row. Highlighted cells are bracketed, wildcards show "??"
 * and blockers "XX".
 */
export function renderGrid(
  grid: Grid,
  highlight: readonly Position[] = [],
): string {
  const marked = new Set(highlight.map(positionKey));
  return grid
    .map((row) =>
      row
        .map((cell) => {
          const label = displayCode(cell);
          return marked.has(positionKey(cell)) ? `[${label}]` : ` ${label} `;
        })
        .join("")
        .trimEnd(),
    )
    .join("\n");
}

export function formatPath(path: readonly Position[]): string {
  return path.map((p) => `(${p.row},${p.col})`).join(" -> ");
}

export interface RenderOptions {
  showSolution?: boolean;
}

export function renderPuzzle(
  puzzle: Puzzle,
  options: RenderOptions = {},
): string {
  const lines = [
    `Difficulty: ${puzzle.difficulty}`,
    `Buffer: ${puzzle.bufferSize}  Par: ${puzzle.par}`,
    "Sequences:",
    ...puzzle.sequences.map((s, i) => `  ${i + 1}. ${s.codes.join(" ")}`),
    "",
    renderGrid(puzzle.grid, options.showSolution ? puzzle.solutionPath : []),
  ];
  if (options.showSolution) {
    lines.push("", `Solution: ${formatPath(puzzle.solutionPath)}`);
  }
  return lines.join("\n");
}
