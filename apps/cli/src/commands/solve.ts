import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import { sequenceCodes } from "@breachgrid/core";
import { solve, validatePuzzle } from "@breachgrid/engine";
import { initConfig } from "../config";
import { formatPath, renderGrid } from "../render/board";
import { parsePuzzleFile } from "../puzzleFile";
import { applyLogLevel, fail, parseWholeNumber } from "./common";

interface SolveOptions {
  max: string;
  buffer?: string;
}

export function registerSolveCommand(program: Command): void {
  program
    .command("solve <file>")
    .description("Solve a puzzle file written by `generate --json`")
    .option("-m, --max <n>", "Stop after this many solutions", "10")
    .option("-b, --buffer <n>", "Override the puzzle's buffer size")
    .action(async (file: string, opts: SolveOptions) => {
      try {
        const settings = await initConfig();
        applyLogLevel(settings);

        const puzzle = parsePuzzleFile(await readFile(file, "utf-8"));
        const maxSolutions = parseWholeNumber(opts.max, "max", 1);
        const bufferSize = opts.buffer
          ? parseWholeNumber(opts.buffer, "buffer", 1)
          : puzzle.bufferSize;

        const result = solve(
          puzzle.grid,
          sequenceCodes(puzzle),
          bufferSize,
          maxSolutions,
        );
        const valid = validatePuzzle(puzzle, { checkBlockers: true });

        console.log(`Valid: ${valid ? "yes" : "no"}`);
        const solvable = result.solvable ? "yes" : "no";
        console.log(`Solvable: ${solvable} (buffer ${bufferSize})`);
        if (!result.solvable) return;

        const capped = result.solutionCount >= maxSolutions ? "+" : "";
        console.log(`Par: ${result.par}`);
        console.log(`Solutions: ${result.solutionCount}${capped}`);
        console.log(`False starts: ${result.falseStarts}`);
        console.log(`Shortest: ${formatPath(result.solutions[0])}`);
        console.log("");
        console.log(renderGrid(puzzle.grid, result.solutions[0]));
      } catch (err: unknown) {
        fail(err);
      }
    });
}
