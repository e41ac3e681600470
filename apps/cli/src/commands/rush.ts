import type { Command } from "commander";
import { SeededRng, rushStageFor } from "@breachgrid/core";
import { generateRushPuzzle } from "@breachgrid/engine";
import { initConfig } from "../config";
import { renderPuzzle } from "../render/board";
import { toPuzzleFile } from "../puzzleFile";
import { applyLogLevel, fail, newSeed, parseWholeNumber } from "./common";

interface RushOptions {
  grid: string;
  seed?: string;
  json?: boolean;
  solution?: boolean;
}

export function registerRushCommand(program: Command): void {
  program
    .command("rush")
    .description("Generate the board for one grid of a Grid Rush run")
    .option("-g, --grid <n>", "Grid number in the run (1 = first)", "1")
    .option("-s, --seed <seed>", "Seed for a reproducible board")
    .option("--solution", "Highlight the solution path")
    .option("--json", "Print the puzzle as JSON")
    .action(async (opts: RushOptions) => {
      try {
        const settings = await initConfig();
        applyLogLevel(settings);

        const gridNumber = parseWholeNumber(opts.grid, "grid", 1);
        const stage = rushStageFor(gridNumber);
        const seed = opts.seed ?? newSeed();
        const puzzle = generateRushPuzzle(gridNumber, new SeededRng(seed), {
          maxAttempts: settings.maxAttempts,
        });

        if (opts.json) {
          console.log(JSON.stringify(toPuzzleFile(puzzle, { seed }), null, 2));
          return;
        }

        const { gridSize, sequenceCount } = stage;
        const shape = `${gridSize}x${gridSize}`;
        console.log(
          `Grid ${gridNumber}: ${shape}, ${sequenceCount} sequences`,
        );
        console.log(renderPuzzle(puzzle, { showSolution: opts.solution }));
        console.log("");
        console.log(`Seed: ${seed}`);
      } catch (err: unknown) {
        fail(err);
      }
    });
}
