import type { Command } from "commander";
import { SeededRng } from "@breachgrid/core";
import { generateWithReport } from "@breachgrid/engine";
import { initConfig, setCliOverride } from "../config";
import { renderPuzzle } from "../render/board";
import { toPuzzleFile } from "../puzzleFile";
import { applyLogLevel, fail, newSeed } from "./common";

interface GenerateOptions {
  difficulty?: string;
  seed?: string;
  attempts?: string;
  json?: boolean;
  solution?: boolean;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate a puzzle")
    .option("-d, --difficulty <level>", "easy, medium, hard or expert")
    .option("-s, --seed <seed>", "Seed for a reproducible board")
    .option("-a, --attempts <n>", "Attempts before falling back")
    .option("--solution", "Highlight the solution path")
    .option("--json", "Print the puzzle as JSON")
    .action(async (opts: GenerateOptions) => {
      try {
        if (opts.difficulty) setCliOverride("difficulty", opts.difficulty);
        if (opts.attempts) setCliOverride("maxAttempts", opts.attempts);
        const settings = await initConfig();
        applyLogLevel(settings);

        const seed = opts.seed ?? newSeed();
        const report = generateWithReport(
          settings.difficulty,
          new SeededRng(seed),
          { maxAttempts: settings.maxAttempts },
        );

        if (opts.json) {
          const file = toPuzzleFile(report.puzzle, {
            seed,
            attempts: report.attempts,
            usedFallback: report.usedFallback,
          });
          console.log(JSON.stringify(file, null, 2));
          return;
        }

        console.log(
          renderPuzzle(report.puzzle, { showSolution: opts.solution }),
        );
        console.log("");
        console.log(`Seed: ${seed}`);
        const fallback = report.usedFallback ? " (fallback)" : "";
        console.log(`Attempts: ${report.attempts}${fallback}`);
      } catch (err: unknown) {
        fail(err);
      }
    });
}
