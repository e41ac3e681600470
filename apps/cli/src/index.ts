import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerGenerateCommand } from "./commands/generate";
import { registerRushCommand } from "./commands/rush";
import { registerSolveCommand } from "./commands/solve";

program
  .name("breachgrid")
  .description("Generate and solve code-breach grid puzzles")
  .version("0.1.0", "-v, --version");

registerConfigCommand(program);
registerGenerateCommand(program);
registerRushCommand(program);
registerSolveCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
