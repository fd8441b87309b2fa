import chalk from "chalk";
import { runCLI } from "./program.js";

runCLI().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
  process.exitCode = 1;
});
