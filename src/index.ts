#!/usr/bin/env node
import "dotenv/config";
import chalk from "chalk";
import { buildProgram } from "./cli/commands.js";

const program = buildProgram();
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
