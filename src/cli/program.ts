/**
 * tradeflow — trading cycle coordinator CLI
 */
import { Command } from "commander";
import { registerServeCli } from "./serve-cli.js";
import { registerMigrateCli } from "./migrate-cli.js";
import { registerCycleCli } from "./cycle-cli.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("tradeflow")
    .description("Coordinates trading cycles across the stage services")
    .version("1.0.0");

  registerServeCli(program);
  registerMigrateCli(program);
  registerCycleCli(program);
  return program;
}
