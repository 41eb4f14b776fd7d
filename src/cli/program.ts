import { Command } from "commander";
import { registerAskCommand } from "./commands/ask";
import { registerAddCommand } from "./commands/add";
import { registerImportCommand } from "./commands/import";

export function createProgram(): Command {
  const program = new Command();

  const version = process.env.npm_package_version ?? "0.1.0";
  program
    .name("qa-match")
    .description("Answer questions from a crowd-sourced question/answer store")
    .version(version);

  registerAskCommand(program);
  registerAddCommand(program);
  registerImportCommand(program);
  return program;
}
