import { Command } from "commander";

import { registerGenerateCommand } from "./cli/generate.js";

export const CLI_NAME = "realm-testgen";
export const CLI_VERSION = "0.1.0";

export function buildCli(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Compile component realm topologies into integration-test harnesses")
    .version(CLI_VERSION);

  registerGenerateCommand(program);

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildCli().parseAsync(argv);
}
