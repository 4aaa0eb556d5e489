#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";
import { extractCommand } from "./commands/extract";
import { agentCommand } from "./commands/agent";

const program = new Command();

program
  .name("docsieve")
  .description("Extract companies, persons and events from long documents with LLMs")
  .version("0.1.0");
program.addCommand(extractCommand);
program.addCommand(agentCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
