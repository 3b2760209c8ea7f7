/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { clientInfoCommand } from "./commands/clientInfo";
import { statementCommand } from "./commands/statement";
import { toolsListCommand } from "./commands/toolsList";

export function createCli(): Command {
  const program = new Command();

  program
    .name("monobank-cli")
    .description("Query the Monobank personal API through the same gateway the MCP server uses")
    .version("0.1.0");

  program.addCommand(clientInfoCommand());
  program.addCommand(statementCommand());
  program.addCommand(toolsListCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error("Command failed:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
