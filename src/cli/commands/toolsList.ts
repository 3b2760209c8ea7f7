/**
 * monobank-cli tools:list
 */

import { Command } from "commander";
import { describeTools } from "../../core/gateway";
import { printTable } from "../utils/printTable";

export function toolsListCommand(): Command {
  const cmd = new Command("tools:list");
  cmd.description("List the tools exposed by the server").action(() => {
    printTable(
      ["NAME", "RATE LIMIT", "DESCRIPTION"],
      describeTools().map((t) => [t.name, t.rateLimit, t.description])
    );
  });
  return cmd;
}
