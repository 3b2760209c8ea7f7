/**
 * monobank-cli client-info [--table]
 */

import { Command } from "commander";
import { createCliContext, printResult } from "../utils/context";
import { printTable } from "../utils/printTable";

export function clientInfoCommand(): Command {
  const cmd = new Command("client-info");
  cmd
    .description("Fetch the client profile, accounts and jars")
    .option("--table", "print accounts and jars as tables instead of JSON")
    .action(async (opts: { table?: boolean }) => {
      const { gateway } = createCliContext();
      const result = await gateway.getClientInfo();

      if (!opts.table || !result.ok) {
        printResult(result);
        return;
      }

      console.log(`${result.data.client.name} (${result.data.client.clientId})\n`);
      printTable(
        ["ACCOUNT", "TYPE", "CURRENCY", "BALANCE", "CREDIT LIMIT"],
        result.data.accounts.map((a) => [
          a.id,
          a.type,
          String(a.currencyCode),
          (a.balance / 100).toFixed(2),
          (a.creditLimit / 100).toFixed(2),
        ])
      );
      console.log("");
      printTable(
        ["JAR", "TITLE", "CURRENCY", "BALANCE", "GOAL"],
        result.data.jars.map((j) => [
          j.id,
          j.title,
          String(j.currencyCode),
          (j.balance / 100).toFixed(2),
          j.goal === undefined ? "" : (j.goal / 100).toFixed(2),
        ])
      );
    });
  return cmd;
}
