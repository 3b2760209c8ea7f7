/**
 * monobank-cli statement <accountId> --from <ts> [--to <ts>] [--raw]
 */

import { Command } from "commander";
import { presentStatement } from "../../server/presenters";
import { createCliContext, parseInteger, printResult } from "../utils/context";

export function statementCommand(): Command {
  const cmd = new Command("statement");
  cmd
    .description("Fetch transactions of an account or jar (period of at most 31 days)")
    .argument("[accountId]", 'account or jar id, "0" for the default account', "0")
    .requiredOption("--from <timestamp>", "start of the period, Unix epoch seconds", parseInteger)
    .option("--to <timestamp>", "end of the period, Unix epoch seconds (default: now)", parseInteger)
    .option("--raw", "keep minor units and epoch times as sent by the bank")
    .action(async (accountId: string, opts: { from: number; to?: number; raw?: boolean }) => {
      const { gateway } = createCliContext();
      const result = await gateway.getStatement({
        accountId,
        fromTimestamp: opts.from,
        toTimestamp: opts.to,
      });
      printResult(result, opts.raw ? undefined : presentStatement);
    });
  return cmd;
}
