/**
 * Render gateway results as MCP tool output
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ToolResult } from "../core/gateway";
import { StatementResult, Transaction } from "../core/monobank/schemas";

const MINOR_UNIT_FIELDS = ["amount", "operationAmount", "commissionRate", "cashbackAmount", "balance"] as const;

type MinorUnitField = (typeof MINOR_UNIT_FIELDS)[number];

/** Identifiers left out of tool output */
type HiddenField = "id" | "invoiceId" | "counterEdrpou" | "counterIban";

export type PresentedTransaction = Omit<Transaction, "time" | MinorUnitField | HiddenField> & {
  time: string;
} & Record<MinorUnitField, number>;

/**
 * Epoch seconds to "YYYY-MM-DDTHH:MM:SSZ"
 */
export function formatEpochSeconds(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function toMajorUnits(minor: number): number {
  return minor / 100;
}

/**
 * Statement entries with amounts in major units and ISO times, upstream order kept.
 * Transaction ids, invoice ids and counterparty EDRPOU/IBAN are dropped.
 */
export function presentStatement(statement: StatementResult): PresentedTransaction[] {
  return statement.map(({ id: _id, invoiceId: _invoiceId, counterEdrpou: _edrpou, counterIban: _iban, ...tx }) => ({
    ...tx,
    time: formatEpochSeconds(tx.time),
    amount: toMajorUnits(tx.amount),
    operationAmount: toMajorUnits(tx.operationAmount),
    commissionRate: toMajorUnits(tx.commissionRate),
    cashbackAmount: toMajorUnits(tx.cashbackAmount),
    balance: toMajorUnits(tx.balance),
  }));
}

export function toCallToolResult<T>(result: ToolResult<T>, present?: (data: T) => unknown): CallToolResult {
  if (!result.ok) {
    return {
      content: [{ type: "text", text: JSON.stringify({ error: result.error }, null, 2) }],
      isError: true,
    };
  }
  const data = present ? present(result.data) : result.data;
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}
