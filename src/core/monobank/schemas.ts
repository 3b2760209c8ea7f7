/**
 * Monobank personal API payloads
 * Amounts are integers in the currency's minor unit; currencies are ISO 4217 numeric codes.
 */

import { z } from "zod";

export const AccountSchema = z.object({
  id: z.string(),
  sendId: z.string(),
  balance: z.number().int(),
  creditLimit: z.number().int(),
  type: z.string(),
  currencyCode: z.number().int(),
  cashbackType: z.string().optional(),
  maskedPan: z.array(z.string()),
  iban: z.string(),
});

export const JarSchema = z.object({
  id: z.string(),
  sendId: z.string(),
  title: z.string(),
  description: z.string().optional(),
  currencyCode: z.number().int(),
  balance: z.number().int(),
  goal: z.number().int().optional(),
});

export const ClientInfoResponseSchema = z.object({
  clientId: z.string(),
  name: z.string(),
  webHookUrl: z.string(),
  permissions: z.string(),
  accounts: z.array(AccountSchema),
  jars: z.array(JarSchema).optional(),
});

export const TransactionSchema = z.object({
  id: z.string(),
  time: z.number().int(),
  description: z.string(),
  mcc: z.number().int(),
  originalMcc: z.number().int(),
  hold: z.boolean(),
  amount: z.number().int(),
  operationAmount: z.number().int(),
  currencyCode: z.number().int(),
  commissionRate: z.number().int(),
  cashbackAmount: z.number().int(),
  balance: z.number().int(),
  comment: z.string().optional(),
  receiptId: z.string().optional(),
  invoiceId: z.string().optional(),
  counterEdrpou: z.string().optional(),
  counterIban: z.string().optional(),
  counterName: z.string().optional(),
});

export const StatementResponseSchema = z.array(TransactionSchema);

export type Account = z.infer<typeof AccountSchema>;
export type Jar = z.infer<typeof JarSchema>;
export type ClientInfoResponse = z.infer<typeof ClientInfoResponseSchema>;
export type Transaction = z.infer<typeof TransactionSchema>;

export interface ClientInfoResult {
  client: {
    clientId: string;
    name: string;
    webHookUrl: string;
    permissions: string;
  };
  accounts: Account[];
  jars: Jar[];
}

export type StatementResult = Transaction[];

export function toClientInfoResult(response: ClientInfoResponse): ClientInfoResult {
  return {
    client: {
      clientId: response.clientId,
      name: response.name,
      webHookUrl: response.webHookUrl,
      permissions: response.permissions,
    },
    accounts: response.accounts,
    jars: response.jars ?? [],
  };
}
