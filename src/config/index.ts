/**
 * Environment configuration
 * The credential is read once here and handed to the client; nothing else reads process.env for it.
 */

import { z } from "zod";
import { ConfigurationError } from "../core/errors";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "../core/monobank/client";

/** Value shipped in sample env files; treated the same as a missing token */
export const TOKEN_PLACEHOLDER = "X_TOKEN_PLACEHOLDER";

const EnvSchema = z.object({
  MONOBANK_API_TOKEN: z
    .string({ required_error: "is not set" })
    .trim()
    .min(1, "is empty")
    .regex(/^\S*$/, "must not contain whitespace")
    .refine((token) => token !== TOKEN_PLACEHOLDER, "is still the placeholder value"),
  MONOBANK_API_URL: z.string().url("must be a URL").default(DEFAULT_BASE_URL),
  MONOBANK_TIMEOUT_MS: z.coerce.number().int().positive("must be a positive integer").default(DEFAULT_TIMEOUT_MS),
});

export interface AppConfig {
  token: string;
  baseUrl: string;
  timeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`);
    throw new ConfigurationError(problems.join("; "), {
      variables: parsed.error.issues.map((i) => i.path.join(".")),
    });
  }

  return {
    token: parsed.data.MONOBANK_API_TOKEN,
    baseUrl: parsed.data.MONOBANK_API_URL,
    timeoutMs: parsed.data.MONOBANK_TIMEOUT_MS,
  };
}
