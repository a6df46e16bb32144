import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { ClientOptions, ResolvedClientConfig } from "./types";

export const DEFAULT_BASE_URL = "https://api.usedari.com";
export const DEFAULT_TIMEOUT_MS = 30_000;
/** Largest delay `setTimeout` honours; anything above fires immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const timeoutMsSchema = z
  .number({ invalid_type_error: "timeoutMs must be a positive number" })
  .finite("timeoutMs must be a positive number")
  .positive("timeoutMs must be a positive number")
  .max(MAX_TIMEOUT_MS, `timeoutMs must be at most ${MAX_TIMEOUT_MS}`);

export const clientOptionsSchema = z.object({
  apiKey: z.string({ required_error: "apiKey must be provided" }).min(1, "apiKey must be provided"),
  baseUrl: z
    .string()
    .url("baseUrl must be an absolute URL")
    .regex(/^https?:\/\//i, "baseUrl must use http or https")
    .optional(),
  timeoutMs: timeoutMsSchema.optional(),
  userAgentSuffix: z.string().optional(),
});

/** Validates options and fills in defaults. The transport is not part of the config. */
export function resolveClientConfig(options: ClientOptions): ResolvedClientConfig {
  const parsed = clientOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue?.message ?? "Invalid client options", parsed.error);
  }

  const { apiKey, baseUrl, timeoutMs, userAgentSuffix } = parsed.data;
  return Object.freeze({
    apiKey,
    baseUrl: (baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    timeoutMs: timeoutMs ?? DEFAULT_TIMEOUT_MS,
    userAgentSuffix,
  });
}

/**
 * Reads `DARI_API_KEY`, `DARI_BASE_URL` and `DARI_TIMEOUT_MS`.
 * Unset or blank variables fall back to the client defaults.
 */
export function clientOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  const options: ClientOptions = { apiKey: env.DARI_API_KEY?.trim() ?? "" };

  const baseUrl = env.DARI_BASE_URL?.trim();
  if (baseUrl) {
    options.baseUrl = baseUrl;
  }

  const timeout = env.DARI_TIMEOUT_MS?.trim();
  if (timeout) {
    const timeoutMs = Number(timeout);
    if (!timeoutMsSchema.safeParse(timeoutMs).success) {
      throw new ConfigurationError(`DARI_TIMEOUT_MS must be a positive number, got "${timeout}"`);
    }
    options.timeoutMs = timeoutMs;
  }

  return options;
}
