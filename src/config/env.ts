/**
 * Environment validation. Entry points load `.env` through dotenv before
 * calling {@link loadConfig}; everything else receives the parsed config.
 */
import path from "node:path";

import { z } from "zod";

import {
  DEFAULT_MODEL_NAME,
  LIVE_QUOTE_TIMEOUT_MS,
  OPENROUTER_API_KEY_ENV,
  SHUTDOWN_GRACE_MS,
} from "./constants.js";
import { fallbackCsvPath, projectRoot } from "./paths.js";
import { ConfigError } from "../errors.js";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ""
        ? fallback
        : ["true", "1", "yes"].includes(value.trim().toLowerCase()),
    );

const positiveInt = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be a positive integer")
    .optional()
    .transform((value) => (value === undefined ? fallback : Number(value)));

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || "info")
    .pipe(z.enum(LOG_LEVELS)),

  [OPENROUTER_API_KEY_ENV]: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),

  OPENROUTER_MODEL: z.string().min(1).default(DEFAULT_MODEL_NAME),

  /** Relative paths resolve against the project root. */
  STOCKS_CSV_PATH: z
    .string()
    .optional()
    .transform((value) =>
      value ? path.resolve(projectRoot, value) : fallbackCsvPath,
    ),

  LIVE_QUOTES_ENABLED: booleanFlag(true),
  LIVE_QUOTE_TIMEOUT_MS: positiveInt(LIVE_QUOTE_TIMEOUT_MS),
  SHUTDOWN_GRACE_MS: positiveInt(SHUTDOWN_GRACE_MS),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  readonly logLevel: LogLevel;
  readonly openRouterApiKey: string | undefined;
  readonly openRouterModel: string;
  readonly stocksCsvPath: string;
  readonly liveQuotesEnabled: boolean;
  readonly liveQuoteTimeoutMs: number;
  readonly shutdownGraceMs: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.LOG_LEVEL,
    openRouterApiKey: parsed[OPENROUTER_API_KEY_ENV],
    openRouterModel: parsed.OPENROUTER_MODEL,
    stocksCsvPath: parsed.STOCKS_CSV_PATH,
    liveQuotesEnabled: parsed.LIVE_QUOTES_ENABLED,
    liveQuoteTimeoutMs: parsed.LIVE_QUOTE_TIMEOUT_MS,
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
  };
}
