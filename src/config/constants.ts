export const PROTOCOL_VERSION = "1.0";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
export const OPENROUTER_API_KEY_ENV = "OPENROUTER_API_KEY";
export const DEFAULT_MODEL_NAME = "openai/gpt-4o-mini";
export const ROUTER_REQUEST_TIMEOUT_MS = 20_000;

export const YAHOO_CHART_BASE_URL =
  "https://query1.finance.yahoo.com/v8/finance/chart";
export const LIVE_QUOTE_TIMEOUT_MS = 5_000;

/** How long the client waits for the worker to exit before killing it. */
export const SHUTDOWN_GRACE_MS = 2_000;
