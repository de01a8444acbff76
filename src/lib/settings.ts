import { z } from "zod";
import type { EditorSettings } from "./types";

export const defaultSettings: EditorSettings = Object.freeze({
  apiBaseUrl: "https://api.notion.com",
  apiToken: undefined,
  apiVersion: "2022-06-28",
  requestTimeoutMs: 10_000,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 10_000,
  indicatorMs: 1500,
  logLevel: "info"
});

const ENV_KEYS: Record<keyof EditorSettings, string> = {
  apiBaseUrl: "BLOCK_EDITOR_API_BASE_URL",
  apiToken: "BLOCK_EDITOR_API_TOKEN",
  apiVersion: "BLOCK_EDITOR_API_VERSION",
  requestTimeoutMs: "BLOCK_EDITOR_REQUEST_TIMEOUT_MS",
  maxRetries: "BLOCK_EDITOR_MAX_RETRIES",
  retryBaseDelayMs: "BLOCK_EDITOR_RETRY_BASE_DELAY_MS",
  retryMaxDelayMs: "BLOCK_EDITOR_RETRY_MAX_DELAY_MS",
  indicatorMs: "BLOCK_EDITOR_INDICATOR_MS",
  logLevel: "BLOCK_EDITOR_LOG_LEVEL"
};

const settingsSchema = z
  .object({
    apiBaseUrl: z.string().url(),
    apiToken: z.string().min(1).optional(),
    apiVersion: z.string().min(1),
    requestTimeoutMs: z.coerce.number().int().positive(),
    maxRetries: z.coerce.number().int().min(0).max(10),
    retryBaseDelayMs: z.coerce.number().int().positive(),
    retryMaxDelayMs: z.coerce.number().int().positive(),
    indicatorMs: z.coerce.number().int().nonnegative(),
    logLevel: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
  })
  .refine((settings) => settings.retryMaxDelayMs >= settings.retryBaseDelayMs, {
    message: "must be at least retryBaseDelayMs",
    path: ["retryMaxDelayMs"]
  });

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid editor settings: ${issues.join("; ")}`);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

type EnvSource = Record<string, string | undefined>;

function readEnv(env: EnvSource): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey]?.trim();
    if (raw) {
      values[key] = raw;
    }
  }
  return values;
}

/**
 * Resolves settings from defaults, then `BLOCK_EDITOR_*` environment variables,
 * then explicit overrides. Throws SettingsError when the result is invalid.
 */
export function loadEditorSettings(
  env: EnvSource = typeof process !== "undefined" ? process.env : {},
  overrides: Partial<EditorSettings> = {}
): EditorSettings {
  const parsed = settingsSchema.safeParse({ ...defaultSettings, ...readEnv(env), ...overrides });
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
    );
  }
  return Object.freeze(parsed.data);
}

/** Settings safe to log: the API token is masked. */
export function redactSettings(settings: EditorSettings): Record<string, unknown> {
  return { ...settings, apiToken: settings.apiToken ? "***" : undefined };
}
