/**
 * config.ts
 *
 * Environment-backed settings. `.env` is loaded by the CLI entry point before
 * `loadConfig` runs; library callers pass their own env object.
 */

import { join } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_OPENAI_MODEL = "gpt-3.5-turbo";
export const DEFAULT_MARKET = "US";
export const DEFAULT_LOGS_DIR = join(process.cwd(), "logs");

// Blank values in .env files arrive as "" and mean "not set".
const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  SPOTIFY_CLIENT_ID: optionalText,
  SPOTIFY_CLIENT_SECRET: optionalText,
  SPOTIFY_REDIRECT_URI: optionalText.refine(
    (value) => value === undefined || /^https?:\/\//.test(value),
    "SPOTIFY_REDIRECT_URI must be an http(s) URL",
  ),
  SPOTIFY_ACCESS_TOKEN: optionalText,
  SPOTIFY_REFRESH_TOKEN: optionalText,
  CATALOG_MARKET: optionalText.refine(
    (value) => value === undefined || /^[A-Za-z]{2}$/.test(value),
    "CATALOG_MARKET must be a two-letter country code",
  ),
  MOODCRATE_LOG_DIR: optionalText,
  MOODCRATE_RUN_LOG: optionalText.refine(
    (value) =>
      value === undefined || ["0", "1", "true", "false"].includes(value),
    "MOODCRATE_RUN_LOG must be 0, 1, true or false",
  ),
});

export interface SpotifyConfig {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  accessToken?: string;
  refreshToken?: string;
  market: string;
}

export interface AppConfig {
  openai: {
    apiKey?: string;
    model: string;
  };
  spotify: SpotifyConfig;
  logging: {
    dir: string;
    runLog: boolean;
  };
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const vars = parsed.data;
  const runLogFlag = vars.MOODCRATE_RUN_LOG;

  return {
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
    },
    spotify: {
      clientId: vars.SPOTIFY_CLIENT_ID,
      clientSecret: vars.SPOTIFY_CLIENT_SECRET,
      redirectUri: vars.SPOTIFY_REDIRECT_URI,
      accessToken: vars.SPOTIFY_ACCESS_TOKEN,
      refreshToken: vars.SPOTIFY_REFRESH_TOKEN,
      market: (vars.CATALOG_MARKET ?? DEFAULT_MARKET).toUpperCase(),
    },
    logging: {
      dir: vars.MOODCRATE_LOG_DIR ?? DEFAULT_LOGS_DIR,
      runLog:
        runLogFlag === undefined || runLogFlag === "1" || runLogFlag === "true",
    },
  };
}

/**
 * Returns the OpenAI key or throws. Keys that do not look like OpenAI keys are
 * reported as a warning only; proxies and compatible gateways use other
 * formats.
 */
export function requireOpenAIKey(config: AppConfig): string {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(["OPENAI_API_KEY is required"]);
  }
  if (!apiKey.startsWith("sk-")) {
    console.warn("[CONFIG] OPENAI_API_KEY does not start with 'sk-'");
  }
  return apiKey;
}
