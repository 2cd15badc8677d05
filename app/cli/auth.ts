import type { AppConfig } from "../lib/config";
import { ConfigurationError } from "../lib/errors";
import { buildAuthorizeUrl, exchangeAuthorizationCode } from "../lib/spotifyAuth";
import type { CliIO } from "./generate";

function requireOAuthSettings(config: AppConfig) {
  const { clientId, clientSecret, redirectUri } = config.spotify;
  const missing = [
    clientId ? null : "SPOTIFY_CLIENT_ID",
    clientSecret ? null : "SPOTIFY_CLIENT_SECRET",
    redirectUri ? null : "SPOTIFY_REDIRECT_URI",
  ].filter((name): name is string => name !== null);

  if (!clientId || !clientSecret || !redirectUri) {
    throw new ConfigurationError(missing.map((name) => `${name} is required`));
  }
  return { clientId, clientSecret, redirectUri };
}

export function runAuthUrl(config: AppConfig, io: CliIO): number {
  const { clientId, redirectUri } = requireOAuthSettings(config);
  const { url, state } = buildAuthorizeUrl({ clientId, redirectUri });
  io.print("Open this URL, approve access, then copy the `code` parameter");
  io.print("from the page Spotify redirects you to:");
  io.print(url);
  io.print(`(state: ${state})`);
  return 0;
}

export async function runAuthExchange(
  config: AppConfig,
  code: string | undefined,
  io: CliIO,
): Promise<number> {
  if (!code) {
    io.print("Missing --code");
    return 1;
  }
  const settings = requireOAuthSettings(config);
  const tokens = await exchangeAuthorizationCode({ ...settings, code });
  if (!tokens.refresh_token) {
    io.print("Spotify did not return a refresh token.");
    return 1;
  }
  io.print("Add this to your .env file:");
  io.print(`SPOTIFY_REFRESH_TOKEN=${tokens.refresh_token}`);
  return 0;
}
