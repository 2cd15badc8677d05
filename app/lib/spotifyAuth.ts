/**
 * spotifyAuth.ts
 *
 * Access tokens for the Spotify Web API. The catalog client only ever asks a
 * provider for a bearer token; which OAuth grant backs it is decided here.
 *
 * https://developer.spotify.com/documentation/web-api/concepts/authorization
 */

import { randomBytes } from "crypto";
import type { SpotifyConfig } from "./config";
import { ConfigurationError, CatalogRequestError } from "./errors";
import { spotifyTokenResponseSchema, type SpotifyTokenResponse } from "./types";

export const SPOTIFY_ACCOUNTS_URL = "https://accounts.spotify.com";
export const SPOTIFY_SCOPES = ["playlist-modify-public", "user-library-read"];

// Refresh a minute early so a token never expires mid-request.
const EXPIRY_MARGIN_MS = 60_000;

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
  /** Drops the cached token, e.g. after a 401. */
  invalidate(): void;
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export function staticTokenProvider(token: string): AccessTokenProvider {
  return {
    async getAccessToken() {
      return token;
    },
    invalidate() {
      // Nothing to refresh; a rejected static token stays rejected.
    },
  };
}

/**
 * Caches a token until shortly before it expires. Concurrent callers share
 * one in-flight refresh.
 */
class CachedTokenProvider implements AccessTokenProvider {
  private token: string | null = null;
  private expiresAt = 0;
  private refreshPromise: Promise<string> | null = null;

  constructor(private readonly fetchToken: () => Promise<SpotifyTokenResponse>) {}

  async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token;
    }

    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.refresh();
    try {
      return await this.refreshPromise;
    } finally {
      this.refreshPromise = null;
    }
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async refresh(): Promise<string> {
    const response = await this.fetchToken();
    this.token = response.access_token;
    this.expiresAt = Date.now() + response.expires_in * 1000;
    return response.access_token;
  }
}

function basicAuthHeader({ clientId, clientSecret }: ClientCredentials): string {
  return (
    "Basic " + Buffer.from(`${clientId}:${clientSecret}`).toString("base64")
  );
}

async function requestToken(
  credentials: ClientCredentials,
  body: URLSearchParams,
): Promise<SpotifyTokenResponse> {
  const endpoint = "/api/token";
  let res: Response;
  try {
    res = await fetch(`${SPOTIFY_ACCOUNTS_URL}${endpoint}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: basicAuthHeader(credentials),
      },
      body: body.toString(),
    });
  } catch (error) {
    throw new CatalogRequestError(
      `Token request failed: ${error instanceof Error ? error.message : String(error)}`,
      { status: 0, endpoint },
    );
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => "");
    throw new CatalogRequestError(`Token request failed: ${res.status}`, {
      status: res.status,
      endpoint,
      body: txt,
    });
  }

  const json: unknown = await res.json().catch(() => null);
  const parsed = spotifyTokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new CatalogRequestError("Token response was malformed", {
      status: 502,
      endpoint,
    });
  }
  return parsed.data;
}

export function refreshTokenProvider(
  credentials: ClientCredentials & { refreshToken: string },
): AccessTokenProvider {
  return new CachedTokenProvider(() => {
    const body = new URLSearchParams();
    body.set("grant_type", "refresh_token");
    body.set("refresh_token", credentials.refreshToken);
    return requestToken(credentials, body);
  });
}

/**
 * App-only token: enough for search and artist lookups, not for anything
 * that touches a user's account.
 */
export function clientCredentialsProvider(
  credentials: ClientCredentials,
): AccessTokenProvider {
  return new CachedTokenProvider(() => {
    const body = new URLSearchParams();
    body.set("grant_type", "client_credentials");
    return requestToken(credentials, body);
  });
}

/**
 * Picks the strongest grant the configuration allows: a fixed access token,
 * then a refresh token, then client credentials.
 */
export function createTokenProvider(config: SpotifyConfig): AccessTokenProvider {
  if (config.accessToken) {
    return staticTokenProvider(config.accessToken);
  }

  const { clientId, clientSecret } = config;
  if (!clientId || !clientSecret) {
    throw new ConfigurationError([
      "SPOTIFY_ACCESS_TOKEN, or SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET, are required",
    ]);
  }

  if (config.refreshToken) {
    return refreshTokenProvider({
      clientId,
      clientSecret,
      refreshToken: config.refreshToken,
    });
  }

  console.warn(
    "[AUTH] No SPOTIFY_REFRESH_TOKEN set; publishing playlists will be rejected",
  );
  return clientCredentialsProvider({ clientId, clientSecret });
}

export function buildAuthorizeUrl(params: {
  clientId: string;
  redirectUri: string;
  state?: string;
  scopes?: string[];
}): { url: string; state: string } {
  const state = params.state ?? randomBytes(16).toString("hex");
  const url = new URL(`${SPOTIFY_ACCOUNTS_URL}/authorize`);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("client_id", params.clientId);
  url.searchParams.set("scope", (params.scopes ?? SPOTIFY_SCOPES).join(" "));
  url.searchParams.set("redirect_uri", params.redirectUri);
  url.searchParams.set("state", state);
  return { url: url.toString(), state };
}

export async function exchangeAuthorizationCode(
  params: ClientCredentials & { code: string; redirectUri: string },
): Promise<SpotifyTokenResponse> {
  const body = new URLSearchParams();
  body.set("grant_type", "authorization_code");
  body.set("code", params.code);
  body.set("redirect_uri", params.redirectUri);
  return requestToken(params, body);
}
