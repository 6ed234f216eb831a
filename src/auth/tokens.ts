/**
 * OAuth token storage and refresh for the Graph API.
 *
 * Tokens live in a JSON file ({access_token, refresh_token, expiry}) written
 * by whatever performed the initial sign-in. This module only keeps them
 * fresh: it refreshes an expired access token with the refresh_token grant
 * and writes the new pair back to the file.
 *
 * The token manager is the one object shared by every concurrent page
 * operation. Refresh is single-flight: callers that find the token expired
 * while a refresh is already running wait on that refresh instead of
 * starting their own.
 */

import fs from "node:fs";
import axios from "axios";
import { AuthError, errorMessage } from "../errors.js";

/** Seconds before the recorded expiry at which a token counts as expired. */
const EXPIRY_BUFFER_SECONDS = 60;

export interface TokenSet {
  access_token: string;
  refresh_token: string;
  /** Unix timestamp (seconds) at which access_token expires. */
  expiry: number;
}

export interface OAuthSettings {
  client_id: string;
  tenant_id: string;
  redirect_uri: string;
  scope: string;
}

export interface TokenManager {
  /** Current access token, refreshed first when expired. */
  getAccessToken(): Promise<string>;
  /** Refresh unconditionally (e.g. after a 401). Returns the new access token. */
  refresh(): Promise<string>;
}

/** Exchanges a refresh token for a new token set. */
export type RefreshFn = (refreshToken: string) => Promise<TokenSet>;

export interface TokenManagerOptions {
  tokens: TokenSet | null;
  refresh: RefreshFn;
  /** Where to persist refreshed tokens. Omit to keep them in memory only. */
  tokenFile?: string;
  /** Current unix time in seconds. */
  now?: () => number;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isTokenSet(value: unknown): value is TokenSet {
  return (
    isRecord(value) &&
    typeof value.access_token === "string" &&
    typeof value.refresh_token === "string" &&
    typeof value.expiry === "number"
  );
}

export function isExpired(tokens: TokenSet, now: number = nowSeconds()): boolean {
  return now > tokens.expiry - EXPIRY_BUFFER_SECONDS;
}

/**
 * Read the token file. Returns null when the file does not exist; a file
 * that exists but is not a token set is an error.
 */
export function loadTokens(tokenFile: string): TokenSet | null {
  if (!fs.existsSync(tokenFile)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(tokenFile, "utf-8"));
  } catch (error) {
    throw new AuthError(`Token file ${tokenFile} is not valid JSON: ${errorMessage(error)}`);
  }
  if (!isTokenSet(parsed)) {
    throw new AuthError(`Token file ${tokenFile} does not contain access_token, refresh_token and expiry`);
  }
  return parsed;
}

export function saveTokens(tokenFile: string, tokens: TokenSet): void {
  fs.writeFileSync(tokenFile, JSON.stringify(tokens, null, 2), { encoding: "utf-8", mode: 0o600 });
}

export function tokenEndpoint(tenantId: string): string {
  return `https://login.microsoftonline.com/${encodeURIComponent(tenantId || "common")}/oauth2/v2.0/token`;
}

/**
 * Exchange a refresh token at the Microsoft identity platform.
 * Public client (PKCE) flow, so no client secret is sent.
 */
export async function refreshAccessToken(
  oauth: OAuthSettings,
  refreshToken: string,
  now: () => number = nowSeconds,
): Promise<TokenSet> {
  const form = new URLSearchParams({
    client_id: oauth.client_id,
    scope: oauth.scope,
    refresh_token: refreshToken,
    redirect_uri: oauth.redirect_uri,
    grant_type: "refresh_token",
  });

  const response = await axios.post(tokenEndpoint(oauth.tenant_id), form.toString(), {
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    responseType: "text",
    validateStatus: () => true,
  });

  const body = typeof response.data === "string" ? response.data : String(response.data);
  if (response.status !== 200) {
    throw new AuthError(`token refresh failed: HTTP ${response.status} - ${body}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new AuthError(`token refresh returned invalid JSON: ${errorMessage(error)}`);
  }
  if (!isRecord(data)) {
    throw new AuthError("token refresh returned a non-object response");
  }
  if (typeof data.access_token !== "string" || typeof data.expires_in !== "number") {
    throw new AuthError("token refresh response is missing access_token or expires_in");
  }

  return {
    access_token: data.access_token,
    // The identity platform may omit a rotated refresh token; keep the old one.
    refresh_token: typeof data.refresh_token === "string" ? data.refresh_token : refreshToken,
    expiry: now() + data.expires_in,
  };
}

export function createTokenManager(options: TokenManagerOptions): TokenManager {
  const now = options.now ?? nowSeconds;
  let tokens = options.tokens;
  let inFlight: Promise<string> | null = null;

  async function doRefresh(): Promise<string> {
    if (!tokens?.refresh_token) {
      throw new AuthError("authentication required: no refresh token available, sign in again");
    }
    console.log("[auth] refreshing access token");
    const next = await options.refresh(tokens.refresh_token);
    tokens = next;

    if (options.tokenFile) {
      try {
        saveTokens(options.tokenFile, next);
      } catch (error) {
        console.warn(`[auth] refreshed token could not be saved to ${options.tokenFile}:`, error);
      }
    }
    return next.access_token;
  }

  function refresh(): Promise<string> {
    if (!inFlight) {
      inFlight = doRefresh().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  return {
    async getAccessToken() {
      if (inFlight) {
        return inFlight;
      }
      if (!tokens?.access_token) {
        if (tokens?.refresh_token) {
          return refresh();
        }
        throw new AuthError("authentication required: no access token available, sign in first");
      }
      if (isExpired(tokens, now())) {
        return refresh();
      }
      return tokens.access_token;
    },

    refresh,
  };
}
