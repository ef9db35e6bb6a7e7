/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * tokens.ts: Access credential providers for Slideshow Player.
 */
import type { Config, Nullable } from "../types/index.js";
import { CredentialError, LOG, formatError, redactCredential } from "../utils/index.js";

/* The authorization flow itself lives in the host application. What reaches us is either a ready access token or a refresh token we can exchange through the
 * companion backend, and everything downstream only ever asks for "a valid access token" through the TokenProvider interface.
 */

const log = LOG.withComponent("TokenProvider");

// Tokens within this window of their expiry are refreshed before use.
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/**
 * Source of valid access credentials.
 */
export interface TokenProvider {

  /**
   * Returns an access token that is valid for at least the next few minutes.
   * @throws CredentialError NoAccessCredential when no token can be produced, NetworkFailure when a refresh could not reach the backend.
   */
  getValidAccessCredential(): Promise<string>;
}

/**
 * Serves one fixed token. Used when the host application hands over a token and refreshes it by restarting us.
 */
export class StaticTokenProvider implements TokenProvider {

  private readonly token: string;

  constructor(token: string) {

    this.token = token;
  }

  getValidAccessCredential(): Promise<string> {

    if(!this.token) {

      return Promise.reject(new CredentialError("NoAccessCredential", "No access token is configured."));
    }

    return Promise.resolve(this.token);
  }
}

export interface RefreshingTokenProviderOptions {

  // Current access token and its expiry (epoch ms), if one is known.
  accessToken?: Nullable<string>;
  backendBaseUrl: Nullable<string>;
  expiresAt?: number;
  now?: () => number;
  refreshToken: Nullable<string>;
  requestTimeout: number;
}

/**
 * Caches an access token and exchanges the refresh token through the backend's /auth/spotify/refresh route when the cached token is close to expiry.
 * Concurrent callers during a refresh share the same request.
 */
export class RefreshingTokenProvider implements TokenProvider {

  private accessToken: Nullable<string>;
  private readonly backendBaseUrl: Nullable<string>;
  private expiresAt: number;
  private readonly now: () => number;
  private pendingRefresh: Nullable<Promise<string>> = null;
  private refreshToken: Nullable<string>;
  private readonly requestTimeout: number;

  constructor(options: RefreshingTokenProviderOptions) {

    this.accessToken = options.accessToken ?? null;
    this.backendBaseUrl = options.backendBaseUrl;
    this.now = options.now ?? Date.now;

    // A token handed over without an expiry is trusted once and refreshed on the first call after that.
    this.expiresAt = options.expiresAt ?? 0;
    this.refreshToken = options.refreshToken;
    this.requestTimeout = options.requestTimeout;
  }

  async getValidAccessCredential(): Promise<string> {

    if(this.accessToken && ((this.expiresAt - this.now()) > EXPIRY_BUFFER_MS)) {

      return this.accessToken;
    }

    if(!this.refreshToken || !this.backendBaseUrl) {

      // Without a way to refresh, an unexpired token is still better than none.
      if(this.accessToken && ((this.expiresAt === 0) || (this.expiresAt > this.now()))) {

        return this.accessToken;
      }

      throw new CredentialError("NoAccessCredential", "No access token is available and no refresh token is configured.");
    }

    if(this.pendingRefresh) {

      return this.pendingRefresh;
    }

    const refresh = this.refresh(this.refreshToken, this.backendBaseUrl).finally(() => {

      this.pendingRefresh = null;
    });

    this.pendingRefresh = refresh;

    return refresh;
  }

  private async refresh(refreshToken: string, backendBaseUrl: string): Promise<string> {

    const url = backendBaseUrl.replace(/\/+$/, "") + "/auth/spotify/refresh";
    let response: Response;

    log.info("Refreshing access token through %s.", url);

    try {

      response = await fetch(url, {

        body: JSON.stringify({ "refresh_token": refreshToken }),
        headers: { "Accept": "application/json", "Content-Type": "application/json" },
        method: "POST",
        signal: AbortSignal.timeout(this.requestTimeout)
      });
    } catch(error) {

      log.warn("Token refresh request failed: %s.", formatError(error));

      throw new CredentialError("NetworkFailure", "Token refresh request failed: " + formatError(error) + ".");
    }

    if(!response.ok) {

      log.warn("Token refresh was rejected with HTTP %s.", response.status);

      throw new CredentialError("NetworkFailure", "Token refresh failed with HTTP " + String(response.status) + ".");
    }

    const body: unknown = await response.json().catch(() => null);

    if(!body || (typeof body !== "object") || !("access_token" in body) || (typeof body.access_token !== "string") || !body.access_token) {

      throw new CredentialError("NoAccessCredential", "Token refresh response did not include an access token.");
    }

    const expiresIn = (("expires_in" in body) && (typeof body.expires_in === "number")) ? body.expires_in : 3600;

    const accessToken = body.access_token;

    this.accessToken = accessToken;
    this.expiresAt = this.now() + (expiresIn * 1000);

    if(("refresh_token" in body) && (typeof body.refresh_token === "string") && body.refresh_token) {

      this.refreshToken = body.refresh_token;
    }

    log.info("Access token refreshed (%s), valid for %ss.", redactCredential(accessToken), expiresIn);

    return accessToken;
  }
}

/**
 * Builds the token provider the configuration calls for.
 * @param config - The application configuration.
 * @returns A refreshing provider when a refresh token and backend are configured, a static provider for a bare access token, or null when there is no credential
 * source at all.
 */
export function createTokenProvider(config: Config): Nullable<TokenProvider> {

  const { accessToken, backendBaseUrl, refreshToken, requestTimeout } = config.spotify;

  if(refreshToken && backendBaseUrl) {

    return new RefreshingTokenProvider({ accessToken, backendBaseUrl, refreshToken, requestTimeout });
  }

  if(accessToken) {

    return new StaticTokenProvider(accessToken);
  }

  return null;
}
