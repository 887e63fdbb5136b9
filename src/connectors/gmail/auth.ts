/**
 * Access-token provider for the Gmail API.
 *
 * Holds the credential set for one invocation and exchanges the long-lived
 * refresh token for a short-lived access token when none is held or the held
 * one has expired.  Nothing is written to disk.
 */

import { google } from "googleapis";
import type { AuthSettings, Logger } from "../core/index.js";
import { AuthError, describeError } from "../core/index.js";
import type { AccessToken, Credentials, TokenRefresher } from "./types.js";

/** Refresh slightly early so a token does not lapse mid-request. */
const EXPIRY_SKEW_MS = 60_000;

// ─── googleapis-backed refresher ───

export class GoogleTokenRefresher implements TokenRefresher {
  private readonly tokenUri: string;

  constructor(tokenUri: string) {
    this.tokenUri = tokenUri;
  }

  async refresh(
    refreshToken: string,
    clientId: string,
    clientSecret: string,
  ): Promise<AccessToken> {
    const client = new google.auth.OAuth2({
      clientId,
      clientSecret,
      endpoints: { oauth2TokenUrl: this.tokenUri },
    });
    client.setCredentials({ refresh_token: refreshToken });

    const { token } = await client.getAccessToken();
    if (!token) {
      throw new Error("Token endpoint returned no access token");
    }
    return {
      accessToken: token,
      expiresAt: client.credentials.expiry_date ?? null,
    };
  }
}

// ─── Provider ───

export class CredentialProvider {
  private readonly credentials: Credentials;
  private readonly refresher: TokenRefresher;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    settings: AuthSettings,
    refresher: TokenRefresher,
    logger: Logger,
    now: () => number = Date.now,
  ) {
    this.credentials = { ...settings, accessToken: null, expiresAt: null };
    this.refresher = refresher;
    this.logger = logger;
    this.now = now;
  }

  /** True when a token is held and has not reached its expiry. */
  get valid(): boolean {
    const { accessToken, expiresAt } = this.credentials;
    if (!accessToken) return false;
    return expiresAt === null || expiresAt - EXPIRY_SKEW_MS > this.now();
  }

  async obtain(): Promise<string> {
    if (this.valid && this.credentials.accessToken) {
      return this.credentials.accessToken;
    }

    this.logger.info("Refreshing access token");
    let fresh: AccessToken;
    try {
      fresh = await this.refresher.refresh(
        this.credentials.refreshToken,
        this.credentials.clientId,
        this.credentials.clientSecret,
      );
    } catch (err) {
      throw new AuthError(
        `Failed to refresh Gmail token. Check REFRESH_TOKEN and credentials: ${describeError(err)}`,
        { cause: err },
      );
    }

    this.credentials.accessToken = fresh.accessToken;
    this.credentials.expiresAt = fresh.expiresAt;
    return fresh.accessToken;
  }
}
