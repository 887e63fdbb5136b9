/**
 * Archiver configuration, resolved from environment variables once per
 * invocation and passed explicitly to every component.
 */

import { ConfigurationError } from "./errors.js";

export const DEFAULT_TOKEN_URI = "https://oauth2.googleapis.com/token";
export const GMAIL_READONLY_SCOPE =
  "https://www.googleapis.com/auth/gmail.readonly";

export interface ArchiverConfig {
  bucketName?: string;
  /** Leading path segment of every archive object key. */
  keyPrefix: string;
  /** Mailbox to read; "me" is the account that granted the refresh token. */
  userId: string;
  refreshToken?: string;
  clientId?: string;
  clientSecret?: string;
  tokenUri: string;
  scopes: string[];
  region?: string;
}

export interface AuthSettings {
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  tokenUri: string;
  scopes: string[];
}

/** Treat unset and blank variables the same way. */
function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): ArchiverConfig {
  return {
    bucketName: read(env, "S3_BUCKET_NAME"),
    keyPrefix: read(env, "S3_KEY_PREFIX") ?? "gmail",
    userId: read(env, "GMAIL_USER_ID") ?? "me",
    refreshToken: read(env, "REFRESH_TOKEN"),
    clientId: read(env, "CLIENT_ID"),
    clientSecret: read(env, "CLIENT_SECRET"),
    tokenUri: read(env, "GMAIL_TOKEN_URI") ?? DEFAULT_TOKEN_URI,
    scopes: [GMAIL_READONLY_SCOPE],
    region: read(env, "AWS_REGION"),
  };
}

/**
 * Names of the auth variables that are missing, in the order they are
 * documented.
 */
export function missingAuthSettings(config: ArchiverConfig): string[] {
  const missing: string[] = [];
  if (!config.refreshToken) missing.push("REFRESH_TOKEN");
  if (!config.clientId) missing.push("CLIENT_ID");
  if (!config.clientSecret) missing.push("CLIENT_SECRET");
  return missing;
}

export function requireAuthSettings(config: ArchiverConfig): AuthSettings {
  const { refreshToken, clientId, clientSecret } = config;
  if (!refreshToken || !clientId || !clientSecret) {
    throw new ConfigurationError(missingAuthSettings(config));
  }
  return {
    refreshToken,
    clientId,
    clientSecret,
    tokenUri: config.tokenUri,
    scopes: config.scopes,
  };
}
