/**
 * Production wiring: googleapis for auth and mail, S3 for storage.
 */

import type { ArchiverConfig, Logger, ObjectStore } from "../core/index.js";
import { ConfigurationError } from "../core/index.js";
import { createS3ObjectStore } from "../s3/index.js";
import { GoogleTokenRefresher } from "./auth.js";
import { createGmailClient } from "./client.js";
import type { ArchiverDeps } from "./types.js";

export function createBucketStore(config: ArchiverConfig): ObjectStore {
  if (!config.bucketName) {
    throw new ConfigurationError(["S3_BUCKET_NAME"]);
  }
  return createS3ObjectStore(config.bucketName, config.region);
}

export function createDefaultDeps(
  config: ArchiverConfig,
  logger: Logger,
  createStore: (config: ArchiverConfig) => ObjectStore = createBucketStore,
): ArchiverDeps {
  return {
    config,
    refresher: new GoogleTokenRefresher(config.tokenUri),
    createMailbox: createGmailClient,
    createStore,
    logger,
  };
}
