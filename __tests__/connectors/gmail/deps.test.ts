import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../../src/connectors/core/errors.js";
import { GoogleTokenRefresher } from "../../../src/connectors/gmail/auth.js";
import { createGmailClient } from "../../../src/connectors/gmail/client.js";
import { createBucketStore, createDefaultDeps } from "../../../src/connectors/gmail/deps.js";
import { S3ObjectStore } from "../../../src/connectors/s3/store.js";
import { makeConfig, makeLogger, MemoryObjectStore } from "../../helpers/fakes.js";

describe("createBucketStore", () => {
  it("requires a bucket name", () => {
    const attempt = () => createBucketStore(makeConfig({ bucketName: undefined }));

    expect(attempt).toThrow(ConfigurationError);
    expect(attempt).toThrow("Missing required configuration: S3_BUCKET_NAME");
  });

  it("builds an S3 store for the configured bucket", () => {
    const store = createBucketStore(makeConfig({ bucketName: "test-bucket", region: "eu-west-2" }));

    expect(store).toBeInstanceOf(S3ObjectStore);
    expect(store.describe("gmail/f/message_1.json")).toBe("s3://test-bucket/gmail/f/message_1.json");
  });
});

describe("createDefaultDeps", () => {
  it("wires googleapis and S3 by default", () => {
    const config = makeConfig();
    const logger = makeLogger();

    const deps = createDefaultDeps(config, logger);

    expect(deps.config).toBe(config);
    expect(deps.logger).toBe(logger);
    expect(deps.refresher).toBeInstanceOf(GoogleTokenRefresher);
    expect(deps.createMailbox).toBe(createGmailClient);
    expect(deps.createStore(config)).toBeInstanceOf(S3ObjectStore);
  });

  it("accepts another store factory", () => {
    const store = new MemoryObjectStore();

    const deps = createDefaultDeps(makeConfig({ bucketName: undefined }), makeLogger(), () => store);

    expect(deps.createStore(makeConfig())).toBe(store);
  });
});
