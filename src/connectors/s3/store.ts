/**
 * S3-backed object store.
 *
 * One `PutObject` per call; S3 replaces an existing object under the same
 * key, which is what makes re-running an archive idempotent.
 */

import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { ObjectStore } from "../core/index.js";

/** The slice of `S3Client` the store calls; lets tests hand in a fake. */
export type S3Sender = Pick<S3Client, "send">;

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Sender;
  private readonly bucket: string;

  constructor(bucket: string, client: S3Sender) {
    this.bucket = bucket;
    this.client = client;
  }

  describe(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }

  async putObject(key: string, body: string, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );
  }
}

export function createS3ObjectStore(
  bucket: string,
  region?: string,
): ObjectStore {
  return new S3ObjectStore(bucket, new S3Client(region ? { region } : {}));
}
