/**
 * Archive writer for Gmail messages.
 *
 * Each message becomes one JSON object:
 *
 *   {keyPrefix}/{folderId}/message_{messageId}.json
 *
 * The key depends only on the folder and message id, so archiving the same
 * message again overwrites the earlier object.
 */

import type { Logger, ObjectStore } from "../core/index.js";
import { WriteError } from "../core/index.js";
import { extractBody } from "./mime.js";
import type { ArchiveRecord, MessageDetail } from "./types.js";

const JSON_CONTENT_TYPE = "application/json";

// ─── Record building ───

/**
 * Reshape a `format=full` message into the archived record.  Throws
 * `DecodeError` when the body cannot be decoded.
 */
export function buildArchiveRecord(detail: MessageDetail): ArchiveRecord {
  return {
    id: detail.id ?? null,
    threadId: detail.threadId ?? null,
    labelIds: detail.labelIds ?? null,
    snippet: detail.snippet ?? null,
    historyId: detail.historyId ?? null,
    internalDate: detail.internalDate ?? null,
    payload: {
      headers: detail.payload?.headers ?? null,
      decoded_body_plain_or_html: extractBody(detail.payload),
    },
    sizeEstimate: detail.sizeEstimate ?? null,
  };
}

export function archiveKey(
  keyPrefix: string,
  folderId: string,
  messageId: string,
): string {
  return `${keyPrefix}/${folderId}/message_${messageId}.json`;
}

// ─── Writer ───

export class ArchiveWriter {
  private readonly store: ObjectStore;
  private readonly keyPrefix: string;
  private readonly logger: Logger;

  constructor(store: ObjectStore, keyPrefix: string, logger: Logger) {
    this.store = store;
    this.keyPrefix = keyPrefix;
    this.logger = logger;
  }

  /** Store `record` as indented JSON and return the key it was written to. */
  async write(
    folderId: string,
    messageId: string,
    record: ArchiveRecord,
  ): Promise<string> {
    const key = archiveKey(this.keyPrefix, folderId, messageId);
    try {
      await this.store.putObject(
        key,
        JSON.stringify(record, null, 4),
        JSON_CONTENT_TYPE,
      );
    } catch (err) {
      throw new WriteError(key, { cause: err });
    }
    this.logger.info(
      `Successfully uploaded message ${messageId} to ${this.store.describe(key)}`,
    );
    return key;
  }
}
