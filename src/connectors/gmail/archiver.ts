/**
 * Gmail archiver: query a mailbox and store every matching message as JSON.
 *
 *   validating      request fields, then auth configuration and store
 *   authenticating  one access-token refresh
 *   listing         every page of messages.list for the query
 *   processing      fetch → extract body → write, one message at a time
 *
 * Anything that goes wrong before `processing` ends the run.  Inside it a
 * failure costs only the message being handled.
 */

import type { Logger } from "../core/index.js";
import {
  ArchiverError,
  ValidationError,
  describeError,
  requireAuthSettings,
} from "../core/index.js";
import { CredentialProvider } from "./auth.js";
import { fetchMessage, listMessages } from "./lister.js";
import type {
  ArchiveOutcome,
  ArchiveRequest,
  ArchiveStage,
  ArchiverDeps,
  MailboxApi,
} from "./types.js";
import { ArchiveWriter, buildArchiveRecord } from "./writer.js";

export const NO_MESSAGES_MESSAGE = "No messages found matching the query.";

export function summaryMessage(processed: number, failed: number): string {
  return `Processing complete. Processed: ${processed}, Failed: ${failed}.`;
}

export class GmailArchiver {
  private readonly deps: ArchiverDeps;
  private readonly logger: Logger;

  constructor(deps: ArchiverDeps) {
    this.deps = deps;
    this.logger = deps.logger;
  }

  async run(request: ArchiveRequest): Promise<ArchiveOutcome> {
    const query = textField(request.query);
    const folderId = textField(request.folderId);

    // ── Validating ──

    if (!query) {
      return this.reject(
        new ValidationError("gmail_query not provided in event"),
      );
    }
    if (!folderId) {
      return this.reject(
        new ValidationError("gmail_user_id_s3_folder not provided in event"),
      );
    }

    let stage: ArchiveStage = "validating";
    try {
      const { config, refresher } = this.deps;
      const provider = new CredentialProvider(
        requireAuthSettings(config),
        refresher,
        this.logger,
      );
      const store = this.deps.createStore(config);

      // ── Authenticating ──

      stage = "authenticating";
      const accessToken = await provider.obtain();
      const mailbox = this.deps.createMailbox(accessToken, config.userId);
      this.logger.info("Gmail client ready", { userId: config.userId });

      // ── Listing ──

      stage = "listing";
      this.logger.info(
        `Listing messages for user '${config.userId}' with query: '${query}'`,
      );
      const summaries = await listMessages(mailbox, query, this.logger);

      if (summaries.length === 0) {
        this.logger.info(NO_MESSAGES_MESSAGE);
        return {
          status: "completed",
          processed: 0,
          failed: 0,
          message: NO_MESSAGES_MESSAGE,
        };
      }

      // ── Processing ──

      stage = "processing";
      const writer = new ArchiveWriter(store, config.keyPrefix, this.logger);
      let processed = 0;
      let failed = 0;

      for (const { id } of summaries) {
        try {
          await this.archiveMessage(mailbox, writer, folderId, id);
          processed++;
        } catch (err) {
          failed++;
          this.logger.warn(`Failed to process or upload message ID ${id}`, {
            messageId: id,
            kind: err instanceof ArchiverError ? err.kind : "unexpected",
            error: describeError(err),
          });
        }
      }

      const message = summaryMessage(processed, failed);
      this.logger.info(message);
      return { status: "completed", processed, failed, message };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Archive run failed while ${stage}`, {
        kind: err instanceof ArchiverError ? err.kind : "unexpected",
        error: error.message,
      });
      return { status: "failed", stage, error };
    }
  }

  private reject(err: ValidationError): ArchiveOutcome {
    this.logger.warn("Rejected archive request", { error: err.message });
    return { status: "rejected", error: err.message };
  }

  // ─── Per-message processing ───

  private async archiveMessage(
    mailbox: MailboxApi,
    writer: ArchiveWriter,
    folderId: string,
    messageId: string,
  ): Promise<void> {
    this.logger.debug(`Fetching details for message ID: ${messageId}`);
    const detail = await fetchMessage(mailbox, messageId);
    const record = buildArchiveRecord(detail);
    await writer.write(folderId, messageId, record);
  }
}

function textField(value: unknown): string | undefined {
  return typeof value === "string" ? value.trim() : undefined;
}

export function createArchiver(deps: ArchiverDeps): GmailArchiver {
  return new GmailArchiver(deps);
}
