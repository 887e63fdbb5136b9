/**
 * Gmail archiver type definitions.
 *
 * Message payloads use the googleapis schemas directly (`gmail_v1.Schema$*`);
 * the types here describe our own seams around them.
 */

import type { gmail_v1 } from "googleapis";
import type { ArchiverConfig, Logger, ObjectStore } from "../core/index.js";

// ─── Credentials ───

export interface Credentials {
  accessToken: string | null;
  /** Unix-ms expiry of `accessToken`; null when the endpoint gave none. */
  expiresAt: number | null;
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  tokenUri: string;
  scopes: string[];
}

export interface AccessToken {
  accessToken: string;
  expiresAt: number | null;
}

export interface TokenRefresher {
  refresh(
    refreshToken: string,
    clientId: string,
    clientSecret: string,
  ): Promise<AccessToken>;
}

// ─── Mailbox ───

export interface MessageSummary {
  id: string;
  threadId: string;
}

export interface MessagePage {
  messages: MessageSummary[];
  nextPageToken?: string;
}

export type MessageDetail = gmail_v1.Schema$Message;
export type MessagePayload = gmail_v1.Schema$MessagePart;

/** The two mailbox calls the archiver makes. */
export interface MailboxApi {
  listMessages(query: string, pageToken?: string): Promise<MessagePage>;
  getMessage(id: string): Promise<MessageDetail>;
}

// ─── Archive record (persisted JSON) ───

export interface ArchiveRecord {
  id: string | null;
  threadId: string | null;
  labelIds: string[] | null;
  snippet: string | null;
  historyId: string | null;
  internalDate: string | null;
  payload: {
    headers: gmail_v1.Schema$MessagePartHeader[] | null;
    /** First decoded text body; "" when the message has none. */
    decoded_body_plain_or_html: string;
  };
  sizeEstimate: number | null;
}

// ─── Invocation ───

/** Fields arrive from untyped event JSON; non-strings count as missing. */
export interface ArchiveRequest {
  query?: unknown;
  folderId?: unknown;
}

export type ArchiveOutcome =
  | { status: "rejected"; error: string }
  | { status: "failed"; stage: ArchiveStage; error: Error }
  | {
      status: "completed";
      processed: number;
      failed: number;
      message: string;
    };

export type ArchiveStage =
  | "validating"
  | "authenticating"
  | "listing"
  | "processing";

export interface ArchiverDeps {
  config: ArchiverConfig;
  refresher: TokenRefresher;
  /** Builds the mailbox client once an access token is available. */
  createMailbox(accessToken: string, userId: string): MailboxApi;
  /** Called after validation so a missing bucket reads as a config error. */
  createStore(config: ArchiverConfig): ObjectStore;
  logger: Logger;
}
