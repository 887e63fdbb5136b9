/**
 * Gmail API client wrapper.
 *
 * Thin layer over `googleapis` exposing the two message calls the archiver
 * needs.  Authentication is a bearer access token obtained beforehand by
 * the credential provider.
 */

import { type gmail_v1, google } from "googleapis";
import type {
  MailboxApi,
  MessageDetail,
  MessagePage,
  MessageSummary,
} from "./types.js";

export class GmailClient implements MailboxApi {
  private readonly gmail: gmail_v1.Gmail;
  private readonly userId: string;

  constructor(accessToken: string, userId: string) {
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });
    this.gmail = google.gmail({ version: "v1", auth });
    this.userId = userId;
  }

  async listMessages(query: string, pageToken?: string): Promise<MessagePage> {
    const res = await this.gmail.users.messages.list({
      userId: this.userId,
      q: query,
      pageToken,
    });

    const messages: MessageSummary[] = [];
    for (const m of res.data.messages ?? []) {
      if (m.id) messages.push({ id: m.id, threadId: m.threadId ?? "" });
    }

    return {
      messages,
      nextPageToken: res.data.nextPageToken ?? undefined,
    };
  }

  /** Fetch a single message with `format=full`. */
  async getMessage(id: string): Promise<MessageDetail> {
    const res = await this.gmail.users.messages.get({
      userId: this.userId,
      id,
      format: "full",
    });
    return res.data;
  }
}

export function createGmailClient(
  accessToken: string,
  userId: string,
): MailboxApi {
  return new GmailClient(accessToken, userId);
}
