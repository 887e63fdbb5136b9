/**
 * Listing and fetching on top of a `MailboxApi`.
 *
 * Listing is all-or-nothing: without the full message set there is nothing
 * to process, so any page failure surfaces as a `ListError`.  Fetching is
 * per message and surfaces as a `FetchError` the archiver can isolate.
 */

import type { Logger } from "../core/index.js";
import { FetchError, ListError, describeError } from "../core/index.js";
import type {
  MailboxApi,
  MessageDetail,
  MessagePage,
  MessageSummary,
} from "./types.js";

/**
 * Walk `messages.list` page by page, following `nextPageToken` until a page
 * comes back without one.  Yields every page that has messages.
 */
export async function* listMessagePages(
  api: MailboxApi,
  query: string,
): AsyncGenerator<MessageSummary[]> {
  let pageToken: string | undefined;

  do {
    let page: MessagePage;
    try {
      page = await api.listMessages(query, pageToken);
    } catch (err) {
      throw new ListError(`Error listing messages: ${describeError(err)}`, {
        cause: err,
      });
    }

    if (page.messages.length > 0) {
      yield page.messages;
    }

    pageToken = page.nextPageToken;
  } while (pageToken);
}

export async function listMessages(
  api: MailboxApi,
  query: string,
  logger: Logger,
): Promise<MessageSummary[]> {
  const messages: MessageSummary[] = [];
  let pages = 0;

  for await (const page of listMessagePages(api, query)) {
    messages.push(...page);
    pages++;
  }

  logger.info(`Found ${messages.length} messages for query: '${query}'`, {
    pages,
  });
  return messages;
}

export async function fetchMessage(
  api: MailboxApi,
  messageId: string,
): Promise<MessageDetail> {
  try {
    return await api.getMessage(messageId);
  } catch (err) {
    throw new FetchError(messageId, { cause: err });
  }
}
