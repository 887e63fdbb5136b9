// Archiver
export {
  createArchiver,
  GmailArchiver,
  NO_MESSAGES_MESSAGE,
  summaryMessage,
} from "./archiver.js";
// Auth
export { CredentialProvider, GoogleTokenRefresher } from "./auth.js";
// Client (for advanced usage / testing)
export { createGmailClient, GmailClient } from "./client.js";
// Wiring
export { createBucketStore, createDefaultDeps } from "./deps.js";
// Listing
export { fetchMessage, listMessagePages, listMessages } from "./lister.js";
// Body extraction
export { decodeBase64Url, extractBody } from "./mime.js";
// Types
export type {
  AccessToken,
  ArchiveOutcome,
  ArchiveRecord,
  ArchiveRequest,
  ArchiveStage,
  ArchiverDeps,
  Credentials,
  MailboxApi,
  MessageDetail,
  MessagePage,
  MessagePayload,
  MessageSummary,
  TokenRefresher,
} from "./types.js";
// Writer
export { ArchiveWriter, archiveKey, buildArchiveRecord } from "./writer.js";
