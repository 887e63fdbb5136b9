/**
 * AWS Lambda entry point.
 *
 * Expected event:
 *
 *   {
 *     "gmail_query": "in:inbox is:unread newer_than:7d",
 *     "gmail_user_id_s3_folder": "user_xyz_gmail_com"
 *   }
 *
 * Configuration comes from the function's environment (see `loadConfig`).
 */

import type { Context } from "aws-lambda";
import type { Logger } from "./connectors/core/index.js";
import {
  ConfigurationError,
  createLogger,
  loadConfig,
} from "./connectors/core/index.js";
import type { ArchiveOutcome, ArchiverDeps } from "./connectors/gmail/index.js";
import { createArchiver, createDefaultDeps } from "./connectors/gmail/index.js";

export interface ArchiveEvent {
  gmail_query?: unknown;
  gmail_user_id_s3_folder?: unknown;
}

export interface ArchiveResponse {
  statusCode: 200 | 400 | 500;
  body: string;
}

export const CONFIGURATION_ERROR_MESSAGE =
  "Lambda configuration error: Missing Gmail auth environment variables.";
export const BUCKET_CONFIGURATION_ERROR_MESSAGE =
  "Lambda configuration error: Missing S3_BUCKET_NAME environment variable.";

function configurationMessage(err: ConfigurationError): string {
  return err.missing.length > 0 &&
    err.missing.every((name) => name === "S3_BUCKET_NAME")
    ? BUCKET_CONFIGURATION_ERROR_MESSAGE
    : CONFIGURATION_ERROR_MESSAGE;
}

/** Map an archiver outcome to the status/body pair returned to the caller. */
export function toResponse(outcome: ArchiveOutcome): ArchiveResponse {
  switch (outcome.status) {
    case "rejected":
      return respond(400, { error: outcome.error });
    case "failed":
      return respond(500, {
        error:
          outcome.error instanceof ConfigurationError
            ? configurationMessage(outcome.error)
            : outcome.error.message,
      });
    case "completed":
      if (outcome.processed === 0 && outcome.failed === 0) {
        return respond(200, { message: outcome.message, processed_messages: 0 });
      }
      return respond(200, {
        message: outcome.message,
        processed_messages: outcome.processed,
        failed_messages: outcome.failed,
      });
  }
}

function respond(
  statusCode: ArchiveResponse["statusCode"],
  body: Record<string, unknown>,
): ArchiveResponse {
  return { statusCode, body: JSON.stringify(body) };
}

/**
 * Run one archive invocation.  `deps` replaces the production wiring,
 * which is built from `process.env` when omitted.
 */
export async function archiveEvent(
  event: ArchiveEvent,
  deps?: ArchiverDeps,
): Promise<ArchiveResponse> {
  const logger: Logger = deps?.logger ?? createLogger("gmail-archiver");
  logger.info(`Received event: ${JSON.stringify(event ?? {})}`);

  try {
    const archiver = createArchiver(
      deps ?? createDefaultDeps(loadConfig(), logger),
    );
    const outcome = await archiver.run({
      query: event?.gmail_query,
      folderId: event?.gmail_user_id_s3_folder,
    });
    return toResponse(outcome);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Error in handler: ${message}`);
    return respond(500, { error: message });
  }
}

export async function handler(
  event: ArchiveEvent,
  context?: Context,
): Promise<ArchiveResponse> {
  if (context) {
    createLogger("gmail-archiver").debug("Invocation context", {
      requestId: context.awsRequestId,
      functionName: context.functionName,
    });
  }
  return archiveEvent(event);
}
