/**
 * Body extraction for Gmail message payloads.
 *
 * Gmail returns message bodies in the `payload` tree as base64url-encoded
 * `body.data` strings.  The archive keeps one human-readable body per
 * message:
 *
 *   1. the first top-level text/plain part with data
 *   2. otherwise the first top-level text/html part with data (markup kept)
 *   3. for single-part messages, the payload's own body
 *
 * Anything else yields an empty string.
 */

import { DecodeError } from "../core/index.js";
import type { MessagePayload } from "./types.js";

// ─── Decoding ───

const BASE64URL = /^[A-Za-z0-9_-]*={0,2}$/;

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode a base64url body blob as UTF-8.  Padding is optional.  Throws
 * `DecodeError` on characters outside the alphabet, a truncated final
 * quantum, or bytes that are not valid UTF-8.
 */
export function decodeBase64Url(data: string): string {
  const unpadded = data.replace(/=+$/, "");
  if (!BASE64URL.test(data) || unpadded.length % 4 === 1) {
    throw new DecodeError("Body data is not valid base64url");
  }

  const bytes = Buffer.from(unpadded, "base64url");
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new DecodeError("Body data is not valid UTF-8", { cause: err });
  }
}

// ─── Extraction ───

export function extractBody(payload: MessagePayload | undefined | null): string {
  if (!payload) return "";

  if (payload.parts && payload.parts.length > 0) {
    let body = "";
    for (const part of payload.parts) {
      const data = part.body?.data;
      if (!data) continue;

      if (part.mimeType === "text/plain") {
        return decodeBase64Url(data);
      }
      if (part.mimeType === "text/html" && !body) {
        body = decodeBase64Url(data);
      }
    }
    return body;
  }

  const data = payload.body?.data;
  return data ? decodeBase64Url(data) : "";
}
