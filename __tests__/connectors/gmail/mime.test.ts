import { describe, expect, it } from "vitest";
import { DecodeError } from "../../../src/connectors/core/errors.js";
import { decodeBase64Url, extractBody } from "../../../src/connectors/gmail/mime.js";
import type { MessagePayload } from "../../../src/connectors/gmail/types.js";
import { b64url } from "../../helpers/fakes.js";

// ─── Test fixtures ───

function plainPart(text: string): MessagePayload {
  return { mimeType: "text/plain", body: { size: text.length, data: b64url(text) } };
}

function htmlPart(html: string): MessagePayload {
  return { mimeType: "text/html", body: { size: html.length, data: b64url(html) } };
}

function multipart(...parts: MessagePayload[]): MessagePayload {
  return { mimeType: "multipart/alternative", body: { size: 0 }, parts };
}

// ─── decodeBase64Url ───

describe("decodeBase64Url", () => {
  it("decodes unpadded base64url", () => {
    expect(decodeBase64Url("SGVsbG8")).toBe("Hello");
  });

  it("accepts trailing padding", () => {
    expect(decodeBase64Url("SGVsbG8=")).toBe("Hello");
  });

  it("decodes URL-safe characters and multi-byte UTF-8", () => {
    const text = "Grüße ✓ ??>>";
    const encoded = b64url(text);
    expect(encoded).toMatch(/[-_]/);
    expect(decodeBase64Url(encoded)).toBe(text);
  });

  it("keeps a leading byte order mark", () => {
    expect(decodeBase64Url(b64url("\uFEFFhi"))).toBe("\uFEFFhi");
  });

  it("decodes an empty string to an empty string", () => {
    expect(decodeBase64Url("")).toBe("");
  });

  it("rejects characters from the standard alphabet", () => {
    expect(() => decodeBase64Url("ab+/cd")).toThrow(DecodeError);
  });

  it("rejects a truncated final quantum", () => {
    expect(() => decodeBase64Url("SGVsb")).toThrow("not valid base64url");
  });

  it("rejects bytes that are not UTF-8", () => {
    const encoded = Buffer.from([0xff, 0xfe, 0xfd]).toString("base64url");
    expect(() => decodeBase64Url(encoded)).toThrow("not valid UTF-8");
  });
});

// ─── extractBody ───

describe("extractBody", () => {
  it("prefers text/plain when it comes before text/html", () => {
    const payload = multipart(plainPart("plain body"), htmlPart("<p>html body</p>"));
    expect(extractBody(payload)).toBe("plain body");
  });

  it("prefers text/plain when it comes after text/html", () => {
    const payload = multipart(htmlPart("<p>html body</p>"), plainPart("plain body"));
    expect(extractBody(payload)).toBe("plain body");
  });

  it("falls back to html without stripping markup", () => {
    const payload = multipart(htmlPart("<p>Rich <strong>email</strong></p>"));
    expect(extractBody(payload)).toBe("<p>Rich <strong>email</strong></p>");
  });

  it("uses the first of several text/plain parts", () => {
    const payload = multipart(plainPart("first"), plainPart("second"));
    expect(extractBody(payload)).toBe("first");
  });

  it("keeps the first html part when there is no plain text", () => {
    const payload = multipart(htmlPart("<b>one</b>"), htmlPart("<b>two</b>"));
    expect(extractBody(payload)).toBe("<b>one</b>");
  });

  it("skips parts without body data", () => {
    const payload = multipart(
      { mimeType: "text/plain", body: { size: 0 } },
      htmlPart("<i>fallback</i>"),
    );
    expect(extractBody(payload)).toBe("<i>fallback</i>");
  });

  it("does not descend into nested multiparts", () => {
    const payload = multipart(
      multipart(plainPart("nested plain")),
      {
        mimeType: "application/pdf",
        filename: "report.pdf",
        body: { attachmentId: "att_001", size: 2048 },
      },
    );
    expect(extractBody(payload)).toBe("");
  });

  it("decodes the body of a single-part message", () => {
    expect(extractBody(plainPart("Hello world"))).toBe("Hello world");
  });

  it("decodes a single-part html body as is", () => {
    expect(extractBody(htmlPart("<p>hi</p>"))).toBe("<p>hi</p>");
  });

  it("returns an empty string when there is no body", () => {
    expect(extractBody({ mimeType: "text/plain", body: { size: 0 } })).toBe("");
    expect(extractBody(undefined)).toBe("");
    expect(extractBody(null)).toBe("");
  });

  it("treats an empty parts list as a single-part message", () => {
    const payload: MessagePayload = {
      mimeType: "text/plain",
      parts: [],
      body: { size: 4, data: b64url("solo") },
    };
    expect(extractBody(payload)).toBe("solo");
  });

  it("throws DecodeError for a malformed body", () => {
    const payload = multipart({ mimeType: "text/plain", body: { data: "not*base64" } });
    expect(() => extractBody(payload)).toThrow(DecodeError);
  });
});
