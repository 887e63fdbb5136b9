import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileObjectStore } from "../../../src/connectors/core/output.js";

describe("FileObjectStore", () => {
  let tmpDir: string;
  let store: FileObjectStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "gmail-archiver-out-"));
    store = new FileObjectStore(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes the object body under its key, creating directories", async () => {
    await store.putObject("gmail/folder/message_1.json", '{"id":"1"}', "application/json");

    const content = fs.readFileSync(path.join(tmpDir, "gmail/folder/message_1.json"), "utf-8");
    expect(content).toBe('{"id":"1"}');
  });

  it("replaces an existing object", async () => {
    await store.putObject("a/b.json", "first", "application/json");
    await store.putObject("a/b.json", "second", "application/json");

    expect(fs.readFileSync(path.join(tmpDir, "a/b.json"), "utf-8")).toBe("second");
  });

  it("leaves no temp file behind", async () => {
    await store.putObject("x.json", "{}", "application/json");
    expect(fs.readdirSync(tmpDir)).toEqual(["x.json"]);
  });

  it("refuses keys that escape the directory", async () => {
    await expect(store.putObject("../outside.json", "{}", "application/json")).rejects.toThrow(
      "Key escapes the output directory: ../outside.json",
    );
  });

  it("describes keys as file paths", () => {
    expect(store.describe("gmail/f/message_1.json")).toBe(
      path.join(tmpDir, "gmail/f/message_1.json"),
    );
  });
});
