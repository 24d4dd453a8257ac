import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { escapeHtml, fileExists, isErrnoException } from "./utils.js";

describe("escapeHtml", () => {
  it("escapes HTML special characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });

  it("leaves plain text alone", () => {
    expect(escapeHtml("https://example.com/bar")).toBe("https://example.com/bar");
  });
});

describe("isErrnoException", () => {
  it("accepts errors with a string code", () => {
    const err = Object.assign(new Error("in use"), { code: "EADDRINUSE" });
    expect(isErrnoException(err)).toBe(true);
  });

  it("rejects plain errors and non-errors", () => {
    expect(isErrnoException(new Error("plain"))).toBe(false);
    expect(isErrnoException({ code: "ENOENT" })).toBe(false);
    expect(isErrnoException(Object.assign(new Error("numeric"), { code: 2 }))).toBe(false);
  });
});

describe("fileExists", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ssl-proxy-utils-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("is true for a readable file", () => {
    const file = path.join(tmpDir, "cert.pem");
    fs.writeFileSync(file, "pem");
    expect(fileExists(file)).toBe(true);
  });

  it("is false for a missing file", () => {
    expect(fileExists(path.join(tmpDir, "missing.pem"))).toBe(false);
  });
});
