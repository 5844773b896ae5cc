import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
  loadDocumentText,
} from "../src/infra/parsers/documentLoader.js";

describe("documentLoader", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "loader-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("supports pdf, text and markdown", () => {
    expect(getSupportedDocumentExtensions().sort()).toEqual([".md", ".pdf", ".txt"]);
    expect(isSupportedDocumentExtension("brochure.PDF")).toBe(true);
    expect(isSupportedDocumentExtension("notes.docx")).toBe(false);
  });

  it("loads text files with normalized line endings", async () => {
    const filePath = path.join(tmpDir, "sample.txt");
    await fs.writeFile(filePath, "line 1\r\nline 2\tend\n\n", "utf-8");

    expect(await loadDocumentText(filePath)).toBe("line 1\nline 2 end");
  });

  it("loads markdown files", async () => {
    const filePath = path.join(tmpDir, "about.md");
    await fs.writeFile(filePath, "# About\n\nWe build chatbots.", "utf-8");

    expect(await loadDocumentText(filePath)).toBe("# About\n\nWe build chatbots.");
  });

  it("rejects unsupported extensions", async () => {
    await expect(loadDocumentText("sample.xlsx")).rejects.toThrow("Unsupported extension: .xlsx");
  });
});
