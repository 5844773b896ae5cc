import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { describeError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const execFileAsync = promisify(execFile);
const dynamicImport = new Function(
  "modulePath",
  "return import(modulePath)",
) as (modulePath: string) => Promise<unknown>;

// The package entry point of pdf-parse 1.x runs a self-test when loaded as a module.
const PDF_PARSE_MODULE = "pdf-parse/lib/pdf-parse.js";
const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".pdf"]);

interface PdfParseResult {
  text?: string;
  numpages?: number;
}

type PdfParseFn = (dataBuffer: Buffer) => Promise<PdfParseResult>;

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === ".md" || ext === ".txt") {
    const content = await fs.readFile(filePath, "utf-8");
    return normalizeText(content);
  }

  if (ext === ".pdf") {
    return loadPdfText(filePath);
  }

  throw new Error(
    `Unsupported extension: ${ext}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
  );
}

async function loadPdfText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);

  const viaPdfParse = await tryParsePdfWithLibrary(buffer, filePath);
  if (viaPdfParse) {
    return viaPdfParse;
  }

  const viaPdftotext = await tryParsePdfWithPdftotext(filePath);
  if (viaPdftotext) {
    return viaPdftotext;
  }

  throw new Error(`No text could be extracted from ${path.basename(filePath)}.`);
}

async function tryParsePdfWithLibrary(
  buffer: Buffer,
  filePath: string,
): Promise<string | null> {
  try {
    const parse = resolvePdfParse(await dynamicImport(PDF_PARSE_MODULE));
    if (!parse) {
      return null;
    }
    const parsed = await parse(buffer);
    // pdf-parse separates pages with blank lines already; keep them as paragraph breaks.
    const text = normalizeText(parsed.text ?? "");
    return text || null;
  } catch (error) {
    console.error(`[index] pdf-parse failed for ${path.basename(filePath)}: ${describeError(error)}`);
    return null;
  }
}

async function tryParsePdfWithPdftotext(filePath: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("pdftotext", ["-layout", filePath, "-"]);
    const text = normalizeText(stdout.replace(/\f/g, "\n\n"));
    return text || null;
  } catch (error) {
    console.error(`[index] pdftotext failed for ${path.basename(filePath)}: ${describeError(error)}`);
    return null;
  }
}

function resolvePdfParse(mod: unknown): PdfParseFn | null {
  if (typeof mod === "function") {
    return mod as PdfParseFn;
  }

  if (!mod || typeof mod !== "object") {
    return null;
  }

  const candidate = "default" in mod ? mod.default : undefined;
  if (typeof candidate === "function") {
    return candidate as PdfParseFn;
  }

  return null;
}
