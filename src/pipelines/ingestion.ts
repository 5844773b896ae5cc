import { promises as fs, Stats } from "node:fs";
import path from "node:path";
import { describeError, IngestionError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";
import { isSupportedDocumentExtension, loadDocumentText } from "../infra/parsers/documentLoader.js";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, splitIntoChunks } from "./chunking.js";

export interface IngestOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface IngestResult {
  chunks: Chunk[];
  documents: string[];
}

/**
 * Reads every supported file directly under `dir` (sorted by name) and splits it
 * into chunks. All-or-nothing: any unreadable file fails the whole ingest.
 */
export async function ingestDirectory(
  dir: string,
  options: IngestOptions = {},
): Promise<IngestResult> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  const root = path.resolve(dir);

  const files = await listEligibleFiles(root);
  if (files.length === 0) {
    throw new IngestionError(`No supported documents (.pdf, .txt, .md) found in ${root}.`);
  }

  const chunks: Chunk[] = [];
  const documents: string[] = [];

  for (const fileName of files) {
    let text: string;
    try {
      text = await loadDocumentText(path.join(root, fileName));
    } catch (error) {
      throw new IngestionError(`Failed to load ${fileName}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const pieces = splitIntoChunks(text, chunkSize, chunkOverlap);
    if (pieces.length === 0) {
      continue;
    }

    documents.push(fileName);
    pieces.forEach((content, sequenceNo) => {
      chunks.push({ content, source: fileName, sequenceNo });
    });
  }

  if (chunks.length === 0) {
    throw new IngestionError(`Documents in ${root} produced no text to index.`);
  }

  return { chunks, documents };
}

async function listEligibleFiles(root: string): Promise<string[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (error) {
    throw new IngestionError(`Document directory does not exist: ${root}`, { cause: error });
  }
  if (!stat.isDirectory()) {
    throw new IngestionError(`Document path is not a directory: ${root}`);
  }

  const entries = await fs.readdir(root, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupportedDocumentExtension(entry.name))
    .map((entry) => entry.name)
    .sort();
}
