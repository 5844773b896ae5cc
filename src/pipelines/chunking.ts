import { normalizeText } from "../utils/text.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Splits a document into fixed windows of `maxChars` characters. Window `n` starts at
 * `n * (maxChars - overlap)`, so consecutive windows share exactly `overlap` characters
 * and the last one holds whatever remains.
 */
export function splitIntoChunks(
  text: string,
  maxChars: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): string[] {
  const safeOverlap = Math.min(Math.max(overlap, 0), maxChars - 1);
  const stride = maxChars - safeOverlap;
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  const chunks: string[] = [];
  for (let start = 0; start < normalized.length; start += stride) {
    const end = Math.min(start + maxChars, normalized.length);
    const piece = normalized.slice(start, end);
    if (piece.trim()) {
      chunks.push(piece);
    }
    if (end >= normalized.length) {
      break;
    }
  }

  return chunks;
}
