import { Chunk } from "../../domain/types.js";
import { sharesAnyToken, tokenize } from "../../utils/text.js";

interface IndexedChunk {
  chunk: Chunk;
  tokens: Set<string>;
}

/**
 * Word-overlap lookup over a fixed chunk list. Used when no embeddings exist or the
 * vector path failed. Results keep document order.
 */
export class KeywordIndex {
  private readonly entries: readonly IndexedChunk[];

  constructor(chunks: readonly Chunk[]) {
    this.entries = chunks.map((chunk) => ({ chunk, tokens: new Set(tokenize(chunk.content)) }));
  }

  get size(): number {
    return this.entries.length;
  }

  search(query: string, limit: number): Chunk[] {
    const queryTokens = new Set(tokenize(query));
    if (queryTokens.size === 0 || limit <= 0) {
      return [];
    }

    const matches: Chunk[] = [];
    for (const entry of this.entries) {
      if (sharesAnyToken(queryTokens, entry.tokens)) {
        matches.push(entry.chunk);
        if (matches.length >= limit) {
          break;
        }
      }
    }
    return matches;
  }
}
