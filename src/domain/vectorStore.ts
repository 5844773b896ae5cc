import { Chunk, EmbeddedChunk, ScoredChunk } from "./types.js";

export interface VectorStoreStats {
  chunkCount: number;
  sources: string[];
}

export interface VectorStore {
  /**
   * Replaces the stored chunk set as one unit. Readers see either the previous set
   * or the new one.
   */
  replaceAll(chunks: EmbeddedChunk[]): Promise<VectorStoreStats>;
  similaritySearch(queryEmbedding: number[], topK: number): Promise<ScoredChunk[]>;
  listChunks(): Promise<Chunk[]>;
  stats(): Promise<VectorStoreStats>;
  close(): Promise<void>;
}
