import { VectorStore, VectorStoreStats } from "../../domain/vectorStore.js";
import { Chunk, EmbeddedChunk, ScoredChunk } from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

export class InMemoryVectorStore implements VectorStore {
  protected chunks: readonly EmbeddedChunk[] = [];

  async replaceAll(chunks: EmbeddedChunk[]): Promise<VectorStoreStats> {
    this.chunks = cloneChunks(chunks);
    return this.computeStats();
  }

  async similaritySearch(queryEmbedding: number[], topK: number): Promise<ScoredChunk[]> {
    if (topK <= 0) {
      return [];
    }

    const candidates: ScoredChunk[] = [];
    for (const { embedding, ...chunk } of this.chunks) {
      candidates.push({ chunk, score: cosineSimilarity(queryEmbedding, embedding) });
    }

    return candidates.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  async listChunks(): Promise<Chunk[]> {
    return this.chunks.map(({ content, source, sequenceNo }) => ({ content, source, sequenceNo }));
  }

  async stats(): Promise<VectorStoreStats> {
    return this.computeStats();
  }

  async close(): Promise<void> {}

  protected computeStats(): VectorStoreStats {
    const sources: string[] = [];
    for (const chunk of this.chunks) {
      if (!sources.includes(chunk.source)) {
        sources.push(chunk.source);
      }
    }
    return { chunkCount: this.chunks.length, sources };
  }
}

export function cloneChunks(chunks: readonly EmbeddedChunk[]): EmbeddedChunk[] {
  return chunks.map((chunk) => ({ ...chunk, embedding: [...chunk.embedding] }));
}
