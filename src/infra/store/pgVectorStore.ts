import { Pool } from "pg";
import { VectorStore, VectorStoreStats } from "../../domain/vectorStore.js";
import { Chunk, EmbeddedChunk, ScoredChunk } from "../../domain/types.js";

type PgChunkRow = {
  source: string;
  sequence_no: number;
  content: string;
};

type PgScoredChunkRow = PgChunkRow & {
  score: number;
};

export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS document_chunks (
        source TEXT NOT NULL,
        sequence_no INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        PRIMARY KEY (source, sequence_no)
      )
    `);
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_document_chunks_embedding
      ON document_chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async replaceAll(chunks: EmbeddedChunk[]): Promise<VectorStoreStats> {
    await this.initialize();

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query("DELETE FROM document_chunks");

      for (const chunk of chunks) {
        if (chunk.embedding.length !== this.vectorDimension) {
          throw new Error(
            `Embedding dimension ${chunk.embedding.length} does not match VECTOR_DIMENSION=${this.vectorDimension}.`,
          );
        }

        await client.query(
          `
            INSERT INTO document_chunks (source, sequence_no, content, embedding)
            VALUES ($1, $2, $3, $4::vector)
          `,
          [chunk.source, chunk.sequenceNo, chunk.content, toVectorLiteral(chunk.embedding)],
        );
      }

      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }

    return this.stats();
  }

  async similaritySearch(queryEmbedding: number[], topK: number): Promise<ScoredChunk[]> {
    await this.initialize();

    const result = await this.pool.query<PgScoredChunkRow>(
      `
        SELECT
          source,
          sequence_no,
          content,
          (1 - (embedding <=> $1::vector)) AS score
        FROM document_chunks
        ORDER BY embedding <=> $1::vector
        LIMIT $2
      `,
      [toVectorLiteral(queryEmbedding), topK],
    );

    return result.rows.map((row) => ({
      chunk: toChunk(row),
      score: Number(row.score),
    }));
  }

  async listChunks(): Promise<Chunk[]> {
    await this.initialize();

    const result = await this.pool.query<PgChunkRow>(
      `SELECT source, sequence_no, content FROM document_chunks ORDER BY source ASC, sequence_no ASC`,
    );
    return result.rows.map(toChunk);
  }

  async stats(): Promise<VectorStoreStats> {
    await this.initialize();

    const result = await this.pool.query<{ source: string; count: string }>(
      `SELECT source, COUNT(*)::text AS count FROM document_chunks GROUP BY source ORDER BY source ASC`,
    );
    return {
      chunkCount: result.rows.reduce((total, row) => total + Number(row.count), 0),
      sources: result.rows.map((row) => row.source),
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function toChunk(row: PgChunkRow): Chunk {
  return {
    content: row.content,
    source: row.source,
    sequenceNo: row.sequence_no,
  };
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
