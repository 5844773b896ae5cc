import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { VectorStoreStats } from "../../domain/vectorStore.js";
import { EmbeddedChunk } from "../../domain/types.js";
import { cloneChunks, InMemoryVectorStore } from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;

const persistedIndexSchema = z.object({
  format_version: z.literal(CURRENT_FORMAT_VERSION),
  saved_at: z.string(),
  chunks: z.array(
    z.object({
      content: z.string(),
      source: z.string(),
      sequenceNo: z.number().int().min(0),
      embedding: z.array(z.number()),
    }),
  ),
});

type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export interface PersistentVectorStoreOptions {
  maxBytes: number;
}

/**
 * In-memory cosine store mirrored to a JSON file, so a restart can reuse the last
 * embedded chunk set without calling the embedding service again.
 */
export class PersistentVectorStore extends InMemoryVectorStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentVectorStoreOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      const parsed = persistedIndexSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        throw new Error(`Invalid vector index file format: ${this.absolutePath}`, {
          cause: parsed.error,
        });
      }
      this.chunks = parsed.data.chunks;
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  /** The new set is served only after the file on disk holds it. */
  async replaceAll(chunks: EmbeddedChunk[]): Promise<VectorStoreStats> {
    await this.initialize();
    const next = cloneChunks(chunks);
    await this.enqueueWrite(() => this.persistNow(next));
    this.chunks = next;
    return this.computeStats();
  }

  async stats(): Promise<VectorStoreStats> {
    await this.initialize();
    return super.stats();
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(chunks: readonly EmbeddedChunk[]): Promise<void> {
    const payload: PersistedIndex = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      chunks: [...chunks],
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Vector index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await fs.rename(tempPath, this.absolutePath);
  }
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
