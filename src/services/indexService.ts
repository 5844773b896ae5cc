import { describeError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { KeywordIndex } from "../infra/store/keywordIndex.js";
import { ingestDirectory } from "../pipelines/ingestion.js";

export type IndexLifecycle = "uninitialized" | "rebuilding" | "populated";
export type IndexMode = "vector" | "keyword";

interface SnapshotBase {
  keywordIndex: KeywordIndex;
  chunkCount: number;
  documents: string[];
  builtAt: string;
}

/** Immutable view queries read from; replaced as a whole after each rebuild. */
export type IndexSnapshot =
  | (SnapshotBase & { mode: "vector"; store: VectorStore })
  | (SnapshotBase & { mode: "keyword" });

export interface InitializeSummary {
  mode: IndexMode;
  chunkCount: number;
  documentCount: number;
  documents: string[];
}

export interface IndexStatus {
  lifecycle: IndexLifecycle;
  mode: IndexMode | null;
  chunkCount: number;
  documentCount: number;
  documents: string[];
  builtAt: string | null;
}

export interface IndexServiceOptions {
  embeddings: EmbeddingClient;
  vectorStore: VectorStore;
  documentsDir: string;
  chunkSize: number;
  chunkOverlap: number;
}

export class IndexService {
  private snapshot: IndexSnapshot | null = null;

  private pendingRebuilds = 0;

  private rebuildChain: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: IndexServiceOptions) {}

  getSnapshot(): IndexSnapshot | null {
    return this.snapshot;
  }

  getLifecycle(): IndexLifecycle {
    if (this.pendingRebuilds > 0) {
      return "rebuilding";
    }
    return this.snapshot ? "populated" : "uninitialized";
  }

  getStatus(): IndexStatus {
    const snapshot = this.snapshot;
    return {
      lifecycle: this.getLifecycle(),
      mode: snapshot?.mode ?? null,
      chunkCount: snapshot?.chunkCount ?? 0,
      documentCount: snapshot?.documents.length ?? 0,
      documents: snapshot ? [...snapshot.documents] : [],
      builtAt: snapshot?.builtAt ?? null,
    };
  }

  /**
   * Discards the current index and rebuilds it from the document directory.
   * Rebuilds run one at a time; the previous snapshot keeps serving queries until the
   * new one is complete. Rejects with `IngestionError` when the directory is unusable.
   */
  initializeDocuments(): Promise<InitializeSummary> {
    return this.enqueue(() => this.rebuild());
  }

  /**
   * Startup path: reuses a persisted vector store when it already holds chunks,
   * otherwise attempts a full rebuild. Failures are logged and leave the index
   * uninitialized.
   */
  async restoreOrInitialize(): Promise<IndexStatus> {
    try {
      const restored = await this.enqueue(() => this.restoreFromStore());
      if (!restored) {
        await this.initializeDocuments();
      }
    } catch (error) {
      console.error(`[index] startup indexing failed: ${describeError(error)}`);
    }
    return this.getStatus();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pendingRebuilds += 1;
    const run = async () => {
      try {
        return await task();
      } finally {
        this.pendingRebuilds -= 1;
      }
    };
    const next = this.rebuildChain.then(run, run);
    this.rebuildChain = next;
    return next;
  }

  private async restoreFromStore(): Promise<boolean> {
    if (!this.options.embeddings.isEmbeddingConfigured()) {
      return false;
    }

    const stats = await this.options.vectorStore.stats();
    if (stats.chunkCount === 0) {
      return false;
    }

    const chunks = await this.options.vectorStore.listChunks();
    this.snapshot = {
      mode: "vector",
      store: this.options.vectorStore,
      ...describeChunks(chunks),
    };
    console.error(
      `[index] restored ${chunks.length} chunks from ${stats.sources.length} documents in the vector store`,
    );
    return true;
  }

  private async rebuild(): Promise<InitializeSummary> {
    const { documentsDir, chunkSize, chunkOverlap } = this.options;
    const { chunks } = await ingestDirectory(documentsDir, { chunkSize, chunkOverlap });

    const base = describeChunks(chunks);
    let next: IndexSnapshot = { mode: "keyword", ...base };

    if (this.options.embeddings.isEmbeddingConfigured()) {
      try {
        await this.storeEmbeddings(chunks);
        next = { mode: "vector", store: this.options.vectorStore, ...base };
      } catch (error) {
        console.error(
          `[index] vector indexing failed, serving keyword fallback: ${describeError(error)}`,
        );
      }
    }

    this.snapshot = next;
    console.error(
      `[index] indexed ${next.chunkCount} chunks from ${next.documents.length} documents (${next.mode})`,
    );

    return {
      mode: next.mode,
      chunkCount: next.chunkCount,
      documentCount: next.documents.length,
      documents: [...next.documents],
    };
  }

  private async storeEmbeddings(chunks: Chunk[]): Promise<void> {
    const embeddings = await this.options.embeddings.embedTexts(
      chunks.map((chunk) => chunk.content),
    );
    if (embeddings.length !== chunks.length) {
      throw new Error(
        `Embedding count mismatch (${embeddings.length} vectors for ${chunks.length} chunks).`,
      );
    }

    await this.options.vectorStore.replaceAll(
      chunks.map((chunk, index) => ({ ...chunk, embedding: embeddings[index] })),
    );
  }
}

function describeChunks(chunks: Chunk[]): SnapshotBase {
  const documents: string[] = [];
  for (const chunk of chunks) {
    if (!documents.includes(chunk.source)) {
      documents.push(chunk.source);
    }
  }
  return {
    keywordIndex: new KeywordIndex(chunks),
    chunkCount: chunks.length,
    documents,
    builtAt: new Date().toISOString(),
  };
}
