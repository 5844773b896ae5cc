import { AppConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PersistentVectorStore } from "./persistentVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export async function createVectorStore(config: AppConfig): Promise<VectorStore> {
  if (config.enablePgvector && config.databaseUrl) {
    const store = new PgVectorStore(createPostgresPool(config.databaseUrl), config.vectorDimension);
    await store.initialize();
    return store;
  }

  if (config.persistInMemoryIndex) {
    const store = new PersistentVectorStore(config.inMemoryIndexPath, {
      maxBytes: config.maxInMemoryIndexBytes,
    });
    await store.initialize();
    return store;
  }

  return new InMemoryVectorStore();
}
