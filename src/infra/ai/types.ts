export interface EmbeddingClient {
  isEmbeddingConfigured(): boolean;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface CompletionClient {
  /** Single-turn completion at temperature 0. */
  generateCompletion(prompt: string): Promise<string>;
}

export interface AiClient extends EmbeddingClient, CompletionClient {}
