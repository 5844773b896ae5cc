import { z } from "zod";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  maxTokens: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

const EMBEDDING_BATCH_SIZE = 96;

/** Client for any OpenAI-compatible API (OpenAI, Groq, Together, vLLM...). */
export class OpenAiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      embeddings.push(...(await this.embedBatch(batch)));
    }
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([query]);
    if (!embedding) {
      throw new Error("OpenAI embeddings returned no vector.");
    }
    return embedding;
  }

  async generateCompletion(prompt: string): Promise<string> {
    const response = await fetch(`${this.baseUrl()}/chat/completions`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: 0,
        max_tokens: this.options.maxTokens,
        messages: [{ role: "user", content: prompt }],
      }),
    });

    if (!response.ok) {
      throw new Error(`Chat completion failed (${response.status}): ${await response.text()}`);
    }

    const data = chatResponseSchema.parse(await response.json());
    const content = data.choices[0]?.message.content?.trim() ?? "";
    if (!content) {
      throw new Error("Chat completion returned empty content.");
    }
    return content;
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await fetch(`${this.baseUrl()}/embeddings`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(`Embeddings failed (${response.status}): ${await response.text()}`);
    }

    const data = embeddingResponseSchema.parse(await response.json());
    if (data.data.length !== texts.length) {
      throw new Error(
        `Embeddings count mismatch (${data.data.length} for ${texts.length} inputs).`,
      );
    }
    return data.data.sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.requireApiKey()}`,
      "Content-Type": "application/json",
    };
  }

  private baseUrl(): string {
    return this.options.baseUrl.replace(/\/+$/, "");
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("An API key is required for OpenAI-compatible operations.");
    }
    return this.options.apiKey;
  }
}
