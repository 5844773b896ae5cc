import { z } from "zod";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  maxTokens: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async generateCompletion(prompt: string): Promise<string> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0,
          num_predict: this.options.maxTokens,
        },
        messages: [{ role: "user", content: prompt }],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    const content = data.message?.content?.trim() ?? "";
    if (!content) {
      throw new Error("Ollama chat returned empty content.");
    }
    return content;
  }
}
