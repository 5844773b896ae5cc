import { AnswerProvider, AppConfig, EmbeddingProvider } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AiClient } from "./types.js";

export class DefaultAiClient implements AiClient {
  private readonly completionApi: OpenAiClient;

  private readonly embeddingApi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly embeddingProvider: EmbeddingProvider;

  private readonly answerProvider: AnswerProvider;

  constructor(config: AppConfig) {
    this.completionApi = new OpenAiClient({
      apiKey: config.llmApiKey,
      baseUrl: config.llmBaseUrl,
      chatModel: config.llmChatModel,
      embeddingModel: config.embeddingModel,
      maxTokens: config.llmMaxTokens,
    });
    this.embeddingApi = new OpenAiClient({
      apiKey: config.embeddingApiKey,
      baseUrl: config.embeddingBaseUrl,
      chatModel: config.llmChatModel,
      embeddingModel: config.embeddingModel,
      maxTokens: config.llmMaxTokens,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      maxTokens: config.llmMaxTokens,
    });
    this.embeddingProvider = config.embeddingProvider;
    this.answerProvider = config.answerProvider;
  }

  isEmbeddingConfigured(): boolean {
    if (this.embeddingProvider === "none") {
      return false;
    }
    if (this.embeddingProvider === "openai") {
      return this.embeddingApi.isConfigured();
    }
    return true;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0 || this.embeddingProvider === "none") {
      return [];
    }
    if (this.embeddingProvider === "openai") {
      return this.embeddingApi.embedTexts(texts);
    }
    return this.ollama.embedTexts(texts);
  }

  async embedQuery(query: string): Promise<number[]> {
    if (this.embeddingProvider === "none") {
      throw new Error("Embedding provider is disabled.");
    }
    if (this.embeddingProvider === "openai") {
      return this.embeddingApi.embedQuery(query);
    }
    return this.ollama.embedQuery(query);
  }

  async generateCompletion(prompt: string): Promise<string> {
    if (this.answerProvider === "ollama") {
      return this.ollama.generateCompletion(prompt);
    }
    return this.completionApi.generateCompletion(prompt);
  }
}
