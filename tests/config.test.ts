import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ConfigurationError } from "../src/domain/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ LLM_API_KEY: "test-secret" });

    expect(config).toMatchObject({
      answerProvider: "openai",
      llmApiKey: "test-secret",
      llmBaseUrl: "https://api.groq.com/openai/v1",
      llmChatModel: "llama-3.1-8b-instant",
      embeddingProvider: "none",
      enablePgvector: false,
      persistInMemoryIndex: true,
      documentsDir: "documents",
      chunkSize: 1000,
      chunkOverlap: 200,
      companyName: "Acme AI",
      transport: "http",
      port: 5000,
      corsOrigin: "*",
    });
    expect(config.mail).toEqual({
      smtpServer: "smtp.gmail.com",
      smtpPort: 587,
      senderEmail: null,
      senderPassword: null,
      recipientEmail: null,
    });
  });

  it("requires an API key for the hosted answer provider", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({ LLM_API_KEY: "  " })).toThrow("requires LLM_API_KEY");
  });

  it("allows a local answer provider without a key", () => {
    expect(loadConfig({ ANSWER_PROVIDER: "ollama" }).answerProvider).toBe("ollama");
  });

  it("enables OpenAI-compatible embeddings when an embedding key is set", () => {
    const config = loadConfig({ LLM_API_KEY: "test-secret", EMBEDDING_API_KEY: "test-secret" });
    expect(config.embeddingProvider).toBe("openai");
  });

  it("rejects pgvector without a database URL or embeddings", () => {
    expect(() =>
      loadConfig({ LLM_API_KEY: "test-secret", ENABLE_PGVECTOR: "true" }),
    ).toThrow("requires DATABASE_URL");
    expect(() =>
      loadConfig({
        LLM_API_KEY: "test-secret",
        ENABLE_PGVECTOR: "true",
        DATABASE_URL: "postgres://localhost/test",
      }),
    ).toThrow("requires an embedding provider");
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() =>
      loadConfig({ LLM_API_KEY: "test-secret", CHUNK_SIZE: "300", CHUNK_OVERLAP: "300" }),
    ).toThrow("CHUNK_OVERLAP (300) must be smaller than CHUNK_SIZE (300).");
  });

  it("names the invalid variable", () => {
    expect(() => loadConfig({ LLM_API_KEY: "test-secret", PORT: "abc" })).toThrow(
      /Invalid environment variable PORT/,
    );
  });

  it("resolves email provider defaults", () => {
    const config = loadConfig({
      LLM_API_KEY: "test-secret",
      EMAIL_PROVIDER: "Outlook",
      SMTP_PORT: "not-a-port",
      SENDER_EMAIL: "bot@example.com",
      SENDER_PASSWORD: "abcd efgh ijkl",
      COMPANY_EMAIL: "sales@example.com",
    });

    expect(config.mail).toEqual({
      smtpServer: "smtp.office365.com",
      smtpPort: 587,
      senderEmail: "bot@example.com",
      senderPassword: "abcdefghijkl",
      recipientEmail: "sales@example.com",
    });
  });

  it("prefers explicit SMTP settings", () => {
    const config = loadConfig({
      LLM_API_KEY: "test-secret",
      SMTP_SERVER: "mail.example.com",
      SMTP_PORT: "465",
    });

    expect(config.mail.smtpServer).toBe("mail.example.com");
    expect(config.mail.smtpPort).toBe(465);
  });
});
