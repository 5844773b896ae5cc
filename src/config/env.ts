import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const booleanFlag = z.enum(["true", "false"]);

const envSchema = z.object({
  ANSWER_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  LLM_CHAT_MODEL: z.string().default("llama-3.1-8b-instant"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: booleanFlag.optional(),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  PERSIST_INMEMORY_INDEX: booleanFlag.default("true"),
  INMEMORY_INDEX_PATH: z.string().default(".data/vector-index.json"),
  MAX_INMEMORY_INDEX_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
  DOCUMENTS_DIR: z.string().default("documents"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  COMPANY_NAME: z.string().min(1).default("Acme AI"),
  TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(5000),
  CORS_ORIGIN: z.string().default("*"),
  EMAIL_PROVIDER: z.string().default(""),
  SMTP_SERVER: z.string().default(""),
  SMTP_PORT: z.string().default(""),
  SENDER_EMAIL: z.string().optional(),
  SENDER_PASSWORD: z.string().optional(),
  COMPANY_EMAIL: z.string().optional(),
});

export type AnswerProvider = "openai" | "ollama";
export type EmbeddingProvider = "none" | "openai" | "ollama";

export interface AppConfig {
  answerProvider: AnswerProvider;
  llmApiKey: string | null;
  llmBaseUrl: string;
  llmChatModel: string;
  llmMaxTokens: number;
  embeddingProvider: EmbeddingProvider;
  embeddingApiKey: string | null;
  embeddingBaseUrl: string;
  embeddingModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  enablePgvector: boolean;
  databaseUrl: string | null;
  vectorDimension: number;
  persistInMemoryIndex: boolean;
  inMemoryIndexPath: string;
  maxInMemoryIndexBytes: number;
  documentsDir: string;
  chunkSize: number;
  chunkOverlap: number;
  companyName: string;
  transport: "http" | "stdio";
  host: string;
  port: number;
  corsOrigin: string;
  mail: MailConfig;
}

export interface MailConfig {
  smtpServer: string;
  smtpPort: number;
  senderEmail: string | null;
  senderPassword: string | null;
  recipientEmail: string | null;
}

const EMAIL_PROVIDER_DEFAULTS: Record<string, { server: string; port: number }> = {
  gmail: { server: "smtp.gmail.com", port: 587 },
  google: { server: "smtp.gmail.com", port: 587 },
  microsoft: { server: "smtp.office365.com", port: 587 },
  outlook: { server: "smtp.office365.com", port: 587 },
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid environment variable ${issue?.path.join(".") ?? "(unknown)"}: ${issue?.message ?? "invalid value"}`,
      { cause: result.error },
    );
  }
  const parsed = result.data;

  const llmApiKey = blankToNull(parsed.LLM_API_KEY);
  if (parsed.ANSWER_PROVIDER === "openai" && !llmApiKey) {
    throw new ConfigurationError("ANSWER_PROVIDER=openai requires LLM_API_KEY.");
  }

  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";
  const databaseUrl = blankToNull(parsed.DATABASE_URL);
  if (enablePgvector && !databaseUrl) {
    throw new ConfigurationError("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const embeddingApiKey = blankToNull(parsed.EMBEDDING_API_KEY);
  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (embeddingApiKey ? "openai" : "none");

  if (enablePgvector && embeddingProvider === "none") {
    throw new ConfigurationError(
      "ENABLE_PGVECTOR=true requires an embedding provider to create vectors.",
    );
  }

  return {
    answerProvider: parsed.ANSWER_PROVIDER,
    llmApiKey,
    llmBaseUrl: parsed.LLM_BASE_URL,
    llmChatModel: parsed.LLM_CHAT_MODEL,
    llmMaxTokens: parsed.LLM_MAX_TOKENS,
    embeddingProvider,
    embeddingApiKey,
    embeddingBaseUrl: parsed.EMBEDDING_BASE_URL,
    embeddingModel: parsed.EMBEDDING_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    enablePgvector,
    databaseUrl,
    vectorDimension: parsed.VECTOR_DIMENSION,
    persistInMemoryIndex: parsed.PERSIST_INMEMORY_INDEX === "true",
    inMemoryIndexPath: parsed.INMEMORY_INDEX_PATH,
    maxInMemoryIndexBytes: parsed.MAX_INMEMORY_INDEX_BYTES,
    documentsDir: parsed.DOCUMENTS_DIR,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    companyName: parsed.COMPANY_NAME,
    transport: parsed.TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    mail: resolveMailConfig(parsed),
  };
}

function resolveMailConfig(parsed: z.infer<typeof envSchema>): MailConfig {
  const provider = parsed.EMAIL_PROVIDER.trim().toLowerCase();
  const defaults = EMAIL_PROVIDER_DEFAULTS[provider] ?? EMAIL_PROVIDER_DEFAULTS.gmail;

  const smtpServer = parsed.SMTP_SERVER.trim() || defaults.server;
  const rawPort = parsed.SMTP_PORT.trim();
  const smtpPort = rawPort ? Number.parseInt(rawPort, 10) : defaults.port;

  // Providers show app passwords in space-separated groups.
  const senderPassword = blankToNull(parsed.SENDER_PASSWORD)?.replace(/\s+/g, "") ?? null;

  return {
    smtpServer,
    smtpPort: Number.isFinite(smtpPort) && smtpPort > 0 ? smtpPort : 587,
    senderEmail: blankToNull(parsed.SENDER_EMAIL),
    senderPassword: senderPassword || null,
    recipientEmail: blankToNull(parsed.COMPANY_EMAIL),
  };
}

function blankToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
