import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import "dotenv/config";
import { AppConfig, loadConfig } from "./config/env.js";
import { createCopyDeck } from "./domain/copyDeck.js";
import { describeError } from "./domain/errors.js";
import { ApiDependencies, handleApiRequest, isApiPath } from "./http/apiRoutes.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { SmtpMailer } from "./infra/mail/smtpMailer.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { buildIntentRules } from "./pipelines/intentClassifier.js";
import { IndexService } from "./services/indexService.js";
import { LeadRelayService } from "./services/leadRelayService.js";
import { QueryOrchestrator } from "./services/queryOrchestrator.js";
import { ResponseComposer } from "./services/responseComposer.js";
import { registerChatQueryTool } from "./tools/chatQuery.js";
import { registerIndexStatusTool } from "./tools/indexStatus.js";
import { registerInitializeDocumentsTool } from "./tools/initializeDocuments.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

const MCP_PATH = "/mcp";
const SERVER_NAME = "chat-concierge";
const SERVER_VERSION = "0.1.0";

async function main() {
  const config = loadConfig();
  const aiClient = new DefaultAiClient(config);
  const vectorStore = await createVectorStore(config);

  const indexService = new IndexService({
    embeddings: aiClient,
    vectorStore,
    documentsDir: config.documentsDir,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
  });
  const orchestrator = new QueryOrchestrator({
    indexService,
    composer: new ResponseComposer(aiClient, createCopyDeck(config.companyName)),
    rules: buildIntentRules({ companyName: config.companyName }),
  });
  const leadRelay = new LeadRelayService(new SmtpMailer(config.mail), config.companyName);
  const deps: ApiDependencies = { orchestrator, indexService, leadRelay };

  const shutdownTasks: Array<() => Promise<void>> = [() => vectorStore.close()];

  const status = await indexService.restoreOrInitialize();
  console.error(
    `[server] index ${status.lifecycle}${status.mode ? ` (${status.mode}, ${status.chunkCount} chunks)` : ""}`,
  );

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(config, deps, () => createMcpServer(deps));
    shutdownTasks.unshift(stopHttpServer);
    console.error(
      `[server] listening on http://${config.host}:${config.port} (REST /api, MCP ${MCP_PATH})`,
    );
  } else {
    await runStdioServer(createMcpServer(deps));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error(`[server] shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

function createMcpServer(deps: ApiDependencies): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerChatQueryTool(server, deps.orchestrator);
  registerInitializeDocumentsTool(server, deps.indexService);
  registerIndexStatusTool(server, deps.indexService);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

async function runHttpServer(
  config: AppConfig,
  deps: ApiDependencies,
  serverFactory: () => McpServer,
): Promise<() => Promise<void>> {
  const sessions: SessionMap = {};

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (isApiPath(url.pathname)) {
        const rawBody = req.method === "GET" || req.method === "OPTIONS" ? "" : await readBody(req);
        const result = await handleApiRequest(
          { method: req.method ?? "GET", pathname: url.pathname, rawBody },
          deps,
        );
        writeJson(res, result.status, result.body, config.corsOrigin);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        writeJson(res, 404, { error: "Not found" }, config.corsOrigin);
        return;
      }

      if (req.method === "POST") {
        const body = parseMcpBody(await readBody(req));
        await handleMcpPost(req, res, body, sessions, serverFactory);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res, sessions);
        return;
      }

      writeJson(res, 405, { error: "Method not allowed" }, config.corsOrigin);
    } catch (error) {
      console.error(`[server] request failed: ${describeError(error)}`);
      if (!res.headersSent) {
        writeJson(res, 500, { error: "Internal server error" }, config.corsOrigin);
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(config.port, config.host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    entry.server.close().catch((error: unknown) => {
      console.error(`[server] failed to close MCP session: ${describeError(error)}`);
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  const entry = sessionId ? sessions[sessionId] : undefined;
  if (!entry) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await entry.transport.handleRequest(req, res);
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function parseMcpBody(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    return {};
  }
  try {
    return JSON.parse(trimmed);
  } catch (error) {
    throw new Error("Invalid JSON body", { cause: error });
  }
}

function writeJson(res: ServerResponse, status: number, body: unknown, corsOrigin: string) {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": corsOrigin,
    "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  });
  res.end(status === 204 ? undefined : JSON.stringify(body));
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}

main().catch((error) => {
  console.error("[server] failed to start:", error);
  process.exit(1);
});
