import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QueryOrchestrator } from "../services/queryOrchestrator.js";

export function registerChatQueryTool(server: McpServer, orchestrator: QueryOrchestrator) {
  server.registerTool(
    "chat_query",
    {
      title: "Chat Query",
      description:
        "Answers a visitor message the way the website chat does: canned replies, grounded answers from company documents, and quick-reply suggestions.",
      inputSchema: {
        message: z.string().min(1).describe("Visitor message or quick-reply value"),
      },
    },
    async ({ message }) => {
      const envelope = await orchestrator.query(message);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(envelope, null, 2),
          },
        ],
      };
    },
  );
}
