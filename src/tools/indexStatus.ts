import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { IndexService } from "../services/indexService.js";

export function registerIndexStatusTool(server: McpServer, indexService: IndexService) {
  server.registerTool(
    "index_status",
    {
      title: "Index Status",
      description: "Reports whether documents are indexed, and in vector or keyword mode.",
      inputSchema: {},
    },
    async () => {
      const status = indexService.getStatus();
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(status, null, 2),
          },
        ],
      };
    },
  );
}
