import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describeError } from "../domain/errors.js";
import { IndexService } from "../services/indexService.js";

export function registerInitializeDocumentsTool(server: McpServer, indexService: IndexService) {
  server.registerTool(
    "initialize_documents",
    {
      title: "Initialize Documents",
      description: "Rebuilds the document index from the configured documents directory.",
      inputSchema: {},
    },
    async () => {
      try {
        const summary = await indexService.initializeDocuments();
        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(
                {
                  message: "Documents initialized successfully",
                  chunk_count: summary.chunkCount,
                  document_count: summary.documentCount,
                  documents: summary.documents,
                  mode: summary.mode,
                },
                null,
                2,
              ),
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: `Failed to initialize documents: ${describeError(error)}`,
            },
          ],
        };
      }
    },
  );
}
