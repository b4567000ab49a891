import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentQaService } from "../services/documentQaService.js";

export function registerHealthCheckTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns configured providers and request limits.",
      inputSchema: {},
    },
    async () => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(service.describeHealth(), null, 2),
        },
      ],
    }),
  );
}
