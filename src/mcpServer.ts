import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SERVICE_NAME } from "./http/routes.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { registerAnswerDocumentQuestionsTool } from "./tools/answerDocumentQuestions.js";
import { registerHealthCheckTool } from "./tools/healthCheck.js";

export function createMcpServer(service: DocumentQaService, version: string): McpServer {
  const server = new McpServer({
    name: SERVICE_NAME,
    version,
  });

  registerHealthCheckTool(server, service);
  registerAnswerDocumentQuestionsTool(server, service);

  return server;
}
