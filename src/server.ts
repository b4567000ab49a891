#!/usr/bin/env node
import { createServer } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { AppConfig, loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createRequestHandler, RUN_PATH, SERVICE_VERSION } from "./http/routes.js";
import { createAiClients } from "./infra/ai/defaultAiClient.js";
import { HttpDocumentFetcher } from "./infra/fetch/documentFetcher.js";
import { PdfTextExtractor } from "./infra/parsers/documentLoader.js";
import { createMcpServer } from "./mcpServer.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  const { embedding, generation } = createAiClients(config);
  const service = new DocumentQaService(config, {
    fetcher: new HttpDocumentFetcher({ maxBytes: config.maxDocumentBytes }),
    extractor: new PdfTextExtractor(),
    embedding,
    generation,
  });

  logger.info("Service configured", {
    generation_provider: generation.provider,
    embedding_provider: embedding?.provider ?? "none",
    transport: config.transport,
  });

  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    shutdownTasks.push(await runHttpServer(config, service));
    logger.info(`HTTP server listening on http://${config.host}:${config.port}${RUN_PATH}`);
  } else {
    const server = createMcpServer(service, SERVICE_VERSION);
    await server.connect(new StdioServerTransport());
    shutdownTasks.push(() => server.close());
    logger.info("MCP server connected on stdio");
  }

  const shutdown = async () => {
    logger.info("Shutting down");
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error("Shutdown failed", { reason: describeError(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function runHttpServer(
  config: AppConfig,
  service: DocumentQaService,
): Promise<() => Promise<void>> {
  const httpServer = createServer(
    createRequestHandler({
      service,
      apiAuthToken: config.apiAuthToken,
      maxDocumentBytes: config.maxDocumentBytes,
      version: SERVICE_VERSION,
    }),
  );

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, config.host, () => resolve());
  });

  return async () => {
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

main().catch((error) => {
  logger.error("Failed to start server", {
    reason: describeError(error),
  });
  process.exit(1);
});
