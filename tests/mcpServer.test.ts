import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { DocumentFetchError } from "../src/domain/errors.js";
import { FetchedDocument } from "../src/infra/fetch/documentFetcher.js";
import { createMcpServer } from "../src/mcpServer.js";
import { DocumentQaService } from "../src/services/documentQaService.js";
import {
  createFakeExtractor,
  createFakeFetcher,
  createFakeGenerator,
  createTestLogger,
  createTestSettings,
} from "./helpers.js";

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
});

const answerPayloadSchema = z.object({
  answers: z.array(z.string()),
  retrieval_mode: z.enum(["semantic", "lexical"]),
  timed_out: z.boolean(),
  latency_ms: z.number(),
});

const closers: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (closers.length > 0) {
    const close = closers.pop();
    if (close) {
      await close();
    }
  }
});

async function connect(fetchImpl?: (url: string) => Promise<FetchedDocument>) {
  const { fetcher } = createFakeFetcher(fetchImpl);
  const { generation } = createFakeGenerator(async (question) =>
    question.includes("warranty") ? "Two years." : "N/A",
  );
  const service = new DocumentQaService(
    createTestSettings(),
    { fetcher, extractor: createFakeExtractor(), embedding: null, generation },
    createTestLogger(),
  );

  const server = createMcpServer(service, "1.0.0");
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  closers.push(() => client.close(), () => server.close());
  return client;
}

describe("MCP server", () => {
  it("lists its tools", async () => {
    const client = await connect();
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "answer_document_questions",
      "health_check",
    ]);
  });

  it("answers document questions", async () => {
    const client = await connect();
    const result = toolResultSchema.parse(
      await client.callTool({
        name: "answer_document_questions",
        arguments: {
          documents: "https://files.example.test/policy.pdf",
          questions: ["How long is the warranty?", "Who pays shipping?"],
        },
      }),
    );

    expect(result.isError ?? false).toBe(false);
    const payload = answerPayloadSchema.parse(JSON.parse(result.content[0].text));
    expect(payload.answers).toEqual(["Two years.", ""]);
    expect(payload.retrieval_mode).toBe("lexical");
    expect(payload.timed_out).toBe(false);
  });

  it("reports document failures as tool errors", async () => {
    const client = await connect(async () => {
      throw new DocumentFetchError("Failed to download document (404 Not Found).");
    });
    const result = toolResultSchema.parse(
      await client.callTool({
        name: "answer_document_questions",
        arguments: { documents: "https://files.example.test/missing.pdf", questions: ["q"] },
      }),
    );

    expect(result).toEqual({
      isError: true,
      content: [{ type: "text", text: "Failed to download document (404 Not Found)." }],
    });
  });

  it("returns the health report", async () => {
    const client = await connect();
    const result = toolResultSchema.parse(
      await client.callTool({ name: "health_check", arguments: {} }),
    );

    expect(JSON.parse(result.content[0].text)).toMatchObject({
      status: "healthy",
      generation_provider: "fake-llm",
      embedding_provider: "none",
      limits: { max_questions: 10 },
    });
  });
});
