import { Server } from "node:http";
import { vi } from "vitest";
import { DEFAULT_NOT_FOUND_PHRASES } from "../src/config/env.js";
import { EmbeddingKind, PageSpan } from "../src/domain/types.js";
import { AiCallOptions, EmbeddingClient, GenerationClient } from "../src/infra/ai/types.js";
import { DocumentFetcher, FetchedDocument } from "../src/infra/fetch/documentFetcher.js";
import { TextExtractor } from "../src/infra/parsers/documentLoader.js";
import { QaSettings } from "../src/services/documentQaService.js";
import { Logger } from "../src/utils/logger.js";

export const SAMPLE_TEXT = [
  "The warranty covers manufacturing defects for two years.",
  "Claims must be filed within thirty days of discovering the defect.",
  "Accidental damage and water damage are excluded from coverage.",
  "Refunds are processed to the original payment method within ten business days.",
].join(" ");

export function createTestSettings(overrides: Partial<QaSettings> = {}): QaSettings {
  return {
    chunkSize: 12,
    chunkOverlap: 3,
    topK: 2,
    maxQuestions: 10,
    requestTimeoutMs: 2_000,
    generationTimeoutMs: 1_000,
    embeddingTimeoutMs: 100,
    questionConcurrency: 3,
    notFoundPhrases: DEFAULT_NOT_FOUND_PHRASES,
    ...overrides,
  };
}

export function createTestLogger() {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

export function createFakeFetcher(
  impl?: (url: string) => Promise<FetchedDocument>,
) {
  const fetchDocument = vi.fn(
    impl ??
      (async (url: string): Promise<FetchedDocument> => ({
        url,
        data: Buffer.from("%PDF-1.4 test"),
        contentType: "application/pdf",
        byteSize: 13,
      })),
  );
  const fetcher: DocumentFetcher = { fetchDocument };
  return { fetcher, fetchDocument };
}

export function createFakeExtractor(
  text: string = SAMPLE_TEXT,
  pages: PageSpan[] = [{ number: 1, start: 0 }],
): TextExtractor {
  return { extractText: async () => ({ text, pages }) };
}

export function questionFromPrompt(prompt: string): string {
  const match = /Question:\n([\s\S]*)\n\nAnswer:$/.exec(prompt);
  return match ? match[1] : "";
}

export function createFakeGenerator(
  answer: (question: string, options: AiCallOptions) => Promise<string>,
) {
  const generate = vi.fn((prompt: string, options: AiCallOptions = {}) =>
    answer(questionFromPrompt(prompt), options),
  );
  const generation: GenerationClient = { provider: "fake-llm", generate };
  return { generation, generate };
}

export function rejectOnAbort<T>(signal: AbortSignal | undefined): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export function createHangingEmbedder() {
  const embedTexts = vi.fn(
    (_texts: string[], _kind: EmbeddingKind, options: AiCallOptions = {}) =>
      rejectOnAbort<number[][]>(options.signal),
  );
  const embedQuery = vi.fn((_query: string, options: AiCallOptions = {}) =>
    rejectOnAbort<number[]>(options.signal),
  );
  const embedding: EmbeddingClient = { provider: "fake-embedder", embedTexts, embedQuery };
  return { embedding, embedTexts, embedQuery };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function listenOnEphemeralPort(server: Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port.");
  }
  return `http://127.0.0.1:${address.port}`;
}

export function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve())),
  );
}
