import { z } from "zod";
import { EmbeddingKind } from "../../domain/types.js";
import {
  assertEmbeddingCount,
  GENERATION_MAX_OUTPUT_TOKENS,
  GENERATION_TEMPERATURE,
  postJson,
} from "./http.js";
import { AiCallOptions, EmbeddingClient, GenerationClient } from "./types.js";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
const PROVIDER = "gemini";
const MAX_EMBEDDING_BATCH = 100;

interface GeminiClientOptions {
  apiKey: string;
  chatModel: string;
  embeddingModel: string;
  thinkingBudget?: number | null;
  baseUrl?: string;
}

const batchEmbedResponseSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

export class GeminiClient implements EmbeddingClient, GenerationClient {
  readonly provider = PROVIDER;

  constructor(private readonly options: GeminiClientOptions) {}

  async embedTexts(
    texts: string[],
    kind: EmbeddingKind,
    { signal }: AiCallOptions = {},
  ): Promise<number[][]> {
    const embeddings: number[][] = [];
    const model = `models/${this.options.embeddingModel}`;
    const taskType = kind === "query" ? "RETRIEVAL_QUERY" : "RETRIEVAL_DOCUMENT";

    for (let offset = 0; offset < texts.length; offset += MAX_EMBEDDING_BATCH) {
      const batch = texts.slice(offset, offset + MAX_EMBEDDING_BATCH);
      const data = await postJson(
        `${this.baseUrl}/${model}:batchEmbedContents`,
        {
          requests: batch.map((text) => ({
            model,
            content: { parts: [{ text }] },
            taskType,
          })),
        },
        {
          provider: PROVIDER,
          operation: "embeddings",
          headers: this.authHeaders(),
          signal,
          schema: batchEmbedResponseSchema,
        },
      );
      const vectors = assertEmbeddingCount(
        PROVIDER,
        data.embeddings.map((item) => item.values),
        batch.length,
      );
      embeddings.push(...vectors);
    }

    return embeddings;
  }

  async embedQuery(query: string, options?: AiCallOptions): Promise<number[]> {
    const [embedding] = await this.embedTexts([query], "query", options);
    return embedding;
  }

  async generate(prompt: string, { signal }: AiCallOptions = {}): Promise<string> {
    const data = await postJson(
      `${this.baseUrl}/models/${this.options.chatModel}:generateContent`,
      {
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: GENERATION_TEMPERATURE,
          maxOutputTokens: GENERATION_MAX_OUTPUT_TOKENS,
          ...this.thinkingConfig(),
        },
      },
      {
        provider: PROVIDER,
        operation: "generateContent",
        headers: this.authHeaders(),
        signal,
        schema: generateResponseSchema,
      },
    );

    const parts = data.candidates?.[0]?.content?.parts ?? [];
    return parts
      .map((part) => part.text ?? "")
      .join("")
      .trim();
  }

  private get baseUrl(): string {
    return this.options.baseUrl ?? GEMINI_BASE_URL;
  }

  private thinkingConfig() {
    const { thinkingBudget } = this.options;
    return thinkingBudget === undefined || thinkingBudget === null
      ? {}
      : { thinkingConfig: { thinkingBudget } };
  }

  private authHeaders(): Record<string, string> {
    return { "x-goog-api-key": this.options.apiKey };
  }
}
