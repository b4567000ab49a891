import { z } from "zod";
import { EmbeddingKind } from "../../domain/types.js";
import {
  assertEmbeddingCount,
  GENERATION_MAX_OUTPUT_TOKENS,
  GENERATION_TEMPERATURE,
  postJson,
} from "./http.js";
import { AiCallOptions, EmbeddingClient, GenerationClient } from "./types.js";

const OPENAI_BASE_URL = "https://api.openai.com/v1";
const PROVIDER = "openai";

interface OpenAiClientOptions {
  apiKey: string;
  embeddingModel: string;
  chatModel: string;
  baseUrl?: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
    }),
  ),
});

export class OpenAiClient implements EmbeddingClient, GenerationClient {
  readonly provider = PROVIDER;

  constructor(private readonly options: OpenAiClientOptions) {}

  // OpenAI embedding models are symmetric, so the kind is not sent.
  async embedTexts(
    texts: string[],
    _kind: EmbeddingKind,
    { signal }: AiCallOptions = {},
  ): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = await postJson(
      `${this.baseUrl}/embeddings`,
      {
        model: this.options.embeddingModel,
        input: texts,
      },
      {
        provider: PROVIDER,
        operation: "embeddings",
        headers: this.authHeaders(),
        signal,
        schema: embeddingResponseSchema,
      },
    );

    const embeddings = [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
    return assertEmbeddingCount(PROVIDER, embeddings, texts.length);
  }

  async embedQuery(query: string, options?: AiCallOptions): Promise<number[]> {
    const [embedding] = await this.embedTexts([query], "query", options);
    return embedding;
  }

  async generate(prompt: string, { signal }: AiCallOptions = {}): Promise<string> {
    const data = await postJson(
      `${this.baseUrl}/chat/completions`,
      {
        model: this.options.chatModel,
        temperature: GENERATION_TEMPERATURE,
        max_tokens: GENERATION_MAX_OUTPUT_TOKENS,
        messages: [{ role: "user", content: prompt }],
      },
      {
        provider: PROVIDER,
        operation: "chat",
        headers: this.authHeaders(),
        signal,
        schema: chatResponseSchema,
      },
    );

    return data.choices[0]?.message.content?.trim() ?? "";
  }

  private get baseUrl(): string {
    return this.options.baseUrl ?? OPENAI_BASE_URL;
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
