import { z } from "zod";
import { AiServiceError } from "../../domain/errors.js";
import { EmbeddingKind } from "../../domain/types.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { GENERATION_MAX_OUTPUT_TOKENS, GENERATION_TEMPERATURE, postJson } from "./http.js";
import { AiCallOptions, EmbeddingClient, GenerationClient } from "./types.js";

const PROVIDER = "ollama";
const EMBEDDING_CONCURRENCY = 4;

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

export class OllamaClient implements EmbeddingClient, GenerationClient {
  readonly provider = PROVIDER;

  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(
    texts: string[],
    _kind: EmbeddingKind,
    options: AiCallOptions = {},
  ): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings = await mapWithConcurrency(
      texts,
      (text, _index, signal) => this.embedQuery(text, { signal }),
      { limit: EMBEDDING_CONCURRENCY, signal: options.signal },
    );
    options.signal?.throwIfAborted();
    return embeddings;
  }

  async embedQuery(query: string, { signal }: AiCallOptions = {}): Promise<number[]> {
    const data = await postJson(
      `${this.options.baseUrl}/api/embeddings`,
      {
        model: this.options.embeddingModel,
        prompt: query,
      },
      {
        provider: PROVIDER,
        operation: "embeddings",
        signal,
        schema: embeddingsResponseSchema,
      },
    );

    if (!data.embedding || data.embedding.length === 0) {
      throw new AiServiceError("Ollama embeddings returned empty vector.", PROVIDER);
    }
    return data.embedding;
  }

  async generate(prompt: string, { signal }: AiCallOptions = {}): Promise<string> {
    const data = await postJson(
      `${this.options.baseUrl}/api/chat`,
      {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: GENERATION_TEMPERATURE,
          num_predict: GENERATION_MAX_OUTPUT_TOKENS,
        },
        messages: [{ role: "user", content: prompt }],
      },
      {
        provider: PROVIDER,
        operation: "chat",
        signal,
        schema: chatResponseSchema,
      },
    );

    return data.message?.content?.trim() ?? "";
  }
}
