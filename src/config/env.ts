import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

export const DEFAULT_NOT_FOUND_PHRASES = [
  "not found",
  "not found in document",
  "not found in the document",
  "n/a",
  "none",
  "not available",
  "not mentioned",
  '""',
] as const;

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z
  .object({
    API_AUTH_TOKEN: z.string().trim().min(1, "API_AUTH_TOKEN is required."),
    SERVER_TRANSPORT: z.enum(["http", "stdio"]).default("http"),
    HOST: z.string().default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
    GENERATION_PROVIDER: z.enum(["gemini", "openai", "ollama"]).optional(),
    EMBEDDING_PROVIDER: z.enum(["none", "gemini", "openai", "ollama"]).optional(),
    GEMINI_API_KEY: optionalSecret,
    GEMINI_CHAT_MODEL: z.string().default("gemini-2.5-flash"),
    GEMINI_EMBEDDING_MODEL: z.string().default("text-embedding-004"),
    GEMINI_THINKING_BUDGET: z.coerce.number().int().min(0).optional(),
    OPENAI_API_KEY: optionalSecret,
    OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
    OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
    OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
    CHUNK_SIZE: positiveInt(400),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(100),
    TOP_K: positiveInt(5),
    MAX_QUESTIONS: positiveInt(10),
    MAX_DOCUMENT_BYTES: positiveInt(50 * 1024 * 1024),
    REQUEST_TIMEOUT_MS: positiveInt(30_000),
    GENERATION_TIMEOUT_MS: positiveInt(15_000),
    EMBEDDING_TIMEOUT_MS: positiveInt(10_000),
    QUESTION_CONCURRENCY: positiveInt(3),
    NOT_FOUND_PHRASES: z.string().optional(),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE.",
    path: ["CHUNK_OVERLAP"],
  });

export type GenerationProvider = "gemini" | "openai" | "ollama";
export type EmbeddingProvider = "none" | GenerationProvider;

export interface AppConfig {
  readonly apiAuthToken: string;
  readonly transport: "http" | "stdio";
  readonly host: string;
  readonly port: number;
  readonly generationProvider: GenerationProvider;
  readonly embeddingProvider: EmbeddingProvider;
  readonly geminiApiKey: string | null;
  readonly geminiChatModel: string;
  readonly geminiEmbeddingModel: string;
  /** Token budget for Gemini thinking; null leaves the model default. */
  readonly geminiThinkingBudget: number | null;
  readonly openaiApiKey: string | null;
  readonly openaiChatModel: string;
  readonly openaiEmbeddingModel: string;
  readonly ollamaBaseUrl: string;
  readonly ollamaChatModel: string;
  readonly ollamaEmbeddingModel: string;
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly topK: number;
  readonly maxQuestions: number;
  readonly maxDocumentBytes: number;
  readonly requestTimeoutMs: number;
  readonly generationTimeoutMs: number;
  readonly embeddingTimeoutMs: number;
  readonly questionConcurrency: number;
  readonly notFoundPhrases: readonly string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration. ${details}`);
  }
  const parsed = result.data;

  const generationProvider =
    parsed.GENERATION_PROVIDER ??
    (parsed.GEMINI_API_KEY ? "gemini" : parsed.OPENAI_API_KEY ? "openai" : "ollama");

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? defaultEmbeddingProvider(generationProvider, parsed);

  assertProviderKey("GENERATION_PROVIDER", generationProvider, parsed);
  assertProviderKey("EMBEDDING_PROVIDER", embeddingProvider, parsed);

  return Object.freeze({
    apiAuthToken: parsed.API_AUTH_TOKEN,
    transport: parsed.SERVER_TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
    generationProvider,
    embeddingProvider,
    geminiApiKey: parsed.GEMINI_API_KEY ?? null,
    geminiChatModel: parsed.GEMINI_CHAT_MODEL,
    geminiEmbeddingModel: parsed.GEMINI_EMBEDDING_MODEL,
    geminiThinkingBudget:
      parsed.GEMINI_THINKING_BUDGET ?? defaultThinkingBudget(parsed.GEMINI_CHAT_MODEL),
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    topK: parsed.TOP_K,
    maxQuestions: parsed.MAX_QUESTIONS,
    maxDocumentBytes: parsed.MAX_DOCUMENT_BYTES,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    questionConcurrency: parsed.QUESTION_CONCURRENCY,
    notFoundPhrases: Object.freeze(parseNotFoundPhrases(parsed.NOT_FOUND_PHRASES)),
  });
}

function defaultEmbeddingProvider(
  generationProvider: GenerationProvider,
  parsed: { GEMINI_API_KEY?: string; OPENAI_API_KEY?: string },
): EmbeddingProvider {
  if (generationProvider === "gemini" && parsed.GEMINI_API_KEY) {
    return "gemini";
  }
  if (generationProvider === "openai" && parsed.OPENAI_API_KEY) {
    return "openai";
  }
  return "none";
}

// Flash models accept a zero budget; Pro models reject it.
function defaultThinkingBudget(chatModel: string): number | null {
  return chatModel.startsWith("gemini-2.5-flash") ? 0 : null;
}

function assertProviderKey(
  variable: string,
  provider: EmbeddingProvider,
  parsed: { GEMINI_API_KEY?: string; OPENAI_API_KEY?: string },
) {
  if (provider === "gemini" && !parsed.GEMINI_API_KEY) {
    throw new ConfigurationError(`${variable}=gemini requires GEMINI_API_KEY.`);
  }
  if (provider === "openai" && !parsed.OPENAI_API_KEY) {
    throw new ConfigurationError(`${variable}=openai requires OPENAI_API_KEY.`);
  }
}

function parseNotFoundPhrases(raw: string | undefined): string[] {
  if (!raw || !raw.trim()) {
    return [...DEFAULT_NOT_FOUND_PHRASES];
  }
  return raw
    .split(",")
    .map((phrase) => phrase.trim().toLowerCase())
    .filter((phrase) => phrase.length > 0);
}
