import { AppConfig, GenerationProvider } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { GeminiClient } from "./geminiClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingClient, GenerationClient } from "./types.js";

type ProviderClient = EmbeddingClient & GenerationClient;

export interface AiClients {
  embedding: EmbeddingClient | null;
  generation: GenerationClient;
}

export function createAiClients(config: AppConfig): AiClients {
  return {
    embedding:
      config.embeddingProvider === "none"
        ? null
        : createProviderClient(config.embeddingProvider, config),
    generation: createProviderClient(config.generationProvider, config),
  };
}

function createProviderClient(
  provider: GenerationProvider,
  config: AppConfig,
): ProviderClient {
  switch (provider) {
    case "gemini":
      return new GeminiClient({
        apiKey: requireKey(config.geminiApiKey, "GEMINI_API_KEY"),
        chatModel: config.geminiChatModel,
        embeddingModel: config.geminiEmbeddingModel,
        thinkingBudget: config.geminiThinkingBudget,
      });
    case "openai":
      return new OpenAiClient({
        apiKey: requireKey(config.openaiApiKey, "OPENAI_API_KEY"),
        chatModel: config.openaiChatModel,
        embeddingModel: config.openaiEmbeddingModel,
      });
    case "ollama":
      return new OllamaClient({
        baseUrl: config.ollamaBaseUrl,
        chatModel: config.ollamaChatModel,
        embeddingModel: config.ollamaEmbeddingModel,
      });
  }
}

function requireKey(value: string | null, variable: string): string {
  if (!value) {
    throw new ConfigurationError(`${variable} is required for the selected provider.`);
  }
  return value;
}
