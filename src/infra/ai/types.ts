import { EmbeddingKind } from "../../domain/types.js";

export interface AiCallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingClient {
  readonly provider: string;
  embedTexts(texts: string[], kind: EmbeddingKind, options?: AiCallOptions): Promise<number[][]>;
  embedQuery(query: string, options?: AiCallOptions): Promise<number[]>;
}

export interface GenerationClient {
  readonly provider: string;
  generate(prompt: string, options?: AiCallOptions): Promise<string>;
}
