import { describeError } from "../domain/errors.js";
import { Chunk, RetrievalMode, ScoredChunk } from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { withTimeout } from "../utils/concurrency.js";
import { Logger } from "../utils/logger.js";
import { createOverlapScorer } from "../utils/text.js";
import { dotProduct, normalizeVector } from "../utils/vector.js";

export const DEFAULT_TOP_K = 5;

export type ChunkScoreFn = (chunk: Chunk) => number;

export interface ChunkScorer {
  readonly mode: RetrievalMode;
  prepare(question: string): Promise<ChunkScoreFn>;
}

export class KeywordScorer implements ChunkScorer {
  readonly mode = "lexical";

  async prepare(question: string): Promise<ChunkScoreFn> {
    const score = createOverlapScorer(question);
    return (chunk) => score(chunk.text);
  }
}

export interface EmbeddingScorerOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Cosine similarity over unit vectors. Chunk vectors are requested in one
 * batch on first use and reused for every later question of the document.
 */
export class EmbeddingScorer implements ChunkScorer {
  readonly mode = "semantic";

  private chunkVectors: Promise<number[][]> | null = null;

  constructor(
    private readonly client: EmbeddingClient,
    private readonly chunks: Chunk[],
    private readonly options: EmbeddingScorerOptions = {},
  ) {}

  async prepare(question: string): Promise<ChunkScoreFn> {
    const [chunkVectors, queryVector] = await Promise.all([
      this.loadChunkVectors(),
      this.client.embedQuery(question, { signal: this.callSignal() }),
    ]);
    const query = normalizeVector(queryVector);

    for (const vector of chunkVectors) {
      if (vector.length !== query.length) {
        throw new Error(
          `Embedding dimension mismatch (query ${query.length}, chunk ${vector.length}).`,
        );
      }
    }

    return (chunk) => {
      const vector = chunkVectors[chunk.index];
      if (!vector) {
        throw new Error(`No embedding for chunk ${chunk.index}.`);
      }
      return dotProduct(query, vector);
    };
  }

  private loadChunkVectors(): Promise<number[][]> {
    if (!this.chunkVectors) {
      this.chunkVectors = this.client
        .embedTexts(
          this.chunks.map((chunk) => chunk.text.trim()),
          "document",
          { signal: this.callSignal() },
        )
        .then((vectors) => {
          if (vectors.length !== this.chunks.length) {
            throw new Error(
              `Embedding service returned ${vectors.length} vectors for ${this.chunks.length} chunks.`,
            );
          }
          return vectors.map(normalizeVector);
        });
    }
    return this.chunkVectors;
  }

  private callSignal(): AbortSignal | undefined {
    const { signal, timeoutMs } = this.options;
    return timeoutMs === undefined ? signal : withTimeout(signal, timeoutMs);
  }
}

export function rankTopK(chunks: Chunk[], score: ChunkScoreFn, topK: number): ScoredChunk[] {
  return chunks
    .map((chunk) => ({ chunk, score: score(chunk) }))
    .sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index)
    .slice(0, Math.max(0, topK));
}

export interface RetrievalResult {
  mode: RetrievalMode;
  hits: ScoredChunk[];
}

export interface FallbackRetrieverOptions {
  topK?: number;
  logger: Logger;
}

/**
 * Tries the primary scorer and, on its first failure, switches to keyword
 * scoring for the rest of the request without retrying the primary.
 */
export class FallbackRetriever {
  private degraded = false;

  private readonly fallback = new KeywordScorer();

  constructor(
    private readonly chunks: Chunk[],
    private readonly primary: ChunkScorer | null,
    private readonly options: FallbackRetrieverOptions,
  ) {}

  get mode(): RetrievalMode {
    return this.primary && !this.degraded ? this.primary.mode : this.fallback.mode;
  }

  async retrieve(question: string): Promise<RetrievalResult> {
    const topK = this.options.topK ?? DEFAULT_TOP_K;

    if (this.primary && !this.degraded) {
      try {
        const score = await this.primary.prepare(question);
        return { mode: this.primary.mode, hits: rankTopK(this.chunks, score, topK) };
      } catch (error) {
        if (!this.degraded) {
          this.degraded = true;
          this.options.logger.warn("Embedding retrieval failed; using keyword retrieval", {
            reason: describeError(error),
          });
        }
      }
    }

    const score = await this.fallback.prepare(question);
    return { mode: this.fallback.mode, hits: rankTopK(this.chunks, score, topK) };
  }
}
