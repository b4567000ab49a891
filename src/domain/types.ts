export interface PageSpan {
  /** 1-based page number in the source PDF. */
  number: number;
  /** Offset in the extracted text where the page begins. */
  start: number;
}

export interface ExtractedText {
  text: string;
  /** Ascending by `start`; pages without text are left out. */
  pages: PageSpan[];
}

export interface DocumentRecord {
  url: string;
  text: string;
  pages: PageSpan[];
  byteSize: number;
}

export interface Chunk {
  index: number;
  text: string;
  start: number;
  end: number;
  tokenStart: number;
  tokenCount: number;
  page?: number;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export type RetrievalMode = "semantic" | "lexical";

export type EmbeddingKind = "document" | "query";

export interface QaRequest {
  documents: string;
  questions: string[];
}

export interface QaResult {
  answers: string[];
  retrievalMode: RetrievalMode;
  timedOut: boolean;
  chunkCount: number;
  latencyMs: number;
}
