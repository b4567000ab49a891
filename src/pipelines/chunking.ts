import { ConfigurationError } from "../domain/errors.js";
import { Chunk, PageSpan } from "../domain/types.js";
import { findTokenSpans } from "../utils/text.js";

export const DEFAULT_CHUNK_SIZE = 400;
export const DEFAULT_CHUNK_OVERLAP = 100;

export interface ChunkingOptions {
  chunkSize?: number;
  overlap?: number;
  /** When given, each chunk is tagged with the page its first token is on. */
  pages?: PageSpan[];
}

export function assertChunkingOptions(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer (got ${chunkSize}).`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer (got ${overlap}).`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `Chunk overlap (${overlap}) must be smaller than chunk size (${chunkSize}).`,
    );
  }
}

/**
 * Splits text into windows of `chunkSize` whitespace-delimited tokens where
 * neighbours share exactly `overlap` tokens. Chunks tile the input: the first
 * starts at offset 0, each one ends where the token after its last token
 * begins, and the final one ends at `text.length`.
 */
export function splitIntoChunks(text: string, options: ChunkingOptions = {}): Chunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
  assertChunkingOptions(chunkSize, overlap);

  const spans = findTokenSpans(text);
  const pages = options.pages ?? [];
  const withPage = (chunk: Chunk): Chunk => {
    const page = pageAt(pages, spans[chunk.tokenStart]?.start ?? chunk.start);
    return page === undefined ? chunk : { ...chunk, page };
  };

  if (spans.length <= chunkSize) {
    return [
      withPage({
        index: 0,
        text,
        start: 0,
        end: text.length,
        tokenStart: 0,
        tokenCount: spans.length,
      }),
    ];
  }

  const stride = chunkSize - overlap;
  const chunks: Chunk[] = [];

  for (let first = 0; ; first += stride) {
    const last = Math.min(first + chunkSize, spans.length) - 1;
    const isFinal = last === spans.length - 1;
    const start = first === 0 ? 0 : spans[first].start;
    const end = isFinal ? text.length : spans[last + 1].start;

    chunks.push(
      withPage({
        index: chunks.length,
        text: text.slice(start, end),
        start,
        end,
        tokenStart: first,
        tokenCount: last - first + 1,
      }),
    );

    if (isFinal) {
      break;
    }
  }

  return chunks;
}

function pageAt(pages: PageSpan[], offset: number): number | undefined {
  let page: number | undefined;
  for (const span of pages) {
    if (span.start > offset) {
      break;
    }
    page = span.number;
  }
  return page ?? pages[0]?.number;
}

export function mergeChunks(chunks: Chunk[]): string {
  let merged = "";
  let previousEnd = 0;

  for (const chunk of chunks) {
    const skip = Math.max(0, previousEnd - chunk.start);
    merged += chunk.text.slice(skip);
    previousEnd = chunk.end;
  }

  return merged;
}
