import { DEFAULT_NOT_FOUND_PHRASES } from "../config/env.js";
import { ScoredChunk } from "../domain/types.js";

export const NOT_FOUND_ANSWER = "";

const PROMPT_PREAMBLE = [
  "Answer the question using only the provided context.",
  "If the answer is not in the context, reply with an empty string.",
  "Do not add any explanations, citations, or additional information.",
  "Provide only the direct answer.",
].join("\n");

export function buildAnswerPrompt(question: string, hits: ScoredChunk[]): string {
  const context = hits
    .map((hit, idx) => {
      const label = hit.chunk.page === undefined ? "" : ` [Page ${hit.chunk.page}]`;
      return `[${idx + 1}]${label} ${hit.chunk.text.trim()}`;
    })
    .join("\n\n");

  return `${PROMPT_PREAMBLE}\n\nContext:\n${context}\n\nQuestion:\n${question}\n\nAnswer:`;
}

export function normalizeAnswer(
  raw: string,
  notFoundPhrases: readonly string[] = DEFAULT_NOT_FOUND_PHRASES,
): string {
  const trimmed = raw.trim();
  const key = trimmed.toLowerCase().replace(/[.!]+$/, "").trim();
  if (!key || notFoundPhrases.includes(key)) {
    return NOT_FOUND_ANSWER;
  }
  return trimmed;
}
