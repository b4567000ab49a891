const WORD_REGEX = /[\p{L}\p{N}]+/gu;
const WHITESPACE_TOKEN_REGEX = /\S+/g;

export interface TokenSpan {
  start: number;
  end: number;
}

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

export function cleanExtractedText(text: string): string {
  return normalizeText(text.replace(/[\u0000\uFFFD]/g, " ")).replace(/ {2,}/g, " ");
}

export function tokenize(text: string): string[] {
  return [...new Set(text.toLowerCase().match(WORD_REGEX) ?? [])];
}

export function findTokenSpans(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  for (const match of text.matchAll(WHITESPACE_TOKEN_REGEX)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

/**
 * Share of the query's words that appear in a target. The query is tokenized
 * once and the returned function scores any number of targets.
 */
export function createOverlapScorer(query: string): (target: string) => number {
  const queryTokens = tokenize(query);
  return (target) => {
    if (queryTokens.length === 0) {
      return 0;
    }

    const targetTokens = new Set(tokenize(target));
    if (targetTokens.size === 0) {
      return 0;
    }

    let overlap = 0;
    for (const token of queryTokens) {
      if (targetTokens.has(token)) {
        overlap += 1;
      }
    }

    return overlap / queryTokens.length;
  };
}
