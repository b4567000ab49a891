import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/domain/errors.js";
import { mergeChunks, splitIntoChunks } from "../src/pipelines/chunking.js";

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(" ");
}

function tokensOf(text: string): string[] {
  return text.trim().split(/\s+/);
}

describe("chunking pipeline", () => {
  it("tags each chunk with the page its first token is on", () => {
    const text = "a b\n\nc d e";
    const paged = splitIntoChunks(text, {
      chunkSize: 2,
      overlap: 0,
      pages: [
        { number: 1, start: 0 },
        { number: 2, start: 5 },
      ],
    });

    expect(paged.map((chunk) => chunk.page)).toEqual([1, 2, 2]);
    expect(splitIntoChunks(text, { chunkSize: 2, overlap: 0 }).some((chunk) => "page" in chunk)).toBe(
      false,
    );
  });

  it("splits a short sentence pair with the requested overlap", () => {
    const chunks = splitIntoChunks("The sky is blue. Grass is green.", {
      chunkSize: 5,
      overlap: 2,
    });

    expect(chunks.map((chunk) => chunk.text.trim())).toEqual([
      "The sky is blue. Grass",
      "blue. Grass is green.",
    ]);
    expect(chunks.map((chunk) => chunk.start)).toEqual([0, 11]);
    expect(chunks.map((chunk) => chunk.tokenCount)).toEqual([5, 4]);
  });

  it("shares exactly `overlap` tokens between neighbours and shortens the last chunk", () => {
    const chunks = splitIntoChunks(words(23), { chunkSize: 10, overlap: 3 });

    expect(chunks).toHaveLength(3);
    expect(chunks.map((chunk) => chunk.tokenStart)).toEqual([0, 7, 14]);
    expect(chunks.map((chunk) => chunk.tokenCount)).toEqual([10, 10, 9]);

    for (let i = 1; i < chunks.length; i += 1) {
      const previous = tokensOf(chunks[i - 1].text);
      const current = tokensOf(chunks[i].text);
      expect(current.slice(0, 3)).toEqual(previous.slice(-3));
    }
    expect(tokensOf(chunks[2].text).at(-1)).toBe("w22");
  });

  it("reconstructs the original text exactly after trimming overlaps", () => {
    const text = "  Alpha beta\n\ngamma\tdelta  epsilon zeta eta\ttheta iota kappa  ";
    const settings = [
      { chunkSize: 3, overlap: 1 },
      { chunkSize: 3, overlap: 0 },
      { chunkSize: 4, overlap: 3 },
      { chunkSize: 1, overlap: 0 },
    ];

    for (const options of settings) {
      const chunks = splitIntoChunks(text, options);
      expect(chunks.length).toBeGreaterThan(1);
      expect(mergeChunks(chunks)).toBe(text);
      for (const chunk of chunks) {
        expect(text.slice(chunk.start, chunk.end)).toBe(chunk.text);
      }
    }
  });

  it("returns a single chunk equal to the document when it fits", () => {
    const text = "Only a few words here.";
    const chunks = splitIntoChunks(text, { chunkSize: 400, overlap: 100 });

    expect(chunks).toEqual([
      { index: 0, text, start: 0, end: text.length, tokenStart: 0, tokenCount: 5 },
    ]);
  });

  it("keeps an empty document as one empty chunk", () => {
    const chunks = splitIntoChunks("");
    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe("");
    expect(mergeChunks(chunks)).toBe("");
  });

  it("is deterministic for identical input", () => {
    const first = splitIntoChunks(words(50), { chunkSize: 8, overlap: 2 });
    const second = splitIntoChunks(words(50), { chunkSize: 8, overlap: 2 });
    expect(second).toEqual(first);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => splitIntoChunks(words(10), { chunkSize: 5, overlap: 5 })).toThrow(
      ConfigurationError,
    );
    expect(() => splitIntoChunks(words(10), { chunkSize: 5, overlap: 8 })).toThrow(
      "Chunk overlap (8) must be smaller than chunk size (5).",
    );
  });

  it("rejects non-positive chunk sizes and negative overlaps", () => {
    expect(() => splitIntoChunks("a b", { chunkSize: 0, overlap: 0 })).toThrow(ConfigurationError);
    expect(() => splitIntoChunks("a b", { chunkSize: 4, overlap: -1 })).toThrow(
      ConfigurationError,
    );
  });
});
