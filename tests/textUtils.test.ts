import { describe, expect, it } from "vitest";
import {
  cleanExtractedText,
  createOverlapScorer,
  findTokenSpans,
  tokenize,
} from "../src/utils/text.js";

describe("text utils", () => {
  it("tokenizes into lowercase unique words without punctuation", () => {
    expect(tokenize("Is the Sky blue? The sky!")).toEqual(["is", "the", "sky", "blue"]);
  });

  it("tokenizes unicode letters and digits", () => {
    expect(tokenize("Café 2024 naïve")).toEqual(["café", "2024", "naïve"]);
  });

  it("scores shared tokens relative to the query size", () => {
    const score = createOverlapScorer("What color is the grass?");
    expect(score("The sky is blue. Grass")).toBe(0.6);
    expect(score("blue. Grass is green.")).toBe(0.4);
  });

  it("scores zero for empty queries or targets", () => {
    expect(createOverlapScorer("")("anything at all")).toBe(0);
    expect(createOverlapScorer("?!")("anything at all")).toBe(0);
    expect(createOverlapScorer("question")("")).toBe(0);
  });

  it("finds whitespace-delimited token spans", () => {
    expect(findTokenSpans(" ab  c\nd ")).toEqual([
      { start: 1, end: 3 },
      { start: 5, end: 6 },
      { start: 7, end: 8 },
    ]);
  });

  it("cleans control characters and repeated spaces from extracted text", () => {
    expect(cleanExtractedText("  Page\u0000one   text\r\nnext\uFFFDline\t\tend  ")).toBe(
      "Page one text\nnext line end",
    );
  });
});
