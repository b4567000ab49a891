import type {
  PdfPageData,
  PdfParseOptions,
  PdfParseResult,
} from "pdf-parse/lib/pdf-parse.js";
import { describeError, DocumentExtractionError } from "../../domain/errors.js";
import { ExtractedText, PageSpan } from "../../domain/types.js";
import { cleanExtractedText } from "../../utils/text.js";

type PdfParse = (data: Buffer, options?: PdfParseOptions) => Promise<PdfParseResult>;

const PAGE_SEPARATOR = "\n\n";

export interface TextExtractor {
  extractText(data: Buffer): Promise<ExtractedText>;
}

export class PdfTextExtractor implements TextExtractor {
  private parserPromise: Promise<PdfParse> | null = null;

  async extractText(data: Buffer): Promise<ExtractedText> {
    const parse = await this.loadParser();

    // Indexed by page; pages pdf-parse failed to render stay holes.
    const pageTexts: string[] = [];
    try {
      await parse(data, {
        pagerender: async (pageData) => {
          const text = await renderPage(pageData);
          pageTexts[pageData.pageIndex] = text;
          return text;
        },
      });
    } catch (error) {
      throw new DocumentExtractionError(
        `Failed to extract text from PDF: ${describeError(error)}`,
        { cause: error },
      );
    }

    const extracted = joinPages(pageTexts);
    if (!extracted.text) {
      throw new DocumentExtractionError("No text could be extracted from the PDF.");
    }
    return extracted;
  }

  // The package root runs a self-test when loaded without a parent module, so
  // the parser is imported from its lib entry.
  private loadParser(): Promise<PdfParse> {
    if (!this.parserPromise) {
      this.parserPromise = import("pdf-parse/lib/pdf-parse.js").then(
        (mod) => mod.default,
        (error: unknown) => {
          this.parserPromise = null;
          throw new DocumentExtractionError(
            `PDF parsing is unavailable: ${describeError(error)}`,
            { cause: error },
          );
        },
      );
    }
    return this.parserPromise;
  }
}

async function renderPage(pageData: PdfPageData): Promise<string> {
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let text = "";
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/** Keeps non-empty pages, numbered from 1, separated by a blank line. */
export function joinPages(pageTexts: string[]): ExtractedText {
  const pages: PageSpan[] = [];
  let text = "";

  pageTexts.forEach((raw, index) => {
    const cleaned = cleanExtractedText(raw);
    if (!cleaned) {
      return;
    }
    if (text) {
      text += PAGE_SEPARATOR;
    }
    pages.push({ number: index + 1, start: text.length });
    text += cleaned;
  });

  return { text, pages };
}
