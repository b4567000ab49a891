declare module "pdf-parse/lib/pdf-parse.js" {
  namespace pdfParse {
    export interface PdfTextItem {
      str: string;
      transform: number[];
    }

    export interface PdfPageData {
      pageIndex: number;
      getTextContent(options?: {
        normalizeWhitespace?: boolean;
        disableCombineTextItems?: boolean;
      }): Promise<{ items: PdfTextItem[] }>;
    }

    export interface PdfParseOptions {
      pagerender?: (pageData: PdfPageData) => Promise<string>;
      max?: number;
    }

    export interface PdfParseResult {
      numpages: number;
      text: string;
    }
  }

  function pdfParse(
    dataBuffer: Buffer,
    options?: pdfParse.PdfParseOptions,
  ): Promise<pdfParse.PdfParseResult>;

  export = pdfParse;
}
