import { DocumentFetchError, isAbortError } from "../../domain/errors.js";

const PDF_MAGIC = Buffer.from("%PDF-", "latin1");
const GENERIC_CONTENT_TYPES = new Set(["", "application/octet-stream", "binary/octet-stream"]);
const USER_AGENT = "pdf-qa-service/1.0";

export interface FetchedDocument {
  url: string;
  data: Buffer;
  contentType: string;
  byteSize: number;
}

export interface FetchDocumentOptions {
  signal?: AbortSignal;
}

export interface DocumentFetcher {
  fetchDocument(url: string, options?: FetchDocumentOptions): Promise<FetchedDocument>;
}

export interface HttpDocumentFetcherOptions {
  maxBytes: number;
}

export class HttpDocumentFetcher implements DocumentFetcher {
  constructor(private readonly options: HttpDocumentFetcherOptions) {}

  async fetchDocument(
    url: string,
    { signal }: FetchDocumentOptions = {},
  ): Promise<FetchedDocument> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": USER_AGENT, Accept: "application/pdf,*/*" },
        redirect: "follow",
        signal,
      });
    } catch (error) {
      throw toFetchError(error, url);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new DocumentFetchError(
        `Failed to download document (${response.status} ${response.statusText}).`,
      );
    }

    const contentType = parseContentType(response.headers.get("content-type"));
    if (!contentType.includes("pdf") && !GENERIC_CONTENT_TYPES.has(contentType)) {
      await response.body?.cancel();
      throw new DocumentFetchError(
        `Document must be a PDF (received content type "${contentType}").`,
        415,
      );
    }

    const declaredLength = Number(response.headers.get("content-length") ?? "");
    if (Number.isFinite(declaredLength) && declaredLength > this.options.maxBytes) {
      await response.body?.cancel();
      throw this.tooLargeError(declaredLength);
    }

    const data = await this.readBody(response, url);
    if (!data.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) {
      throw new DocumentFetchError("Downloaded content is not a PDF document.", 415);
    }

    return {
      url,
      data,
      contentType: contentType || "application/pdf",
      byteSize: data.length,
    };
  }

  private async readBody(response: Response, url: string): Promise<Buffer> {
    if (!response.body) {
      throw new DocumentFetchError("Document response has an empty body.");
    }

    const reader = response.body.getReader();
    const parts: Buffer[] = [];
    let total = 0;

    try {
      while (true) {
        const { value, done } = await reader.read();
        if (done) {
          break;
        }
        total += value.byteLength;
        if (total > this.options.maxBytes) {
          throw this.tooLargeError(total);
        }
        parts.push(Buffer.from(value));
      }
    } catch (error) {
      await reader.cancel().catch(() => undefined);
      if (error instanceof DocumentFetchError) {
        throw error;
      }
      throw toFetchError(error, url);
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(parts, total);
  }

  private tooLargeError(bytes: number): DocumentFetchError {
    return new DocumentFetchError(
      `Document is too large (${bytes} bytes, limit ${this.options.maxBytes}).`,
      413,
    );
  }
}

function parseContentType(header: string | null): string {
  return (header ?? "").split(";")[0].trim().toLowerCase();
}

function toFetchError(error: unknown, url: string): DocumentFetchError {
  if (isAbortError(error)) {
    return new DocumentFetchError("Document download was aborted before completion.", 408, {
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new DocumentFetchError(`Document URL is unreachable (${url}): ${reason}`, 400, {
    cause: error,
  });
}
