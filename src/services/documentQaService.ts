import { AppConfig } from "../config/env.js";
import { describeError, DocumentFetchError } from "../domain/errors.js";
import { parseQaRequest } from "../domain/qaRequest.js";
import { DocumentRecord, QaResult } from "../domain/types.js";
import { EmbeddingClient, GenerationClient } from "../infra/ai/types.js";
import { DocumentFetcher } from "../infra/fetch/documentFetcher.js";
import { TextExtractor } from "../infra/parsers/documentLoader.js";
import { buildAnswerPrompt, normalizeAnswer, NOT_FOUND_ANSWER } from "../pipelines/answering.js";
import { assertChunkingOptions, splitIntoChunks } from "../pipelines/chunking.js";
import { EmbeddingScorer, FallbackRetriever } from "../pipelines/retrieval.js";
import { mapWithConcurrency, whenAborted, withTimeout } from "../utils/concurrency.js";
import { createLogger, Logger } from "../utils/logger.js";

export type QaSettings = Pick<
  AppConfig,
  | "chunkSize"
  | "chunkOverlap"
  | "topK"
  | "maxQuestions"
  | "requestTimeoutMs"
  | "generationTimeoutMs"
  | "embeddingTimeoutMs"
  | "questionConcurrency"
  | "notFoundPhrases"
>;

export interface DocumentQaCollaborators {
  fetcher: DocumentFetcher;
  extractor: TextExtractor;
  embedding: EmbeddingClient | null;
  generation: GenerationClient;
}

export interface AnswerQuestionsOptions {
  signal?: AbortSignal;
}

export interface HealthReport {
  status: "healthy";
  generation_provider: string;
  embedding_provider: string;
  retrieval_mode: "semantic" | "lexical";
  limits: {
    max_questions: number;
    request_timeout_ms: number;
    chunk_size: number;
    chunk_overlap: number;
    top_k: number;
  };
}

export class DocumentQaService {
  constructor(
    private readonly settings: QaSettings,
    private readonly collaborators: DocumentQaCollaborators,
    private readonly logger: Logger = createLogger("qa"),
  ) {
    assertChunkingOptions(settings.chunkSize, settings.chunkOverlap);
  }

  get maxQuestions(): number {
    return this.settings.maxQuestions;
  }

  async answerQuestions(input: unknown, options: AnswerQuestionsOptions = {}): Promise<QaResult> {
    const request = parseQaRequest(input, this.settings.maxQuestions);
    const startedAt = Date.now();
    const controller = new AbortController();
    let timedOut = false;

    const abortFromCaller = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener("abort", abortFromCaller, { once: true });

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.settings.requestTimeoutMs);

    this.logger.info("QA request received", {
      questions: request.questions.length,
      document: redactDocumentUrl(request.documents),
    });

    try {
      const document = await this.loadDocument(request.documents, controller.signal);
      if (controller.signal.aborted) {
        throw new DocumentFetchError(
          timedOut
            ? "Request deadline exceeded while preparing the document."
            : "Request was cancelled while preparing the document.",
          408,
        );
      }

      const chunks = splitIntoChunks(document.text, {
        chunkSize: this.settings.chunkSize,
        overlap: this.settings.chunkOverlap,
        pages: document.pages,
      });
      this.logger.info("Document chunked", { chunks: chunks.length });

      const { embedding, generation } = this.collaborators;
      const retriever = new FallbackRetriever(
        chunks,
        embedding
          ? new EmbeddingScorer(embedding, chunks, {
              timeoutMs: this.settings.embeddingTimeoutMs,
              signal: controller.signal,
            })
          : null,
        { topK: this.settings.topK, logger: this.logger },
      );

      const answers: string[] = request.questions.map(() => NOT_FOUND_ANSWER);
      const work = mapWithConcurrency(
        request.questions,
        async (question, index) => {
          answers[index] = await this.answerOne(
            question,
            index,
            retriever,
            generation,
            controller.signal,
          );
        },
        { limit: this.settings.questionConcurrency, signal: controller.signal },
      );

      await Promise.race([work, whenAborted(controller.signal)]);
      const result: QaResult = {
        answers: [...answers],
        retrievalMode: retriever.mode,
        timedOut,
        chunkCount: chunks.length,
        latencyMs: Date.now() - startedAt,
      };

      if (timedOut) {
        this.logger.warn("Request deadline reached; unanswered questions left empty", {
          answered: result.answers.filter((answer) => answer !== NOT_FOUND_ANSWER).length,
          questions: result.answers.length,
        });
      }
      this.logger.info("QA request completed", {
        questions: result.answers.length,
        latency_ms: result.latencyMs,
        retrieval_mode: result.retrievalMode,
        timed_out: result.timedOut,
      });
      return result;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", abortFromCaller);
      controller.abort();
    }
  }

  describeHealth(): HealthReport {
    const { embedding, generation } = this.collaborators;
    return {
      status: "healthy",
      generation_provider: generation.provider,
      embedding_provider: embedding?.provider ?? "none",
      retrieval_mode: embedding ? "semantic" : "lexical",
      limits: {
        max_questions: this.settings.maxQuestions,
        request_timeout_ms: this.settings.requestTimeoutMs,
        chunk_size: this.settings.chunkSize,
        chunk_overlap: this.settings.chunkOverlap,
        top_k: this.settings.topK,
      },
    };
  }

  private async loadDocument(url: string, signal: AbortSignal): Promise<DocumentRecord> {
    const fetched = await this.collaborators.fetcher.fetchDocument(url, { signal });
    this.logger.info("Document downloaded", { bytes: fetched.byteSize });

    const { text, pages } = await this.collaborators.extractor.extractText(fetched.data);
    this.logger.info("Document text extracted", { pages: pages.length, characters: text.length });
    return { url, text, pages, byteSize: fetched.byteSize };
  }

  private async answerOne(
    question: string,
    index: number,
    retriever: FallbackRetriever,
    generation: GenerationClient,
    signal: AbortSignal,
  ): Promise<string> {
    try {
      const retrieval = await retriever.retrieve(question);
      const prompt = buildAnswerPrompt(question, retrieval.hits);
      const raw = await generation.generate(prompt, {
        signal: withTimeout(signal, this.settings.generationTimeoutMs),
      });
      return normalizeAnswer(raw, this.settings.notFoundPhrases);
    } catch (error) {
      if (!signal.aborted) {
        this.logger.warn("Answer generation failed; returning empty answer", {
          question: index + 1,
          reason: describeError(error),
        });
      }
      return NOT_FOUND_ANSWER;
    }
  }
}

/** Origin and path of a document URL, without its query or fragment. */
export function redactDocumentUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
}
