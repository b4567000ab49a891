import { timingSafeEqual } from "node:crypto";
import { IncomingMessage, ServerResponse } from "node:http";
import { DocumentQaError } from "../domain/errors.js";
import { DocumentQaService } from "../services/documentQaService.js";
import { createLogger, Logger } from "../utils/logger.js";

export const SERVICE_NAME = "pdf-qa-service";
export const SERVICE_VERSION = "1.0.0";
export const RUN_PATH = "/hackrx/run";

const MAX_JSON_BODY_BYTES = 1024 * 1024;

export interface HttpAppOptions {
  service: DocumentQaService;
  apiAuthToken: string;
  maxDocumentBytes: number;
  version: string;
  logger?: Logger;
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    readonly headers: Record<string, string> = {},
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function createRequestHandler(options: HttpAppOptions): RequestHandler {
  const logger = options.logger ?? createLogger("http");

  const routes: Record<string, Partial<Record<string, RequestHandler>>> = {
    "/": {
      GET: async (_req, res) =>
        writeJson(res, 200, {
          message: "PDF question-answering service",
          version: options.version,
          endpoints: {
            run: `POST ${RUN_PATH}`,
            health: "GET /health",
            status: "GET /status",
          },
        }),
    },
    "/health": {
      GET: async (_req, res) => {
        const report = options.service.describeHealth();
        writeJson(res, 200, {
          ...report,
          limits: { ...report.limits, max_document_bytes: options.maxDocumentBytes },
        });
      },
    },
    "/status": {
      GET: async (_req, res) =>
        writeJson(res, 200, {
          status: "running",
          service: SERVICE_NAME,
          version: options.version,
        }),
    },
    [RUN_PATH]: {
      POST: async (req, res) => {
        assertBearerToken(req, options.apiAuthToken);
        const body = await readJsonBody(req);

        const controller = new AbortController();
        res.on("close", () => {
          if (!res.writableEnded) {
            controller.abort();
          }
        });

        const result = await options.service.answerQuestions(body, {
          signal: controller.signal,
        });
        writeJson(res, 200, { answers: result.answers });
      },
    },
  };

  return async (req, res) => {
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    try {
      const route = routes[url.pathname];
      if (!route) {
        throw new HttpError(404, "Not found");
      }
      const handler = route[method];
      if (!handler) {
        throw new HttpError(405, "Method not allowed", { Allow: Object.keys(route).join(", ") });
      }
      await handler(req, res);
    } catch (error) {
      writeError(res, error, logger);
    } finally {
      logger.info(`${method} ${url.pathname} ${res.statusCode}`, {
        latency_ms: Date.now() - startedAt,
      });
    }
  };
}

function assertBearerToken(req: IncomingMessage, expected: string) {
  const challenge = { "WWW-Authenticate": "Bearer" };
  const header = req.headers.authorization;
  if (!header) {
    throw new HttpError(401, "Authorization token is required", challenge);
  }

  const match = /^Bearer\s+(.+)$/i.exec(header);
  if (!match) {
    throw new HttpError(401, "Authorization header must use the Bearer scheme", challenge);
  }

  const provided = Buffer.from(match[1].trim());
  const wanted = Buffer.from(expected);
  if (provided.length !== wanted.length || !timingSafeEqual(provided, wanted)) {
    throw new HttpError(401, "Invalid authorization token", challenge);
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buffer.length;
    if (total > MAX_JSON_BODY_BYTES) {
      throw new HttpError(413, "Request body is too large");
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
}

function writeError(res: ServerResponse, error: unknown, logger: Logger) {
  if (res.headersSent) {
    res.end();
    return;
  }

  if (error instanceof HttpError) {
    writeJson(res, error.statusCode, { error: error.message }, error.headers);
    return;
  }

  if (error instanceof DocumentQaError) {
    if (error.statusCode >= 500) {
      logger.error("Request failed", { code: error.code, reason: error.message });
      writeJson(res, error.statusCode, { error: "Internal server error", code: error.code });
      return;
    }
    writeJson(res, error.statusCode, { error: error.message, code: error.code });
    return;
  }

  logger.error("Unexpected error while handling request", {
    reason: error instanceof Error ? error.message : String(error),
  });
  writeJson(res, 500, {
    error: "Internal server error occurred while processing the request",
  });
}

function writeJson(
  res: ServerResponse,
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {},
) {
  res.writeHead(statusCode, { "Content-Type": "application/json", ...headers });
  res.end(JSON.stringify(body));
}
