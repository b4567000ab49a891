import { z } from "zod";
import { AiServiceError } from "../../domain/errors.js";

export const GENERATION_TEMPERATURE = 0.1;
export const GENERATION_MAX_OUTPUT_TOKENS = 200;

interface PostJsonOptions<T> {
  provider: string;
  operation: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export async function postJson<T>(
  url: string,
  body: unknown,
  { provider, operation, headers, signal, schema }: PostJsonOptions<T>,
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...headers,
      },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    throw new AiServiceError(
      `${provider} ${operation} request failed: ${error instanceof Error ? error.message : String(error)}`,
      provider,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new AiServiceError(
      `${provider} ${operation} failed (${response.status}): ${await response.text()}`,
      provider,
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new AiServiceError(`${provider} ${operation} returned invalid JSON.`, provider, {
      cause: error,
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new AiServiceError(
      `${provider} ${operation} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      provider,
    );
  }
  return parsed.data;
}

export function assertEmbeddingCount(
  provider: string,
  embeddings: number[][],
  expected: number,
): number[][] {
  if (embeddings.length !== expected) {
    throw new AiServiceError(
      `${provider} embeddings returned ${embeddings.length} vectors for ${expected} inputs.`,
      provider,
    );
  }
  if (embeddings.some((vector) => vector.length === 0)) {
    throw new AiServiceError(`${provider} embeddings returned an empty vector.`, provider);
  }
  return embeddings;
}
