import { z } from "zod";
import { RequestValidationError } from "./errors.js";
import { QaRequest } from "./types.js";

export function createQaRequestSchema(maxQuestions: number) {
  return z.object({
    documents: z
      .string({ required_error: "documents is required" })
      .trim()
      .url("documents must be a valid URL")
      .refine((value) => /^https?:\/\//i.test(value), "documents must be an http(s) URL"),
    questions: z
      .array(z.string().trim().min(1, "Questions cannot be empty"), {
        required_error: "questions is required",
      })
      .min(1, "At least one question is required")
      .max(maxQuestions, `Maximum ${maxQuestions} questions allowed`),
  });
}

export function parseQaRequest(input: unknown, maxQuestions: number): QaRequest {
  const result = createQaRequestSchema(maxQuestions).safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new RequestValidationError(details);
  }
  return result.data;
}
