import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { DocumentQaService } from "../services/documentQaService.js";

export function registerAnswerDocumentQuestionsTool(
  server: McpServer,
  service: DocumentQaService,
) {
  server.registerTool(
    "answer_document_questions",
    {
      title: "Answer Document Questions",
      description:
        "Downloads a PDF and answers each question from its content. An empty answer means the document does not contain it.",
      inputSchema: {
        documents: z.string().url().describe("Public URL of the PDF document"),
        questions: z
          .array(z.string().min(1))
          .min(1)
          .max(service.maxQuestions)
          .describe("Questions to answer, in order"),
      },
    },
    async ({ documents, questions }) => {
      try {
        const result = await service.answerQuestions({ documents, questions });
        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(
                {
                  answers: result.answers,
                  retrieval_mode: result.retrievalMode,
                  timed_out: result.timedOut,
                  latency_ms: result.latencyMs,
                },
                null,
                2,
              ),
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [{ type: "text", text: describeError(error) }],
        };
      }
    },
  );
}
