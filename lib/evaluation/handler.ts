import { z } from "zod";
import type { EvaluationClient } from "@/lib/evaluation/client";
import { ConfigurationMissingError, EvaluationError } from "@/lib/evaluation/errors";

const evaluateRequestSchema = z.object({
  // Checked on a trimmed copy; the transcript itself is forwarded verbatim.
  transcript: z.string().refine((value) => value.trim().length > 0, "Transcript is empty."),
});

export type EvaluationErrorBody = {
  error: string;
  kind: EvaluationError["kind"] | ConfigurationMissingError["kind"] | "InvalidRequest";
};

function statusFor(error: EvaluationError): number {
  return error.kind === "ModelRequestFailed" ? 502 : 422;
}

export function createEvaluationHandler(
  resolveClient: () => EvaluationClient,
): (request: Request) => Promise<Response> {
  return async function handleEvaluation(request: Request): Promise<Response> {
    let transcript: string;
    try {
      const payload: unknown = await request.json();
      transcript = evaluateRequestSchema.parse(payload).transcript;
    } catch (error) {
      const message =
        error instanceof z.ZodError
          ? error.issues.map((issue) => issue.message).join(" ")
          : "Request body must be JSON.";
      return Response.json(
        { error: message, kind: "InvalidRequest" } satisfies EvaluationErrorBody,
        { status: 400 },
      );
    }

    let client: EvaluationClient;
    try {
      client = resolveClient();
    } catch (error) {
      if (error instanceof ConfigurationMissingError) {
        return Response.json(
          { error: error.message, kind: error.kind } satisfies EvaluationErrorBody,
          { status: 500 },
        );
      }
      throw error;
    }

    try {
      const result = await client.evaluate(transcript);
      return Response.json({ result });
    } catch (error) {
      if (error instanceof EvaluationError) {
        if (error.kind === "ModelRequestFailed") {
          console.error(`[evaluations] ${client.model} request failed:`, error.cause);
        }
        return Response.json(
          { error: error.message, kind: error.kind } satisfies EvaluationErrorBody,
          { status: statusFor(error) },
        );
      }
      throw error;
    }
  };
}
