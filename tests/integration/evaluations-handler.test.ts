import { afterEach, describe, expect, it, vi } from "vitest";
import { EvaluationClient } from "@/lib/evaluation/client";
import { ConfigurationMissingError } from "@/lib/evaluation/errors";
import { createEvaluationHandler } from "@/lib/evaluation/handler";
import type { ModelAdapter } from "@/lib/models/types";

function clientReturning(text: string | Error): EvaluationClient {
  const adapter: ModelAdapter = {
    completeText: vi.fn(async () => {
      if (text instanceof Error) {
        throw text;
      }
      return {
        text,
        usage: { inputTokens: 0, outputTokens: 0 },
        latencyMs: 1,
        provider: "gemini" as const,
        model: "gemini-2.5-flash",
      };
    }),
  };

  return new EvaluationClient({
    adapter,
    config: { provider: "gemini", model: "gemini-2.5-flash", apiKey: "test-secret" },
  });
}

function post(body: unknown): Request {
  return new Request("http://localhost/api/evaluations", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

const ROUND_TRIP =
  'Sure! {"criteria_scores":{"accuracy":4,"empathy_and_tone":3,"clarity":5,"actionability":4,"escalation_awareness":2},"overall_score":18,"coaching_summary":"Be more proactive about escalation.","suggested_1on1_questions":["What blocked escalation?"]} Hope this helps!';

afterEach(() => {
  vi.restoreAllMocks();
});

describe("POST /api/evaluations", () => {
  it("returns the validated result", async () => {
    const handler = createEvaluationHandler(() => clientReturning(ROUND_TRIP));

    const res = await handler(post({ transcript: "Customer: help\nAgent: on it" }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      result: {
        criteria_scores: {
          accuracy: 4,
          empathy_and_tone: 3,
          clarity: 5,
          actionability: 4,
          escalation_awareness: 2,
        },
        overall_score: 18,
        coaching_summary: "Be more proactive about escalation.",
        suggested_1on1_questions: ["What blocked escalation?"],
      },
    });
  });

  it("returns 422 with the raw output when no JSON is found", async () => {
    const handler = createEvaluationHandler(() => clientReturning("No scores today."));

    const res = await handler(post({ transcript: "t" }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "Model did not return JSON.\nRaw output:\nNo scores today.",
      kind: "NoJsonFound",
    });
  });

  it("returns 422 for a criteria mismatch", async () => {
    const raw = JSON.stringify({
      criteria_scores: { accuracy: 4, empathy_and_tone: 3, clarity: 5, actionability: 4 },
      overall_score: 16,
    });
    const handler = createEvaluationHandler(() => clientReturning(raw));

    const res = await handler(post({ transcript: "t" }));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ kind: "CriteriaMismatch" });
  });

  it("returns 502 when the model call fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const handler = createEvaluationHandler(() => clientReturning(new Error("socket hang up")));

    const res = await handler(post({ transcript: "t" }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "Model request failed: socket hang up",
      kind: "ModelRequestFailed",
    });
  });

  it("returns 500 when the credential is missing", async () => {
    const handler = createEvaluationHandler(() => {
      throw new ConfigurationMissingError("Missing GEMINI_API_KEY.");
    });

    const res = await handler(post({ transcript: "t" }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Missing GEMINI_API_KEY.",
      kind: "ConfigurationMissing",
    });
  });

  it("rejects a blank transcript before calling the model", async () => {
    const resolveClient = vi.fn(() => clientReturning(ROUND_TRIP));
    const handler = createEvaluationHandler(resolveClient);

    const res = await handler(post({ transcript: "   " }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Transcript is empty.", kind: "InvalidRequest" });
    expect(resolveClient).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON", async () => {
    const handler = createEvaluationHandler(() => clientReturning(ROUND_TRIP));

    const res = await handler(post("transcript=hello"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be JSON.", kind: "InvalidRequest" });
  });
});
