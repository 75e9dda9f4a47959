import { describe, expect, it, vi } from "vitest";
import { EvaluationClient } from "@/lib/evaluation/client";
import { ModelRequestFailedError, NoJsonFoundError } from "@/lib/evaluation/errors";
import { buildEvaluationPrompt } from "@/lib/evaluation/prompt";
import { QA_CRITERIA } from "@/lib/evaluation/rubric";
import type { ModelAdapter, ModelConfig, TextCompletionResponse } from "@/lib/models/types";

const config: ModelConfig = {
  provider: "gemini",
  model: "gemini-2.5-flash",
  apiKey: "test-secret",
};

function completion(text: string): TextCompletionResponse {
  return {
    text,
    usage: { inputTokens: 0, outputTokens: 0 },
    latencyMs: 1,
    provider: "gemini",
    model: config.model,
  };
}

function fakeAdapter(impl: ModelAdapter["completeText"]) {
  const completeText = vi.fn(impl);
  const adapter: ModelAdapter = { completeText };
  return { adapter, completeText };
}

const VALID_JSON = JSON.stringify({
  criteria_scores: {
    accuracy: 5,
    empathy_and_tone: 5,
    clarity: 4,
    actionability: 4,
    escalation_awareness: 3,
  },
  overall_score: 21,
  coaching_summary: "Confirm the fix with the customer before closing.",
  suggested_1on1_questions: [],
});

describe("EvaluationClient.evaluate", () => {
  it("sends the composed prompt as a single user message", async () => {
    const { adapter, completeText } = fakeAdapter(async () => completion(VALID_JSON));
    const client = new EvaluationClient({ adapter, config });

    await client.evaluate("Customer: hi\nAgent: hello");

    expect(completeText).toHaveBeenCalledTimes(1);
    expect(completeText).toHaveBeenCalledWith({
      config,
      messages: [{ role: "user", content: buildEvaluationPrompt("Customer: hi\nAgent: hello") }],
    });
  });

  it("returns a result whose criteria keys equal the rubric", async () => {
    const { adapter } = fakeAdapter(async () => completion(`\`\`\`json\n${VALID_JSON}\n\`\`\``));
    const client = new EvaluationClient({ adapter, config });

    const result = await client.evaluate("transcript");

    expect(Object.keys(result.criteria_scores).sort()).toEqual([...QA_CRITERIA].sort());
    expect(result.overall_score).toBe(21);
    expect(result.suggested_1on1_questions).toEqual([]);
  });

  it("reports an empty completion as NoJsonFound", async () => {
    const { adapter } = fakeAdapter(async () => completion(""));
    const client = new EvaluationClient({ adapter, config });

    await expect(client.evaluate("transcript")).rejects.toBeInstanceOf(NoJsonFoundError);
  });

  it("wraps transport failures without retrying", async () => {
    const { adapter, completeText } = fakeAdapter(async () => {
      throw new Error("Model call failed with status 503");
    });
    const client = new EvaluationClient({ adapter, config });

    const error = await client.evaluate("transcript").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelRequestFailedError);
    expect((error as Error).message).toBe("Model request failed: Model call failed with status 503");
    expect(completeText).toHaveBeenCalledTimes(1);
  });

  it("uses the configured extraction strategy", async () => {
    const raw = `${VALID_JSON}\nFor reference the schema was {"criteria_scores": {...}}`;
    const greedy = new EvaluationClient({ adapter: fakeAdapter(async () => completion(raw)).adapter, config });
    const balanced = new EvaluationClient({
      adapter: fakeAdapter(async () => completion(raw)).adapter,
      config,
      extractionStrategy: "balanced",
    });

    await expect(greedy.evaluate("t")).rejects.toMatchObject({ kind: "MalformedJson" });
    await expect(balanced.evaluate("t")).resolves.toMatchObject({ overall_score: 21 });
  });
});
