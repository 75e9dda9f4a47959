import { buildModelConfig, getEnv } from "@/lib/config/env";
import { ModelRequestFailedError } from "@/lib/evaluation/errors";
import { buildEvaluationPrompt } from "@/lib/evaluation/prompt";
import { parseEvaluationResponse, type ExtractionStrategy } from "@/lib/evaluation/response-parser";
import type { EvaluationResult } from "@/lib/evaluation/rubric";
import { createGeminiAdapter } from "@/lib/models/providers/gemini";
import type { ModelAdapter, ModelConfig } from "@/lib/models/types";

export interface EvaluationClientOptions {
  adapter: ModelAdapter;
  config: ModelConfig;
  extractionStrategy?: ExtractionStrategy;
}

export class EvaluationClient {
  private readonly adapter: ModelAdapter;
  private readonly config: ModelConfig;
  private readonly extractionStrategy: ExtractionStrategy;

  constructor(options: EvaluationClientOptions) {
    this.adapter = options.adapter;
    this.config = options.config;
    this.extractionStrategy = options.extractionStrategy ?? "greedy";
  }

  get model(): string {
    return this.config.model;
  }

  /** One model call, no retry. */
  async evaluate(transcript: string): Promise<EvaluationResult> {
    const prompt = buildEvaluationPrompt(transcript);

    let raw: string;
    try {
      const response = await this.adapter.completeText({
        config: this.config,
        messages: [{ role: "user", content: prompt }],
      });
      raw = response.text;
    } catch (error) {
      throw new ModelRequestFailedError(error);
    }

    return parseEvaluationResponse(raw, this.extractionStrategy);
  }
}

export function createEvaluationClientFromEnv(): EvaluationClient {
  const env = getEnv();
  return new EvaluationClient({
    adapter: createGeminiAdapter(),
    config: buildModelConfig(env),
    extractionStrategy: env.JSON_EXTRACTION_STRATEGY,
  });
}
