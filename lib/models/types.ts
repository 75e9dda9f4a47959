export type ModelProvider = "gemini";

export interface ModelConfig {
  provider: ModelProvider;
  model: string;
  apiKey: string;
  baseUrl?: string;
}

export interface ModelMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface TextCompletionRequest {
  config: ModelConfig;
  messages: ModelMessage[];
}

export interface TextCompletionResponse {
  text: string;
  usage: ModelUsage;
  latencyMs: number;
  provider: ModelProvider;
  model: string;
}

export interface ModelAdapter {
  completeText(input: TextCompletionRequest): Promise<TextCompletionResponse>;
}
