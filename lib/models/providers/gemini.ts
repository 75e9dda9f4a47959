import type { ModelAdapter } from "@/lib/models/types";
import { openAIStyleCompletion } from "@/lib/models/providers/openai-style";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai";

export function createGeminiAdapter(): ModelAdapter {
  return {
    completeText(input) {
      return openAIStyleCompletion(input, {
        providerLabel: "gemini",
        defaultBaseUrl: GEMINI_BASE_URL,
      });
    },
  };
}
