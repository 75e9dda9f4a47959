import type {
  ModelMessage,
  ModelProvider,
  TextCompletionRequest,
  TextCompletionResponse,
} from "@/lib/models/types";

type ErrorBody = { error?: { message?: string } };

type ChatCompletionPayload = ErrorBody & {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
};

// Gemini's compatibility layer reports some errors as a one-element array.
function errorMessageOf(json: ChatCompletionPayload | ErrorBody[] | null): string | undefined {
  if (Array.isArray(json)) {
    return json[0]?.error?.message;
  }
  return json?.error?.message;
}

/**
 * One call to an OpenAI-style `/chat/completions` endpoint. Sends only the
 * model and messages so the provider's default generation settings apply.
 */
export async function openAIStyleCompletion(
  input: TextCompletionRequest,
  options: {
    providerLabel: ModelProvider;
    defaultBaseUrl: string;
  },
): Promise<TextCompletionResponse> {
  const baseUrl = input.config.baseUrl ?? options.defaultBaseUrl;
  const startedAt = Date.now();

  const payload = {
    model: input.config.model,
    messages: input.messages satisfies ModelMessage[],
  };

  const response = await fetch(`${baseUrl.replace(/\/$/, "")}/chat/completions`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${input.config.apiKey}`,
    },
    body: JSON.stringify(payload),
  });

  const body = (await response.json().catch(() => null)) as ChatCompletionPayload | ErrorBody[] | null;

  if (!response.ok) {
    throw new Error(errorMessageOf(body) ?? `Model call failed with status ${response.status}`);
  }

  const json = Array.isArray(body) ? null : body;

  return {
    text: json?.choices?.[0]?.message?.content?.trim() ?? "",
    usage: {
      inputTokens: json?.usage?.prompt_tokens ?? 0,
      outputTokens: json?.usage?.completion_tokens ?? 0,
    },
    latencyMs: Date.now() - startedAt,
    provider: options.providerLabel,
    model: input.config.model,
  };
}
