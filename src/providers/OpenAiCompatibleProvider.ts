import { describeError, ProviderFailure } from "../runtime/DocgapErrors.js";
import type { Provider, ProviderConfig, ProviderRequest, ProviderResponse } from "./ProviderTypes.js";

interface OpenAiResponse {
  choices: Array<{
    message: {
      role: string;
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.openai.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

const isOpenAiResponse = (value: unknown): value is OpenAiResponse =>
  typeof value === "object" && value !== null && "choices" in value && Array.isArray(value.choices);

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const baseUrl = normalizeBaseUrl(this.config.baseUrl);
    const url = new URL("chat/completions", baseUrl).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const body = {
      model: this.config.model,
      messages: request.messages.map((message) => ({
        role: message.role,
        content: message.content,
      })),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      stream: false,
    };

    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs ?? 60_000;
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener("abort", onAbort, { once: true });
    if (request.signal?.aborted) controller.abort();

    // Body reads can be aborted by the timeout too, so they share the fetch error mapping.
    const requestFailure = (error: unknown): ProviderFailure =>
      timedOut
        ? new ProviderFailure(`OpenAI-compatible request timed out after ${timeoutMs}ms`, {
            timedOut: true,
            cause: error,
          })
        : new ProviderFailure(`OpenAI-compatible request failed: ${describeError(error)}`, { cause: error });

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: "POST",
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        throw requestFailure(error);
      }

      if (!response.ok) {
        let errorBody: string;
        try {
          errorBody = await response.text();
        } catch (error) {
          throw requestFailure(error);
        }
        throw new ProviderFailure(`OpenAI-compatible error ${response.status}: ${errorBody}`);
      }

      let raw: unknown;
      try {
        raw = await response.json();
      } catch (error) {
        throw requestFailure(error);
      }
      if (!isOpenAiResponse(raw)) {
        throw new ProviderFailure("OpenAI-compatible response missing choices");
      }
      const choice = raw.choices[0]?.message;
      if (!choice) {
        throw new ProviderFailure("OpenAI-compatible response missing choices");
      }

      return {
        message: {
          role: "assistant",
          content: choice.content ?? "",
        },
        usage: raw.usage
          ? {
              inputTokens: raw.usage.prompt_tokens,
              outputTokens: raw.usage.completion_tokens,
              totalTokens: raw.usage.total_tokens,
            }
          : undefined,
        raw,
      };
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", onAbort);
    }
  }
}
