import OpenAI, {
  APIConnectionError,
  APIError,
  APIUserAbortError,
} from "openai";
import {
  InferenceAbortedError,
  InferenceError,
  InferenceFatalError,
  InferenceTransientError,
  InferenceTruncatedError,
  errorMessage,
} from "../errors.js";
import { LLMProvider } from "./base.js";
import { classifyStatus, joinUrl } from "./http.js";
import type { LLMRequest, LLMResponse, ModelInfo } from "./types.js";

/** Maps openai SDK failures onto the inference error taxonomy. */
export function classifyOpenAIError(err: unknown, host: string): InferenceError {
  if (err instanceof InferenceError) return err;
  if (err instanceof APIUserAbortError) return new InferenceAbortedError();
  if (err instanceof APIConnectionError) {
    return new InferenceTransientError(
      `Cannot reach the inference endpoint at ${host}.`,
      err.message,
    );
  }
  if (err instanceof APIError && err.status !== undefined) {
    return classifyStatus(err.status, err.message);
  }
  return new InferenceFatalError("OpenAI-compatible API error", errorMessage(err));
}

/**
 * Any server speaking the OpenAI chat completions API, Ollama's `/v1`
 * included. SDK retries are off; the inference client owns retrying.
 */
export class OpenAICompatibleProvider extends LLMProvider {
  private client: OpenAI | null = null;

  get name(): string {
    return "openai-compatible";
  }

  private getClient(): OpenAI {
    this.client ??= new OpenAI({
      apiKey: this.apiKey ?? "ollama",
      baseURL: joinUrl(this.host, "/v1"),
      maxRetries: 0,
    });
    return this.client;
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (request.systemPrompt) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    messages.push({ role: "user", content: request.prompt });

    const body = {
      model: request.model,
      max_tokens: request.maxTokens ?? 4096,
      temperature: request.temperature ?? 0.3,
      messages,
    };

    if (request.stream === false) {
      try {
        const response = await this.getClient().chat.completions.create(
          { ...body, stream: false },
          { signal: request.signal },
        );
        const choice = response.choices[0];
        if (!choice) {
          throw new InferenceFatalError("No choices in the completion response.");
        }

        return {
          content: choice.message.content ?? "",
          model: response.model,
          truncated: choice.finish_reason == "length",
          usage: response.usage
            ? {
                inputTokens: response.usage.prompt_tokens,
                outputTokens: response.usage.completion_tokens ?? 0,
              }
            : undefined,
        };
      } catch (err) {
        throw classifyOpenAIError(err, this.host);
      }
    }

    let text = "";
    let model = request.model;
    let finishReason: string | null = null;

    try {
      const stream = await this.getClient().chat.completions.create(
        { ...body, stream: true },
        { signal: request.signal },
      );

      for await (const chunk of stream) {
        model = chunk.model || model;
        const choice = chunk.choices[0];
        text += choice?.delta?.content ?? "";
        finishReason = choice?.finish_reason ?? finishReason;
      }
    } catch (err) {
      if (text.length == 0 || request.signal?.aborted) {
        throw classifyOpenAIError(err, this.host);
      }
      throw new InferenceTruncatedError(
        `Response stream broke off: ${errorMessage(err)}`,
        text,
      );
    }

    if (!finishReason) {
      throw new InferenceTruncatedError(
        "Response stream ended without a finish reason.",
        text,
      );
    }

    return { content: text, model, truncated: finishReason == "length" };
  }

  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    try {
      const models: ModelInfo[] = [];
      for await (const model of this.getClient().models.list({ signal })) {
        models.push({ name: model.id });
      }
      return models;
    } catch (err) {
      throw classifyOpenAIError(err, this.host);
    }
  }
}
