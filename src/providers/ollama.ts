import { z } from "zod";
import {
  InferenceFatalError,
  InferenceTransientError,
  InferenceTruncatedError,
  errorMessage,
} from "../errors.js";
import { LLMProvider } from "./base.js";
import { classifyFetchError, classifyStatus, joinUrl, readLines } from "./http.js";
import type { LLMRequest, LLMResponse, ModelInfo, PullProgress } from "./types.js";

const GenerateFrameSchema = z.object({
  model: z.string().optional(),
  response: z.string().optional(),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  error: z.string().optional(),
});

type GenerateFrame = z.infer<typeof GenerateFrameSchema>;

const TagsSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
      }),
    )
    .default([]),
});

const PullFrameSchema = z.object({
  status: z.string().optional(),
  completed: z.number().optional(),
  total: z.number().optional(),
  error: z.string().optional(),
});

function parseFrame<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  line: string,
): T {
  try {
    return schema.parse(JSON.parse(line));
  } catch (err) {
    throw new InferenceFatalError(
      "Malformed response from Ollama.",
      `${errorMessage(err)}: ${line.slice(0, 200)}`,
    );
  }
}

function toResponse(frame: GenerateFrame, text: string, model: string): LLMResponse {
  return {
    content: text,
    model: frame.model ?? model,
    truncated: frame.done_reason == "length",
    usage:
      frame.prompt_eval_count !== undefined || frame.eval_count !== undefined
        ? {
            inputTokens: frame.prompt_eval_count ?? 0,
            outputTokens: frame.eval_count ?? 0,
          }
        : undefined,
  };
}

/** Talks to an Ollama server over its native HTTP API. */
export class OllamaProvider extends LLMProvider {
  get name(): string {
    return "ollama";
  }

  private async post(
    pathname: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(joinUrl(this.host, pathname), {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw classifyFetchError(err, this.host, signal);
    }

    if (!response.ok) {
      throw classifyStatus(response.status, await response.text());
    }
    return response;
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    const stream = request.stream ?? true;
    const response = await this.post(
      "/api/generate",
      {
        model: request.model,
        prompt: request.prompt,
        ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
        stream,
        options: {
          temperature: request.temperature ?? 0.3,
          num_predict: request.maxTokens ?? 4096,
        },
      },
      request.signal,
    );

    if (!stream) {
      const frame = parseFrame(GenerateFrameSchema, await response.text());
      if (frame.error) {
        throw new InferenceFatalError("Ollama reported an error.", frame.error);
      }
      if (!frame.done) {
        throw new InferenceTruncatedError(
          "Ollama returned an unfinished response.",
          frame.response ?? "",
        );
      }
      return toResponse(frame, frame.response ?? "", request.model);
    }

    if (!response.body) {
      throw new InferenceFatalError("Ollama returned an empty body.");
    }

    let text = "";
    try {
      for await (const line of readLines(response.body)) {
        const frame = parseFrame(GenerateFrameSchema, line);
        if (frame.error) {
          throw new InferenceTransientError(
            "Ollama failed while streaming.",
            frame.error,
          );
        }
        text += frame.response ?? "";
        if (frame.done) {
          return toResponse(frame, text, request.model);
        }
      }
    } catch (err) {
      if (err instanceof InferenceFatalError || err instanceof InferenceTransientError) {
        throw err;
      }
      if (request.signal?.aborted) {
        throw classifyFetchError(err, this.host, request.signal);
      }
      throw new InferenceTruncatedError(
        `Response stream broke off: ${errorMessage(err)}`,
        text,
      );
    }

    throw new InferenceTruncatedError(
      "Response stream ended before the final frame.",
      text,
    );
  }

  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    let response: Response;
    try {
      response = await fetch(joinUrl(this.host, "/api/tags"), { signal });
    } catch (err) {
      throw classifyFetchError(err, this.host, signal);
    }
    if (!response.ok) {
      throw classifyStatus(response.status, await response.text());
    }

    const tags = parseFrame(TagsSchema, await response.text());
    return tags.models.map((m) => ({
      name: m.name,
      size: m.size,
      modifiedAt: m.modified_at,
    }));
  }

  async pullModel(
    model: string,
    onProgress?: (progress: PullProgress) => void,
  ): Promise<void> {
    const response = await this.post("/api/pull", { name: model, stream: true });
    if (!response.body) return;

    for await (const line of readLines(response.body)) {
      const frame = parseFrame(PullFrameSchema, line);
      if (frame.error) {
        throw new InferenceFatalError(`Cannot pull ${model}.`, frame.error);
      }
      if (frame.status) {
        onProgress?.({
          status: frame.status,
          completed: frame.completed,
          total: frame.total,
        });
      }
    }
  }
}
