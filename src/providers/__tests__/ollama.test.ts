import { afterEach, describe, expect, it, vi } from "vitest";
import {
  InferenceAbortedError,
  InferenceFatalError,
  InferenceTransientError,
  InferenceTruncatedError,
} from "../../errors.js";
import { OllamaProvider } from "../ollama.js";
import type { PullProgress } from "../types.js";

function ndjson(frames: object[], status = 200): Response {
  return new Response(frames.map((f) => `${JSON.stringify(f)}\n`).join(""), { status });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const provider = new OllamaProvider("http://localhost:11434/");
const request = { model: "llama3.2:3b", prompt: "body", systemPrompt: "sys" };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaProvider.generate", () => {
  it("should stream frames into one response", async () => {
    stubFetch(
      ndjson([
        { model: "llama3.2:3b", response: "Hel", done: false },
        { response: "lo", done: false },
        { response: "", done: true, done_reason: "stop", prompt_eval_count: 5, eval_count: 2 },
      ]),
    );

    await expect(provider.generate(request)).resolves.toEqual({
      content: "Hello",
      model: "llama3.2:3b",
      truncated: false,
      usage: { inputTokens: 5, outputTokens: 2 },
    });
  });

  it("should post the prompt to /api/generate", async () => {
    const fetchMock = stubFetch(ndjson([{ response: "x", done: true }]));
    await provider.generate({ ...request, temperature: 0.1, maxTokens: 256 });

    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("http://localhost:11434/api/generate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llama3.2:3b",
      prompt: "body",
      system: "sys",
      stream: true,
      options: { temperature: 0.1, num_predict: 256 },
    });
  });

  it("should flag a reply cut by the output limit", async () => {
    stubFetch(ndjson([{ response: "partial", done: true, done_reason: "length" }]));
    const response = await provider.generate(request);

    expect(response.truncated).toBe(true);
    expect(response.content).toBe("partial");
  });

  it("should report a stream that ends before the final frame as truncated", async () => {
    stubFetch(ndjson([{ response: "Hel", done: false }]));

    const error = await provider.generate(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(InferenceTruncatedError);
    if (error instanceof InferenceTruncatedError) {
      expect(error.partialText).toBe("Hel");
    }
  });

  it("should read a single frame when streaming is off", async () => {
    stubFetch(new Response(JSON.stringify({ model: "m", response: "# Doc", done: true })));
    const response = await provider.generate({ ...request, stream: false });

    expect(response.content).toBe("# Doc");
    expect(response.model).toBe("m");
  });

  it("should classify HTTP failures", async () => {
    stubFetch(new Response("overloaded", { status: 503 }));
    await expect(provider.generate(request)).rejects.toBeInstanceOf(InferenceTransientError);

    stubFetch(new Response("model not found", { status: 404 }));
    await expect(provider.generate(request)).rejects.toBeInstanceOf(InferenceFatalError);
  });

  it("should treat a refused connection as transient", async () => {
    stubFetch(new TypeError("fetch failed"));
    await expect(provider.generate(request)).rejects.toBeInstanceOf(InferenceTransientError);
  });

  it("should report a cancelled request as aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    stubFetch(new DOMException("This operation was aborted", "AbortError"));

    await expect(
      provider.generate({ ...request, signal: controller.signal }),
    ).rejects.toBeInstanceOf(InferenceAbortedError);
  });

  it("should reject frames that are not JSON", async () => {
    stubFetch(new Response("not json\n"));
    await expect(provider.generate(request)).rejects.toBeInstanceOf(InferenceFatalError);
  });

  it("should treat an error frame mid-stream as transient", async () => {
    stubFetch(ndjson([{ response: "a", done: false }, { error: "out of memory" }]));
    await expect(provider.generate(request)).rejects.toBeInstanceOf(InferenceTransientError);
  });
});

describe("OllamaProvider.listModels", () => {
  it("should map /api/tags", async () => {
    const fetchMock = stubFetch(
      new Response(
        JSON.stringify({
          models: [{ name: "llama3.2:3b", size: 2019393189, modified_at: "2024-10-01T00:00:00Z" }],
        }),
      ),
    );

    await expect(provider.listModels()).resolves.toEqual([
      { name: "llama3.2:3b", size: 2019393189, modifiedAt: "2024-10-01T00:00:00Z" },
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:11434/api/tags");
  });
});

describe("OllamaProvider.pullModel", () => {
  it("should forward progress frames", async () => {
    stubFetch(
      ndjson([
        { status: "pulling manifest" },
        { status: "downloading", completed: 50, total: 100 },
        { status: "success" },
      ]),
    );
    const progress: PullProgress[] = [];

    await provider.pullModel("llama3.2:3b", (p) => progress.push(p));

    expect(progress.map((p) => p.status)).toEqual(["pulling manifest", "downloading", "success"]);
    expect(progress[1]).toEqual({ status: "downloading", completed: 50, total: 100 });
  });

  it("should fail on an error frame", async () => {
    stubFetch(ndjson([{ error: "pull model manifest: file does not exist" }]));
    await expect(provider.pullModel("nope")).rejects.toBeInstanceOf(InferenceFatalError);
  });
});
