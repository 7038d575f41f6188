import { setTimeout as delay } from "node:timers/promises";
import type { InferenceConfig } from "../core/config.js";
import type { Prompt } from "../core/types.js";
import {
  InferenceAbortedError,
  InferenceError,
  InferenceFatalError,
  InferenceTransientError,
  InferenceTruncatedError,
  errorMessage,
} from "../errors.js";
import type { LLMProvider } from "../providers/base.js";
import type { LLMResponse, ModelInfo, PullProgress } from "../providers/types.js";
import { Semaphore } from "./semaphore.js";

export interface ModelResponse {
  text: string;
  model: string;
  latencyMs: number;
  /** The model hit its output-length limit. */
  truncated: boolean;
  attempts: number;
  usage?: { inputTokens: number; outputTokens: number };
}

export type SubmitResult =
  | { ok: true; response: ModelResponse }
  | { ok: false; error: InferenceError; attempts: number };

export interface SubmitOptions {
  model: string;
  signal?: AbortSignal;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type ClientOptions = Partial<InferenceConfig> & {
  sleep?: SleepFn;
  now?: () => number;
};

const DEFAULTS: InferenceConfig = {
  timeoutMs: 300_000,
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  maxInFlight: 2,
  temperature: 0.3,
  maxOutputTokens: 4096,
  stream: true,
};

const defaultSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new InferenceAbortedError();
    throw err;
  }
};

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

function isRetryable(err: InferenceError): boolean {
  return err instanceof InferenceTransientError || err instanceof InferenceTruncatedError;
}

function toInferenceError(err: unknown): InferenceError {
  if (err instanceof InferenceError) return err;
  return new InferenceFatalError("Unexpected inference failure.", errorMessage(err));
}

/**
 * Shared front door to an inference endpoint: per-attempt timeouts, bounded
 * retries for transient failures and a cap on requests in flight.
 */
export class InferenceClient {
  private readonly options: InferenceConfig;
  private readonly semaphore: Semaphore;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(
    private readonly provider: LLMProvider,
    options: ClientOptions = {},
  ) {
    const { sleep, now, ...config } = options;
    this.options = { ...DEFAULTS, ...config };
    this.semaphore = new Semaphore(this.options.maxInFlight);
    this.sleep = sleep ?? defaultSleep;
    this.now = now ?? Date.now;
  }

  get providerName(): string {
    return this.provider.name;
  }

  get inFlight(): number {
    return this.semaphore.inUse;
  }

  async submit(prompt: Prompt, options: SubmitOptions): Promise<SubmitResult> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.options;
    let attempts = 0;

    while (true) {
      attempts++;
      const started = this.now();

      try {
        const response = await this.semaphore.run(
          () => this.attempt(prompt, options),
          options.signal,
        );
        return {
          ok: true,
          response: {
            text: response.content,
            model: response.model,
            latencyMs: this.now() - started,
            truncated: response.truncated,
            attempts,
            usage: response.usage,
          },
        };
      } catch (err) {
        const error = toInferenceError(err);
        if (!isRetryable(error) || attempts >= maxAttempts) {
          return { ok: false, error, attempts };
        }
      }

      try {
        await this.sleep(backoffDelay(attempts, baseDelayMs, maxDelayMs), options.signal);
      } catch (err) {
        return { ok: false, error: toInferenceError(err), attempts };
      }
    }
  }

  private async attempt(prompt: Prompt, options: SubmitOptions): Promise<LLMResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const forward = (): void => controller.abort();
    options.signal?.addEventListener("abort", forward, { once: true });

    try {
      return await this.provider.generate({
        model: options.model,
        prompt: prompt.body,
        systemPrompt: prompt.system,
        maxTokens: this.options.maxOutputTokens,
        temperature: this.options.temperature,
        stream: this.options.stream,
        signal: controller.signal,
      });
    } catch (err) {
      if (options.signal?.aborted) throw new InferenceAbortedError();
      if (timedOut) {
        throw new InferenceTransientError(
          `No response within ${this.options.timeoutMs} ms.`,
          errorMessage(err),
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", forward);
    }
  }

  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    return this.provider.listModels(signal);
  }

  async pullModel(
    model: string,
    onProgress?: (progress: PullProgress) => void,
  ): Promise<void> {
    return this.provider.pullModel(model, onProgress);
  }
}
