import { InferenceFatalError } from "../errors.js";
import type { LLMRequest, LLMResponse, ModelInfo, PullProgress } from "./types.js";

export abstract class LLMProvider {
  constructor(
    protected host: string,
    protected apiKey?: string,
  ) {}

  /**
   * Sends one request. Implementations throw the classified inference errors
   * (transient, fatal, truncated, aborted); retrying is the caller's job.
   */
  abstract generate(request: LLMRequest): Promise<LLMResponse>;

  abstract listModels(signal?: AbortSignal): Promise<ModelInfo[]>;

  abstract get name(): string;

  async pullModel(
    model: string,
    _onProgress?: (progress: PullProgress) => void,
  ): Promise<void> {
    throw new InferenceFatalError(
      `The ${this.name} provider cannot pull models.`,
      `Pull ${model} on the server directly.`,
    );
  }
}
