export interface LLMRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  stream?: boolean;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  /** The model stopped because it hit the output-length limit. */
  truncated: boolean;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ModelInfo {
  name: string;
  size?: number;
  modifiedAt?: string;
}

export interface PullProgress {
  status: string;
  completed?: number;
  total?: number;
}

export enum Provider {
  OLLAMA = "ollama",
  OPENAI_COMPATIBLE = "openai-compatible",
}
