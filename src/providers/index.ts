import type { LLMProvider } from "./base.js";
import { OllamaProvider } from "./ollama.js";
import { OpenAICompatibleProvider } from "./openai.js";
import type { EndpointConfig } from "../core/config.js";
import { ConfigError } from "../errors.js";
import { Provider } from "./types.js";

export function createProvider(endpoint: EndpointConfig): LLMProvider {
  switch (endpoint.provider) {
    case Provider.OLLAMA:
      return new OllamaProvider(endpoint.host, endpoint.apiKey);
    case Provider.OPENAI_COMPATIBLE:
      return new OpenAICompatibleProvider(endpoint.host, endpoint.apiKey);
    default:
      throw new ConfigError(`Unknown provider: ${String(endpoint.provider)}`);
  }
}

export type { LLMProvider } from "./base.js";
