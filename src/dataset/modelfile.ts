import { SYSTEM_PROMPT } from "../core/prompts.js";
import type { TrainingExample } from "./builder.js";

export interface ModelfileOptions {
  /** MESSAGE pairs to embed; the rest of the dataset stays in the JSONL file. */
  maxExamples?: number;
  system?: string;
}

/** Modelfile strings are delimited by `"""`, which has no escape. */
function quote(text: string): string {
  return `"""${text.replaceAll('"""', "'''")}"""`;
}

/**
 * Renders an Ollama Modelfile that layers the README-writing system prompt
 * and a few example conversations over `baseModel`.
 */
export function renderModelfile(
  baseModel: string,
  examples: readonly TrainingExample[],
  options: ModelfileOptions = {},
): string {
  const maxExamples = options.maxExamples ?? 2;
  const lines = [
    `FROM ${baseModel}`,
    "",
    `SYSTEM ${quote(options.system ?? SYSTEM_PROMPT)}`,
    "",
  ];

  for (const example of examples.slice(0, maxExamples)) {
    lines.push(`MESSAGE user ${quote(example.prompt)}`);
    lines.push(`MESSAGE assistant ${quote(example.completion)}`);
    lines.push("");
  }

  return lines.join("\n");
}
