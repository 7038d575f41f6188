import * as clack from "@clack/prompts";
import chalk from "chalk";
import type { ConfigLayer, ForgeConfig } from "../core/config.js";
import type { ScanIssue } from "../core/types.js";
import { ForgeError } from "../errors.js";
import { Provider } from "../providers/types.js";
import type { PipelineReporter, RepositoryOutcome } from "./pipeline.js";

export class CancelledError extends ForgeError {
  constructor() {
    super("Operation cancelled.");
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

function ensureNotCancelled<T>(value: T | symbol): T {
  if (clack.isCancel(value)) {
    clack.cancel("Operation cancelled.");
    throw new CancelledError();
  }
  if (typeof value == "symbol") {
    throw new ForgeError("Unexpected answer from the prompt.");
  }
  return value;
}

/** Asks for provider, host, model and key; current values are the defaults. */
export async function makeEndpointSelection(current: ForgeConfig): Promise<ConfigLayer> {
  clack.note(
    "Choose where your models run. Ollama serves on http://localhost:11434 by default.",
    "Let's set you up!",
  );

  const provider = ensureNotCancelled(
    await clack.select({
      message: "Choose LLM provider",
      initialValue: current.endpoint.provider,
      options: Object.values(Provider).map((value) => ({ value, label: value })),
    }),
  );

  const host = ensureNotCancelled(
    await clack.text({
      message: "Endpoint address",
      initialValue: current.endpoint.host,
      validate: (value) => {
        if (!value || !URL.canParse(value.trim())) return "Enter a full URL, e.g. http://localhost:11434";
        return undefined;
      },
    }),
  );

  const model = ensureNotCancelled(
    await clack.text({
      message: "Enter model name",
      initialValue: current.model,
      validate: (value) => {
        if (!value || !value.trim()) return "Model name cannot be empty";
        return undefined;
      },
    }),
  );

  let apiKey: string | undefined;
  if (provider == Provider.OPENAI_COMPATIBLE) {
    const answer = ensureNotCancelled(
      await clack.text({
        message: "Enter API key (leave empty if the server needs none)",
        placeholder: "optional",
      }),
    );
    apiKey = answer.trim() || undefined;
  }

  return {
    endpoint: { provider, host: host.trim(), ...(apiKey ? { apiKey } : {}) },
    model: model.trim(),
  };
}

/** Reports pipeline progress through clack, one line per stage. */
export function createReporter(verbose: boolean): PipelineReporter {
  return {
    stage(repository, message) {
      clack.log.step(`${chalk.bold(repository)} ${message}`);
    },
    issue(repository, issue: ScanIssue) {
      if (!verbose && !isVisibleIssue(issue)) return;
      clack.log.warn(`${chalk.bold(repository)} ${issue.path}: ${issue.message}`);
    },
  };
}

/** Truncations and omissions are always shown; other issues only when verbose. */
function isVisibleIssue(issue: ScanIssue): boolean {
  return /truncated|Omitted/.test(issue.message);
}

export function describeOutcome(outcome: RepositoryOutcome): string {
  const name = chalk.bold(outcome.repository);
  switch (outcome.status) {
    case "ok": {
      const notes: string[] = [];
      if (outcome.parts > 1) notes.push(`${outcome.parts} parts`);
      if (outcome.truncated.length > 0) notes.push(`${outcome.truncated.length} truncated`);
      if (outcome.omitted.length > 0) notes.push(`${outcome.omitted.length} omitted`);
      if (outcome.reinserted.length > 0) notes.push(`${outcome.reinserted.length} preserved sections restored`);
      if (outcome.outputTruncated) notes.push("model hit its output limit");
      const suffix = notes.length > 0 ? chalk.dim(` (${notes.join(", ")})`) : "";
      return `${name} ${outcome.directive}d ${outcome.outputPath}${suffix}`;
    }
    case "dry-run":
      return `${name} would ${outcome.directive} ${outcome.outputPath} in ${outcome.parts} part(s)`;
    case "scan-failed":
    case "write-failed":
      return `${name} ${outcome.error.message}`;
    case "inference-failed":
    case "merge-failed":
      return `${name} part ${outcome.part}: ${outcome.error.message}`;
    case "cancelled":
      return `${name} cancelled`;
  }
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${unit == 0 ? value : value.toFixed(1)} ${units[unit]}`;
}
