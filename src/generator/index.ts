import path from "node:path";
import * as clack from "@clack/prompts";
import chalk from "chalk";
import { ConfigService } from "../core/config-service.js";
import {
  configFromEnv,
  mergeLayers,
  resolveConfig,
  type ConfigLayer,
  type ForgeConfig,
} from "../core/config.js";
import { renderPromptText } from "../core/prompts.js";
import { buildDataset, discoverCorpus, loadDataset } from "../dataset/builder.js";
import { renderModelfile } from "../dataset/modelfile.js";
import { ConfigError, InferenceError } from "../errors.js";
import { InferenceClient } from "../inference/client.js";
import { createProvider } from "../providers/index.js";
import type { ModelInfo } from "../providers/types.js";
import type { Directive } from "../types.js";
import { writeFileAtomic } from "../utils.js";
import { processBatch } from "./batch.js";
import {
  createReporter,
  describeOutcome,
  formatBytes,
  makeEndpointSelection,
} from "./helpers.js";
import type { RepositoryOutcome } from "./pipeline.js";

export const ExitCode = {
  OK: 0,
  CONFIG: 1,
  SCAN: 2,
  INFERENCE: 3,
  MERGE: 4,
  CANCELLED: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const OUTCOME_CODES: Record<RepositoryOutcome["status"], ExitCode> = {
  ok: ExitCode.OK,
  "dry-run": ExitCode.OK,
  "scan-failed": ExitCode.SCAN,
  "write-failed": ExitCode.SCAN,
  "inference-failed": ExitCode.INFERENCE,
  "merge-failed": ExitCode.MERGE,
  cancelled: ExitCode.CANCELLED,
};

/** The most severe code among the outcomes of a batch. */
export function exitCodeFor(outcomes: readonly RepositoryOutcome[]): ExitCode {
  let worst: ExitCode = ExitCode.OK;
  for (const outcome of outcomes) {
    const code = OUTCOME_CODES[outcome.status];
    if (code > worst) worst = code;
  }
  return worst;
}

/** Settings file, then environment, then the flags of this invocation. */
export async function loadConfig(
  flags: ConfigLayer = {},
): Promise<{ config: ForgeConfig; service: ConfigService }> {
  const service = await ConfigService.create();
  const config = resolveConfig(service.layer, configFromEnv(process.env), flags);
  return { config, service };
}

function createClient(config: ForgeConfig): InferenceClient {
  return new InferenceClient(createProvider(config.endpoint), config.inference);
}

export interface GenerateArgs {
  directive: Directive;
  repos: readonly string[];
  output: string;
  dryRun: boolean;
  verbose: boolean;
  flags: ConfigLayer;
  signal: AbortSignal;
}

export async function runGenerate(args: GenerateArgs): Promise<ExitCode> {
  intro(args.directive == "generate" ? "Generating READMEs" : "Updating READMEs");

  const { config } = await loadConfig(args.flags);
  const repos = args.repos.length > 0 ? args.repos : [process.cwd()];
  const client = createClient(config);

  clack.log.info(
    chalk.dim(
      `${client.providerName} · ${config.model} · budget ${config.budget.size} ${config.budget.unit} × ${config.budget.maxChunks}`,
    ),
  );

  const outcomes = await processBatch(repos, client, {
    directive: args.directive,
    model: config.model,
    output: args.output,
    budget: config.budget,
    scan: config.scan,
    preserveHeadings: config.merge.preserveHeadings,
    dryRun: args.dryRun,
    signal: args.signal,
    reporter: createReporter(args.verbose),
    concurrency: config.concurrency,
  });

  for (const outcome of outcomes) {
    if (outcome.status == "dry-run") {
      clack.note(renderPromptText(outcome.prompt), `${outcome.repository} · part 1/${outcome.parts}`);
    }
    if (outcome.status == "ok" || outcome.status == "dry-run") {
      clack.log.success(describeOutcome(outcome));
    } else {
      clack.log.error(describeOutcome(outcome));
      if ("error" in outcome && outcome.error.internalDetails) {
        clack.log.message(chalk.dim(`Details: ${outcome.error.internalDetails}`));
      }
    }
  }

  const code = exitCodeFor(outcomes);
  const done = outcomes.filter((o) => o.status == "ok" || o.status == "dry-run").length;
  outro(
    code == ExitCode.OK
      ? chalk.green.bold(`Done: ${done} of ${outcomes.length} repositories.`)
      : chalk.yellow.bold(`Finished with failures: ${done} of ${outcomes.length} repositories succeeded.`),
  );
  return code;
}

export async function runListModels(flags: ConfigLayer): Promise<ExitCode> {
  const { config } = await loadConfig(flags);
  const client = createClient(config);

  let models: ModelInfo[];
  try {
    models = await client.listModels();
  } catch (err) {
    if (err instanceof InferenceError) {
      throw new ConfigError(
        `Cannot list models at ${config.endpoint.host}.`,
        err.internalDetails ?? err.message,
      );
    }
    throw err;
  }

  if (models.length == 0) {
    clack.log.warn(`No models on ${config.endpoint.host}. Try: readme-forge pull-model ${config.model}`);
    return ExitCode.OK;
  }

  for (const model of models) {
    const size = model.size !== undefined ? chalk.dim(` ${formatBytes(model.size)}`) : "";
    const current = model.name == config.model ? chalk.green(" (selected)") : "";
    console.log(`${model.name}${size}${current}`);
  }
  return ExitCode.OK;
}

export async function runPullModel(name: string, flags: ConfigLayer): Promise<ExitCode> {
  intro(`Pulling ${name}`);
  const { config } = await loadConfig(flags);
  const client = createClient(config);

  const spin = clack.spinner();
  spin.start(`Pulling ${name}`);
  try {
    await client.pullModel(name, (progress) => {
      const pct =
        progress.total && progress.completed !== undefined
          ? ` ${Math.floor((progress.completed / progress.total) * 100)}%`
          : "";
      spin.message(`${progress.status}${pct}`);
    });
  } catch (err) {
    spin.stop(chalk.red(`Could not pull ${name}`));
    throw err;
  }
  spin.stop(`Pulled ${name}`);
  outro(chalk.green.bold("Ready."));
  return ExitCode.OK;
}

export interface DatasetArgs {
  corpus: string;
  output: string;
  modelfile?: string;
  baseModel?: string;
  flags: ConfigLayer;
}

export async function runDataset(args: DatasetArgs): Promise<ExitCode> {
  intro("Building the fine-tuning dataset");
  const { config } = await loadConfig(args.flags);

  const corpus = await discoverCorpus(args.corpus);
  if (corpus.length == 0) {
    throw new ConfigError(
      "No repositories found in the corpus.",
      `Expected subdirectories of ${path.resolve(args.corpus)} holding a README.md.`,
    );
  }

  const spin = clack.spinner();
  spin.start(`Reading ${corpus.length} repositories`);
  const report = buildDataset({
    corpus,
    outputPath: args.output,
    budget: config.budget.size,
    unit: config.budget.unit,
    maxChunks: config.budget.maxChunks,
    maxExampleSize: config.dataset.maxExampleSize,
    scan: config.scan,
  });
  spin.stop(
    `Added ${report.added.length} examples, ${report.duplicates} already present, ${report.skipped.length} skipped.`,
  );

  for (const skipped of report.skipped) {
    clack.log.warn(`${skipped.source}: ${skipped.message}`);
  }

  if (args.modelfile) {
    const baseModel = args.baseModel ?? config.model;
    writeFileAtomic(args.modelfile, renderModelfile(baseModel, loadDataset(args.output)));
    clack.log.success(`Modelfile written to ${args.modelfile}. Create the model with: ollama create <name> -f ${args.modelfile}`);
  }

  outro(chalk.green.bold(`Dataset: ${path.resolve(args.output)}`));
  return ExitCode.OK;
}

export async function runConfigure(): Promise<ExitCode> {
  intro("Configure readme-forge");
  const { config, service } = await loadConfig();
  const answers = await makeEndpointSelection(config);

  const layer = mergeLayers(service.layer, answers);
  resolveConfig(layer);
  await service.save(layer);

  outro(chalk.green.bold(`Saved to ${service.path}`));
  return ExitCode.OK;
}

function intro(title: string): void {
  clack.intro(chalk.green.bold(title));
}

function outro(message: string): void {
  clack.outro(message);
}
