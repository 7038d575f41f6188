#!/usr/bin/env node
import { Cli } from "clerc";
import chalk from "chalk";
import type { ConfigLayer } from "./core/config.js";
import {
  ForgeError,
  InferenceError,
  MergeValidationError,
  ScanError,
  errorMessage,
} from "./errors.js";
import { CancelledError } from "./generator/helpers.js";
import {
  ExitCode,
  runConfigure,
  runDataset,
  runGenerate,
  runListModels,
  runPullModel,
} from "./generator/index.js";
import type { Directive } from "./types.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

function reportError(error: unknown): ExitCode {
  console.error(`${chalk.red.bold("Error:")} ${errorMessage(error)}`);
  if (error instanceof ForgeError && error.internalDetails) {
    console.error(chalk.dim(`Details: ${error.internalDetails}`));
  }

  if (error instanceof CancelledError) return ExitCode.CANCELLED;
  if (error instanceof ScanError) return ExitCode.SCAN;
  if (error instanceof InferenceError) return ExitCode.INFERENCE;
  if (error instanceof MergeValidationError) return ExitCode.MERGE;
  return ExitCode.CONFIG;
}

function run(task: () => Promise<ExitCode>): void {
  task().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.exitCode = reportError(error);
    },
  );
}

interface EndpointFlags {
  model?: string;
  host?: string;
}

interface BudgetFlags extends EndpointFlags {
  budget?: number;
  unit?: string;
  maxChunks?: number;
}

function configLayer(flags: BudgetFlags): ConfigLayer {
  return {
    model: flags.model,
    endpoint: { host: flags.host },
    budget: { size: flags.budget, unit: flags.unit, maxChunks: flags.maxChunks },
  };
}

const endpointFlags = {
  model: {
    type: String,
    short: "m",
    description: "Model to use (overrides the saved configuration).",
  },
  host: {
    type: String,
    description: "Inference endpoint address, e.g. http://localhost:11434.",
  },
};

const budgetFlags = {
  ...endpointFlags,
  budget: {
    type: Number,
    short: "b",
    description: "Context budget per chunk.",
  },
  unit: {
    type: String,
    description: "Budget unit: chars or tokens.",
  },
  maxChunks: {
    type: Number,
    description: "Maximum number of context chunks per repository.",
  },
};

const documentFlags = {
  ...budgetFlags,
  repo: {
    type: [String] satisfies readonly [StringConstructor],
    short: "r",
    description: "Repository to document; repeat for a batch. Defaults to the current directory.",
  },
  output: {
    type: String,
    short: "o",
    default: "README.md",
    description: "Output file, relative to each repository.",
  },
  dryRun: {
    type: Boolean,
    default: false,
    description: "Print the first prompt instead of calling the model.",
  },
  verbose: {
    type: Boolean,
    short: "v",
    default: false,
    description: "Show every scan issue, not only truncations.",
  },
};

interface DocumentFlags extends BudgetFlags {
  repo: string[];
  output: string;
  dryRun: boolean;
  verbose: boolean;
}

function document(directive: Directive, flags: DocumentFlags): void {
  run(() =>
    runGenerate({
      directive,
      repos: flags.repo,
      output: flags.output,
      dryRun: flags.dryRun,
      verbose: flags.verbose,
      flags: configLayer(flags),
      signal: controller.signal,
    }),
  );
}

Cli()
  .name("readme-forge")
  .version("0.1.0")
  .scriptName("readme-forge")
  .command("generate", "Write a new README for each repository", {
    flags: documentFlags,
  })
  .on("generate", (ctx) => {
    document("generate", ctx.flags);
  })
  .command("update", "Refresh existing READMEs, keeping hand-written sections", {
    flags: documentFlags,
  })
  .on("update", (ctx) => {
    document("update", ctx.flags);
  })
  .command("list-models", "List the models available on the endpoint", {
    flags: endpointFlags,
  })
  .on("list-models", (ctx) => {
    run(() => runListModels(configLayer(ctx.flags)));
  })
  .command("pull-model", "Download a model to the Ollama server", {
    parameters: ["<name>"],
    flags: endpointFlags,
  })
  .on("pull-model", (ctx) => {
    run(() => runPullModel(ctx.parameters.name, configLayer(ctx.flags)));
  })
  .command("dataset", "Build a fine-tuning dataset from repositories with known-good READMEs", {
    flags: {
      ...budgetFlags,
      corpus: {
        type: String,
        short: "c",
        default: "training/repositories",
        description: "Directory whose subdirectories are example repositories.",
      },
      output: {
        type: String,
        short: "o",
        default: "training/dataset.jsonl",
        description: "JSONL file the examples are appended to.",
      },
      modelfile: {
        type: String,
        description: "Also write an Ollama Modelfile built from the dataset.",
      },
      baseModel: {
        type: String,
        description: "Base model for the Modelfile (defaults to the configured model).",
      },
    },
  })
  .on("dataset", (ctx) => {
    run(() =>
      runDataset({
        corpus: ctx.flags.corpus,
        output: ctx.flags.output,
        modelfile: ctx.flags.modelfile,
        baseModel: ctx.flags.baseModel,
        flags: configLayer(ctx.flags),
      }),
    );
  })
  .command("configure", "Choose the provider, endpoint and model")
  .on("configure", () => {
    run(runConfigure);
  })
  .errorHandler((error: unknown) => {
    process.exitCode = reportError(error);
  })
  .parse();
