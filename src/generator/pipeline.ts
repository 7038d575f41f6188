import fs from "node:fs";
import path from "node:path";
import { GitClient } from "../adapters/git.js";
import { assembleContext } from "../core/assembler.js";
import type { ForgeConfig } from "../core/config.js";
import { parseSections } from "../core/markdown.js";
import { mergeDocument } from "../core/merger.js";
import { buildOverview, extractDependencies } from "../core/overview.js";
import { buildPrompt } from "../core/prompts.js";
import { scanRepository } from "../core/scanner.js";
import type { SizeMeter } from "../core/tokens.js";
import type {
  AssembledContext,
  ContextChunk,
  ExclusionPolicy,
  Prompt,
  RepositoryOverview,
  ScanIssue,
} from "../core/types.js";
import {
  ForgeError,
  InferenceAbortedError,
  InferenceError,
  MergeValidationError,
  ScanError,
  errorMessage,
} from "../errors.js";
import type { InferenceClient } from "../inference/client.js";
import type { Directive } from "../types.js";
import { fileExists, writeFileAtomic } from "../utils.js";

export interface PipelineReporter {
  stage(repository: string, message: string): void;
  issue(repository: string, issue: ScanIssue): void;
}

export interface PipelineOptions {
  directive: Directive;
  model: string;
  /** Output file, relative to the repository root. */
  output: string;
  budget: ForgeConfig["budget"];
  scan?: Partial<ExclusionPolicy>;
  preserveHeadings: readonly string[];
  /** Build the prompts without calling the model or writing anything. */
  dryRun?: boolean;
  signal?: AbortSignal;
  reporter?: PipelineReporter;
  meter?: SizeMeter;
  /** Include git metadata in the overview. */
  git?: boolean;
}

interface OutcomeBase {
  repository: string;
  /** The directive actually run: `update` falls back to `generate` without a README. */
  directive: Directive;
  issues: readonly ScanIssue[];
}

export type RepositoryOutcome =
  | (OutcomeBase & {
      status: "ok";
      outputPath: string;
      text: string;
      parts: number;
      preserved: string[];
      reinserted: string[];
      /** Files cut to the budget or left out of the context. */
      truncated: readonly string[];
      omitted: readonly string[];
      /** The model stopped at its output-length limit on some part. */
      outputTruncated: boolean;
    })
  | (OutcomeBase & {
      status: "dry-run";
      outputPath: string;
      parts: number;
      /** The first part's prompt; later parts depend on the model's draft. */
      prompt: Prompt;
      truncated: readonly string[];
      omitted: readonly string[];
    })
  | (OutcomeBase & { status: "scan-failed"; error: ForgeError })
  | (OutcomeBase & { status: "inference-failed"; error: InferenceError; part: number })
  | (OutcomeBase & { status: "merge-failed"; error: MergeValidationError; part: number })
  | (OutcomeBase & { status: "write-failed"; error: ForgeError; outputPath: string })
  | (OutcomeBase & { status: "cancelled"; part: number });

interface Prepared {
  directive: Directive;
  original: string | null;
  outputPath: string;
  overview: RepositoryOverview;
  context: AssembledContext;
  issues: ScanIssue[];
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

function prepare(root: string, options: PipelineOptions): Prepared {
  const scan = scanRepository(root, options.scan);
  const outputPath = path.resolve(scan.root, options.output);

  let original: string | null = null;
  if (options.directive == "update" && fileExists(outputPath)) {
    try {
      original = fs.readFileSync(outputPath, "utf-8");
    } catch (err) {
      throw new ScanError("Cannot read the existing README.", outputPath, errorMessage(err));
    }
  }

  const context = assembleContext(scan, {
    budget: options.budget.size,
    unit: options.budget.unit,
    maxChunks: options.budget.maxChunks,
    exclude: [toPosix(path.relative(scan.root, outputPath))],
    meter: options.meter,
  });
  const { dependencies, issues: manifestIssues } = extractDependencies(scan);
  const git = options.git === false ? null : (GitClient.open(scan.root)?.info() ?? null);

  return {
    directive: original === null ? "generate" : "update",
    original,
    outputPath,
    overview: buildOverview(scan, context, dependencies, git),
    context,
    issues: [...scan.issues, ...context.issues, ...manifestIssues],
  };
}

function preservedHeadingsOf(original: string, preserveHeadings: readonly string[]): string[] {
  return parseSections(original, preserveHeadings).flatMap((s) =>
    s.tag == "preserved" && s.heading !== null ? [s.heading] : [],
  );
}

/**
 * One part's prompt. Part 1 runs the repository's directive; every later
 * part refines the draft produced so far.
 */
function promptFor(
  prepared: Prepared,
  chunks: readonly ContextChunk[],
  part: { index: number; total: number },
  draft: string | null,
  options: PipelineOptions,
): Prompt {
  const prior = draft ?? prepared.original;
  const base = { overview: prepared.overview, chunks, unit: prepared.context.unit, part };

  if (prior === null) {
    return buildPrompt({ directive: "generate", ...base });
  }
  return buildPrompt({
    directive: "update",
    ...base,
    priorDocument: prior,
    preservedHeadings:
      prepared.original === null
        ? []
        : preservedHeadingsOf(prepared.original, options.preserveHeadings),
  });
}

/**
 * Scan, assemble, prompt, infer and merge one repository. Failures come back
 * as outcomes; the README is written only after every part merged cleanly.
 */
export async function processRepository(
  root: string,
  client: InferenceClient,
  options: PipelineOptions,
): Promise<RepositoryOutcome> {
  const repository = path.basename(path.resolve(root));
  const report = options.reporter;

  if (options.signal?.aborted) {
    return { status: "cancelled", repository, directive: options.directive, issues: [], part: 0 };
  }

  let prepared: Prepared;
  try {
    report?.stage(repository, "Scanning repository");
    prepared = prepare(root, options);
  } catch (err) {
    if (!(err instanceof ForgeError)) throw err;
    return {
      status: "scan-failed",
      repository,
      directive: options.directive,
      issues: [],
      error: err,
    };
  }

  const { directive, context, issues } = prepared;
  for (const issue of issues) report?.issue(repository, issue);

  const chunkSets: (readonly ContextChunk[])[] =
    context.chunks.length > 0 ? context.chunks.map((c) => [c]) : [[]];
  const total = chunkSets.length;
  const base = { repository, directive, issues };

  if (options.dryRun) {
    return {
      ...base,
      status: "dry-run",
      outputPath: prepared.outputPath,
      parts: total,
      prompt: promptFor(prepared, chunkSets[0] ?? [], { index: 1, total }, null, options),
      truncated: context.truncated,
      omitted: context.omitted,
    };
  }

  let draft: string | null = null;
  let preserved: string[] = [];
  let reinserted: string[] = [];
  let outputTruncated = false;

  for (const [i, chunks] of chunkSets.entries()) {
    const part = { index: i + 1, total };
    const prompt = promptFor(prepared, chunks, part, draft, options);

    report?.stage(
      repository,
      total > 1 ? `Waiting for ${options.model} (part ${part.index}/${total})` : `Waiting for ${options.model}`,
    );
    const result = await client.submit(prompt, { model: options.model, signal: options.signal });

    if (!result.ok) {
      if (result.error instanceof InferenceAbortedError) {
        return { ...base, status: "cancelled", part: part.index };
      }
      return { ...base, status: "inference-failed", error: result.error, part: part.index };
    }
    outputTruncated ||= result.response.truncated;

    const merged =
      prepared.original === null
        ? mergeDocument({ directive: "generate", modelOutput: result.response.text })
        : mergeDocument({
            directive: "update",
            modelOutput: result.response.text,
            original: prepared.original,
            preserveHeadings: options.preserveHeadings,
          });

    if (!merged.ok) {
      return { ...base, status: "merge-failed", error: merged.error, part: part.index };
    }
    draft = merged.text;
    preserved = merged.preserved;
    reinserted = merged.reinserted;
  }

  if (draft === null || options.signal?.aborted) {
    return { ...base, status: "cancelled", part: total };
  }

  report?.stage(repository, `Writing ${path.basename(prepared.outputPath)}`);
  try {
    writeFileAtomic(prepared.outputPath, draft.endsWith("\n") ? draft : `${draft}\n`);
  } catch (err) {
    return {
      ...base,
      status: "write-failed",
      outputPath: prepared.outputPath,
      error: new ForgeError(`Cannot write ${prepared.outputPath}.`, errorMessage(err)),
    };
  }

  return {
    ...base,
    status: "ok",
    outputPath: prepared.outputPath,
    text: draft,
    parts: total,
    preserved,
    reinserted,
    truncated: context.truncated,
    omitted: context.omitted,
    outputTruncated,
  };
}
