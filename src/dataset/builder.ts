import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { DatasetIntegrityError, errorMessage } from "../errors.js";
import { assembleContext } from "../core/assembler.js";
import { buildOverview, extractDependencies } from "../core/overview.js";
import { buildPrompt, renderPromptText } from "../core/prompts.js";
import { scanRepository } from "../core/scanner.js";
import { createMeter, type SizeMeter } from "../core/tokens.js";
import type { BudgetUnit, ExclusionPolicy, ScanIssue } from "../core/types.js";
import { sha256 } from "../utils.js";

export interface CorpusEntry {
  /** Repository root. */
  root: string;
  /** The known-good README paired with it. */
  readmePath: string;
}

export const TrainingExampleSchema = z.object({
  id: z.string().regex(/^[0-9a-f]{64}$/),
  repository: z.string(),
  part: z.object({ index: z.number().int(), total: z.number().int() }),
  system: z.string(),
  prompt: z.string(),
  completion: z.string(),
});

export type TrainingExample = z.infer<typeof TrainingExampleSchema>;

export interface BuildDatasetOptions {
  corpus: readonly CorpusEntry[];
  /** JSONL file; created when missing, otherwise appended to. */
  outputPath: string;
  budget: number;
  unit: BudgetUnit;
  maxChunks?: number;
  /** Ceiling on prompt + completion, in `unit`. Larger examples are skipped. */
  maxExampleSize: number;
  scan?: Partial<ExclusionPolicy>;
  meter?: SizeMeter;
}

export interface DatasetReport {
  /** Examples appended by this run. */
  added: TrainingExample[];
  /** Examples whose prompt was already in the file or earlier in the run. */
  duplicates: number;
  skipped: DatasetIntegrityError[];
  issues: ScanIssue[];
}

/** Subdirectories of `dir` holding a README.md, matched case-insensitively. */
export async function discoverCorpus(dir: string): Promise<CorpusEntry[]> {
  const root = path.resolve(dir);
  const readmes = await fg("*/README.md", {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
  });

  return readmes
    .map((readmePath) => ({ root: path.dirname(readmePath), readmePath }))
    .sort((a, b) => (a.root < b.root ? -1 : a.root > b.root ? 1 : 0));
}

/** Ids already in the dataset. Lines that do not parse are reported, not fatal. */
export function readExistingIds(outputPath: string): {
  ids: Set<string>;
  corrupt: DatasetIntegrityError[];
} {
  const ids = new Set<string>();
  const corrupt: DatasetIntegrityError[] = [];
  if (!fs.existsSync(outputPath)) return { ids, corrupt };

  const lines = fs.readFileSync(outputPath, "utf-8").split("\n");
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    try {
      ids.add(TrainingExampleSchema.parse(JSON.parse(line)).id);
    } catch (err) {
      corrupt.push(
        new DatasetIntegrityError(
          `Line ${i + 1} of the dataset is not a valid example.`,
          outputPath,
          errorMessage(err),
        ),
      );
    }
  });

  return { ids, corrupt };
}

/** The full prompt of an example, as hashed for its id. */
export function exampleText(example: TrainingExample): string {
  return `${example.system}\n\n${example.prompt}`;
}

function examplesFor(
  entry: CorpusEntry,
  options: BuildDatasetOptions,
  meter: SizeMeter,
  issues: ScanIssue[],
): TrainingExample[] {
  const completion = fs.readFileSync(entry.readmePath, "utf-8");
  if (!completion.trim()) {
    throw new DatasetIntegrityError("README is empty.", entry.readmePath);
  }

  const scan = scanRepository(entry.root, options.scan);
  const readme = path.relative(scan.root, entry.readmePath).split(path.sep).join("/");
  const context = assembleContext(scan, {
    budget: options.budget,
    unit: options.unit,
    maxChunks: options.maxChunks,
    exclude: [readme],
    meter,
  });
  const { dependencies, issues: manifestIssues } = extractDependencies(scan);
  issues.push(...scan.issues, ...context.issues, ...manifestIssues);

  // Git metadata is left out so an unchanged tree always renders the same prompt.
  const overview = buildOverview(scan, context, dependencies, null);
  const total = Math.max(context.chunks.length, 1);
  const chunkSets = context.chunks.length > 0 ? context.chunks.map((c) => [c]) : [[]];

  return chunkSets.map((chunks, i) => {
    const prompt = buildPrompt({
      directive: "generate",
      overview,
      chunks,
      unit: options.unit,
      part: { index: i + 1, total },
    });
    return {
      id: sha256(renderPromptText(prompt)),
      repository: path.basename(scan.root),
      part: { index: i + 1, total },
      system: prompt.system,
      prompt: prompt.body,
      completion,
    };
  });
}

/**
 * Turns (repository, README) pairs into prompt/completion examples and
 * appends the new ones to a JSONL file. Rebuilding an unchanged corpus
 * appends nothing.
 */
export function buildDataset(options: BuildDatasetOptions): DatasetReport {
  const meter = options.meter ?? createMeter(options.unit);
  const { ids, corrupt } = readExistingIds(options.outputPath);
  const report: DatasetReport = { added: [], duplicates: 0, skipped: [...corrupt], issues: [] };

  for (const entry of options.corpus) {
    let examples: TrainingExample[];
    try {
      examples = examplesFor(entry, options, meter, report.issues);
    } catch (err) {
      report.skipped.push(
        err instanceof DatasetIntegrityError
          ? err
          : new DatasetIntegrityError(
              "Cannot read repository.",
              entry.root,
              errorMessage(err),
            ),
      );
      continue;
    }

    for (const example of examples) {
      if (ids.has(example.id)) {
        report.duplicates++;
        continue;
      }

      const size =
        meter.measure(exampleText(example)) + meter.measure(example.completion);
      if (size > options.maxExampleSize) {
        report.skipped.push(
          new DatasetIntegrityError(
            `Example exceeds the training budget (${size} > ${options.maxExampleSize} ${options.unit}).`,
            `${entry.root} part ${example.part.index}/${example.part.total}`,
          ),
        );
        continue;
      }

      ids.add(example.id);
      report.added.push(example);
    }
  }

  if (report.added.length > 0) {
    appendExamples(options.outputPath, report.added);
  }

  return report;
}

function appendExamples(outputPath: string, examples: readonly TrainingExample[]): void {
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  let prefix = "";
  if (fs.existsSync(outputPath)) {
    const current = fs.readFileSync(outputPath, "utf-8");
    if (current.length > 0 && !current.endsWith("\n")) prefix = "\n";
  }
  fs.appendFileSync(
    outputPath,
    prefix + examples.map((e) => `${JSON.stringify(e)}\n`).join(""),
    "utf-8",
  );
}

/** The valid examples of a dataset file, in file order. */
export function loadDataset(outputPath: string): TrainingExample[] {
  if (!fs.existsSync(outputPath)) return [];
  return fs
    .readFileSync(outputPath, "utf-8")
    .split("\n")
    .filter((line) => line.trim())
    .flatMap((line) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        return [];
      }
      const parsed = TrainingExampleSchema.safeParse(raw);
      return parsed.success ? [parsed.data] : [];
    });
}
