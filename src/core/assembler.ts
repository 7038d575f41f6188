import fs from "node:fs";
import path from "node:path";
import { BudgetExceededError, ConfigError, errorMessage } from "../errors.js";
import { rankFiles } from "./categorization.js";
import { BudgetManager, createMeter, type SizeMeter } from "./tokens.js";
import type {
  AssembledContext,
  BudgetUnit,
  ContextChunk,
  ContextExcerpt,
  ScanIssue,
  ScanResult,
} from "./types.js";

export interface AssembleOptions {
  budget: number;
  unit: BudgetUnit;
  /** Upper bound on the number of chunks; files that no longer fit are omitted. */
  maxChunks?: number;
  /** Repository-relative paths kept out of the context. */
  exclude?: readonly string[];
  meter?: SizeMeter;
  readFile?: (fullPath: string) => string;
}

const readUtf8 = (fullPath: string) => fs.readFileSync(fullPath, "utf-8");

class ChunkPacker {
  public readonly chunks: ContextChunk[] = [];
  private current: ContextExcerpt[] = [];
  private readonly allowance: BudgetManager;

  constructor(
    budget: number,
    private readonly maxChunks: number,
  ) {
    this.allowance = new BudgetManager(budget);
  }

  /** Appends to the open chunk, or opens a new one. False once the cap is hit. */
  public place(excerpt: ContextExcerpt): boolean {
    if (this.allowance.trySpend(excerpt.size)) {
      this.current.push(excerpt);
      return true;
    }

    if (this.chunks.length + 1 >= this.maxChunks) {
      return false;
    }

    this.close();
    this.allowance.trySpend(excerpt.size);
    this.current.push(excerpt);
    return true;
  }

  public close(): void {
    if (this.current.length == 0) return;

    this.chunks.push(
      Object.freeze({
        index: this.chunks.length,
        excerpts: Object.freeze(this.current),
        size: this.allowance.spent,
      }),
    );
    this.current = [];
    this.allowance.reset();
  }
}

/**
 * Packs the included files of a scan into chunks of at most `budget` units,
 * in salience order. A file is never split across chunks; a file larger than
 * the budget is cut down to it and flagged as truncated.
 */
export function assembleContext(
  scan: ScanResult,
  options: AssembleOptions,
): AssembledContext {
  const { budget, unit } = options;
  const maxChunks = options.maxChunks ?? Number.POSITIVE_INFINITY;

  if (!Number.isInteger(budget) || budget <= 0) {
    throw new ConfigError(
      "Context budget must be a positive integer.",
      `Got ${budget}`,
    );
  }
  if (maxChunks < 1) {
    throw new ConfigError("maxChunks must be at least 1.", `Got ${maxChunks}`);
  }

  const meter = options.meter ?? createMeter(unit);
  const readFile = options.readFile ?? readUtf8;
  const excluded = new Set(options.exclude ?? []);

  const packer = new ChunkPacker(budget, maxChunks);
  const issues: ScanIssue[] = [];
  const omitted: string[] = [];
  const truncated: string[] = [];

  const languageByPath = new Map(scan.nodes.map((n) => [n.path, n.language]));
  const ranked = rankFiles(scan.nodes, scan.summary.primaryLanguage).filter(
    (f) => !excluded.has(f.filePath),
  );

  for (const file of ranked) {
    let content: string;
    try {
      content = readFile(path.join(scan.root, file.filePath));
    } catch (err) {
      issues.push({
        path: file.filePath,
        message: `Cannot read file: ${errorMessage(err)}`,
      });
      continue;
    }

    const originalSize = meter.measure(content);
    const oversized = originalSize > budget;
    if (oversized) {
      content = meter.truncate(content, budget);
    }

    const excerpt: ContextExcerpt = Object.freeze({
      path: file.filePath,
      language: languageByPath.get(file.filePath) ?? null,
      category: file.category,
      score: file.score,
      content,
      size: oversized ? meter.measure(content) : originalSize,
      originalSize,
      truncated: oversized,
    });

    if (!packer.place(excerpt)) {
      omitted.push(file.filePath);
      issues.push({
        path: file.filePath,
        message: `Omitted: the ${maxChunks}-chunk context cap was reached.`,
      });
      continue;
    }

    if (oversized) {
      truncated.push(file.filePath);
      issues.push({
        path: file.filePath,
        message: new BudgetExceededError(file.filePath, originalSize, budget)
          .message,
      });
    }
  }

  packer.close();

  return Object.freeze({
    budget,
    unit: meter.unit,
    chunks: Object.freeze(packer.chunks),
    omitted: Object.freeze(omitted),
    truncated: Object.freeze(truncated),
    issues: Object.freeze(issues),
  });
}
